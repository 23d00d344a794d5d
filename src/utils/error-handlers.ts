import { logger, errorMessage } from './logger.js';

const log = logger.createContext('error-handlers');

/**
 * Install global process error handlers.
 * Browser/page teardown races surface as stray rejections from Playwright
 * and must not take the worker down.
 */
export function installGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    const message = errorMessage(reason);
    if (isBrowserError(message)) {
      log.debug(`Unhandled browser error (non-fatal): ${message}`);
      return;
    }

    log.error('Unhandled Promise Rejection:', reason);
  });

  process.on('uncaughtException', (err: Error, origin: string) => {
    if (isBrowserError(err.message)) {
      log.debug(`Uncaught browser error (non-fatal): ${err.message}`);
      return;
    }

    log.error(`FATAL: Uncaught Exception (${origin}):`, err);
    // The process is in an undefined state
    process.exit(1);
  });

  log.debug('Global error handlers installed');
}

// Messages Playwright raises once its target is gone
const TORN_DOWN_PATTERNS = [
  'target page, context or browser has been closed',
  'browser has been closed',
  'context has been closed',
  'page has been closed',
  'target closed',
  'connection closed',
  'browser is closed',
  'execution context was destroyed',
  'route is already handled'
];

/**
 * Check if an error comes from a page, context or browser that has already
 * been torn down. These are expected once a session is closed or cancelled.
 */
export function isBrowserError(message: string | null | undefined): boolean {
  if (!message) return false;
  const lowered = message.toLowerCase();
  return TORN_DOWN_PATTERNS.some(pattern => lowered.includes(pattern));
}

/**
 * Playwright's TimeoutError and our own step deadlines both carry this name.
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

export class StepTimeoutError extends Error {
  constructor(step: string, timeoutMs: number) {
    super(`${step} exceeded ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}
