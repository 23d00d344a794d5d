/**
 * DNS pre-check
 *
 * Resolves A records before any browser work is paid for. Lookup failures of
 * any kind come back as an empty address list; the caller treats that as a
 * terminal "DNS Error" for the task.
 */

import { Resolver } from 'dns/promises';
import { StepTimeoutError } from '../utils/error-handlers.js';
import { logger, errorMessage } from '../utils/logger.js';

const log = logger.createContext('dns');

/** Subset of node's Resolver the pre-check relies on */
export interface ARecordResolver {
  resolve4(hostname: string): Promise<string[]>;
  cancel(): void;
}

export interface ResolveOptions {
  timeoutMs?: number;
  createResolver?: (timeoutMs: number) => ARecordResolver;
}

// Codes that just mean "this domain has no usable A record"
const EXPECTED_CODES = new Set([
  'ENOTFOUND',
  'ENODATA',
  'ETIMEOUT',
  'ECANCELLED',
  'ESERVFAIL',
  'EREFUSED',
  'TimeoutError'
]);

function defaultResolver(timeoutMs: number): ARecordResolver {
  return new Resolver({ timeout: timeoutMs, tries: 1 });
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error) {
    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }
    return error.name;
  }
  return undefined;
}

/**
 * Resolve a bare domain to its IPv4 addresses within `timeoutMs`.
 * @returns The addresses, or [] when the domain does not resolve in time
 */
export async function resolveDomain(domain: string, options: ResolveOptions = {}): Promise<string[]> {
  // Resolver only takes whole milliseconds
  const timeoutMs = Math.max(1, Math.ceil(options.timeoutMs ?? 1000));

  let resolver: ARecordResolver;
  try {
    resolver = (options.createResolver ?? defaultResolver)(timeoutMs);
  } catch (error) {
    log.error(`Could not create a resolver for ${domain}: ${errorMessage(error)}`);
    return [];
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      resolver.cancel();
      reject(new StepTimeoutError(`DNS lookup for ${domain}`, timeoutMs));
    }, timeoutMs);
  });

  try {
    const addresses = await Promise.race([resolver.resolve4(domain), deadline]);
    log.debug(`${domain} → ${addresses.join(', ') || '(none)'}`);
    return addresses;
  } catch (error) {
    const code = errorCode(error);
    if (code && EXPECTED_CODES.has(code)) {
      log.debug(`No A record for ${domain} (${code})`);
    } else {
      log.error(`Unexpected DNS failure for ${domain}: ${errorMessage(error)}`);
    }
    return [];
  } finally {
    clearTimeout(timer);
  }
}
