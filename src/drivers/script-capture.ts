import type { RenderResponse } from '../types/browser.js';
import { isBrowserError } from '../utils/error-handlers.js';
import { logger, errorMessage } from '../utils/logger.js';

const log = logger.createContext('script-capture');

export interface CapturedScript {
  readonly url: string;
  readonly body: string;
}

function contentType(headers: Record<string, string>): string {
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === 'content-type') return value;
  }
  return '';
}

/**
 * Collects javascript bodies from page responses.
 *
 * Each response is read on its own promise so a slow body never holds up
 * the others. `settle()` joins everything spawned so far, including
 * captures that start while it is waiting.
 */
export class ScriptCapture {
  private readonly scripts: CapturedScript[] = [];
  private readonly pending = new Set<Promise<void>>();
  private closed = false;

  observe(response: RenderResponse): void {
    if (this.closed) {
      log.debug(`Ignoring response after close: ${response.url}`);
      return;
    }

    const task = this.capture(response);
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }

  async settle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  /** Stop accepting new responses; captures already running still finish */
  close(): void {
    this.closed = true;
  }

  getScripts(): readonly CapturedScript[] {
    return this.scripts;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private async capture(response: RenderResponse): Promise<void> {
    if (!contentType(response.headers).includes('javascript')) {
      return;
    }

    if (response.status !== 200) {
      log.debug(`Non-200 status for script: ${response.url} with status: ${response.status}`);
      return;
    }

    try {
      const body = await response.text();
      // url and body land together or not at all
      this.scripts.push({ url: response.url, body });
    } catch (error) {
      const message = errorMessage(error);
      if (isBrowserError(message)) {
        log.debug(`Page closed before script body was read: ${response.url}`);
      } else {
        log.debug(`Failed to capture script content from ${response.url}: ${message}`);
      }
    }
  }
}
