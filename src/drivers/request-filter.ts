import type { RenderRequest, RenderRoute } from '../types/browser.js';
import type { RequestFilterOptions } from '../types/session.js';
import { DEFAULT_FILTER_OPTIONS } from '../core/session-defaults.js';
import { isBrowserError } from '../utils/error-handlers.js';
import { logger, errorMessage } from '../utils/logger.js';

const log = logger.createContext('request-filter');

export type AbortReason = 'resource-type' | 'blocked-host' | 'duplicate';

export type FilterDecision =
  | { action: 'continue' }
  | { action: 'abort'; reason: AbortReason };

export interface FilterStats {
  allowed: number;
  aborted: Record<AbortReason, number>;
}

/**
 * Per-session request interception policy.
 *
 * One instance per session: the dedup set is never shared across tasks.
 * Decision order, first match wins:
 *   1. unneeded resource type (images, styles, fonts, media, subframe documents)
 *   2. URL containing a blocklisted ad/analytics substring
 *   3. URL already let through earlier in this session
 *   4. otherwise remember the URL and let it through
 */
export class RequestFilter {
  private readonly blockedTypes: ReadonlySet<string>;
  private readonly blockedSubstrings: readonly string[];
  private readonly seen = new Set<string>();
  private readonly stats: FilterStats = {
    allowed: 0,
    aborted: { 'resource-type': 0, 'blocked-host': 0, duplicate: 0 }
  };

  constructor(options: RequestFilterOptions = DEFAULT_FILTER_OPTIONS) {
    this.blockedTypes = new Set(options.blockedResourceTypes);
    this.blockedSubstrings = options.blockedUrlSubstrings;
  }

  decide(request: RenderRequest): FilterDecision {
    const { url, resourceType } = request;

    // The page's own navigation is a 'document' too and must go through
    if (this.blockedTypes.has(resourceType) && !(resourceType === 'document' && request.isMainDocument)) {
      return this.abort('resource-type');
    }

    if (this.blockedSubstrings.some(fragment => url.includes(fragment))) {
      return this.abort('blocked-host');
    }

    if (this.seen.has(url)) {
      return this.abort('duplicate');
    }

    this.seen.add(url);
    this.stats.allowed++;
    return { action: 'continue' };
  }

  /**
   * Route handler installed on the page. Callbacks that land after the
   * session tore the page down are expected and only logged.
   */
  async handle(route: RenderRoute): Promise<void> {
    const decision = this.decide(route.request);
    try {
      if (decision.action === 'abort') {
        log.debug(`Aborting ${route.request.resourceType} (${decision.reason}): ${route.request.url}`);
        await route.abort();
      } else {
        await route.continue();
      }
    } catch (error) {
      const message = errorMessage(error);
      if (isBrowserError(message)) {
        log.debug(`Target closed for request: ${route.request.url}`);
        return;
      }
      log.error(`Unexpected error handling request ${route.request.url}: ${message}`);
    }
  }

  hasSeen(url: string): boolean {
    return this.seen.has(url);
  }

  getStats(): FilterStats {
    return {
      allowed: this.stats.allowed,
      aborted: { ...this.stats.aborted }
    };
  }

  private abort(reason: AbortReason): FilterDecision {
    this.stats.aborted[reason]++;
    return { action: 'abort', reason };
  }
}
