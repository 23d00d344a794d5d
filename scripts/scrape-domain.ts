#!/usr/bin/env -S tsx --env-file=.env

/**
 * One-off scrape of the given domains, printing one result record per line
 * Usage:
 *   npm run scrape -- example.com example.org [options]
 *
 * Takes the same options as the worker (see scripts/worker.ts) except
 * --concurrency, which limits how many domains run at once.
 */

import { ProxyManager } from '../src/services/proxy-manager.js';
import { ScrapeSession } from '../src/engines/scrape-session.js';
import { ConcurrencyLimiter } from '../src/core/limiter.js';
import { encodeResult } from '../src/core/result-codec.js';
import { normalizeDomain } from '../src/core/utils/url-utils.js';
import { LocalBrowserEngine } from '../src/providers/local-browser.js';
import { loadWorkerConfig } from '../src/utils/env-config.js';
import { parseArgs } from '../src/utils/cli-args.js';
import { installGlobalErrorHandlers } from '../src/utils/error-handlers.js';
import { logger, parseLogLevel, errorMessage } from '../src/utils/logger.js';

installGlobalErrorHandlers();

const log = logger.createContext('scrape-domain');

async function main(): Promise<void> {
  const { positionals, options } = parseArgs(['scrape', ...process.argv.slice(2)]);
  if (positionals.length === 0) {
    console.error('Usage: npm run scrape -- <domain> [domain...] [options]');
    process.exit(1);
  }

  const config = loadWorkerConfig(process.env, options);
  logger.setLevel(parseLogLevel(config.logLevel));
  logger.setConfig({ format: config.logFormat });

  const proxies = await ProxyManager.fromDb(config.proxyFile);
  const engine = new LocalBrowserEngine({ headless: config.headless });
  const limiter = new ConcurrencyLimiter(config.concurrency);
  const processor = config.workerName ?? 'cli';

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  await Promise.all(positionals.map(async input => {
    const domain = normalizeDomain(input);
    await limiter.acquire();
    try {
      const result = await new ScrapeSession(domain, { engine, proxies }, config.session, controller.signal).run();
      console.log(encodeResult(result, processor));
    } finally {
      limiter.release();
    }
  }));
}

main().catch((error: unknown) => {
  log.error(`Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
