#!/usr/bin/env -S tsx --env-file=.env

/**
 * Long-running scrape worker
 * Usage:
 *   npm run worker [options]
 *
 * Options override the matching environment variables:
 *   --concurrency <n>        Concurrent scrape sessions (CONCURRENT_TASKS)
 *   --max-wait <duration>    Navigation and convergence cap (MAX_WAIT_TIME)
 *   --check-interval <dur>   Pause between content polls (CHECK_INTERVAL)
 *   --no-change-limit <n>    Unchanged polls before "complete" (NO_CHANGE_LIMIT)
 *   --change-limit <n>       Changed polls before "loading" (CHANGE_LIMIT)
 *   --dns-timeout <dur>      DNS pre-check timeout (DNS_TIMEOUT)
 *   --convergence <mode>     poll | first-snapshot (CONVERGENCE_MODE)
 *   --proxy-file <file>      Proxy list in db/ (PROXY_FILE)
 *   --worker-name <name>     Processor name stamped on results (WORKER_NAME)
 *   --log-level <level>      quiet | normal | verbose | debug (LOG_LEVEL)
 *   --headed / --headless    Browser visibility (HEADLESS)
 */

import { Dispatcher } from '../src/services/dispatcher.js';
import { ProxyManager } from '../src/services/proxy-manager.js';
import { ScrapeSession } from '../src/engines/scrape-session.js';
import { LocalBrowserEngine } from '../src/providers/local-browser.js';
import { RedisQueue } from '../src/providers/redis-queue.js';
import { loadWorkerConfig } from '../src/utils/env-config.js';
import { resolveWorkerName } from '../src/utils/worker-identity.js';
import { parseArgs } from '../src/utils/cli-args.js';
import { installGlobalErrorHandlers } from '../src/utils/error-handlers.js';
import { logger, parseLogLevel, errorMessage } from '../src/utils/logger.js';

installGlobalErrorHandlers();

const log = logger.createContext('worker');

async function main(): Promise<void> {
  const { options } = parseArgs(['worker', ...process.argv.slice(2)]);
  const config = loadWorkerConfig(process.env, options);
  logger.setLevel(parseLogLevel(config.logLevel));
  logger.setConfig({ format: config.logFormat });

  const processor = await resolveWorkerName({ name: config.workerName });
  logger.setConfig({ processor });
  const proxies = await ProxyManager.fromDb(config.proxyFile);
  const engine = new LocalBrowserEngine({ headless: config.headless });

  const queue = new RedisQueue({
    url: config.redisUrl,
    sourceKey: config.domainTopic,
    resultKey: config.resultTopic,
    processingKey: `${config.domainTopic}:processing:${processor}`
  });
  await queue.recoverUnacknowledged();

  const dispatcher = new Dispatcher({
    source: queue,
    sink: queue,
    concurrency: config.concurrency,
    processor,
    receiveIntervalMs: config.receiveIntervalMs,
    runSession: (domain, signal) =>
      new ScrapeSession(domain, { engine, proxies }, config.session, signal).run()
  });

  const shutdown = (signal: NodeJS.Signals) => {
    log.normal(`Received ${signal}, draining...`);
    dispatcher.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  log.normal(`Worker ${processor} consuming ${config.domainTopic} with ${config.concurrency} slots`);
  await dispatcher.start();
}

main().catch((error: unknown) => {
  log.error(`Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
