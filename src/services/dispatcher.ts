import { setTimeout as delay } from 'timers/promises';
import { ConcurrencyLimiter } from '../core/limiter.js';
import { ThroughputTracker } from '../core/throughput.js';
import { emptyResult, encodeResult } from '../core/result-codec.js';
import { normalizeDomain } from '../core/utils/url-utils.js';
import { logger, errorMessage } from '../utils/logger.js';
import type { InboundMessage, MessageSink, MessageSource } from '../types/queue.js';
import type { ScrapeResult } from '../types/scrape-result.js';

const log = logger.createContext('dispatcher');

/** Runs one scrape to completion; must resolve with a result, never reject */
export type SessionRunner = (domain: string, signal: AbortSignal) => Promise<ScrapeResult>;

export interface DispatcherOptions {
  source: MessageSource;
  sink: MessageSink;
  runSession: SessionRunner;
  concurrency: number;
  /** Worker identity stamped on every published result */
  processor: string;
  receiveIntervalMs?: number;
  receiveErrorBackoffMs?: number;
  throughputLogIntervalMs?: number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface DispatcherStats {
  received: number;
  running: number;
  waiting: number;
  completed: number;
  published: number;
  publishFailures: number;
}

interface Closable {
  close(): Promise<void>;
}

async function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

/**
 * Queue consumer and worker pool.
 *
 * Messages are acknowledged as soon as their task is launched, so the
 * receive loop is paced only by `receiveIntervalMs`. The limiter gates when
 * a launched task may start DNS and browser work; tasks beyond the limit
 * wait for a slot without holding up receives.
 */
export class Dispatcher {
  private readonly limiter: ConcurrencyLimiter;
  private readonly shutdown = new AbortController();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly throughput = new ThroughputTracker();
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly stats = { received: 0, completed: 0, published: 0, publishFailures: 0 };

  private loop?: Promise<void>;
  private stopping?: Promise<void>;
  private throughputTimer?: NodeJS.Timeout;

  constructor(private readonly options: DispatcherOptions) {
    this.limiter = new ConcurrencyLimiter(options.concurrency);
    this.sleep = options.sleep ?? defaultSleep;
    log.normal(`Initializing with ${options.concurrency} concurrent tasks as ${options.processor}`);
  }

  /**
   * Start consuming. The returned promise settles once the receive loop has
   * ended after stop().
   */
  start(): Promise<void> {
    if (this.loop) {
      throw new Error('Dispatcher already started');
    }

    const interval = this.options.throughputLogIntervalMs ?? 60000;
    this.throughputTimer = setInterval(() => {
      log.normal(`Domains scraped in the last 60 seconds: ${this.throughput.count()}`);
    }, interval);
    this.throughputTimer.unref();

    this.loop = this.receiveLoop();
    return this.loop;
  }

  /**
   * Launch a task for one inbound payload. Resolves when its result has
   * been published (or publishing failed).
   */
  dispatch(payload: string): Promise<void> {
    const domain = normalizeDomain(payload);
    this.stats.received++;
    log.debug(`URL received and sent for processing: ${domain}`);

    const task: Promise<void> = this.runTask(domain).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
    return task;
  }

  /**
   * Stop receiving, cancel every in-flight task, wait for their cleanup and
   * close the queue transport. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.drain();
    }
    return this.stopping;
  }

  getStats(): DispatcherStats {
    return {
      ...this.stats,
      running: this.limiter.activeCount,
      waiting: this.limiter.waitingCount
    };
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private async receiveLoop(): Promise<void> {
    const { source } = this.options;
    const signal = this.shutdown.signal;
    log.debug('Awaiting messages...');

    while (!signal.aborted) {
      let message: InboundMessage | null;
      try {
        message = await source.receive(signal);
      } catch (error) {
        if (signal.aborted) break;
        log.error(`An error occurred during message consumption: ${errorMessage(error)}`);
        await this.pause(this.options.receiveErrorBackoffMs ?? 5000);
        continue;
      }

      if (message) {
        void this.dispatch(message.data);
        try {
          await source.acknowledge(message);
        } catch (error) {
          log.error(`Failed to acknowledge message ${message.id}: ${errorMessage(error)}`);
        }
      }

      // Small delay to yield to running tasks
      await this.pause(this.options.receiveIntervalMs ?? 500);
    }

    log.debug('Receive loop stopped');
  }

  private async runTask(domain: string): Promise<void> {
    const signal = this.shutdown.signal;
    let result: ScrapeResult;

    const acquired = await this.limiter.acquire(signal);
    if (!acquired) {
      result = emptyResult(domain, 'Cancelled', `Task was cancelled for ${domain}`);
    } else {
      try {
        log.verbose(`Initializing scraping process for ${domain}...`);
        result = await this.options.runSession(domain, signal);
      } catch (error) {
        result = emptyResult(domain, 'Failed', errorMessage(error));
      } finally {
        this.limiter.release();
      }
    }

    this.stats.completed++;
    this.throughput.record();

    if (result.status === 'complete' || result.status === 'loading') {
      logger.success(domain, `${result.status}, ${result.scriptPaths.length} scripts${result.obfuscation ? ', obfuscated' : ''}`);
    } else {
      logger.failure(domain, `${result.status}${result.error ? `: ${result.error}` : ''}`);
    }

    await this.publish(result);
  }

  private async publish(result: ScrapeResult): Promise<void> {
    try {
      await this.options.sink.send(encodeResult(result, this.options.processor));
      this.stats.published++;
      log.debug(`Sent scraped result for ${result.domain}`);
    } catch (error) {
      this.stats.publishFailures++;
      log.error(`Error publishing result for ${result.domain}: ${errorMessage(error)}`);
    }
  }

  private async drain(): Promise<void> {
    log.normal(`Shutting down, cancelling ${this.inFlight.size} in-flight tasks...`);
    this.shutdown.abort();
    clearInterval(this.throughputTimer);

    if (this.loop) {
      await this.loop;
    }
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }

    const transports = new Set<Closable>([this.options.source, this.options.sink]);
    for (const transport of transports) {
      try {
        await transport.close();
      } catch (error) {
        log.error(`Error closing queue client: ${errorMessage(error)}`);
      }
    }
    log.normal('Dispatcher stopped');
  }

  private async pause(ms: number): Promise<void> {
    const signal = this.shutdown.signal;
    if (signal.aborted) return;
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (!signal.aborted) throw error;
    }
  }
}
