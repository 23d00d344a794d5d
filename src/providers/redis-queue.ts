import { Redis, type RedisOptions } from 'ioredis';
import type { InboundMessage, MessageSink, MessageSource } from '../types/queue.js';
import { logger, errorMessage } from '../utils/logger.js';

const log = logger.createContext('redis-queue');

export interface RedisQueueOptions {
  url: string;
  /** List the domains are pushed onto */
  sourceKey: string;
  /** List results are pushed onto */
  resultKey: string;
  /** Per-worker list holding received but unacknowledged messages */
  processingKey: string;
  /** Seconds a receive blocks before returning empty-handed */
  blockSeconds?: number;
}

const connectionOptions: RedisOptions = {
  maxRetriesPerRequest: null,
  keepAlive: 10000,
  connectTimeout: 10000,
  retryStrategy(times: number) {
    const delay = Math.min(times * 500, 30000);
    log.normal(`Reconnecting (attempt ${times}, next in ${delay}ms)`);
    return delay;
  }
};

function redactUrl(url: string): string {
  return url.replace(/\/\/([^@/]*)@/, '//***@');
}

/**
 * Redis-list transport for the worker.
 *
 * Receiving moves a message from the source list onto this worker's
 * processing list (BLMOVE); acknowledging removes it from there (LREM).
 * The blocking consumer gets its own connection so publishing never waits
 * behind a pending BLMOVE.
 */
export class RedisQueue implements MessageSource, MessageSink {
  private readonly consumer: Redis;
  private readonly producer: Redis;
  private readonly blockSeconds: number;
  private closed = false;

  constructor(private readonly options: RedisQueueOptions) {
    this.blockSeconds = options.blockSeconds ?? 1;
    this.consumer = new Redis(options.url, connectionOptions);
    this.producer = new Redis(options.url, connectionOptions);

    for (const [role, client] of [['consumer', this.consumer], ['producer', this.producer]] as const) {
      client.on('error', (error: Error) => {
        log.error(`Redis ${role} error: ${error.message}`);
      });
    }

    log.normal(
      `Connected to ${redactUrl(options.url)}: consuming ${options.sourceKey}, publishing to ${options.resultKey}`
    );
  }

  async receive(signal?: AbortSignal): Promise<InboundMessage | null> {
    if (this.closed || signal?.aborted) {
      return null;
    }

    const move = this.consumer.blmove(
      this.options.sourceKey,
      this.options.processingKey,
      'RIGHT',
      'LEFT',
      this.blockSeconds
    );
    const payload = signal ? await this.untilAborted(move, signal) : await move;
    if (payload === null) {
      return null;
    }
    return { id: payload, data: payload };
  }

  async acknowledge(message: InboundMessage): Promise<void> {
    await this.consumer.lrem(this.options.processingKey, 1, message.id);
  }

  async send(payload: string): Promise<void> {
    await this.producer.lpush(this.options.resultKey, payload);
  }

  /**
   * Put back messages a previous run of this worker received but never
   * acknowledged. They go to the consuming end of the source list, oldest
   * first in line.
   * @returns Number of messages requeued
   */
  async recoverUnacknowledged(): Promise<number> {
    let moved = 0;
    while (await this.consumer.lmove(this.options.processingKey, this.options.sourceKey, 'LEFT', 'RIGHT') !== null) {
      moved++;
    }
    if (moved > 0) {
      log.normal(`Requeued ${moved} unacknowledged messages from ${this.options.processingKey}`);
    }
    return moved;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.all([this.quit('consumer', this.consumer), this.quit('producer', this.producer)]);
    log.debug('Redis connections closed');
  }

  /**
   * Resolve null as soon as the signal fires. A BLMOVE waiting on an
   * unreachable server never settles on its own, so the consumer
   * connection is dropped; anything it had already moved stays in the
   * processing list for recoverUnacknowledged().
   */
  private untilAborted(command: Promise<string | null>, signal: AbortSignal): Promise<string | null> {
    return new Promise<string | null>((resolve, reject) => {
      const onAbort = () => {
        log.debug('Receive aborted, dropping the consumer connection');
        this.consumer.disconnect();
        resolve(null);
      };
      signal.addEventListener('abort', onAbort, { once: true });

      command.then(
        value => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          if (signal.aborted) {
            resolve(null);
          } else {
            reject(error);
          }
        }
      );
    });
  }

  private async quit(role: string, client: Redis): Promise<void> {
    if (client.status === 'end') return;
    try {
      await client.quit();
    } catch (error) {
      log.debug(`Redis ${role} quit failed, disconnecting: ${errorMessage(error)}`);
      client.disconnect();
    }
  }
}
