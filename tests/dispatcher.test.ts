import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import { Dispatcher, type DispatcherOptions, type SessionRunner } from '../src/services/dispatcher.js';
import { decodeRecord, emptyResult } from '../src/core/result-codec.js';
import { logger, LogLevel } from '../src/utils/logger.js';
import type { ScrapeResult } from '../src/types/scrape-result.js';
import { MemoryQueue } from './helpers/memory-queue.js';

// Runs until the dispatcher is stopped
const untilStopped: SessionRunner = (domain, signal) =>
  new Promise(resolve => {
    signal.addEventListener('abort', () => {
      resolve(emptyResult(domain, 'Cancelled', `Task was cancelled for ${domain} during navigation`));
    }, { once: true });
  });

const completeResult = (domain: string): ScrapeResult => ({
  domain,
  status: 'complete',
  ip: ['192.0.2.10'],
  obfuscation: false,
  scriptPaths: ['/app.js'],
  redirectDomain: false,
  htmlContent: '<html></html>'
});

describe('Dispatcher', () => {
  let dispatcher: Dispatcher | undefined;

  const createDispatcher = (queue: MemoryQueue, overrides: Partial<DispatcherOptions> = {}) => {
    dispatcher = new Dispatcher({
      source: queue,
      sink: queue,
      runSession: async domain => completeResult(domain),
      concurrency: 2,
      processor: 'worker-test',
      sleep: async () => {},
      ...overrides
    });
    return dispatcher;
  };

  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  afterEach(async () => {
    await dispatcher?.stop();
    dispatcher = undefined;
  });

  describe('consuming', () => {
    it('should publish one record per message stamped with the worker name', async () => {
      const queue = new MemoryQueue();
      const d = createDispatcher(queue);
      const running = d.start();

      queue.push('example.com');
      await vi.waitFor(() => expect(queue.sent).toHaveLength(1));
      await d.stop();
      await running;

      expect(decodeRecord(queue.sent[0])).toEqual({
        domain: 'example.com',
        status_code: 'complete',
        ip: ['192.0.2.10'],
        obfuscation: false,
        script_paths: ['/app.js'],
        redirect_domain: false,
        html_content: '<html></html>',
        processor: 'worker-test'
      });
      expect(queue.acknowledged).toEqual(['msg-1']);
    });

    it('should normalize inbound payloads to bare domains', async () => {
      const queue = new MemoryQueue();
      const seen: string[] = [];
      const d = createDispatcher(queue, {
        runSession: async domain => {
          seen.push(domain);
          return completeResult(domain);
        }
      });
      d.start();

      queue.push(' Example.COM\n', 'https://shop.example.org/path');
      await vi.waitFor(() => expect(queue.sent).toHaveLength(2));

      expect(seen).toEqual(['example.com', 'shop.example.org']);
    });

    it('should acknowledge before the scrape finishes', async () => {
      const queue = new MemoryQueue();
      const d = createDispatcher(queue, { runSession: untilStopped });
      d.start();

      queue.push('slow.example');
      await vi.waitFor(() => expect(queue.acknowledged).toEqual(['msg-1']));

      expect(queue.sent).toHaveLength(0);
      expect(d.getStats().running).toBe(1);
    });

    it('should back off after a receive error and keep consuming', async () => {
      const queue = new MemoryQueue();
      queue.receiveErrors = 1;
      const sleep = vi.fn(async () => {});
      const d = createDispatcher(queue, { sleep, receiveErrorBackoffMs: 250 });
      d.start();

      queue.push('example.com');
      await vi.waitFor(() => expect(queue.sent).toHaveLength(1));

      expect(sleep).toHaveBeenCalledWith(250, expect.any(AbortSignal));
    });

    it('should refuse to start twice', () => {
      const d = createDispatcher(new MemoryQueue());
      d.start();

      expect(() => d.start()).toThrow('Dispatcher already started');
    });
  });

  describe('concurrency', () => {
    it('should hold tasks beyond the limit until a slot frees up', async () => {
      const queue = new MemoryQueue();
      const finish = new Map<string, () => void>();
      const runSession: SessionRunner = domain =>
        new Promise(resolve => finish.set(domain, () => resolve(completeResult(domain))));
      const d = createDispatcher(queue, { runSession, concurrency: 2 });
      d.start();

      queue.push('a.example', 'b.example', 'c.example');
      await vi.waitFor(() => expect(d.getStats()).toMatchObject({ received: 3, running: 2, waiting: 1 }));
      expect(finish.has('c.example')).toBe(false);

      finish.get('a.example')?.();
      await vi.waitFor(() => expect(finish.has('c.example')).toBe(true));
      expect(d.getStats()).toMatchObject({ running: 2, waiting: 0, completed: 1 });

      finish.get('b.example')?.();
      finish.get('c.example')?.();
      await vi.waitFor(() => expect(queue.sent).toHaveLength(3));
      expect(d.getStats()).toMatchObject({ running: 0, completed: 3, published: 3 });
    });
  });

  describe('task outcomes', () => {
    it('should publish a Failed record when the session runner rejects', async () => {
      const queue = new MemoryQueue();
      const d = createDispatcher(queue, {
        runSession: async () => {
          throw new Error('renderer crashed');
        }
      });

      await d.dispatch('example.com');

      const record = decodeRecord(queue.sent[0]);
      expect(record.status_code).toBe('Failed');
      expect(record.error).toBe('renderer crashed');
      expect(record.ip).toBeNull();
    });

    it('should count publish failures without throwing', async () => {
      const queue = new MemoryQueue();
      queue.failSends = true;
      const d = createDispatcher(queue);

      await d.dispatch('example.com');

      expect(d.getStats()).toMatchObject({ completed: 1, published: 0, publishFailures: 1 });
    });
  });

  describe('stop', () => {
    it('should cancel running and waiting tasks and publish their results', async () => {
      const queue = new MemoryQueue();
      const d = createDispatcher(queue, { runSession: untilStopped, concurrency: 1 });
      const running = d.start();

      queue.push('a.example', 'b.example');
      await vi.waitFor(() => expect(d.getStats()).toMatchObject({ running: 1, waiting: 1 }));

      await d.stop();
      await running;

      const records = queue.sent.map(decodeRecord);
      expect(records).toHaveLength(2);
      expect(records.find(record => record.domain === 'a.example')?.error)
        .toBe('Task was cancelled for a.example during navigation');
      expect(records.find(record => record.domain === 'b.example')).toEqual({
        domain: 'b.example',
        status_code: 'Cancelled',
        ip: null,
        obfuscation: false,
        script_paths: [],
        redirect_domain: false,
        html_content: '',
        error: 'Task was cancelled for b.example',
        processor: 'worker-test'
      });
      expect(d.inFlightCount).toBe(0);
    });

    it('should close a shared transport once, however often stop is called', async () => {
      const queue = new MemoryQueue();
      const d = createDispatcher(queue);
      d.start();

      const first = d.stop();
      const second = d.stop();
      await first;

      expect(second).toBe(first);
      expect(queue.closeCalls).toBe(1);
    });
  });
});
