import { describe, it, expect, beforeAll } from 'vitest';
import { resolveDomain, type ARecordResolver } from '../dns.js';
import { logger, LogLevel } from '../../utils/logger.js';

function dnsError(code: string): Error {
  return Object.assign(new Error(`queryA ${code} example.invalid`), { code });
}

class StubResolver implements ARecordResolver {
  cancelled = false;
  readonly lookups: string[] = [];

  constructor(private readonly answer: () => Promise<string[]>) {}

  resolve4(hostname: string): Promise<string[]> {
    this.lookups.push(hostname);
    return this.answer();
  }

  cancel(): void {
    this.cancelled = true;
  }
}

describe('resolveDomain', () => {
  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  it('should return the A records', async () => {
    const resolver = new StubResolver(async () => ['192.0.2.1', '192.0.2.2']);

    const addresses = await resolveDomain('example.com', { createResolver: () => resolver });

    expect(addresses).toEqual(['192.0.2.1', '192.0.2.2']);
    expect(resolver.lookups).toEqual(['example.com']);
  });

  it('should pass the timeout to the resolver factory', async () => {
    const timeouts: number[] = [];

    await resolveDomain('example.com', {
      timeoutMs: 750,
      createResolver: timeoutMs => {
        timeouts.push(timeoutMs);
        return new StubResolver(async () => ['192.0.2.1']);
      }
    });

    expect(timeouts).toEqual([750]);
  });

  it('should round a fractional timeout up to whole milliseconds', async () => {
    const timeouts: number[] = [];

    await resolveDomain('example.com', {
      timeoutMs: 1.5,
      createResolver: timeoutMs => {
        timeouts.push(timeoutMs);
        return new StubResolver(async () => ['192.0.2.1']);
      }
    });

    expect(timeouts).toEqual([2]);
  });

  it('should return an empty list when no resolver can be created', async () => {
    const addresses = await resolveDomain('example.com', {
      createResolver: () => {
        throw new RangeError('The value of "options.timeout" is out of range.');
      }
    });

    expect(addresses).toEqual([]);
  });

  it('should return an empty list for a missing domain', async () => {
    const resolver = new StubResolver(() => Promise.reject(dnsError('ENOTFOUND')));

    expect(await resolveDomain('example.invalid', { createResolver: () => resolver })).toEqual([]);
  });

  it('should return an empty list for unexpected errors', async () => {
    const resolver = new StubResolver(() => Promise.reject(new Error('socket hang up')));

    expect(await resolveDomain('example.com', { createResolver: () => resolver })).toEqual([]);
  });

  it('should cancel a lookup that outlives the timeout', async () => {
    const resolver = new StubResolver(() => new Promise<string[]>(() => {}));

    const addresses = await resolveDomain('slow.example', { timeoutMs: 20, createResolver: () => resolver });

    expect(addresses).toEqual([]);
    expect(resolver.cancelled).toBe(true);
  });
});
