import { toProxyHandle, DIRECT_HANDLE, describeProxy } from '../drivers/proxy.js';
import { loadProxies } from '../providers/local-db.js';
import type { Proxy, ProxyHandle, ProxyHealth, ProxyProvider } from '../types/proxy.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('proxy-manager');

export interface ProxyManagerOptions {
  /** Weight of the newest sample in the rolling load time average */
  smoothing?: number;
  /** Samples needed before a proxy can be benched for failing */
  minSamples?: number;
  /** Failure rate above which a sampled proxy is skipped */
  maxFailureRate?: number;
  /** Injected for deterministic selection in tests */
  random?: () => number;
}

interface ProxyEntry {
  handle: ProxyHandle;
  health: ProxyHealth;
}

// Floor for load times so a single instant response can't dominate the weights
const MIN_LOAD_TIME = 0.1;

/**
 * Proxy pool with health feedback.
 *
 * Every task takes a proxy with getProxy() and reports back once through
 * updateLoadTime(). Selection is weighted random: faster and more reliable
 * proxies are picked more often, unsampled ones get the best current weight
 * so they are tried early.
 */
export class ProxyManager implements ProxyProvider {
  private readonly entries = new Map<string, ProxyEntry>();
  private readonly smoothing: number;
  private readonly minSamples: number;
  private readonly maxFailureRate: number;
  private readonly random: () => number;

  constructor(proxies: Proxy[], options: ProxyManagerOptions = {}) {
    this.smoothing = options.smoothing ?? 0.3;
    this.minSamples = options.minSamples ?? 5;
    this.maxFailureRate = options.maxFailureRate ?? 0.8;
    this.random = options.random ?? Math.random;

    for (const proxy of proxies) {
      if (this.entries.has(proxy.id)) {
        log.error(`Duplicate proxy id ${proxy.id}, keeping the first entry`);
        continue;
      }
      this.entries.set(proxy.id, {
        handle: toProxyHandle(proxy),
        health: { id: proxy.id, samples: 0, failures: 0, averageLoadTime: null, lastUsedAt: null }
      });
    }

    log.debug(`Initialized with ${this.entries.size} proxies`);
  }

  /**
   * Build a manager from a proxies file in db/
   */
  static async fromDb(filename = 'proxies.json', options: ProxyManagerOptions = {}): Promise<ProxyManager> {
    const store = await loadProxies(filename);
    if (store.proxies.length === 0) {
      log.normal('No proxies configured, sessions will connect directly');
    }
    return new ProxyManager(store.proxies, options);
  }

  getProxy(): ProxyHandle {
    if (this.entries.size === 0) {
      return DIRECT_HANDLE;
    }

    const all = Array.from(this.entries.values());
    const healthy = all.filter(entry => !this.isBenched(entry.health));
    const candidates = healthy.length > 0 ? healthy : all;

    const weights = this.weigh(candidates);
    const total = weights.reduce((sum, weight) => sum + weight, 0);

    let pick = this.random() * total;
    for (let i = 0; i < candidates.length; i++) {
      pick -= weights[i];
      if (pick < 0) {
        return this.take(candidates[i]);
      }
    }
    return this.take(candidates[candidates.length - 1]);
  }

  updateLoadTime(handle: ProxyHandle, elapsedSeconds: number, success: boolean): void {
    const entry = this.entries.get(handle.id);
    if (!entry) {
      if (handle.id !== DIRECT_HANDLE.id) {
        log.debug(`Feedback for unknown proxy ${handle.id} ignored`);
      }
      return;
    }

    const { health } = entry;
    health.samples++;
    if (!success) {
      health.failures++;
    } else if (Number.isFinite(elapsedSeconds) && elapsedSeconds >= 0) {
      health.averageLoadTime = health.averageLoadTime === null
        ? elapsedSeconds
        : this.smoothing * elapsedSeconds + (1 - this.smoothing) * health.averageLoadTime;
    }

    log.debug(
      `${describeProxy(handle)} ${success ? 'ok' : 'failed'} in ${elapsedSeconds.toFixed(2)}s ` +
      `(${health.failures}/${health.samples} failures)`
    );
  }

  getHealth(): ProxyHealth[] {
    return Array.from(this.entries.values()).map(entry => ({ ...entry.health }));
  }

  get size(): number {
    return this.entries.size;
  }

  private take(entry: ProxyEntry): ProxyHandle {
    entry.health.lastUsedAt = new Date();
    return entry.handle;
  }

  private isBenched(health: ProxyHealth): boolean {
    return health.samples >= this.minSamples && health.failures / health.samples > this.maxFailureRate;
  }

  private score(health: ProxyHealth): number | null {
    if (health.samples === 0) return null;
    // Laplace-smoothed so one early failure doesn't zero a proxy out
    const successRate = (health.samples - health.failures + 1) / (health.samples + 2);
    const loadTime = Math.max(health.averageLoadTime ?? MIN_LOAD_TIME, MIN_LOAD_TIME);
    return successRate / loadTime;
  }

  private weigh(candidates: ProxyEntry[]): number[] {
    const scores = candidates.map(entry => this.score(entry.health));
    const known = scores.filter((score): score is number => score !== null);
    const exploration = known.length > 0 ? Math.max(...known) : 1;
    return scores.map(score => score ?? exploration);
  }
}
