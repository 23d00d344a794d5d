import { setTimeout as delay } from 'timers/promises';
import { resolveDomain } from '../drivers/dns.js';
import { RequestFilter } from '../drivers/request-filter.js';
import { ScriptCapture } from '../drivers/script-capture.js';
import { formatProxyForPlaywright, describeProxy } from '../drivers/proxy.js';
import { hasObfuscatedScript } from '../core/obfuscation.js';
import { DEFAULT_SESSION_OPTIONS } from '../core/session-defaults.js';
import { ensureProtocol, redirectDomain, urlPath } from '../core/utils/url-utils.js';
import { isTimeoutError } from '../utils/error-handlers.js';
import { elapsedSeconds } from '../utils/time-parser.js';
import { logger, errorMessage, formatTime } from '../utils/logger.js';
import type { RenderBrowser, RenderContext, RenderEngine, RenderPage } from '../types/browser.js';
import type { ProxyHandle, ProxyProvider } from '../types/proxy.js';
import type { ScrapeResult, ScrapeStatus, TerminalFailure } from '../types/scrape-result.js';
import type { ScrapeSessionOptions, SessionPhase } from '../types/session.js';

const log = logger.createContext('scrape-session');

export interface ScrapeSessionDeps {
  engine: RenderEngine;
  proxies: ProxyProvider;
  resolve?: (domain: string, timeoutMs: number) => Promise<string[]>;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  now?: () => number;
}

type StepOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; status: TerminalFailure; error: string };

type Converged = Extract<ScrapeStatus, 'complete' | 'loading'>;

interface DriveOutcome {
  status: Exclude<ScrapeStatus, 'DNS Error'>;
  error?: string;
}

export interface ConvergenceCounters {
  iterations: number;
  unchanged: number;
  changed: number;
}

const TEARDOWN_TIMEOUT_MS = 5000;
const NEVER_ABORTED = new AbortController().signal;

async function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

function defaultResolve(domain: string, timeoutMs: number): Promise<string[]> {
  return resolveDomain(domain, { timeoutMs });
}

/**
 * One scrape of one domain, from DNS pre-check to teardown.
 *
 * Phases: init → navigating → content-poll → complete, with any step able
 * to end the session as timeout, cancelled or failed. Every step yields a
 * tagged outcome; nothing thrown by the browser escapes run(). Teardown and
 * proxy feedback happen on every path once a proxy has been taken.
 */
export class ScrapeSession {
  private readonly filter: RequestFilter;
  private readonly capture = new ScriptCapture();
  private readonly resolve: (domain: string, timeoutMs: number) => Promise<string[]>;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  private state: SessionPhase = 'init';
  private ip: string[] | null = null;
  private html = '';
  private redirect: string | false = false;
  private scriptPaths: string[] = [];
  private obfuscation = false;
  private readonly counters: ConvergenceCounters = { iterations: 0, unchanged: 0, changed: 0 };

  private browser?: RenderBrowser;
  private context?: RenderContext;
  private page?: RenderPage;

  constructor(
    readonly domain: string,
    private readonly deps: ScrapeSessionDeps,
    private readonly options: ScrapeSessionOptions = DEFAULT_SESSION_OPTIONS,
    private readonly signal: AbortSignal = NEVER_ABORTED
  ) {
    this.filter = new RequestFilter(options.filter);
    this.resolve = deps.resolve ?? defaultResolve;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  get phase(): SessionPhase {
    return this.state;
  }

  getConvergenceCounters(): ConvergenceCounters {
    return { ...this.counters };
  }

  getFilter(): RequestFilter {
    return this.filter;
  }

  async run(): Promise<ScrapeResult> {
    const startedAt = this.now();

    if (this.signal.aborted) {
      this.state = 'cancelled';
      return this.buildResult({ status: 'Cancelled', error: `Task was cancelled for ${this.domain}` });
    }

    const addresses = await this.resolve(this.domain, this.options.dnsTimeoutMs);
    if (addresses.length === 0) {
      log.debug(`DNS resolution failed for ${this.domain}`);
      this.state = 'failed';
      return this.buildResult({ status: 'DNS Error', error: `DNS resolution failed for ${this.domain}` });
    }
    this.ip = addresses;

    if (this.signal.aborted) {
      this.state = 'cancelled';
      return this.buildResult({ status: 'Cancelled', error: `Task was cancelled for ${this.domain}` });
    }

    const proxy = this.deps.proxies.getProxy();
    let outcome: DriveOutcome;
    try {
      outcome = await this.drive(proxy);
    } catch (error) {
      // drive() tags its own failures; this only catches defects
      outcome = { status: 'Failed', error: errorMessage(error) };
    }

    // Load time covers the page only, not the closes below
    const loadSeconds = elapsedSeconds(startedAt, this.now());
    await this.teardown();
    this.reportProxy(proxy, loadSeconds, outcome.status);

    this.state = this.phaseFor(outcome.status);
    const elapsed = formatTime(this.now() - startedAt);
    log.debug(`Scraping completed for ${this.domain}: ${outcome.status} in ${elapsed} via ${describeProxy(proxy)}`);
    return this.buildResult(outcome);
  }

  private async drive(proxy: ProxyHandle): Promise<DriveOutcome> {
    const { timing, profile } = this.options;

    this.state = 'init';
    const launched = await this.step('launch browser', () => this.deps.engine.launch());
    if (!launched.ok) return launched;
    const browser = launched.value;
    this.browser = browser;

    const opened = await this.step('open context', () =>
      browser.newContext({ ...profile, proxy: formatProxyForPlaywright(proxy) })
    );
    if (!opened.ok) return opened;
    const context = opened.value;
    this.context = context;

    log.debug('Creating new page...');
    const created = await this.step('open page', () => context.newPage());
    if (!created.ok) return created;
    const page = created.value;
    this.page = page;

    // Both hooks go in before the first request leaves
    page.onResponse(response => this.capture.observe(response));
    const routed = await this.step('install request filter', () =>
      page.onRequest(route => this.filter.handle(route))
    );
    if (!routed.ok) return routed;

    this.state = 'navigating';
    const url = ensureProtocol(this.domain);
    log.debug(`Finished setup, opening ${url}...`);
    const navigated = await this.step(
      'navigation',
      () => page.goto(url, { timeout: timing.maxWaitTimeMs }),
      timing.maxWaitTimeMs
    );
    if (!navigated.ok) return navigated;

    const first = await this.snapshot(page);
    if (!first.ok) return first;
    this.html = first.value;
    log.debug(`First html with length ${this.html.length} content gathered...`);

    try {
      this.redirect = redirectDomain(url, page.url());
    } catch (error) {
      log.debug(`Could not read final url for ${this.domain}: ${errorMessage(error)}`);
    }

    const body = await this.step(
      'wait for body',
      () => page.waitForSelector('body', { timeout: timing.maxWaitTimeMs }),
      timing.maxWaitTimeMs
    );
    if (!body.ok) return body;

    this.state = 'content-poll';
    const converged = await this.converge(page);
    if (!converged.ok) return converged;

    // Observation stays open so responses landing while reads finish are joined too
    const settled = await this.step('collect scripts', () => this.capture.settle(), timing.maxWaitTimeMs);
    if (!settled.ok) return settled;

    const scripts = this.capture.getScripts();
    this.scriptPaths = scripts.map(script => urlPath(script.url));
    this.obfuscation = hasObfuscatedScript(scripts, this.options.obfuscation);
    this.state = 'complete';

    return { status: converged.value };
  }

  /**
   * Content-stability loop.
   *
   * In `poll` mode the page is re-read at least once. Each read is compared
   * with the previous one; the loop stops on `noChangeLimit` unchanged reads
   * in a row (stable, "complete") or `changeLimit` changed reads in a row
   * (still churning, "loading"). Reads that alternate between the two never
   * hit either limit, so the loop is also capped at `maxWaitTimeMs`.
   *
   * `first-snapshot` keeps the first read as is.
   */
  private async converge(page: RenderPage): Promise<StepOutcome<Converged>> {
    if (this.options.convergence === 'first-snapshot') {
      return { ok: true, value: 'complete' };
    }

    const { maxWaitTimeMs, checkIntervalMs, noChangeLimit, changeLimit } = this.options.timing;
    const pollStartedAt = this.now();
    let previous = this.html;

    for (;;) {
      this.counters.iterations++;

      const current = await this.snapshot(page);
      if (!current.ok) return current;

      if (current.value === previous) {
        this.counters.unchanged++;
        this.counters.changed = 0;
      } else {
        previous = current.value;
        this.counters.unchanged = 0;
        this.counters.changed++;
      }
      this.html = current.value;

      if (this.counters.unchanged >= noChangeLimit) {
        return { ok: true, value: 'complete' };
      }
      if (this.counters.changed >= changeLimit) {
        log.debug(`${this.domain} still changing after ${this.counters.iterations} polls`);
        return { ok: true, value: 'loading' };
      }
      if (this.now() - pollStartedAt >= maxWaitTimeMs) {
        log.debug(`${this.domain} did not settle within ${maxWaitTimeMs}ms`);
        return { ok: true, value: 'loading' };
      }

      const slept = await this.step('poll interval', () => this.sleep(checkIntervalMs, this.signal));
      if (!slept.ok) return slept;
    }
  }

  private snapshot(page: RenderPage): Promise<StepOutcome<string>> {
    return this.step('content snapshot', () => page.content(), this.options.timing.maxWaitTimeMs);
  }

  /**
   * Run one browser step, racing it against the cancellation signal and,
   * when given, a deadline. Whatever the action does later is ignored.
   */
  private step<T>(label: string, action: () => Promise<T>, timeoutMs?: number): Promise<StepOutcome<T>> {
    if (this.signal.aborted) {
      return Promise.resolve({ ok: false, status: 'Cancelled', error: `Task was cancelled for ${this.domain} during ${label}` });
    }

    return new Promise<StepOutcome<T>>(resolve => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (outcome: StepOutcome<T>) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.signal.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      const onAbort = () => settle({
        ok: false,
        status: 'Cancelled',
        error: `Task was cancelled for ${this.domain} during ${label}`
      });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => settle({
          ok: false,
          status: 'Timeout',
          error: `Timeout occurred during ${label} (${timeoutMs}ms)`
        }), timeoutMs);
      }
      this.signal.addEventListener('abort', onAbort, { once: true });

      Promise.resolve()
        .then(action)
        .then(
          value => settle({ ok: true, value }),
          (error: unknown) => settle(this.classify(label, error))
        );
    });
  }

  private classify<T>(label: string, error: unknown): StepOutcome<T> {
    const message = errorMessage(error);
    if (this.signal.aborted) {
      return { ok: false, status: 'Cancelled', error: `Task was cancelled for ${this.domain} during ${label}` };
    }
    if (isTimeoutError(error)) {
      log.debug(`Timeout during ${label} for ${this.domain}: ${message}`);
      return { ok: false, status: 'Timeout', error: `Timeout occurred during ${label}: ${message}` };
    }
    log.debug(`Error during ${label} for ${this.domain}: ${message}`);
    return { ok: false, status: 'Failed', error: message };
  }

  /**
   * Close context, page and browser in that order. Each close is attempted
   * regardless of the others and bounded so a wedged browser can't hold
   * the slot forever.
   */
  private async teardown(): Promise<void> {
    this.capture.close();

    await this.closeQuietly('context', this.context);
    await this.closeQuietly('page', this.page);
    await this.closeQuietly('browser', this.browser);

    // Reads still in flight fail fast once the page is gone
    await this.withDeadline('script capture', this.capture.settle());
  }

  private async closeQuietly(label: string, target: { close(): Promise<void> } | undefined): Promise<void> {
    if (!target) return;
    await this.withDeadline(`${label} close`, target.close());
  }

  private async withDeadline(label: string, work: Promise<void>): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), TEARDOWN_TIMEOUT_MS);
    });
    try {
      const result = await Promise.race([work.then(() => 'done' as const), deadline]);
      if (result === 'timeout') {
        log.error(`${label} for ${this.domain} did not finish within ${TEARDOWN_TIMEOUT_MS}ms`);
      }
    } catch (error) {
      log.debug(`Error during ${label} for ${this.domain}: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
    }
  }

  private reportProxy(proxy: ProxyHandle, loadSeconds: number, status: ScrapeStatus): void {
    const policy = this.options.proxyFeedback;
    const success = !(
      status === 'Failed' ||
      (status === 'Timeout' && policy.timeoutIsFailure) ||
      (status === 'Cancelled' && policy.cancelIsFailure)
    );

    try {
      this.deps.proxies.updateLoadTime(proxy, loadSeconds, success);
    } catch (error) {
      log.error(`Proxy feedback failed for ${describeProxy(proxy)}: ${errorMessage(error)}`);
    }
  }

  private phaseFor(status: ScrapeStatus): SessionPhase {
    switch (status) {
      case 'complete':
      case 'loading':
        return 'complete';
      case 'Timeout':
        return 'timeout';
      case 'Cancelled':
        return 'cancelled';
      default:
        return 'failed';
    }
  }

  private buildResult(outcome: { status: ScrapeStatus; error?: string }): ScrapeResult {
    return Object.freeze({
      domain: this.domain,
      status: outcome.status,
      ip: this.ip ? Object.freeze([...this.ip]) : null,
      obfuscation: this.obfuscation,
      scriptPaths: Object.freeze([...this.scriptPaths]),
      redirectDomain: this.redirect,
      htmlContent: this.html,
      ...(outcome.error !== undefined ? { error: outcome.error } : {})
    });
  }
}

/**
 * Scrape a single domain. Never rejects.
 */
export function scrapeDomain(
  domain: string,
  deps: ScrapeSessionDeps,
  options: ScrapeSessionOptions = DEFAULT_SESSION_OPTIONS,
  signal?: AbortSignal
): Promise<ScrapeResult> {
  return new ScrapeSession(domain, deps, options, signal).run();
}
