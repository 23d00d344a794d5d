import type { DeviceProfile } from './browser.js';

/**
 * How a session decides the rendered page is done.
 * - `poll`: re-snapshot until the content is stable or keeps churning
 * - `first-snapshot`: take the first snapshot as final, no polling
 */
export type ConvergenceMode = 'poll' | 'first-snapshot';

export interface PollTiming {
  maxWaitTimeMs: number;
  checkIntervalMs: number;
  noChangeLimit: number;
  changeLimit: number;
}

/**
 * Which non-Failed outcomes count against the proxy.
 * Failed always does.
 */
export interface ProxyFeedbackPolicy {
  timeoutIsFailure: boolean;
  cancelIsFailure: boolean;
}

export interface ObfuscationOptions {
  threshold: number;
  densityThreshold: number;
  sampleRatio: number;
}

export interface RequestFilterOptions {
  blockedResourceTypes: readonly string[];
  blockedUrlSubstrings: readonly string[];
}

export interface ScrapeSessionOptions {
  timing: PollTiming;
  convergence: ConvergenceMode;
  dnsTimeoutMs: number;
  profile: DeviceProfile;
  filter: RequestFilterOptions;
  obfuscation: ObfuscationOptions;
  proxyFeedback: ProxyFeedbackPolicy;
}

export type SessionPhase =
  | 'init'
  | 'navigating'
  | 'content-poll'
  | 'complete'
  | 'timeout'
  | 'cancelled'
  | 'failed';
