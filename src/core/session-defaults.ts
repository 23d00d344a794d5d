import type { DeviceProfile } from '../types/browser.js';
import type { RequestFilterOptions, ScrapeSessionOptions } from '../types/session.js';
import { DEFAULT_OBFUSCATION_OPTIONS } from './obfuscation.js';

export const IPHONE_FIREFOX_AGENT =
  'Mozilla/5.0 (iPhone; CPU iPhone OS 14_7 like Mac OS X) AppleWebKit/605.1.15 ' +
  '(KHTML, like Gecko) FxiOS/131.0 Mobile/15E148 Safari/605.1.15';

export const DEFAULT_DEVICE_PROFILE: DeviceProfile = {
  userAgent: IPHONE_FIREFOX_AGENT,
  viewport: { width: 390, height: 844 },
  locale: 'en-GB',
  timezoneId: 'America/New_York',
  javaScriptEnabled: true,
  ignoreHTTPSErrors: true
};

export const DEFAULT_FILTER_OPTIONS: RequestFilterOptions = {
  // 'document' here only covers subframe documents, see RequestFilter
  blockedResourceTypes: ['image', 'stylesheet', 'font', 'media', 'document'],
  blockedUrlSubstrings: ['ads', 'analytics', 'doubleclick', 'googletagmanager', 'adservice']
};

export const DEFAULT_SESSION_OPTIONS: ScrapeSessionOptions = {
  timing: {
    maxWaitTimeMs: 12000,
    checkIntervalMs: 400,
    noChangeLimit: 3,
    changeLimit: 4
  },
  convergence: 'poll',
  dnsTimeoutMs: 1000,
  profile: DEFAULT_DEVICE_PROFILE,
  filter: DEFAULT_FILTER_OPTIONS,
  obfuscation: DEFAULT_OBFUSCATION_OPTIONS,
  proxyFeedback: {
    timeoutIsFailure: false,
    cancelIsFailure: false
  }
};
