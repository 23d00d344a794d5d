/**
 * Proxy Driver
 *
 * Conversions between stored proxy entries, per-task handles and the
 * shape Playwright expects for a browser context.
 */

import type { PlaywrightProxy, Proxy, ProxyHandle } from '../types/proxy.js';

export const DIRECT_PROXY_ID = 'direct';

export const DIRECT_HANDLE: ProxyHandle = Object.freeze({
  id: DIRECT_PROXY_ID,
  server: null
});

export function toProxyHandle(proxy: Proxy): ProxyHandle {
  return Object.freeze({
    id: proxy.id,
    server: proxy.url,
    username: proxy.username,
    password: proxy.password
  });
}

/**
 * Convert a handle to Playwright's context proxy option.
 * @returns undefined for a direct connection
 */
export function formatProxyForPlaywright(handle: ProxyHandle): PlaywrightProxy | undefined {
  if (!handle.server) return undefined;
  const server = /^[a-z]+:\/\//i.test(handle.server) ? handle.server : `http://${handle.server}`;
  return {
    server,
    ...(handle.username ? { username: handle.username } : {}),
    ...(handle.password ? { password: handle.password } : {})
  };
}

/**
 * Address for logs, without credentials
 */
export function describeProxy(handle: ProxyHandle): string {
  if (!handle.server) return 'direct';
  return handle.server.replace(/\/\/[^@/]+@/, '//***@');
}
