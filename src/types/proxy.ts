import { z } from 'zod';

export const ProxySchema = z.object({
  id: z.string(),
  provider: z.string().optional(),
  type: z.enum(['residential', 'datacenter']).optional(),
  geo: z.string().optional(),
  url: z.string(),
  username: z.string().optional(),
  password: z.string().optional()
});

export type Proxy = z.infer<typeof ProxySchema>;

export const ProxyStoreSchema = z.object({
  proxies: z.array(ProxySchema)
});

export type ProxyStore = z.infer<typeof ProxyStoreSchema>;

export interface PlaywrightProxy {
  server: string;
  username?: string;
  password?: string;
}

/**
 * Proxy assigned to a single task. `server` is null for a direct connection.
 */
export interface ProxyHandle {
  readonly id: string;
  readonly server: string | null;
  readonly username?: string;
  readonly password?: string;
}

export interface ProxyHealth {
  id: string;
  samples: number;
  failures: number;
  averageLoadTime: number | null;  // seconds, exponentially weighted
  lastUsedAt: Date | null;
}

/**
 * Selection/feedback protocol consumed by scrape sessions.
 * `updateLoadTime` is called exactly once per task that was handed a proxy.
 */
export interface ProxyProvider {
  getProxy(): ProxyHandle;
  updateLoadTime(handle: ProxyHandle, elapsedSeconds: number, success: boolean): void;
}
