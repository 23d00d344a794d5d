import { z } from 'zod';

export const ScrapeStatusSchema = z.enum([
  'DNS Error',
  'Timeout',
  'Cancelled',
  'Failed',
  'complete',
  'loading'
]);

export type ScrapeStatus = z.infer<typeof ScrapeStatusSchema>;

/** Statuses a session can end in after the DNS gate has passed */
export type TerminalFailure = Extract<ScrapeStatus, 'Timeout' | 'Cancelled' | 'Failed'>;

export interface ScrapeResult {
  readonly domain: string;
  readonly status: ScrapeStatus;
  readonly ip: readonly string[] | null;
  readonly obfuscation: boolean;
  readonly scriptPaths: readonly string[];
  readonly redirectDomain: string | false;
  readonly htmlContent: string;
  readonly error?: string;
}

/**
 * Wire format published to the result topic.
 * Field names follow the downstream consumers, hence snake_case.
 */
export const OutboundRecordSchema = z.object({
  domain: z.string(),
  status_code: ScrapeStatusSchema,
  ip: z.array(z.string()).nullable(),
  obfuscation: z.boolean(),
  script_paths: z.array(z.string()),
  redirect_domain: z.union([z.string(), z.literal(false)]),
  html_content: z.string(),
  error: z.string().optional(),
  processor: z.string()
});

export type OutboundRecord = z.infer<typeof OutboundRecordSchema>;
