import { z } from 'zod';
import { parseDuration } from './time-parser.js';
import { DEFAULT_SESSION_OPTIONS } from '../core/session-defaults.js';
import type { CliOptions } from './cli-args.js';
import type { LogFormat } from './logger.js';
import type { ScrapeSessionOptions } from '../types/session.js';

const duration = (fallback: string) =>
  z.string()
    .default(fallback)
    .transform((value, ctx) => {
      try {
        return parseDuration(value);
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
        return z.NEVER;
      }
    });

const flag = (fallback: boolean) =>
  z.enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform(value => value === 'true' || value === '1');

export const WorkerEnvSchema = z.object({
  REDIS_URL: z.string().default('redis://localhost:6379'),
  DOMAIN_TOPIC: z.string().min(1).default('domains-to-scrape'),
  RESULT_TOPIC: z.string().min(1).default('scraped-results'),
  CONCURRENT_TASKS: z.coerce.number().int().positive().default(10),
  MAX_WAIT_TIME: duration('12s'),
  CHECK_INTERVAL: duration('400ms'),
  NO_CHANGE_LIMIT: z.coerce.number().int().positive().default(3),
  CHANGE_LIMIT: z.coerce.number().int().positive().default(4),
  DNS_TIMEOUT: duration('1s'),
  CONVERGENCE_MODE: z.enum(['poll', 'first-snapshot']).default('poll'),
  RECEIVE_INTERVAL: duration('500ms'),
  PROXY_FILE: z.string().default('proxies.json'),
  PROXY_TIMEOUT_IS_FAILURE: flag(false),
  PROXY_CANCEL_IS_FAILURE: flag(false),
  WORKER_NAME: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  LOG_FORMAT: z.enum(['text', 'json']).default('text'),
  HEADLESS: flag(true)
});

export type WorkerEnv = z.infer<typeof WorkerEnvSchema>;

export interface WorkerConfig {
  redisUrl: string;
  domainTopic: string;
  resultTopic: string;
  concurrency: number;
  receiveIntervalMs: number;
  proxyFile: string;
  workerName?: string;
  logLevel?: string;
  logFormat: LogFormat;
  headless: boolean;
  session: ScrapeSessionOptions;
}

/**
 * Build the worker configuration from environment variables, with CLI
 * options taking precedence.
 * @throws Error listing every invalid variable
 */
export function loadWorkerConfig(
  env: Record<string, string | undefined> = process.env,
  cli: CliOptions = {}
): WorkerConfig {
  const parsed = WorkerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid worker configuration: ${problems}`);
  }
  const vars = parsed.data;

  return {
    redisUrl: vars.REDIS_URL,
    domainTopic: vars.DOMAIN_TOPIC,
    resultTopic: vars.RESULT_TOPIC,
    concurrency: cli.concurrency ?? vars.CONCURRENT_TASKS,
    receiveIntervalMs: vars.RECEIVE_INTERVAL,
    proxyFile: cli.proxyFile ?? vars.PROXY_FILE,
    workerName: cli.workerName ?? vars.WORKER_NAME,
    logLevel: cli.logLevel ?? vars.LOG_LEVEL,
    logFormat: vars.LOG_FORMAT,
    headless: cli.headless ?? vars.HEADLESS,
    session: {
      ...DEFAULT_SESSION_OPTIONS,
      timing: {
        maxWaitTimeMs: cli.maxWaitTimeMs ?? vars.MAX_WAIT_TIME,
        checkIntervalMs: cli.checkIntervalMs ?? vars.CHECK_INTERVAL,
        noChangeLimit: cli.noChangeLimit ?? vars.NO_CHANGE_LIMIT,
        changeLimit: cli.changeLimit ?? vars.CHANGE_LIMIT
      },
      convergence: cli.convergence ?? vars.CONVERGENCE_MODE,
      dnsTimeoutMs: cli.dnsTimeoutMs ?? vars.DNS_TIMEOUT,
      proxyFeedback: {
        timeoutIsFailure: vars.PROXY_TIMEOUT_IS_FAILURE,
        cancelIsFailure: vars.PROXY_CANCEL_IS_FAILURE
      }
    }
  };
}
