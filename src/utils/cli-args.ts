import { parseDuration } from './time-parser.js';
import type { ConvergenceMode } from '../types/session.js';

export interface CliOptions {
  concurrency?: number;
  maxWaitTimeMs?: number;
  checkIntervalMs?: number;
  noChangeLimit?: number;
  changeLimit?: number;
  dnsTimeoutMs?: number;
  convergence?: ConvergenceMode;
  logLevel?: string;
  headless?: boolean;
  proxyFile?: string;
  workerName?: string;
}

export interface ParsedArgs {
  command: string | undefined;
  /** Bare arguments after the command, e.g. domains for a one-off scrape */
  positionals: string[];
  options: CliOptions;
}

type ValueFlag = Exclude<keyof CliOptions, 'headless'>;

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '--concurrency': 'concurrency',
  '--max-wait': 'maxWaitTimeMs',
  '--check-interval': 'checkIntervalMs',
  '--no-change-limit': 'noChangeLimit',
  '--change-limit': 'changeLimit',
  '--dns-timeout': 'dnsTimeoutMs',
  '--convergence': 'convergence',
  '--log-level': 'logLevel',
  '--proxy-file': 'proxyFile',
  '--worker-name': 'workerName'
};

function parsePositiveInt(flag: string, raw: string): number {
  const value = parseInt(raw, 10);
  if (isNaN(value) || value < 1) {
    throw new Error(`${flag} must be a positive number, got "${raw}"`);
  }
  return value;
}

function parseDurationFlag(flag: string, raw: string): number {
  try {
    return parseDuration(raw);
  } catch (error) {
    throw new Error(`Error parsing ${flag}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function applyValue(options: CliOptions, flag: string, key: ValueFlag, raw: string): void {
  switch (key) {
    case 'concurrency':
    case 'noChangeLimit':
    case 'changeLimit':
      options[key] = parsePositiveInt(flag, raw);
      break;
    case 'maxWaitTimeMs':
    case 'checkIntervalMs':
    case 'dnsTimeoutMs':
      options[key] = parseDurationFlag(flag, raw);
      break;
    case 'convergence':
      if (raw !== 'poll' && raw !== 'first-snapshot') {
        throw new Error(`Invalid convergence mode: ${raw}. Use 'poll' or 'first-snapshot'`);
      }
      options.convergence = raw;
      break;
    case 'logLevel':
    case 'proxyFile':
    case 'workerName':
      options[key] = raw;
      break;
  }
}

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * Boolean flags (--headed, --headless) don't take values.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const command = args[0];
  const positionals: string[] = [];
  const options: CliOptions = {};

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--headed') {
      options.headless = false;
      continue;
    }
    if (arg === '--headless') {
      options.headless = true;
      continue;
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = VALUE_FLAGS[flag];
    if (!key) {
      throw new Error(`Unknown option: ${flag}`);
    }

    let raw: string;
    if (eq !== -1) {
      raw = arg.slice(eq + 1);
    } else if (i + 1 < args.length) {
      raw = args[++i];
    } else {
      throw new Error(`Missing value for ${flag}`);
    }

    applyValue(options, flag, key, raw);
  }

  return { command, positionals, options };
}
