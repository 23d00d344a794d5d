export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3
}

export type LogFormat = 'text' | 'json';

type Severity = 'info' | 'error' | 'outcome';

interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  /** Worker name added to every line once known */
  processor?: string;
  showTimestamps: boolean;
  /** Line sink, console unless replaced */
  write: (line: string, severity: Severity) => void;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.QUIET]: 'quiet',
  [LogLevel.NORMAL]: 'normal',
  [LogLevel.VERBOSE]: 'verbose',
  [LogLevel.DEBUG]: 'debug'
};

const consoleWrite = (line: string, severity: Severity): void => {
  if (severity === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

function describeData(data: unknown): string {
  if (data instanceof Error) return data.stack ?? data.message;
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

class Logger {
  private static instance: Logger;
  private config: LoggerConfig = {
    level: LogLevel.NORMAL,
    format: 'text',
    showTimestamps: true,
    write: consoleWrite
  };

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setConfig(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  createContext(context: string): ContextualLogger {
    return new ContextualLogger(context, this);
  }

  log(level: LogLevel, message: string, context?: string, data?: unknown): void {
    if (level > this.config.level) return;
    this.emit('info', LEVEL_NAMES[level], message, context, data);
  }

  quiet(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.QUIET, message, context, data);
  }

  normal(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.NORMAL, message, context, data);
  }

  verbose(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.VERBOSE, message, context, data);
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  error(message: string, context?: string, data?: unknown): void {
    // Errors show at every level except quiet
    if (this.config.level === LogLevel.QUIET) return;
    this.emit('error', 'error', message, context, data);
  }

  /** One line per scraped domain */
  success(domain: string, message: string): void {
    this.outcome(true, domain, message);
  }

  failure(domain: string, message: string): void {
    this.outcome(false, domain, message);
  }

  private outcome(ok: boolean, domain: string, message: string): void {
    if (this.config.level < LogLevel.NORMAL) return;

    if (this.config.format === 'json') {
      this.config.write(JSON.stringify({
        ...this.envelope('outcome'),
        domain,
        ok,
        message
      }), 'outcome');
      return;
    }
    this.config.write(`${ok ? '✓' : '✗'} ${domain.padEnd(30)} ${message}`, 'outcome');
  }

  private envelope(level: string, context?: string): Record<string, string> {
    const fields: Record<string, string> = {};
    if (this.config.showTimestamps) fields.time = new Date().toISOString();
    fields.level = level;
    if (this.config.processor) fields.processor = this.config.processor;
    if (context) fields.context = context;
    return fields;
  }

  private emit(severity: Severity, level: string, message: string, context?: string, data?: unknown): void {
    const { format, write } = this.config;

    if (format === 'json') {
      const entry: Record<string, string> = { ...this.envelope(level, context), message };
      if (data !== undefined) entry.data = describeData(data);
      write(JSON.stringify(entry), severity);
      return;
    }

    const stamp = this.config.showTimestamps ? `${new Date().toISOString()} ` : '';
    const worker = this.config.processor ? `<${this.config.processor}> ` : '';
    const prefix = context ? `[${context}] ` : '';
    write(`${stamp}${worker}${prefix}${message}`, severity);
    if (data !== undefined) {
      write(describeData(data), severity);
    }
  }
}

export class ContextualLogger {
  constructor(
    private context: string,
    private logger: Logger
  ) {}

  quiet(message: string, data?: unknown): void {
    this.logger.quiet(message, this.context, data);
  }

  normal(message: string, data?: unknown): void {
    this.logger.normal(message, this.context, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.verbose(message, this.context, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.context, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.context, data);
  }
}

export const logger = Logger.getInstance();

export function parseLogLevel(level: string | undefined): LogLevel {
  switch (level?.trim().toLowerCase()) {
    case 'quiet':
    case 'q':
      return LogLevel.QUIET;
    case 'verbose':
    case 'v':
      return LogLevel.VERBOSE;
    case 'debug':
    case 'd':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

/** Millisecond duration for log lines: 850ms, 12.4s, 3m 5s */
export const formatTime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
