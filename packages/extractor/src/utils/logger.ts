type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

interface LoggerOptions {
  prefix?: string;
  enabled?: boolean;
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(value: string | undefined): LogLevel {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return 'info';
}

class PipelineLogger {
  private prefix: string;
  private enabled: boolean;
  private level: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || '[Trawl]';
    this.enabled = options.enabled ?? process.env.NODE_ENV !== 'test';
    this.level = options.level ?? parseLevel(process.env.LOG_LEVEL);
  }

  private shouldLog(level: LogLevel): boolean {
    return this.enabled && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}${suffix}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, context));
    }
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (this.shouldLog('error')) {
      const detail = error instanceof Error ? error.stack || error.message : error === undefined ? '' : String(error);
      console.error(this.formatMessage('error', message, context), detail);
    }
  }
}

export const headlessLogger = new PipelineLogger({ prefix: '[Headless]' });
export const httpLogger = new PipelineLogger({ prefix: '[HTTP]' });
export const extractionLogger = new PipelineLogger({ prefix: '[Extract]' });

export function createLogger(prefix: string, options: Omit<LoggerOptions, 'prefix'> = {}): PipelineLogger {
  return new PipelineLogger({ ...options, prefix });
}

export { PipelineLogger };
export type { LogLevel, LogContext, LoggerOptions };
