export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

export class Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, extra?: Record<string, unknown>) {
    if (this.enabled('debug')) {
      console.debug(`[${this.scope}] ${message}`, extra ?? '');
    }
  }

  info(message: string, extra?: Record<string, unknown>) {
    if (this.enabled('info')) {
      console.log(`[${this.scope}] ${message}`, extra ?? '');
    }
  }

  warn(message: string, extra?: Record<string, unknown>) {
    if (this.enabled('warn')) {
      console.warn(`[${this.scope}] ${message}`, extra ?? '');
    }
  }

  error(message: string, extra?: Record<string, unknown>) {
    if (this.enabled('error')) {
      console.error(`[${this.scope}] ${message}`, extra ?? '');
    }
  }

  // Read on every call so LOG_LEVEL set after import (tests, dotenv) still applies.
  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[parseLogLevel(process.env.LOG_LEVEL)];
  }
}

export const createLogger = (scope: string) => new Logger(scope);
