/* eslint-disable no-console */
type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function resolveLevel(value: string | undefined): LogLevel {
  if (value === 'error' || value === 'warn' || value === 'info' || value === 'debug') {
    return value;
  }
  return process.env.NODE_ENV === 'test' ? 'error' : 'info';
}

export class Logger {
  constructor(private readonly level: LogLevel = resolveLevel(process.env.LOG_LEVEL)) {}

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.format('ERROR', message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.format('WARN', message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.info(this.format('INFO', message), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.format('DEBUG', message), ...args);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  private format(label: string, message: string): string {
    return `[${label}] ${new Date().toISOString()} - ${message}`;
  }
}

export const logger = new Logger();
