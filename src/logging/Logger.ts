/**
 * Injected logging capability
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

export class ConsoleLogger implements Logger {
  private threshold: number;
  private prefix: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
    this.prefix = options.prefix ?? '[migrate]';
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(`${this.prefix} ${message}`, ...details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) {
      console.log(`${this.prefix} ${message}`, ...details);
    }
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(`${this.prefix} ${message}`, ...details);
    }
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) {
      console.error(`${this.prefix} ${message}`, ...details);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
