import pc from 'picocolors';
import { LOG_LEVELS, type LogLevel, type Logger } from './types';

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

const TAG: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: (t) => pc.gray(t),
  info: (t) => pc.cyan(t),
  warn: (t) => pc.yellow(t),
  error: (t) => pc.red(t),
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class ConsoleLogger implements Logger {
  constructor(private level: LogLevel = 'warn') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(error: Error, message?: string): void {
    this.write('error', message ? `${message}: ${error.message}` : error.message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string): void {
    if (RANK[level] < RANK[this.level]) {
      return;
    }
    console.error(`${TAG[level](level.toUpperCase())} ${message}`);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, this.withPrefix(message ?? ''));
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    if (!prefix) {
      return message;
    }
    return message ? `[${prefix}] ${message}` : `[${prefix}]`;
  }
}
