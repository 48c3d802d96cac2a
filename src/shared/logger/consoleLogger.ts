import type { Logger, LogLevel } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Program name printed before every line. Defaults to `lgrep`. */
  name?: string;
  /** Lowest level that is written. Defaults to `error`. */
  level?: LogLevel;
}

/**
 * Writes diagnostics to the console error stream, so stdout only ever
 * carries search output. At the debug level errors are followed by their
 * stack trace.
 */
export class ConsoleLogger implements Logger {
  private readonly name: string;
  private level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.name = options.name ?? 'lgrep';
    this.level = options.level ?? 'error';
  }

  /** Changes the threshold; child loggers follow it. */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.error(`${this.name}: debug: ${message}`);
    }
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(`${this.name}: ${message}: ${error.message}`);
    } else {
      console.error(`${this.name}: ${error.message}`);
    }
    if (this.enabled('debug') && error.stack) {
      console.error(error.stack);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

/** Prefixes messages with `[key=value ...]` and delegates to its parent. */
class ScopedLogger implements Logger {
  private readonly prefix: string;

  constructor(
    private readonly parent: Logger,
    bindings: Record<string, unknown>,
  ) {
    const pairs = Object.entries(bindings).map(([key, value]) => `${key}=${String(value)}`);
    this.prefix = pairs.length > 0 ? `[${pairs.join(' ')}] ` : '';
  }

  debug(message: string): void {
    this.parent.debug(this.prefix + message);
  }

  error(error: Error, message?: string): void {
    this.parent.error(error, message === undefined ? undefined : this.prefix + message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}
