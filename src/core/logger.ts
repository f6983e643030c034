// src/core/logger.ts
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const LEVEL_TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  error: '[ERROR]',
  warn: '[WARN]',
  info: '[INFO]',
  debug: '[DEBUG]',
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Levelled logger writing to stderr, so stdout stays free for JSONL output.
 */
export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info', private readonly scope?: string) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  /**
   * Scoped loggers share the parent's level, so changing the root level
   * (e.g. from --verbose) also affects them.
   */
  child(scope: string): ScopedLogger {
    return new ScopedLogger(this, scope);
  }

  error(message: string): void {
    this.write('error', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  write(level: Exclude<LogLevel, 'silent'>, message: string, scope: string | undefined = this.scope): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const prefix = scope ? `${LEVEL_TAGS[level]} [${scope}]` : LEVEL_TAGS[level];
    console.error(`${prefix} ${message}`);
  }
}

export class ScopedLogger {
  constructor(
    private readonly parent: Logger,
    private readonly scope: string
  ) {}

  error(message: string): void {
    this.parent.write('error', message, this.scope);
  }

  warn(message: string): void {
    this.parent.write('warn', message, this.scope);
  }

  info(message: string): void {
    this.parent.write('info', message, this.scope);
  }

  debug(message: string): void {
    this.parent.write('debug', message, this.scope);
  }
}

export const logger = new Logger('info');
