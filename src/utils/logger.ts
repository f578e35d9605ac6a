/**
 * Structured logging utility for rwlock-bridge
 *
 * Leveled output with JSON metadata. Level and quiet mode come from the
 * environment.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMetadata {
  [key: string]: LogValue;
}

export function parseLogLevel(level: string | undefined, fallback: LogLevel): LogLevel {
  if (!level) return fallback;

  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

class Logger {
  private level: LogLevel;
  private quiet: boolean;

  constructor() {
    this.quiet = process.env.RWLOCK_BRIDGE_QUIET === 'true';
    this.level = parseLogLevel(process.env.RWLOCK_BRIDGE_LOG_LEVEL, this.quiet ? LogLevel.ERROR : LogLevel.INFO);
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.level;
  }

  formatMessage(level: string, message: string, meta?: LogMetadata): string {
    const prefix = `[${new Date().toISOString()}] [${level}]`;

    if (meta && Object.keys(meta).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(meta)}`;
    }
    return `${prefix} ${message}`;
  }

  debug(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    process.stderr.write(`${this.formatMessage('DEBUG', message, meta)}\n`);
  }

  info(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    process.stderr.write(`${this.formatMessage('INFO', message, meta)}\n`);
  }

  warn(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    console.warn(this.formatMessage('WARN', message, meta));
  }

  error(message: string, error?: unknown, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    const errorMeta: LogMetadata = {
      ...meta,
      ...(error instanceof Error
        ? { errorMessage: error.message, errorStack: error.stack, errorName: error.name }
        : { error: String(error) }),
    };

    console.error(this.formatMessage('ERROR', message, errorMeta));
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  /**
   * Set quiet mode (suppresses INFO and DEBUG)
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
    if (quiet && this.level < LogLevel.WARN) {
      this.level = LogLevel.WARN;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export const logger = new Logger();

/**
 * Print to stdout without logging metadata
 * Use this for user-facing CLI output
 */
export function print(message: string): void {
  process.stdout.write(`${message}\n`);
}

export const log = {
  debug: (message: string, meta?: LogMetadata) => logger.debug(message, meta),
  info: (message: string, meta?: LogMetadata) => logger.info(message, meta),
  warn: (message: string, meta?: LogMetadata) => logger.warn(message, meta),
  error: (message: string, error?: unknown, meta?: LogMetadata) => logger.error(message, error, meta),
  isQuiet: () => logger.isQuiet(),
  setQuiet: (quiet: boolean) => logger.setQuiet(quiet),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
