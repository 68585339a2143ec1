/**
 * Process-wide log level holder.
 *
 * All diagnostic output (UI helpers and namespaced loggers) asks the
 * singleton whether a level should be printed.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_LEVEL: LogLevel = 'info';

export class LogManager {
  private static instance: LogManager | null = null;
  private level: LogLevel = DEFAULT_LEVEL;

  private constructor() {}

  static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  /** Drop the singleton (tests) */
  static resetInstance(): void {
    LogManager.instance = null;
  }

  setLogLevel(level: LogLevel): void {
    this.level = level;
  }

  getLogLevel(): LogLevel {
    return this.level;
  }

  shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
