import { LogLevel } from '../../types/enums';

/**
 * Receives every formatted line that passes the level filter
 */
export type LogSink = (level: LogLevel, line: string, args: unknown[]) => void;

const LEVEL_ORDER = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

/**
 * Writes to the console, error and warn on their own streams
 */
export const consoleSink: LogSink = (level, line, args) => {
  switch (level) {
    case LogLevel.ERROR:
      console.error(line, ...args);
      break;
    case LogLevel.WARN:
      console.warn(line, ...args);
      break;
    default:
      // eslint-disable-next-line no-console
      console.log(line, ...args);
  }
};

/**
 * Levelled logger with prefixes and child loggers.
 * Output goes to the console unless other sinks are given. A child follows
 * its parent's level until setLevel is called on the child itself.
 */
export class Logger {
  private level: LogLevel;
  private prefix: string;
  private sinks: LogSink[];
  private parent?: Logger;

  constructor(level: LogLevel = LogLevel.INFO, prefix = '', sinks: LogSink[] = [consoleSink]) {
    this.level = level;
    this.prefix = prefix;
    this.sinks = sinks;
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
    this.parent = undefined;
  }

  /**
   * Get current log level
   */
  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  getPrefix(): string {
    return this.prefix;
  }

  /**
   * Adds a sink. Children created afterwards inherit it.
   */
  addSink(sink: LogSink): void {
    this.sinks = [...this.sinks, sink];
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  /**
   * Create child logger with prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    const child = new Logger(this.getLevel(), childPrefix, this.sinks);
    child.parent = this;
    return child;
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';
    const line = `${timestamp} ${levelStr} ${prefixStr}${message}`;

    for (const sink of this.sinks) {
      sink(level, line, args);
    }
  }

  private shouldLog(messageLevel: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(messageLevel) <= LEVEL_ORDER.indexOf(this.getLevel());
  }
}

/**
 * Create a logger instance
 */
export function createLogger(level: LogLevel = LogLevel.INFO, prefix = '', sinks?: LogSink[]): Logger {
  return new Logger(level, prefix, sinks);
}
