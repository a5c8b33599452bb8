/**
 * @module utils/logger
 * @description Leveled logger with a bounded in-memory history.
 *
 * Each device owns one Logger. Entries below the configured level are
 * dropped before they reach the history or the sink.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: string;
  readonly context?: string;
  readonly error?: Error;
}

/**
 * Receives every entry that passes the level filter, with its formatted line.
 */
export type LogSink = (entry: LogEntry, line: string) => void;

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly sink?: LogSink;
  readonly maxHistorySize?: number;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/** Writes to the console method matching the entry's level. */
export const consoleSink: LogSink = (entry, line) => {
  switch (entry.level) {
    case "error":
      console.error(line);
      if (entry.error) console.error(entry.error);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

/** Discards everything. */
export const silentSink: LogSink = () => {};

export class Logger {
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly maxHistorySize: number;
  private logHistory: LogEntry[] = [];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.sink = options.sink ?? consoleSink;
    this.maxHistorySize = options.maxHistorySize ?? 100;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.level];
  }

  error(message: string, context?: string, error?: Error): void {
    this.log("error", message, context, error);
  }

  warn(message: string, context?: string): void {
    this.log("warn", message, context);
  }

  info(message: string, context?: string): void {
    this.log("info", message, context);
  }

  debug(message: string, context?: string): void {
    this.log("debug", message, context);
  }

  getHistory(): LogEntry[] {
    return [...this.logHistory];
  }

  clearHistory(): void {
    this.logHistory = [];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: string,
    error?: Error
  ): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(context !== undefined ? { context } : {}),
      ...(error !== undefined ? { error } : {}),
    };
    this.addToHistory(entry);
    this.sink(entry, formatEntry(entry));
  }

  private addToHistory(entry: LogEntry): void {
    this.logHistory.push(entry);
    if (this.logHistory.length > this.maxHistorySize) {
      this.logHistory.shift();
    }
  }
}

/**
 * `<iso> <LEVEL> [context] message - error`
 */
export function formatEntry(entry: LogEntry): string {
  const contextStr = entry.context ? ` [${entry.context}]` : "";
  const errorStr = entry.error ? ` - ${entry.error.message}` : "";
  return `${entry.timestamp} ${entry.level.toUpperCase()}${contextStr} ${entry.message}${errorStr}`;
}
