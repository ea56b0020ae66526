import { DebugConfig, loadDebugConfig, LogLevel } from '../config/debug.js';

export type DebugCategory = 'parse' | 'rewrite' | 'build' | 'dsl' | 'server';

interface LogEntry {
  timestamp: string;
  level: string;
  category?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function errorFields(error: Error): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause) {
    fields.cause = error.cause instanceof Error ? errorFields(error.cause) : error.cause;
  }
  return fields;
}

const replaceErrors = (_key: string, val: unknown) =>
  val instanceof Error ? errorFields(val) : val;

const serialize = (value: unknown) => {
  try {
    return JSON.stringify(value, replaceErrors, 2);
  } catch (error) {
    return `[unserializable: ${(error as Error).message}]`;
  }
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[query-toolkit:${category}]` : '[query-toolkit]';
  const levelStr = `[${level.toUpperCase()}]`;

  const base = `${timestamp} ${levelStr} ${categoryStr} ${message}`;

  if (Object.keys(rest).length === 0) {
    return base;
  }

  return `${base}\n${serialize(rest)}`;
}

function formatJson(entry: LogEntry): string {
  try {
    return JSON.stringify(entry, replaceErrors);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      _serializationError: `Failed to serialize: ${(error as Error).message}`,
    });
  }
}

export interface Timer {
  end(payload?: Record<string, unknown>): number;
}

/**
 * Structured logger writing to stderr (stdout carries the MCP protocol).
 */
export class Logger {
  constructor(
    private config: DebugConfig,
    private readonly sink: (line: string) => void = (line) => console.error(line)
  ) {}

  configure(config: DebugConfig): void {
    this.config = config;
  }

  private categoryEnabled(category: DebugCategory): boolean {
    if (!this.config.enabled) {
      return false;
    }

    switch (category) {
      case 'parse':
        return this.config.logParse;
      case 'rewrite':
        return this.config.logRewrite;
      case 'build':
        return this.config.logBuild;
      case 'dsl':
        return this.config.logDsl;
      case 'server':
        return this.config.logServer;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.logLevel];
  }

  private emit(entry: LogEntry): void {
    this.sink(this.config.logFormat === 'json' ? formatJson(entry) : formatPretty(entry));
  }

  private createEntry(
    level: LogLevel,
    category: string | undefined,
    message: string,
    payload?: unknown
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (category) {
      entry.category = category;
    }

    if (payload instanceof Error) {
      entry.error = errorFields(payload);
    } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
      Object.assign(entry, payload);
    } else if (payload !== undefined) {
      entry.data = payload;
    }

    return entry;
  }

  debug(category: DebugCategory, message: string, payload?: unknown): void {
    if (!this.categoryEnabled(category) || !this.shouldLog(LogLevel.DEBUG)) {
      return;
    }
    this.emit(this.createEntry(LogLevel.DEBUG, category, message, payload));
  }

  info(message: string, payload?: unknown): void {
    if (!this.shouldLog(LogLevel.INFO)) {
      return;
    }
    this.emit(this.createEntry(LogLevel.INFO, undefined, message, payload));
  }

  warn(message: string, payload?: unknown): void {
    if (!this.shouldLog(LogLevel.WARN)) {
      return;
    }
    this.emit(this.createEntry(LogLevel.WARN, undefined, message, payload));
  }

  error(message: string, payload?: unknown): void {
    if (!this.shouldLog(LogLevel.ERROR)) {
      return;
    }
    this.emit(this.createEntry(LogLevel.ERROR, undefined, message, payload));
  }

  metric(metricName: string, payload: Record<string, unknown>): void {
    if (!this.config.enableRequestTiming || !this.shouldLog(LogLevel.INFO)) {
      return;
    }
    const entry = this.createEntry(LogLevel.INFO, undefined, metricName, payload);
    entry.type = 'metric';
    this.emit(entry);
  }

  /**
   * Start timing a span; `end()` logs a metric with `durationMs` and returns it.
   */
  startTimer(spanName: string, metadata?: Record<string, unknown>): Timer {
    const start = Date.now();
    return {
      end: (payload?: Record<string, unknown>) => {
        const durationMs = Date.now() - start;
        this.metric(spanName, { ...metadata, ...payload, durationMs });
        return durationMs;
      },
    };
  }
}

// Singleton instance
export const logger = new Logger(loadDebugConfig());
