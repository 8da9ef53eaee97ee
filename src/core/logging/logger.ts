/** Leveled logger with structured metadata */

import type { LogEntry, Logger, LoggerConfig, LogLevel, LogSink } from './types.js';

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONSOLE_METHODS: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: (...data) => console.debug(...data),
  info: (...data) => console.info(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
};

const consoleSink: LogSink = (entry) => {
  const write = CONSOLE_METHODS[entry.level];
  const line = `[${entry.level.toUpperCase()}] ${entry.event_type}`;

  if (Object.keys(entry.metadata).length > 0) {
    write(line, entry.metadata);
  } else {
    write(line);
  }
};

class LoggerImpl implements Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;
  protected readonly metadata: Record<string, unknown>;

  constructor(config: LoggerConfig, parentMetadata: Record<string, unknown> = {}) {
    this.minLevel = config.minLevel ?? 'info';
    this.sink = config.sink ?? consoleSink;
    this.metadata = parentMetadata;
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(
      { minLevel: this.minLevel, sink: this.sink },
      { ...this.metadata, ...metadata },
    );
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      event_type,
      metadata: { ...this.metadata, ...metadata },
      timestamp: Date.now(),
    };

    this.sink(entry);
  }
}

/**
 * Create a logger writing to the console (or the given sink)
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new LoggerImpl(config);
}

/**
 * Logger that drops everything
 */
export function createSilentLogger(): Logger {
  return new LoggerImpl({ sink: () => undefined });
}
