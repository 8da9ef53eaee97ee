/** Recording logger for tests */

import { createLogger } from './logger.js';
import type { LogEntry, Logger, LogLevel } from './types.js';

export interface RecordingLogger extends Logger {
  /** Every entry emitted by this logger or its children, in order */
  readonly entries: readonly LogEntry[];
  /** Entries at the given level */
  byLevel(level: LogLevel): readonly LogEntry[];
  clear(): void;
}

/**
 * Creates a logger that keeps entries in memory so tests can assert on them.
 *
 * @example
 * ```typescript
 * const logger = createRecordingLogger();
 * const derived = new DerivedValue(fn, { dependencies: ['mass'], failurePolicy: 'warn', logger });
 *
 * derived.value();
 *
 * expect(logger.byLevel('warn')[0].event_type).toBe('derived_value_failed');
 * ```
 */
export function createRecordingLogger(minLevel: LogLevel = 'debug'): RecordingLogger {
  const entries: LogEntry[] = [];
  const base = createLogger({ minLevel, sink: (entry) => entries.push(entry) });

  return {
    child: (metadata) => base.child(metadata),
    debug: (event_type, metadata) => base.debug(event_type, metadata),
    info: (event_type, metadata) => base.info(event_type, metadata),
    warn: (event_type, metadata) => base.warn(event_type, metadata),
    error: (event_type, metadata) => base.error(event_type, metadata),
    get entries() {
      return [...entries];
    },
    byLevel: (level) => entries.filter((entry) => entry.level === level),
    clear: () => {
      entries.length = 0;
    },
  };
}
