export { createLogger, createSilentLogger, LOG_LEVEL_PRIORITY } from './logger.js';
export { createRecordingLogger, type RecordingLogger } from './recording.js';
export type { LogEntry, Logger, LoggerConfig, LogLevel, LogSink } from './types.js';
