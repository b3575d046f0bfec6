export type { ILogger, LoggerConfig, LogDestination, LogLevel, LogMeta } from './types';
export { isLogLevel, LOG_LEVELS } from './types';
export { createLogger, formatLogObject } from './pino-logger';
export { RecordingLogger, NullLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';
