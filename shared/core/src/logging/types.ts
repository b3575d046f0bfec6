/**
 * Logger contract shared by every miner component. Components receive an
 * ILogger; the entry point passes a Pino logger, tests a RecordingLogger.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

/** Structured fields of an entry; bigint amounts are written as decimal strings */
export type LogMeta = Record<string, unknown>;

export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /** Logger whose entries all carry `bindings` (component, round, account) */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

/** Where serialized lines go instead of stdout */
export interface LogDestination {
  write(line: string): void;
}

export interface LoggerConfig {
  name: string;
  /** @default LOG_LEVEL, then 'info' */
  level?: LogLevel;
  /** @default NODE_ENV === 'development' unless LOG_FORMAT=json */
  pretty?: boolean;
  bindings?: LogMeta;
  /** Disables pretty printing */
  destination?: LogDestination;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some(level => level === value);
}
