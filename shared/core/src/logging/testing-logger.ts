/**
 * In-memory loggers for tests. Injected like the production logger, so no
 * module mocking is needed.
 *
 * @example
 * ```typescript
 * const logger = new RecordingLogger();
 * const tracker = new MarkerTracker(chain, account, config, logger);
 * await tracker.claim();
 * expect(logger.hasLogMatching('info', /waiting for timeout/)).toBe(true);
 * ```
 */

import type { ILogger, LogLevel, LogMeta } from './types';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  meta?: LogMeta;
  /** Bindings of the child logger that wrote the entry */
  bindings?: LogMeta;
}

/**
 * Records every entry. Children write into their parent's record, so a
 * harness can hand `logger.child(...)` to each component and assert on the
 * root.
 */
export class RecordingLogger implements ILogger {
  constructor(
    private readonly bindings: LogMeta = {},
    private readonly entries: LogEntry[] = []
  ) {}

  fatal(msg: string, meta?: LogMeta): void {
    this.record('fatal', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.record('error', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.record('warn', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.record('info', msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.record('debug', msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.record('trace', msg, meta);
  }

  child(bindings: LogMeta): RecordingLogger {
    return new RecordingLogger({ ...this.bindings, ...bindings }, this.entries);
  }

  isLevelEnabled(_level: LogLevel): boolean {
    return true;
  }

  get count(): number {
    return this.entries.length;
  }

  getAllLogs(): readonly LogEntry[] {
    return [...this.entries];
  }

  getLogs(level: LogLevel): readonly LogEntry[] {
    return this.entries.filter(entry => entry.level === level);
  }

  getErrors(): readonly LogEntry[] {
    return this.getLogs('error');
  }

  getWarnings(): readonly LogEntry[] {
    return this.getLogs('warn');
  }

  hasLogMatching(level: LogLevel, pattern: string | RegExp): boolean {
    return this.getLogs(level).some(entry =>
      typeof pattern === 'string' ? entry.msg.includes(pattern) : pattern.test(entry.msg)
    );
  }

  /** Some entry at `level` carries every key/value pair of `meta` */
  hasLogWithMeta(level: LogLevel, meta: LogMeta): boolean {
    return this.getLogs(level).some(entry => {
      const fields = entry.meta;
      return fields !== undefined && Object.entries(meta).every(([key, value]) => fields[key] === value);
    });
  }

  /** Empties the record shared with every child */
  clear(): void {
    this.entries.length = 0;
  }

  private record(level: LogLevel, msg: string, meta?: LogMeta): void {
    this.entries.push({
      level,
      msg,
      meta: meta ? { ...meta } : undefined,
      bindings: Object.keys(this.bindings).length > 0 ? { ...this.bindings } : undefined,
    });
  }
}

export class NullLogger implements ILogger {
  fatal(_msg: string, _meta?: LogMeta): void {}
  error(_msg: string, _meta?: LogMeta): void {}
  warn(_msg: string, _meta?: LogMeta): void {}
  info(_msg: string, _meta?: LogMeta): void {}
  debug(_msg: string, _meta?: LogMeta): void {}
  trace(_msg: string, _meta?: LogMeta): void {}

  child(_bindings: LogMeta): ILogger {
    return this;
  }

  isLevelEnabled(): boolean {
    return false;
  }
}
