/**
 * Pino-backed ILogger.
 *
 * Wei and wn amounts are bigint everywhere in the miner, so every entry
 * passes through formatLogObject before pino serializes it. The signing key
 * and the RPC endpoint (which often embeds an API key) are redacted.
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { isLogLevel } from './types';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

const REDACTED_PATHS = [
  'privateKey',
  'rpcUrl',
  '*.privateKey',
  '*.rpcUrl',
  'config.network.rpcUrl',
];

const MAX_DEPTH = 8;

// =============================================================================
// BigInt formatting
// =============================================================================

function toLogValue(value: unknown, seen: WeakSet<object>, depth: number): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value === null || typeof value !== 'object') return value;
  if (value instanceof Error || value instanceof Date) return value;
  if (seen.has(value)) return '[Circular]';
  if (depth >= MAX_DEPTH) return '[Max Depth]';

  seen.add(value);
  const result = Array.isArray(value)
    ? value.map(item => toLogValue(item, seen, depth + 1))
    : Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toLogValue(item, seen, depth + 1)]));
  seen.delete(value);
  return result;
}

function containsBigInt(value: unknown, depth = 0): boolean {
  if (typeof value === 'bigint') return true;
  if (value === null || typeof value !== 'object' || depth >= MAX_DEPTH) return false;
  return Object.values(value).some(item => containsBigInt(item, depth + 1));
}

/**
 * Entry fields with every bigint as a decimal string. Entries without a
 * bigint are returned as they are.
 */
export function formatLogObject(obj: LogMeta): LogMeta {
  if (!containsBigInt(obj)) return obj;
  const seen = new WeakSet<object>([obj]);
  return Object.fromEntries(Object.entries(obj).map(([key, value]) => [key, toLogValue(value, seen, 1)]));
}

// =============================================================================
// Wrapper
// =============================================================================

class PinoLogger implements ILogger {
  constructor(private readonly pino: Logger) {}

  fatal(msg: string, meta?: LogMeta): void {
    this.write('fatal', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.write('error', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.write('warn', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.write('info', msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.write('debug', msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.write('trace', msg, meta);
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLogger(this.pino.child(formatLogObject(bindings)));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }

  private write(level: LogLevel, msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino[level](meta, msg);
    } else {
      this.pino[level](msg);
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'liability-miner', level: 'debug' });
 * const scheduler = new RoundScheduler(deps, config, logger.child({ component: 'scheduler' }));
 * ```
 */
export function createLogger(config: LoggerConfig): ILogger {
  const envLevel = process.env.LOG_LEVEL;
  const level: LogLevel = config.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const pretty =
    config.destination === undefined &&
    (config.pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development'));

  const options: LoggerOptions = {
    name: config.name,
    level,
    base: { service: config.name, pid: process.pid },
    serializers: { err: pino.stdSerializers.err, error: pino.stdSerializers.err },
    formatters: {
      level: label => ({ level: label }),
      log: formatLogObject,
    },
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
  };

  if (pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname,service' },
    };
  }

  const base = new PinoLogger(config.destination ? pino(options, config.destination) : pino(options));
  return config.bindings ? base.child(config.bindings) : base;
}
