/**
 * @xrt-miner/core - Core Library
 *
 * Infrastructure shared by the miner service: logging, async primitives,
 * error helpers, environment parsing and service bootstrap.
 *
 * @module @xrt-miner/core
 */

// =============================================================================
// Logging
// =============================================================================

export { createLogger, formatLogObject, isLogLevel, LOG_LEVELS, RecordingLogger, NullLogger } from './logging';
export type { ILogger, LoggerConfig, LogDestination, LogLevel, LogMeta, LogEntry } from './logging';

// =============================================================================
// Async
// =============================================================================

export {
  AsyncMutex,
  withRetry,
  sleep,
  pollUntil,
} from './async';
export type { RetryConfig, PollOptions } from './async';

// =============================================================================
// Errors
// =============================================================================

export {
  getErrorMessage,
  toError,
  isRetryableError,
  formatErrorForLog,
} from './resilience';

// =============================================================================
// Environment & bootstrap
// =============================================================================

export { parseEnvInt, parseEnvFloat } from './utils';
export type { EnvSource } from './utils';

export { setupServiceShutdown, runServiceMain } from './service-lifecycle';
export type {
  ServiceShutdownConfig,
  ServiceShutdownCleanup,
  RunServiceMainConfig,
} from './service-lifecycle';
