/**
 * Error helpers shared by every component.
 */

import { MinerError } from '@xrt-miner/types';

/**
 * Safe message extraction from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Check if an error is retryable.
 *
 * MinerError subclasses declare it themselves; anything else falls back to
 * transport-level message patterns.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof MinerError) {
    return error.retryable;
  }

  const message = error.message.toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('rate limit') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('socket hang up')
  );
}

/**
 * Format error for logging.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof MinerError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      service: error.service,
      retryable: error.retryable,
    };
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { message: getErrorMessage(error) };
}
