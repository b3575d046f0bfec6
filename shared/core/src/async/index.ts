/**
 * Async primitives: the mutex, retry, cancellable sleep and bounded polling.
 */

export { AsyncMutex } from './async-mutex';

export { withRetry, sleep, pollUntil } from './async-utils';
export type { RetryConfig, PollOptions } from './async-utils';
