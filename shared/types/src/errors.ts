// =============================================================================
// Error Types
// =============================================================================
// CANONICAL error definitions for the miner. Every component throws one of
// these so the round scheduler and phase controller can classify a failure
// without string matching.
// =============================================================================

/**
 * Base error class for miner errors.
 *
 * @example
 * ```typescript
 * throw new MinerError(
 *   'Lighthouse quota read failed',
 *   'LIGHTHOUSE_READ_ERROR',
 *   'marker-tracker',
 *   true // retryable
 * );
 * ```
 */
export class MinerError extends Error {
  constructor(
    message: string,
    public code: string,
    public service: string,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'MinerError';
    // Ensure instanceof works correctly across module boundaries
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Network-related errors (RPC failures, dropped connections).
 * These are generally retryable.
 */
export class NetworkError extends MinerError {
  constructor(message: string, service: string) {
    super(message, 'NETWORK_ERROR', service, true);
    this.name = 'NetworkError';
  }
}

/**
 * Validation errors for invalid input or configuration.
 * These are not retryable without fixing the input.
 */
export class ValidationError extends MinerError {
  constructor(message: string, service: string, public field: string) {
    super(message, 'VALIDATION_ERROR', service, false);
    this.name = 'ValidationError';
  }
}

/**
 * Most of a burst was still unconfirmed when the barrier wait expired.
 * The round is marked degraded and the next one runs at a smaller batch size.
 */
export class TransportTimeoutError extends MinerError {
  constructor(
    message: string,
    service: string,
    public readonly unconfirmed: number,
    public readonly total: number
  ) {
    super(message, 'TRANSPORT_TIMEOUT', service, true);
    this.name = 'TransportTimeoutError';
  }
}

/**
 * The chain's view of the account nonce disagrees with the local ledger.
 * Not recoverable locally: the ledger must be resynchronized before any
 * further reservation.
 */
export class NonceConflictError extends MinerError {
  constructor(
    public readonly account: string,
    public readonly expected: number,
    public readonly observed: number,
    service = 'nonce-sequencer'
  ) {
    super(
      `Nonce conflict for ${account}: ledger expects ${expected}, chain reports ${observed}`,
      'NONCE_CONFLICT',
      service,
      false
    );
    this.name = 'NonceConflictError';
  }
}

/**
 * A round needs more operations than the lighthouse grants for one turn.
 * Raised before anything is broadcast.
 */
export class QuotaExceededError extends MinerError {
  constructor(
    public readonly required: number,
    public readonly quota: number,
    service = 'round-scheduler'
  ) {
    super(`Round requires ${required} operations but quota is ${quota}`, 'QUOTA_EXCEEDED', service, true);
    this.name = 'QuotaExceededError';
  }
}

/**
 * Another provider holds the lighthouse marker and its timeout window has not
 * elapsed yet.
 */
export class MarkerNotOwnedError extends MinerError {
  constructor(
    message: string,
    public readonly retryAtBlock: number | null,
    service = 'marker-tracker'
  ) {
    super(message, 'MARKER_NOT_OWNED', service, true);
    this.name = 'MarkerNotOwnedError';
  }
}

/**
 * The AMM would return less than the minimum accepted proceeds.
 */
export class SlippageExceededError extends MinerError {
  constructor(
    message: string,
    public readonly minProceeds: bigint | null = null,
    service = 'amm-swap'
  ) {
    super(message, 'SLIPPAGE_EXCEEDED', service, true);
    this.name = 'SlippageExceededError';
  }
}

/**
 * A transaction was mined but reverted.
 */
export class TransactionRevertedError extends MinerError {
  constructor(
    message: string,
    public readonly txHash: string,
    service: string
  ) {
    super(message, 'TX_REVERTED', service, false);
    this.name = 'TransactionRevertedError';
  }
}

/**
 * A demand/offer/result signature could not be produced or does not recover
 * to the expected sender. Fatal for one liability only.
 */
export class SignatureInvalidError extends MinerError {
  constructor(message: string, public readonly role: 'demand' | 'offer' | 'result', service = 'liability-signer') {
    super(message, 'SIGNATURE_INVALID', service, false);
    this.name = 'SignatureInvalidError';
  }
}

/**
 * Attempted a backwards (or otherwise illegal) liability state transition.
 */
export class LiabilityStateError extends MinerError {
  constructor(
    public readonly liabilityId: string,
    public readonly from: string,
    public readonly to: string,
    service = 'round-scheduler'
  ) {
    super(`Liability ${liabilityId} cannot move from ${from} to ${to}`, 'LIABILITY_STATE', service, false);
    this.name = 'LiabilityStateError';
  }
}

/**
 * A command was issued in a lifecycle state that does not accept it
 * (e.g. running a round after the session terminated).
 */
export class LifecycleError extends MinerError {
  constructor(message: string, service: string) {
    super(message, 'LIFECYCLE_ERROR', service, false);
    this.name = 'LifecycleError';
  }
}
