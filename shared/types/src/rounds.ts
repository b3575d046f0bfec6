import type { Address } from './chain';
import type { Liability, LiabilityState } from './liability';

// =============================================================================
// Rounds
// =============================================================================

export type SchedulingMode = 'sequential' | 'batch' | 'pipeline';

/**
 * bootstrap: pipeline round with no previous creates to finalize.
 * drain: finalize-only round closing a pipeline session.
 */
export type RoundKind = 'standard' | 'bootstrap' | 'steady' | 'drain';

export type RoundStatus = 'completed' | 'degraded' | 'aborted';

export type RoundFailureKind = 'transport-timeout' | 'nonce-conflict' | 'quota-exceeded' | 'marker-not-owned';

export interface RoundFailure {
  kind: RoundFailureKind;
  message: string;
}

export interface RoundOutcome {
  status: RoundStatus;
  failure?: RoundFailure;
  /** Liabilities of this round per state at close */
  counts: Record<LiabilityState, number>;
  /** Liabilities finalized during this round, including ones carried over */
  finalized: number;
  gasUsed: bigint;
  gasCostWei: bigint;
  /** wn minted by finalizes included in this round */
  minted: bigint;
  transactionsSent: number;
  /** Barrier waits performed */
  confirmationCycles: number;
}

/**
 * One scheduling cycle. Frozen once closed.
 */
export interface Round {
  index: number;
  mode: SchedulingMode;
  kind: RoundKind;
  batchSize: number;
  /** Snapshots of the liabilities touched by the round, in submission order */
  liabilities: readonly Readonly<Liability>[];
  outcome: RoundOutcome;
  startedAt: number;
  closedAt: number;
}

// =============================================================================
// Nonce ledger
// =============================================================================

export type NonceLedgerStatus = 'unsynced' | 'synced' | 'conflict';

export interface NonceLedger {
  account: Address;
  next: number;
  status: NonceLedgerStatus;
  /** Incremented on every resync */
  epoch: number;
  issued: number;
}

/**
 * Contiguous, ordered block of nonces handed out by one reservation.
 */
export interface NonceReservation {
  account: Address;
  epoch: number;
  nonces: readonly number[];
}

// =============================================================================
// Liquidation
// =============================================================================

export interface SaleEvent {
  /** wn sold */
  amount: bigint;
  /** wei received */
  proceeds: bigint;
  /** wei per whole XRT */
  realizedPrice: bigint;
  slippageTolerance: number;
  minProceeds: bigint;
  txHash: string;
  timestamp: number;
}

/**
 * Drain-time sale of a remainder smaller than the threshold. Carries the
 * same fields as a SaleEvent but is logged apart from the threshold lots.
 */
export interface SweepEvent extends SaleEvent {
  /** Lot size the remainder fell short of */
  thresholdWn: bigint;
}
