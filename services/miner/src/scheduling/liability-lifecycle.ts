/**
 * Liability state machine
 *
 *   pending -> created | failed | abandoned
 *   created -> finalized | failed | abandoned
 *
 * Terminal states never change again.
 */

import { LiabilityStateError, TERMINAL_STATES } from '@xrt-miner/types';
import type { Hex, Liability, LiabilityState } from '@xrt-miner/types';

const TRANSITIONS: Record<LiabilityState, readonly LiabilityState[]> = {
  pending: ['created', 'failed', 'abandoned'],
  created: ['finalized', 'failed', 'abandoned'],
  finalized: [],
  failed: [],
  abandoned: [],
};

export function canTransition(from: LiabilityState, to: LiabilityState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Move a liability forward. Failure states record the reason.
 *
 * @throws LiabilityStateError for any other transition
 */
export function transition(liability: Liability, to: LiabilityState, reason?: string): void {
  if (!canTransition(liability.state, to)) {
    throw new LiabilityStateError(liability.id, liability.state, to);
  }
  liability.state = to;
  if (reason !== undefined) {
    liability.failureReason = reason;
  }
}

export function newLiability(id: string, roundIndex: number, result: Hex): Liability {
  return {
    id,
    state: 'pending',
    roundIndex,
    result,
    gasUsed: 0n,
    gasCostWei: 0n,
    minted: 0n,
    reconcileAttempts: 0,
  };
}

export function isTerminal(liability: Liability): boolean {
  return TERMINAL_STATES.has(liability.state);
}

/** Opened but its create was never broadcast */
export function awaitsCreate(liability: Liability): boolean {
  return liability.state === 'pending' && liability.createTx === undefined;
}

/** Created on chain and no finalize in flight */
export function awaitsFinalize(liability: Liability): boolean {
  return liability.state === 'created' && liability.finalizeTx === undefined;
}

/** A transaction was broadcast and its outcome is still unknown */
export function isInFlight(liability: Liability): boolean {
  return (
    (liability.state === 'pending' && liability.createTx !== undefined) ||
    (liability.state === 'created' && liability.finalizeTx !== undefined)
  );
}

export function snapshot(liability: Liability): Readonly<Liability> {
  return Object.freeze({
    ...liability,
    createTx: liability.createTx ? Object.freeze({ ...liability.createTx }) : undefined,
    finalizeTx: liability.finalizeTx ? Object.freeze({ ...liability.finalizeTx }) : undefined,
  });
}

export function countByState(liabilities: readonly Readonly<Liability>[]): Record<LiabilityState, number> {
  const counts: Record<LiabilityState, number> = { pending: 0, created: 0, finalized: 0, failed: 0, abandoned: 0 };
  for (const liability of liabilities) {
    counts[liability.state]++;
  }
  return counts;
}
