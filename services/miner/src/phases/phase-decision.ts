/**
 * Phase decision
 *
 * Pure function from the last round's outcome to the parameters of the next
 * one. No I/O: every input is measured by the caller.
 *
 * Order of evaluation:
 *   1. budget     gas cost of the round is subtracted
 *   2. failures   step-down on transport timeout, failure limit
 *   3. budget     exhausted: mining terminates, pumping waits for the operator
 *   4. phase      unprofitable streak (mining), target reached (pumping)
 *   5. throttle   USD cost cap on the batch size
 */

import type { PhaseProfile } from '@xrt-miner/config';
import type {
  Phase,
  PhaseConfig,
  Profitability,
  RoundFailure,
  RoundStatus,
  SchedulingMode,
  SmmaTarget,
} from '@xrt-miner/types';
import { requiredQuota } from '../scheduling/round-scheduler';

// =============================================================================
// Types
// =============================================================================

export interface PhasePolicy {
  pump: PhaseProfile;
  mine: PhaseProfile;
  /** Strictly decreasing batch sizes used after a transport timeout */
  stepDownSequence: readonly number[];
  /** Consecutive failed rounds tolerated; one more terminates */
  maxConsecutiveFailures: number;
  maxUnprofitableRounds: number;
  /** 0 disables the throttle */
  maxCostUsd: number;
}

export interface PhaseCounters {
  consecutiveFailures: number;
  consecutiveUnprofitable: number;
}

export interface RoundSummary {
  status: RoundStatus;
  failure?: RoundFailure;
  gasCostWei: bigint;
}

export interface DecisionInput {
  current: PhaseConfig;
  /** Null when no round ran (e.g. the first decision of a session) */
  round: RoundSummary | null;
  counters: PhaseCounters;
  /** Quota available when the round was rejected with quota-exceeded */
  availableQuota?: number;
  profitability: Profitability | null;
  smmaGwei: number;
  /** USD cost of one create + finalize at the current gas price */
  costPerLiabilityUsd?: number;
}

export type DecisionAction = 'continue' | 'await-operator' | 'terminate';

export interface PhaseDecision {
  next: PhaseConfig;
  action: DecisionAction;
  reason: string;
  counters: PhaseCounters;
  /** Pumping only: the SMMA estimate reached the ceiling */
  targetReached: boolean;
  /** Batch size for the next round after the cost throttle; `next.batchSize` stays the backoff size */
  roundBatchSize: number;
}

export const INITIAL_COUNTERS: PhaseCounters = Object.freeze({ consecutiveFailures: 0, consecutiveUnprofitable: 0 });

// =============================================================================
// Helpers
// =============================================================================

/**
 * Scale the batch size down so that a round costs at most `maxCostUsd` per
 * `maxBatch` liabilities. 0 means wait for cheaper gas.
 */
export function throttleBatchSize(maxBatch: number, costPerLiabilityUsd: number, maxCostUsd: number): number {
  if (maxCostUsd <= 0 || costPerLiabilityUsd <= 0) return maxBatch;
  return Math.min(maxBatch, Math.floor((maxBatch * maxCostUsd) / costPerLiabilityUsd));
}

/** Largest batch size the quota admits for a mode */
export function largestFittingBatch(mode: SchedulingMode, quota: number): number {
  let size = mode === 'batch' ? quota : Math.floor(quota / 2);
  while (size > 0 && requiredQuota(mode, size) > quota) size--;
  return Math.max(0, size);
}

/** Next smaller size in the sequence, null when there is none */
export function stepDown(sequence: readonly number[], current: number): number | null {
  for (const size of sequence) {
    if (size < current) return size;
  }
  return null;
}

export function smmaTargetFor(phase: Phase, policy: PhasePolicy): SmmaTarget | null {
  if (phase === 'pumping') return { kind: 'ceiling', gwei: policy.pump.targetSmmaGwei };
  if (phase === 'mining') return { kind: 'floor', gwei: policy.mine.targetSmmaGwei };
  return null;
}

export function profileFor(phase: Phase, policy: PhasePolicy): PhaseProfile | null {
  if (phase === 'pumping') return policy.pump;
  if (phase === 'mining') return policy.mine;
  return null;
}

/**
 * Round parameters on entering `phase`, keeping the remaining budget.
 */
export function phaseConfigFor(phase: Phase, policy: PhasePolicy, remainingBudgetWei: bigint): PhaseConfig {
  const profile = profileFor(phase, policy) ?? policy.mine;
  return {
    phase,
    mode: profile.mode,
    priorityFeeGwei: profile.priorityFeeGwei,
    batchSize: profile.batchSize,
    remainingBudgetWei,
    smmaTarget: smmaTargetFor(phase, policy),
  };
}

// =============================================================================
// Decision
// =============================================================================

export function decideNextRound(input: DecisionInput, policy: PhasePolicy): PhaseDecision {
  const { current, round, smmaGwei } = input;
  const counters = { ...input.counters };
  const spent = round?.gasCostWei ?? 0n;
  const remainingBudgetWei = current.remainingBudgetWei > spent ? current.remainingBudgetWei - spent : 0n;
  let batchSize = current.batchSize;
  let roundBatchSize: number | null = null;

  const decide = (action: DecisionAction, reason: string, targetReached = false): PhaseDecision => ({
    next: { ...current, batchSize, remainingBudgetWei },
    action,
    reason,
    counters,
    targetReached,
    roundBatchSize: roundBatchSize ?? batchSize,
  });

  if (current.phase === 'terminated') return decide('terminate', 'session terminated');
  if (current.phase === 'idle') return decide('await-operator', 'idle');

  // Failures
  const failure = round?.failure;
  if (failure) {
    switch (failure.kind) {
      case 'transport-timeout': {
        counters.consecutiveFailures += 1;
        const smaller = stepDown(policy.stepDownSequence, batchSize);
        if (smaller === null) {
          return decide('terminate', `transport timeout at batch size ${batchSize} with no smaller size left`);
        }
        batchSize = smaller;
        if (counters.consecutiveFailures > policy.maxConsecutiveFailures) {
          return decide('terminate', `${counters.consecutiveFailures} consecutive failed rounds`);
        }
        break;
      }
      case 'nonce-conflict':
      case 'marker-not-owned':
        counters.consecutiveFailures += 1;
        if (counters.consecutiveFailures > policy.maxConsecutiveFailures) {
          return decide('terminate', `${counters.consecutiveFailures} consecutive failed rounds`);
        }
        break;
      case 'quota-exceeded': {
        const fit = largestFittingBatch(current.mode, input.availableQuota ?? 0);
        if (fit < 1) {
          return decide('await-operator', `quota ${input.availableQuota ?? 0} admits no ${current.mode} round`);
        }
        batchSize = Math.min(batchSize, fit);
        break;
      }
    }
  } else if (round) {
    counters.consecutiveFailures = 0;
  }

  // Budget
  if (remainingBudgetWei === 0n) {
    return current.phase === 'pumping'
      ? decide('await-operator', 'pumping budget exhausted')
      : decide('terminate', 'mining budget exhausted');
  }

  // Phase goals
  let targetReached = false;
  if (current.phase === 'mining' && round && round.status !== 'aborted') {
    const floor = current.smmaTarget?.kind === 'floor' ? current.smmaTarget.gwei : policy.mine.targetSmmaGwei;
    const unprofitable = input.profitability?.verdict === 'unprofitable' || smmaGwei < floor;
    counters.consecutiveUnprofitable = unprofitable ? counters.consecutiveUnprofitable + 1 : 0;
    if (counters.consecutiveUnprofitable >= policy.maxUnprofitableRounds) {
      return decide('terminate', `${counters.consecutiveUnprofitable} consecutive unprofitable rounds`);
    }
  }
  if (current.phase === 'pumping') {
    const ceiling = current.smmaTarget?.kind === 'ceiling' ? current.smmaTarget.gwei : policy.pump.targetSmmaGwei;
    targetReached = smmaGwei >= ceiling;
  }

  // Throttle
  if (input.costPerLiabilityUsd !== undefined && policy.maxCostUsd > 0) {
    const throttled = throttleBatchSize(batchSize, input.costPerLiabilityUsd, policy.maxCostUsd);
    roundBatchSize = throttled;
    if (throttled < 1) {
      return decide('await-operator', `liability cost ${input.costPerLiabilityUsd.toFixed(2)} USD above cap`, targetReached);
    }
  }

  return decide('continue', failure ? `recovering from ${failure.kind}` : 'ok', targetReached);
}
