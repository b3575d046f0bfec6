import type { SchedulingMode } from './rounds';

export type Phase = 'idle' | 'pumping' | 'mining' | 'terminated';

/**
 * Pumping drives the SMMA up toward a ceiling; mining stops once the SMMA
 * falls below a floor.
 */
export interface SmmaTarget {
  kind: 'ceiling' | 'floor';
  gwei: number;
}

/**
 * Parameters of the next round. Replaced wholesale on every decision.
 */
export interface PhaseConfig {
  phase: Phase;
  mode: SchedulingMode;
  priorityFeeGwei: number;
  batchSize: number;
  remainingBudgetWei: bigint;
  smmaTarget: SmmaTarget | null;
}

export interface SmmaState {
  /** gwei, never negative */
  value: number;
  period: number;
  lastResync: { at: number; value: number } | null;
  observationsSinceResync: number;
}

export type Profitability =
  | { verdict: 'profitable'; margin: number }
  | { verdict: 'marginal'; margin: number }
  | { verdict: 'unprofitable'; margin: number };
