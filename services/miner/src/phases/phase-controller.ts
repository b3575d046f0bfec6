/**
 * Phase Controller
 *
 *   idle -> pumping -> mining -> terminated
 *   idle -> mining
 *   any  -> terminated
 *
 * pumping -> mining happens only through `forceTransition`; the controller
 * reports when the pump target is reached but never leaves pumping itself.
 * Mining terminates on its own (budget, unprofitable streak, failures).
 */

import type { ILogger } from '@xrt-miner/core';
import { LifecycleError } from '@xrt-miner/types';
import type { Phase, PhaseConfig } from '@xrt-miner/types';
import {
  INITIAL_COUNTERS,
  decideNextRound,
  phaseConfigFor,
} from './phase-decision';
import type { DecisionInput, PhaseCounters, PhaseDecision, PhasePolicy } from './phase-decision';

const ALLOWED: Record<Phase, readonly Phase[]> = {
  idle: ['pumping', 'mining', 'terminated'],
  pumping: ['mining', 'terminated'],
  mining: ['terminated'],
  terminated: [],
};

export function canEnter(from: Phase, to: Phase): boolean {
  return ALLOWED[from].includes(to);
}

export interface PhaseChange {
  from: Phase;
  to: Phase;
  reason: string;
  forced: boolean;
}

const SERVICE = 'phase-controller';

export class PhaseController {
  private config: PhaseConfig;
  private counters: PhaseCounters = { ...INITIAL_COUNTERS };
  private lastDecision: PhaseDecision | null = null;
  private readonly listeners: Array<(change: PhaseChange) => void> = [];

  constructor(
    private readonly policy: PhasePolicy,
    budgetWei: bigint,
    private readonly logger: ILogger
  ) {
    this.config = phaseConfigFor('idle', policy, budgetWei);
  }

  get phase(): Phase {
    return this.config.phase;
  }

  getConfig(): Readonly<PhaseConfig> {
    return { ...this.config };
  }

  getCounters(): Readonly<PhaseCounters> {
    return { ...this.counters };
  }

  getLastDecision(): PhaseDecision | null {
    return this.lastDecision;
  }

  isTerminated(): boolean {
    return this.config.phase === 'terminated';
  }

  onChange(listener: (change: PhaseChange) => void): void {
    this.listeners.push(listener);
  }

  /**
   * Leave idle for the configured initial phase.
   */
  start(initial: Exclude<Phase, 'terminated'>): void {
    if (this.config.phase !== 'idle') {
      throw new LifecycleError(`Cannot start from phase ${this.config.phase}`, SERVICE);
    }
    if (initial !== 'idle') {
      this.enter(initial, 'session started', false);
    }
  }

  /**
   * Operator transition. Fresh profile, counters reset, budget kept.
   *
   * @throws LifecycleError for transitions the state machine does not allow
   */
  forceTransition(to: Phase, reason = 'operator request'): void {
    if (!canEnter(this.config.phase, to)) {
      throw new LifecycleError(`Cannot move from ${this.config.phase} to ${to}`, SERVICE);
    }
    this.enter(to, reason, true);
  }

  /**
   * Apply the decision for the round that just closed.
   */
  decide(input: Omit<DecisionInput, 'current' | 'counters'>): PhaseDecision {
    const decision = decideNextRound({ ...input, current: this.config, counters: this.counters }, this.policy);
    this.lastDecision = decision;
    this.counters = decision.counters;
    this.config = decision.next;

    if (decision.targetReached) {
      this.logger.info('Pump target reached, waiting for operator', {
        ceiling: this.config.smmaTarget?.gwei,
        smmaGwei: input.smmaGwei,
      });
    }
    if (decision.action === 'terminate' && this.config.phase !== 'terminated') {
      this.enter('terminated', decision.reason, false);
    } else if (decision.action !== 'continue') {
      this.logger.info('Phase decision', { action: decision.action, reason: decision.reason });
    }
    return decision;
  }

  private enter(to: Phase, reason: string, forced: boolean): void {
    const from = this.config.phase;
    this.config =
      to === 'terminated'
        ? { ...this.config, phase: 'terminated', smmaTarget: null }
        : phaseConfigFor(to, this.policy, this.config.remainingBudgetWei);
    this.counters = { ...INITIAL_COUNTERS };

    this.logger.info('Phase transition', { from, to, reason, forced });
    const change: PhaseChange = { from, to, reason, forced };
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
