/**
 * Miner Service
 *
 * Session orchestration around the round scheduler: keeps the emission
 * estimate fresh, tops up the lighthouse stake, retries a missed marker once,
 * feeds rejections and outcomes to the phase controller, and hands minted
 * XRT to the liquidation trigger. Rounds, drains and the operator commands
 * (single cycle, stake, purchase) run one at a time, so a drain requested
 * mid-round starts after that round closes.
 *
 * Events:
 * - round: every closed round, including rejected ones
 * - phase: phase transitions
 * - sale:  every threshold-lot liquidation
 * - sweep: the sale of a sub-threshold remainder on drain
 */

import { EventEmitter } from 'events';
import { ethers } from 'ethers';
import { ESTIMATED_GAS_PER_CYCLE } from '@xrt-miner/config';
import { AsyncMutex, formatErrorForLog, getErrorMessage } from '@xrt-miner/core';
import type { ILogger } from '@xrt-miner/core';
import { LifecycleError, MarkerNotOwnedError, QuotaExceededError, ValidationError } from '@xrt-miner/types';
import type {
  Address,
  BuyResult,
  ChainClient,
  LighthouseSnapshot,
  Phase,
  Round,
  RoundFailure,
  SaleEvent,
  SmmaState,
  SweepEvent,
} from '@xrt-miner/types';
import type { EmissionEstimator } from './estimation/emission-estimator';
import { costPerLiabilityUsd } from './estimation/profitability';
import type { ProfitabilityEstimator, ProfitabilityReport } from './estimation/profitability';
import type { MarkerTracker } from './lighthouse/marker-tracker';
import type { StakeManager, StakeTopUp } from './lighthouse/stake-manager';
import type { LiquidationOutcome, LiquidationTrigger } from './liquidation/liquidation-trigger';
import type { NonceSequencer } from './nonce/nonce-sequencer';
import type { PhaseChange, PhaseController } from './phases/phase-controller';
import type { PhaseDecision } from './phases/phase-decision';
import { requiredQuota } from './scheduling/round-scheduler';
import type { LiabilityContent, RoundRequest, RoundScheduler } from './scheduling/round-scheduler';
import type { UniswapV2Swap } from './swap/uniswap-v2-swap';

// =============================================================================
// Types
// =============================================================================

export interface MinerServiceDeps {
  chain: ChainClient;
  sequencer: NonceSequencer;
  marker: MarkerTracker;
  stake: StakeManager;
  scheduler: RoundScheduler;
  estimator: EmissionEstimator;
  phases: PhaseController;
  /** Null disables the profitability check */
  profitability: ProfitabilityEstimator | null;
  /** Null disables liquidation */
  liquidation: LiquidationTrigger | null;
  amm: UniswapV2Swap;
}

export interface MinerServiceOptions {
  account: Address;
  initialPhase: Exclude<Phase, 'terminated'>;
  /** 0 disables the USD cost throttle */
  maxCostUsd: number;
  /** Purchase deadline past the latest block timestamp */
  swapDeadlineSeconds: number;
}

export interface RoundReport {
  round: Round;
  decision: PhaseDecision;
  liquidation: LiquidationOutcome | null;
  profitability: ProfitabilityReport | null;
}

export interface EstimatorReport {
  state: SmmaState;
  /** Estimator updates per round at the current batch size */
  updatesPerRound: number;
  halfLifeRounds: number;
  target: { kind: 'ceiling' | 'floor'; gwei: number } | null;
}

export interface MinerStatus {
  account: Address;
  phase: Phase;
  nativeBalance: bigint;
  tokenBalance: bigint;
  lighthouse: LighthouseSnapshot;
  authoritativeSmmaWei: bigint;
  localSmmaGwei: number;
  /** Authoritative wn for one create + finalize cycle */
  emissionPerCycle: bigint;
  remainingBudgetWei: bigint;
  unsoldWn: bigint;
  openLiabilities: number;
}

export interface MinerServiceEvents {
  round: [Round];
  phase: [PhaseChange];
  sale: [SaleEvent];
  sweep: [SweepEvent];
}

const SERVICE = 'miner-service';

// =============================================================================
// MinerService Implementation
// =============================================================================

export interface MinerService {
  on<K extends keyof MinerServiceEvents>(event: K, listener: (...args: MinerServiceEvents[K]) => void): this;
  once<K extends keyof MinerServiceEvents>(event: K, listener: (...args: MinerServiceEvents[K]) => void): this;
  emit<K extends keyof MinerServiceEvents>(event: K, ...args: MinerServiceEvents[K]): boolean;
}

export class MinerService extends EventEmitter {
  private started = false;
  private readonly abort = new AbortController();
  private nextBatchSize: number | null = null;
  private readonly commands = new AsyncMutex();

  constructor(
    private readonly deps: MinerServiceDeps,
    private readonly options: MinerServiceOptions,
    private readonly logger: ILogger
  ) {
    super();
    deps.phases.onChange(change => this.emit('phase', change));
  }

  get phase(): Phase {
    return this.deps.phases.phase;
  }

  isStopped(): boolean {
    return this.abort.signal.aborted;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Anchor the nonce ledger, read the authoritative SMMA and leave idle.
   */
  async start(): Promise<void> {
    if (this.started) return;
    await this.deps.sequencer.sync();
    await this.deps.estimator.resync();
    this.deps.phases.start(this.options.initialPhase);
    this.started = true;
    this.logger.info('Miner session started', {
      account: this.options.account,
      phase: this.deps.phases.phase,
      smmaGwei: this.deps.estimator.value,
    });
  }

  /**
   * Stop after the current burst. Rounds in progress are not split.
   */
  stop(): void {
    if (this.abort.signal.aborted) return;
    this.abort.abort(new LifecycleError('Miner stopped', SERVICE));
    this.logger.info('Miner stop requested');
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  runOneRound(): Promise<RoundReport> {
    return this.commands.runExclusive(() => this.executeRound());
  }

  private async executeRound(): Promise<RoundReport> {
    await this.start();
    this.assertRunnable();

    if (this.deps.estimator.needsResync()) {
      await this.deps.estimator.resync();
    }
    if (this.deps.sequencer.getLedger().status === 'conflict') {
      await this.deps.sequencer.resync('after nonce conflict');
    }

    const config = this.deps.phases.getConfig();
    const request: RoundRequest = {
      mode: config.mode,
      batchSize: this.nextBatchSize ?? config.batchSize,
      priorityFeeGwei: config.priorityFeeGwei,
      signal: this.abort.signal,
    };

    await this.topUpStake(requiredQuota(request.mode, request.batchSize));

    let availableQuota: number | undefined;
    let round: Round;
    try {
      round = await this.runWithMarkerRetry(request);
    } catch (error) {
      const failure = this.rejection(error);
      if (!failure) throw error;
      if (error instanceof QuotaExceededError) availableQuota = error.quota;
      this.logger.warn('Round rejected before broadcast', { kind: failure.kind, error: failure.message });
      round = this.deps.scheduler.rejectedRound(request, failure);
    }
    this.emit('round', round);

    const liquidation = await this.liquidate(round.outcome.minted);
    const profitability = await this.assessProfitability();
    const costUsd = await this.liabilityCostUsd();

    const decision = this.deps.phases.decide({
      round: { status: round.outcome.status, failure: round.outcome.failure, gasCostWei: round.outcome.gasCostWei },
      availableQuota,
      profitability: profitability?.profitability ?? null,
      smmaGwei: this.deps.estimator.value,
      costPerLiabilityUsd: costUsd,
    });
    this.nextBatchSize = decision.roundBatchSize;

    this.logger.info('Next round decided', {
      phase: decision.next.phase,
      action: decision.action,
      reason: decision.reason,
      batchSize: decision.roundBatchSize,
      remainingBudgetWei: decision.next.remainingBudgetWei,
    });

    return { round, decision, liquidation, profitability };
  }

  /**
   * Run up to `count` rounds, stopping early when the controller asks to
   * wait or terminate, or when stopped.
   */
  async runRounds(count: number): Promise<RoundReport[]> {
    const reports: RoundReport[] = [];
    for (let i = 0; i < count && !this.isStopped(); i++) {
      const report = await this.runOneRound();
      reports.push(report);
      if (report.decision.action !== 'continue') break;
    }
    return reports;
  }

  /**
   * Finalize every carried-over liability and sell whatever is left.
   */
  drain(): Promise<RoundReport | null> {
    return this.commands.runExclusive(() => this.executeDrain());
  }

  private async executeDrain(): Promise<RoundReport | null> {
    if (this.deps.scheduler.pendingFinalizes() === 0 && this.deps.scheduler.getOpenLiabilities().length === 0) {
      const liquidation = await this.sellRemaining();
      this.logger.info('Nothing to drain', { liquidation: liquidation?.status });
      return null;
    }

    const config = this.deps.phases.getConfig();
    const round = await this.deps.scheduler.drain({ priorityFeeGwei: config.priorityFeeGwei, mode: config.mode });
    this.emit('round', round);
    await this.liquidate(round.outcome.minted);
    const liquidation = await this.sellRemaining();

    const decision = this.deps.phases.decide({
      round: { status: round.outcome.status, failure: round.outcome.failure, gasCostWei: round.outcome.gasCostWei },
      profitability: null,
      smmaGwei: this.deps.estimator.value,
    });
    return { round, decision, liquidation, profitability: null };
  }

  /**
   * Create and finalize a single liability with the caller's payloads.
   * The round is reported and its minted XRT liquidated, but it does not
   * feed the phase controller.
   */
  mineOnce(content: LiabilityContent = {}): Promise<Round> {
    return this.commands.runExclusive(() => this.executeMineOnce(content));
  }

  private async executeMineOnce(content: LiabilityContent): Promise<Round> {
    const fields: Array<[string, string | undefined]> = [
      ['model', content.model],
      ['objective', content.objective],
    ];
    for (const [field, value] of fields) {
      if (value !== undefined && !ethers.isHexString(value)) {
        throw new ValidationError(`${field} must be a 0x-prefixed hex string`, SERVICE, field);
      }
    }

    await this.start();
    this.assertRunnable();
    if (this.deps.sequencer.getLedger().status === 'conflict') {
      await this.deps.sequencer.resync('after nonce conflict');
    }

    const request: RoundRequest = {
      mode: 'sequential',
      batchSize: 1,
      priorityFeeGwei: this.deps.phases.getConfig().priorityFeeGwei,
      signal: this.abort.signal,
      content,
    };
    await this.topUpStake(requiredQuota(request.mode, request.batchSize));

    const round = await this.runWithMarkerRetry(request);
    this.emit('round', round);
    await this.liquidate(round.outcome.minted);
    return round;
  }

  /** Add `amount` wn to the lighthouse stake */
  stake(amount: bigint): Promise<void> {
    return this.commands.runExclusive(() => this.deps.stake.stake(amount));
  }

  withdrawStake(amount: bigint): Promise<void> {
    return this.commands.runExclusive(() => this.deps.stake.withdraw(amount));
  }

  /** Buy `amountOut` wn of XRT with ETH */
  buy(amountOut: bigint, slippageTolerance: number): Promise<BuyResult> {
    return this.commands.runExclusive(async () => {
      const now = await this.deps.chain.getLatestTimestamp();
      return this.deps.amm.buy(amountOut, slippageTolerance, now + this.options.swapDeadlineSeconds);
    });
  }

  forcePhaseTransition(phase: Phase): void {
    this.deps.phases.forceTransition(phase);
    this.nextBatchSize = null;
  }

  reportEstimatorState(): EstimatorReport {
    const config = this.deps.phases.getConfig();
    const batchSize = this.nextBatchSize ?? config.batchSize;
    // Every included create and finalize is one SMMA update
    const updatesPerRound = 2 * batchSize;
    return {
      state: this.deps.estimator.getState(),
      updatesPerRound,
      halfLifeRounds: this.deps.estimator.halfLifeRounds(updatesPerRound),
      target: config.smmaTarget,
    };
  }

  async status(): Promise<MinerStatus> {
    const { chain } = this.deps;
    const account = this.options.account;
    const [nativeBalance, tokenBalance, lighthouse, authoritativeSmmaWei, emissionPerCycle] = await Promise.all([
      chain.getNativeBalance(account),
      chain.getTokenBalance(account),
      chain.getLighthouseSnapshot(account),
      chain.getAuthoritativeSmma(),
      chain.getEmissionForGas(ESTIMATED_GAS_PER_CYCLE),
    ]);

    return {
      account,
      phase: this.deps.phases.phase,
      nativeBalance,
      tokenBalance,
      lighthouse,
      authoritativeSmmaWei,
      localSmmaGwei: this.deps.estimator.value,
      emissionPerCycle,
      remainingBudgetWei: this.deps.phases.getConfig().remainingBudgetWei,
      unsoldWn: this.deps.liquidation?.unsold ?? 0n,
      openLiabilities: this.deps.scheduler.getOpenLiabilities().length,
    };
  }

  // ===========================================================================
  // Round helpers
  // ===========================================================================

  private assertRunnable(): void {
    const phase = this.deps.phases.phase;
    if (phase === 'terminated') {
      throw new LifecycleError('Session terminated, no further rounds', SERVICE);
    }
    if (phase === 'idle') {
      throw new LifecycleError('Session idle, transition to pumping or mining first', SERVICE);
    }
    if (this.isStopped()) {
      throw new LifecycleError('Miner stopped', SERVICE);
    }
  }

  /**
   * One round; when the marker is held elsewhere, wait for its timeout and
   * try exactly once more.
   */
  private async runWithMarkerRetry(request: RoundRequest): Promise<Round> {
    try {
      return await this.deps.scheduler.runRound(request);
    } catch (error) {
      if (!(error instanceof MarkerNotOwnedError) || error.retryAtBlock === null) throw error;

      this.logger.info('Marker held elsewhere, waiting to reclaim', { retryAtBlock: error.retryAtBlock });
      await this.deps.marker.waitAndReclaim(request.signal);
      return this.deps.scheduler.runRound(request);
    }
  }

  private rejection(error: unknown): RoundFailure | null {
    if (error instanceof QuotaExceededError) return { kind: 'quota-exceeded', message: error.message };
    if (error instanceof MarkerNotOwnedError) return { kind: 'marker-not-owned', message: error.message };
    return null;
  }

  private async topUpStake(neededQuota: number): Promise<StakeTopUp> {
    const result = await this.deps.stake.ensureStake(neededQuota);
    if (result.status === 'no-balance') {
      this.logger.warn('No token balance for stake top-up', { needed: result.needed, stake: result.stake });
    }
    return result;
  }

  private async liquidate(minted: bigint): Promise<LiquidationOutcome | null> {
    const trigger = this.deps.liquidation;
    if (!trigger || minted === 0n) return null;

    const outcome = await trigger.update(minted);
    if (outcome.status === 'sold') this.emit('sale', outcome.sale);
    return outcome;
  }

  private async sellRemaining(): Promise<LiquidationOutcome | null> {
    const trigger = this.deps.liquidation;
    if (!trigger) return null;

    const outcome = await trigger.sellAll();
    if (outcome.status === 'sold') this.emit('sale', outcome.sale);
    if (outcome.status === 'swept') this.emit('sweep', outcome.sweep);
    return outcome;
  }

  /**
   * Mining only. A failed read leaves the verdict to the SMMA floor check.
   */
  private async assessProfitability(): Promise<ProfitabilityReport | null> {
    const estimator = this.deps.profitability;
    if (!estimator || this.deps.phases.phase !== 'mining') return null;

    try {
      return await estimator.assess();
    } catch (error) {
      this.logger.warn('Profitability check failed', formatErrorForLog(error));
      return null;
    }
  }

  private async liabilityCostUsd(): Promise<number | undefined> {
    if (this.options.maxCostUsd <= 0) return undefined;

    try {
      const [gasPrice, ethUsd] = await Promise.all([this.deps.chain.getGasPrice(), this.deps.chain.getEthUsdPrice()]);
      return costPerLiabilityUsd(gasPrice, ethUsd);
    } catch (error) {
      this.logger.warn('Cost throttle price read failed', { error: getErrorMessage(error) });
      return undefined;
    }
  }
}
