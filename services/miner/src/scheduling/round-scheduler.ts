/**
 * Round Scheduler
 *
 * Drives liabilities through create and finalize in one of three modes:
 *
 * - sequential: per liability, create, wait, finalize, wait
 * - batch: one burst of creates, barrier, reclaim marker, one burst of
 *   finalizes for everything created, barrier
 * - pipeline: one burst of finalize(previous round) + create(this round),
 *   finalizes on the lower nonces. The first round of a session only
 *   creates (bootstrap); `drain()` only finalizes.
 *
 * Every round first re-checks transactions left unconfirmed by earlier
 * rounds, then claims the marker and checks the quota against what it will
 * actually send. Rejections (MarkerNotOwnedError, QuotaExceededError) are
 * thrown before any nonce is reserved. After that, per-liability failures
 * only affect that liability, and per-round failures close the round as
 * degraded or aborted.
 *
 * Liabilities whose transaction outcome is unknown at the barrier stay in
 * their state and are re-checked at the start of later rounds. Liabilities
 * signed in an aborted round but never broadcast stay pending and are
 * re-signed first by the next round's creates.
 */

import { ethers } from 'ethers';
import { PAYLOAD_BYTES } from '@xrt-miner/config';
import { getErrorMessage } from '@xrt-miner/core';
import type { ILogger } from '@xrt-miner/core';
import {
  MarkerNotOwnedError,
  NonceConflictError,
  QuotaExceededError,
  SignatureInvalidError,
  TransportTimeoutError,
  ValidationError,
} from '@xrt-miner/types';
import type {
  Address,
  ChainClient,
  FeeParams,
  Hex,
  Liability,
  LiabilityMessageSigner,
  ReceiptDecoder,
  Round,
  RoundFailure,
  RoundKind,
  RoundOutcome,
  SchedulingMode,
  SignedTx,
  SubmissionResult,
  TransactionFactory,
  TxReceipt,
} from '@xrt-miner/types';
import { feeParams } from '../chain/fees';
import type { EmissionEstimator } from '../estimation/emission-estimator';
import type { MarkerTracker } from '../lighthouse/marker-tracker';
import type { NonceSequencer } from '../nonce/nonce-sequencer';
import {
  awaitsCreate,
  awaitsFinalize,
  countByState,
  isInFlight,
  isTerminal,
  newLiability,
  snapshot,
  transition,
} from './liability-lifecycle';

// =============================================================================
// Types
// =============================================================================

export interface RoundSchedulerConfig {
  /** Token named in demand/offer messages */
  token: Address;
  lighthouse: Address;
  /** Blocks a signed demand/offer stays valid */
  deadlineBlocks: number;
  confirmationTimeoutMs: number;
  maxReconcileAttempts: number;
}

export interface RoundSchedulerDeps {
  chain: ChainClient;
  sequencer: NonceSequencer;
  marker: MarkerTracker;
  txFactory: TransactionFactory;
  signer: LiabilityMessageSigner;
  decoder: ReceiptDecoder;
  estimator: EmissionEstimator;
}

/** Caller-chosen demand/offer payloads; a missing field gets a random one */
export interface LiabilityContent {
  model?: Hex;
  objective?: Hex;
}

export interface RoundRequest {
  mode: SchedulingMode;
  batchSize: number;
  priorityFeeGwei: number;
  /** Checked only between create and finalize bursts */
  signal?: AbortSignal;
  content?: LiabilityContent;
}

export interface DrainRequest {
  priorityFeeGwei: number;
  mode?: SchedulingMode;
}

type Operation = 'create' | 'finalize';

interface BurstItem {
  operation: Operation;
  liability: Liability;
  build: (nonce: number, fees: FeeParams) => Promise<SignedTx>;
}

/** Mutable accumulator for a round in progress */
interface RoundTally {
  index: number;
  touched: Map<string, Liability>;
  finalized: number;
  gasUsed: bigint;
  gasCostWei: bigint;
  minted: bigint;
  transactionsSent: number;
  confirmationCycles: number;
  failure?: RoundFailure;
  status: RoundOutcome['status'];
}

const SERVICE = 'round-scheduler';

export function randomPayload(): Hex {
  return ethers.hexlify(ethers.randomBytes(PAYLOAD_BYTES));
}

/**
 * Quota a round of `batchSize` needs before it may start. Sequential and
 * pipeline rounds spend a create and a finalize per liability inside one
 * turn; batch rounds re-claim the marker between their two bursts.
 */
export function requiredQuota(mode: SchedulingMode, batchSize: number): number {
  return mode === 'batch' ? batchSize : 2 * batchSize;
}

// =============================================================================
// RoundScheduler Implementation
// =============================================================================

export class RoundScheduler {
  private roundIndex = 0;
  /** Liabilities not yet in a terminal state, oldest first */
  private readonly open: Liability[] = [];
  private liabilityCounter = 0;
  /** Tally of a round rejected after reconciling, reused by the next attempt */
  private staged: RoundTally | null = null;

  constructor(
    private readonly deps: RoundSchedulerDeps,
    private readonly config: RoundSchedulerConfig,
    private readonly logger: ILogger,
    private readonly payload: () => Hex = randomPayload
  ) {}

  /** Liabilities carried into the next round */
  getOpenLiabilities(): readonly Readonly<Liability>[] {
    return this.open.map(snapshot);
  }

  /** Created liabilities waiting for a finalize */
  pendingFinalizes(): number {
    return this.open.filter(awaitsFinalize).length;
  }

  get roundsRun(): number {
    return this.roundIndex;
  }

  /**
   * Run one round.
   *
   * @throws MarkerNotOwnedError when the marker cannot be claimed
   * @throws QuotaExceededError when the round needs more operations than the quota allows
   */
  async runRound(request: RoundRequest): Promise<Round> {
    if (!Number.isInteger(request.batchSize) || request.batchSize < 1) {
      throw new ValidationError(`Batch size must be a positive integer, got ${request.batchSize}`, SERVICE, 'batchSize');
    }
    request.signal?.throwIfAborted();

    const tally = this.stageTally();
    const startedAt = Date.now();
    await this.reconcile(tally);

    const kind = this.kindFor(request.mode);
    const required = this.requiredFor(request, kind);
    const quota = await this.claimQuota();
    if (required > quota) {
      throw new QuotaExceededError(required, quota, SERVICE);
    }
    this.staged = null;

    try {
      switch (request.mode) {
        case 'pipeline':
          await this.runPipeline(request, kind, tally);
          break;
        case 'batch':
          await this.runBatch(request, tally);
          break;
        case 'sequential':
          await this.runSequential(request, tally);
          break;
      }
    } catch (error) {
      if (!(error instanceof NonceConflictError)) throw error;
      this.abort(tally, { kind: 'nonce-conflict', message: error.message });
    }

    return this.closeRound(tally, request, kind, startedAt);
  }

  /**
   * Finalize-only round for everything created and not yet finalized.
   */
  async drain(request: DrainRequest): Promise<Round> {
    const tally = this.stageTally();
    const startedAt = Date.now();
    await this.reconcile(tally);

    const remaining = this.open.filter(awaitsFinalize);
    if (remaining.length > 0) {
      const quota = await this.claimQuota();
      if (remaining.length > quota) {
        throw new QuotaExceededError(remaining.length, quota, SERVICE);
      }
    }
    this.staged = null;

    for (const unsent of this.open.filter(awaitsCreate)) {
      this.track(unsent, tally);
      this.fail(unsent, 'abandoned', 'drained before its create was sent');
    }

    try {
      if (remaining.length > 0) {
        const fees = await this.currentFees(request.priorityFeeGwei);
        await this.runBurst(await this.finalizeItems(remaining, tally), fees, tally);
      }
    } catch (error) {
      if (!(error instanceof NonceConflictError)) throw error;
      this.abort(tally, { kind: 'nonce-conflict', message: error.message });
    }

    return this.closeRound(
      tally,
      { mode: request.mode ?? 'pipeline', batchSize: remaining.length, priorityFeeGwei: request.priorityFeeGwei },
      'drain',
      startedAt
    );
  }

  /**
   * Closed, aborted round for a request rejected before any broadcast.
   */
  rejectedRound(request: RoundRequest, failure: RoundFailure): Round {
    const tally = this.stageTally();
    this.staged = null;
    tally.status = 'aborted';
    tally.failure = failure;
    const now = Date.now();
    return this.closeRound(tally, request, this.kindFor(request.mode), now);
  }

  // ===========================================================================
  // Modes
  // ===========================================================================

  private async runPipeline(request: RoundRequest, kind: RoundKind, tally: RoundTally): Promise<void> {
    const fees = await this.currentFees(request.priorityFeeGwei);
    const finalizes = kind === 'steady' ? await this.finalizeItems(this.open.filter(awaitsFinalize), tally) : [];
    const creates = await this.createItems(request.batchSize, tally, request.content);

    // One burst: once its first transaction is out, all of it goes out
    await this.runBurst([...finalizes, ...creates], fees, tally);
  }

  private async runBatch(request: RoundRequest, tally: RoundTally): Promise<void> {
    const fees = await this.currentFees(request.priorityFeeGwei);
    await this.runBurst(await this.createItems(request.batchSize, tally, request.content), fees, tally);

    if (request.signal?.aborted) {
      this.logger.info('Round cancelled between create and finalize', { round: tally.index });
      return;
    }

    const ready = this.open.filter(awaitsFinalize);
    if (ready.length === 0) return;

    const quota = await this.reclaimQuota();
    if (quota === null) {
      this.logger.warn('Marker lost before finalize burst, carrying liabilities over', {
        round: tally.index,
        carried: ready.length,
      });
      return;
    }

    const now = ready.slice(0, quota);
    if (now.length < ready.length) {
      this.logger.warn('Quota short for finalize burst', { quota, ready: ready.length });
    }
    await this.runBurst(await this.finalizeItems(now, tally), await this.currentFees(request.priorityFeeGwei), tally);
  }

  private async runSequential(request: RoundRequest, tally: RoundTally): Promise<void> {
    for (const carried of this.open.filter(awaitsFinalize)) {
      const fees = await this.currentFees(request.priorityFeeGwei);
      await this.runBurst(await this.finalizeItems([carried], tally), fees, tally);
    }

    for (let i = 0; i < request.batchSize; i++) {
      if (request.signal?.aborted) {
        this.logger.info('Round cancelled', { round: tally.index, completed: i });
        return;
      }

      const fees = await this.currentFees(request.priorityFeeGwei);
      const [create] = await this.createItems(1, tally, request.content);
      if (!create) continue;
      await this.runBurst([create], fees, tally);

      if (request.signal?.aborted) {
        this.logger.info('Round cancelled between create and finalize', { round: tally.index });
        return;
      }
      if (awaitsFinalize(create.liability)) {
        await this.runBurst(await this.finalizeItems([create.liability], tally), fees, tally);
      }
    }
  }

  // ===========================================================================
  // Burst building
  // ===========================================================================

  /**
   * Sign demand/offer pairs for `count` creates: liabilities left unsent by
   * an aborted round first, then new ones. A signing failure abandons that
   * liability only; message nonces go to survivors consecutively.
   */
  private async createItems(count: number, tally: RoundTally, content: LiabilityContent = {}): Promise<BurstItem[]> {
    const account = this.deps.signer.address;
    const [baseNonce, block] = await Promise.all([
      this.deps.chain.getFactoryNonce(account),
      this.deps.chain.getBlockNumber(),
    ]);
    const deadline = BigInt(block + this.config.deadlineBlocks);

    const liabilities = this.open.filter(awaitsCreate).slice(0, count);
    if (liabilities.length > 0) {
      this.logger.info('Re-signing unsent liabilities', { round: tally.index, count: liabilities.length });
    }
    while (liabilities.length < count) {
      liabilities.push(newLiability(`r${tally.index}-${++this.liabilityCounter}`, tally.index, this.payload()));
    }

    const items: BurstItem[] = [];
    for (const liability of liabilities) {
      this.track(liability, tally);

      const model = content.model ?? this.payload();
      const objective = content.objective ?? this.payload();
      const k = BigInt(items.length);
      const common = {
        model,
        objective,
        token: this.config.token,
        cost: 0n,
        lighthouse: this.config.lighthouse,
        validator: ethers.ZeroAddress,
        deadline,
        sender: account,
      };

      try {
        const demand = await this.deps.signer.signDemand({
          ...common,
          role: 'demand',
          validatorFee: 0n,
          nonce: baseNonce + 2n * k,
        });
        const offer = await this.deps.signer.signOffer({
          ...common,
          role: 'offer',
          lighthouseFee: 0n,
          nonce: baseNonce + 2n * k + 1n,
        });
        liability.demand = demand;
        liability.offer = offer;

        const call = { demand: demand.encoded, offer: offer.encoded };
        items.push({
          operation: 'create',
          liability,
          build: (nonce, fees) => this.deps.txFactory.buildCreate(call, nonce, fees),
        });
      } catch (error) {
        if (!(error instanceof SignatureInvalidError)) throw error;
        this.fail(liability, 'abandoned', `signing failed: ${error.message}`);
      }
    }
    return items;
  }

  private async finalizeItems(liabilities: readonly Liability[], tally: RoundTally): Promise<BurstItem[]> {
    const items: BurstItem[] = [];
    for (const liability of liabilities) {
      this.track(liability, tally);
      const address = liability.address;
      if (address === undefined) {
        this.fail(liability, 'failed', 'created without a liability address');
        continue;
      }

      try {
        const signed = await this.deps.signer.signResult(address, liability.result, true);
        items.push({
          operation: 'finalize',
          liability,
          build: (nonce, fees) => this.deps.txFactory.buildFinalize(signed, nonce, fees),
        });
      } catch (error) {
        if (!(error instanceof SignatureInvalidError)) throw error;
        this.fail(liability, 'abandoned', `result signing failed: ${error.message}`);
      }
    }
    return items;
  }

  // ===========================================================================
  // Submission
  // ===========================================================================

  /**
   * Reserve, build and submit one burst, then settle every liability in it.
   */
  private async runBurst(items: readonly BurstItem[], fees: FeeParams, tally: RoundTally): Promise<void> {
    if (items.length === 0) return;

    const reservation = await this.deps.sequencer.reserve(items.length);
    let transactions: SignedTx[];
    try {
      transactions = await Promise.all(items.map((item, i) => item.build(reservation.nonces[i], fees)));
    } catch (error) {
      this.deps.sequencer.releaseUnsent(reservation);
      for (const item of items) {
        if (item.operation === 'create') {
          this.fail(item.liability, 'abandoned', `transaction build failed: ${getErrorMessage(error)}`);
        }
      }
      throw error;
    }

    items.forEach((item, i) => {
      const handle = { hash: transactions[i].hash, nonce: transactions[i].nonce };
      item.liability.reconcileAttempts = 0;
      if (item.operation === 'create') item.liability.createTx = handle;
      else item.liability.finalizeTx = handle;
    });

    const { results, unconfirmed } = await this.deps.sequencer.submitBatch(transactions, {
      confirmationTimeoutMs: this.config.confirmationTimeoutMs,
    });
    tally.transactionsSent += transactions.length;
    tally.confirmationCycles += 1;

    results.forEach((result, i) => this.settle(items[i].operation, items[i].liability, result, tally));

    if (unconfirmed * 2 > transactions.length) {
      const error = new TransportTimeoutError(
        `${unconfirmed} of ${transactions.length} transactions unconfirmed after ${this.config.confirmationTimeoutMs}ms`,
        SERVICE,
        unconfirmed,
        transactions.length
      );
      this.logger.warn('Burst degraded', { round: tally.index, unconfirmed, total: transactions.length });
      if (tally.status === 'completed') {
        tally.status = 'degraded';
        tally.failure = { kind: 'transport-timeout', message: error.message };
      }
    }
  }

  private settle(operation: Operation, liability: Liability, result: SubmissionResult, tally: RoundTally): void {
    switch (result.status) {
      case 'included':
        this.applyReceipt(operation, liability, result.receipt, tally);
        return;
      case 'pending':
        this.logger.debug('Transaction unconfirmed at barrier', { liability: liability.id, operation });
        return;
      case 'transport-failed':
        if (operation === 'create') {
          liability.createTx = undefined;
          this.fail(liability, 'abandoned', `create broadcast failed: ${result.error}`);
        } else {
          liability.finalizeTx = undefined;
          this.fail(liability, 'failed', `finalize broadcast failed: ${result.error}`);
        }
        return;
    }
  }

  private applyReceipt(operation: Operation, liability: Liability, receipt: TxReceipt, tally: RoundTally): void {
    const gasCost = receipt.gasUsed * receipt.effectiveGasPrice;
    liability.gasUsed += receipt.gasUsed;
    liability.gasCostWei += gasCost;
    tally.gasUsed += receipt.gasUsed;
    tally.gasCostWei += gasCost;

    if (receipt.status === 'reverted') {
      this.fail(liability, 'failed', `${operation} reverted in ${receipt.hash}`);
      return;
    }

    this.deps.estimator.observeWei(receipt.effectiveGasPrice);

    if (operation === 'create') {
      const address = this.deps.decoder.createdLiability(receipt);
      if (address === null) {
        this.fail(liability, 'failed', `no NewLiability event in ${receipt.hash}`);
        return;
      }
      liability.address = address;
      transition(liability, 'created');
      return;
    }

    const minted = this.deps.decoder.mintedAmount(receipt);
    liability.minted += minted;
    tally.minted += minted;
    tally.finalized += 1;
    transition(liability, 'finalized');
    this.forget(liability);
  }

  // ===========================================================================
  // Reconciliation
  // ===========================================================================

  /**
   * Re-check transactions left unconfirmed by earlier rounds.
   */
  private async reconcile(tally: RoundTally): Promise<void> {
    for (const liability of this.open.filter(isInFlight)) {
      const operation: Operation = liability.state === 'pending' ? 'create' : 'finalize';
      const handle = operation === 'create' ? liability.createTx : liability.finalizeTx;
      if (!handle) continue;

      this.track(liability, tally);
      const receipt = await this.deps.chain.getReceipt(handle.hash);
      if (receipt) {
        this.applyReceipt(operation, liability, receipt, tally);
        continue;
      }

      liability.reconcileAttempts += 1;
      if (liability.reconcileAttempts >= this.config.maxReconcileAttempts) {
        this.fail(
          liability,
          'abandoned',
          `${operation} ${handle.hash} unconfirmed after ${liability.reconcileAttempts} reconcile attempts`
        );
      }
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Operations the round will spend from the current turn: pipeline creates
   * plus every carried finalize, sequential creates and finalizes plus
   * carried finalizes, batch creates only.
   */
  private requiredFor(request: RoundRequest, kind: RoundKind): number {
    const carried = this.open.filter(awaitsFinalize).length;
    switch (request.mode) {
      case 'pipeline':
        return kind === 'steady'
          ? Math.max(requiredQuota('pipeline', request.batchSize), carried + request.batchSize)
          : requiredQuota('pipeline', request.batchSize);
      case 'sequential':
        return requiredQuota('sequential', request.batchSize) + carried;
      case 'batch':
        return requiredQuota('batch', request.batchSize);
    }
  }

  private kindFor(mode: SchedulingMode): RoundKind {
    if (mode !== 'pipeline') return 'standard';
    return this.open.some(awaitsFinalize) ? 'steady' : 'bootstrap';
  }

  private async claimQuota(): Promise<number> {
    const claim = await this.deps.marker.claim();
    if (claim.status !== 'active') {
      throw new MarkerNotOwnedError(
        `Marker held by ${claim.snapshot.markerHolder} until block ${claim.retryAtBlock}`,
        claim.retryAtBlock,
        SERVICE
      );
    }
    return claim.quota;
  }

  private async reclaimQuota(): Promise<number | null> {
    const claim = await this.deps.marker.claim();
    return claim.status === 'active' ? claim.quota : null;
  }

  private async currentFees(priorityFeeGwei: number): Promise<FeeParams> {
    return feeParams(await this.deps.chain.getGasPrice(), priorityFeeGwei);
  }

  private stageTally(): RoundTally {
    this.staged = this.staged ?? this.startTally();
    return this.staged;
  }

  private startTally(): RoundTally {
    this.roundIndex += 1;
    return {
      index: this.roundIndex,
      touched: new Map(),
      finalized: 0,
      gasUsed: 0n,
      gasCostWei: 0n,
      minted: 0n,
      transactionsSent: 0,
      confirmationCycles: 0,
      status: 'completed',
    };
  }

  private track(liability: Liability, tally: RoundTally): void {
    tally.touched.set(liability.id, liability);
    if (!isTerminal(liability) && !this.open.includes(liability)) {
      this.open.push(liability);
    }
  }

  private forget(liability: Liability): void {
    const i = this.open.indexOf(liability);
    if (i >= 0) this.open.splice(i, 1);
  }

  private fail(liability: Liability, state: 'failed' | 'abandoned', reason: string): void {
    transition(liability, state, reason);
    this.forget(liability);
    this.logger.warn('Liability closed without finalize', { liability: liability.id, state, reason });
  }

  private abort(tally: RoundTally, failure: RoundFailure): void {
    tally.status = 'aborted';
    tally.failure = failure;
    const unsent = [...tally.touched.values()].filter(awaitsCreate).length;
    this.logger.error('Round aborted', {
      round: tally.index,
      kind: failure.kind,
      error: failure.message,
      unsent,
    });
  }

  private closeRound(tally: RoundTally, request: RoundRequest, kind: RoundKind, startedAt: number): Round {
    const liabilities = [...tally.touched.values()].map(snapshot);
    const outcome: RoundOutcome = {
      status: tally.status,
      failure: tally.failure,
      counts: countByState(liabilities),
      finalized: tally.finalized,
      gasUsed: tally.gasUsed,
      gasCostWei: tally.gasCostWei,
      minted: tally.minted,
      transactionsSent: tally.transactionsSent,
      confirmationCycles: tally.confirmationCycles,
    };

    const round: Round = Object.freeze({
      index: tally.index,
      mode: request.mode,
      kind,
      batchSize: request.batchSize,
      liabilities: Object.freeze(liabilities),
      outcome: Object.freeze(outcome),
      startedAt,
      closedAt: Date.now(),
    });

    this.logger.info('Round closed', {
      round: round.index,
      mode: round.mode,
      kind,
      status: outcome.status,
      finalized: outcome.finalized,
      gasUsed: outcome.gasUsed,
      minted: outcome.minted,
      open: this.open.length,
    });
    return round;
  }
}
