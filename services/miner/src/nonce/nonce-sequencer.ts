/**
 * Nonce Sequencer
 *
 * Single owner of the account's transaction nonces. Every transaction the
 * miner sends (liability bursts, stake top-ups, approvals, swaps) takes its
 * nonce from here, so nonces within one ledger epoch are strictly increasing
 * and never reused.
 *
 * Reservation is serialized by a mutex and compares the chain's pending
 * transaction count with the ledger before allocating. A mismatch puts the
 * ledger into `conflict`, and every later reservation fails until `resync()`
 * anchors a new epoch.
 *
 * Submission broadcasts a whole burst without waiting in between, then
 * performs a single bounded barrier wait over all receipts.
 */

import { AsyncMutex, getErrorMessage } from '@xrt-miner/core';
import type { ILogger } from '@xrt-miner/core';
import { LifecycleError, NonceConflictError } from '@xrt-miner/types';
import type {
  Address,
  ChainClient,
  NonceLedger,
  NonceReservation,
  SignedTx,
  SubmissionResult,
  TxReceipt,
} from '@xrt-miner/types';

// =============================================================================
// Types
// =============================================================================

export interface NonceSequencerConfig {
  /** Default barrier wait per burst */
  confirmationTimeoutMs: number;
}

export interface SubmitOptions {
  confirmationTimeoutMs?: number;
}

export interface BatchSubmission {
  results: SubmissionResult[];
  /** Transactions without a receipt after the barrier (pending or never broadcast) */
  unconfirmed: number;
}

const SERVICE = 'nonce-sequencer';

// =============================================================================
// NonceSequencer Implementation
// =============================================================================

export class NonceSequencer {
  private readonly mutex = new AsyncMutex();
  private ledger: NonceLedger;
  /** Chain count seen when the ledger entered conflict */
  private conflictObserved: number | null = null;
  /** Nonces reserved in the current epoch and not yet broadcast */
  private readonly outstanding = new Set<number>();

  constructor(
    private readonly chain: ChainClient,
    account: Address,
    private readonly config: NonceSequencerConfig,
    private readonly logger: ILogger
  ) {
    this.ledger = { account, next: 0, status: 'unsynced', epoch: 0, issued: 0 };
  }

  get account(): Address {
    return this.ledger.account;
  }

  getLedger(): Readonly<NonceLedger> {
    return { ...this.ledger };
  }

  // ===========================================================================
  // Synchronization
  // ===========================================================================

  /**
   * Anchor the ledger at the chain's pending transaction count.
   */
  sync(): Promise<Readonly<NonceLedger>> {
    return this.mutex.runExclusive(() => this.anchor('sync'));
  }

  /**
   * Start a new epoch from the chain's pending count. Clears a conflict.
   */
  resync(reason = 'resync'): Promise<Readonly<NonceLedger>> {
    return this.mutex.runExclusive(() => this.anchor(reason));
  }

  /**
   * Reserved nonces could not all be turned into broadcast transactions.
   * The next reservation re-anchors instead of trusting the ledger.
   */
  markDesynced(reason: string): void {
    if (this.ledger.status === 'conflict') return;

    this.logger.warn('Nonce ledger desynced', { reason, next: this.ledger.next, epoch: this.ledger.epoch });
    this.ledger = { ...this.ledger, status: 'unsynced' };
  }

  private async anchor(reason: string): Promise<Readonly<NonceLedger>> {
    const pending = await this.chain.getPendingNonce(this.ledger.account);
    const previous = this.ledger;

    this.ledger = {
      account: previous.account,
      next: pending,
      status: 'synced',
      epoch: previous.epoch + 1,
      issued: previous.issued,
    };
    this.conflictObserved = null;
    this.outstanding.clear();

    this.logger.info('Nonce ledger anchored', {
      reason,
      next: pending,
      epoch: this.ledger.epoch,
      previousNext: previous.next,
    });
    return { ...this.ledger };
  }

  // ===========================================================================
  // Reservation
  // ===========================================================================

  /**
   * Allocate `count` consecutive nonces.
   *
   * @throws NonceConflictError when the chain disagrees with the ledger, or
   *   while the ledger is in conflict
   */
  reserve(count: number): Promise<NonceReservation> {
    if (!Number.isInteger(count) || count < 1) {
      return Promise.reject(new LifecycleError(`Cannot reserve ${count} nonces`, SERVICE));
    }

    return this.mutex.runExclusive(async () => {
      if (this.ledger.status === 'conflict') {
        throw new NonceConflictError(this.ledger.account, this.ledger.next, this.conflictObserved ?? this.ledger.next);
      }
      if (this.ledger.status === 'unsynced') {
        await this.anchor(this.ledger.epoch === 0 ? 'initial sync' : 'desynced');
      }

      const observed = await this.chain.getPendingNonce(this.ledger.account);
      if (observed !== this.ledger.next) {
        this.ledger = { ...this.ledger, status: 'conflict' };
        this.conflictObserved = observed;
        this.logger.error('Nonce conflict detected', {
          expected: this.ledger.next,
          observed,
          epoch: this.ledger.epoch,
        });
        throw new NonceConflictError(this.ledger.account, this.ledger.next, observed);
      }

      const first = this.ledger.next;
      const nonces = Array.from({ length: count }, (_, i) => first + i);
      for (const nonce of nonces) {
        this.outstanding.add(nonce);
      }
      this.ledger = { ...this.ledger, next: first + count, issued: this.ledger.issued + count };

      this.logger.debug('Nonces reserved', { first, count, epoch: this.ledger.epoch });
      return { account: this.ledger.account, epoch: this.ledger.epoch, nonces };
    });
  }

  // ===========================================================================
  // Submission
  // ===========================================================================

  /**
   * Broadcast every transaction in order, then wait once for all receipts.
   * A broadcast failure does not stop the rest of the burst.
   */
  async submitBatch(transactions: readonly SignedTx[], options: SubmitOptions = {}): Promise<BatchSubmission> {
    this.claimForBroadcast(transactions);

    const broadcast: Array<{ tx: SignedTx; hash: string | null; error?: string }> = [];
    for (const tx of transactions) {
      try {
        const hash = await this.chain.broadcast(tx.raw);
        broadcast.push({ tx, hash });
      } catch (error) {
        const message = getErrorMessage(error);
        this.logger.warn('Broadcast failed', { kind: tx.kind, nonce: tx.nonce, error: message });
        broadcast.push({ tx, hash: null, error: message });
      }
    }

    if (broadcast.some(entry => entry.hash === null)) {
      this.markDesynced('broadcast failure left a nonce gap');
    }

    const timeoutMs = options.confirmationTimeoutMs ?? this.config.confirmationTimeoutMs;
    const receipts = await Promise.all(
      broadcast.map(entry => (entry.hash === null ? Promise.resolve(null) : this.awaitReceipt(entry.hash, timeoutMs)))
    );

    const results: SubmissionResult[] = broadcast.map((entry, i) => {
      const receipt = receipts[i];
      if (entry.hash === null) {
        return { status: 'transport-failed', tx: entry.tx, error: entry.error ?? 'broadcast failed' };
      }
      if (receipt) {
        return { status: 'included', tx: entry.tx, receipt };
      }
      return { status: 'pending', tx: entry.tx };
    });

    const unconfirmed = results.filter(r => r.status !== 'included').length;
    this.logger.debug('Burst settled', { size: transactions.length, unconfirmed, timeoutMs });
    return { results, unconfirmed };
  }

  /**
   * Reserve one nonce, build the transaction for it and submit it.
   */
  async sendOne(build: (nonce: number) => Promise<SignedTx>, options: SubmitOptions = {}): Promise<SubmissionResult> {
    const reservation = await this.reserve(1);
    const [nonce] = reservation.nonces;

    let tx: SignedTx;
    try {
      tx = await build(nonce);
    } catch (error) {
      this.releaseUnsent(reservation);
      throw error;
    }

    const { results } = await this.submitBatch([tx], options);
    return results[0];
  }

  /**
   * Give back reserved nonces that will never be broadcast. Only the last
   * reservation can be rolled back cleanly; anything else leaves a gap.
   */
  releaseUnsent(reservation: NonceReservation): void {
    const unsent = reservation.nonces.filter(nonce => this.outstanding.has(nonce));
    if (unsent.length === 0 || reservation.epoch !== this.ledger.epoch) return;

    for (const nonce of unsent) {
      this.outstanding.delete(nonce);
    }

    const first = unsent[0];
    const contiguousTail = unsent.every((nonce, i) => nonce === first + i) && first + unsent.length === this.ledger.next;
    if (contiguousTail && this.ledger.status === 'synced') {
      this.ledger = { ...this.ledger, next: first, issued: this.ledger.issued - unsent.length };
      this.logger.debug('Unsent nonces released', { first, count: unsent.length });
    } else {
      this.markDesynced(`${unsent.length} reserved nonces were never broadcast`);
    }
  }

  private claimForBroadcast(transactions: readonly SignedTx[]): void {
    for (const tx of transactions) {
      if (!this.outstanding.has(tx.nonce)) {
        throw new LifecycleError(
          `Nonce ${tx.nonce} was not reserved in epoch ${this.ledger.epoch} or was already submitted`,
          SERVICE
        );
      }
    }
    for (const tx of transactions) {
      this.outstanding.delete(tx.nonce);
    }
  }

  private async awaitReceipt(hash: string, timeoutMs: number): Promise<TxReceipt | null> {
    try {
      return await this.chain.waitForReceipt(hash, timeoutMs);
    } catch (error) {
      this.logger.warn('Receipt wait failed, treating as unconfirmed', { hash, error: getErrorMessage(error) });
      return null;
    }
  }
}
