/**
 * Quota/Marker Tracker
 *
 * The lighthouse hands its marker round-robin to registered providers. Only
 * the marker holder may submit, and only up to its remaining quota. Once
 * `timeoutBlocks` have passed since the last lighthouse operation
 * (`currentBlock >= keepAliveBlock + timeoutBlocks + 1`) any provider may
 * take the marker with a fresh quota of `stake / minimalStake`.
 *
 * State: not-owner -> active | waiting-timeout. Snapshots are read fresh on
 * every claim and never reused across an await.
 */

import { sleep } from '@xrt-miner/core';
import type { ILogger } from '@xrt-miner/core';
import { MarkerNotOwnedError } from '@xrt-miner/types';
import type { Address, ChainClient, ClaimResult, LighthouseSnapshot, MarkerState } from '@xrt-miner/types';

export interface MarkerTrackerConfig {
  blockTimeMs: number;
  maxReclaimAttempts: number;
}

export type WaitFn = (ms: number, signal?: AbortSignal) => Promise<void>;

function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** First block at which the previous holder's turn has timed out */
export function timeoutBlock(snapshot: LighthouseSnapshot): number {
  return snapshot.keepAliveBlock + snapshot.timeoutBlocks + 1;
}

export function hasTimedOut(snapshot: LighthouseSnapshot): boolean {
  return snapshot.currentBlock >= timeoutBlock(snapshot);
}

/** Operations per full turn for this account's stake */
export function turnCapacity(snapshot: LighthouseSnapshot): number {
  if (snapshot.minimalStake === 0n) return snapshot.quota;
  return Number(snapshot.stake / snapshot.minimalStake);
}

export class MarkerTracker {
  private state: MarkerState = 'not-owner';
  private lastRetryAtBlock: number | null = null;

  constructor(
    private readonly chain: ChainClient,
    private readonly account: Address,
    private readonly config: MarkerTrackerConfig,
    private readonly logger: ILogger,
    private readonly wait: WaitFn = sleep
  ) {}

  getState(): MarkerState {
    return this.state;
  }

  /** Block the last claim asked to retry at, null unless waiting */
  getRetryAtBlock(): number | null {
    return this.lastRetryAtBlock;
  }

  snapshot(): Promise<LighthouseSnapshot> {
    return this.chain.getLighthouseSnapshot(this.account);
  }

  holdsMarker(snapshot: LighthouseSnapshot): boolean {
    return snapshot.markerHolder !== null && sameAddress(snapshot.markerHolder, this.account);
  }

  /**
   * Operations this account can submit in its current (or next claimable) turn.
   */
  availableQuota(snapshot: LighthouseSnapshot): number {
    if (this.holdsMarker(snapshot) && snapshot.quota > 0 && !hasTimedOut(snapshot)) {
      return snapshot.quota;
    }
    return turnCapacity(snapshot);
  }

  /**
   * Read a fresh snapshot and decide whether this account may submit.
   *
   * @throws MarkerNotOwnedError when the account is not a registered provider
   */
  async claim(): Promise<ClaimResult> {
    const snapshot = await this.snapshot();
    return this.evaluate(snapshot);
  }

  evaluate(snapshot: LighthouseSnapshot): ClaimResult {
    if (snapshot.providerIndex === null) {
      this.transition('not-owner');
      this.lastRetryAtBlock = null;
      throw new MarkerNotOwnedError(`${this.account} is not a provider of lighthouse ${snapshot.address}`, null);
    }

    const holds = this.holdsMarker(snapshot);
    const claimable = snapshot.markerHolder === null || hasTimedOut(snapshot) || (holds && snapshot.quota > 0);

    if (claimable) {
      this.transition('active');
      this.lastRetryAtBlock = null;
      return { status: 'active', snapshot, quota: this.availableQuota(snapshot) };
    }

    const retryAtBlock = timeoutBlock(snapshot);
    this.transition('waiting-timeout');
    this.lastRetryAtBlock = retryAtBlock;
    this.logger.info('Marker held elsewhere, waiting for timeout', {
      holder: snapshot.markerHolder,
      currentBlock: snapshot.currentBlock,
      retryAtBlock,
    });
    return { status: 'retry-later', snapshot, retryAtBlock };
  }

  /**
   * Wait out the holder's timeout window and claim again, up to
   * `maxReclaimAttempts` times.
   *
   * @throws MarkerNotOwnedError when every attempt still finds the marker held
   */
  async waitAndReclaim(signal?: AbortSignal): Promise<Extract<ClaimResult, { status: 'active' }>> {
    for (let attempt = 1; attempt <= this.config.maxReclaimAttempts; attempt++) {
      const result = await this.claim();
      if (result.status === 'active') {
        return result;
      }

      const blocks = Math.max(1, result.retryAtBlock - result.snapshot.currentBlock);
      this.logger.info('Waiting before marker reclaim', { attempt, blocks, retryAtBlock: result.retryAtBlock });
      await this.wait(blocks * this.config.blockTimeMs, signal);
    }

    const final = await this.claim();
    if (final.status === 'active') {
      return final;
    }
    throw new MarkerNotOwnedError(
      `Marker still held by ${final.snapshot.markerHolder} after ${this.config.maxReclaimAttempts} reclaim attempts`,
      final.retryAtBlock
    );
  }

  /**
   * @throws MarkerNotOwnedError unless the last claim made this account active
   */
  requireActive(): void {
    if (this.state !== 'active') {
      throw new MarkerNotOwnedError(`Marker not owned (state ${this.state})`, this.lastRetryAtBlock);
    }
  }

  private transition(next: MarkerState): void {
    if (next !== this.state) {
      this.logger.debug('Marker state change', { from: this.state, to: next });
      this.state = next;
    }
  }
}
