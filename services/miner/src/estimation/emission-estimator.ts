/**
 * Emission Estimator
 *
 * Local replica of the factory's smoothed moving average (SMMA) of gas
 * prices, which sets how much XRT a unit of gas mints:
 *
 *   smma' = (smma * (P - 1) + price) / P
 *
 * Every included create/finalize feeds its effective gas price in through
 * `observe()`. The replica drifts (other users' transactions update the
 * factory too), so it is periodically replaced by the authoritative value.
 * Estimates are advisory; accounting always uses receipts.
 *
 * Values are gwei as plain numbers; the factory reports wei.
 */

import type { ILogger } from '@xrt-miner/core';
import { ValidationError } from '@xrt-miner/types';
import type { ChainClient, SmmaState } from '@xrt-miner/types';

export interface EmissionEstimatorConfig {
  period: number;
  /** Resync after this many local observations */
  resyncEveryObservations: number;
  /** Resync when the last authoritative read is older than this */
  maxStalenessMs: number;
}

const WEI_PER_GWEI = 1_000_000_000;
const SERVICE = 'emission-estimator';

export function weiToGwei(wei: bigint): number {
  return Number(wei) / WEI_PER_GWEI;
}

/**
 * SMMA after `updates` observations all at `price`:
 * price + (start - price) * (1 - 1/P)^updates
 */
export function projectSmma(start: number, price: number, updates: number, period: number): number {
  return price + (start - price) * Math.pow(1 - 1 / period, updates);
}

/**
 * Rounds for the distance to a constant price to halve, with N updates per
 * round: ln 2 / (N * -ln(1 - 1/P)), roughly ln(2) * P / N.
 */
export function halfLifeRounds(updatesPerRound: number, period: number): number {
  return Math.LN2 / (updatesPerRound * -Math.log(1 - 1 / period));
}

/**
 * wn minted for `gasUsed` at the given SMMA:
 * gas * smma(wei) * 1e9 / auctionFinalPrice
 */
export function estimateEmission(gasUsed: bigint, smmaGwei: number, auctionFinalPrice: bigint): bigint {
  if (auctionFinalPrice <= 0n) {
    throw new ValidationError('Auction final price must be positive', SERVICE, 'auctionFinalPrice');
  }
  const smmaWei = BigInt(Math.round(smmaGwei * WEI_PER_GWEI));
  return (gasUsed * smmaWei * 1_000_000_000n) / auctionFinalPrice;
}

export class EmissionEstimator {
  private state: SmmaState;

  constructor(
    private readonly chain: ChainClient,
    private readonly config: EmissionEstimatorConfig,
    private readonly logger: ILogger,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isInteger(config.period) || config.period < 2) {
      throw new ValidationError(`SMMA period must be an integer >= 2, got ${config.period}`, SERVICE, 'period');
    }
    this.state = { value: 0, period: config.period, lastResync: null, observationsSinceResync: 0 };
  }

  getState(): SmmaState {
    return {
      ...this.state,
      lastResync: this.state.lastResync ? { ...this.state.lastResync } : null,
    };
  }

  get value(): number {
    return this.state.value;
  }

  /**
   * Fold one effective gas price (gwei) into the local SMMA.
   */
  observe(priceGwei: number): number {
    if (!Number.isFinite(priceGwei) || priceGwei < 0) {
      throw new ValidationError(`Invalid gas price observation: ${priceGwei}`, SERVICE, 'priceGwei');
    }
    const p = this.state.period;
    const value = (this.state.value * (p - 1) + priceGwei) / p;
    this.state = {
      ...this.state,
      value,
      observationsSinceResync: this.state.observationsSinceResync + 1,
    };
    return value;
  }

  observeWei(priceWei: bigint): number {
    return this.observe(weiToGwei(priceWei));
  }

  /**
   * Replace the local value with the factory's. Idempotent when nothing
   * happened in between.
   */
  async resync(): Promise<SmmaState> {
    const authoritative = weiToGwei(await this.chain.getAuthoritativeSmma());
    const drift = authoritative - this.state.value;

    this.state = {
      ...this.state,
      value: authoritative,
      lastResync: { at: this.now(), value: authoritative },
      observationsSinceResync: 0,
    };

    this.logger.debug('SMMA resynced', { smmaGwei: authoritative, drift });
    return this.getState();
  }

  needsResync(now: number = this.now()): boolean {
    const last = this.state.lastResync;
    if (last === null) return true;
    if (this.state.observationsSinceResync >= this.config.resyncEveryObservations) return true;
    return now - last.at >= this.config.maxStalenessMs;
  }

  /**
   * SMMA after `updates` further observations at `priceGwei`.
   */
  project(priceGwei: number, updates: number): number {
    return projectSmma(this.state.value, priceGwei, updates, this.state.period);
  }

  /**
   * Observations at `priceGwei` needed for the SMMA to reach `goalGwei`.
   * Infinity when the goal lies beyond the price.
   */
  updatesToReach(priceGwei: number, goalGwei: number): number {
    const start = this.state.value;
    if (start === goalGwei) return 0;
    const ratio = (goalGwei - priceGwei) / (start - priceGwei);
    if (!(ratio > 0 && ratio < 1)) {
      return Number.POSITIVE_INFINITY;
    }
    return Math.ceil(Math.log(ratio) / Math.log(1 - 1 / this.state.period));
  }

  halfLifeRounds(updatesPerRound: number): number {
    return halfLifeRounds(updatesPerRound, this.state.period);
  }

  estimateEmission(gasUsed: bigint, auctionFinalPrice: bigint): bigint {
    return estimateEmission(gasUsed, this.state.value, auctionFinalPrice);
  }
}
