/**
 * Liquidation Trigger
 *
 * Tracks minted XRT that has not been sold yet and sells it in whole
 * threshold-sized lots once the balance reaches the threshold. A failed
 * sale leaves the balance untouched so the next update tries again. On
 * drain, a remainder below the threshold is swept as a SweepEvent, never
 * as a SaleEvent.
 */

import { WN_PER_XRT } from '@xrt-miner/config';
import { AsyncMutex, getErrorMessage } from '@xrt-miner/core';
import type { ILogger } from '@xrt-miner/core';
import { NetworkError, SlippageExceededError, TransportTimeoutError, ValidationError } from '@xrt-miner/types';
import type { AmmSwap, SaleEvent, SweepEvent } from '@xrt-miner/types';

export interface LiquidationConfig {
  /** Lot size in wn */
  thresholdWn: bigint;
  /** Fraction, e.g. 0.05 */
  slippageTolerance: number;
  /** Swap deadline offset from the latest block timestamp */
  deadlineSeconds: number;
}

export type LiquidationOutcome =
  | { status: 'below-threshold'; balance: bigint }
  | { status: 'sold'; balance: bigint; sale: SaleEvent }
  | { status: 'swept'; balance: bigint; sweep: SweepEvent }
  | { status: 'deferred'; balance: bigint; reason: string };

/** Latest block timestamp in unix seconds */
export type ClockSource = () => Promise<number>;

const SERVICE = 'liquidation-trigger';

/**
 * Largest multiple of the lot size not exceeding the balance.
 */
export function sellableAmount(balance: bigint, threshold: bigint): bigint {
  if (threshold <= 0n) return 0n;
  return (balance / threshold) * threshold;
}

/** wei per whole XRT */
export function realizedPrice(amountWn: bigint, proceedsWei: bigint): bigint {
  return amountWn === 0n ? 0n : (proceedsWei * WN_PER_XRT) / amountWn;
}

function isDeferrable(error: unknown): boolean {
  return (
    error instanceof SlippageExceededError ||
    error instanceof TransportTimeoutError ||
    error instanceof NetworkError
  );
}

export class LiquidationTrigger {
  private readonly mutex = new AsyncMutex();
  private balance = 0n;
  private readonly sales: SaleEvent[] = [];
  private readonly sweeps: SweepEvent[] = [];

  constructor(
    private readonly amm: AmmSwap,
    private readonly config: LiquidationConfig,
    private readonly clock: ClockSource,
    private readonly logger: ILogger
  ) {
    if (config.thresholdWn <= 0n) {
      throw new ValidationError('Liquidation threshold must be positive', SERVICE, 'thresholdWn');
    }
    if (!(config.slippageTolerance >= 0 && config.slippageTolerance < 1)) {
      throw new ValidationError(
        `Slippage tolerance must be in [0, 1), got ${config.slippageTolerance}`,
        SERVICE,
        'slippageTolerance'
      );
    }
  }

  /** Unsold wn */
  get unsold(): bigint {
    return this.balance;
  }

  getSales(): readonly SaleEvent[] {
    return [...this.sales];
  }

  getSweeps(): readonly SweepEvent[] {
    return [...this.sweeps];
  }

  /**
   * Add newly minted wn and sell whole lots when the threshold is reached.
   */
  update(minted: bigint): Promise<LiquidationOutcome> {
    if (minted < 0n) {
      return Promise.reject(new ValidationError(`Minted amount cannot be negative: ${minted}`, SERVICE, 'minted'));
    }
    return this.mutex.runExclusive(async (): Promise<LiquidationOutcome> => {
      this.balance += minted;
      const amount = sellableAmount(this.balance, this.config.thresholdWn);
      if (amount === 0n) {
        return { status: 'below-threshold', balance: this.balance };
      }
      return this.sell(amount);
    });
  }

  /**
   * Sell everything left. A balance of at least one lot is a regular sale;
   * anything smaller is swept.
   */
  sellAll(): Promise<LiquidationOutcome> {
    return this.mutex.runExclusive(async (): Promise<LiquidationOutcome> => {
      if (this.balance === 0n) {
        return { status: 'below-threshold', balance: 0n };
      }
      return this.sell(this.balance);
    });
  }

  private async sell(amount: bigint): Promise<LiquidationOutcome> {
    const sweep = amount < this.config.thresholdWn;
    const deadline = (await this.clock()) + this.config.deadlineSeconds;

    try {
      const result = await this.amm.swap(amount, this.config.slippageTolerance, deadline);
      const sale: SaleEvent = {
        amount,
        proceeds: result.proceeds,
        realizedPrice: realizedPrice(amount, result.proceeds),
        slippageTolerance: this.config.slippageTolerance,
        minProceeds: result.minProceeds,
        txHash: result.txHash,
        timestamp: Date.now(),
      };
      this.balance -= amount;

      this.logger.info(sweep ? 'XRT remainder swept' : 'XRT sold', {
        amount,
        proceeds: sale.proceeds,
        realizedPrice: sale.realizedPrice,
        remaining: this.balance,
      });

      if (sweep) {
        const event: SweepEvent = { ...sale, thresholdWn: this.config.thresholdWn };
        this.sweeps.push(event);
        return { status: 'swept', balance: this.balance, sweep: event };
      }
      this.sales.push(sale);
      return { status: 'sold', balance: this.balance, sale };
    } catch (error) {
      if (!isDeferrable(error)) throw error;

      const reason = getErrorMessage(error);
      this.logger.warn('Sale deferred', { amount, balance: this.balance, reason });
      return { status: 'deferred', balance: this.balance, reason };
    }
  }
}
