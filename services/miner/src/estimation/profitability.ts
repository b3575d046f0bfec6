/**
 * Profitability assessment
 *
 * margin = (revenue - cost) / cost, where revenue is the emission valued at
 * the AMM price and cost is the gas paid for it.
 *
 *   margin >= minMargin       profitable
 *   0 <= margin < minMargin   marginal
 *   margin < 0                unprofitable
 */

import { ESTIMATED_GAS_PER_CYCLE, GAS_PER_LIABILITY, WN_PER_XRT } from '@xrt-miner/config';
import type { ILogger } from '@xrt-miner/core';
import type { AmmSwap, ChainClient, Profitability } from '@xrt-miner/types';

export interface ProfitabilityOptions {
  minMargin: number;
}

export interface ProfitabilityReport {
  gasPriceWei: bigint;
  gasEstimate: bigint;
  gasCostWei: bigint;
  emissionWn: bigint;
  revenueWei: bigint;
  /** wei per whole XRT */
  marketPriceWei: bigint;
  profitability: Profitability;
}

/**
 * @param emissionWn - wn minted
 * @param marketPriceWei - wei per whole XRT
 * @param gasCostWei - wei paid for the gas that minted it
 */
export function estimateProfitability(
  emissionWn: bigint,
  marketPriceWei: bigint,
  gasCostWei: bigint,
  options: ProfitabilityOptions
): Profitability {
  const revenue = (emissionWn * marketPriceWei) / WN_PER_XRT;

  if (gasCostWei === 0n) {
    return revenue > 0n ? { verdict: 'profitable', margin: 0 } : { verdict: 'marginal', margin: 0 };
  }

  const margin = Number(revenue - gasCostWei) / Number(gasCostWei);
  if (margin >= options.minMargin) return { verdict: 'profitable', margin };
  if (margin >= 0) return { verdict: 'marginal', margin };
  return { verdict: 'unprofitable', margin };
}

/**
 * USD cost of one create + finalize at the given gas price.
 */
export function costPerLiabilityUsd(gasPriceWei: bigint, ethUsd: number): number {
  return (Number(gasPriceWei * GAS_PER_LIABILITY) / 1e18) * ethUsd;
}

/**
 * Live check against the factory's authoritative emission and the AMM quote.
 */
export class ProfitabilityEstimator {
  constructor(
    private readonly chain: ChainClient,
    private readonly amm: AmmSwap,
    private readonly options: ProfitabilityOptions,
    private readonly logger: ILogger
  ) {}

  async assess(gasEstimate: bigint = ESTIMATED_GAS_PER_CYCLE): Promise<ProfitabilityReport> {
    const [gasPriceWei, emissionWn, marketPriceWei] = await Promise.all([
      this.chain.getGasPrice(),
      this.chain.getEmissionForGas(gasEstimate),
      this.amm.quote(WN_PER_XRT),
    ]);

    const gasCostWei = gasPriceWei * gasEstimate;
    const revenueWei = (emissionWn * marketPriceWei) / WN_PER_XRT;
    const profitability = estimateProfitability(emissionWn, marketPriceWei, gasCostWei, this.options);

    this.logger.debug('Profitability assessed', {
      gasPriceWei,
      emissionWn,
      revenueWei,
      gasCostWei,
      verdict: profitability.verdict,
      margin: profitability.margin,
    });

    return { gasPriceWei, gasEstimate, gasCostWei, emissionWn, revenueWei, marketPriceWei, profitability };
  }
}
