/**
 * EIP-1559 fee derivation.
 */

import { MIN_MAX_FEE_WEI, gweiToWei } from '@xrt-miner/config';
import type { FeeParams } from '@xrt-miner/types';

export interface Eip1559Fees {
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
}

/**
 * maxFee = max(gasPrice + priority, 1 gwei); the priority fee never exceeds maxFee.
 */
export function computeEip1559Fees(fees: FeeParams): Eip1559Fees {
  const sum = fees.gasPriceWei + fees.priorityFeeWei;
  const maxFeePerGas = sum > MIN_MAX_FEE_WEI ? sum : MIN_MAX_FEE_WEI;
  const maxPriorityFeePerGas = fees.priorityFeeWei < maxFeePerGas ? fees.priorityFeeWei : maxFeePerGas;
  return { maxFeePerGas, maxPriorityFeePerGas };
}

export function feeParams(gasPriceWei: bigint, priorityFeeGwei: number): FeeParams {
  return { gasPriceWei, priorityFeeWei: gweiToWei(priorityFeeGwei) };
}
