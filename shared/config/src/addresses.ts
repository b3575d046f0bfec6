/**
 * Canonical Contract Addresses (Ethereum mainnet)
 *
 * ```typescript
 * import { MAINNET_ADDRESSES } from '@xrt-miner/config';
 *
 * const router = MAINNET_ADDRESSES.uniswapV2Router;
 * ```
 */

export const MAINNET_ADDRESSES = {
  /** Liability factory (v1.0): nonceOf, gasPrice, wnFromGas */
  factory: '0x7e384ad1fe06747594a6102ee5b377b273dc1225',
  xrt: '0x7de91b204c1c737bcee6f000aaa6569cf7061cb7',
  weth: '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2',
  uniswapV2Router: '0x7a250d5630B4cF539739dF2C5dAcb4c659F2488D',
  chainlinkEthUsd: '0x5f4eC3Df9cbd43714FE2740f5E3616155c5b8419',
  /** Dutch auction that fixed the emission constant (finalPrice) */
  auction: '0x86da63b3341924c88baa5adbb2b8f930cc02e586',
} as const;

export type ContractName = keyof typeof MAINNET_ADDRESSES;
