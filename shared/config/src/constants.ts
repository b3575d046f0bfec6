/**
 * Protocol Constants
 *
 * Values fixed by the factory and lighthouse contracts, or observed on
 * mainnet, that the miner's arithmetic depends on.
 */

// =============================================================================
// Token
// =============================================================================

/** wn (smallest XRT unit) per whole XRT */
export const WN_PER_XRT = 1_000_000_000n;

// =============================================================================
// Emission
// =============================================================================

/** Period of the factory's smoothed moving average of gas prices */
export const SMMA_PERIOD = 1000;

// =============================================================================
// Gas
// =============================================================================

/** Gas observed per createLiability */
export const GAS_PER_CREATE = 790_000n;
/** Gas observed per finalizeLiability */
export const GAS_PER_FINALIZE = 268_000n;
export const GAS_PER_LIABILITY = GAS_PER_CREATE + GAS_PER_FINALIZE;
/** Gas assumed for one create/finalize cycle in profitability checks */
export const ESTIMATED_GAS_PER_CYCLE = 1_100_000n;

/** Gas limits per transaction kind */
export const GAS_LIMITS = {
  create: 1_500_000n,
  finalize: 400_000n,
  refill: 200_000n,
  withdraw: 100_000n,
  approve: 60_000n,
  swap: 200_000n,
  buy: 200_000n,
  createLighthouse: 1_500_000n,
} as const;

/** Floor for maxFeePerGas */
export const MIN_MAX_FEE_WEI = 1_000_000_000n;

// =============================================================================
// Chain
// =============================================================================

export const MAINNET_CHAIN_ID = 1;
export const BLOCK_TIME_MS = 12_000;
/** Chainlink ETH/USD answer scale */
export const CHAINLINK_USD_DECIMALS = 8;
/** Blocks a signed demand/offer stays valid in pipeline and batch rounds */
export const DEFAULT_DEADLINE_BLOCKS = 300;
/** Random model, objective and result payload length in bytes */
export const PAYLOAD_BYTES = 34;
