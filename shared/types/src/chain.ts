/**
 * Chain collaborator contracts
 *
 * Everything the orchestrator needs from the outside world is expressed here
 * as an interface. Production wiring uses the ethers adapters in
 * services/miner/src/chain; tests use an in-process fake.
 */

import type { LighthouseSnapshot } from './lighthouse';

/** Checksummed or lowercase 0x-prefixed 20-byte address */
export type Address = string;
/** 0x-prefixed hex string */
export type Hex = string;

export interface ReceiptLog {
  address: Address;
  topics: readonly Hex[];
  data: Hex;
}

/**
 * Normalized transaction receipt.
 */
export interface TxReceipt {
  hash: Hex;
  blockNumber: number;
  status: 'success' | 'reverted';
  /** Gas units consumed */
  gasUsed: bigint;
  /** Wei actually charged per gas unit (base fee + effective tip) */
  effectiveGasPrice: bigint;
  logs: readonly ReceiptLog[];
}

export type TxKind = 'create' | 'finalize' | 'refill' | 'withdraw' | 'approve' | 'swap' | 'buy' | 'createLighthouse';

/**
 * A fully signed transaction, ready to broadcast.
 */
export interface SignedTx {
  kind: TxKind;
  nonce: number;
  raw: Hex;
  hash: Hex;
}

/**
 * Per-transaction outcome of a broadcast + barrier wait.
 */
export type SubmissionResult =
  | { status: 'included'; tx: SignedTx; receipt: TxReceipt }
  | { status: 'pending'; tx: SignedTx }
  | { status: 'transport-failed'; tx: SignedTx; error: string };

/**
 * Fee inputs for EIP-1559 transactions, both in wei.
 */
export interface FeeParams {
  gasPriceWei: bigint;
  priorityFeeWei: bigint;
}

/**
 * Read/broadcast access to the ledger.
 */
export interface ChainClient {
  /** Transaction count including mempool ('pending' block tag) */
  getPendingNonce(account: Address): Promise<number>;
  getBlockNumber(): Promise<number>;
  /** Timestamp (unix seconds) of the latest block */
  getLatestTimestamp(): Promise<number>;
  getGasPrice(): Promise<bigint>;
  /** Returns the transaction hash once the node accepted the raw transaction */
  broadcast(raw: Hex): Promise<Hex>;
  /** Resolves null when the transaction is not included within timeoutMs */
  waitForReceipt(hash: Hex, timeoutMs: number): Promise<TxReceipt | null>;
  getReceipt(hash: Hex): Promise<TxReceipt | null>;
  /** Factory SMMA gas price, in wei */
  getAuthoritativeSmma(): Promise<bigint>;
  getLighthouseSnapshot(account: Address): Promise<LighthouseSnapshot>;
  getTokenBalance(account: Address): Promise<bigint>;
  getTokenAllowance(owner: Address, spender: Address): Promise<bigint>;
  getNativeBalance(account: Address): Promise<bigint>;
  /** Next factory message nonce for demand/offer signing */
  getFactoryNonce(account: Address): Promise<bigint>;
  /** Authoritative emission (wn) for the given gas */
  getEmissionForGas(gas: bigint): Promise<bigint>;
  getAuctionFinalPrice(): Promise<bigint>;
  getEthUsdPrice(): Promise<number>;
}

export interface CreateLiabilityCall {
  demand: Hex;
  offer: Hex;
}

export interface FinalizeLiabilityCall {
  liability: Address;
  result: Hex;
  success: boolean;
  signature: Hex;
}

export interface SwapCall {
  amountIn: bigint;
  minProceeds: bigint;
  /** Unix seconds */
  deadline: number;
}

/**
 * ETH -> XRT purchase. The whole `maxSpend` is sent as value; the router
 * reverts when it buys less than `amountOut`.
 */
export interface BuyCall {
  amountOut: bigint;
  maxSpend: bigint;
  /** Unix seconds */
  deadline: number;
}

export interface CreateLighthouseCall {
  name: string;
  /** wn per quota unit */
  minimalStake: bigint;
  timeoutBlocks: number;
}

/**
 * Builds and signs account transactions for a given nonce.
 * Never picks a nonce itself: nonces come from the sequencer.
 */
export interface TransactionFactory {
  readonly account: Address;
  buildCreate(call: CreateLiabilityCall, nonce: number, fees: FeeParams): Promise<SignedTx>;
  buildFinalize(call: FinalizeLiabilityCall, nonce: number, fees: FeeParams): Promise<SignedTx>;
  buildRefill(amount: bigint, nonce: number, fees: FeeParams): Promise<SignedTx>;
  buildWithdraw(amount: bigint, nonce: number, fees: FeeParams): Promise<SignedTx>;
  buildApprove(spender: Address, amount: bigint, nonce: number, fees: FeeParams): Promise<SignedTx>;
  buildSwap(call: SwapCall, nonce: number, fees: FeeParams): Promise<SignedTx>;
  buildBuy(call: BuyCall, nonce: number, fees: FeeParams): Promise<SignedTx>;
  buildCreateLighthouse(call: CreateLighthouseCall, nonce: number, fees: FeeParams): Promise<SignedTx>;
}

/**
 * Extracts protocol events from receipts.
 */
export interface ReceiptDecoder {
  /** Address from the factory NewLiability event, null when absent */
  createdLiability(receipt: TxReceipt): Address | null;
  /** Address from the factory NewLighthouse event, null when absent */
  createdLighthouse(receipt: TxReceipt): Address | null;
  /** Sum of XRT Transfer amounts in the receipt */
  mintedAmount(receipt: TxReceipt): bigint;
}

export interface SwapResult {
  amountIn: bigint;
  proceeds: bigint;
  minProceeds: bigint;
  txHash: Hex;
}

export interface BuyResult {
  amountOut: bigint;
  /** Router quote for amountOut, in wei */
  quoted: bigint;
  /** Value sent with the swap, in wei */
  maxSpend: bigint;
  txHash: Hex;
}

/**
 * AMM used to liquidate minted tokens.
 */
export interface AmmSwap {
  /** Expected proceeds (wei) for amountIn (wn) at current reserves */
  quote(amountIn: bigint): Promise<bigint>;
  /**
   * @param slippageTolerance - fraction, e.g. 0.05 for 5%
   * @param deadline - unix seconds
   * @throws SlippageExceededError when the pool would return less than the bound
   */
  swap(amountIn: bigint, slippageTolerance: number, deadline: number): Promise<SwapResult>;
}
