/**
 * Uniswap V2 liquidation of XRT into ETH, and the reverse purchase.
 *
 * Quotes through `getAmountsOut` over the XRT -> WETH path and swaps with
 * `swapExactTokensForETH`, bounding proceeds at quote * (1 - slippage).
 * Purchases quote the ETH cost with `getAmountsIn` over WETH -> XRT and send
 * cost * (1 + slippage) through `swapExactETHForTokens`.
 */

import { ethers } from 'ethers';
import { getErrorMessage } from '@xrt-miner/core';
import type { ILogger } from '@xrt-miner/core';
import { SlippageExceededError, TransactionRevertedError } from '@xrt-miner/types';
import type { Address, AmmSwap, BuyResult, SwapResult, TransactionFactory } from '@xrt-miner/types';
import { UNISWAP_V2_ROUTER_ABI } from '../chain/abi';
import type { AccountTransactor } from '../nonce/account-transactor';

const ROUTER_INTERFACE = new ethers.Interface(UNISWAP_V2_ROUTER_ABI);
const SERVICE = 'amm-swap';

/** Revert reason of the router when output falls below amountOutMin */
const INSUFFICIENT_OUTPUT = 'INSUFFICIENT_OUTPUT_AMOUNT';

/** Minimal read access to the router */
export interface RouterReader {
  call(request: { to: Address; data: string }): Promise<string>;
}

export interface UniswapV2SwapConfig {
  router: Address;
  xrt: Address;
  weth: Address;
}

/**
 * quote * (1 - slippage), in basis points to stay in bigint.
 */
export function minimumProceeds(quote: bigint, slippageTolerance: number): bigint {
  const keepBps = BigInt(Math.round((1 - slippageTolerance) * 10_000));
  return (quote * keepBps) / 10_000n;
}

/** quote * (1 + slippage), in basis points */
export function maximumSpend(quote: bigint, slippageTolerance: number): bigint {
  const payBps = BigInt(Math.round((1 + slippageTolerance) * 10_000));
  return (quote * payBps) / 10_000n;
}

export class UniswapV2Swap implements AmmSwap {
  constructor(
    private readonly reader: RouterReader,
    private readonly transactor: AccountTransactor,
    private readonly txFactory: TransactionFactory,
    private readonly config: UniswapV2SwapConfig,
    private readonly logger: ILogger
  ) {}

  async quote(amountIn: bigint): Promise<bigint> {
    if (amountIn === 0n) return 0n;

    const data = ROUTER_INTERFACE.encodeFunctionData('getAmountsOut', [amountIn, [this.config.xrt, this.config.weth]]);
    const raw = await this.reader.call({ to: this.config.router, data });
    const [amounts] = ROUTER_INTERFACE.decodeFunctionResult('getAmountsOut', raw);
    return BigInt(amounts[1].toString());
  }

  /** Wei the router asks for `amountOut` wn */
  async quoteBuy(amountOut: bigint): Promise<bigint> {
    if (amountOut === 0n) return 0n;

    const data = ROUTER_INTERFACE.encodeFunctionData('getAmountsIn', [amountOut, [this.config.weth, this.config.xrt]]);
    const raw = await this.reader.call({ to: this.config.router, data });
    const [amounts] = ROUTER_INTERFACE.decodeFunctionResult('getAmountsIn', raw);
    return BigInt(amounts[0].toString());
  }

  async swap(amountIn: bigint, slippageTolerance: number, deadline: number): Promise<SwapResult> {
    const quoted = await this.quote(amountIn);
    const minProceeds = minimumProceeds(quoted, slippageTolerance);

    this.logger.info('Swapping XRT for ETH', { amountIn, quoted, minProceeds, deadline });

    await this.transactor.ensureAllowance(this.config.router, amountIn, SERVICE);

    let txHash: string;
    try {
      const receipt = await this.transactor.send(
        'swap',
        (nonce, fees) => this.txFactory.buildSwap({ amountIn, minProceeds, deadline }, nonce, fees),
        SERVICE
      );
      txHash = receipt.hash;
    } catch (error) {
      if (error instanceof TransactionRevertedError || getErrorMessage(error).includes(INSUFFICIENT_OUTPUT)) {
        throw new SlippageExceededError(
          `Swap of ${amountIn} wn would return less than ${minProceeds} wei: ${getErrorMessage(error)}`,
          minProceeds
        );
      }
      throw error;
    }

    return { amountIn, proceeds: quoted, minProceeds, txHash };
  }

  /**
   * Buy at least `amountOut` wn. Everything sent is spent, so the account
   * may receive somewhat more than asked.
   *
   * @throws SlippageExceededError when the pool no longer gives amountOut for the value sent
   */
  async buy(amountOut: bigint, slippageTolerance: number, deadline: number): Promise<BuyResult> {
    const quoted = await this.quoteBuy(amountOut);
    const maxSpend = maximumSpend(quoted, slippageTolerance);

    this.logger.info('Buying XRT with ETH', { amountOut, quoted, maxSpend, deadline });

    try {
      const receipt = await this.transactor.send(
        'buy',
        (nonce, fees) => this.txFactory.buildBuy({ amountOut, maxSpend, deadline }, nonce, fees),
        SERVICE
      );
      return { amountOut, quoted, maxSpend, txHash: receipt.hash };
    } catch (error) {
      if (error instanceof TransactionRevertedError || getErrorMessage(error).includes(INSUFFICIENT_OUTPUT)) {
        throw new SlippageExceededError(
          `Purchase of ${amountOut} wn for ${maxSpend} wei reverted: ${getErrorMessage(error)}`,
          amountOut
        );
      }
      throw error;
    }
  }
}
