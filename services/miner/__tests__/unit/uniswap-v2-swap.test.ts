/**
 * UniswapV2Swap Unit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { WN_PER_XRT } from '@xrt-miner/config';
import { SlippageExceededError } from '@xrt-miner/types';
import { maximumSpend, minimumProceeds } from '../../src/swap/uniswap-v2-swap';
import { ADDRESSES } from '../helpers/fake-chain';
import { createHarness } from '../helpers/miner-harness';
import type { Harness } from '../helpers/miner-harness';

const PRICE = 10_000_000_000_000_000n;

describe('minimumProceeds', () => {
  it('should take the slippage off the quote', () => {
    expect(minimumProceeds(1000n, 0.05)).toBe(950n);
    expect(minimumProceeds(1000n, 0)).toBe(1000n);
    expect(minimumProceeds(999n, 0.005)).toBe(994n);
  });
});

describe('maximumSpend', () => {
  it('should add the slippage to the quote', () => {
    expect(maximumSpend(1000n, 0.05)).toBe(1050n);
    expect(maximumSpend(1000n, 0)).toBe(1000n);
    expect(maximumSpend(999n, 0.005)).toBe(1003n);
  });
});

describe('UniswapV2Swap', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness({ chain: { xrtPriceWei: PRICE } });
    h.chain.setTokenBalance(h.account, 10n * WN_PER_XRT);
  });

  it('should quote through the router', async () => {
    expect(await h.amm.quote(2n * WN_PER_XRT)).toBe(2n * PRICE);
    expect(await h.amm.quote(0n)).toBe(0n);
  });

  it('should approve the router and swap', async () => {
    const deadline = h.chain.timestamp + 300;

    const result = await h.amm.swap(2n * WN_PER_XRT, 0.05, deadline);

    expect(result).toMatchObject({
      amountIn: 2n * WN_PER_XRT,
      proceeds: 2n * PRICE,
      minProceeds: 19_000_000_000_000_000n,
    });
    expect(h.chain.mined.map(tx => tx.method)).toEqual(['approve', 'swapExactTokensForETH']);
    expect(result.txHash).toBe(h.chain.mined[1].hash);
    expect(await h.chain.getTokenBalance(h.account)).toBe(8n * WN_PER_XRT);
  });

  it('should reuse an existing allowance', async () => {
    h.chain.setAllowance(h.account, ADDRESSES.router, 100n * WN_PER_XRT);

    await h.amm.swap(WN_PER_XRT, 0.05, h.chain.timestamp + 300);

    expect(h.chain.mined.map(tx => tx.method)).toEqual(['swapExactTokensForETH']);
  });

  it('should report a swap reverted by the output bound as slippage', async () => {
    // Pool moved 10% against the quote
    h.chain.executionPriceWei = 9_000_000_000_000_000n;

    const error = await h.amm.swap(2n * WN_PER_XRT, 0.05, h.chain.timestamp + 300).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SlippageExceededError);
    expect(error).toMatchObject({ minProceeds: 19_000_000_000_000_000n });
    expect(await h.chain.getTokenBalance(h.account)).toBe(10n * WN_PER_XRT);
  });

  describe('buy', () => {
    it('should quote the ETH cost through the router', async () => {
      expect(await h.amm.quoteBuy(2n * WN_PER_XRT)).toBe(2n * PRICE);
      expect(await h.amm.quoteBuy(0n)).toBe(0n);
    });

    it('should send the quote plus slippage and receive the tokens', async () => {
      const deadline = h.chain.timestamp + 300;

      const result = await h.amm.buy(2n * WN_PER_XRT, 0.05, deadline);

      expect(result).toMatchObject({
        amountOut: 2n * WN_PER_XRT,
        quoted: 2n * PRICE,
        maxSpend: 21_000_000_000_000_000n,
      });
      const [buy] = h.chain.mined;
      expect(h.chain.mined.map(tx => tx.method)).toEqual(['swapExactETHForTokens']);
      expect(buy.value).toBe(21_000_000_000_000_000n);
      expect(buy.args[0]).toBe(2n * WN_PER_XRT);
      expect([...buy.args[1]]).toEqual([ADDRESSES.weth, ADDRESSES.xrt]);
      expect(result.txHash).toBe(buy.hash);
      // The whole value is spent: 0.021 ETH buys 2.1 XRT
      expect(await h.chain.getTokenBalance(h.account)).toBe(12_100_000_000n);
      expect(await h.chain.getNativeBalance(h.account)).toBe(979_000_000_000_000_000n);
    });

    it('should report a purchase reverted by the output bound as slippage', async () => {
      h.chain.executionPriceWei = 11_000_000_000_000_000n;

      const error = await h.amm.buy(2n * WN_PER_XRT, 0.05, h.chain.timestamp + 300).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SlippageExceededError);
      expect(error).toMatchObject({ minProceeds: 2n * WN_PER_XRT });
      expect(await h.chain.getTokenBalance(h.account)).toBe(10n * WN_PER_XRT);
      expect(await h.chain.getNativeBalance(h.account)).toBe(10n ** 18n);
    });
  });
});
