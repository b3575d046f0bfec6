/**
 * Mining session integration tests
 *
 * Full sessions over the in-process chain: stake and quota limits, transport
 * backoff, and steady-state mining with liquidation.
 */

import { describe, it, expect, jest } from '@jest/globals';
import { WN_PER_XRT } from '@xrt-miner/config';
import type { SaleEvent } from '@xrt-miner/types';
import { MINE_PROFILE, PUMP_PROFILE, createHarness, createMiner } from '../helpers/miner-harness';

jest.setTimeout(60_000);

const MINT = 2n * WN_PER_XRT;

describe('mining session', () => {
  it('should shrink the batch to the quota when the stake cannot be topped up', async () => {
    const h = createHarness({ stakeOperations: 20 });
    const { miner } = createMiner(h, {
      initialPhase: 'pumping',
      policy: { pump: { ...PUMP_PROFILE, batchSize: 15 } },
    });

    const [rejected, recovered] = await miner.runRounds(2);

    expect(h.logger.hasLogMatching('warn', 'No token balance for stake top-up')).toBe(true);
    expect(rejected.round.batchSize).toBe(15);
    expect(rejected.round.outcome.status).toBe('aborted');
    expect(rejected.round.outcome.failure?.kind).toBe('quota-exceeded');
    expect(rejected.decision.action).toBe('continue');
    expect(rejected.decision.roundBatchSize).toBe(10);

    expect(recovered.round.batchSize).toBe(10);
    expect(recovered.round.kind).toBe('bootstrap');
    expect(recovered.round.outcome.status).toBe('completed');
    expect(recovered.round.outcome.counts.created).toBe(10);
    expect(h.chain.lighthouse.quota).toBe(10);
  });

  it('should step the batch down through transport timeouts and recover', async () => {
    const h = createHarness({ stakeOperations: 1000 });
    let stalledCreateBursts = 0;
    h.chain.inclusion = burst => {
      if (!burst.some(tx => tx.method === 'createLiability') || stalledCreateBursts >= 3) return 'mine';
      stalledCreateBursts += 1;
      return 'stall';
    };
    const { miner } = createMiner(h, {
      initialPhase: 'pumping',
      budgetWei: 10n ** 20n,
      policy: { pump: { ...PUMP_PROFILE, batchSize: 56, targetSmmaGwei: 100 } },
    });

    const reports = await miner.runRounds(4);

    expect(reports.map(r => r.round.batchSize)).toEqual([56, 20, 10, 5]);
    expect(reports.map(r => r.round.outcome.status)).toEqual(['degraded', 'degraded', 'degraded', 'completed']);
    expect(reports.slice(0, 3).map(r => r.round.outcome.failure?.kind)).toEqual([
      'transport-timeout',
      'transport-timeout',
      'transport-timeout',
    ]);
    expect(reports.map(r => r.decision.counters.consecutiveFailures)).toEqual([1, 2, 3, 0]);
    expect(reports.map(r => r.decision.action)).toEqual(['continue', 'continue', 'continue', 'continue']);

    // The third round finalized the first 56 alongside its stalled creates
    expect(reports[2].round.kind).toBe('steady');
    const last = reports[3].round;
    expect(last.kind).toBe('steady');
    expect(last.outcome.finalized).toBe(20);
    expect(last.outcome.minted).toBe(20n * MINT);
    expect(h.chain.minedOf('finalizeLiability')).toHaveLength(56 + 20);
  });

  it('should mine in steady state and sell minted XRT in lots', async () => {
    const h = createHarness();
    const { miner, liquidation } = createMiner(h, {
      policy: { mine: { ...MINE_PROFILE, batchSize: 5 } },
      liquidationThresholdWn: 10n * WN_PER_XRT,
    });
    const sales: SaleEvent[] = [];
    miner.on('sale', sale => sales.push(sale));

    const reports = await miner.runRounds(3);

    expect(reports.map(r => r.round.kind)).toEqual(['bootstrap', 'steady', 'steady']);
    expect(reports.map(r => r.round.outcome.transactionsSent)).toEqual([5, 10, 10]);
    expect(reports.map(r => r.round.outcome.confirmationCycles)).toEqual([1, 1, 1]);
    expect(reports.map(r => r.round.outcome.minted)).toEqual([0n, 5n * MINT, 5n * MINT]);
    expect(reports.map(r => r.liquidation?.status ?? null)).toEqual([null, 'sold', 'sold']);

    expect(sales).toHaveLength(2);
    expect(sales[0]).toMatchObject({
      amount: 10n * WN_PER_XRT,
      // 0.01 ETH per XRT
      proceeds: 10n ** 17n,
      minProceeds: 95_000_000_000_000_000n,
      realizedPrice: 10n ** 16n,
      slippageTolerance: 0.05,
    });

    const drained = await miner.drain();

    expect(drained?.round.kind).toBe('drain');
    expect(drained?.round.outcome.finalized).toBe(5);
    expect(drained?.liquidation).toEqual({ status: 'below-threshold', balance: 0n });
    expect(sales).toHaveLength(3);
    expect(liquidation?.unsold).toBe(0n);
    expect(h.scheduler.pendingFinalizes()).toBe(0);
    expect(await h.chain.getTokenBalance(h.account)).toBe(0n);
    expect(h.chain.minedOf('swapExactTokensForETH')).toHaveLength(3);
  });
});
