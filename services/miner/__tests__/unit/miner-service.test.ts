/**
 * MinerService Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ethers } from 'ethers';
import { WN_PER_XRT } from '@xrt-miner/config';
import { LifecycleError, ValidationError } from '@xrt-miner/types';
import type { Round, SaleEvent, SweepEvent } from '@xrt-miner/types';
import type { PhaseChange } from '../../src/phases/phase-controller';
import { GWEI, OTHER_PRIVATE_KEY } from '../helpers/fake-chain';
import { MINE_PROFILE, createHarness, createMiner } from '../helpers/miner-harness';

const SMALL_MINE = { mine: { ...MINE_PROFILE, batchSize: 5 } };

describe('MinerService', () => {
  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  describe('lifecycle', () => {
    it('should anchor the nonce ledger and enter the initial phase on start', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { initialPhase: 'pumping' });
      const changes: PhaseChange[] = [];
      miner.on('phase', change => changes.push(change));

      await miner.start();
      await miner.start();

      expect(miner.phase).toBe('pumping');
      expect(h.sequencer.getLedger()).toMatchObject({ status: 'synced', next: 0 });
      expect(h.estimator.value).toBe(5);
      expect(changes).toEqual([{ from: 'idle', to: 'pumping', reason: 'session started', forced: false }]);
    });

    it('should refuse rounds while idle', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { initialPhase: 'idle' });

      await expect(miner.runOneRound()).rejects.toBeInstanceOf(LifecycleError);
      expect(h.chain.broadcasts).toHaveLength(0);
    });

    it('should refuse rounds once terminated', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { policy: SMALL_MINE });
      await miner.start();

      miner.forcePhaseTransition('terminated');

      await expect(miner.runOneRound()).rejects.toThrow('Session terminated');
    });

    it('should refuse rounds after stop', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { policy: SMALL_MINE });
      await miner.start();

      miner.stop();

      expect(miner.isStopped()).toBe(true);
      await expect(miner.runOneRound()).rejects.toThrow('Miner stopped');
      expect(h.logger.hasLogMatching('info', 'Miner stop requested')).toBe(true);
    });

    it('should finish the current round when stopped mid-run', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { policy: SMALL_MINE });
      miner.on('round', () => miner.stop());

      const reports = await miner.runRounds(3);

      expect(reports).toHaveLength(1);
      expect(reports[0].round.outcome.counts.created).toBe(5);
    });
  });

  // ===========================================================================
  // Rounds
  // ===========================================================================

  describe('rounds', () => {
    it('should emit the round and decide the next one', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { policy: SMALL_MINE });
      const rounds: Round[] = [];
      miner.on('round', round => rounds.push(round));

      const report = await miner.runOneRound();

      expect(rounds).toEqual([report.round]);
      expect(report.round.kind).toBe('bootstrap');
      expect(report.round.outcome.counts.created).toBe(5);
      expect(report.decision.action).toBe('continue');
      expect(report.decision.roundBatchSize).toBe(5);
      expect(report.profitability?.profitability.verdict).toBe('profitable');
      expect(report.liquidation).toBeNull();
    });

    it('should skip the profitability check while pumping', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { initialPhase: 'pumping', policy: { pump: { ...MINE_PROFILE, batchSize: 2 } } });

      const report = await miner.runOneRound();

      expect(report.profitability).toBeNull();
    });

    it('should throttle the next round to the cost cap', async () => {
      const h = createHarness();
      // 21.16 USD per liability at 10 gwei and 2000 USD/ETH
      const { miner } = createMiner(h, { policy: { ...SMALL_MINE, maxCostUsd: 10 } });

      const first = await miner.runOneRound();
      const second = await miner.runOneRound();

      expect(first.decision.roundBatchSize).toBe(2);
      expect(first.decision.next.batchSize).toBe(5);
      expect(second.round.batchSize).toBe(2);
      expect(second.round.kind).toBe('steady');
    });

    it('should wait for the marker timeout and retry once', async () => {
      const h = createHarness();
      const other = new ethers.Wallet(OTHER_PRIVATE_KEY).address;
      h.chain.addProvider(other, 10);
      h.chain.giveMarker(other, 10);
      const { miner } = createMiner(h, { policy: SMALL_MINE });

      const report = await miner.runOneRound();

      expect(report.round.outcome.status).toBe('completed');
      expect(report.round.outcome.counts.created).toBe(5);
      expect(h.chain.lighthouse.marker).toBe(0);
      expect(h.chain.blockNumber).toBe(1027);
      expect(h.logger.hasLogMatching('info', 'Marker held elsewhere, waiting to reclaim')).toBe(true);
    });

    it('should close a rejected round when the marker cannot be reclaimed', async () => {
      const h = createHarness({ maxReclaimAttempts: 1, wait: async () => undefined });
      const other = new ethers.Wallet(OTHER_PRIVATE_KEY).address;
      h.chain.addProvider(other, 10);
      h.chain.giveMarker(other, 10);
      const { miner } = createMiner(h, { policy: SMALL_MINE });

      const report = await miner.runOneRound();

      expect(report.round.outcome.status).toBe('aborted');
      expect(report.round.outcome.failure?.kind).toBe('marker-not-owned');
      expect(report.round.outcome.transactionsSent).toBe(0);
      expect(report.decision.action).toBe('continue');
      expect(report.decision.counters.consecutiveFailures).toBe(1);
      expect(h.logger.hasLogMatching('warn', 'Round rejected before broadcast')).toBe(true);
    });
  });

  describe('command serialization', () => {
    it('should start a drain requested mid-round after that round closes', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { policy: SMALL_MINE });
      await miner.runOneRound();

      const [round, drain] = await Promise.allSettled([miner.runOneRound(), miner.drain()]);

      expect(round.status).toBe('fulfilled');
      expect(drain.status).toBe('fulfilled');
      const finalized = h.chain.broadcasts
        .filter(tx => tx.method === 'finalizeLiability')
        .map(tx => String(tx.args[0]));
      expect(finalized).toHaveLength(10);
      expect(new Set(finalized).size).toBe(10);
      expect(h.chain.minedOf('finalizeLiability')).toHaveLength(10);
      expect(h.scheduler.getOpenLiabilities()).toHaveLength(0);
    });
  });

  describe('nonce conflicts', () => {
    it('should start a new nonce epoch after a conflicted round', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { policy: SMALL_MINE });
      await miner.start();
      h.chain.bumpConfirmedNonce(h.account);

      const conflicted = await miner.runOneRound();
      const recovered = await miner.runOneRound();

      expect(conflicted.round.outcome.failure?.kind).toBe('nonce-conflict');
      expect(conflicted.round.outcome.transactionsSent).toBe(0);
      expect(conflicted.decision.counters.consecutiveFailures).toBe(1);
      expect(recovered.round.outcome.status).toBe('completed');
      expect(recovered.round.outcome.counts.created).toBe(5);
      expect(recovered.decision.counters.consecutiveFailures).toBe(0);
      expect(h.sequencer.getLedger()).toMatchObject({ status: 'synced', epoch: 2, next: 6 });
    });
  });

  // ===========================================================================
  // Operator surface
  // ===========================================================================

  describe('operator commands', () => {
    it('should emit operator phase transitions', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { initialPhase: 'pumping' });
      await miner.start();
      const changes: PhaseChange[] = [];
      miner.on('phase', change => changes.push(change));

      miner.forcePhaseTransition('mining');

      expect(miner.phase).toBe('mining');
      expect(changes).toEqual([{ from: 'pumping', to: 'mining', reason: 'operator request', forced: true }]);
    });

    it('should report the estimator state at the next batch size', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { policy: SMALL_MINE });
      await miner.start();

      const report = miner.reportEstimatorState();

      expect(report.updatesPerRound).toBe(10);
      expect(report.halfLifeRounds).toBeCloseTo(69.28, 1);
      expect(report.target).toEqual({ kind: 'floor', gwei: 1.2 });
      expect(report.state.value).toBe(5);
    });

    it('should report the session status', async () => {
      const h = createHarness();
      const { miner } = createMiner(h);
      await miner.start();

      const status = await miner.status();

      expect(status).toMatchObject({
        account: h.account,
        phase: 'mining',
        nativeBalance: 10n ** 18n,
        tokenBalance: 0n,
        authoritativeSmmaWei: 5n * GWEI,
        localSmmaGwei: 5,
        // 1.1M gas at 5 gwei against a 1e12 auction price
        emissionPerCycle: 5_500n * WN_PER_XRT,
        remainingBudgetWei: 10n ** 19n,
        unsoldWn: 0n,
        openLiabilities: 0,
      });
      expect(status.lighthouse.quota).toBe(100);
    });

    it('should mine a single cycle with the caller payloads', async () => {
      const h = createHarness();
      const { miner, phases } = createMiner(h, { policy: SMALL_MINE });
      const rounds: Round[] = [];
      miner.on('round', round => rounds.push(round));

      const round = await miner.mineOnce({ model: '0x1234', objective: '0xabcd' });

      expect(round.mode).toBe('sequential');
      expect(round.batchSize).toBe(1);
      expect(round.outcome.counts.finalized).toBe(1);
      expect(round.outcome.minted).toBe(2n * WN_PER_XRT);
      expect(round.liabilities[0].demand?.message.model).toBe('0x1234');
      expect(round.liabilities[0].offer?.message.objective).toBe('0xabcd');
      expect(h.chain.mined.map(tx => tx.method)).toEqual(['createLiability', 'finalizeLiability']);
      expect(rounds).toEqual([round]);
      expect(phases.getConfig().remainingBudgetWei).toBe(10n ** 19n);
    });

    it('should reject payloads that are not hex', async () => {
      const h = createHarness();
      const { miner } = createMiner(h);

      const error = await miner.mineOnce({ model: 'not-hex' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'model' });
      expect(h.chain.broadcasts).toHaveLength(0);
    });

    it('should stake tokens into the lighthouse', async () => {
      const h = createHarness();
      const { miner } = createMiner(h);
      const minimal = h.chain.lighthouse.minimalStake;
      h.chain.setTokenBalance(h.account, 2n * minimal);

      await miner.stake(minimal);

      expect(h.chain.stakeOf(h.account)).toBe(101n * minimal);
      expect(h.chain.mined.map(tx => tx.method)).toEqual(['approve', 'refill']);
    });

    it('should buy tokens with a deadline past the latest block', async () => {
      const h = createHarness({ chain: { xrtPriceWei: 10n ** 16n } });
      const { miner } = createMiner(h);

      const result = await miner.buy(WN_PER_XRT, 0.05);

      const [buy] = h.chain.minedOf('swapExactETHForTokens');
      expect(result).toMatchObject({ amountOut: WN_PER_XRT, quoted: 10n ** 16n, maxSpend: 10_500_000_000_000_000n });
      expect(buy.args[3]).toBe(1_700_000_300n);
    });

    it('should sweep the sub-threshold remainder on drain as a separate event', async () => {
      const h = createHarness();
      const { miner } = createMiner(h, { policy: SMALL_MINE, liquidationThresholdWn: 100n * WN_PER_XRT });
      const sales: SaleEvent[] = [];
      const sweeps: SweepEvent[] = [];
      miner.on('sale', sale => sales.push(sale));
      miner.on('sweep', sweep => sweeps.push(sweep));
      await miner.runOneRound();

      const drained = await miner.drain();

      expect(drained?.round.outcome.minted).toBe(10n * WN_PER_XRT);
      expect(drained?.liquidation).toMatchObject({ status: 'swept', balance: 0n });
      expect(sales).toEqual([]);
      expect(sweeps).toHaveLength(1);
      expect(sweeps[0]).toMatchObject({
        amount: 10n * WN_PER_XRT,
        proceeds: 10n ** 17n,
        thresholdWn: 100n * WN_PER_XRT,
      });
    });

    it('should have nothing to drain before the first round', async () => {
      const h = createHarness();
      const { miner } = createMiner(h);

      expect(await miner.drain()).toBeNull();
      expect(h.logger.hasLogMatching('info', 'Nothing to drain')).toBe(true);
    });
  });
});
