/**
 * EmissionEstimator Unit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { NullLogger } from '@xrt-miner/core';
import { ValidationError } from '@xrt-miner/types';
import {
  EmissionEstimator,
  estimateEmission,
  halfLifeRounds,
  projectSmma,
  weiToGwei,
} from '../../src/estimation/emission-estimator';
import { FakeChain, GWEI } from '../helpers/fake-chain';

describe('SMMA helpers', () => {
  it('should convert wei to gwei', () => {
    expect(weiToGwei(1_030_000_000n)).toBeCloseTo(1.03, 12);
  });

  it('should project a pump from 1.03 toward 10.2 gwei', () => {
    expect(projectSmma(1.03, 10.2, 448, 1000)).toBeCloseTo(4.3426, 3);
  });

  it('should project a decay from 1.94 toward 1.2 gwei', () => {
    expect(projectSmma(1.94, 1.2, 1380, 1000)).toBeCloseTo(1.38604, 4);
  });

  it('should not move without updates', () => {
    expect(projectSmma(3, 50, 0, 1000)).toBe(3);
  });

  it('should compute the half-life in rounds', () => {
    expect(halfLifeRounds(40, 1000)).toBeCloseTo(17.32, 2);
  });

  it('should estimate emission from gas and SMMA', () => {
    // 1.1M gas at 10 gwei, auction final price 1e12
    expect(estimateEmission(1_100_000n, 10, 1_000_000_000_000n)).toBe(11_000_000_000_000n);
  });

  it('should reject a non-positive auction price', () => {
    expect(() => estimateEmission(1n, 1, 0n)).toThrow(ValidationError);
  });
});

describe('EmissionEstimator', () => {
  let chain: FakeChain;
  let now: number;
  let estimator: EmissionEstimator;

  beforeEach(() => {
    chain = new FakeChain({ smmaWei: 1_030_000_000n });
    now = 1_000;
    estimator = new EmissionEstimator(
      chain,
      { period: 1000, resyncEveryObservations: 3, maxStalenessMs: 60_000 },
      new NullLogger(),
      () => now
    );
  });

  it('should reject periods below 2', () => {
    expect(
      () => new EmissionEstimator(chain, { period: 1, resyncEveryObservations: 1, maxStalenessMs: 1 }, new NullLogger())
    ).toThrow(ValidationError);
  });

  it('should fold observations into the average', async () => {
    chain.smmaWei = 5n * GWEI;
    await estimator.resync();

    expect(estimator.observe(15)).toBeCloseTo(5.01, 10);
    expect(estimator.observeWei(15n * GWEI)).toBeCloseTo((5.01 * 999 + 15) / 1000, 10);
    expect(estimator.getState().observationsSinceResync).toBe(2);
  });

  it('should reject negative or non-finite observations', () => {
    expect(() => estimator.observe(-1)).toThrow(ValidationError);
    expect(() => estimator.observe(Number.NaN)).toThrow(ValidationError);
  });

  it('should be idempotent when resynced twice without observations', async () => {
    const first = await estimator.resync();
    const second = await estimator.resync();

    expect(second.value).toBe(first.value);
    expect(second.value).toBeCloseTo(1.03, 12);
    expect(second.observationsSinceResync).toBe(0);
  });

  it('should replace a drifted local value with the authoritative one', async () => {
    await estimator.resync();
    estimator.observe(100);
    chain.smmaWei = 2n * GWEI;

    const state = await estimator.resync();

    expect(state.value).toBe(2);
    expect(state.lastResync).toEqual({ at: 1_000, value: 2 });
  });

  describe('needsResync', () => {
    it('should need a resync before the first one', () => {
      expect(estimator.needsResync()).toBe(true);
    });

    it('should need a resync after enough observations', async () => {
      await estimator.resync();
      expect(estimator.needsResync()).toBe(false);

      estimator.observe(2);
      estimator.observe(2);
      expect(estimator.needsResync()).toBe(false);
      estimator.observe(2);
      expect(estimator.needsResync()).toBe(true);
    });

    it('should need a resync once the last read is stale', async () => {
      await estimator.resync();
      now += 59_999;
      expect(estimator.needsResync()).toBe(false);
      now += 1;
      expect(estimator.needsResync()).toBe(true);
    });
  });

  describe('projection', () => {
    beforeEach(async () => {
      await estimator.resync();
    });

    it('should project from the current value', () => {
      expect(estimator.project(10.2, 448)).toBeCloseTo(4.3426, 3);
    });

    it('should count the updates needed to reach a goal', () => {
      expect(estimator.updatesToReach(10.2, 4)).toBe(392);
    });

    it('should report an unreachable goal as infinite', () => {
      expect(estimator.updatesToReach(10.2, 11)).toBe(Number.POSITIVE_INFINITY);
      expect(estimator.updatesToReach(10.2, 1)).toBe(Number.POSITIVE_INFINITY);
    });

    it('should need no updates when already at the goal', () => {
      expect(estimator.updatesToReach(10.2, estimator.value)).toBe(0);
    });
  });
});

describe('EmissionEstimator convergence', () => {
  const TARGET_GWEI = 10.2;

  /** Rounds of `updatesPerRound` observations at the target until the distance halves */
  async function roundsToHalve(period: number, updatesPerRound: number): Promise<{ rounds: number; model: number }> {
    const chain = new FakeChain({ smmaWei: 1_030_000_000n });
    const estimator = new EmissionEstimator(
      chain,
      { period, resyncEveryObservations: 1_000_000, maxStalenessMs: 60_000 },
      new NullLogger()
    );
    await estimator.resync();
    const start = Math.abs(TARGET_GWEI - estimator.value);

    let rounds = 0;
    while (Math.abs(TARGET_GWEI - estimator.value) > start / 2 && rounds < 10_000) {
      for (let i = 0; i < updatesPerRound; i++) estimator.observe(TARGET_GWEI);
      rounds++;
    }
    return { rounds, model: estimator.halfLifeRounds(updatesPerRound) };
  }

  it.each([
    [1000, 40],
    [1000, 10],
    [200, 8],
    [500, 56],
    [100, 4],
  ])('should halve the distance in about ln(2) * %i / %i rounds', async (period, updatesPerRound) => {
    const { rounds, model } = await roundsToHalve(period, updatesPerRound);

    expect(rounds).toBe(Math.ceil(model));
    expect(Math.abs(rounds - (Math.LN2 * period) / updatesPerRound)).toBeLessThanOrEqual(1);
  });
});
