/**
 * Liability lifecycle Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { LiabilityStateError } from '@xrt-miner/types';
import type { LiabilityState } from '@xrt-miner/types';
import {
  awaitsFinalize,
  canTransition,
  countByState,
  isInFlight,
  isTerminal,
  newLiability,
  snapshot,
  transition,
} from '../../src/scheduling/liability-lifecycle';

const HANDLE = { hash: '0x' + 'ab'.repeat(32), nonce: 3 };

describe('liability lifecycle', () => {
  it('should start pending with zeroed accounting', () => {
    const liability = newLiability('r1-1', 1, '0x01');

    expect(liability).toEqual({
      id: 'r1-1',
      state: 'pending',
      roundIndex: 1,
      result: '0x01',
      gasUsed: 0n,
      gasCostWei: 0n,
      minted: 0n,
      reconcileAttempts: 0,
    });
  });

  it.each<[LiabilityState, LiabilityState, boolean]>([
    ['pending', 'created', true],
    ['pending', 'abandoned', true],
    ['pending', 'finalized', false],
    ['created', 'finalized', true],
    ['created', 'failed', true],
    ['created', 'pending', false],
    ['finalized', 'failed', false],
    ['abandoned', 'created', false],
  ])('%s -> %s allowed: %s', (from, to, allowed) => {
    expect(canTransition(from, to)).toBe(allowed);
  });

  it('should refuse to move backwards', () => {
    const liability = newLiability('r1-1', 1, '0x01');
    transition(liability, 'created');

    expect(() => transition(liability, 'pending')).toThrow(LiabilityStateError);
    expect(liability.state).toBe('created');
  });

  it('should record the failure reason', () => {
    const liability = newLiability('r1-1', 1, '0x01');
    transition(liability, 'failed', 'create reverted');

    expect(liability.failureReason).toBe('create reverted');
    expect(isTerminal(liability)).toBe(true);
  });

  it('should know when a transaction is in flight', () => {
    const liability = newLiability('r1-1', 1, '0x01');
    expect(isInFlight(liability)).toBe(false);

    liability.createTx = HANDLE;
    expect(isInFlight(liability)).toBe(true);

    transition(liability, 'created');
    expect(isInFlight(liability)).toBe(false);
    expect(awaitsFinalize(liability)).toBe(true);

    liability.finalizeTx = { ...HANDLE, nonce: 4 };
    expect(isInFlight(liability)).toBe(true);
    expect(awaitsFinalize(liability)).toBe(false);
  });

  it('should freeze snapshots', () => {
    const liability = newLiability('r1-1', 1, '0x01');
    liability.createTx = HANDLE;

    const frozen = snapshot(liability);
    liability.gasUsed = 5n;

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(frozen.gasUsed).toBe(0n);
    expect(frozen.createTx).not.toBe(HANDLE);
  });

  it('should count liabilities per state', () => {
    const a = newLiability('a', 1, '0x01');
    const b = newLiability('b', 1, '0x01');
    const c = newLiability('c', 1, '0x01');
    transition(b, 'created');
    transition(c, 'abandoned');

    expect(countByState([a, b, c])).toEqual({ pending: 1, created: 1, finalized: 0, failed: 0, abandoned: 1 });
  });
});
