/**
 * Logging Module Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  createLogger,
  formatLogObject,
  isLogLevel,
  RecordingLogger,
  NullLogger,
} from '../../src/logging';
import type { ILogger } from '../../src/logging';

function capture(level: 'info' | 'debug' = 'info'): { logger: ILogger; entries: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  const logger = createLogger({ name: 'liability-miner', level, destination: { write: line => lines.push(line) } });
  return { logger, entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)) };
}

describe('Logging Module', () => {
  describe('createLogger', () => {
    it('should write JSON entries with the service name and level label', () => {
      const { logger, entries } = capture();

      logger.info('Round closed', { round: 4, status: 'completed' });

      expect(entries()).toHaveLength(1);
      expect(entries()[0]).toMatchObject({
        level: 'info',
        msg: 'Round closed',
        service: 'liability-miner',
        round: 4,
        status: 'completed',
      });
    });

    it('should write bigint amounts as decimal strings', () => {
      const { logger, entries } = capture();

      logger.info('Stake topped up', { amount: 15_000_000_000_000n, stake: { wn: 2n } });

      expect(entries()[0]).toMatchObject({ amount: '15000000000000', stake: { wn: '2' } });
    });

    it('should redact the signing key and the RPC endpoint', () => {
      const { logger, entries } = capture();

      logger.info('Config loaded', { privateKey: 'test-secret', network: { rpcUrl: 'http://localhost:8545', chainId: 1 } });

      expect(entries()[0]).toMatchObject({
        privateKey: '[REDACTED]',
        network: { rpcUrl: '[REDACTED]', chainId: 1 },
      });
    });

    it('should carry child bindings on every entry', () => {
      const { logger, entries } = capture();

      logger.child({ component: 'scheduler', round: 2 }).warn('Burst degraded');

      expect(entries()[0]).toMatchObject({ level: 'warn', component: 'scheduler', round: 2, msg: 'Burst degraded' });
    });

    it('should drop entries below the configured level', () => {
      const { logger, entries } = capture('info');

      logger.debug('Marker state change');

      expect(entries()).toHaveLength(0);
      expect(logger.isLevelEnabled?.('debug')).toBe(false);
      expect(logger.isLevelEnabled?.('warn')).toBe(true);
    });
  });

  describe('formatLogObject', () => {
    it('should return entries without a bigint unchanged', () => {
      const obj = { round: 1, status: 'completed' };
      expect(formatLogObject(obj)).toBe(obj);
    });

    it('should convert nested bigints', () => {
      expect(
        formatLogObject({
          gasCostWei: 1_500_000_000_000_000n,
          outcome: { minted: [1n, 2n], status: 'ok' },
        })
      ).toEqual({
        gasCostWei: '1500000000000000',
        outcome: { minted: ['1', '2'], status: 'ok' },
      });
    });

    it('should mark circular references', () => {
      const node: Record<string, unknown> = { value: 1n };
      node.self = node;
      expect(formatLogObject({ node })).toEqual({ node: { value: '1', self: '[Circular]' } });
    });
  });

  it('should accept pino levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  describe('RecordingLogger', () => {
    it('should record child entries on the parent with their bindings', () => {
      const logger = new RecordingLogger();
      const child = logger.child({ component: 'marker' });

      logger.info('Round closed', { round: 2 });
      child.warn('Marker held elsewhere');

      expect(logger.count).toBe(2);
      expect(logger.hasLogMatching('info', /Round closed/)).toBe(true);
      expect(logger.hasLogWithMeta('info', { round: 2 })).toBe(true);
      expect(logger.getWarnings()[0]?.bindings).toEqual({ component: 'marker' });
    });

    it('should clear the record shared with children', () => {
      const logger = new RecordingLogger();
      const child = logger.child({ component: 'stake' });
      child.error('refill failed');

      logger.clear();

      expect(child.getErrors()).toHaveLength(0);
    });
  });

  it('should discard everything in NullLogger', () => {
    const logger = new NullLogger();
    logger.info('ignored');
    expect(logger.child({ a: 1 })).toBe(logger);
    expect(logger.isLevelEnabled()).toBe(false);
  });
});
