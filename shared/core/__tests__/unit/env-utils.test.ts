/**
 * Tests for Env Utils
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ValidationError } from '@xrt-miner/types';
import { parseEnvInt, parseEnvFloat } from '../../src/utils/env-utils';

const originalEnv = process.env;

describe('env-utils', () => {
  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  // ===========================================================================
  // parseEnvInt
  // ===========================================================================

  describe('parseEnvInt', () => {
    it('returns default when env var is not set', () => {
      delete process.env.TEST_BATCH;
      expect(parseEnvInt('TEST_BATCH', 20)).toBe(20);
    });

    it('returns default when env var is empty string', () => {
      process.env.TEST_BATCH = '';
      expect(parseEnvInt('TEST_BATCH', 20)).toBe(20);
    });

    it('returns undefined when unset and no default', () => {
      delete process.env.TEST_BATCH;
      expect(parseEnvInt('TEST_BATCH', undefined)).toBeUndefined();
    });

    it('parses a valid integer', () => {
      process.env.TEST_BATCH = '56';
      expect(parseEnvInt('TEST_BATCH', 20)).toBe(56);
    });

    it('throws ValidationError on a non-integer', () => {
      process.env.TEST_BATCH = '12abc';
      expect(() => parseEnvInt('TEST_BATCH', 20)).toThrow('Invalid TEST_BATCH: "12abc" is not a valid integer');
      expect(() => parseEnvInt('TEST_BATCH', 20)).toThrow(ValidationError);
    });

    it('throws when out of range', () => {
      process.env.TEST_BATCH = '0';
      expect(() => parseEnvInt('TEST_BATCH', 20, 1, 500)).toThrow('Invalid TEST_BATCH: 0 is out of range [1, 500]');
    });

    it('reads from an explicit env source', () => {
      expect(parseEnvInt('BATCH_SIZE', 1, 1, undefined, { BATCH_SIZE: '15' })).toBe(15);
    });
  });

  // ===========================================================================
  // parseEnvFloat
  // ===========================================================================

  describe('parseEnvFloat', () => {
    it('parses decimals', () => {
      expect(parseEnvFloat('PRIORITY_FEE_GWEI', 1, 0, undefined, { PRIORITY_FEE_GWEI: '0.25' })).toBe(0.25);
    });

    it('throws below the minimum', () => {
      expect(() => parseEnvFloat('BUDGET_ETH', 1, 0, undefined, { BUDGET_ETH: '-1' }))
        .toThrow('Invalid BUDGET_ETH: -1 is below minimum 0');
    });

    it('throws on garbage', () => {
      expect(() => parseEnvFloat('BUDGET_ETH', 1, undefined, undefined, { BUDGET_ETH: 'lots' }))
        .toThrow('Invalid BUDGET_ETH: "lots" is not a valid number');
    });
  });
});
