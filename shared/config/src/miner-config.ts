/**
 * Miner Configuration Loader
 *
 * Layers, lowest first: schema defaults, optional YAML file
 * (MINER_CONFIG_FILE), environment variables. The merged object is
 * validated once; a failure names the offending path.
 *
 * @example
 * ```typescript
 * import { loadMinerConfig } from '@xrt-miner/config';
 *
 * const config = loadMinerConfig();
 * console.log(config.phases.mine.batchSize);
 * ```
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { ValidationError } from '@xrt-miner/types';
import { parseEnvFloat, parseEnvInt, getErrorMessage } from '@xrt-miner/core';
import type { EnvSource } from '@xrt-miner/core';
import { MinerConfigSchema, validateWithDetails } from './schemas';
import type { MinerConfig } from './schemas';

type ConfigRecord = Record<string, unknown>;

export interface LoadMinerConfigOptions {
  env?: EnvSource;
  /** YAML file path; falls back to MINER_CONFIG_FILE */
  file?: string;
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base`. Records merge recursively, everything else
 * (arrays included) replaces.
 */
export function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const merged: ConfigRecord = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function setPath(target: ConfigRecord, path: readonly string[], value: unknown): void {
  if (value === undefined) return;

  let node = target;
  for (const key of path.slice(0, -1)) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: ConfigRecord = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

function envString(env: EnvSource, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Build the override layer from the variables that are set.
 */
export function readEnvOverrides(env: EnvSource): ConfigRecord {
  const overrides: ConfigRecord = {};

  setPath(overrides, ['network', 'rpcUrl'], envString(env, 'RPC_URL'));
  setPath(overrides, ['privateKey'], envString(env, 'PRIVATE_KEY'));
  setPath(overrides, ['contracts', 'lighthouse'], envString(env, 'LIGHTHOUSE_ADDRESS'));
  setPath(overrides, ['contracts', 'factory'], envString(env, 'FACTORY_ADDRESS'));

  setPath(overrides, ['phases', 'mine', 'priorityFeeGwei'], parseEnvFloat('PRIORITY_FEE_GWEI', undefined, 0, undefined, env));
  setPath(overrides, ['phases', 'mine', 'batchSize'], parseEnvInt('BATCH_SIZE', undefined, 1, undefined, env));
  setPath(overrides, ['phases', 'mine', 'mode'], envString(env, 'MINING_MODE'));
  setPath(overrides, ['phases', 'budgetEth'], parseEnvFloat('BUDGET_ETH', undefined, 0, undefined, env));

  setPath(overrides, ['liquidation', 'sellEveryXrt'], parseEnvFloat('SELL_EVERY_XRT', undefined, 0, undefined, env));
  setPath(overrides, ['liquidation', 'slippagePercent'], parseEnvFloat('SLIPPAGE_PERCENT', undefined, 0, 100, env));
  setPath(overrides, ['throttle', 'maxCostUsd'], parseEnvFloat('MAX_COST_USD', undefined, 0, undefined, env));
  setPath(overrides, ['logLevel'], envString(env, 'LOG_LEVEL'));

  return overrides;
}

/**
 * Read a YAML config file. An empty file is an empty layer.
 */
export function readConfigFile(file: string): ConfigRecord {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ValidationError(`Cannot read config file ${file}: ${getErrorMessage(error)}`, 'config', 'file');
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ValidationError(`Invalid YAML in ${file}: ${getErrorMessage(error)}`, 'config', 'file');
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ValidationError(`Config file ${file} must contain a mapping at the top level`, 'config', 'file');
  }
  return parsed;
}

export function loadMinerConfig(options: LoadMinerConfigOptions = {}): MinerConfig {
  const env = options.env ?? process.env;
  const file = options.file ?? envString(env, 'MINER_CONFIG_FILE');

  const defaults: ConfigRecord = MinerConfigSchema.parse({});
  const fileLayer = file ? readConfigFile(file) : {};
  const merged = deepMerge(deepMerge(defaults, fileLayer), readEnvOverrides(env));

  const result = validateWithDetails(MinerConfigSchema, merged);
  if (!result.success) {
    const [first] = result.errors;
    const detail = result.errors.map(e => `${e.path || '(root)'}: ${e.message}`).join('; ');
    throw new ValidationError(`Invalid miner configuration: ${detail}`, 'config', first?.path ?? '');
  }
  return result.data;
}

// =============================================================================
// Unit helpers
// =============================================================================

const GWEI = 1_000_000_000;

/**
 * Convert a decimal gwei amount to wei without float drift past 9 decimals.
 */
export function gweiToWei(gwei: number): bigint {
  return BigInt(Math.round(gwei * GWEI));
}

/**
 * Convert a decimal ETH amount to wei (gwei precision).
 */
export function ethToWei(eth: number): bigint {
  return BigInt(Math.round(eth * GWEI)) * 1_000_000_000n;
}
