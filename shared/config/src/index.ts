/**
 * @xrt-miner/config
 *
 * Schemas, protocol constants, mainnet addresses and the layered
 * (defaults, YAML, environment) configuration loader.
 */

export * from './addresses';
export * from './constants';
export {
  MinerConfigSchema,
  NetworkSchema,
  ContractsSchema,
  PhaseProfileSchema,
  PhasesSchema,
  SchedulingSchema,
  EstimatorSchema,
  LiquidationSchema,
  ThrottleSchema,
  StepDownSequenceSchema,
  EthereumAddressSchema,
  validateWithDetails,
} from './schemas';
export type {
  MinerConfig,
  MinerConfigInput,
  PhaseProfile,
  ValidationIssue,
  ValidationResult,
} from './schemas';
export {
  loadMinerConfig,
  readConfigFile,
  readEnvOverrides,
  deepMerge,
  gweiToWei,
  ethToWei,
} from './miner-config';
export type { LoadMinerConfigOptions } from './miner-config';
