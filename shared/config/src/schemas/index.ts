/**
 * Zod Schema Validation for Miner Configuration
 *
 * Every layer (defaults, YAML file, environment) is merged first and
 * validated once at startup. Values are trusted afterwards.
 */

import { z } from 'zod';
import { MAINNET_ADDRESSES } from '../addresses';
import { BLOCK_TIME_MS, DEFAULT_DEADLINE_BLOCKS, MAINNET_CHAIN_ID, SMMA_PERIOD } from '../constants';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Ethereum address schema (0x + 40 hex chars).
 */
export const EthereumAddressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid Ethereum address format');

/**
 * RPC URL schema (HTTP or HTTPS).
 */
export const RpcUrlSchema = z
  .string()
  .regex(/^https?:\/\//, 'RPC URL must start with http:// or https://');

/**
 * 32-byte hex private key.
 */
export const PrivateKeySchema = z
  .string()
  .regex(/^(0x)?[a-fA-F0-9]{64}$/, 'Private key must be 32 bytes of hex')
  .transform(key => (key.startsWith('0x') ? key : `0x${key}`));

export const PositiveIntSchema = z
  .number()
  .int()
  .positive('Value must be a positive integer');

export const NonNegativeIntSchema = z
  .number()
  .int()
  .min(0, 'Value cannot be negative');

export const SchedulingModeSchema = z.enum(['sequential', 'batch', 'pipeline']);

export const InitialPhaseSchema = z.enum(['idle', 'pumping', 'mining']);

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

/**
 * Batch sizes the controller steps down through after a transport timeout.
 */
export const StepDownSequenceSchema = z
  .array(PositiveIntSchema)
  .min(1, 'Step-down sequence needs at least one size')
  .refine(
    sizes => sizes.every((size, i) => i === 0 || size < sizes[i - 1]),
    'Step-down sequence must be strictly decreasing'
  );

// =============================================================================
// Section Schemas
// =============================================================================

export const NetworkSchema = z.object({
  rpcUrl: RpcUrlSchema.optional(),
  chainId: PositiveIntSchema.default(MAINNET_CHAIN_ID),
  blockTimeMs: PositiveIntSchema.default(BLOCK_TIME_MS),
  /** Barrier wait per burst */
  confirmationTimeoutMs: PositiveIntSchema.default(300_000),
  receiptPollIntervalMs: PositiveIntSchema.default(2_000),
  rpcRetryAttempts: PositiveIntSchema.default(3),
}).default({});

export const ContractsSchema = z.object({
  factory: EthereumAddressSchema.default(MAINNET_ADDRESSES.factory),
  lighthouse: EthereumAddressSchema.optional(),
  xrt: EthereumAddressSchema.default(MAINNET_ADDRESSES.xrt),
  weth: EthereumAddressSchema.default(MAINNET_ADDRESSES.weth),
  router: EthereumAddressSchema.default(MAINNET_ADDRESSES.uniswapV2Router),
  auction: EthereumAddressSchema.default(MAINNET_ADDRESSES.auction),
  chainlinkEthUsd: EthereumAddressSchema.default(MAINNET_ADDRESSES.chainlinkEthUsd),
}).default({});

export const PhaseProfileSchema = z.object({
  mode: SchedulingModeSchema,
  priorityFeeGwei: z.number().min(0, 'Priority fee cannot be negative'),
  batchSize: PositiveIntSchema,
  /** Pump ceiling or mining floor, in gwei */
  targetSmmaGwei: z.number().min(0),
});

export const PhasesSchema = z.object({
  initial: InitialPhaseSchema.default('mining'),
  pump: PhaseProfileSchema.default({
    mode: 'pipeline',
    priorityFeeGwei: 50,
    batchSize: 28,
    targetSmmaGwei: 10.2,
  }),
  mine: PhaseProfileSchema.default({
    mode: 'pipeline',
    priorityFeeGwei: 1,
    batchSize: 20,
    targetSmmaGwei: 1.2,
  }),
  budgetEth: z.number().min(0).default(1.0),
  /** Consecutive unprofitable rounds before mining terminates */
  maxUnprofitableRounds: PositiveIntSchema.default(3),
  /** Margin (fraction of cost) at or above which a round counts as profitable */
  minMargin: z.number().min(0).default(0.05),
}).default({});

export const SchedulingSchema = z.object({
  stepDownSequence: StepDownSequenceSchema.default([56, 20, 10, 5, 2, 1]),
  /** Consecutive failed rounds tolerated before terminating */
  maxConsecutiveFailures: PositiveIntSchema.default(3),
  maxReconcileAttempts: PositiveIntSchema.default(3),
  deadlineBlocks: PositiveIntSchema.default(DEFAULT_DEADLINE_BLOCKS),
  maxReclaimAttempts: PositiveIntSchema.default(3),
}).default({});

export const EstimatorSchema = z.object({
  period: PositiveIntSchema.default(SMMA_PERIOD),
  resyncEveryObservations: PositiveIntSchema.default(200),
  maxStalenessMs: PositiveIntSchema.default(60_000),
}).default({});

export const LiquidationSchema = z.object({
  enabled: z.boolean().default(true),
  sellEveryXrt: z.number().positive().default(1000),
  slippagePercent: z.number().min(0).max(100).default(5),
  deadlineSeconds: PositiveIntSchema.default(300),
}).default({});

export const ThrottleSchema = z.object({
  /** 0 disables the USD cost throttle */
  maxCostUsd: z.number().min(0).default(0),
}).default({});

// =============================================================================
// Miner Configuration
// =============================================================================

export const MinerConfigSchema = z.object({
  privateKey: PrivateKeySchema.optional(),
  network: NetworkSchema,
  contracts: ContractsSchema,
  phases: PhasesSchema,
  scheduling: SchedulingSchema,
  estimator: EstimatorSchema,
  liquidation: LiquidationSchema,
  throttle: ThrottleSchema,
  logLevel: LogLevelSchema.default('info'),
});

export type MinerConfig = z.infer<typeof MinerConfigSchema>;
export type MinerConfigInput = z.input<typeof MinerConfigSchema>;
export type PhaseProfile = z.infer<typeof PhaseProfileSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationIssue[] };

export function validateWithDetails<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}
