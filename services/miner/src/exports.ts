// Public surface of @xrt-miner/miner

export { MinerService } from './miner-service';
export type {
  MinerServiceDeps,
  MinerServiceOptions,
  MinerServiceEvents,
  MinerStatus,
  EstimatorReport,
  RoundReport,
} from './miner-service';
export { createLighthouseDeployer, createMinerService, phasePolicyFrom, xrtToWn } from './bootstrap';

export { NonceSequencer } from './nonce/nonce-sequencer';
export type { NonceSequencerConfig, BatchSubmission, SubmitOptions } from './nonce/nonce-sequencer';
export { AccountTransactor, expectIncluded } from './nonce/account-transactor';
export type { FeeSource, TxBuilder } from './nonce/account-transactor';

export { MarkerTracker, hasTimedOut, timeoutBlock, turnCapacity } from './lighthouse/marker-tracker';
export type { MarkerTrackerConfig } from './lighthouse/marker-tracker';
export { StakeManager } from './lighthouse/stake-manager';
export type { StakeTopUp } from './lighthouse/stake-manager';
export { LighthouseDeployer } from './lighthouse/lighthouse-deployer';
export type { LighthouseSetup } from './lighthouse/lighthouse-deployer';

export { RoundScheduler, requiredQuota, randomPayload } from './scheduling/round-scheduler';
export type {
  RoundRequest,
  DrainRequest,
  LiabilityContent,
  RoundSchedulerConfig,
  RoundSchedulerDeps,
} from './scheduling/round-scheduler';
export { canTransition, transition, newLiability } from './scheduling/liability-lifecycle';

export {
  EmissionEstimator,
  estimateEmission,
  halfLifeRounds,
  projectSmma,
  weiToGwei,
} from './estimation/emission-estimator';
export type { EmissionEstimatorConfig } from './estimation/emission-estimator';
export { ProfitabilityEstimator, estimateProfitability, costPerLiabilityUsd } from './estimation/profitability';
export type { ProfitabilityOptions, ProfitabilityReport } from './estimation/profitability';

export { LiquidationTrigger, realizedPrice, sellableAmount } from './liquidation/liquidation-trigger';
export type { LiquidationConfig, LiquidationOutcome } from './liquidation/liquidation-trigger';

export { PhaseController, canEnter } from './phases/phase-controller';
export type { PhaseChange } from './phases/phase-controller';
export {
  decideNextRound,
  throttleBatchSize,
  largestFittingBatch,
  stepDown,
  phaseConfigFor,
} from './phases/phase-decision';
export type { PhaseDecision, PhasePolicy, DecisionInput, PhaseCounters } from './phases/phase-decision';

export { EthersChainClient, normalizeReceipt } from './chain/ethers-chain-client';
export { EthersLiabilityTxFactory } from './chain/liability-tx-factory';
export { EthersReceiptDecoder, NEW_LIABILITY_TOPIC, NEW_LIGHTHOUSE_TOPIC } from './chain/receipt-decoder';
export { computeEip1559Fees, feeParams } from './chain/fees';
export { WalletLiabilitySigner, messageHash, encodeMessage, resultHash } from './signing/liability-signer';
export { UniswapV2Swap, minimumProceeds, maximumSpend } from './swap/uniswap-v2-swap';
