/**
 * Wires the real miner components on top of FakeChain.
 */

import { ethers } from 'ethers';
import { RecordingLogger } from '@xrt-miner/core';
import type { PhaseProfile } from '@xrt-miner/config';
import type { Hex, Phase } from '@xrt-miner/types';
import { feeParams } from '../../src/chain/fees';
import { EthersLiabilityTxFactory } from '../../src/chain/liability-tx-factory';
import { EthersReceiptDecoder } from '../../src/chain/receipt-decoder';
import { EmissionEstimator } from '../../src/estimation/emission-estimator';
import type { EmissionEstimatorConfig } from '../../src/estimation/emission-estimator';
import { ProfitabilityEstimator } from '../../src/estimation/profitability';
import { MarkerTracker } from '../../src/lighthouse/marker-tracker';
import type { WaitFn } from '../../src/lighthouse/marker-tracker';
import { StakeManager } from '../../src/lighthouse/stake-manager';
import { LiquidationTrigger } from '../../src/liquidation/liquidation-trigger';
import { MinerService } from '../../src/miner-service';
import { AccountTransactor } from '../../src/nonce/account-transactor';
import { NonceSequencer } from '../../src/nonce/nonce-sequencer';
import { PhaseController } from '../../src/phases/phase-controller';
import type { PhasePolicy } from '../../src/phases/phase-decision';
import { RoundScheduler } from '../../src/scheduling/round-scheduler';
import type { RoundSchedulerConfig } from '../../src/scheduling/round-scheduler';
import { WalletLiabilitySigner } from '../../src/signing/liability-signer';
import { UniswapV2Swap } from '../../src/swap/uniswap-v2-swap';
import { ADDRESSES, CHAIN_ID, FakeChain, TEST_PRIVATE_KEY } from './fake-chain';
import type { FakeChainOptions } from './fake-chain';

export interface HarnessOptions {
  chain?: FakeChainOptions;
  /** Stake of the miner account in operations per turn */
  stakeOperations?: number;
  /** Marker quota handed to the miner at start, 0 leaves the marker unassigned */
  quota?: number;
  /** Priority fee of side transactions (approve, refill, swap) */
  sidePriorityFeeGwei?: number;
  estimator?: Partial<EmissionEstimatorConfig>;
  scheduler?: Partial<RoundSchedulerConfig>;
  maxReclaimAttempts?: number;
  /** Marker wait; defaults to advancing the fake chain by the waited blocks */
  wait?: WaitFn;
}

export interface Harness {
  chain: FakeChain;
  wallet: ethers.Wallet;
  account: string;
  logger: RecordingLogger;
  sequencer: NonceSequencer;
  txFactory: EthersLiabilityTxFactory;
  transactor: AccountTransactor;
  signer: WalletLiabilitySigner;
  decoder: EthersReceiptDecoder;
  marker: MarkerTracker;
  estimator: EmissionEstimator;
  amm: UniswapV2Swap;
  stake: StakeManager;
  scheduler: RoundScheduler;
}

export const BLOCK_TIME_MS = 12_000;

/** Deterministic 34-byte payloads */
export function counterPayload(): () => Hex {
  let n = 0;
  return () => ethers.toBeHex(++n, 34);
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const chain = new FakeChain(options.chain);
  const wallet = new ethers.Wallet(TEST_PRIVATE_KEY);
  const account = wallet.address;
  const logger = new RecordingLogger();

  const stakeOperations = options.stakeOperations ?? 100;
  chain.addProvider(account, stakeOperations);
  const quota = options.quota ?? stakeOperations;
  if (quota > 0) chain.giveMarker(account, quota);

  const txFactory = new EthersLiabilityTxFactory(wallet, {
    chainId: CHAIN_ID,
    factory: ADDRESSES.factory,
    lighthouse: ADDRESSES.lighthouse,
    xrt: ADDRESSES.xrt,
    weth: ADDRESSES.weth,
    router: ADDRESSES.router,
  });
  const sequencer = new NonceSequencer(chain, account, { confirmationTimeoutMs: 1_000 }, logger.child({ component: 'nonce' }));
  const sidePriority = options.sidePriorityFeeGwei ?? 1;
  const transactor = new AccountTransactor(
    chain,
    sequencer,
    txFactory,
    async () => feeParams(await chain.getGasPrice(), sidePriority),
    logger.child({ component: 'transactor' })
  );
  const signer = new WalletLiabilitySigner(wallet);
  const decoder = new EthersReceiptDecoder(ADDRESSES.factory, ADDRESSES.xrt);

  const wait: WaitFn =
    options.wait ??
    (async ms => {
      chain.advanceBlocks(Math.ceil(ms / BLOCK_TIME_MS));
    });
  const marker = new MarkerTracker(
    chain,
    account,
    { blockTimeMs: BLOCK_TIME_MS, maxReclaimAttempts: options.maxReclaimAttempts ?? 3 },
    logger.child({ component: 'marker' }),
    wait
  );

  const estimator = new EmissionEstimator(
    chain,
    { period: 1000, resyncEveryObservations: 10_000, maxStalenessMs: 3_600_000, ...options.estimator },
    logger.child({ component: 'estimator' })
  );

  const amm = new UniswapV2Swap(
    chain,
    transactor,
    txFactory,
    { router: ADDRESSES.router, xrt: ADDRESSES.xrt, weth: ADDRESSES.weth },
    logger.child({ component: 'amm' })
  );

  const stake = new StakeManager(chain, transactor, txFactory, ADDRESSES.lighthouse, logger.child({ component: 'stake' }));

  const scheduler = new RoundScheduler(
    { chain, sequencer, marker, txFactory, signer, decoder, estimator },
    {
      token: ADDRESSES.xrt,
      lighthouse: ADDRESSES.lighthouse,
      deadlineBlocks: 300,
      confirmationTimeoutMs: 1_000,
      maxReconcileAttempts: 2,
      ...options.scheduler,
    },
    logger.child({ component: 'scheduler' }),
    counterPayload()
  );

  return {
    chain,
    wallet,
    account,
    logger,
    sequencer,
    txFactory,
    transactor,
    signer,
    decoder,
    marker,
    estimator,
    amm,
    stake,
    scheduler,
  };
}

// =============================================================================
// Miner
// =============================================================================

export const PUMP_PROFILE: PhaseProfile = { mode: 'pipeline', priorityFeeGwei: 50, batchSize: 28, targetSmmaGwei: 10.2 };
export const MINE_PROFILE: PhaseProfile = { mode: 'pipeline', priorityFeeGwei: 1, batchSize: 20, targetSmmaGwei: 1.2 };

export function createPolicy(overrides: Partial<PhasePolicy> = {}): PhasePolicy {
  return {
    pump: PUMP_PROFILE,
    mine: MINE_PROFILE,
    stepDownSequence: [56, 20, 10, 5, 2, 1],
    maxConsecutiveFailures: 3,
    maxUnprofitableRounds: 3,
    maxCostUsd: 0,
    ...overrides,
  };
}

export interface MinerOptions {
  policy?: Partial<PhasePolicy>;
  initialPhase?: Exclude<Phase, 'terminated'>;
  budgetWei?: bigint;
  /** Lot size in wn, null disables liquidation */
  liquidationThresholdWn?: bigint | null;
  slippageTolerance?: number;
  profitability?: boolean;
}

export interface MinerHarness {
  miner: MinerService;
  phases: PhaseController;
  liquidation: LiquidationTrigger | null;
}

export function createMiner(h: Harness, options: MinerOptions = {}): MinerHarness {
  const policy = createPolicy(options.policy);
  const phases = new PhaseController(policy, options.budgetWei ?? 10n ** 19n, h.logger.child({ component: 'phases' }));

  const threshold = options.liquidationThresholdWn === undefined ? null : options.liquidationThresholdWn;
  const liquidation =
    threshold === null
      ? null
      : new LiquidationTrigger(
          h.amm,
          { thresholdWn: threshold, slippageTolerance: options.slippageTolerance ?? 0.05, deadlineSeconds: 300 },
          () => h.chain.getLatestTimestamp(),
          h.logger.child({ component: 'liquidation' })
        );

  const profitability =
    options.profitability === false
      ? null
      : new ProfitabilityEstimator(h.chain, h.amm, { minMargin: 0.05 }, h.logger.child({ component: 'profitability' }));

  const miner = new MinerService(
    {
      chain: h.chain,
      sequencer: h.sequencer,
      marker: h.marker,
      stake: h.stake,
      scheduler: h.scheduler,
      estimator: h.estimator,
      phases,
      profitability,
      liquidation,
      amm: h.amm,
    },
    {
      account: h.account,
      initialPhase: options.initialPhase ?? 'mining',
      maxCostUsd: policy.maxCostUsd,
      swapDeadlineSeconds: 300,
    },
    h.logger
  );

  return { miner, phases, liquidation };
}
