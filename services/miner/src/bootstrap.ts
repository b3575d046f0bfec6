/**
 * Wires a MinerService from validated configuration.
 */

import { ethers } from 'ethers';
import { WN_PER_XRT, ethToWei } from '@xrt-miner/config';
import type { MinerConfig } from '@xrt-miner/config';
import type { ILogger } from '@xrt-miner/core';
import { ValidationError } from '@xrt-miner/types';
import type { Address } from '@xrt-miner/types';
import { EthersChainClient } from './chain/ethers-chain-client';
import { EthersLiabilityTxFactory } from './chain/liability-tx-factory';
import { feeParams } from './chain/fees';
import { EthersReceiptDecoder } from './chain/receipt-decoder';
import { EmissionEstimator } from './estimation/emission-estimator';
import { ProfitabilityEstimator } from './estimation/profitability';
import { LighthouseDeployer } from './lighthouse/lighthouse-deployer';
import { MarkerTracker } from './lighthouse/marker-tracker';
import { StakeManager } from './lighthouse/stake-manager';
import { LiquidationTrigger } from './liquidation/liquidation-trigger';
import { MinerService } from './miner-service';
import { AccountTransactor } from './nonce/account-transactor';
import { NonceSequencer } from './nonce/nonce-sequencer';
import { PhaseController } from './phases/phase-controller';
import type { PhasePolicy } from './phases/phase-decision';
import { RoundScheduler } from './scheduling/round-scheduler';
import { WalletLiabilitySigner } from './signing/liability-signer';
import { UniswapV2Swap } from './swap/uniswap-v2-swap';

const SERVICE = 'miner';

export function phasePolicyFrom(config: MinerConfig): PhasePolicy {
  return {
    pump: config.phases.pump,
    mine: config.phases.mine,
    stepDownSequence: config.scheduling.stepDownSequence,
    maxConsecutiveFailures: config.scheduling.maxConsecutiveFailures,
    maxUnprofitableRounds: config.phases.maxUnprofitableRounds,
    maxCostUsd: config.throttle.maxCostUsd,
  };
}

/** Whole-XRT lot size to wn */
export function xrtToWn(xrt: number): bigint {
  return BigInt(Math.round(xrt * Number(WN_PER_XRT)));
}

interface AccountWiring {
  provider: ethers.JsonRpcProvider;
  wallet: ethers.Wallet;
  chain: EthersChainClient;
  txFactory: EthersLiabilityTxFactory;
  sequencer: NonceSequencer;
  transactor: AccountTransactor;
  /** Priority fee side transactions pay from now on */
  setSidePriorityFee(gwei: number): void;
}

/**
 * Provider, signing wallet and nonce-sequenced transactor for the account.
 */
function wireAccount(config: MinerConfig, lighthouse: Address, logger: ILogger): AccountWiring {
  const { rpcUrl } = config.network;
  const { privateKey } = config;
  if (!rpcUrl) throw new ValidationError('RPC_URL is required', SERVICE, 'network.rpcUrl');
  if (!privateKey) throw new ValidationError('PRIVATE_KEY is required', SERVICE, 'privateKey');

  const provider = new ethers.JsonRpcProvider(rpcUrl, config.network.chainId, { staticNetwork: true });
  const wallet = new ethers.Wallet(privateKey, provider);

  const chain = new EthersChainClient(
    provider,
    {
      factory: config.contracts.factory,
      lighthouse,
      xrt: config.contracts.xrt,
      auction: config.contracts.auction,
      chainlinkEthUsd: config.contracts.chainlinkEthUsd,
      receiptPollIntervalMs: config.network.receiptPollIntervalMs,
      rpcRetryAttempts: config.network.rpcRetryAttempts,
    },
    logger.child({ component: 'chain' })
  );

  const txFactory = new EthersLiabilityTxFactory(wallet, {
    chainId: config.network.chainId,
    factory: config.contracts.factory,
    lighthouse,
    xrt: config.contracts.xrt,
    weth: config.contracts.weth,
    router: config.contracts.router,
  });

  const sequencer = new NonceSequencer(
    chain,
    wallet.address,
    { confirmationTimeoutMs: config.network.confirmationTimeoutMs },
    logger.child({ component: 'nonce' })
  );

  let priorityFeeGwei = config.phases.mine.priorityFeeGwei;
  const transactor = new AccountTransactor(
    chain,
    sequencer,
    txFactory,
    async () => feeParams(await chain.getGasPrice(), priorityFeeGwei),
    logger.child({ component: 'transactor' })
  );

  return {
    provider,
    wallet,
    chain,
    txFactory,
    sequencer,
    transactor,
    setSidePriorityFee: gwei => {
      priorityFeeGwei = gwei;
    },
  };
}

/**
 * Deployer for a new lighthouse; needs no lighthouse address in the config.
 */
export function createLighthouseDeployer(config: MinerConfig, logger: ILogger): LighthouseDeployer {
  const { txFactory, transactor } = wireAccount(config, config.contracts.lighthouse ?? ethers.ZeroAddress, logger);
  return new LighthouseDeployer(
    transactor,
    txFactory,
    new EthersReceiptDecoder(config.contracts.factory, config.contracts.xrt),
    logger.child({ component: 'deployer' })
  );
}

export function createMinerService(config: MinerConfig, logger: ILogger): MinerService {
  const { lighthouse } = config.contracts;
  if (!lighthouse) throw new ValidationError('LIGHTHOUSE_ADDRESS is required', SERVICE, 'contracts.lighthouse');

  const { provider, wallet, chain, txFactory, sequencer, transactor, setSidePriorityFee } = wireAccount(
    config,
    lighthouse,
    logger
  );
  const account = wallet.address;

  const marker = new MarkerTracker(
    chain,
    account,
    { blockTimeMs: config.network.blockTimeMs, maxReclaimAttempts: config.scheduling.maxReclaimAttempts },
    logger.child({ component: 'marker' })
  );

  const estimator = new EmissionEstimator(chain, config.estimator, logger.child({ component: 'estimator' }));

  const amm = new UniswapV2Swap(
    provider,
    transactor,
    txFactory,
    { router: config.contracts.router, xrt: config.contracts.xrt, weth: config.contracts.weth },
    logger.child({ component: 'amm' })
  );

  const scheduler = new RoundScheduler(
    {
      chain,
      sequencer,
      marker,
      txFactory,
      signer: new WalletLiabilitySigner(wallet),
      decoder: new EthersReceiptDecoder(config.contracts.factory, config.contracts.xrt),
      estimator,
    },
    {
      token: config.contracts.xrt,
      lighthouse,
      deadlineBlocks: config.scheduling.deadlineBlocks,
      confirmationTimeoutMs: config.network.confirmationTimeoutMs,
      maxReconcileAttempts: config.scheduling.maxReconcileAttempts,
    },
    logger.child({ component: 'scheduler' })
  );

  const phases = new PhaseController(
    phasePolicyFrom(config),
    ethToWei(config.phases.budgetEth),
    logger.child({ component: 'phases' })
  );
  // Side transactions pay the current phase's priority fee
  phases.onChange(() => {
    setSidePriorityFee(phases.getConfig().priorityFeeGwei);
  });

  const liquidation = config.liquidation.enabled
    ? new LiquidationTrigger(
        amm,
        {
          thresholdWn: xrtToWn(config.liquidation.sellEveryXrt),
          slippageTolerance: config.liquidation.slippagePercent / 100,
          deadlineSeconds: config.liquidation.deadlineSeconds,
        },
        () => chain.getLatestTimestamp(),
        logger.child({ component: 'liquidation' })
      )
    : null;

  return new MinerService(
    {
      chain,
      sequencer,
      marker,
      stake: new StakeManager(chain, transactor, txFactory, lighthouse, logger.child({ component: 'stake' })),
      scheduler,
      estimator,
      phases,
      profitability: new ProfitabilityEstimator(
        chain,
        amm,
        { minMargin: config.phases.minMargin },
        logger.child({ component: 'profitability' })
      ),
      liquidation,
      amm,
    },
    {
      account,
      initialPhase: config.phases.initial,
      maxCostUsd: config.throttle.maxCostUsd,
      swapDeadlineSeconds: config.liquidation.deadlineSeconds,
    },
    logger
  );
}
