/**
 * Liability Miner Service Entry Point
 *
 * Configuration comes from MINER_CONFIG_FILE (YAML) and environment
 * variables; see @xrt-miner/config. MINER_COMMAND picks the operation:
 *
 * - run (default): mining session; ROUNDS limits its length
 *   (0 = until the phase controller stops it)
 * - setup: create a lighthouse (LIGHTHOUSE_NAME, LIGHTHOUSE_MINIMAL_STAKE_WN,
 *   LIGHTHOUSE_TIMEOUT_BLOCKS) and stake STAKE_WN in it
 * - mine-once: one create + finalize cycle with MODEL and OBJECTIVE payloads
 * - stake: add AMOUNT_WN to the lighthouse stake
 * - buy: buy AMOUNT_WN of XRT within SLIPPAGE_PERCENT
 * - withdraw: take AMOUNT_WN of stake back
 */

import { loadMinerConfig } from '@xrt-miner/config';
import type { MinerConfig } from '@xrt-miner/config';
import {
  createLogger,
  parseEnvFloat,
  parseEnvInt,
  runServiceMain,
  setupServiceShutdown,
} from '@xrt-miner/core';
import type { ILogger } from '@xrt-miner/core';
import { ValidationError } from '@xrt-miner/types';
import { createLighthouseDeployer, createMinerService } from './bootstrap';

const SERVICE_NAME = 'liability-miner';

const COMMANDS = ['run', 'setup', 'mine-once', 'stake', 'buy', 'withdraw'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function requiredText(name: string): string {
  const value = process.env[name]?.trim();
  if (!value) throw new ValidationError(`${name} is required`, SERVICE_NAME, name);
  return value;
}

function amountWn(name: string): bigint {
  const amount = parseEnvInt(name, undefined, 1);
  if (amount === undefined) throw new ValidationError(`${name} is required`, SERVICE_NAME, name);
  return BigInt(amount);
}

async function runSession(config: MinerConfig, logger: ILogger): Promise<void> {
  const miner = createMinerService(config, logger);

  const cleanup = setupServiceShutdown({
    logger,
    serviceName: SERVICE_NAME,
    shutdownTimeoutMs: config.network.confirmationTimeoutMs + 30_000,
    onShutdown: async () => {
      miner.stop();
      await miner.drain();
    },
  });

  miner.on('sale', sale => {
    logger.info('Sale completed', { amount: sale.amount, proceeds: sale.proceeds, txHash: sale.txHash });
  });
  miner.on('sweep', sweep => {
    logger.info('Remainder swept', { amount: sweep.amount, proceeds: sweep.proceeds, txHash: sweep.txHash });
  });

  await miner.start();
  logger.info('Status', { ...(await miner.status()) });

  const limit = parseEnvInt('ROUNDS', 0, 0);
  let rounds = 0;
  while (!miner.isStopped() && (limit === 0 || rounds < limit)) {
    const [report] = await miner.runRounds(1);
    rounds += 1;
    if (!report || report.decision.action !== 'continue') {
      logger.info('Session ending', { reason: report?.decision.reason, rounds });
      break;
    }
  }

  await miner.drain();
  logger.info('Estimator', { ...miner.reportEstimatorState() });
  cleanup();
}

async function setupLighthouse(config: MinerConfig, logger: ILogger): Promise<void> {
  const lighthouse = await createLighthouseDeployer(config, logger).create({
    name: requiredText('LIGHTHOUSE_NAME'),
    minimalStake: BigInt(parseEnvInt('LIGHTHOUSE_MINIMAL_STAKE_WN', 1, 1)),
    timeoutBlocks: parseEnvInt('LIGHTHOUSE_TIMEOUT_BLOCKS', 1, 1),
  });

  const miner = createMinerService({ ...config, contracts: { ...config.contracts, lighthouse } }, logger);
  await miner.stake(amountWn('STAKE_WN'));
  logger.info('Lighthouse ready; set LIGHTHOUSE_ADDRESS to mine on it', { lighthouse });
}

async function main(): Promise<void> {
  const config = loadMinerConfig();
  const logger = createLogger({ name: SERVICE_NAME, level: config.logLevel });

  const command = process.env.MINER_COMMAND?.trim() || 'run';
  if (!isCommand(command)) {
    throw new ValidationError(
      `Unknown MINER_COMMAND "${command}", expected one of ${COMMANDS.join(', ')}`,
      SERVICE_NAME,
      'MINER_COMMAND'
    );
  }

  switch (command) {
    case 'run':
      return runSession(config, logger);
    case 'setup':
      return setupLighthouse(config, logger);
    case 'mine-once': {
      const round = await createMinerService(config, logger).mineOnce({
        model: process.env.MODEL?.trim() || undefined,
        objective: process.env.OBJECTIVE?.trim() || undefined,
      });
      logger.info('Cycle finished', { status: round.outcome.status, minted: round.outcome.minted });
      return;
    }
    case 'stake':
      return createMinerService(config, logger).stake(amountWn('AMOUNT_WN'));
    case 'buy': {
      const slippage = parseEnvFloat('SLIPPAGE_PERCENT', config.liquidation.slippagePercent, 0, 100) / 100;
      const result = await createMinerService(config, logger).buy(amountWn('AMOUNT_WN'), slippage);
      logger.info('Purchase confirmed', { ...result });
      return;
    }
    case 'withdraw':
      return createMinerService(config, logger).withdrawStake(amountWn('AMOUNT_WN'));
  }
}

runServiceMain({ main, serviceName: SERVICE_NAME });

export * from './exports';
