import type { ILogger } from '@xrt-miner/core';
import { MinerError, ValidationError } from '@xrt-miner/types';
import type { Address, ReceiptDecoder, TransactionFactory } from '@xrt-miner/types';
import type { AccountTransactor } from '../nonce/account-transactor';

export interface LighthouseSetup {
  /** ENS subdomain label */
  name: string;
  /** wn per quota unit */
  minimalStake: bigint;
  timeoutBlocks: number;
}

const SERVICE = 'lighthouse-deployer';

/**
 * Creates a new lighthouse through the factory and reads its address from
 * the NewLighthouse event.
 */
export class LighthouseDeployer {
  constructor(
    private readonly transactor: AccountTransactor,
    private readonly txFactory: TransactionFactory,
    private readonly decoder: ReceiptDecoder,
    private readonly logger: ILogger
  ) {}

  async create(setup: LighthouseSetup): Promise<Address> {
    if (setup.name.length === 0) {
      throw new ValidationError('Lighthouse name is required', SERVICE, 'name');
    }
    if (setup.minimalStake <= 0n) {
      throw new ValidationError('Minimal stake must be positive', SERVICE, 'minimalStake');
    }
    if (!Number.isInteger(setup.timeoutBlocks) || setup.timeoutBlocks < 1) {
      throw new ValidationError('Timeout must be at least one block', SERVICE, 'timeoutBlocks');
    }

    const receipt = await this.transactor.send(
      'createLighthouse',
      (nonce, fees) => this.txFactory.buildCreateLighthouse(setup, nonce, fees),
      SERVICE
    );

    const lighthouse = this.decoder.createdLighthouse(receipt);
    if (lighthouse === null) {
      throw new MinerError(`createLighthouse ${receipt.hash} emitted no NewLighthouse event`, 'EVENT_MISSING', SERVICE);
    }

    this.logger.info('Lighthouse created', { lighthouse, name: setup.name, minimalStake: setup.minimalStake });
    return lighthouse;
  }
}
