/**
 * Single-transaction helper on top of the sequencer, for everything that is
 * not a liability burst: stake top-ups, withdrawals, approvals, swaps.
 */

import type { ILogger } from '@xrt-miner/core';
import { NetworkError, TransactionRevertedError, TransportTimeoutError } from '@xrt-miner/types';
import type {
  Address,
  ChainClient,
  FeeParams,
  SignedTx,
  SubmissionResult,
  TransactionFactory,
  TxReceipt,
} from '@xrt-miner/types';
import type { NonceSequencer } from './nonce-sequencer';

/** Current fee inputs for the next transaction */
export type FeeSource = () => Promise<FeeParams>;

export type TxBuilder = (nonce: number, fees: FeeParams) => Promise<SignedTx>;

/**
 * Turn a submission result into a receipt, or throw the matching error.
 */
export function expectIncluded(result: SubmissionResult, operation: string, service: string): TxReceipt {
  switch (result.status) {
    case 'included':
      if (result.receipt.status === 'reverted') {
        throw new TransactionRevertedError(`${operation} transaction ${result.tx.hash} reverted`, result.tx.hash, service);
      }
      return result.receipt;
    case 'pending':
      throw new TransportTimeoutError(`${operation} transaction ${result.tx.hash} not confirmed in time`, service, 1, 1);
    case 'transport-failed':
      throw new NetworkError(`${operation} broadcast failed: ${result.error}`, service);
  }
}

export class AccountTransactor {
  constructor(
    private readonly chain: ChainClient,
    private readonly sequencer: NonceSequencer,
    private readonly txFactory: TransactionFactory,
    private readonly fees: FeeSource,
    private readonly logger: ILogger
  ) {}

  get account(): Address {
    return this.txFactory.account;
  }

  async send(operation: string, build: TxBuilder, service = 'account-transactor'): Promise<TxReceipt> {
    const fees = await this.fees();
    const result = await this.sequencer.sendOne(nonce => build(nonce, fees));
    const receipt = expectIncluded(result, operation, service);
    this.logger.info('Transaction confirmed', {
      operation,
      hash: receipt.hash,
      gasUsed: receipt.gasUsed,
      block: receipt.blockNumber,
    });
    return receipt;
  }

  /**
   * Approve `spender` for `amount` of the token when the current allowance
   * is short. Returns whether an approval was sent.
   */
  async ensureAllowance(spender: Address, amount: bigint, service?: string): Promise<boolean> {
    const current = await this.chain.getTokenAllowance(this.account, spender);
    if (current >= amount) return false;

    this.logger.info('Approving token allowance', { spender, amount, current });
    await this.send('approve', (nonce, fees) => this.txFactory.buildApprove(spender, amount, nonce, fees), service);
    return true;
  }
}
