import type { ILogger } from '@xrt-miner/core';
import { ValidationError } from '@xrt-miner/types';
import type { Address, ChainClient, TransactionFactory } from '@xrt-miner/types';
import type { AccountTransactor } from '../nonce/account-transactor';

export type StakeTopUp =
  | { status: 'sufficient'; stake: bigint; needed: bigint }
  | { status: 'refilled'; stake: bigint; needed: bigint; amount: bigint }
  | { status: 'no-balance'; stake: bigint; needed: bigint };

const SERVICE = 'stake-manager';

/**
 * Keeps the lighthouse stake high enough for the quota a round needs.
 * Quota per turn is stake / minimalStake.
 */
export class StakeManager {
  constructor(
    private readonly chain: ChainClient,
    private readonly transactor: AccountTransactor,
    private readonly txFactory: TransactionFactory,
    private readonly lighthouse: Address,
    private readonly logger: ILogger
  ) {}

  /**
   * Top up the stake to `neededQuota * minimalStake`. The top-up is capped
   * at the token balance; nothing happens with an empty balance.
   */
  async ensureStake(neededQuota: number): Promise<StakeTopUp> {
    const account = this.transactor.account;
    const snapshot = await this.chain.getLighthouseSnapshot(account);
    const needed = BigInt(neededQuota) * snapshot.minimalStake;

    if (snapshot.stake >= needed) {
      return { status: 'sufficient', stake: snapshot.stake, needed };
    }

    let amount = needed - snapshot.stake;
    const balance = await this.chain.getTokenBalance(account);
    if (balance < amount) {
      this.logger.warn('Token balance short of stake top-up', { needed: amount, balance, stake: snapshot.stake });
      if (balance === 0n) {
        return { status: 'no-balance', stake: snapshot.stake, needed };
      }
      amount = balance;
    }

    await this.stake(amount);

    const stake = snapshot.stake + amount;
    this.logger.info('Stake topped up', { amount, stake, needed });
    return { status: 'refilled', stake, needed, amount };
  }

  /**
   * Approve the lighthouse when needed and refill by `amount`. Staking the
   * first time registers the account as a provider.
   */
  async stake(amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw new ValidationError(`Stake amount must be positive, got ${amount}`, SERVICE, 'amount');
    }
    await this.transactor.ensureAllowance(this.lighthouse, amount, SERVICE);
    await this.transactor.send(
      'refill',
      (nonce, fees) => this.txFactory.buildRefill(amount, nonce, fees),
      SERVICE
    );
    this.logger.info('Staked', { amount, lighthouse: this.lighthouse });
  }

  async withdraw(amount: bigint): Promise<void> {
    await this.transactor.send(
      'withdraw',
      (nonce, fees) => this.txFactory.buildWithdraw(amount, nonce, fees),
      SERVICE
    );
    this.logger.info('Stake withdrawn', { amount });
  }
}
