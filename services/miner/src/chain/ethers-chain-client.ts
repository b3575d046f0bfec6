/**
 * Ethers Chain Client
 *
 * ChainClient over a JSON-RPC provider. Reads are retried on transient
 * transport errors; broadcasts are not.
 */

import { ethers } from 'ethers';
import { CHAINLINK_USD_DECIMALS } from '@xrt-miner/config';
import { pollUntil, withRetry, isRetryableError } from '@xrt-miner/core';
import type { ILogger } from '@xrt-miner/core';
import { NetworkError, ValidationError } from '@xrt-miner/types';
import type { Address, ChainClient, Hex, LighthouseSnapshot, TxReceipt } from '@xrt-miner/types';
import { AUCTION_ABI, CHAINLINK_ABI, ERC20_ABI, FACTORY_ABI, LIGHTHOUSE_ABI } from './abi';

export interface EthersChainClientConfig {
  factory: Address;
  lighthouse?: Address;
  xrt: Address;
  auction: Address;
  chainlinkEthUsd: Address;
  receiptPollIntervalMs: number;
  rpcRetryAttempts: number;
}

const FACTORY_INTERFACE = new ethers.Interface(FACTORY_ABI);
const LIGHTHOUSE_INTERFACE = new ethers.Interface(LIGHTHOUSE_ABI);
const ERC20_INTERFACE = new ethers.Interface(ERC20_ABI);
const AUCTION_INTERFACE = new ethers.Interface(AUCTION_ABI);
const CHAINLINK_INTERFACE = new ethers.Interface(CHAINLINK_ABI);

const SERVICE = 'chain-client';

export function normalizeReceipt(receipt: ethers.TransactionReceipt): TxReceipt {
  return {
    hash: receipt.hash,
    blockNumber: receipt.blockNumber,
    status: receipt.status === 1 ? 'success' : 'reverted',
    gasUsed: receipt.gasUsed,
    effectiveGasPrice: receipt.gasPrice,
    logs: receipt.logs.map(log => ({ address: log.address, topics: [...log.topics], data: log.data })),
  };
}

export class EthersChainClient implements ChainClient {
  constructor(
    private readonly provider: ethers.JsonRpcProvider,
    private readonly config: EthersChainClientConfig,
    private readonly logger: ILogger
  ) {}

  // ===========================================================================
  // Account & block
  // ===========================================================================

  getPendingNonce(account: Address): Promise<number> {
    return this.read('getPendingNonce', () => this.provider.getTransactionCount(account, 'pending'));
  }

  getBlockNumber(): Promise<number> {
    return this.read('getBlockNumber', () => this.provider.getBlockNumber());
  }

  async getLatestTimestamp(): Promise<number> {
    const block = await this.read('getLatestTimestamp', () => this.provider.getBlock('latest'));
    if (!block) {
      throw new NetworkError('Latest block unavailable', SERVICE);
    }
    return block.timestamp;
  }

  async getGasPrice(): Promise<bigint> {
    const feeData = await this.read('getGasPrice', () => this.provider.getFeeData());
    if (feeData.gasPrice === null) {
      throw new NetworkError('Node returned no gas price', SERVICE);
    }
    return feeData.gasPrice;
  }

  getNativeBalance(account: Address): Promise<bigint> {
    return this.read('getNativeBalance', () => this.provider.getBalance(account));
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  async broadcast(raw: Hex): Promise<Hex> {
    const response = await this.provider.broadcastTransaction(raw);
    return response.hash;
  }

  async getReceipt(hash: Hex): Promise<TxReceipt | null> {
    const receipt = await this.read('getReceipt', () => this.provider.getTransactionReceipt(hash));
    return receipt ? normalizeReceipt(receipt) : null;
  }

  waitForReceipt(hash: Hex, timeoutMs: number): Promise<TxReceipt | null> {
    return pollUntil(() => this.getReceipt(hash), {
      timeoutMs,
      intervalMs: this.config.receiptPollIntervalMs,
    });
  }

  // ===========================================================================
  // Factory & emission
  // ===========================================================================

  getAuthoritativeSmma(): Promise<bigint> {
    return this.callUint(this.config.factory, FACTORY_INTERFACE, 'gasPrice', []);
  }

  getFactoryNonce(account: Address): Promise<bigint> {
    return this.callUint(this.config.factory, FACTORY_INTERFACE, 'nonceOf', [account]);
  }

  getEmissionForGas(gas: bigint): Promise<bigint> {
    return this.callUint(this.config.factory, FACTORY_INTERFACE, 'wnFromGas', [gas]);
  }

  getAuctionFinalPrice(): Promise<bigint> {
    return this.callUint(this.config.auction, AUCTION_INTERFACE, 'finalPrice', []);
  }

  async getEthUsdPrice(): Promise<number> {
    const answer = await this.callUint(this.config.chainlinkEthUsd, CHAINLINK_INTERFACE, 'latestAnswer', []);
    return Number(answer) / 10 ** CHAINLINK_USD_DECIMALS;
  }

  // ===========================================================================
  // Token
  // ===========================================================================

  getTokenBalance(account: Address): Promise<bigint> {
    return this.callUint(this.config.xrt, ERC20_INTERFACE, 'balanceOf', [account]);
  }

  getTokenAllowance(owner: Address, spender: Address): Promise<bigint> {
    return this.callUint(this.config.xrt, ERC20_INTERFACE, 'allowance', [owner, spender]);
  }

  // ===========================================================================
  // Lighthouse
  // ===========================================================================

  async getLighthouseSnapshot(account: Address): Promise<LighthouseSnapshot> {
    const lighthouse = this.config.lighthouse;
    if (!lighthouse) {
      throw new ValidationError('No lighthouse configured', SERVICE, 'contracts.lighthouse');
    }

    const [marker, quota, keepAliveBlock, timeoutBlocks, minimalStake, stake, indexOf, currentBlock] =
      await Promise.all([
        this.callUint(lighthouse, LIGHTHOUSE_INTERFACE, 'marker', []),
        this.callUint(lighthouse, LIGHTHOUSE_INTERFACE, 'quota', []),
        this.callUint(lighthouse, LIGHTHOUSE_INTERFACE, 'keepAliveBlock', []),
        this.callUint(lighthouse, LIGHTHOUSE_INTERFACE, 'timeoutInBlocks', []),
        this.callUint(lighthouse, LIGHTHOUSE_INTERFACE, 'minimalStake', []),
        this.callUint(lighthouse, LIGHTHOUSE_INTERFACE, 'stakes', [account]),
        this.callUint(lighthouse, LIGHTHOUSE_INTERFACE, 'indexOf', [account]),
        this.getBlockNumber(),
      ]);

    return {
      address: lighthouse,
      markerHolder: await this.providerAt(lighthouse, marker),
      markerIndex: Number(marker),
      quota: Number(quota),
      keepAliveBlock: Number(keepAliveBlock),
      timeoutBlocks: Number(timeoutBlocks),
      minimalStake,
      stake,
      // indexOf is 1-based, 0 means not registered
      providerIndex: indexOf > 0n ? Number(indexOf - 1n) : null,
      currentBlock,
    };
  }

  /**
   * providers(i) reverts past the end of the list, which is how an empty
   * provider list shows up.
   */
  private async providerAt(lighthouse: Address, index: bigint): Promise<Address | null> {
    try {
      const result = await this.call(lighthouse, LIGHTHOUSE_INTERFACE, 'providers', [index]);
      return ethers.getAddress(String(result[0]));
    } catch (error) {
      if (ethers.isError(error, 'CALL_EXCEPTION')) {
        this.logger.debug('Lighthouse has no provider at marker', { index: index.toString() });
        return null;
      }
      throw error;
    }
  }

  // ===========================================================================
  // Low-level helpers
  // ===========================================================================

  private async callUint(to: Address, iface: ethers.Interface, fn: string, args: unknown[]): Promise<bigint> {
    const result = await this.call(to, iface, fn, args);
    return BigInt(result[0].toString());
  }

  private async call(to: Address, iface: ethers.Interface, fn: string, args: unknown[]): Promise<ethers.Result> {
    const data = iface.encodeFunctionData(fn, args);
    const raw = await this.read(fn, () => this.provider.call({ to, data }));
    return iface.decodeFunctionResult(fn, raw);
  }

  private read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      maxAttempts: this.config.rpcRetryAttempts,
      isRetryable: isRetryableError,
      onRetry: (error, attempt, nextDelayMs) => {
        this.logger.warn('RPC read failed, retrying', { operation, attempt, nextDelayMs, error: error.message });
      },
    });
  }
}
