/**
 * Ethers Liability Transaction Factory
 *
 * Encodes lighthouse, token and router calls and signs them as EIP-1559
 * transactions for an explicit nonce. Nothing is broadcast here: the nonce
 * sequencer owns submission.
 */

import { ethers } from 'ethers';
import { GAS_LIMITS } from '@xrt-miner/config';
import type {
  Address,
  BuyCall,
  CreateLighthouseCall,
  CreateLiabilityCall,
  FeeParams,
  FinalizeLiabilityCall,
  SignedTx,
  SwapCall,
  TransactionFactory,
  TxKind,
} from '@xrt-miner/types';
import { ERC20_ABI, FACTORY_ABI, LIGHTHOUSE_ABI, UNISWAP_V2_ROUTER_ABI } from './abi';
import { computeEip1559Fees } from './fees';

export interface LiabilityTxFactoryConfig {
  chainId: number;
  factory: Address;
  lighthouse: Address;
  xrt: Address;
  weth: Address;
  router: Address;
}

const FACTORY_INTERFACE = new ethers.Interface(FACTORY_ABI);
const LIGHTHOUSE_INTERFACE = new ethers.Interface(LIGHTHOUSE_ABI);
const ERC20_INTERFACE = new ethers.Interface(ERC20_ABI);
const ROUTER_INTERFACE = new ethers.Interface(UNISWAP_V2_ROUTER_ABI);

export class EthersLiabilityTxFactory implements TransactionFactory {
  constructor(
    private readonly wallet: ethers.BaseWallet,
    private readonly config: LiabilityTxFactoryConfig
  ) {}

  get account(): Address {
    return this.wallet.address;
  }

  buildCreate(call: CreateLiabilityCall, nonce: number, fees: FeeParams): Promise<SignedTx> {
    const data = LIGHTHOUSE_INTERFACE.encodeFunctionData('createLiability', [call.demand, call.offer]);
    return this.sign('create', this.config.lighthouse, data, nonce, fees);
  }

  buildFinalize(call: FinalizeLiabilityCall, nonce: number, fees: FeeParams): Promise<SignedTx> {
    const data = LIGHTHOUSE_INTERFACE.encodeFunctionData('finalizeLiability', [
      call.liability,
      call.result,
      call.success,
      call.signature,
    ]);
    return this.sign('finalize', this.config.lighthouse, data, nonce, fees);
  }

  buildRefill(amount: bigint, nonce: number, fees: FeeParams): Promise<SignedTx> {
    const data = LIGHTHOUSE_INTERFACE.encodeFunctionData('refill', [amount]);
    return this.sign('refill', this.config.lighthouse, data, nonce, fees);
  }

  buildWithdraw(amount: bigint, nonce: number, fees: FeeParams): Promise<SignedTx> {
    const data = LIGHTHOUSE_INTERFACE.encodeFunctionData('withdraw', [amount]);
    return this.sign('withdraw', this.config.lighthouse, data, nonce, fees);
  }

  buildApprove(spender: Address, amount: bigint, nonce: number, fees: FeeParams): Promise<SignedTx> {
    const data = ERC20_INTERFACE.encodeFunctionData('approve', [spender, amount]);
    return this.sign('approve', this.config.xrt, data, nonce, fees);
  }

  buildSwap(call: SwapCall, nonce: number, fees: FeeParams): Promise<SignedTx> {
    const data = ROUTER_INTERFACE.encodeFunctionData('swapExactTokensForETH', [
      call.amountIn,
      call.minProceeds,
      [this.config.xrt, this.config.weth],
      this.wallet.address,
      call.deadline,
    ]);
    return this.sign('swap', this.config.router, data, nonce, fees);
  }

  buildBuy(call: BuyCall, nonce: number, fees: FeeParams): Promise<SignedTx> {
    const data = ROUTER_INTERFACE.encodeFunctionData('swapExactETHForTokens', [
      call.amountOut,
      [this.config.weth, this.config.xrt],
      this.wallet.address,
      call.deadline,
    ]);
    return this.sign('buy', this.config.router, data, nonce, fees, call.maxSpend);
  }

  buildCreateLighthouse(call: CreateLighthouseCall, nonce: number, fees: FeeParams): Promise<SignedTx> {
    const data = FACTORY_INTERFACE.encodeFunctionData('createLighthouse', [
      call.minimalStake,
      call.timeoutBlocks,
      call.name,
    ]);
    return this.sign('createLighthouse', this.config.factory, data, nonce, fees);
  }

  private async sign(
    kind: TxKind,
    to: Address,
    data: string,
    nonce: number,
    fees: FeeParams,
    value = 0n
  ): Promise<SignedTx> {
    const { maxFeePerGas, maxPriorityFeePerGas } = computeEip1559Fees(fees);
    const raw = await this.wallet.signTransaction({
      type: 2,
      chainId: this.config.chainId,
      to,
      data,
      nonce,
      gasLimit: GAS_LIMITS[kind],
      maxFeePerGas,
      maxPriorityFeePerGas,
      value,
    });
    return { kind, nonce, raw, hash: ethers.keccak256(raw) };
  }
}
