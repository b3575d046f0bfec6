import { ethers } from 'ethers';
import type { Address, ReceiptDecoder, TxReceipt } from '@xrt-miner/types';
import { ERC20_ABI, FACTORY_ABI } from './abi';

const FACTORY_INTERFACE = new ethers.Interface(FACTORY_ABI);
const ERC20_INTERFACE = new ethers.Interface(ERC20_ABI);

export const NEW_LIABILITY_TOPIC = ethers.id('NewLiability(address)');
export const NEW_LIGHTHOUSE_TOPIC = ethers.id('NewLighthouse(address,string)');
export const TRANSFER_TOPIC = ethers.id('Transfer(address,address,uint256)');

/**
 * Reads NewLiability and NewLighthouse events from the factory and XRT
 * Transfer events from the token.
 */
export class EthersReceiptDecoder implements ReceiptDecoder {
  private readonly factory: string;
  private readonly xrt: string;

  constructor(factory: Address, xrt: Address) {
    this.factory = factory.toLowerCase();
    this.xrt = xrt.toLowerCase();
  }

  createdLiability(receipt: TxReceipt): Address | null {
    return this.factoryEventAddress(receipt, NEW_LIABILITY_TOPIC);
  }

  createdLighthouse(receipt: TxReceipt): Address | null {
    return this.factoryEventAddress(receipt, NEW_LIGHTHOUSE_TOPIC);
  }

  mintedAmount(receipt: TxReceipt): bigint {
    let total = 0n;
    for (const log of receipt.logs) {
      // Transfer carries from and to as indexed topics
      if (log.address.toLowerCase() !== this.xrt || log.topics.length < 3 || log.topics[0] !== TRANSFER_TOPIC) {
        continue;
      }
      const parsed = ERC20_INTERFACE.parseLog({ topics: [...log.topics], data: log.data });
      if (parsed) {
        total += BigInt(parsed.args[2].toString());
      }
    }
    return total;
  }

  /** First indexed address of a factory event with the given topic */
  private factoryEventAddress(receipt: TxReceipt, topic: string): Address | null {
    for (const log of receipt.logs) {
      if (log.address.toLowerCase() !== this.factory || log.topics[0] !== topic) continue;

      const parsed = FACTORY_INTERFACE.parseLog({ topics: [...log.topics], data: log.data });
      if (parsed) {
        return ethers.getAddress(String(parsed.args[0]));
      }
    }
    return null;
  }
}
