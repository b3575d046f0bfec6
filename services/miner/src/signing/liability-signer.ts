/**
 * Liability Message Signer
 *
 * Demand and offer payloads hash their fields in a role-specific order
 * (DEMAND_FIELDS / OFFER_FIELDS): keccak256 over the tightly packed fields,
 * then an EIP-191 personal signature over the 32-byte hash. The payload
 * accepted by `createLiability` is the ABI encoding of the same fields
 * without the nonce, followed by the signature.
 *
 * Every signature is recovered and checked against the wallet before it is
 * handed out.
 */

import { ethers } from 'ethers';
import { getErrorMessage } from '@xrt-miner/core';
import {
  DEMAND_FIELDS,
  OFFER_FIELDS,
  SignatureInvalidError,
} from '@xrt-miner/types';
import type {
  Address,
  DemandField,
  DemandMessage,
  Hex,
  LiabilityMessage,
  LiabilityMessageSigner,
  OfferField,
  OfferMessage,
  SignedMessage,
  SignedResult,
} from '@xrt-miner/types';

type MessageField = DemandField | OfferField;

const FIELD_TYPES: Record<MessageField, 'bytes' | 'address' | 'uint256'> = {
  model: 'bytes',
  objective: 'bytes',
  token: 'address',
  cost: 'uint256',
  lighthouse: 'address',
  validator: 'address',
  validatorFee: 'uint256',
  lighthouseFee: 'uint256',
  deadline: 'uint256',
  nonce: 'uint256',
  sender: 'address',
};

type Role = LiabilityMessage['role'];

interface PackedFields {
  types: string[];
  values: Array<Hex | bigint>;
}

function pick<F extends MessageField>(
  fields: readonly F[],
  read: (field: F) => Hex | bigint,
  include: (field: F) => boolean = () => true
): PackedFields {
  const selected = fields.filter(include);
  return {
    types: selected.map(field => FIELD_TYPES[field]),
    values: selected.map(read),
  };
}

function fieldsOf(message: LiabilityMessage, include?: (field: MessageField) => boolean): PackedFields {
  if (message.role === 'demand') {
    const demand = message;
    return pick(DEMAND_FIELDS, field => demand[field], include);
  }
  const offer = message;
  return pick(OFFER_FIELDS, field => offer[field], include);
}

/**
 * keccak256 over the packed fields in role order.
 */
export function messageHash(message: LiabilityMessage): Hex {
  const { types, values } = fieldsOf(message);
  return ethers.solidityPackedKeccak256(types, values);
}

/**
 * `createLiability` payload: every field except the nonce, then the signature.
 */
export function encodeMessage(message: LiabilityMessage, signature: Hex): Hex {
  const { types, values } = fieldsOf(message, field => field !== 'nonce');
  return ethers.AbiCoder.defaultAbiCoder().encode([...types, 'bytes'], [...values, signature]);
}

export function resultHash(liability: Address, result: Hex, success: boolean): Hex {
  return ethers.solidityPackedKeccak256(['address', 'bytes', 'bool'], [liability, result, success]);
}

/**
 * Recover the EIP-191 signer of a 32-byte hash.
 */
export function recoverHashSigner(hash: Hex, signature: Hex): Address {
  return ethers.verifyMessage(ethers.getBytes(hash), signature);
}

export class WalletLiabilitySigner implements LiabilityMessageSigner {
  constructor(private readonly wallet: ethers.BaseWallet) {}

  get address(): Address {
    return this.wallet.address;
  }

  signDemand(message: DemandMessage): Promise<SignedMessage<DemandMessage>> {
    return this.signMessage(message);
  }

  signOffer(message: OfferMessage): Promise<SignedMessage<OfferMessage>> {
    return this.signMessage(message);
  }

  async signResult(liability: Address, result: Hex, success: boolean): Promise<SignedResult> {
    if (!ethers.isAddress(liability)) {
      throw new SignatureInvalidError(`Invalid liability address ${liability}`, 'result');
    }
    const hash = resultHash(liability, result, success);
    const signature = await this.signHash(hash, 'result');
    return { liability, result, success, signature };
  }

  private async signMessage<M extends LiabilityMessage>(message: M): Promise<SignedMessage<M>> {
    this.validate(message);

    let hash: Hex;
    try {
      hash = messageHash(message);
    } catch (error) {
      throw new SignatureInvalidError(`Cannot hash ${message.role}: ${getErrorMessage(error)}`, message.role);
    }

    const signature = await this.signHash(hash, message.role);
    return { message, hash, signature, encoded: encodeMessage(message, signature) };
  }

  private async signHash(hash: Hex, role: Role | 'result'): Promise<Hex> {
    let signature: Hex;
    try {
      signature = await this.wallet.signMessage(ethers.getBytes(hash));
    } catch (error) {
      throw new SignatureInvalidError(`Signing ${role} failed: ${getErrorMessage(error)}`, role);
    }

    const recovered = recoverHashSigner(hash, signature);
    if (recovered !== this.wallet.address) {
      throw new SignatureInvalidError(`Signature for ${role} recovers to ${recovered}, expected ${this.wallet.address}`, role);
    }
    return signature;
  }

  private validate(message: LiabilityMessage): void {
    for (const field of ['token', 'lighthouse', 'validator', 'sender'] as const) {
      if (!ethers.isAddress(message[field])) {
        throw new SignatureInvalidError(`Invalid ${field} address in ${message.role}: ${message[field]}`, message.role);
      }
    }
    if (ethers.getAddress(message.sender) !== this.wallet.address) {
      throw new SignatureInvalidError(`Sender ${message.sender} is not the signing account`, message.role);
    }
    if (message.nonce < 0n || message.deadline < 0n || message.cost < 0n) {
      throw new SignatureInvalidError(`Negative numeric field in ${message.role}`, message.role);
    }
  }
}
