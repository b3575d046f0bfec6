import type { Address, Hex } from './chain';

// =============================================================================
// Liability messages
// =============================================================================

/**
 * Packed-hash field order of a demand. The lighthouse precedes the validator
 * and the fee paid is the validator fee.
 */
export const DEMAND_FIELDS = [
  'model',
  'objective',
  'token',
  'cost',
  'lighthouse',
  'validator',
  'validatorFee',
  'deadline',
  'nonce',
  'sender',
] as const;

/**
 * Packed-hash field order of an offer. Validator and lighthouse swap places
 * and the fee paid is the lighthouse fee, so a demand payload never verifies
 * as an offer.
 */
export const OFFER_FIELDS = [
  'model',
  'objective',
  'token',
  'cost',
  'validator',
  'lighthouse',
  'lighthouseFee',
  'deadline',
  'nonce',
  'sender',
] as const;

interface MessageCommon {
  model: Hex;
  objective: Hex;
  token: Address;
  /** Token amount paid for execution (wn) */
  cost: bigint;
  lighthouse: Address;
  validator: Address;
  /** Block number after which the message is void */
  deadline: bigint;
  /** Factory message nonce (nonceOf) */
  nonce: bigint;
  sender: Address;
}

export interface DemandMessage extends MessageCommon {
  role: 'demand';
  validatorFee: bigint;
}

export interface OfferMessage extends MessageCommon {
  role: 'offer';
  lighthouseFee: bigint;
}

export type LiabilityMessage = DemandMessage | OfferMessage;

export type DemandField = (typeof DEMAND_FIELDS)[number];
export type OfferField = (typeof OFFER_FIELDS)[number];

/**
 * ABI-encoded message with its signature embedded, as accepted by
 * `createLiability(demand, offer)`.
 */
export interface SignedMessage<M extends LiabilityMessage = LiabilityMessage> {
  message: M;
  hash: Hex;
  signature: Hex;
  encoded: Hex;
}

export interface SignedResult {
  liability: Address;
  result: Hex;
  success: boolean;
  signature: Hex;
}

/**
 * Produces role-tagged signed payloads. Failures surface as
 * SignatureInvalidError.
 */
export interface LiabilityMessageSigner {
  readonly address: Address;
  signDemand(message: DemandMessage): Promise<SignedMessage<DemandMessage>>;
  signOffer(message: OfferMessage): Promise<SignedMessage<OfferMessage>>;
  signResult(liability: Address, result: Hex, success: boolean): Promise<SignedResult>;
}

// =============================================================================
// Liability lifecycle
// =============================================================================

export type LiabilityState = 'pending' | 'created' | 'finalized' | 'failed' | 'abandoned';

export interface TxHandle {
  hash: Hex;
  nonce: number;
}

export interface Liability {
  /** Local identifier, unique within a session */
  id: string;
  state: LiabilityState;
  /** Round in which the liability was opened */
  roundIndex: number;
  demand?: SignedMessage<DemandMessage>;
  offer?: SignedMessage<OfferMessage>;
  /** Result bytes reported on finalize */
  result: Hex;
  /** On-chain address from the NewLiability event */
  address?: Address;
  createTx?: TxHandle;
  finalizeTx?: TxHandle;
  /** Gas used by create and finalize together */
  gasUsed: bigint;
  /** Wei paid for that gas */
  gasCostWei: bigint;
  /** wn minted by the finalize */
  minted: bigint;
  /** Receipt re-checks spent on an unconfirmed transaction */
  reconcileAttempts: number;
  failureReason?: string;
}

/** Terminal liability states */
export const TERMINAL_STATES: ReadonlySet<LiabilityState> = new Set<LiabilityState>(['finalized', 'failed', 'abandoned']);
