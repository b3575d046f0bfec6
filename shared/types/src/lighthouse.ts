import type { Address } from './chain';

/**
 * Point-in-time view of the lighthouse (round-robin coordinator).
 *
 * Mutated only by the lighthouse contract. Read fresh before every round and
 * never held across a suspension point.
 */
export interface LighthouseSnapshot {
  address: Address;
  /** Provider currently holding the marker, null when no provider is registered */
  markerHolder: Address | null;
  /** Index of the marker in the provider list */
  markerIndex: number;
  /** Operations left in the current turn */
  quota: number;
  /** Block of the last lighthouse operation */
  keepAliveBlock: number;
  timeoutBlocks: number;
  /** Stake (wn) that buys one operation per turn */
  minimalStake: bigint;
  /** This account's stake (wn) */
  stake: bigint;
  /** This account's position in the provider list, null when not a provider */
  providerIndex: number | null;
  currentBlock: number;
}

export type MarkerState = 'not-owner' | 'active' | 'waiting-timeout';

export type ClaimResult =
  | { status: 'active'; snapshot: LighthouseSnapshot; quota: number }
  | { status: 'retry-later'; snapshot: LighthouseSnapshot; retryAtBlock: number };
