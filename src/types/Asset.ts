import { AccountId } from './Account';

/** Largest amount a single fungible asset can carry, 2^63 - 1. */
export const MAX_FUNGIBLE_AMOUNT = (1n << 63n) - 1n;

export interface FungibleAsset {
  readonly faucetId: AccountId;
  readonly amount: bigint;
}
