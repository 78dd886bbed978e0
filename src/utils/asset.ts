import { InvalidAssetError } from '../errors/ErrorHandler';
import { Account } from '../types/Account';
import { FungibleAsset, MAX_FUNGIBLE_AMOUNT } from '../types/Asset';
import { poseidonHashMany } from './hash';

/**
 * Checks that `amount` can be carried by a single asset: strictly positive,
 * within the fungible limit and, when known, within the faucet's max supply.
 */
export function validateAssetAmount(amount: bigint, maxSupply?: bigint): void {
  if (amount <= 0n) {
    throw new InvalidAssetError(`Asset amount must be greater than zero, got ${amount}`, { amount });
  }
  if (amount > MAX_FUNGIBLE_AMOUNT) {
    throw new InvalidAssetError(`Asset amount ${amount} exceeds the fungible asset limit`, {
      amount,
      limit: MAX_FUNGIBLE_AMOUNT
    });
  }
  if (maxSupply !== undefined && amount > maxSupply) {
    throw new InvalidAssetError(`Asset amount ${amount} exceeds the faucet max supply of ${maxSupply}`, {
      amount,
      maxSupply
    });
  }
}

export function createFungibleAsset(faucet: Account, amount: bigint): FungibleAsset {
  if (faucet.type !== 'fungible-faucet' || !faucet.faucet) {
    throw new InvalidAssetError(`Account ${faucet.id.toHex()} is not a fungible faucet`, {
      accountId: faucet.id.toHex()
    });
  }
  validateAssetAmount(amount, faucet.faucet.maxSupply);
  return Object.freeze({ faucetId: faucet.id, amount });
}

export function assetCommitment(assets: readonly FungibleAsset[]): bigint {
  return poseidonHashMany(assets.flatMap(asset => [asset.faucetId.prefix, asset.faucetId.suffix, asset.amount]));
}
