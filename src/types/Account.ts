import { utils } from 'ethers';
import { bytesToBigInt, Felt } from '../utils/felt';

export type AccountType = 'regular' | 'fungible-faucet';
export type StorageMode = 'public' | 'private';

export interface FaucetDetails {
  symbol: string;
  decimals: number;
  maxSupply: bigint;
}

export interface Account {
  readonly id: AccountId;
  readonly type: AccountType;
  readonly storageMode: StorageMode;
  /** Hex-encoded Ed25519 public key that authenticates the account's transactions. */
  readonly authPublicKey: string;
  readonly faucet?: FaucetDetails;
}

const TYPE_BITS: Record<AccountType, bigint> = {
  'regular': 0b01n,
  'fungible-faucet': 0b10n
};

const STORAGE_BITS: Record<StorageMode, bigint> = {
  'public': 0b00n,
  'private': 0b10n
};

const HEX_ID = /^0x[0-9a-fA-F]{30}$/;

/**
 * Two-felt account identifier. The low byte of the prefix encodes the account
 * type (bits 4-5) and storage mode (bits 6-7); the low byte of the suffix is
 * always zero.
 */
export class AccountId {
  private constructor(
    public readonly prefix: Felt,
    public readonly suffix: Felt
  ) {}

  static fromSeed(seed: Uint8Array, type: AccountType, storageMode: StorageMode): AccountId {
    const digest = utils.arrayify(utils.keccak256(seed));
    const metadata = (STORAGE_BITS[storageMode] << 6n) | (TYPE_BITS[type] << 4n);
    const prefix = ((bytesToBigInt(digest.slice(0, 8)) & 0x7fffffffffffff00n) | metadata);
    const suffix = (bytesToBigInt(digest.slice(8, 15)) & 0x7fffffffffffffn) << 8n;
    return new AccountId(prefix, suffix);
  }

  static fromHex(hex: string): AccountId {
    if (!HEX_ID.test(hex)) {
      throw new TypeError(`Invalid account id: ${hex}`);
    }
    const prefix = BigInt('0x' + hex.slice(2, 18));
    const suffix = BigInt('0x' + hex.slice(18)) << 8n;
    return AccountId.fromParts(prefix, suffix);
  }

  static fromParts(prefix: bigint, suffix: bigint): AccountId {
    if (prefix < 0n || prefix >= 1n << 63n) {
      throw new TypeError(`Account id prefix out of range: ${prefix}`);
    }
    if (suffix < 0n || suffix >= 1n << 63n || (suffix & 0xffn) !== 0n) {
      throw new TypeError(`Account id suffix is malformed: ${suffix}`);
    }
    return new AccountId(prefix, suffix);
  }

  get accountType(): AccountType {
    const bits = (this.prefix >> 4n) & 0b11n;
    return bits === TYPE_BITS['fungible-faucet'] ? 'fungible-faucet' : 'regular';
  }

  get storageMode(): StorageMode {
    return ((this.prefix >> 6n) & 0b11n) === STORAGE_BITS.private ? 'private' : 'public';
  }

  equals(other: AccountId): boolean {
    return this.prefix === other.prefix && this.suffix === other.suffix;
  }

  toHex(): string {
    return '0x' + this.prefix.toString(16).padStart(16, '0') + (this.suffix >> 8n).toString(16).padStart(14, '0');
  }

  toString(): string {
    return this.toHex();
  }
}
