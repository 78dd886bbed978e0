import { promises as fs } from 'fs';
import * as path from 'path';
import { utils } from 'ethers';
import * as nacl from 'tweetnacl';
import { AccountId } from '../types/Account';
import { defaultRandomSource, RandomSource } from '../utils/random';

export interface AuthSecretKey {
  scheme: 'ed25519';
  /** Hex-encoded 32-byte public key. */
  publicKey: string;
  /** Hex-encoded 64-byte secret key. */
  secretKey: string;
}

/**
 * Maps account identifiers to their signing keys. The vault never inspects
 * how keys are kept.
 */
export interface KeyStore {
  addKey(accountId: AccountId, key: AuthSecretKey): Promise<void>;
  getKey(accountId: AccountId): Promise<AuthSecretKey | null>;
}

export function generateAuthKey(random: RandomSource = defaultRandomSource): AuthSecretKey {
  const keyPair = nacl.sign.keyPair.fromSeed(random.randomBytes(nacl.sign.seedLength));
  return {
    scheme: 'ed25519',
    publicKey: utils.hexlify(keyPair.publicKey),
    secretKey: utils.hexlify(keyPair.secretKey)
  };
}

function isAuthSecretKey(value: unknown): value is AuthSecretKey {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return candidate.scheme === 'ed25519'
    && typeof candidate.publicKey === 'string' && utils.isHexString(candidate.publicKey, nacl.sign.publicKeyLength)
    && typeof candidate.secretKey === 'string' && utils.isHexString(candidate.secretKey, nacl.sign.secretKeyLength);
}

/** fs errors may come from another realm, so `instanceof Error` is not relied on. */
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class MemoryKeyStore implements KeyStore {
  private readonly keys = new Map<string, AuthSecretKey>();

  async addKey(accountId: AccountId, key: AuthSecretKey): Promise<void> {
    this.keys.set(accountId.toHex(), { ...key });
  }

  async getKey(accountId: AccountId): Promise<AuthSecretKey | null> {
    const key = this.keys.get(accountId.toHex());
    return key ? { ...key } : null;
  }
}

/**
 * One JSON file per account under `directory`, readable by the owner only.
 */
export class FilesystemKeyStore implements KeyStore {
  constructor(private readonly directory: string) {}

  private keyPath(accountId: AccountId): string {
    return path.join(this.directory, `${accountId.toHex()}.json`);
  }

  async addKey(accountId: AccountId, key: AuthSecretKey): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true, mode: 0o700 });
    await fs.writeFile(this.keyPath(accountId), JSON.stringify(key), { encoding: 'utf8', mode: 0o600 });
  }

  async getKey(accountId: AccountId): Promise<AuthSecretKey | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.keyPath(accountId), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isAuthSecretKey(parsed)) {
      throw new TypeError(`Key file for account ${accountId.toHex()} is malformed`);
    }
    return parsed;
  }
}
