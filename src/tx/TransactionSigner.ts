import { utils } from 'ethers';
import * as nacl from 'tweetnacl';
import { KeyNotFoundError } from '../errors/ErrorHandler';
import { KeyStore } from '../security/KeyStore';
import { TransactionRequest } from '../types/Ledger';

export interface SignedTransaction {
  digest: string;
  signature: string;
  publicKey: string;
}

/**
 * Digest over everything a transaction commits to: the executing account,
 * output note ids and input note ids with their authentication flag.
 */
export function transactionDigest(request: TransactionRequest): string {
  const outputs = request.outputs.map(note => note.id).join(',');
  const inputs = request.inputs
    .map(input => `${input.authenticated ? 'a' : 'u'}:${input.note.id}`)
    .join(',');
  return utils.keccak256(utils.toUtf8Bytes(`${request.accountId.toHex()}|out=${outputs}|in=${inputs}`));
}

export class TransactionSigner {
  constructor(private readonly keyStore: KeyStore) {}

  /**
   * Signs a transaction request with the executing account's key
   * @throws KeyNotFoundError if the key store holds no key for the account
   */
  async sign(request: TransactionRequest): Promise<SignedTransaction> {
    const key = await this.keyStore.getKey(request.accountId);
    if (!key) {
      throw new KeyNotFoundError(request.accountId.toHex());
    }
    const digest = transactionDigest(request);
    const signature = nacl.sign.detached(utils.arrayify(digest), utils.arrayify(key.secretKey));
    return { digest, signature: utils.hexlify(signature), publicKey: key.publicKey };
  }

  static verify(request: TransactionRequest, signature: string, publicKey: string): boolean {
    try {
      return nacl.sign.detached.verify(
        utils.arrayify(transactionDigest(request)),
        utils.arrayify(signature),
        utils.arrayify(publicKey)
      );
    } catch {
      return false;
    }
  }
}
