import * as nacl from 'tweetnacl';

/**
 * Source of random bytes for serial numbers and account seeds. Injected so
 * that tests can supply deterministic sequences.
 */
export interface RandomSource {
  randomBytes(length: number): Uint8Array;
}

export class CryptoRandomSource implements RandomSource {
  randomBytes(length: number): Uint8Array {
    return nacl.randomBytes(length);
  }
}

export const defaultRandomSource: RandomSource = new CryptoRandomSource();
