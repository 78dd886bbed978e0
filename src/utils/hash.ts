import { utils } from 'ethers';
import { poseidon1, poseidon2 } from 'poseidon-lite';

/** Scalar field of BN254, the domain of the Poseidon permutation. */
export const POSEIDON_FIELD = 21888242871839275222246405745257275088548364400416034343698204186575808495617n;

/**
 * Hashes a string or byte array using keccak256
 * @returns Hashed string in hex format
 */
export function hash(input: string | Uint8Array): string {
    if (typeof input === 'string') {
        return utils.keccak256(utils.toUtf8Bytes(input));
    }
    return utils.keccak256(input);
}

/**
 * Hashes a string to a Poseidon field element
 */
export function hashToField(input: string | Uint8Array): bigint {
    return BigInt(hash(input)) % POSEIDON_FIELD;
}

export function poseidonHash(input: bigint): bigint {
    return poseidon1([input]);
}

/**
 * Hashes a sequence of field elements. The length is absorbed first so that
 * sequences differing only by trailing zeros do not collide.
 */
export function poseidonHashMany(inputs: readonly bigint[]): bigint {
    let result = poseidon1([BigInt(inputs.length)]);
    for (const input of inputs) {
        result = poseidon2([result, input]);
    }
    return result;
}

export function merge(left: bigint, right: bigint): bigint {
    return poseidon2([left, right]);
}

export function digestToHex(digest: bigint): string {
    return '0x' + digest.toString(16).padStart(64, '0');
}

export function hexToDigest(hex: string): bigint {
    if (!utils.isHexString(hex, 32)) {
        throw new TypeError(`Expected a 32-byte hex digest, got ${hex}`);
    }
    return BigInt(hex);
}
