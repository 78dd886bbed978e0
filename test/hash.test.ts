import { poseidon1, poseidon2 } from 'poseidon-lite';
import {
    digestToHex,
    hash,
    hashToField,
    hexToDigest,
    merge,
    POSEIDON_FIELD,
    poseidonHash,
    poseidonHashMany
} from '../src/utils/hash';

describe('Hash Utilities', () => {
    describe('hash', () => {
        it('should hash a string correctly', () => {
            expect(hash('test string')).toMatch(/^0x[0-9a-f]{64}$/);
        });

        it('should match the keccak256 of the empty input', () => {
            expect(hash('')).toBe('0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470');
        });

        it('should hash strings and their utf-8 bytes alike', () => {
            expect(hash('vault')).toBe(hash(new TextEncoder().encode('vault')));
        });
    });

    describe('hashToField', () => {
        it('should reduce into the Poseidon field', () => {
            const value = hashToField('test string');
            expect(value).toBe(BigInt(hash('test string')) % POSEIDON_FIELD);
            expect(value < POSEIDON_FIELD).toBe(true);
        });
    });

    describe('poseidon', () => {
        it('should hash a single element with poseidon1', () => {
            expect(poseidonHash(7n)).toBe(poseidon1([7n]));
        });

        it('should absorb the length before the elements', () => {
            expect(poseidonHashMany([])).toBe(poseidon1([0n]));
            expect(poseidonHashMany([5n])).toBe(poseidon2([poseidon1([1n]), 5n]));
        });

        it('should distinguish sequences that differ by trailing zeros', () => {
            expect(poseidonHashMany([1n, 2n])).not.toBe(poseidonHashMany([1n, 2n, 0n]));
        });

        it('should merge two digests with poseidon2', () => {
            expect(merge(1n, 2n)).toBe(poseidon2([1n, 2n]));
            expect(merge(1n, 2n)).not.toBe(merge(2n, 1n));
        });
    });

    describe('digest hex', () => {
        it('should pad digests to 32 bytes', () => {
            expect(digestToHex(255n)).toBe('0x' + '0'.repeat(62) + 'ff');
            expect(hexToDigest(digestToHex(255n))).toBe(255n);
        });

        it('should reject hex strings of the wrong length', () => {
            expect(() => hexToDigest('0xff')).toThrow('Expected a 32-byte hex digest, got 0xff');
        });
    });
});
