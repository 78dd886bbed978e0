import { ConstructionError, ErrorType } from '../errors/ErrorHandler';
import { RandomSource } from './random';

/** Goldilocks prime, 2^64 - 2^32 + 1. */
export const FIELD_MODULUS = 0xffffffff00000001n;

export const MAX_U32 = 0xffffffff;

export type Felt = bigint;
export type Word = readonly [Felt, Felt, Felt, Felt];

export function isFelt(value: bigint): boolean {
  return value >= 0n && value < FIELD_MODULUS;
}

/**
 * Converts an integer to a field element, rejecting anything outside the field
 * instead of reducing it.
 */
export function toFelt(value: bigint | number, field = 'value'): Felt {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new ConstructionError(`${field} must be an integer`, { field, value }, ErrorType.INVALID_NOTE_INPUTS);
  }
  const felt = BigInt(value);
  if (!isFelt(felt)) {
    throw new ConstructionError(
      `${field} is not a valid field element: ${felt}`,
      { field, value: felt },
      ErrorType.INVALID_NOTE_INPUTS
    );
  }
  return felt;
}

export function bytesToBigInt(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const byte of bytes) {
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}

/**
 * Draws one uniformly distributed field element by rejection sampling over
 * 8-byte big-endian integers.
 */
export function drawFelt(random: RandomSource): Felt {
  for (;;) {
    const candidate = bytesToBigInt(random.randomBytes(8));
    if (candidate < FIELD_MODULUS) {
      return candidate;
    }
  }
}

export function drawWord(random: RandomSource): Word {
  return [drawFelt(random), drawFelt(random), drawFelt(random), drawFelt(random)];
}

export function toWord(values: readonly (bigint | number)[]): Word {
  if (values.length !== 4) {
    throw new ConstructionError(
      `A word has exactly 4 elements, got ${values.length}`,
      { length: values.length },
      ErrorType.INVALID_NOTE_INPUTS
    );
  }
  return [
    toFelt(values[0], 'word[0]'),
    toFelt(values[1], 'word[1]'),
    toFelt(values[2], 'word[2]'),
    toFelt(values[3], 'word[3]')
  ];
}

export function wordToHex(word: Word): string {
  return '0x' + word.map(felt => felt.toString(16).padStart(16, '0')).join('');
}
