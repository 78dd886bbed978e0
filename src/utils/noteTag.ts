import { ConstructionError, ErrorType } from '../errors/ErrorHandler';
import { AccountId } from '../types/Account';
import { NoteExecutionMode } from '../types/Note';

const LOCAL_PUBLIC_ANY = 0xc0000000;
const NETWORK_PUBLIC_USECASE = 0x80000000;

const MAX_USE_CASE_ID = 1 << 14;
const MAX_PAYLOAD = 1 << 16;

function checkRange(value: number, limit: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value >= limit) {
    throw new ConstructionError(`${field} must be an integer in [0, ${limit}), got ${value}`, {
      field,
      value
    }, ErrorType.INVALID_NOTE_INPUTS);
  }
}

/**
 * Tag for public notes of a given use case. The top two bits select local
 * (`11`) or network (`10`) execution, then 14 bits of use case id and 16 bits
 * of payload.
 */
export function tagForPublicUseCase(useCaseId: number, payload: number, mode: NoteExecutionMode): number {
  checkRange(useCaseId, MAX_USE_CASE_ID, 'useCaseId');
  checkRange(payload, MAX_PAYLOAD, 'payload');
  const high = mode === 'local' ? LOCAL_PUBLIC_ANY : NETWORK_PUBLIC_USECASE;
  return high + useCaseId * 0x10000 + payload;
}

/**
 * Tag addressed at an account. Local tags keep the 14 high bits of the prefix;
 * network tags keep 30 and leave the top two bits clear.
 */
export function tagFromAccountId(accountId: AccountId, mode: NoteExecutionMode): number {
  if (mode === 'network') {
    return Number(accountId.prefix >> 34n);
  }
  return LOCAL_PUBLIC_ANY + Number(accountId.prefix >> 50n) * 0x10000;
}

export function tagExecutionMode(tag: number): NoteExecutionMode {
  return tag >= LOCAL_PUBLIC_ANY ? 'local' : 'network';
}

export function isValidTag(tag: number): boolean {
  return Number.isInteger(tag) && tag >= 0 && tag <= 0xffffffff;
}
