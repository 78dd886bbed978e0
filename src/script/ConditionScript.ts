import { AccountId } from '../types/Account';
import { Felt } from '../utils/felt';

export interface ExecutionContext {
  blockHeight: number;
  consumer: AccountId;
  inputs: readonly Felt[];
}

/**
 * Consumption predicate behind a compiled note script. Ledgers evaluate it at
 * consumption time; new condition types are added as new implementations.
 */
export interface ConditionScript {
  readonly name: string;
  readonly source: string;
  readonly inputArity: number;
  evaluate(context: ExecutionContext): boolean;
}
