import { ConstructionError, ErrorType } from '../errors/ErrorHandler';
import { AccountId } from '../types/Account';
import { Felt, MAX_U32, toFelt } from '../utils/felt';
import { ConditionScript, ExecutionContext } from './ConditionScript';

export type TimelockState = 'locked' | 'releasable';

export interface TimelockInputs {
  deadline: number;
  beneficiary: AccountId;
}

/**
 * Deadline plus beneficiary lock. Inputs are positional:
 * `[deadline, beneficiary.suffix, beneficiary.prefix]`.
 *
 * Below the deadline nobody can consume the note, its creator included. From
 * the deadline on only the beneficiary can.
 */
export class TimelockConditionScript implements ConditionScript {
  readonly name = 'inheritance-vault-timelock';
  readonly inputArity = 3;

  constructor(public readonly source: string) {}

  static encodeInputs(deadline: number, beneficiary: AccountId): Felt[] {
    if (!Number.isInteger(deadline) || deadline < 0 || deadline > MAX_U32) {
      throw new ConstructionError(`Deadline ${deadline} is not a valid block height`, {
        deadline
      }, ErrorType.INVALID_NOTE_INPUTS);
    }
    return [toFelt(deadline, 'deadline'), beneficiary.suffix, beneficiary.prefix];
  }

  static decodeInputs(inputs: readonly Felt[]): TimelockInputs {
    if (inputs.length !== 3) {
      throw new ConstructionError(`Timelock note expects exactly 3 inputs, got ${inputs.length}`, {
        length: inputs.length
      }, ErrorType.INVALID_NOTE_INPUTS);
    }
    const [deadline, suffix, prefix] = inputs;
    if (deadline > BigInt(MAX_U32)) {
      throw new ConstructionError(`Deadline input ${deadline} is not a block height`, {
        deadline
      }, ErrorType.INVALID_NOTE_INPUTS);
    }
    try {
      return { deadline: Number(deadline), beneficiary: AccountId.fromParts(prefix, suffix) };
    } catch (error) {
      throw new ConstructionError(
        `Timelock inputs do not name a valid account: ${error instanceof Error ? error.message : String(error)}`,
        {},
        ErrorType.INVALID_NOTE_INPUTS
      );
    }
  }

  state(context: ExecutionContext): TimelockState {
    const deadline = context.inputs[0];
    return deadline !== undefined && BigInt(context.blockHeight) >= deadline ? 'releasable' : 'locked';
  }

  evaluate(context: ExecutionContext): boolean {
    if (context.inputs.length !== this.inputArity) {
      return false;
    }
    const [, suffix, prefix] = context.inputs;
    if (this.state(context) === 'locked') {
      return false;
    }
    return context.consumer.prefix === prefix && context.consumer.suffix === suffix;
  }
}
