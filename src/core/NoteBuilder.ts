import { ConstructionError, ErrorType, ScriptCompilationError, VaultError } from '../errors/ErrorHandler';
import { Logger } from '../monitoring/observability/logger';
import { TimelockConditionScript } from '../script/TimelockConditionScript';
import { Account, AccountId } from '../types/Account';
import { LedgerClient } from '../types/Ledger';
import { CompiledScript, Note, NoteExecutionHint, NoteType, ScriptEnvironment } from '../types/Note';
import { createFungibleAsset } from '../utils/asset';
import { drawWord, Word } from '../utils/felt';
import { createNote } from '../utils/note';
import { tagForPublicUseCase } from '../utils/noteTag';
import { defaultRandomSource, RandomSource } from '../utils/random';

export interface NoteBuilderOptions {
  random?: RandomSource;
  /** Minimum number of blocks between the current height and the deadline. */
  minDeadlineMargin?: number;
}

export interface VaultNoteParams {
  sender: AccountId;
  faucet: Account;
  amount: bigint;
  beneficiary: AccountId;
  deadline: number;
  currentHeight: number;
  noteType?: NoteType;
  tag?: number;
  executionHint?: NoteExecutionHint;
  aux?: bigint;
}

export const DEFAULT_NOTE_TAG = tagForPublicUseCase(0, 0, 'local');

/**
 * Builds timelocked vault notes around a compiled condition script. Pure:
 * nothing here touches the ledger except `compile`.
 */
export class NoteBuilder {
  private readonly random: RandomSource;
  private readonly minDeadlineMargin: number;
  private readonly logger = Logger.getInstance().child({ component: 'note-builder' });

  constructor(public readonly script: CompiledScript, options: NoteBuilderOptions = {}) {
    this.random = options.random ?? defaultRandomSource;
    this.minDeadlineMargin = options.minDeadlineMargin ?? 1;
    if (!Number.isInteger(this.minDeadlineMargin) || this.minDeadlineMargin < 1) {
      throw new ConstructionError(`Deadline margin must be a positive integer, got ${this.minDeadlineMargin}`, {
        minDeadlineMargin: this.minDeadlineMargin
      });
    }
  }

  /**
   * Compiles the note script on the ledger
   * @throws ScriptCompilationError if the ledger refuses the source
   */
  static async compile(ledger: Pick<LedgerClient, 'compileScript'>, source: string, environment: ScriptEnvironment): Promise<CompiledScript> {
    try {
      return await ledger.compileScript(source, environment);
    } catch (error) {
      if (VaultError.isVaultError(error)) {
        throw error;
      }
      throw new ScriptCompilationError(
        `Script compilation failed: ${error instanceof Error ? error.message : String(error)}`,
        { kernelVersion: environment.kernelVersion }
      );
    }
  }

  build(params: VaultNoteParams): Note {
    return this.withSerialNumber(params, drawWord(this.random));
  }

  /**
   * Builds the note for an explicit serial number. The same parameters and
   * serial number always give the same note id.
   */
  withSerialNumber(params: VaultNoteParams, serialNumber: Word): Note {
    const asset = createFungibleAsset(params.faucet, params.amount);
    const inputs = TimelockConditionScript.encodeInputs(params.deadline, params.beneficiary);

    if (params.deadline - params.currentHeight < this.minDeadlineMargin) {
      throw new ConstructionError(
        `Deadline ${params.deadline} must be at least ${this.minDeadlineMargin} block(s) after height ${params.currentHeight}`,
        { deadline: params.deadline, currentHeight: params.currentHeight },
        ErrorType.INVALID_NOTE_INPUTS
      );
    }

    const note = createNote({
      assets: [asset],
      metadata: {
        sender: params.sender,
        noteType: params.noteType ?? 'public',
        tag: params.tag ?? DEFAULT_NOTE_TAG,
        executionHint: params.executionHint ?? { kind: 'always' },
        aux: params.aux ?? 0n
      },
      serialNumber,
      script: this.script,
      inputs
    });

    this.logger.debug('Built vault note', {
      noteId: note.id,
      deadline: params.deadline,
      beneficiary: params.beneficiary.toHex()
    });
    return note;
  }
}
