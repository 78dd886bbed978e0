import { AccountId } from './Account';
import { FungibleAsset } from './Asset';
import { Felt, Word } from '../utils/felt';

export type NoteType = 'public' | 'private';

export type NoteExecutionMode = 'local' | 'network';

export type NoteExecutionHint =
  | { kind: 'none' }
  | { kind: 'always' }
  | { kind: 'afterBlock'; blockNum: number };

export interface NoteMetadata {
  readonly sender: AccountId;
  readonly noteType: NoteType;
  readonly tag: number;
  readonly executionHint: NoteExecutionHint;
  readonly aux: Felt;
}

export interface ScriptEnvironment {
  kernelVersion: string;
  debugMode: boolean;
}

/** Opaque compiled script artifact, referenced from a recipient by its root. */
export interface CompiledScript {
  readonly root: string;
  readonly source: string;
  readonly environment: ScriptEnvironment;
}

export interface NoteRecipient {
  readonly serialNumber: Word;
  readonly script: CompiledScript;
  readonly inputs: readonly Felt[];
  readonly digest: string;
}

export interface Note {
  readonly id: string;
  readonly assets: readonly FungibleAsset[];
  readonly metadata: NoteMetadata;
  readonly recipient: NoteRecipient;
}

export type NoteState = 'expected' | 'committed' | 'consumed';

export interface NoteRecord {
  note: Note;
  state: NoteState;
  createdInTransaction: string;
  committedAtHeight?: number;
  consumedAtHeight?: number;
  consumedBy?: AccountId;
}
