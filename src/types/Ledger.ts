import { Account, AccountId, AccountType, FaucetDetails, StorageMode } from './Account';
import { FungibleAsset } from './Asset';
import { CompiledScript, Note, NoteRecord, ScriptEnvironment } from './Note';

export type TransactionId = string;

export interface SyncSummary {
  height: number;
}

export interface CreateAccountRequest {
  type: AccountType;
  storageMode: StorageMode;
  authPublicKey: string;
  faucet?: FaucetDetails;
}

export interface InputNote {
  note: Note;
  /** Unauthenticated inputs are located by content and need no prior inclusion proof. */
  authenticated: boolean;
}

export interface TransactionRequest {
  accountId: AccountId;
  outputs: readonly Note[];
  inputs: readonly InputNote[];
}

/**
 * Operations the vault needs from a ledger client. Implementations report
 * ledger refusals as `SubmissionRejected` and transport failures as
 * `NetworkError`.
 */
export interface LedgerClient {
  currentHeight(): Promise<number>;
  createAccount(request: CreateAccountRequest): Promise<Account>;
  issueAsset(faucetId: AccountId, target: AccountId, amount: bigint): Promise<FungibleAsset>;
  compileScript(source: string, environment: ScriptEnvironment): Promise<CompiledScript>;
  submitTransaction(request: TransactionRequest): Promise<TransactionId>;
  synchronize(): Promise<SyncSummary>;
  getBalance(accountId: AccountId, faucetId: AccountId): Promise<bigint>;
  getNote(noteId: string): Promise<NoteRecord | null>;
}
