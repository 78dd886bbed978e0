import { ErrorHandler } from '../errors/ErrorHandler';
import { LedgerStateView } from '../core/LedgerStateView';
import { Logger } from '../monitoring/observability/logger';
import { Account } from '../types/Account';
import { LedgerClient, TransactionId, TransactionRequest } from '../types/Ledger';
import { Note } from '../types/Note';

export type TransactionKind = 'output' | 'consumption';

export interface TransactionHistoryEntry {
  transactionId: TransactionId;
  kind: TransactionKind;
  accountId: string;
  noteId: string;
  /** Ledger height observed by the re-synchronization after submission; unset if it failed. */
  syncedHeight?: number;
  submittedAt: number;
}

/**
 * Submits note-creation and note-consumption transactions. Nothing is retried:
 * ledger rejections and transport failures reach the caller as raised.
 */
export class TransactionOrchestrator {
  private readonly history: TransactionHistoryEntry[] = [];
  private readonly errorHandler = ErrorHandler.getInstance();
  private readonly logger = Logger.getInstance().child({ component: 'transaction-orchestrator' });

  constructor(
    private readonly ledger: LedgerClient,
    private readonly state: LedgerStateView
  ) {}

  /**
   * Creates `note` as an output of `account`. The ledger debits the note's
   * assets from the account.
   */
  async submitOutput(account: Account, note: Note): Promise<TransactionId> {
    return this.submit('output', account, note, {
      accountId: account.id,
      outputs: [note],
      inputs: []
    });
  }

  /**
   * Consumes `note` into `account`. The note is passed by content, so the
   * ledger needs no inclusion proof from this client.
   */
  async submitConsumption(account: Account, note: Note): Promise<TransactionId> {
    return this.submit('consumption', account, note, {
      accountId: account.id,
      outputs: [],
      inputs: [{ note, authenticated: false }]
    });
  }

  getHistory(): TransactionHistoryEntry[] {
    return this.history.map(entry => ({ ...entry }));
  }

  private async submit(
    kind: TransactionKind,
    account: Account,
    note: Note,
    request: TransactionRequest
  ): Promise<TransactionId> {
    const context = { operation: kind, accountId: account.id.toHex(), noteId: note.id };
    const done = this.logger.time(`submit-${kind}`);

    try {
      let transactionId: TransactionId;
      try {
        transactionId = await this.ledger.submitTransaction(request);
      } catch (error) {
        throw this.errorHandler.handleError(error, context);
      }

      this.logger.info('Transaction accepted', { ...context, transactionId });
      const entry: TransactionHistoryEntry = {
        transactionId,
        kind,
        accountId: account.id.toHex(),
        noteId: note.id,
        submittedAt: Date.now()
      };
      this.history.push(entry);

      try {
        entry.syncedHeight = (await this.state.refresh()).height;
      } catch (error) {
        throw this.errorHandler.handleError(error, { ...context, transactionId });
      }
      return transactionId;
    } finally {
      done();
    }
  }
}
