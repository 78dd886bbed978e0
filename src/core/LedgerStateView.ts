import { SynchronizationError } from '../errors/ErrorHandler';
import { Logger } from '../monitoring/observability/logger';
import { AccountId } from '../types/Account';
import { LedgerClient, SyncSummary } from '../types/Ledger';
import { NoteRecord } from '../types/Note';

/**
 * Local snapshot of the ledger: the last synchronized height plus read-through
 * balance and note lookups.
 */
export class LedgerStateView {
  private lastSync: SyncSummary | null = null;
  private stale = true;
  private readonly logger = Logger.getInstance().child({ component: 'ledger-state-view' });

  constructor(private readonly ledger: LedgerClient) {}

  /**
   * Synchronizes with the ledger. On failure the view is marked stale and the
   * previous height is kept for inspection only.
   * @throws SynchronizationError
   */
  async refresh(): Promise<SyncSummary> {
    try {
      const summary = await this.ledger.synchronize();
      this.lastSync = { height: summary.height };
      this.stale = false;
      this.logger.debug('Synchronized', { height: summary.height });
      return { ...this.lastSync };
    } catch (error) {
      this.stale = true;
      throw new SynchronizationError(
        `Failed to synchronize ledger state: ${error instanceof Error ? error.message : String(error)}`,
        { operation: 'synchronize', lastHeight: this.lastSync?.height ?? null }
      );
    }
  }

  get height(): number | null {
    return this.lastSync ? this.lastSync.height : null;
  }

  get isStale(): boolean {
    return this.stale;
  }

  /**
   * Height of the last successful synchronization
   * @throws SynchronizationError if the view was never synchronized or is stale
   */
  requireHeight(): number {
    if (!this.lastSync || this.stale) {
      throw new SynchronizationError('Ledger state is not synchronized', {
        operation: 'requireHeight'
      });
    }
    return this.lastSync.height;
  }

  async balanceOf(accountId: AccountId, faucetId: AccountId): Promise<bigint> {
    return this.ledger.getBalance(accountId, faucetId);
  }

  async findNote(noteId: string): Promise<NoteRecord | null> {
    return this.ledger.getNote(noteId);
  }
}
