import { ConfigurationManager, VaultConfig } from '../config/ConfigurationManager';
import { ConstructionError } from '../errors/ErrorHandler';
import { Logger, LogLevel } from '../monitoring/observability/logger';
import { loadNoteScriptSource } from '../script/NoteScriptLoader';
import { KeyStore } from '../security/KeyStore';
import { TransactionOrchestrator } from '../tx/TransactionOrchestrator';
import { Account, AccountId } from '../types/Account';
import { LedgerClient, TransactionId } from '../types/Ledger';
import { CompiledScript, Note, NoteRecord } from '../types/Note';
import { tagForPublicUseCase } from '../utils/noteTag';
import { RandomSource } from '../utils/random';
import { AccountProvisioner } from './AccountProvisioner';
import { DeadlineScheduler, Sleep } from './DeadlineScheduler';
import { LedgerStateView } from './LedgerStateView';
import { NoteBuilder } from './NoteBuilder';

export interface InheritanceVaultOptions {
  ledger: LedgerClient;
  keyStore: KeyStore;
  config?: VaultConfig;
  /** Note script source; read from `config.script.path` when omitted. */
  scriptSource?: string;
  random?: RandomSource;
  sleep?: Sleep;
}

export interface LockParams {
  owner: Account;
  beneficiary: AccountId;
  faucet: Account;
  amount: bigint;
  /** Blocks from the current height to the deadline. */
  deadlineOffset?: number;
}

export interface VaultLock {
  note: Note;
  owner: AccountId;
  beneficiary: AccountId;
  deadline: number;
  lockedAtHeight: number;
  transactionId: TransactionId;
}

export interface ReleaseOptions {
  /** Wait for the estimated deadline before submitting. */
  wait?: boolean;
  signal?: AbortSignal;
}

/**
 * Lock-and-release flow: an owner locks assets in a note only the
 * beneficiary can consume, and only once the deadline height is reached.
 */
export class InheritanceVault {
  readonly state: LedgerStateView;
  readonly accounts: AccountProvisioner;
  readonly orchestrator: TransactionOrchestrator;
  readonly scheduler: DeadlineScheduler;
  private readonly ledger: LedgerClient;
  private readonly config: VaultConfig;
  private readonly random?: RandomSource;
  private readonly scriptSource?: string;
  private builder: NoteBuilder | undefined;
  private readonly logger = Logger.getInstance().child({ component: 'inheritance-vault' });

  constructor(options: InheritanceVaultOptions) {
    this.ledger = options.ledger;
    this.config = options.config ?? ConfigurationManager.getInstance().getConfig();
    Logger.getInstance().setConfig({
      level: Logger.parseLevel(this.config.monitoring.logLevel) ?? LogLevel.INFO
    });
    this.random = options.random;
    this.scriptSource = options.scriptSource;
    this.state = new LedgerStateView(options.ledger);
    this.accounts = new AccountProvisioner(options.ledger, options.keyStore, this.state, options.random);
    this.orchestrator = new TransactionOrchestrator(options.ledger, this.state);
    this.scheduler = new DeadlineScheduler({
      blockIntervalMs: this.config.scheduler.blockIntervalMs,
      safetyMarginMs: this.config.scheduler.safetyMarginMs,
      sleep: options.sleep
    });
  }

  /**
   * Synchronizes and compiles the note script. Must run before `lock`.
   */
  async initialize(): Promise<CompiledScript> {
    await this.state.refresh();
    const source = this.scriptSource ?? loadNoteScriptSource(this.config.script.path);
    const script = await NoteBuilder.compile(this.ledger, source, {
      kernelVersion: this.config.script.kernelVersion,
      debugMode: this.config.script.debugMode
    });
    this.builder = new NoteBuilder(script, {
      random: this.random,
      minDeadlineMargin: this.config.vault.minDeadlineMargin
    });
    this.logger.info('Vault initialized', { scriptRoot: script.root, height: this.state.height });
    return script;
  }

  async lock(params: LockParams): Promise<VaultLock> {
    if (!this.builder) {
      throw new ConstructionError('Vault is not initialized', { operation: 'lock' });
    }
    const { height: currentHeight } = await this.state.refresh();
    const deadline = currentHeight + (params.deadlineOffset ?? this.config.vault.deadlineOffset);

    const note = this.builder.build({
      sender: params.owner.id,
      faucet: params.faucet,
      amount: params.amount,
      beneficiary: params.beneficiary,
      deadline,
      currentHeight,
      noteType: this.config.vault.noteType,
      tag: tagForPublicUseCase(this.config.vault.tagUseCaseId, 0, 'local')
    });
    const transactionId = await this.orchestrator.submitOutput(params.owner, note);

    this.logger.info('Assets locked', {
      noteId: note.id,
      owner: params.owner.id.toHex(),
      beneficiary: params.beneficiary.toHex(),
      deadline,
      amount: params.amount
    });
    return {
      note,
      owner: params.owner.id,
      beneficiary: params.beneficiary,
      deadline,
      lockedAtHeight: currentHeight,
      transactionId
    };
  }

  /**
   * Submits consumption of the locked note by `consumer`. The ledger decides
   * whether the deadline and identity checks pass.
   */
  async release(lock: VaultLock, consumer: Account, options: ReleaseOptions = {}): Promise<TransactionId> {
    if (options.wait) {
      const { height } = await this.state.refresh();
      if (height < lock.deadline) {
        await this.scheduler.waitForDeadline(lock.deadline, height, options.signal);
      }
    }
    const transactionId = await this.orchestrator.submitConsumption(consumer, lock.note);
    this.logger.info('Vault released', {
      noteId: lock.note.id,
      consumer: consumer.id.toHex(),
      transactionId
    });
    return transactionId;
  }

  async inspect(lock: VaultLock): Promise<NoteRecord | null> {
    return this.state.findNote(lock.note.id);
  }
}
