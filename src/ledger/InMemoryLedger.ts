import { utils } from 'ethers';
import {
  ConstructionError,
  ScriptCompilationError,
  SubmissionRejected
} from '../errors/ErrorHandler';
import { Logger } from '../monitoring/observability/logger';
import { ConditionScript } from '../script/ConditionScript';
import { KeyStore } from '../security/KeyStore';
import { TransactionSigner } from '../tx/TransactionSigner';
import { Account, AccountId } from '../types/Account';
import { FungibleAsset } from '../types/Asset';
import {
  CreateAccountRequest,
  LedgerClient,
  SyncSummary,
  TransactionId,
  TransactionRequest
} from '../types/Ledger';
import { CompiledScript, Note, NoteRecord, ScriptEnvironment } from '../types/Note';
import { validateAssetAmount } from '../utils/asset';
import { computeNoteId, computeNullifier, computeRecipientDigest, computeScriptRoot } from '../utils/note';
import { defaultRandomSource, RandomSource } from '../utils/random';

export interface InMemoryLedgerOptions {
  keyStore: KeyStore;
  executors?: ConditionScript[];
  supportedKernelVersions?: string[];
  random?: RandomSource;
  genesisHeight?: number;
}

interface AccountState {
  account: Account;
  nonce: number;
  balances: Map<string, bigint>;
  issued: bigint;
}

const SYMBOL_PATTERN = /^[A-Z]{1,6}$/;
const MAX_DECIMALS = 12;

/**
 * In-process ledger: accounts, faucets, balances, a note set and a nullifier
 * set, with blocks produced on demand or on a timer. Transactions apply
 * atomically and are authenticated against the account's Ed25519 key.
 */
export class InMemoryLedger implements LedgerClient {
  private height: number;
  private readonly accounts = new Map<string, AccountState>();
  private readonly notes = new Map<string, NoteRecord>();
  private readonly nullifiers = new Set<string>();
  private readonly transactions = new Set<TransactionId>();
  private readonly executors = new Map<string, ConditionScript>();
  private pendingNoteIds: string[] = [];
  private blockTimer: NodeJS.Timeout | undefined;
  private readonly signer: TransactionSigner;
  private readonly random: RandomSource;
  private readonly supportedKernelVersions: Set<string>;
  private readonly logger = Logger.getInstance().child({ component: 'in-memory-ledger' });

  constructor(options: InMemoryLedgerOptions) {
    this.signer = new TransactionSigner(options.keyStore);
    this.random = options.random ?? defaultRandomSource;
    this.height = options.genesisHeight ?? 0;
    this.supportedKernelVersions = new Set(options.supportedKernelVersions ?? ['0.8']);
    for (const executor of options.executors ?? []) {
      this.registerExecutor(executor);
    }
  }

  registerExecutor(script: ConditionScript): string {
    const root = computeScriptRoot(script.source);
    this.executors.set(root, script);
    return root;
  }

  async currentHeight(): Promise<number> {
    return this.height;
  }

  async createAccount(request: CreateAccountRequest): Promise<Account> {
    if (!utils.isHexString(request.authPublicKey, 32)) {
      throw new SubmissionRejected('Account auth key must be a 32-byte hex public key');
    }
    if (request.type === 'fungible-faucet') {
      this.validateFaucet(request);
    } else if (request.faucet) {
      throw new SubmissionRejected('Only fungible faucet accounts carry faucet details');
    }

    const id = AccountId.fromSeed(this.random.randomBytes(32), request.type, request.storageMode);
    if (this.accounts.has(id.toHex())) {
      throw new SubmissionRejected(`Account ${id.toHex()} already exists`, { accountId: id.toHex() });
    }

    const account: Account = Object.freeze({
      id,
      type: request.type,
      storageMode: request.storageMode,
      authPublicKey: request.authPublicKey,
      ...(request.faucet ? { faucet: Object.freeze({ ...request.faucet }) } : {})
    });
    this.accounts.set(id.toHex(), { account, nonce: 0, balances: new Map(), issued: 0n });
    this.logger.info('Account created', { accountId: id.toHex(), type: request.type });
    return account;
  }

  async issueAsset(faucetId: AccountId, target: AccountId, amount: bigint): Promise<FungibleAsset> {
    const faucetState = this.requireAccount(faucetId);
    const details = faucetState.account.faucet;
    if (faucetState.account.type !== 'fungible-faucet' || !details) {
      throw new SubmissionRejected(`Account ${faucetId.toHex()} is not a fungible faucet`, {
        accountId: faucetId.toHex()
      });
    }
    const targetState = this.requireAccount(target);
    this.requireValidAmount(amount, 'Invalid mint amount');
    if (faucetState.issued + amount > details.maxSupply) {
      throw new SubmissionRejected(
        `Minting ${amount} would exceed max supply ${details.maxSupply} (issued ${faucetState.issued})`,
        { accountId: faucetId.toHex(), amount, issued: faucetState.issued }
      );
    }

    faucetState.issued += amount;
    faucetState.nonce += 1;
    const key = faucetId.toHex();
    targetState.balances.set(key, (targetState.balances.get(key) ?? 0n) + amount);
    this.logger.info('Asset issued', { faucetId: key, target: target.toHex(), amount });
    return Object.freeze({ faucetId, amount });
  }

  async compileScript(source: string, environment: ScriptEnvironment): Promise<CompiledScript> {
    const trimmed = source.trim();
    if (trimmed === '') {
      throw new ScriptCompilationError('Script source is empty');
    }
    if (!/^begin\b/m.test(trimmed) || !/\bend$/.test(trimmed)) {
      throw new ScriptCompilationError('Script must contain a begin ... end block');
    }
    if (!this.supportedKernelVersions.has(environment.kernelVersion)) {
      throw new ScriptCompilationError(`Unsupported kernel version ${environment.kernelVersion}`, {
        kernelVersion: environment.kernelVersion
      });
    }
    const root = computeScriptRoot(source);
    if (!this.executors.has(root)) {
      throw new ScriptCompilationError(`No executor available for script root ${root}`, { root });
    }
    return Object.freeze({ root, source, environment: Object.freeze({ ...environment }) });
  }

  async submitTransaction(request: TransactionRequest): Promise<TransactionId> {
    const accountKey = request.accountId.toHex();
    const state = this.requireAccount(request.accountId);

    const signed = await this.signer.sign(request);
    if (!TransactionSigner.verify(request, signed.signature, state.account.authPublicKey)) {
      throw new SubmissionRejected(`Transaction signature does not match account ${accountKey}`, {
        accountId: accountKey
      });
    }
    if (request.inputs.length === 0 && request.outputs.length === 0) {
      throw new SubmissionRejected('Transaction has neither inputs nor outputs', { accountId: accountKey });
    }

    const deltas = new Map<string, bigint>();
    const addDelta = (asset: FungibleAsset, sign: bigint): void => {
      const key = asset.faucetId.toHex();
      deltas.set(key, (deltas.get(key) ?? 0n) + sign * asset.amount);
    };

    const spentNullifiers: string[] = [];
    for (const input of request.inputs) {
      const note = input.note;
      const record = this.locateInput(note);
      if (input.authenticated && record.state === 'expected') {
        throw new SubmissionRejected(`Note ${note.id} is not yet committed and cannot be an authenticated input`, {
          noteId: note.id
        });
      }
      const nullifier = computeNullifier(note);
      if (record.state === 'consumed' || this.nullifiers.has(nullifier) || spentNullifiers.includes(nullifier)) {
        throw new SubmissionRejected(`Note ${note.id} has already been consumed`, { noteId: note.id });
      }
      const executor = this.executors.get(note.recipient.script.root);
      if (!executor) {
        throw new SubmissionRejected(`No executor for note script ${note.recipient.script.root}`, {
          noteId: note.id
        });
      }
      const allowed = executor.evaluate({
        blockHeight: this.height,
        consumer: request.accountId,
        inputs: note.recipient.inputs
      });
      if (!allowed) {
        throw new SubmissionRejected(
          `Note ${note.id} script rejected consumption by ${accountKey} at height ${this.height}`,
          { noteId: note.id, accountId: accountKey, height: this.height }
        );
      }
      spentNullifiers.push(nullifier);
      note.assets.forEach(asset => addDelta(asset, 1n));
    }

    const outputIds: string[] = [];
    for (const note of request.outputs) {
      if (!note.metadata.sender.equals(request.accountId)) {
        throw new SubmissionRejected(`Note ${note.id} names sender ${note.metadata.sender.toHex()}, not ${accountKey}`, {
          noteId: note.id
        });
      }
      this.verifyContent(note);
      if (this.notes.has(note.id) || outputIds.includes(note.id)) {
        throw new SubmissionRejected(`Note ${note.id} already exists`, { noteId: note.id });
      }
      outputIds.push(note.id);
      note.assets.forEach(asset => addDelta(asset, -1n));
    }

    for (const [faucet, delta] of deltas) {
      const available = state.balances.get(faucet) ?? 0n;
      if (available + delta < 0n) {
        throw new SubmissionRejected(
          `Insufficient balance of faucet ${faucet}: required ${-delta}, available ${available}`,
          { accountId: accountKey, faucetId: faucet, required: -delta, available }
        );
      }
    }

    for (const [faucet, delta] of deltas) {
      state.balances.set(faucet, (state.balances.get(faucet) ?? 0n) + delta);
    }
    state.nonce += 1;
    const transactionId = utils.keccak256(utils.toUtf8Bytes(`${signed.digest}:${state.nonce}`));

    request.inputs.forEach((input, index) => {
      this.nullifiers.add(spentNullifiers[index]);
      const record = this.notes.get(input.note.id);
      if (record) {
        record.state = 'consumed';
        record.consumedAtHeight = this.height;
        record.consumedBy = request.accountId;
      }
    });
    for (const note of request.outputs) {
      this.notes.set(note.id, { note, state: 'expected', createdInTransaction: transactionId });
      this.pendingNoteIds.push(note.id);
    }
    this.transactions.add(transactionId);

    this.logger.info('Transaction accepted', {
      transactionId,
      accountId: accountKey,
      inputs: request.inputs.length,
      outputs: request.outputs.length
    });
    return transactionId;
  }

  async synchronize(): Promise<SyncSummary> {
    return { height: this.height };
  }

  async getBalance(accountId: AccountId, faucetId: AccountId): Promise<bigint> {
    return this.requireAccount(accountId).balances.get(faucetId.toHex()) ?? 0n;
  }

  async getNote(noteId: string): Promise<NoteRecord | null> {
    const record = this.notes.get(noteId);
    return record ? { ...record } : null;
  }

  /**
   * Seals the current block: height advances and notes created since the
   * previous block become committed.
   */
  produceBlock(): number {
    this.height += 1;
    for (const id of this.pendingNoteIds) {
      const record = this.notes.get(id);
      if (record && record.state === 'expected') {
        record.state = 'committed';
        record.committedAtHeight = this.height;
      }
    }
    this.pendingNoteIds = [];
    this.logger.debug('Block produced', { height: this.height });
    return this.height;
  }

  produceBlocks(count: number): number {
    for (let i = 0; i < count; i++) {
      this.produceBlock();
    }
    return this.height;
  }

  startBlockProduction(intervalMs: number): void {
    this.stopBlockProduction();
    this.blockTimer = setInterval(() => this.produceBlock(), intervalMs);
    this.blockTimer.unref();
  }

  stopBlockProduction(): void {
    if (this.blockTimer) {
      clearInterval(this.blockTimer);
      this.blockTimer = undefined;
    }
  }

  hasTransaction(transactionId: TransactionId): boolean {
    return this.transactions.has(transactionId);
  }

  private requireAccount(accountId: AccountId): AccountState {
    const state = this.accounts.get(accountId.toHex());
    if (!state) {
      throw new SubmissionRejected(`Unknown account ${accountId.toHex()}`, { accountId: accountId.toHex() });
    }
    return state;
  }

  private validateFaucet(request: CreateAccountRequest): void {
    const faucet = request.faucet;
    if (!faucet) {
      throw new SubmissionRejected('Fungible faucet accounts require faucet details');
    }
    if (!SYMBOL_PATTERN.test(faucet.symbol)) {
      throw new SubmissionRejected(`Invalid token symbol ${faucet.symbol}`);
    }
    if (!Number.isInteger(faucet.decimals) || faucet.decimals < 0 || faucet.decimals > MAX_DECIMALS) {
      throw new SubmissionRejected(`Token decimals must be between 0 and ${MAX_DECIMALS}`);
    }
    this.requireValidAmount(faucet.maxSupply, 'Invalid max supply');
  }

  private requireValidAmount(amount: bigint, label: string): void {
    try {
      validateAssetAmount(amount);
    } catch (error) {
      if (error instanceof ConstructionError) {
        throw new SubmissionRejected(`${label}: ${error.message}`, { amount });
      }
      throw error;
    }
  }

  private verifyContent(note: Note): void {
    const { recipient } = note;
    const digest = computeRecipientDigest(recipient.serialNumber, recipient.script.root, recipient.inputs);
    if (digest !== recipient.digest || computeNoteId(digest, note.assets) !== note.id) {
      throw new SubmissionRejected(`Note ${note.id} content does not match its id`, { noteId: note.id });
    }
  }

  /** Unauthenticated inputs are matched by content: the id is recomputed, not trusted. */
  private locateInput(note: Note): NoteRecord {
    this.verifyContent(note);
    const record = this.notes.get(note.id);
    if (!record) {
      throw new SubmissionRejected(`Note ${note.id} does not exist on the ledger`, { noteId: note.id });
    }
    return record;
  }
}
