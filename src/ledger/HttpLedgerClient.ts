import {
  ErrorType,
  NetworkError,
  ScriptCompilationError,
  SubmissionRejected
} from '../errors/ErrorHandler';
import { Logger } from '../monitoring/observability/logger';
import { KeyStore } from '../security/KeyStore';
import { TransactionSigner } from '../tx/TransactionSigner';
import { Account, AccountId, AccountType, StorageMode } from '../types/Account';
import { FungibleAsset } from '../types/Asset';
import {
  CreateAccountRequest,
  LedgerClient,
  SyncSummary,
  TransactionId,
  TransactionRequest
} from '../types/Ledger';
import { CompiledScript, Note, NoteRecord, NoteState, ScriptEnvironment } from '../types/Note';
import { computeScriptRoot } from '../utils/note';
import { deserializeNote, serializeNote } from '../utils/noteCodec';

export interface HttpLedgerClientConfig {
  endpoint: string;
  keyStore: KeyStore;
  timeout?: number;
  fetchImpl?: typeof fetch;
}

type JsonObject = Record<string, unknown>;

/** How a non-2xx response of a given call is reported. */
type RejectionKind = 'submission' | 'compilation' | 'query';

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field<T>(body: JsonObject, name: string, guard: (value: unknown) => value is T, path: string): T {
  const value = body[name];
  if (!guard(value)) {
    throw new NetworkError(`Malformed ledger response from ${path}: ${name}`, { path, field: name });
  }
  return value;
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isInteger = (value: unknown): value is number => typeof value === 'number' && Number.isInteger(value);
const isDecimal = (value: unknown): value is string => typeof value === 'string' && /^\d+$/.test(value);
const isAccountType = (value: unknown): value is AccountType => value === 'regular' || value === 'fungible-faucet';
const isStorageMode = (value: unknown): value is StorageMode => value === 'public' || value === 'private';
const isNoteState = (value: unknown): value is NoteState =>
  value === 'expected' || value === 'committed' || value === 'consumed';

/**
 * Ledger client for a node exposing the vault's JSON API under `/v1`. Calls
 * are made once: transport failures surface as `NetworkError`, node refusals
 * as `SubmissionRejected` with the node's own message.
 */
export class HttpLedgerClient implements LedgerClient {
  private readonly endpoint: string;
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;
  private readonly signer: TransactionSigner;
  private readonly logger = Logger.getInstance().child({ component: 'http-ledger-client' });

  constructor(config: HttpLedgerClientConfig) {
    this.endpoint = config.endpoint.replace(/\/+$/, '');
    this.timeout = config.timeout || 10000;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.signer = new TransactionSigner(config.keyStore);
  }

  /**
   * Gets request headers
   */
  private getHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'Accept': 'application/json'
    };
  }

  private async fetchWithTimeout(path: string, options: RequestInit = {}): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchImpl(`${this.endpoint}${path}`, {
        ...options,
        signal: controller.signal,
        headers: {
          ...this.getHeaders(),
          ...options.headers
        }
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new NetworkError(`Ledger request ${path} timed out after ${this.timeout}ms`, {
          path,
          timeout: this.timeout
        }, ErrorType.TIMEOUT_ERROR);
      }
      throw new NetworkError(`Ledger request ${path} failed: ${error instanceof Error ? error.message : String(error)}`, {
        path
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async request(path: string, kind: RejectionKind, options: RequestInit = {}): Promise<JsonObject | null> {
    this.logger.debug('Ledger request', { path, method: options.method ?? 'GET' });
    const response = await this.fetchWithTimeout(path, options);

    if (response.status === 404 && kind === 'query') {
      return null;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new NetworkError(`Ledger response from ${path} is not JSON (status ${response.status})`, {
        path,
        status: response.status
      });
    }

    if (!response.ok) {
      const message = isJsonObject(body) && typeof body.error === 'string'
        ? body.error
        : `Ledger request ${path} failed with status ${response.status}`;
      if (response.status >= 500) {
        throw new NetworkError(message, { path, status: response.status });
      }
      if (kind === 'compilation') {
        throw new ScriptCompilationError(message, { path, status: response.status });
      }
      throw new SubmissionRejected(message, { path, status: response.status });
    }

    if (!isJsonObject(body)) {
      throw new NetworkError(`Ledger response from ${path} is not an object`, { path });
    }
    return body;
  }

  private async requireBody(path: string, kind: RejectionKind, options: RequestInit = {}): Promise<JsonObject> {
    const body = await this.request(path, kind, options);
    if (!body) {
      throw new SubmissionRejected(`Ledger resource ${path} not found`, { path });
    }
    return body;
  }

  private post(body: unknown): RequestInit {
    return { method: 'POST', body: JSON.stringify(body) };
  }

  private parseAccountId(value: string, path: string): AccountId {
    try {
      return AccountId.fromHex(value);
    } catch (error) {
      throw new NetworkError(`Malformed account id in response from ${path}: ${value}`, { path });
    }
  }

  private parseNote(value: unknown, path: string): Note {
    try {
      return deserializeNote(value);
    } catch (error) {
      throw new NetworkError(
        `Ledger returned an invalid note from ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { path }
      );
    }
  }

  async currentHeight(): Promise<number> {
    const path = '/v1/height';
    const body = await this.requireBody(path, 'query');
    return field(body, 'height', isInteger, path);
  }

  async createAccount(request: CreateAccountRequest): Promise<Account> {
    const path = '/v1/accounts';
    const body = await this.requireBody(path, 'submission', this.post({
      type: request.type,
      storageMode: request.storageMode,
      authPublicKey: request.authPublicKey,
      faucet: request.faucet
        ? { ...request.faucet, maxSupply: request.faucet.maxSupply.toString() }
        : undefined
    }));

    const id = this.parseAccountId(field(body, 'id', isString, path), path);
    return Object.freeze({
      id,
      type: field(body, 'type', isAccountType, path),
      storageMode: field(body, 'storageMode', isStorageMode, path),
      authPublicKey: field(body, 'authPublicKey', isString, path),
      ...(request.faucet ? { faucet: Object.freeze({ ...request.faucet }) } : {})
    });
  }

  async issueAsset(faucetId: AccountId, target: AccountId, amount: bigint): Promise<FungibleAsset> {
    const path = `/v1/faucets/${faucetId.toHex()}/mint`;
    const body = await this.requireBody(path, 'submission', this.post({
      target: target.toHex(),
      amount: amount.toString()
    }));
    return Object.freeze({ faucetId, amount: BigInt(field(body, 'amount', isDecimal, path)) });
  }

  async compileScript(source: string, environment: ScriptEnvironment): Promise<CompiledScript> {
    const path = '/v1/scripts/compile';
    const body = await this.requireBody(path, 'compilation', this.post({ source, environment }));
    const root = field(body, 'root', isString, path);
    const expected = computeScriptRoot(source);
    if (root !== expected) {
      throw new ScriptCompilationError(`Node compiled script to root ${root}, expected ${expected}`, {
        root,
        expected
      });
    }
    return Object.freeze({ root, source, environment: Object.freeze({ ...environment }) });
  }

  async submitTransaction(request: TransactionRequest): Promise<TransactionId> {
    const path = '/v1/transactions';
    const signed = await this.signer.sign(request);
    const body = await this.requireBody(path, 'submission', this.post({
      accountId: request.accountId.toHex(),
      outputs: request.outputs.map(serializeNote),
      inputs: request.inputs.map(input => ({
        note: serializeNote(input.note),
        authenticated: input.authenticated
      })),
      digest: signed.digest,
      signature: signed.signature,
      publicKey: signed.publicKey
    }));
    return field(body, 'transactionId', isString, path);
  }

  async synchronize(): Promise<SyncSummary> {
    const path = '/v1/sync';
    const body = await this.requireBody(path, 'query', { method: 'POST' });
    return { height: field(body, 'height', isInteger, path) };
  }

  async getBalance(accountId: AccountId, faucetId: AccountId): Promise<bigint> {
    const path = `/v1/accounts/${accountId.toHex()}/balances/${faucetId.toHex()}`;
    const body = await this.request(path, 'query');
    return body ? BigInt(field(body, 'balance', isDecimal, path)) : 0n;
  }

  async getNote(noteId: string): Promise<NoteRecord | null> {
    const path = `/v1/notes/${noteId}`;
    const body = await this.request(path, 'query');
    if (!body) {
      return null;
    }

    const record: NoteRecord = {
      note: this.parseNote(body.note, path),
      state: field(body, 'state', isNoteState, path),
      createdInTransaction: field(body, 'createdInTransaction', isString, path)
    };
    if (body.committedAtHeight !== undefined) {
      record.committedAtHeight = field(body, 'committedAtHeight', isInteger, path);
    }
    if (body.consumedAtHeight !== undefined) {
      record.consumedAtHeight = field(body, 'consumedAtHeight', isInteger, path);
    }
    if (body.consumedBy !== undefined) {
      record.consumedBy = this.parseAccountId(field(body, 'consumedBy', isString, path), path);
    }
    if (record.note.id !== noteId) {
      throw new NetworkError(`Ledger returned note ${record.note.id} for ${noteId}`, { noteId });
    }
    return record;
  }
}
