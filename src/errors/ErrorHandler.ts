import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../monitoring/observability/logger';

export enum ErrorType {
  // Local construction errors
  CONSTRUCTION_ERROR = 'CONSTRUCTION_ERROR',
  INVALID_ASSET = 'INVALID_ASSET',
  INVALID_NOTE_INPUTS = 'INVALID_NOTE_INPUTS',
  SCRIPT_COMPILATION_FAILED = 'SCRIPT_COMPILATION_FAILED',

  // Ledger-side errors
  SUBMISSION_REJECTED = 'SUBMISSION_REJECTED',
  SYNCHRONIZATION_ERROR = 'SYNCHRONIZATION_ERROR',

  // Network and connectivity errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',

  // Key management errors
  KEY_NOT_FOUND = 'KEY_NOT_FOUND',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}

export type ErrorContextValue = string | number | boolean | bigint | null | undefined | string[];

export interface ErrorContext {
  operation?: string;
  accountId?: string;
  noteId?: string;
  transactionId?: string;
  [key: string]: ErrorContextValue;
}

export interface ErrorRecovery {
  action: string;
  description: string;
}

export class VaultError extends Error {
  public readonly code: string;
  public readonly type: ErrorType;
  public readonly context: ErrorContext;
  public readonly recovery: ErrorRecovery | null;
  public readonly retryable: boolean;
  public readonly timestamp: number;
  public readonly correlationId: string;

  constructor(
    message: string,
    type: ErrorType,
    context: ErrorContext = {},
    recovery: ErrorRecovery | null = null,
    retryable: boolean = false
  ) {
    super(message);
    this.name = 'VaultError';
    this.code = type;
    this.type = type;
    this.context = context;
    this.recovery = recovery;
    this.retryable = retryable;
    this.timestamp = Date.now();
    this.correlationId = uuidv4();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  public toJSON(): object {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      type: this.type,
      context: Object.fromEntries(
        Object.entries(this.context).map(([key, value]) =>
          [key, typeof value === 'bigint' ? value.toString() : value])
      ),
      recovery: this.recovery,
      retryable: this.retryable,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
      stack: this.stack
    };
  }

  public static isVaultError(error: unknown): error is VaultError {
    return error instanceof VaultError;
  }
}

/**
 * Invalid asset amount, malformed note inputs or script compilation failure.
 * Always local, never retried.
 */
export class ConstructionError extends VaultError {
  constructor(
    message: string,
    context: ErrorContext = {},
    type: ErrorType = ErrorType.CONSTRUCTION_ERROR
  ) {
    super(message, type, context, {
      action: 'Correct the input and rebuild',
      description: 'The note could not be constructed from the given inputs.'
    }, false);
    this.name = 'ConstructionError';
  }
}

export class InvalidAssetError extends ConstructionError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, ErrorType.INVALID_ASSET);
    this.name = 'InvalidAssetError';
  }
}

export class ScriptCompilationError extends ConstructionError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, ErrorType.SCRIPT_COMPILATION_FAILED);
    this.name = 'ScriptCompilationError';
  }
}

/**
 * The ledger refused the transaction. The message is the ledger's own reason.
 */
export class SubmissionRejected extends VaultError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorType.SUBMISSION_REJECTED, context, {
      action: 'Rebuild and resubmit if appropriate',
      description: 'The ledger rejected the transaction.'
    }, false);
    this.name = 'SubmissionRejected';
  }
}

export class NetworkError extends VaultError {
  constructor(message: string, context: ErrorContext = {}, type: ErrorType = ErrorType.NETWORK_ERROR) {
    super(message, type, context, {
      action: 'Retry the operation with backoff',
      description: 'The ledger could not be reached.'
    }, true);
    this.name = 'NetworkError';
  }
}

export class SynchronizationError extends VaultError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorType.SYNCHRONIZATION_ERROR, context, {
      action: 'Synchronize again before continuing',
      description: 'Ledger state could not be refreshed.'
    }, true);
    this.name = 'SynchronizationError';
  }
}

export class KeyNotFoundError extends VaultError {
  constructor(accountId: string) {
    super(`No signing key stored for account ${accountId}`, ErrorType.KEY_NOT_FOUND, { accountId }, {
      action: 'Add the account key to the key store',
      description: 'Transactions for this account cannot be authenticated.'
    }, false);
    this.name = 'KeyNotFoundError';
  }
}

export class ConfigurationError extends VaultError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorType.CONFIGURATION_ERROR, context, null, false);
    this.name = 'ConfigurationError';
  }
}

export type ErrorListener = (error: VaultError) => void;

export class ErrorHandler {
  private static instance: ErrorHandler | undefined;
  private errorListeners: ErrorListener[] = [];
  private errorCounts: Map<ErrorType, number> = new Map();
  private readonly logger = Logger.getInstance().child({ component: 'error-handler' });

  private constructor() {}

  public static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  public static resetInstance(): void {
    ErrorHandler.instance = undefined;
  }

  /**
   * Records, logs and returns an error. A `VaultError` comes back as the same
   * instance so callers rethrow it verbatim; anything else is wrapped.
   */
  public handleError(error: unknown, context: ErrorContext = {}): VaultError {
    let vaultError: VaultError;

    if (VaultError.isVaultError(error)) {
      vaultError = error;
    } else {
      const message = error instanceof Error ? error.message : String(error);
      vaultError = new VaultError(
        message,
        ErrorType.UNKNOWN_ERROR,
        { ...context, originalError: error instanceof Error ? error.name : typeof error },
        {
          action: 'Check logs for details',
          description: 'An unexpected error occurred.'
        },
        false
      );
    }

    this.incrementErrorCount(vaultError.type);
    this.notifyListeners(vaultError);
    this.logError(vaultError, context);

    return vaultError;
  }

  public addErrorListener(listener: ErrorListener): void {
    this.errorListeners.push(listener);
  }

  public removeErrorListener(listener: ErrorListener): void {
    const index = this.errorListeners.indexOf(listener);
    if (index > -1) {
      this.errorListeners.splice(index, 1);
    }
  }

  public getErrorStats(): { [key in ErrorType]?: number } {
    const stats: { [key in ErrorType]?: number } = {};
    for (const [type, count] of this.errorCounts.entries()) {
      stats[type] = count;
    }
    return stats;
  }

  public resetErrorCounts(): void {
    this.errorCounts.clear();
  }

  private incrementErrorCount(type: ErrorType): void {
    const currentCount = this.errorCounts.get(type) || 0;
    this.errorCounts.set(type, currentCount + 1);
  }

  private notifyListeners(error: VaultError): void {
    for (const listener of this.errorListeners) {
      try {
        listener(error);
      } catch (listenerError) {
        this.logger.warn('Error listener threw', {
          listenerError: listenerError instanceof Error ? listenerError.message : String(listenerError)
        });
      }
    }
  }

  private logError(error: VaultError, context: ErrorContext): void {
    this.logger.error(error.message, {
      correlationId: error.correlationId,
      error: error.toJSON(),
      context
    }, { error });
  }
}
