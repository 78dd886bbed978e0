import { readFileSync } from 'fs';
import { ConfigurationError } from '../errors/ErrorHandler';
import { DEFAULT_NOTE_SCRIPT_PATH } from '../script/NoteScriptLoader';
import { NoteType } from '../types/Note';

export type Environment = 'development' | 'staging' | 'production';
export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RPCConfig {
  endpoint: string;
  timeout: number;
}

export interface KeystoreConfig {
  path: string;
}

export interface ScriptConfig {
  path: string;
  kernelVersion: string;
  debugMode: boolean;
}

export interface SchedulerConfig {
  blockIntervalMs: number;
  safetyMarginMs: number;
}

export interface VaultSettings {
  /** Blocks between the lock height and the deadline. */
  deadlineOffset: number;
  minDeadlineMargin: number;
  noteType: NoteType;
  tagUseCaseId: number;
}

export interface MonitoringConfig {
  logLevel: ConfigLogLevel;
}

export interface VaultConfig {
  environment: Environment;
  version: string;
  rpc: RPCConfig;
  keystore: KeystoreConfig;
  script: ScriptConfig;
  scheduler: SchedulerConfig;
  vault: VaultSettings;
  monitoring: MonitoringConfig;
}

export type VaultConfigUpdate = {
  [K in keyof VaultConfig]?: VaultConfig[K] extends object ? Partial<VaultConfig[K]> : VaultConfig[K];
};

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production'];
const LOG_LEVELS: readonly ConfigLogLevel[] = ['debug', 'info', 'warn', 'error'];
const NOTE_TYPES: readonly NoteType[] = ['public', 'private'];

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, name: string): RawSection {
  const value = raw[name];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`Configuration section "${name}" must be an object`, { section: name });
  }
  return value;
}

function readString(raw: RawSection, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Configuration value "${key}" must be a string`, { key });
  }
  return value;
}

function readNumber(raw: RawSection, key: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigurationError(`Configuration value "${key}" must be a number`, { key });
  }
  return value;
}

function readBoolean(raw: RawSection, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`Configuration value "${key}" must be a boolean`, { key });
  }
  return value;
}

function readChoice<T extends string>(raw: RawSection, key: string, choices: readonly T[], fallback: T): T {
  const value = raw[key];
  if (value === undefined) {
    return fallback;
  }
  const choice = choices.find(candidate => candidate === value);
  if (choice === undefined) {
    throw new ConfigurationError(`Configuration value "${key}" must be one of ${choices.join(', ')}`, {
      key,
      choices: [...choices]
    });
  }
  return choice;
}

/**
 * Overlays an untyped configuration object (parsed JSON or collected
 * environment variables) on `base`, checking each field's type.
 */
function overlay(base: VaultConfig, raw: unknown): VaultConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Configuration must be an object');
  }
  const rpc = section(raw, 'rpc');
  const keystore = section(raw, 'keystore');
  const script = section(raw, 'script');
  const scheduler = section(raw, 'scheduler');
  const vault = section(raw, 'vault');
  const monitoring = section(raw, 'monitoring');

  return {
    environment: readChoice(raw, 'environment', ENVIRONMENTS, base.environment),
    version: readString(raw, 'version', base.version),
    rpc: {
      endpoint: readString(rpc, 'endpoint', base.rpc.endpoint),
      timeout: readNumber(rpc, 'timeout', base.rpc.timeout)
    },
    keystore: {
      path: readString(keystore, 'path', base.keystore.path)
    },
    script: {
      path: readString(script, 'path', base.script.path),
      kernelVersion: readString(script, 'kernelVersion', base.script.kernelVersion),
      debugMode: readBoolean(script, 'debugMode', base.script.debugMode)
    },
    scheduler: {
      blockIntervalMs: readNumber(scheduler, 'blockIntervalMs', base.scheduler.blockIntervalMs),
      safetyMarginMs: readNumber(scheduler, 'safetyMarginMs', base.scheduler.safetyMarginMs)
    },
    vault: {
      deadlineOffset: readNumber(vault, 'deadlineOffset', base.vault.deadlineOffset),
      minDeadlineMargin: readNumber(vault, 'minDeadlineMargin', base.vault.minDeadlineMargin),
      noteType: readChoice(vault, 'noteType', NOTE_TYPES, base.vault.noteType),
      tagUseCaseId: readNumber(vault, 'tagUseCaseId', base.vault.tagUseCaseId)
    },
    monitoring: {
      logLevel: readChoice(monitoring, 'logLevel', LOG_LEVELS, base.monitoring.logLevel)
    }
  };
}

function envNumber(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} must be numeric, got "${value}"`, { variable: name });
  }
  return parsed;
}

function envBoolean(name: string): boolean | undefined {
  const value = process.env[name];
  if (value === undefined || value === '') {
    return undefined;
  }
  return value === 'true' || value === '1';
}

function envString(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;
  private config: VaultConfig;
  private readonly defaultConfig: VaultConfig;

  private constructor() {
    this.defaultConfig = this.createDefaultConfig();
    this.config = this.copy(this.defaultConfig);
  }

  public static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  public static resetInstance(): void {
    ConfigurationManager.instance = undefined;
  }

  public getConfig(): VaultConfig {
    return this.copy(this.config);
  }

  /**
   * Merges `updates` section by section and validates the result. The current
   * configuration is left untouched if validation fails.
   */
  public updateConfig(updates: VaultConfigUpdate): void {
    const current = this.config;
    const newConfig: VaultConfig = {
      environment: updates.environment ?? current.environment,
      version: updates.version ?? current.version,
      rpc: { ...current.rpc, ...updates.rpc },
      keystore: { ...current.keystore, ...updates.keystore },
      script: { ...current.script, ...updates.script },
      scheduler: { ...current.scheduler, ...updates.scheduler },
      vault: { ...current.vault, ...updates.vault },
      monitoring: { ...current.monitoring, ...updates.monitoring }
    };
    this.validateConfig(newConfig);
    this.config = newConfig;
  }

  public getEnvironment(): Environment {
    return this.config.environment;
  }

  public isProduction(): boolean {
    return this.config.environment === 'production';
  }

  public isDevelopment(): boolean {
    return this.config.environment === 'development';
  }

  public getRPCConfig(): RPCConfig {
    return { ...this.config.rpc };
  }

  public getSchedulerConfig(): SchedulerConfig {
    return { ...this.config.scheduler };
  }

  public getVaultSettings(): VaultSettings {
    return { ...this.config.vault };
  }

  public loadFromEnvironment(): void {
    const raw = {
      environment: envString('VAULT_ENVIRONMENT'),
      version: envString('VAULT_VERSION'),
      rpc: {
        endpoint: envString('VAULT_RPC_ENDPOINT'),
        timeout: envNumber('VAULT_RPC_TIMEOUT')
      },
      keystore: {
        path: envString('VAULT_KEYSTORE_PATH')
      },
      script: {
        path: envString('VAULT_SCRIPT_PATH'),
        kernelVersion: envString('VAULT_KERNEL_VERSION'),
        debugMode: envBoolean('VAULT_DEBUG_MODE')
      },
      scheduler: {
        blockIntervalMs: envNumber('VAULT_BLOCK_INTERVAL_MS'),
        safetyMarginMs: envNumber('VAULT_SAFETY_MARGIN_MS')
      },
      vault: {
        deadlineOffset: envNumber('VAULT_DEADLINE_OFFSET'),
        minDeadlineMargin: envNumber('VAULT_MIN_DEADLINE_MARGIN'),
        noteType: envString('VAULT_NOTE_TYPE'),
        tagUseCaseId: envNumber('VAULT_TAG_USE_CASE_ID')
      },
      monitoring: {
        logLevel: envString('VAULT_LOG_LEVEL')
      }
    };
    const merged = overlay(this.config, raw);
    this.validateConfig(merged);
    this.config = merged;
  }

  public loadFromFile(filePath: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to load configuration from file: ${filePath}`, {
        filePath,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    }
    const merged = overlay(this.config, parsed);
    this.validateConfig(merged);
    this.config = merged;
  }

  public validateConfig(config: VaultConfig): void {
    const errors: string[] = [];

    if (!ENVIRONMENTS.includes(config.environment)) {
      errors.push('Invalid environment. Must be development, staging, or production.');
    }

    try {
      const url = new URL(config.rpc.endpoint);
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        errors.push('RPC endpoint must be an http(s) URL.');
      }
    } catch {
      errors.push('RPC endpoint must be a valid URL.');
    }

    if (config.rpc.timeout <= 0) {
      errors.push('RPC timeout must be greater than 0.');
    }

    if (config.keystore.path.trim() === '') {
      errors.push('Keystore path is required.');
    }

    if (config.script.path.trim() === '') {
      errors.push('Note script path is required.');
    }

    if (config.script.kernelVersion.trim() === '') {
      errors.push('Kernel version is required.');
    }

    if (config.scheduler.blockIntervalMs <= 0) {
      errors.push('Block interval must be greater than 0.');
    }

    if (config.scheduler.safetyMarginMs < 0) {
      errors.push('Safety margin must be non-negative.');
    }

    if (!Number.isInteger(config.vault.minDeadlineMargin) || config.vault.minDeadlineMargin < 1) {
      errors.push('Minimum deadline margin must be a positive integer.');
    }

    if (!Number.isInteger(config.vault.deadlineOffset) || config.vault.deadlineOffset < config.vault.minDeadlineMargin) {
      errors.push('Deadline offset must be an integer no smaller than the minimum deadline margin.');
    }

    if (!Number.isInteger(config.vault.tagUseCaseId) || config.vault.tagUseCaseId < 0 || config.vault.tagUseCaseId >= 1 << 14) {
      errors.push('Tag use case id must be an integer below 16384.');
    }

    if (errors.length > 0) {
      throw new ConfigurationError('Configuration validation failed', { errors });
    }
  }

  public resetToDefaults(): void {
    this.config = this.copy(this.defaultConfig);
  }

  private copy(config: VaultConfig): VaultConfig {
    return {
      ...config,
      rpc: { ...config.rpc },
      keystore: { ...config.keystore },
      script: { ...config.script },
      scheduler: { ...config.scheduler },
      vault: { ...config.vault },
      monitoring: { ...config.monitoring }
    };
  }

  private createDefaultConfig(): VaultConfig {
    return {
      environment: 'development',
      version: '0.1.0',
      rpc: {
        endpoint: 'http://localhost:57291',
        timeout: 10000
      },
      keystore: {
        path: './keystore'
      },
      script: {
        path: DEFAULT_NOTE_SCRIPT_PATH,
        kernelVersion: '0.8',
        debugMode: true
      },
      scheduler: {
        blockIntervalMs: 3000,
        safetyMarginMs: 1000
      },
      vault: {
        deadlineOffset: 3,
        minDeadlineMargin: 1,
        noteType: 'public',
        tagUseCaseId: 0
      },
      monitoring: {
        logLevel: 'info'
      }
    };
  }
}
