// Vault flow
export { InheritanceVault } from './core/InheritanceVault';
export type { InheritanceVaultOptions, LockParams, ReleaseOptions, VaultLock } from './core/InheritanceVault';
export { InheritanceVault as default } from './core/InheritanceVault';

// Components
export * from './core/AccountProvisioner';
export * from './core/DeadlineScheduler';
export * from './core/LedgerStateView';
export * from './core/NoteBuilder';
export * from './tx/TransactionOrchestrator';
export * from './tx/TransactionSigner';

// Condition scripts
export * from './script/ConditionScript';
export * from './script/TimelockConditionScript';
export * from './script/NoteScriptLoader';

// Ledger clients
export * from './ledger/InMemoryLedger';
export * from './ledger/HttpLedgerClient';

// Keys
export * from './security/KeyStore';

// Type exports
export * from './types/Account';
export * from './types/Asset';
export * from './types/Ledger';
export * from './types/Note';

// Utility exports
export * from './utils/asset';
export * from './utils/felt';
export * from './utils/hash';
export * from './utils/note';
export * from './utils/noteCodec';
export * from './utils/noteTag';
export * from './utils/random';

// Configuration, errors and logging
export * from './config/ConfigurationManager';
export * from './errors/ErrorHandler';
export { Logger, LogLevel } from './monitoring/observability/logger';
export type { LogEntry, LoggerConfig, LogOptions } from './monitoring/observability/logger';
