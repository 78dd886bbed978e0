import {
    ConfigurationManager,
    FilesystemKeyStore,
    HttpLedgerClient,
    InMemoryLedger,
    InheritanceVault,
    KeyStore,
    LedgerClient,
    loadNoteScriptSource,
    Logger,
    MemoryKeyStore,
    TimelockConditionScript,
    VaultError
} from '../src';

const logger = Logger.getInstance();

/**
 * Walks through the vault lifecycle:
 * 1. Create owner and beneficiary wallets and a faucet
 * 2. Mint tokens to the owner
 * 3. Lock 10 tokens for the beneficiary until height + 3
 * 4. Show that neither an early release nor the owner can consume the note
 * 5. Wait for the deadline and release to the beneficiary
 *
 * Runs against an in-process ledger unless VAULT_LEDGER=http is set.
 */
async function runInheritanceVault(): Promise<void> {
    const configManager = ConfigurationManager.getInstance();
    configManager.loadFromEnvironment();
    const config = configManager.getConfig();

    const scriptSource = loadNoteScriptSource(config.script.path);
    let ledger: LedgerClient;
    let keyStore: KeyStore;
    let localLedger: InMemoryLedger | undefined;

    if (process.env.VAULT_LEDGER === 'http') {
        keyStore = new FilesystemKeyStore(config.keystore.path);
        ledger = new HttpLedgerClient({ endpoint: config.rpc.endpoint, timeout: config.rpc.timeout, keyStore });
    } else {
        keyStore = new MemoryKeyStore();
        localLedger = new InMemoryLedger({
            keyStore,
            executors: [new TimelockConditionScript(scriptSource)],
            supportedKernelVersions: [config.script.kernelVersion]
        });
        localLedger.startBlockProduction(config.scheduler.blockIntervalMs);
        ledger = localLedger;
    }

    try {
        const vault = new InheritanceVault({ ledger, keyStore, config, scriptSource });
        await vault.initialize();

        // 1. Accounts
        const owner = await vault.accounts.createWallet('private');
        const beneficiary = await vault.accounts.createWallet('private');
        const faucet = await vault.accounts.deployFaucet('MID', 8, 1_000_000n);

        // 2. Funding
        await vault.accounts.mint(faucet, owner, 1_000_000n);

        // 3. Lock
        const lock = await vault.lock({ owner, beneficiary: beneficiary.id, faucet, amount: 10n });
        logger.info('Note locked', { noteId: lock.note.id, deadline: lock.deadline });

        // 4. Early and wrong-identity attempts are refused by the ledger
        for (const [label, consumer] of [['early beneficiary', beneficiary], ['owner', owner]] as const) {
            try {
                await vault.release(lock, consumer);
                logger.warn(`Unexpected success for ${label}`);
            } catch (error) {
                if (!VaultError.isVaultError(error)) {
                    throw error;
                }
                logger.info(`Release by ${label} rejected`, { reason: error.message });
            }
        }

        // 5. Release after the deadline
        const transactionId = await vault.release(lock, beneficiary, { wait: true });
        const balance = await vault.state.balanceOf(beneficiary.id, faucet.id);
        logger.info('Inheritance released', { transactionId, balance });
    } finally {
        localLedger?.stopBlockProduction();
    }
}

runInheritanceVault().catch(error => {
    logger.error('Inheritance vault example failed', {
        error: error instanceof Error ? error.message : String(error)
    });
    process.exitCode = 1;
});
