import { utils } from 'ethers';
import { ConfigurationManager, VaultConfig } from '../../src/config/ConfigurationManager';
import { InheritanceVault } from '../../src/core/InheritanceVault';
import { InMemoryLedger } from '../../src/ledger/InMemoryLedger';
import { loadNoteScriptSource } from '../../src/script/NoteScriptLoader';
import { TimelockConditionScript } from '../../src/script/TimelockConditionScript';
import { MemoryKeyStore } from '../../src/security/KeyStore';
import { Account } from '../../src/types/Account';
import { RandomSource } from '../../src/utils/random';

/**
 * Deterministic byte stream: keccak256 of `${seed}:${counter}` blocks.
 */
export class SequenceRandomSource implements RandomSource {
    private counter = 0;

    constructor(private readonly seed: string = 'test-seed') {}

    randomBytes(length: number): Uint8Array {
        const out = new Uint8Array(length);
        let offset = 0;
        while (offset < length) {
            const block = utils.arrayify(utils.keccak256(utils.toUtf8Bytes(`${this.seed}:${this.counter++}`)));
            const take = Math.min(block.length, length - offset);
            out.set(block.slice(0, take), offset);
            offset += take;
        }
        return out;
    }
}

/** Replays the given byte arrays in order. */
export class ScriptedRandomSource implements RandomSource {
    constructor(private readonly chunks: Uint8Array[]) {}

    randomBytes(length: number): Uint8Array {
        const chunk = this.chunks.shift();
        if (!chunk || chunk.length !== length) {
            throw new Error(`Unexpected request for ${length} random bytes`);
        }
        return chunk;
    }
}

export const NOTE_SCRIPT_SOURCE = loadNoteScriptSource();

export interface VaultFixture {
    keyStore: MemoryKeyStore;
    ledger: InMemoryLedger;
    vault: InheritanceVault;
    config: VaultConfig;
    owner: Account;
    beneficiary: Account;
    faucet: Account;
}

/**
 * In-memory ledger with a faucet (max supply 1,000,000), an owner holding the
 * whole supply and a beneficiary with nothing.
 */
export async function createVaultFixture(seed = 'vault-fixture'): Promise<VaultFixture> {
    const keyStore = new MemoryKeyStore();
    const random = new SequenceRandomSource(seed);
    const ledger = new InMemoryLedger({
        keyStore,
        executors: [new TimelockConditionScript(NOTE_SCRIPT_SOURCE)],
        random
    });
    const config = ConfigurationManager.getInstance().getConfig();
    const vault = new InheritanceVault({
        ledger,
        keyStore,
        config,
        scriptSource: NOTE_SCRIPT_SOURCE,
        random,
        sleep: async ms => {
            ledger.produceBlocks(Math.floor(ms / config.scheduler.blockIntervalMs));
        }
    });
    await vault.initialize();

    const owner = await vault.accounts.createWallet('private');
    const beneficiary = await vault.accounts.createWallet('private');
    const faucet = await vault.accounts.deployFaucet('MID', 8, 1_000_000n);
    await vault.accounts.mint(faucet, owner, 1_000_000n);

    return { keyStore, ledger, vault, config, owner, beneficiary, faucet };
}
