import { AccountProvisioner } from '../src/core/AccountProvisioner';
import { LedgerStateView } from '../src/core/LedgerStateView';
import { ConstructionError, InvalidAssetError, SubmissionRejected } from '../src/errors/ErrorHandler';
import { InMemoryLedger } from '../src/ledger/InMemoryLedger';
import { MemoryKeyStore } from '../src/security/KeyStore';
import { SequenceRandomSource } from './helpers/fixtures';

describe('AccountProvisioner', () => {
    let keyStore: MemoryKeyStore;
    let ledger: InMemoryLedger;
    let state: LedgerStateView;
    let provisioner: AccountProvisioner;

    beforeEach(() => {
        const random = new SequenceRandomSource('provisioner');
        keyStore = new MemoryKeyStore();
        ledger = new InMemoryLedger({ keyStore, random });
        state = new LedgerStateView(ledger);
        provisioner = new AccountProvisioner(ledger, keyStore, state, random);
    });

    it('should create wallets and keep their keys', async () => {
        const wallet = await provisioner.createWallet('public');
        const key = await keyStore.getKey(wallet.id);

        expect(wallet.type).toBe('regular');
        expect(wallet.storageMode).toBe('public');
        expect(wallet.id.storageMode).toBe('public');
        expect(key?.publicKey).toBe(wallet.authPublicKey);
    });

    it('should default wallets to private storage', async () => {
        expect((await provisioner.createWallet()).storageMode).toBe('private');
    });

    it('should deploy public fungible faucets', async () => {
        const faucet = await provisioner.deployFaucet('MID', 8, 1_000_000n);

        expect(faucet.type).toBe('fungible-faucet');
        expect(faucet.storageMode).toBe('public');
        expect(faucet.faucet).toEqual({ symbol: 'MID', decimals: 8, maxSupply: 1_000_000n });
        expect(await keyStore.getKey(faucet.id)).not.toBeNull();
    });

    it('should validate faucet parameters before touching the ledger', async () => {
        const createSpy = jest.spyOn(ledger, 'createAccount');

        await expect(provisioner.deployFaucet('TOOLONG', 8, 1n)).rejects.toThrow(
            'Token symbol must be 1-6 upper-case letters, got "TOOLONG"'
        );
        await expect(provisioner.deployFaucet('MID', 13, 1n)).rejects.toThrow(ConstructionError);
        await expect(provisioner.deployFaucet('MID', 8, 0n)).rejects.toThrow(InvalidAssetError);
        expect(createSpy).not.toHaveBeenCalled();
    });

    it('should mint to the target and resynchronize', async () => {
        const faucet = await provisioner.deployFaucet('MID', 8, 500n);
        const wallet = await provisioner.createWallet();
        ledger.produceBlock();

        const asset = await provisioner.mint(faucet, wallet, 200n);

        expect(asset.amount).toBe(200n);
        expect(asset.faucetId.equals(faucet.id)).toBe(true);
        expect(await ledger.getBalance(wallet.id, faucet.id)).toBe(200n);
        expect(state.requireHeight()).toBe(1);
    });

    it('should surface ledger refusals to mint', async () => {
        const faucet = await provisioner.deployFaucet('MID', 8, 500n);
        const wallet = await provisioner.createWallet();

        await expect(provisioner.mint(faucet, wallet, 501n)).rejects.toBeInstanceOf(SubmissionRejected);
        expect(state.height).toBeNull();
    });
});
