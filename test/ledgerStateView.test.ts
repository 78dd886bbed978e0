import { LedgerStateView } from '../src/core/LedgerStateView';
import { NetworkError, SynchronizationError } from '../src/errors/ErrorHandler';
import { InMemoryLedger } from '../src/ledger/InMemoryLedger';
import { MemoryKeyStore } from '../src/security/KeyStore';

describe('LedgerStateView', () => {
    let ledger: InMemoryLedger;
    let view: LedgerStateView;

    beforeEach(() => {
        ledger = new InMemoryLedger({ keyStore: new MemoryKeyStore(), genesisHeight: 5 });
        view = new LedgerStateView(ledger);
    });

    it('should start unsynchronized', () => {
        expect(view.height).toBeNull();
        expect(view.isStale).toBe(true);
        expect(() => view.requireHeight()).toThrow('Ledger state is not synchronized');
    });

    it('should track the ledger height on refresh', async () => {
        expect(await view.refresh()).toEqual({ height: 5 });
        ledger.produceBlocks(2);
        expect(view.requireHeight()).toBe(5);

        await view.refresh();

        expect(view.height).toBe(7);
        expect(view.isStale).toBe(false);
    });

    it('should turn stale and raise SynchronizationError when synchronization fails', async () => {
        await view.refresh();
        jest.spyOn(ledger, 'synchronize').mockRejectedValueOnce(new NetworkError('connection refused'));

        await expect(view.refresh()).rejects.toThrow('Failed to synchronize ledger state: connection refused');
        expect(view.isStale).toBe(true);
        expect(view.height).toBe(5);
        expect(() => view.requireHeight()).toThrow(SynchronizationError);
    });

    it('should recover on the next successful refresh', async () => {
        jest.spyOn(ledger, 'synchronize').mockRejectedValueOnce(new Error('timeout'));
        await expect(view.refresh()).rejects.toBeInstanceOf(SynchronizationError);

        await view.refresh();

        expect(view.requireHeight()).toBe(5);
    });

    it('should return null for unknown notes', async () => {
        expect(await view.findNote('0x' + '00'.repeat(32))).toBeNull();
    });
});
