import { LedgerStateView } from '../src/core/LedgerStateView';
import { NoteBuilder } from '../src/core/NoteBuilder';
import { ErrorHandler, ErrorType, NetworkError, SubmissionRejected, SynchronizationError } from '../src/errors/ErrorHandler';
import { Logger } from '../src/monitoring/observability/logger';
import { TransactionOrchestrator } from '../src/tx/TransactionOrchestrator';
import { Note } from '../src/types/Note';
import { createVaultFixture, NOTE_SCRIPT_SOURCE, VaultFixture } from './helpers/fixtures';

describe('TransactionOrchestrator', () => {
    let fixture: VaultFixture;
    let state: LedgerStateView;
    let orchestrator: TransactionOrchestrator;
    let note: Note;

    beforeEach(async () => {
        fixture = await createVaultFixture('orchestrator');
        state = new LedgerStateView(fixture.ledger);
        orchestrator = new TransactionOrchestrator(fixture.ledger, state);
        const script = await NoteBuilder.compile(fixture.ledger, NOTE_SCRIPT_SOURCE, {
            kernelVersion: fixture.config.script.kernelVersion,
            debugMode: fixture.config.script.debugMode
        });
        note = new NoteBuilder(script).build({
            sender: fixture.owner.id,
            faucet: fixture.faucet,
            amount: 25n,
            beneficiary: fixture.beneficiary.id,
            deadline: 2,
            currentHeight: 0
        });
    });

    it('should submit the note as an output and resynchronize', async () => {
        const transactionId = await orchestrator.submitOutput(fixture.owner, note);

        expect(fixture.ledger.hasTransaction(transactionId)).toBe(true);
        expect(state.requireHeight()).toBe(0);
        expect(await state.balanceOf(fixture.owner.id, fixture.faucet.id)).toBe(999_975n);
        expect((await state.findNote(note.id))?.createdInTransaction).toBe(transactionId);
    });

    it('should consume the note as an unauthenticated input', async () => {
        const submitSpy = jest.spyOn(fixture.ledger, 'submitTransaction');
        await orchestrator.submitOutput(fixture.owner, note);
        fixture.ledger.produceBlocks(2);

        await orchestrator.submitConsumption(fixture.beneficiary, note);

        expect(submitSpy).toHaveBeenLastCalledWith({
            accountId: fixture.beneficiary.id,
            outputs: [],
            inputs: [{ note, authenticated: false }]
        });
        expect(state.requireHeight()).toBe(2);
        expect(await state.balanceOf(fixture.beneficiary.id, fixture.faucet.id)).toBe(25n);
    });

    it('should record accepted transactions in order', async () => {
        const outputId = await orchestrator.submitOutput(fixture.owner, note);
        fixture.ledger.produceBlocks(2);
        const consumptionId = await orchestrator.submitConsumption(fixture.beneficiary, note);

        const history = orchestrator.getHistory();
        expect(history).toHaveLength(2);
        expect(history[0]).toMatchObject({
            transactionId: outputId,
            kind: 'output',
            accountId: fixture.owner.id.toHex(),
            noteId: note.id,
            syncedHeight: 0
        });
        expect(history[1]).toMatchObject({
            transactionId: consumptionId,
            kind: 'consumption',
            accountId: fixture.beneficiary.id.toHex(),
            syncedHeight: 2
        });
    });

    it('should propagate ledger rejections verbatim and without retry', async () => {
        const rejection = new SubmissionRejected('insufficient funds');
        const submitSpy = jest.spyOn(fixture.ledger, 'submitTransaction').mockRejectedValueOnce(rejection);

        await expect(orchestrator.submitOutput(fixture.owner, note)).rejects.toBe(rejection);
        expect(submitSpy).toHaveBeenCalledTimes(1);
        expect(orchestrator.getHistory()).toEqual([]);
        expect(ErrorHandler.getInstance().getErrorStats()[ErrorType.SUBMISSION_REJECTED]).toBe(1);
    });

    it('should propagate network failures without retry', async () => {
        const failure = new NetworkError('socket hang up');
        const submitSpy = jest.spyOn(fixture.ledger, 'submitTransaction').mockRejectedValueOnce(failure);

        await expect(orchestrator.submitConsumption(fixture.beneficiary, note)).rejects.toBe(failure);
        expect(submitSpy).toHaveBeenCalledTimes(1);
    });

    it('should raise SynchronizationError when the post-submission sync fails', async () => {
        jest.spyOn(fixture.ledger, 'synchronize').mockRejectedValueOnce(new Error('sync lost'));

        await expect(orchestrator.submitOutput(fixture.owner, note)).rejects.toBeInstanceOf(SynchronizationError);
        expect(await fixture.ledger.getNote(note.id)).not.toBeNull();
        expect(state.isStale).toBe(true);
    });

    it('should keep accepted transactions in the history when the post-submission sync fails', async () => {
        jest.spyOn(fixture.ledger, 'synchronize').mockRejectedValueOnce(new Error('sync lost'));

        await expect(orchestrator.submitOutput(fixture.owner, note)).rejects.toBeInstanceOf(SynchronizationError);

        const history = orchestrator.getHistory();
        expect(history).toHaveLength(1);
        expect(history[0]).toMatchObject({ kind: 'output', noteId: note.id });
        expect(history[0].syncedHeight).toBeUndefined();
        expect(fixture.ledger.hasTransaction(history[0].transactionId)).toBe(true);
    });

    it('should time submissions that fail', async () => {
        Logger.getInstance().clearLogs();
        jest.spyOn(fixture.ledger, 'submitTransaction').mockRejectedValueOnce(new SubmissionRejected('insufficient funds'));

        await expect(orchestrator.submitOutput(fixture.owner, note)).rejects.toThrow('insufficient funds');

        const timings = Logger.getInstance().getLogs().filter(entry => entry.operation === 'submit-output');
        expect(timings).toHaveLength(1);
        expect(timings[0].message).toBe('Operation completed: submit-output');
    });
});
