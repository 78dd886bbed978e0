import * as os from 'os';
import * as path from 'path';
import { ScriptCompilationError } from '../src/errors/ErrorHandler';
import { DEFAULT_NOTE_SCRIPT_PATH, loadNoteScriptSource } from '../src/script/NoteScriptLoader';
import { TimelockConditionScript } from '../src/script/TimelockConditionScript';
import { AccountId } from '../src/types/Account';
import { NOTE_SCRIPT_SOURCE } from './helpers/fixtures';

describe('TimelockConditionScript', () => {
    const script = new TimelockConditionScript(NOTE_SCRIPT_SOURCE);
    const beneficiary = AccountId.fromParts(0x0102030405060790n, 0x0008090a0b0c0d00n);
    const owner = AccountId.fromParts(0x1a2b3c4d5e6f7090n, 0x00aabbccddeeff00n);
    const inputs = TimelockConditionScript.encodeInputs(10, beneficiary);

    describe('inputs', () => {
        it('should lay out deadline, suffix and prefix in that order', () => {
            expect(inputs).toEqual([10n, beneficiary.suffix, beneficiary.prefix]);
        });

        it('should decode what it encodes', () => {
            const decoded = TimelockConditionScript.decodeInputs(inputs);

            expect(decoded.deadline).toBe(10);
            expect(decoded.beneficiary.equals(beneficiary)).toBe(true);
        });

        it('should reject deadlines that are not block heights', () => {
            expect(() => TimelockConditionScript.encodeInputs(-1, beneficiary)).toThrow('Deadline -1 is not a valid block height');
            expect(() => TimelockConditionScript.encodeInputs(2 ** 32, beneficiary)).toThrow('is not a valid block height');
        });

        it('should reject input lists of the wrong length', () => {
            expect(() => TimelockConditionScript.decodeInputs([10n])).toThrow('Timelock note expects exactly 3 inputs, got 1');
        });
    });

    describe('evaluate', () => {
        it('should be locked for everyone before the deadline', () => {
            for (const consumer of [beneficiary, owner]) {
                expect(script.evaluate({ blockHeight: 9, consumer, inputs })).toBe(false);
            }
            expect(script.state({ blockHeight: 9, consumer: beneficiary, inputs })).toBe('locked');
        });

        it('should release to the beneficiary at the deadline', () => {
            expect(script.state({ blockHeight: 10, consumer: beneficiary, inputs })).toBe('releasable');
            expect(script.evaluate({ blockHeight: 10, consumer: beneficiary, inputs })).toBe(true);
            expect(script.evaluate({ blockHeight: 500, consumer: beneficiary, inputs })).toBe(true);
        });

        it('should refuse any other consumer after the deadline', () => {
            expect(script.evaluate({ blockHeight: 10, consumer: owner, inputs })).toBe(false);
        });

        it('should refuse when only one half of the id matches', () => {
            const samePrefix = AccountId.fromParts(beneficiary.prefix, 0n);

            expect(script.evaluate({ blockHeight: 10, consumer: samePrefix, inputs })).toBe(false);
        });

        it('should refuse inputs of the wrong arity', () => {
            expect(script.evaluate({ blockHeight: 10, consumer: beneficiary, inputs: inputs.slice(0, 2) })).toBe(false);
            expect(script.evaluate({ blockHeight: 10, consumer: beneficiary, inputs: [...inputs, 0n] })).toBe(false);
        });
    });
});

describe('NoteScriptLoader', () => {
    it('should load the bundled note script', () => {
        const source = loadNoteScriptSource();

        expect(source).toBe(loadNoteScriptSource(DEFAULT_NOTE_SCRIPT_PATH));
        expect(source.trim().startsWith('use.miden::account')).toBe(true);
        expect(source.trim().endsWith('end')).toBe(true);
    });

    it('should report a missing script file', () => {
        const missing = path.join(os.tmpdir(), 'no-such-dir', 'missing.masm');

        expect(() => loadNoteScriptSource(missing)).toThrow(ScriptCompilationError);
        expect(() => loadNoteScriptSource(missing)).toThrow(`Failed to read note script ${missing}`);
    });
});
