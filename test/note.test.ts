import { ConstructionError, InvalidAssetError } from '../src/errors/ErrorHandler';
import { AccountId } from '../src/types/Account';
import { CompiledScript, NoteMetadata } from '../src/types/Note';
import { toWord } from '../src/utils/felt';
import {
    computeNoteId,
    computeNullifier,
    computeRecipientDigest,
    computeScriptRoot,
    createNote,
    NoteParts,
    noteTotal
} from '../src/utils/note';
import { deserializeNote, serializeNote } from '../src/utils/noteCodec';
import { NOTE_SCRIPT_SOURCE } from './helpers/fixtures';

const faucetId = AccountId.fromParts(0x2b3c4d5e6f708020n, 0x0011223344556600n);
const otherFaucetId = AccountId.fromParts(0x3b3c4d5e6f708020n, 0x0011223344556600n);
const sender = AccountId.fromParts(0x1a2b3c4d5e6f7090n, 0x00aabbccddeeff00n);
const beneficiary = AccountId.fromParts(0x0102030405060790n, 0x0008090a0b0c0d00n);

const script: CompiledScript = {
    root: computeScriptRoot(NOTE_SCRIPT_SOURCE),
    source: NOTE_SCRIPT_SOURCE,
    environment: { kernelVersion: '0.8', debugMode: true }
};

const metadata: NoteMetadata = {
    sender,
    noteType: 'public',
    tag: 0xc0000000,
    executionHint: { kind: 'always' },
    aux: 0n
};

function parts(overrides: Partial<NoteParts> = {}): NoteParts {
    return {
        assets: [{ faucetId, amount: 10n }],
        metadata,
        serialNumber: toWord([1, 2, 3, 4]),
        script,
        inputs: [3n, beneficiary.suffix, beneficiary.prefix],
        ...overrides
    };
}

describe('Note Utilities', () => {
    describe('createNote', () => {
        it('should derive the id from the recipient digest and assets', () => {
            const note = createNote(parts());
            const digest = computeRecipientDigest(toWord([1, 2, 3, 4]), script.root, [3n, beneficiary.suffix, beneficiary.prefix]);

            expect(note.recipient.digest).toBe(digest);
            expect(note.id).toBe(computeNoteId(digest, [{ faucetId, amount: 10n }]));
            expect(note.id).toMatch(/^0x[0-9a-f]{64}$/);
        });

        it('should produce the same id for the same serial number', () => {
            expect(createNote(parts()).id).toBe(createNote(parts()).id);
        });

        it('should produce a different id for a different serial number', () => {
            expect(createNote(parts({ serialNumber: toWord([1, 2, 3, 5]) })).id).not.toBe(createNote(parts()).id);
        });

        it('should leave metadata out of the id', () => {
            const retagged = createNote(parts({ metadata: { ...metadata, tag: 0x80000000, aux: 9n } }));

            expect(retagged.id).toBe(createNote(parts()).id);
        });

        it('should change the id with the deadline input', () => {
            const later = createNote(parts({ inputs: [4n, beneficiary.suffix, beneficiary.prefix] }));

            expect(later.id).not.toBe(createNote(parts()).id);
        });

        it('should keep the nullifier distinct from the id', () => {
            const note = createNote(parts());

            expect(computeNullifier(note)).not.toBe(note.id);
            expect(computeNullifier(note)).toBe(computeNullifier(createNote(parts())));
        });

        it('should freeze the note', () => {
            const note = createNote(parts());

            expect(Object.isFrozen(note)).toBe(true);
            expect(Object.isFrozen(note.assets)).toBe(true);
            expect(Object.isFrozen(note.recipient.inputs)).toBe(true);
            expect(Object.isFrozen(note.metadata)).toBe(true);
        });

        it('should reject notes without assets', () => {
            expect(() => createNote(parts({ assets: [] }))).toThrow(InvalidAssetError);
        });

        it('should reject two assets from the same faucet', () => {
            expect(() => createNote(parts({
                assets: [{ faucetId, amount: 1n }, { faucetId, amount: 2n }]
            }))).toThrow(`Duplicate asset for faucet ${faucetId.toHex()}`);
        });

        it('should reject zero amounts', () => {
            expect(() => createNote(parts({ assets: [{ faucetId, amount: 0n }] }))).toThrow(
                'Asset amount must be greater than zero, got 0'
            );
        });

        it('should reject an invalid tag', () => {
            expect(() => createNote(parts({ metadata: { ...metadata, tag: -1 } }))).toThrow('Invalid note tag -1');
        });

        it('should reject inputs outside the field', () => {
            expect(() => createNote(parts({ inputs: [-1n] }))).toThrow(ConstructionError);
        });

        it('should total the assets', () => {
            const note = createNote(parts({
                assets: [{ faucetId, amount: 10n }, { faucetId: otherFaucetId, amount: 5n }]
            }));

            expect(noteTotal(note)).toBe(15n);
        });
    });

    describe('codec', () => {
        it('should carry amounts and felts as decimal strings', () => {
            const serialized = serializeNote(createNote(parts()));

            expect(serialized.assets).toEqual([{ faucetId: faucetId.toHex(), amount: '10' }]);
            expect(serialized.recipient.serialNumber).toEqual(['1', '2', '3', '4']);
            expect(serialized.recipient.inputs).toEqual(['3', beneficiary.suffix.toString(), beneficiary.prefix.toString()]);
            expect(serialized.metadata.aux).toBe('0');
        });

        it('should rebuild an identical note from JSON', () => {
            const note = createNote(parts({ metadata: { ...metadata, executionHint: { kind: 'afterBlock', blockNum: 3 } } }));
            const restored = deserializeNote(JSON.parse(JSON.stringify(serializeNote(note))));

            expect(restored.id).toBe(note.id);
            expect(restored.metadata.sender.equals(sender)).toBe(true);
            expect(restored.metadata.executionHint).toEqual({ kind: 'afterBlock', blockNum: 3 });
            expect(restored.recipient.inputs).toEqual(note.recipient.inputs);
        });

        it('should reject a payload whose id does not match its content', () => {
            const serialized = serializeNote(createNote(parts()));
            serialized.assets[0].amount = '11';

            expect(() => deserializeNote(serialized)).toThrow(`Malformed note: id ${serialized.id} does not match content`);
        });

        it('should reject a payload whose script root does not match its source', () => {
            const serialized = serializeNote(createNote(parts()));
            serialized.recipient.script.source = 'begin\nend';

            expect(() => deserializeNote(serialized)).toThrow('Malformed note: script root does not match script source');
        });

        it('should reject payloads with missing fields', () => {
            expect(() => deserializeNote(null)).toThrow('Malformed note: payload must be an object');
            expect(() => deserializeNote({ metadata: {} })).toThrow('Malformed note: recipient must be an object');
        });
    });
});
