import { ConstructionError, ErrorType } from '../errors/ErrorHandler';
import { AccountId } from '../types/Account';
import { Note, NoteExecutionHint, NoteType, ScriptEnvironment } from '../types/Note';
import { toWord } from './felt';
import { computeScriptRoot, createNote } from './note';

export interface SerializedAsset {
    faucetId: string;
    amount: string;
}

export interface SerializedNote {
    id: string;
    assets: SerializedAsset[];
    metadata: {
        sender: string;
        noteType: NoteType;
        tag: number;
        executionHint: NoteExecutionHint;
        aux: string;
    };
    recipient: {
        serialNumber: string[];
        script: {
            root: string;
            source: string;
            environment: ScriptEnvironment;
        };
        inputs: string[];
        digest: string;
    };
}

/**
 * Serializes a note for JSON transport, converting felts and amounts to
 * decimal strings
 */
export function serializeNote(note: Note): SerializedNote {
    return {
        id: note.id,
        assets: note.assets.map(asset => ({
            faucetId: asset.faucetId.toHex(),
            amount: asset.amount.toString()
        })),
        metadata: {
            sender: note.metadata.sender.toHex(),
            noteType: note.metadata.noteType,
            tag: note.metadata.tag,
            executionHint: { ...note.metadata.executionHint },
            aux: note.metadata.aux.toString()
        },
        recipient: {
            serialNumber: note.recipient.serialNumber.map(felt => felt.toString()),
            script: {
                root: note.recipient.script.root,
                source: note.recipient.script.source,
                environment: { ...note.recipient.script.environment }
            },
            inputs: note.recipient.inputs.map(felt => felt.toString()),
            digest: note.recipient.digest
        }
    };
}

function malformed(message: string, field: string): ConstructionError {
    return new ConstructionError(`Malformed note: ${message}`, { field }, ErrorType.INVALID_NOTE_INPUTS);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRecord(source: Record<string, unknown>, field: string): Record<string, unknown> {
    const value = source[field];
    if (!isRecord(value)) {
        throw malformed(`${field} must be an object`, field);
    }
    return value;
}

function readString(source: Record<string, unknown>, field: string): string {
    const value = source[field];
    if (typeof value !== 'string') {
        throw malformed(`${field} must be a string`, field);
    }
    return value;
}

function readArray(source: Record<string, unknown>, field: string): unknown[] {
    const value = source[field];
    if (!Array.isArray(value)) {
        throw malformed(`${field} must be an array`, field);
    }
    return value;
}

function readInteger(source: Record<string, unknown>, field: string): number {
    const value = source[field];
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw malformed(`${field} must be an integer`, field);
    }
    return value;
}

function parseBigInt(value: unknown, field: string): bigint {
    if (typeof value !== 'string' || !/^\d+$/.test(value)) {
        throw malformed(`${field} must be a decimal string`, field);
    }
    return BigInt(value);
}

function parseAccountId(value: string, field: string): AccountId {
    try {
        return AccountId.fromHex(value);
    } catch (error) {
        throw malformed(`${field}: ${error instanceof Error ? error.message : String(error)}`, field);
    }
}

function parseNoteType(value: string): NoteType {
    if (value !== 'public' && value !== 'private') {
        throw malformed(`unknown note type ${value}`, 'noteType');
    }
    return value;
}

function parseExecutionHint(value: Record<string, unknown>): NoteExecutionHint {
    const kind = readString(value, 'kind');
    switch (kind) {
        case 'none':
        case 'always':
            return { kind };
        case 'afterBlock':
            return { kind, blockNum: readInteger(value, 'blockNum') };
        default:
            throw malformed(`unknown execution hint ${kind}`, 'executionHint');
    }
}

function parseEnvironment(value: Record<string, unknown>): ScriptEnvironment {
    const debugMode = value.debugMode;
    if (typeof debugMode !== 'boolean') {
        throw malformed('debugMode must be a boolean', 'debugMode');
    }
    return { kernelVersion: readString(value, 'kernelVersion'), debugMode };
}

/**
 * Rebuilds a note from its serialized form and checks that the recomputed
 * script root and note id match the ones carried in the payload
 * @throws ConstructionError if the payload is malformed or tampered with
 */
export function deserializeNote(data: unknown): Note {
    if (!isRecord(data)) {
        throw malformed('payload must be an object', 'note');
    }

    const metadata = readRecord(data, 'metadata');
    const recipient = readRecord(data, 'recipient');
    const script = readRecord(recipient, 'script');

    const source = readString(script, 'source');
    const root = readString(script, 'root');
    if (computeScriptRoot(source) !== root) {
        throw malformed('script root does not match script source', 'script.root');
    }

    const note = createNote({
        assets: readArray(data, 'assets').map((entry, index) => {
            if (!isRecord(entry)) {
                throw malformed(`assets[${index}] must be an object`, 'assets');
            }
            return {
                faucetId: parseAccountId(readString(entry, 'faucetId'), `assets[${index}].faucetId`),
                amount: parseBigInt(entry.amount, `assets[${index}].amount`)
            };
        }),
        metadata: {
            sender: parseAccountId(readString(metadata, 'sender'), 'metadata.sender'),
            noteType: parseNoteType(readString(metadata, 'noteType')),
            tag: readInteger(metadata, 'tag'),
            executionHint: parseExecutionHint(readRecord(metadata, 'executionHint')),
            aux: parseBigInt(metadata.aux, 'metadata.aux')
        },
        serialNumber: toWord(readArray(recipient, 'serialNumber').map((felt, index) =>
            parseBigInt(felt, `serialNumber[${index}]`))),
        script: { root, source, environment: parseEnvironment(readRecord(script, 'environment')) },
        inputs: readArray(recipient, 'inputs').map((felt, index) => parseBigInt(felt, `inputs[${index}]`))
    });

    const id = readString(data, 'id');
    if (note.id !== id) {
        throw malformed(`id ${id} does not match content (expected ${note.id})`, 'id');
    }
    return note;
}
