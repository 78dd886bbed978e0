import { ConstructionError, ErrorType, InvalidAssetError } from '../errors/ErrorHandler';
import { FungibleAsset } from '../types/Asset';
import { CompiledScript, Note, NoteExecutionHint, NoteMetadata } from '../types/Note';
import { assetCommitment, validateAssetAmount } from './asset';
import { Felt, MAX_U32, toFelt, toWord, Word } from './felt';
import { digestToHex, hashToField, hexToDigest, merge, poseidonHashMany } from './hash';
import { isValidTag } from './noteTag';

export interface NoteParts {
    assets: readonly FungibleAsset[];
    metadata: NoteMetadata;
    serialNumber: Word;
    script: CompiledScript;
    inputs: readonly Felt[];
}

/**
 * Computes the root under which a script is referenced from note recipients
 */
export function computeScriptRoot(source: string): string {
    return digestToHex(hashToField(source));
}

export function inputsCommitment(inputs: readonly Felt[]): bigint {
    return poseidonHashMany(inputs);
}

/**
 * Binds serial number, script and inputs:
 * H(H(H(serialNumber), scriptRoot), inputsCommitment)
 */
export function computeRecipientDigest(serialNumber: Word, scriptRoot: string, inputs: readonly Felt[]): string {
    const serialCommitment = poseidonHashMany(serialNumber);
    const withScript = merge(serialCommitment, hexToDigest(scriptRoot));
    return digestToHex(merge(withScript, inputsCommitment(inputs)));
}

/**
 * Note id = H(recipientDigest, assetCommitment). Metadata is not part of the id.
 */
export function computeNoteId(recipientDigest: string, assets: readonly FungibleAsset[]): string {
    return digestToHex(merge(hexToDigest(recipientDigest), assetCommitment(assets)));
}

/**
 * Nullifier published when the note is consumed. Derivable only from the full
 * note content, so a note id alone does not reveal it.
 */
export function computeNullifier(note: Note): string {
    const { recipient } = note;
    return digestToHex(poseidonHashMany([
        poseidonHashMany(recipient.serialNumber),
        hexToDigest(recipient.script.root),
        inputsCommitment(recipient.inputs),
        assetCommitment(note.assets)
    ]));
}

function validateExecutionHint(hint: NoteExecutionHint): void {
    if (hint.kind === 'afterBlock' && (!Number.isInteger(hint.blockNum) || hint.blockNum < 0 || hint.blockNum > MAX_U32)) {
        throw new ConstructionError(`Execution hint block ${hint.blockNum} is not a valid height`, {
            blockNum: hint.blockNum
        }, ErrorType.INVALID_NOTE_INPUTS);
    }
}

function validateAssets(assets: readonly FungibleAsset[]): void {
    if (assets.length === 0) {
        throw new InvalidAssetError('A note must carry at least one asset');
    }
    const faucets = new Set<string>();
    for (const asset of assets) {
        validateAssetAmount(asset.amount);
        const faucetId = asset.faucetId.toHex();
        if (faucets.has(faucetId)) {
            throw new InvalidAssetError(`Duplicate asset for faucet ${faucetId}`, { faucetId });
        }
        faucets.add(faucetId);
    }
}

/**
 * Assembles an immutable note and derives its recipient digest and id
 * @throws ConstructionError if any component is malformed
 */
export function createNote(parts: NoteParts): Note {
    validateAssets(parts.assets);
    if (!isValidTag(parts.metadata.tag)) {
        throw new ConstructionError(`Invalid note tag ${parts.metadata.tag}`, {
            tag: parts.metadata.tag
        }, ErrorType.INVALID_NOTE_INPUTS);
    }
    validateExecutionHint(parts.metadata.executionHint);

    const serialNumber = Object.freeze(toWord(parts.serialNumber));
    const inputs = Object.freeze(parts.inputs.map((input, index) => toFelt(input, `inputs[${index}]`)));
    const script = Object.freeze({
        root: parts.script.root,
        source: parts.script.source,
        environment: Object.freeze({ ...parts.script.environment })
    });
    const digest = computeRecipientDigest(serialNumber, script.root, inputs);
    const assets = Object.freeze(parts.assets.map(asset => Object.freeze({ ...asset })));

    return Object.freeze({
        id: computeNoteId(digest, assets),
        assets,
        metadata: Object.freeze({
            ...parts.metadata,
            aux: toFelt(parts.metadata.aux, 'aux'),
            executionHint: Object.freeze({ ...parts.metadata.executionHint })
        }),
        recipient: Object.freeze({ serialNumber, script, inputs, digest })
    });
}

export function noteTotal(note: Note): bigint {
    return note.assets.reduce((sum, asset) => sum + asset.amount, 0n);
}
