import { readFileSync } from 'fs';
import * as path from 'path';
import { ScriptCompilationError } from '../errors/ErrorHandler';

export const DEFAULT_NOTE_SCRIPT_PATH = path.resolve(__dirname, '..', '..', 'masm', 'inheritance_vault_note.masm');

/**
 * Reads note script source from disk.
 * @throws ScriptCompilationError when the file is missing or empty
 */
export function loadNoteScriptSource(scriptPath: string = DEFAULT_NOTE_SCRIPT_PATH): string {
  let source: string;
  try {
    source = readFileSync(scriptPath, 'utf8');
  } catch (error) {
    throw new ScriptCompilationError(`Failed to read note script ${scriptPath}`, {
      scriptPath,
      cause: error instanceof Error ? error.message : String(error)
    });
  }
  if (source.trim() === '') {
    throw new ScriptCompilationError(`Note script ${scriptPath} is empty`, { scriptPath });
  }
  return source;
}
