/**
 * Editor session
 * Round-trips the store through a text file opened in the user's editor
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandStore } from '../storage/command-store.js';
import { EditorLaunchFailedError, EditorNonZeroExitError } from '../core/errors.js';
import { createSilentLogger, type Logger } from '../core/logger.js';
import { parseEditorCommand, type ProcessRunner } from './process-runner.js';

export const EDIT_DELIMITER = ':::';

export const EDIT_FILE_NAME = 'commands.txt';

/**
 * One `<command>:::<description>` line per entry
 */
export function serializeForEditor(store: CommandStore): string {
  return store
    .entries()
    .map(({ command, description }) => `${command}${EDIT_DELIMITER}${description}\n`)
    .join('');
}

/**
 * Builds a new store from edited text. Each line is split at the first
 * delimiter; lines without one, or with a blank command, are dropped.
 */
export function parseEditorText(text: string): CommandStore {
  const store = new CommandStore();

  for (const line of text.split(/\r?\n/)) {
    const at = line.indexOf(EDIT_DELIMITER);
    if (at === -1) {
      continue;
    }

    const command = line.slice(0, at).trim();
    if (command === '') {
      continue;
    }
    store.put(command, line.slice(at + EDIT_DELIMITER.length).trim());
  }

  return store;
}

export interface EditorSessionOptions {
  /** Editor command line, e.g. `nano` or `code --wait` */
  editor: string;
  runner: ProcessRunner;
  logger?: Logger;
  /** Parent for the temporary directory */
  tmpDir?: string;
}

/**
 * Opens the store in the editor and returns what the user saved.
 * The input store is never modified; the temporary directory is always removed.
 */
export async function runEditorSession(
  store: CommandStore,
  options: EditorSessionOptions
): Promise<CommandStore> {
  const logger = options.logger ?? createSilentLogger();
  const dir = fs.mkdtempSync(path.join(options.tmpDir ?? os.tmpdir(), 'keepc-'));
  const file = path.join(dir, EDIT_FILE_NAME);

  try {
    fs.writeFileSync(file, serializeForEditor(store), 'utf-8');

    const { program, args } = parseEditorCommand(options.editor);
    let status: number;
    try {
      status = await options.runner.run(program, [...args, file]);
    } catch (error) {
      throw new EditorLaunchFailedError(options.editor, error);
    }

    if (status !== 0) {
      throw new EditorNonZeroExitError(options.editor, status);
    }

    const edited = parseEditorText(fs.readFileSync(file, 'utf-8'));
    logger.debug('Editor session finished', { before: store.size, after: edited.size });
    return edited;
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
