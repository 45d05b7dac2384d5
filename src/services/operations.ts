/**
 * Command lifecycle operations
 * Create, delete, execute and bulk edit over an explicit store value.
 * Callers load the store before and save it after a mutating operation.
 */

import type { CommandStore } from '../storage/command-store.js';
import type { ShellConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import {
  EmptyCommandTextError,
  ShellLaunchFailedError,
  ShellNonZeroExitError,
} from '../core/errors.js';
import { matchCommands } from './search.js';
import { selectCommand, type Selection, type SelectorIo } from './selector.js';
import type { Prompter } from './prompter.js';
import { shellInvocation, type ProcessRunner } from './process-runner.js';
import { runEditorSession } from './editor.js';

export interface CreateInput {
  command?: string;
  description?: string;
}

export interface OperationIo extends SelectorIo {
  logger: Logger;
}

/**
 * Inserts or overwrites an entry, prompting for whatever was not given.
 * @returns the stored command text
 */
export async function createCommand(
  store: CommandStore,
  input: CreateInput,
  prompter: Prompter
): Promise<string> {
  const command = input.command ?? (await prompter.readLine('Enter command: ')).trim();
  if (command.trim() === '') {
    throw new EmptyCommandTextError();
  }

  const description = input.description ?? (await prompter.readLine('Enter description (optional): ')).trim();

  store.put(command, description);
  return command;
}

export function notFoundMessage(pattern: string): string {
  return `No commands found matching '${pattern}'`;
}

/**
 * Searches, lets the user pick one match and removes it.
 * @returns the removed command, or null when nothing was removed
 */
export async function deleteCommand(
  store: CommandStore,
  pattern: string,
  io: OperationIo
): Promise<string | null> {
  const selection = await selectCommand(matchCommands(pattern, store), store, io, 'delete');
  const command = resolveSelection(selection, pattern, io);
  if (command === null) {
    return null;
  }

  store.remove(command);
  io.output.line(`Deleted command: ${command}`);
  return command;
}

export interface ExecuteOptions {
  /** Look the pattern up as an exact command instead of searching */
  exact?: boolean;
}

export interface ExecuteDeps {
  runner: ProcessRunner;
  shell: ShellConfig;
}

/**
 * Picks a command and runs it through the shell with the terminal attached.
 * @returns the executed command, or null when nothing ran
 */
export async function executeCommand(
  store: CommandStore,
  pattern: string,
  io: OperationIo,
  deps: ExecuteDeps,
  options: ExecuteOptions = {}
): Promise<string | null> {
  let command: string | null;
  if (options.exact) {
    command = store.has(pattern) ? pattern : null;
    if (command === null) {
      io.output.line(notFoundMessage(pattern));
    }
  } else {
    const selection = await selectCommand(matchCommands(pattern, store), store, io, 'execute');
    command = resolveSelection(selection, pattern, io);
  }

  if (command === null) {
    return null;
  }

  io.output.line(`Executing: ${command}`);
  const { program, args } = shellInvocation(deps.shell, command);
  // The child reads the terminal directly; stop buffering stdin first
  io.prompter.close();

  let status: number;
  try {
    status = await deps.runner.run(program, args);
  } catch (error) {
    throw new ShellLaunchFailedError(command, error);
  }

  if (status !== 0) {
    throw new ShellNonZeroExitError(command, status);
  }
  return command;
}

export interface BulkEditDeps {
  editor: string;
  runner: ProcessRunner;
  logger?: Logger;
  tmpDir?: string;
}

/**
 * Lets the user rewrite every entry in an editor.
 * @returns a brand-new store that replaces the old one
 */
export async function bulkEdit(store: CommandStore, deps: BulkEditDeps): Promise<CommandStore> {
  return runEditorSession(store, deps);
}

function resolveSelection(selection: Selection, pattern: string, io: OperationIo): string | null {
  switch (selection.kind) {
    case 'empty':
      io.output.line(notFoundMessage(pattern));
      return null;
    case 'none':
      io.logger.debug('Selection ignored', { input: selection.input });
      return null;
    case 'selected':
      return selection.command;
  }
}
