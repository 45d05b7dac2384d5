/**
 * Process Runner
 * Spawns external programs (editor, shell) and waits for them
 */

import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import * as os from 'node:os';
import type { ShellConfig } from '../core/config.js';
import { createSilentLogger, type Logger } from '../core/logger.js';

export interface ProcessRunner {
  /**
   * Runs the program attached to the terminal and resolves with its exit
   * status. Rejects when the program cannot be started.
   */
  run(program: string, args: string[]): Promise<number>;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

/**
 * Base of the status reported for a child killed by a signal (128 + signal number)
 */
export const SIGNAL_EXIT_BASE = 128;

export function signalExitStatus(signal: NodeJS.Signals | null): number {
  const numbers: Readonly<Record<string, number | undefined>> = { ...os.constants.signals };
  return SIGNAL_EXIT_BASE + ((signal && numbers[signal]) ?? 0);
}

export function createProcessRunner(
  logger: Logger = createSilentLogger(),
  spawn: SpawnFn = nodeSpawn
): ProcessRunner {
  return {
    run(program, args) {
      logger.debug('Spawning process', { program, args });

      return new Promise<number>((resolve, reject) => {
        const child = spawn(program, args, { stdio: 'inherit' });

        child.once('error', (error) => {
          logger.debug('Process failed to start', { program, error: error.message });
          reject(error);
        });

        child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
          const status = code ?? signalExitStatus(signal);
          logger.debug('Process exited', { program, status, signal });
          resolve(status);
        });
      });
    },
  };
}

/**
 * Arguments for running a command line through the shell
 */
export function shellInvocation(shell: ShellConfig, command: string): { program: string; args: string[] } {
  return { program: shell.program, args: [shell.flag, command] };
}

/**
 * Splits an editor setting such as `code --wait` into program and arguments
 */
export function parseEditorCommand(editor: string): { program: string; args: string[] } {
  const [program, ...args] = editor.trim().split(/\s+/);
  return { program, args };
}
