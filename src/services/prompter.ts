/**
 * Prompter
 * Reads single lines of user input after printing a prompt
 */

import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';

export interface Prompter {
  /**
   * Prints `message` and resolves with the next input line, trailing newline
   * removed. Resolves with an empty string at end of input.
   */
  readLine(message: string): Promise<string>;
  close(): void;
}

/**
 * Prompter over a pair of streams (stdin/stdout in production).
 * The readline interface is opened on first use, so commands that never
 * prompt do not hold stdin open.
 */
export function createStreamPrompter(
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Prompter {
  let rl: readline.Interface | null = null;
  let lines: AsyncIterator<string> | null = null;

  const nextLine = (): AsyncIterator<string> => {
    if (!lines) {
      const iface = readline.createInterface({ input, terminal: false });
      rl = iface;
      // The iterator buffers lines that arrive before they are asked for
      lines = iface[Symbol.asyncIterator]();
    }
    return lines;
  };

  return {
    async readLine(message: string): Promise<string> {
      output.write(message);
      const result = await nextLine().next();
      return result.done ? '' : result.value;
    },
    close() {
      rl?.close();
      rl = null;
      lines = null;
    },
  };
}

export interface ScriptedPrompter extends Prompter {
  /** Messages shown so far, in order */
  readonly prompts: string[];
}

/**
 * Prompter answering from a fixed list; exhausted input reads as empty
 */
export function createScriptedPrompter(responses: string[]): ScriptedPrompter {
  const queue = [...responses];
  const prompts: string[] = [];

  return {
    prompts,
    async readLine(message: string): Promise<string> {
      prompts.push(message);
      return queue.shift() ?? '';
    },
    close() {
      queue.length = 0;
    },
  };
}
