/**
 * Interactive Selector
 * Lets the user pick one of several matches by its 1-based number
 */

import type { CommandStore } from '../storage/command-store.js';
import type { Prompter } from './prompter.js';
import type { Formatter, Output } from './output.js';

export type Selection =
  | { kind: 'empty' }
  | { kind: 'none'; input: string }
  | { kind: 'selected'; command: string; index: number };

export type SelectionAction = 'delete' | 'execute';

export interface SelectorIo {
  prompter: Prompter;
  output: Output;
  formatter: Formatter;
}

// Unsigned decimal, optionally with a leading plus
const SELECTION_PATTERN = /^\+?\d+$/;

/**
 * Parses a 1-based choice; anything but a number in [1, count] is null
 */
export function parseSelection(input: string, count: number): number | null {
  const trimmed = input.trim();
  if (!SELECTION_PATTERN.test(trimmed)) {
    return null;
  }

  const choice = Number.parseInt(trimmed, 10);
  if (choice < 1 || choice > count) {
    return null;
  }
  return choice;
}

export async function selectCommand(
  matches: string[],
  store: CommandStore,
  io: SelectorIo,
  action: SelectionAction
): Promise<Selection> {
  if (matches.length === 0) {
    return { kind: 'empty' };
  }

  io.output.line(`Found ${matches.length} matching commands:`);
  matches.forEach((command, i) => {
    io.output.line(io.formatter.numbered(i + 1, command, store.get(command) ?? ''));
  });

  const input = await io.prompter.readLine(`Enter a number to ${action}: `);
  const choice = parseSelection(input, matches.length);
  if (choice === null) {
    return { kind: 'none', input };
  }

  return { kind: 'selected', command: matches[choice - 1], index: choice };
}
