/**
 * Search Engine
 * Multi-keyword matching over saved commands
 */

import type { CommandStore } from '../storage/command-store.js';

/**
 * Splits a pattern into keywords on any whitespace
 */
export function splitKeywords(pattern: string): string[] {
  return pattern.split(/\s+/).filter(keyword => keyword.length > 0);
}

/**
 * Every keyword must appear, ignoring case, in the command or in the description
 */
export function entryMatches(command: string, description: string, keywords: string[]): boolean {
  const haystackCommand = command.toLowerCase();
  const haystackDescription = description.toLowerCase();

  return keywords.every(keyword => {
    const needle = keyword.toLowerCase();
    return haystackCommand.includes(needle) || haystackDescription.includes(needle);
  });
}

/**
 * Returns the commands matching every keyword of the pattern, in store order.
 * A pattern without keywords matches nothing.
 */
export function matchCommands(pattern: string, store: CommandStore): string[] {
  const keywords = splitKeywords(pattern);
  if (keywords.length === 0) {
    return [];
  }

  return store
    .entries()
    .filter(entry => entryMatches(entry.command, entry.description, keywords))
    .map(entry => entry.command);
}
