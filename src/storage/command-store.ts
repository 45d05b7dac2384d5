/**
 * Command Store
 * In-memory command -> description mapping and its JSON file persistence
 */

import * as fs from 'fs';
import * as path from 'path';
import { StoreCorruptError, StoreWriteFailedError } from '../core/errors.js';
import { createSilentLogger, type Logger } from '../core/logger.js';

export interface CommandEntry {
  command: string;
  description: string;
}

/**
 * On-disk shape of the store file
 */
export interface StoreFile {
  commands: Record<string, string>;
}

export class CommandStore {
  private readonly items: Map<string, string>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    this.items = new Map(entries);
  }

  static fromRecord(record: Record<string, string>): CommandStore {
    return new CommandStore(Object.entries(record));
  }

  get(command: string): string | undefined {
    return this.items.get(command);
  }

  has(command: string): boolean {
    return this.items.has(command);
  }

  /**
   * Inserts or overwrites the description for a command
   */
  put(command: string, description: string): void {
    this.items.set(command, description);
  }

  remove(command: string): boolean {
    return this.items.delete(command);
  }

  entries(): CommandEntry[] {
    return Array.from(this.items, ([command, description]) => ({ command, description }));
  }

  get size(): number {
    return this.items.size;
  }

  isEmpty(): boolean {
    return this.items.size === 0;
  }

  toJSON(): StoreFile {
    return { commands: Object.fromEntries(this.items) };
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function parseStoreFile(raw: string): CommandStore {
  const parsed: unknown = JSON.parse(raw);

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('expected a JSON object');
  }
  if (!('commands' in parsed)) {
    throw new Error('missing field "commands"');
  }

  const commands = parsed.commands;
  if (typeof commands !== 'object' || commands === null || Array.isArray(commands)) {
    throw new Error('"commands" must be an object');
  }

  assertDescriptions(commands);
  return CommandStore.fromRecord(commands);
}

function assertDescriptions(commands: object): asserts commands is Record<string, string> {
  for (const [command, description] of Object.entries(commands)) {
    if (typeof description !== 'string') {
      throw new Error(`description of "${command}" must be a string`);
    }
  }
}

/**
 * Loads the store from disk
 * A missing file is an empty store; anything unreadable is StoreCorruptError
 */
export function loadStore(filePath: string, logger: Logger = createSilentLogger()): CommandStore {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      logger.debug('Store file not found, starting empty', { path: filePath });
      return new CommandStore();
    }
    throw new StoreCorruptError(filePath, error);
  }

  try {
    const store = parseStoreFile(raw);
    logger.debug('Store loaded', { path: filePath, entries: store.size });
    return store;
  } catch (error) {
    throw new StoreCorruptError(filePath, error);
  }
}

export function serializeStore(store: CommandStore): string {
  return `${JSON.stringify(store.toJSON(), null, 2)}\n`;
}

/**
 * Writes the whole store, replacing the file through a rename
 */
export function saveStore(
  store: CommandStore,
  filePath: string,
  logger: Logger = createSilentLogger()
): void {
  const tempPath = `${filePath}.${process.pid}.tmp`;

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tempPath, serializeStore(store), 'utf-8');
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.rmSync(tempPath, { force: true });
    }
    throw new StoreWriteFailedError(filePath, error);
  }

  logger.debug('Store saved', { path: filePath, entries: store.size });
}
