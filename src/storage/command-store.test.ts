/**
 * Tests for Command Store persistence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fc from 'fast-check';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandStore, loadStore, saveStore, serializeStore } from './command-store.js';
import { StoreCorruptError, StoreWriteFailedError } from '../core/errors.js';
import { createLogger, type LogEntry } from '../core/logger.js';

const textArbitrary = fc.oneof(
  fc.string(),
  fc.fullUnicodeString(),
  fc.constantFrom('', 'list files: long format', 'grep -R "TODO" . | wc -l', 'ünïcødé ✓')
);

const storeArbitrary = fc
  .dictionary(fc.oneof(fc.string({ minLength: 1 }), fc.fullUnicodeString({ minLength: 1 })), textArbitrary)
  .map(record => new CommandStore(Object.entries(record)));

describe('CommandStore', () => {
  it('overwrites the description when the same command is put twice', () => {
    const store = new CommandStore();

    store.put('git status', 'first');
    store.put('git status', 'second');

    expect(store.size).toBe(1);
    expect(store.get('git status')).toBe('second');
  });

  it('keeps insertion order and the original position on overwrite', () => {
    const store = new CommandStore();
    store.put('a', '1');
    store.put('b', '2');
    store.put('a', '3');

    expect(store.entries()).toEqual([
      { command: 'a', description: '3' },
      { command: 'b', description: '2' },
    ]);
  });

  it('removes entries and reports whether anything was removed', () => {
    const store = CommandStore.fromRecord({ 'ls -la': 'list files' });

    expect(store.remove('missing')).toBe(false);
    expect(store.remove('ls -la')).toBe(true);
    expect(store.isEmpty()).toBe(true);
    expect(store.has('ls -la')).toBe(false);
  });

  it('serializes as indented JSON with a trailing newline', () => {
    const store = CommandStore.fromRecord({ 'ls -la': 'list files', 'git status': '' });

    expect(serializeStore(store)).toBe(
      '{\n  "commands": {\n    "ls -la": "list files",\n    "git status": ""\n  }\n}\n'
    );
  });
});

describe('Store persistence', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'keepc-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads a missing file as an empty store', () => {
    const store = loadStore(path.join(dir, 'nope', 'commands.json'));

    expect(store.isEmpty()).toBe(true);
  });

  it('fails with StoreCorruptError on invalid JSON', () => {
    const file = path.join(dir, 'commands.json');
    fs.writeFileSync(file, '{ not json');

    expect(() => loadStore(file)).toThrow(StoreCorruptError);
  });

  it('fails with StoreCorruptError on JSON of the wrong shape', () => {
    const file = path.join(dir, 'commands.json');
    const shapes = ['[]', '{}', '{"commands": []}', '{"commands": {"ls": 3}}', 'null'];

    for (const shape of shapes) {
      fs.writeFileSync(file, shape);
      expect(() => loadStore(file)).toThrow(StoreCorruptError);
    }
  });

  it('fails with StoreCorruptError when the path is a directory', () => {
    expect(() => loadStore(dir)).toThrow(StoreCorruptError);
  });

  it('names the file in the corrupt error', () => {
    const file = path.join(dir, 'commands.json');
    fs.writeFileSync(file, 'oops');

    try {
      loadStore(file);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StoreCorruptError);
      if (error instanceof StoreCorruptError) {
        expect(error.path).toBe(file);
        expect(error.code).toBe('STORE_CORRUPT');
        expect(error.message).toContain(file);
      }
    }
  });

  it('creates parent directories on save', () => {
    const file = path.join(dir, 'a', 'b', 'commands.json');
    saveStore(CommandStore.fromRecord({ 'ls -la': 'list files' }), file);

    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({ commands: { 'ls -la': 'list files' } });
    expect(fs.readdirSync(path.join(dir, 'a', 'b'))).toEqual(['commands.json']);
  });

  it('fails with StoreWriteFailedError when the directory cannot be created', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, '');

    expect(() => saveStore(new CommandStore(), path.join(blocker, 'commands.json')))
      .toThrow(StoreWriteFailedError);
  });

  it('logs loads and saves at debug level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger('debug', (entry) => entries.push(entry));
    const file = path.join(dir, 'commands.json');

    loadStore(file, logger);
    saveStore(CommandStore.fromRecord({ a: 'b' }), file, logger);
    loadStore(file, logger);

    expect(entries.map(e => e.message)).toEqual([
      'Store file not found, starting empty',
      'Store saved',
      'Store loaded',
    ]);
  });

  it('round-trips any store', () => {
    const file = path.join(dir, 'commands.json');

    fc.assert(
      fc.property(storeArbitrary, (store) => {
        saveStore(store, file);
        expect(loadStore(file).toJSON()).toEqual(store.toJSON());
      }),
      { numRuns: 50 }
    );
  });

  it('saving twice loads to an equal store', () => {
    const file = path.join(dir, 'commands.json');
    const store = CommandStore.fromRecord({ 'echo "hi"': 'greets', 'df -h': '' });

    saveStore(store, file);
    const first = fs.readFileSync(file, 'utf-8');
    saveStore(store, file);

    expect(fs.readFileSync(file, 'utf-8')).toBe(first);
    expect(loadStore(file).toJSON()).toEqual(store.toJSON());
  });
});
