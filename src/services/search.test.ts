/**
 * Property-based tests for the Search Engine
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { matchCommands, splitKeywords, entryMatches } from './search.js';
import { CommandStore } from '../storage/command-store.js';

const keywordArbitrary = fc
  .stringOf(fc.constantFrom(...'abcABCxyz-_.'.split('')), { minLength: 1, maxLength: 4 });

const textArbitrary = fc.stringOf(fc.constantFrom(...'abcABCxyz-_. '.split('')), { maxLength: 20 });

const storeArbitrary = fc
  .dictionary(textArbitrary.filter(s => s.length > 0), textArbitrary, { maxKeys: 8 })
  .map(record => CommandStore.fromRecord(record));

const sampleStore = () =>
  CommandStore.fromRecord({
    'ls -la': 'list files',
    'git status': 'repo state',
  });

describe('Search Engine', () => {
  describe('splitKeywords', () => {
    it('splits on runs of whitespace and drops empties', () => {
      expect(splitKeywords('  git \t  log\n--oneline ')).toEqual(['git', 'log', '--oneline']);
    });

    it('yields no keywords for blank patterns', () => {
      expect(splitKeywords('')).toEqual([]);
      expect(splitKeywords(' \t\n')).toEqual([]);
    });
  });

  describe('matchCommands', () => {
    it('finds a command by a word of its text', () => {
      expect(matchCommands('git', sampleStore())).toEqual(['git status']);
    });

    it('finds a command by a word of its description', () => {
      expect(matchCommands('files', sampleStore())).toEqual(['ls -la']);
    });

    it('ignores case on both sides', () => {
      expect(matchCommands('STATUS', sampleStore())).toEqual(['git status']);
      expect(matchCommands('Repo', sampleStore())).toEqual(['git status']);
    });

    it('requires every keyword, each from either field', () => {
      const store = sampleStore();

      expect(matchCommands('git repo', store)).toEqual(['git status']);
      expect(matchCommands('git files', store)).toEqual([]);
    });

    it('returns every entry a keyword hits', () => {
      expect(matchCommands('l', sampleStore())).toEqual(['ls -la']);
      expect(matchCommands('t', sampleStore()).sort()).toEqual(['git status', 'ls -la'].sort());
    });

    it('matches nothing for an empty pattern', () => {
      expect(matchCommands('', sampleStore())).toEqual([]);
      expect(matchCommands('   ', sampleStore())).toEqual([]);
    });

    it('does not modify the store', () => {
      const store = sampleStore();
      matchCommands('git', store);

      expect(store.toJSON()).toEqual(sampleStore().toJSON());
    });

    it('includes an entry iff every keyword is a substring of command or description', () => {
      fc.assert(
        fc.property(
          storeArbitrary,
          fc.array(keywordArbitrary, { minLength: 1, maxLength: 3 }),
          (store, keywords) => {
            const result = matchCommands(keywords.join(' '), store);

            for (const { command, description } of store.entries()) {
              const expected = keywords.every(k =>
                command.toLowerCase().includes(k.toLowerCase()) ||
                description.toLowerCase().includes(k.toLowerCase())
              );
              expect(result.includes(command)).toBe(expected);
            }
          }
        ),
        { numRuns: 200 }
      );
    });

    it('returns matches in store order', () => {
      fc.assert(
        fc.property(storeArbitrary, keywordArbitrary, (store, keyword) => {
          const result = matchCommands(keyword, store);
          const order = store.entries().map(entry => entry.command);

          expect(result).toEqual(order.filter(command => result.includes(command)));
        }),
        { numRuns: 100 }
      );
    });

    it('matches nothing without keywords for any store', () => {
      fc.assert(
        fc.property(storeArbitrary, fc.stringOf(fc.constantFrom(' ', '\t', '\n')), (store, blank) => {
          expect(matchCommands(blank, store)).toEqual([]);
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('entryMatches', () => {
    it('is true for an empty keyword list', () => {
      expect(entryMatches('anything', '', [])).toBe(true);
    });
  });
});
