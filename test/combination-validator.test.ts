import { describe, expect, it } from 'vitest';
import { combinationKey, validateCombination } from '../src/safety/combination-validator.js';
import { rules } from './helpers.js';

const POOL: ReadonlyArray<[string, string]> = [
  ['tree', 'nature'],
  ['sun', 'nature'],
  ['moon', 'nature'],
  ['star', 'nature'],
  ['dragon', 'creatures'],
  ['unicorn', 'creatures'],
  ['bunny', 'creatures'],
  ['kitten', 'creatures'],
  ['happy', 'describing'],
  ['brave', 'describing'],
  ['kind', 'describing'],
  ['silly', 'describing'],
  ['castle', 'things'],
  ['rocket', 'things'],
  ['treasure', 'things'],
  ['balloon', 'things'],
];

describe('validateCombination', () => {
  it('accepts three distinct approved words', () => {
    expect(validateCombination(['tree', 'sun', 'dragon'], ['nature', 'nature', 'creatures'], rules)).toEqual({
      ok: true,
      words: ['tree', 'sun', 'dragon'],
    });
  });

  it('accepts any three distinct approved words that are not forbidden together', () => {
    for (let i = 0; i < POOL.length; i++) {
      for (let j = i + 1; j < POOL.length; j++) {
        for (let k = j + 1; k < POOL.length; k++) {
          const words = [POOL[i][0], POOL[j][0], POOL[k][0]];
          const categories = [POOL[i][1], POOL[j][1], POOL[k][1]];
          expect(validateCombination(words, categories, rules).ok).toBe(true);
        }
      }
    }
  });

  it('does not care which slot a category sits in', () => {
    expect(validateCombination(['dragon', 'tree', 'sun'], ['creatures', 'nature', 'nature'], rules).ok).toBe(true);
  });

  it('rejects a repeated word', () => {
    expect(validateCombination(['tree', 'tree', 'sun'], ['nature', 'nature', 'nature'], rules)).toEqual({
      ok: false,
      kind: 'DUPLICATE_SELECTION',
      flags: ['DUPLICATE_WORD'],
    });
  });

  it('rejects repeats regardless of case, spacing or approval', () => {
    expect(validateCombination(['Tree', ' tree', 'sun'], ['nature', 'nature', 'nature'], rules).ok).toBe(false);
    const outcome = validateCombination(['zzz', 'zzz', 'zzz'], ['nature', 'nature', 'nature'], rules);
    expect(outcome.ok === false && outcome.kind).toBe('DUPLICATE_SELECTION');
  });

  it('rejects a word outside its claimed category', () => {
    expect(validateCombination(['tree', 'sun', 'castle'], ['nature', 'nature', 'nature'], rules)).toEqual({
      ok: false,
      kind: 'UNAPPROVED_SELECTION',
      flags: ['UNAPPROVED_WORD_3'],
    });
  });

  it('rejects an unknown category', () => {
    expect(validateCombination(['tree', 'sun', 'moon'], ['nature', 'nature', 'planets'], rules)).toEqual({
      ok: false,
      kind: 'UNAPPROVED_SELECTION',
      flags: ['UNKNOWN_CATEGORY_3'],
    });
  });

  it('rejects a selection of the wrong size', () => {
    expect(validateCombination(['tree', 'sun'], ['nature', 'nature'], rules)).toEqual({
      ok: false,
      kind: 'UNAPPROVED_SELECTION',
      flags: ['SELECTION_SIZE'],
    });
  });

  it('rejects a forbidden combination in any order', () => {
    const expected = { ok: false, kind: 'INAPPROPRIATE_COMBINATION', flags: ['COMBO-001'] };
    expect(validateCombination(['scary', 'monster', 'dark'], ['describing', 'creatures', 'describing'], rules)).toEqual(
      expected
    );
    expect(validateCombination(['dark', 'scary', 'monster'], ['describing', 'describing', 'creatures'], rules)).toEqual(
      expected
    );
  });
});

describe('combinationKey', () => {
  it('is order independent', () => {
    expect(combinationKey(['sun', 'dragon', 'tree'])).toBe('dragon|sun|tree');
    expect(combinationKey(['tree', 'sun', 'dragon'])).toBe('dragon|sun|tree');
  });
});
