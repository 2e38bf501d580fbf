import type { SafetyRules } from '../rules/interface.js';
import type { CombinationOutcome } from '../types/safety.js';

export const SELECTION_SIZE = 3;

/**
 * Order-independent lookup key for a word tuple
 */
export function combinationKey(words: readonly string[]): string {
  return [...words].sort().join('|');
}

function canonicalWord(word: string): string {
  return word.trim().toLowerCase();
}

/**
 * Authoritative re-check of a magic-word selection. The UI is not trusted
 * to have enforced any of this.
 *
 * Membership is checked against each word's claimed category only; the
 * slot a word sits in does not matter.
 */
export function validateCombination(
  words: readonly string[],
  claimedCategories: readonly string[],
  rules: SafetyRules
): CombinationOutcome {
  if (words.length !== SELECTION_SIZE || claimedCategories.length !== SELECTION_SIZE) {
    return { ok: false, kind: 'UNAPPROVED_SELECTION', flags: ['SELECTION_SIZE'] };
  }

  const [a, b, c] = words.map(canonicalWord);
  const selection: [string, string, string] = [a, b, c];

  if (a === b || a === c || b === c) {
    return { ok: false, kind: 'DUPLICATE_SELECTION', flags: ['DUPLICATE_WORD'] };
  }

  const unapproved: string[] = [];
  selection.forEach((word, index) => {
    const category = rules.categories.get(canonicalWord(claimedCategories[index]));
    if (!category) {
      unapproved.push(`UNKNOWN_CATEGORY_${index + 1}`);
    } else if (!category.approved_words.has(word)) {
      unapproved.push(`UNAPPROVED_WORD_${index + 1}`);
    }
  });
  if (unapproved.length > 0) {
    return { ok: false, kind: 'UNAPPROVED_SELECTION', flags: unapproved };
  }

  const forbidden = rules.forbiddenCombinations.get(combinationKey(selection));
  if (forbidden) {
    return { ok: false, kind: 'INAPPROPRIATE_COMBINATION', flags: [forbidden.id] };
  }

  return { ok: true, words: selection };
}
