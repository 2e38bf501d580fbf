/**
 * Text canonicalization for detection.
 *
 * Three projections of the same raw input:
 * - cleanText: what the caller gets back (case and diacritics kept)
 * - foldText: case-folded, marks and invisibles stripped, whitespace collapsed
 * - normalize: foldText plus homoglyph and look-alike substitution, used for detection
 *
 * All three are pure, linear in input length, and idempotent.
 */

/** Zero-width, bidi controls, soft hyphen, BOM, tags... */
const FORMAT_CHARS = /\p{Cf}/gu;
const COMBINING_MARKS = /\p{M}/gu;
const WHITESPACE_RUN = /\s+/g;

/**
 * Cyrillic and Greek letters that render like Latin ones (lower-case only,
 * since the map is applied after case folding)
 */
const HOMOGLYPHS: Readonly<Record<string, string>> = {
  // Cyrillic
  'а': 'a', 'е': 'e', 'о': 'o', 'р': 'p', 'с': 'c',
  'у': 'y', 'х': 'x', 'і': 'i', 'ј': 'j', 'ѕ': 's',
  'к': 'k', 'м': 'm', 'т': 't', 'н': 'h', 'в': 'b',
  // Greek
  'α': 'a', 'ε': 'e', 'ι': 'i', 'ο': 'o', 'ρ': 'p',
  'κ': 'k', 'ν': 'v', 'τ': 't', 'υ': 'u',
};

/**
 * Digit and symbol look-alikes
 */
export const SUBSTITUTIONS: Readonly<Record<string, string>> = {
  '4': 'a',
  '@': 'a',
  '8': 'b',
  '3': 'e',
  '1': 'i',
  '!': 'i',
  '|': 'i',
  '0': 'o',
  '5': 's',
  '$': 's',
  '7': 't',
};

/**
 * Lightly cleaned view returned as sanitized output
 */
export function cleanText(raw: string): string {
  return raw.normalize('NFC').replace(FORMAT_CHARS, '').replace(WHITESPACE_RUN, ' ').trim();
}

/**
 * Case-folded view without look-alike substitution.
 *
 * Lower-cased twice: compatibility decomposition can surface upper-case
 * letters (e.g. U+210C becomes 'H').
 */
export function foldText(raw: string): string {
  return raw
    .toLowerCase()
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .replace(FORMAT_CHARS, '')
    .toLowerCase()
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * Detection projection. Never returned to callers.
 */
export function normalize(raw: string): string {
  let out = '';
  for (const ch of foldText(raw)) {
    out += HOMOGLYPHS[ch] ?? SUBSTITUTIONS[ch] ?? ch;
  }
  return out;
}

/**
 * True when `text` has more than `max` code points. Stops counting early.
 */
export function exceedsCodePoints(text: string, max: number): boolean {
  // Each code point takes one or two UTF-16 units
  if (text.length <= max) {
    return false;
  }
  let count = 0;
  for (const _ of text) {
    count += 1;
    if (count > max) {
      return true;
    }
  }
  return false;
}

export function codePointLength(text: string): number {
  let count = 0;
  for (const _ of text) {
    count += 1;
  }
  return count;
}
