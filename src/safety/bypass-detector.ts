import type { BypassFlag } from '../types/safety.js';
import { cleanText } from './normalizer.js';

const REPEATED_CODE_POINT = /(\S)\1{4}/u;

/**
 * Zero-width, bidi controls, joiners, fillers and tag characters.
 * Checked on the raw input: the normalizer removes most of these.
 */
const INVISIBLE_CODE_POINT =
  /[\u00AD\u034F\u061C\u115F\u1160\u17B4\u17B5\u180E\u200B-\u200F\u202A-\u202E\u2060-\u2064\u2066-\u206F\u3164\uFEFF\uFFA0\u{E0000}-\u{E007F}]/u;

const DIGITS_ONLY = /^\p{Nd}+$/u;
const LETTER = /\p{L}/u;
const TOKEN_SEPARATORS = /[\s\-'’]+/;

/**
 * Each script with the writing systems it is used in. Han is shared by
 * Chinese, Japanese (with kana) and Korean (with Hangul).
 */
const SCRIPTS: ReadonlyArray<[RegExp, readonly string[]]> = [
  [/\p{Script=Latin}/u, ['Latin']],
  [/\p{Script=Cyrillic}/u, ['Cyrillic']],
  [/\p{Script=Greek}/u, ['Greek']],
  [/\p{Script=Armenian}/u, ['Armenian']],
  [/\p{Script=Hebrew}/u, ['Hebrew']],
  [/\p{Script=Arabic}/u, ['Arabic']],
  [/\p{Script=Devanagari}/u, ['Devanagari']],
  [/\p{Script=Thai}/u, ['Thai']],
  [/\p{Script=Georgian}/u, ['Georgian']],
  [/\p{Script=Hangul}/u, ['Korean']],
  [/\p{Script=Hiragana}/u, ['Japanese']],
  [/\p{Script=Katakana}/u, ['Japanese']],
  [/\p{Script=Han}/u, ['Chinese', 'Japanese', 'Korean']],
];

function writingSystemsOf(ch: string): readonly string[] | null {
  for (const [pattern, systems] of SCRIPTS) {
    if (pattern.test(ch)) {
      return systems;
    }
  }
  return null;
}

export function hasExcessiveRepetition(text: string): boolean {
  return REPEATED_CODE_POINT.test(text);
}

export function hasInvisibleCharacters(raw: string): boolean {
  return INVISIBLE_CODE_POINT.test(raw);
}

/**
 * True when a single token carries letters from scripts that are never
 * written together ("Аlice" with a Cyrillic А). Kanji with kana, or Hanja
 * with Hangul, is one writing system.
 */
export function hasMixedScriptToken(raw: string): boolean {
  for (const token of cleanText(raw).split(TOKEN_SEPARATORS)) {
    // Writing systems every letter seen so far belongs to
    let shared: readonly string[] | null = null;
    for (const ch of token) {
      if (!LETTER.test(ch)) {
        continue;
      }
      const systems = writingSystemsOf(ch);
      if (!systems) {
        continue;
      }
      shared = shared === null ? systems : shared.filter((system) => systems.includes(system));
      if (shared.length === 0) {
        return true;
      }
    }
  }
  return false;
}

export function hasNumericToken(raw: string): boolean {
  return raw
    .trim()
    .split(/\s+/)
    .some((token) => DIGITS_ONLY.test(token));
}

/**
 * Obfuscation signals independent of any literal match.
 * Flags come back in a fixed order.
 */
export function detectBypass(raw: string, normalized: string): BypassFlag[] {
  const flags: BypassFlag[] = [];

  if (hasExcessiveRepetition(raw) || hasExcessiveRepetition(normalized)) {
    flags.push('EXCESSIVE_REPETITION');
  }
  if (hasMixedScriptToken(raw)) {
    flags.push('MIXED_SCRIPT');
  }
  if (hasInvisibleCharacters(raw)) {
    flags.push('INVISIBLE_CHARACTERS');
  }
  if (hasNumericToken(raw)) {
    flags.push('NUMERIC_TOKEN');
  }

  return flags;
}
