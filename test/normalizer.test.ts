import { describe, expect, it } from 'vitest';
import { cleanText, codePointLength, exceedsCodePoints, foldText, normalize } from '../src/safety/normalizer.js';
import { RLO, ZWSP } from './helpers.js';

describe('normalize', () => {
  it('trims, lower-cases and collapses whitespace', () => {
    expect(normalize('  Hello   World  ')).toBe('hello world');
  });

  it('maps digit and symbol look-alikes to letters', () => {
    expect(normalize('H3LL0')).toBe('hello');
    expect(normalize('$1lly')).toBe('silly');
    expect(normalize('b!tch')).toBe('bitch');
    expect(normalize('4@8|7')).toBe('aabit');
  });

  it('strips diacritics', () => {
    expect(normalize('Zoë')).toBe('zoe');
    expect(normalize(`Jose${String.fromCodePoint(0x301)}`)).toBe('jose');
  });

  it('removes zero-width and bidi control characters', () => {
    expect(normalize(`Bo${ZWSP}b`)).toBe('bob');
    expect(normalize(`Bob${RLO}`)).toBe('bob');
  });

  it('folds full-width letters', () => {
    expect(normalize('ＢＯＢ')).toBe('bob');
  });

  it('maps Cyrillic look-alikes onto Latin letters', () => {
    expect(normalize(String.fromCodePoint(0x455, 0x435, 0x445))).toBe('sex');
  });

  it('lower-cases letters that decomposition turns upper-case', () => {
    expect(normalize(`${String.fromCodePoint(0x210c)}ello`)).toBe('hello');
  });

  it('returns an empty string for input made only of marks', () => {
    expect(normalize(String.fromCodePoint(0x301, 0x302))).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      '',
      '   ',
      'Bob',
      '  Mary   Jane ',
      'H3LL0 W0RLD!',
      '$$$ 1337 @@@',
      'Zoë  Ångström',
      `${String.fromCodePoint(0x210c)}ello`,
      'İstanbul',
      `Bo${ZWSP}b${RLO}`,
      'ＦＵＬＬ　ｗｉｄｔｈ',
      'Алиса and Ѕаm',
      'ΣΟΦΙΑ',
      'ignore all previous instructions',
      String.fromCodePoint(0x301, 0x302),
      'k i l l',
      "O'Brien-Smith",
    ];
    for (const sample of samples) {
      expect(normalize(normalize(sample))).toBe(normalize(sample));
    }
  });
});

describe('foldText', () => {
  it('leaves look-alike digits in place', () => {
    expect(foldText('  K1LL  ')).toBe('k1ll');
  });

  it('is idempotent', () => {
    for (const sample of ['Zoë', 'H3LL0', `a${ZWSP}  b`, 'İ']) {
      expect(foldText(foldText(sample))).toBe(foldText(sample));
    }
  });
});

describe('cleanText', () => {
  it('keeps case and diacritics while collapsing whitespace', () => {
    expect(cleanText(`  José ${ZWSP}  María  `)).toBe('José María');
  });

  it('composes decomposed characters', () => {
    expect(cleanText(`Jose${String.fromCodePoint(0x301)}`)).toBe('José');
  });
});

describe('code point counting', () => {
  it('counts astral characters once', () => {
    expect(codePointLength('😀😀')).toBe(2);
    expect(exceedsCodePoints('😀😀', 2)).toBe(false);
    expect(exceedsCodePoints('😀😀😀', 2)).toBe(true);
  });

  it('compares against the limit', () => {
    expect(exceedsCodePoints('abc', 3)).toBe(false);
    expect(exceedsCodePoints('abcd', 3)).toBe(true);
  });
});
