/**
 * A rule whose terms match on token boundaries (literal, leetspeak, homophone, story)
 */
export interface TermRule {
  id: string;
  terms: readonly string[];
}

/**
 * A rule made of compiled, linear-time regular expressions
 */
export interface PatternRule {
  id: string;
  /** Run against the token view, where hyphens and apostrophes read as spaces */
  patterns: readonly RegExp[];
  /** Same phrases with spaces and apostrophes dropped, for run-together input */
  compactPatterns: readonly RegExp[];
}

export interface KeywordCategory {
  name: string;
  approved_words: ReadonlySet<string>;
}

export interface ForbiddenCombination {
  id: string;
  words: readonly [string, string, string];
}

/**
 * Immutable rule tables, loaded once at startup and shared by reference
 */
export interface SafetyRules {
  injection: readonly PatternRule[];
  literal: readonly TermRule[];
  leetspeak: readonly TermRule[];
  homophone: readonly TermRule[];
  story: readonly TermRule[];
  categories: ReadonlyMap<string, KeywordCategory>;
  /** Keyed by the sorted words joined with '|' */
  forbiddenCombinations: ReadonlyMap<string, ForbiddenCombination>;
  topics: ReadonlySet<string>;
  pronouns: ReadonlySet<string>;
}

export interface SafetyLimits {
  maxRawNameLength: number;
  maxNameLength: number;
  maxStoryContentLength: number;
  maxCharacters: number;
}

/**
 * Fatal startup error: malformed environment or rule configuration
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
