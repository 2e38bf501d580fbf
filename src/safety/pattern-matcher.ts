import type { PatternRule, SafetyRules, TermRule } from '../rules/interface.js';
import type { MatchKind, PatternMatchResult } from '../types/safety.js';

/**
 * Both projections the matcher needs: folded (no substitution) for literal
 * and homophone terms, normalized for injection and leetspeak rules
 */
export interface DetectionText {
  folded: string;
  normalized: string;
}

interface Category {
  kind: MatchKind;
  evaluate: (text: DetectionText) => string[];
}

const TOKEN_SEPARATORS = /[\s\-'’]+/g;

/**
 * Collapse hyphens and apostrophes into spaces so terms match on token
 * boundaries ("Cassidy" never matches "ass", "mean-bully" matches "bully")
 */
export function toTokenView(text: string): string {
  return text.replace(TOKEN_SEPARATORS, ' ').trim();
}

/**
 * Join runs of three or more single-character tokens ("k i l l" -> "kill").
 * Returns null when there is no such run.
 */
export function joinSpacedLetters(view: string): string | null {
  const tokens = view.split(' ');
  const out: string[] = [];
  let run: string[] = [];
  let joined = false;

  const flush = () => {
    if (run.length >= 3) {
      out.push(run.join(''));
      joined = true;
    } else {
      out.push(...run);
    }
    run = [];
  };

  for (const token of tokens) {
    if ([...token].length === 1) {
      run.push(token);
    } else {
      flush();
      out.push(token);
    }
  }
  flush();

  return joined ? out.join(' ') : null;
}

function containsTerm(view: string, term: string): boolean {
  return ` ${view} `.includes(` ${term} `);
}

/**
 * Ids of every term rule with at least one term present in `text`
 */
export function matchTerms(text: string, rules: readonly TermRule[]): string[] {
  const view = toTokenView(text);
  const joined = joinSpacedLetters(view);
  const hits: string[] = [];

  for (const rule of rules) {
    const hit = rule.terms.some(
      (term) => containsTerm(view, term) || (joined !== null && containsTerm(joined, term))
    );
    if (hit) {
      hits.push(rule.id);
    }
  }

  return hits;
}

/**
 * Phrases are tried on the token view ("ignore-all-rules" reads as
 * "ignore all rules") and on the text with every separator removed
 * ("ignoreallrules")
 */
export function matchInjection(normalized: string, rules: readonly PatternRule[]): string[] {
  const view = toTokenView(normalized);
  const compact = view.replace(/ /g, '');
  const hits: string[] = [];
  for (const rule of rules) {
    if (
      rule.patterns.some((pattern) => pattern.test(view)) ||
      rule.compactPatterns.some((pattern) => pattern.test(compact))
    ) {
      hits.push(rule.id);
    }
  }
  return hits;
}

function buildCategories(rules: SafetyRules): Category[] {
  return [
    { kind: 'PROMPT_INJECTION', evaluate: (t) => matchInjection(t.normalized, rules.injection) },
    { kind: 'INAPPROPRIATE_CONTENT', evaluate: (t) => matchTerms(t.folded, rules.literal) },
    { kind: 'INAPPROPRIATE_CONTENT', evaluate: (t) => matchTerms(t.normalized, rules.leetspeak) },
    { kind: 'INAPPROPRIATE_CONTENT', evaluate: (t) => matchTerms(t.folded, rules.homophone) },
  ];
}

/**
 * Evaluate categories in severity order. Every rule in a category runs;
 * the first category with a hit ends evaluation.
 */
export function matchPatterns(text: DetectionText, rules: SafetyRules): PatternMatchResult {
  for (const category of buildCategories(rules)) {
    const ruleIds = category.evaluate(text);
    if (ruleIds.length > 0) {
      return { matched: true, kind: category.kind, rule_ids: ruleIds };
    }
  }

  return { matched: false, kind: null, rule_ids: [] };
}
