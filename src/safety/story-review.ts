import type { SafetyRules } from '../rules/interface.js';
import type { StoryContentReview } from '../types/safety.js';
import { foldText, normalize } from './normalizer.js';
import { matchTerms } from './pattern-matcher.js';

const PUNCTUATION = /[^\p{L}\p{N}\s'’-]/gu;

function stripPunctuation(text: string): string {
  return text.replace(PUNCTUATION, ' ');
}

/**
 * Check generated story text before it reaches a child. Unlike name
 * validation this collects every rule that fires: the caller decides
 * whether to regenerate.
 */
export function reviewStoryContent(content: string, rules: SafetyRules, maxLength: number): StoryContentReview {
  const truncated = content.length > maxLength;
  const text = truncated ? content.slice(0, maxLength) : content;

  // Substitution runs first so "k!ll" keeps its look-alike before punctuation goes
  const folded = stripPunctuation(foldText(text));
  const normalized = stripPunctuation(normalize(text));

  const ruleIds = new Set<string>([
    ...matchTerms(folded, rules.story),
    ...matchTerms(folded, rules.literal),
    ...matchTerms(normalized, rules.leetspeak),
    ...matchTerms(folded, rules.homophone),
  ]);

  return {
    safe: ruleIds.size === 0,
    rule_ids: [...ruleIds],
    truncated,
  };
}
