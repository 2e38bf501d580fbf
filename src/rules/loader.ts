import * as fs from 'fs/promises';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import { foldText, normalize } from '../safety/normalizer.js';
import { toTokenView } from '../safety/pattern-matcher.js';
import { combinationKey } from '../safety/combination-validator.js';
import {
  ConfigurationError,
  type ForbiddenCombination,
  type KeywordCategory,
  type PatternRule,
  type SafetyRules,
  type TermRule,
} from './interface.js';

const logger = createLogger('rules-loader');

export const MIN_CATEGORY_WORDS = 20;
const MAX_REPEAT_BOUND = 10;
const APOSTROPHES = /['’]/g;
const PHRASE_SEPARATORS = /[ '’]/g;

const RuleIdSchema = z.string().regex(/^[A-Z][A-Z0-9-]*$/, 'Rule ids must be upper-case, e.g. LIT-INSULT');

const TermRuleSchema = z.object({
  id: RuleIdSchema,
  terms: z.array(z.string().min(1)).min(1),
});

const PatternRuleSchema = z.object({
  id: RuleIdSchema,
  patterns: z.array(z.string().min(1)).min(1),
});

const RulesFileSchema = z.object({
  version: z.literal(1),
  topics: z.array(z.string().min(1)).min(1),
  pronouns: z.array(z.string().min(1)).min(1),
  injection_rules: z.array(PatternRuleSchema).min(1),
  literal_rules: z.array(TermRuleSchema).min(1),
  leetspeak_rules: z.array(TermRuleSchema).default([]),
  homophone_rules: z.array(TermRuleSchema).default([]),
  story_rules: z.array(TermRuleSchema).default([]),
  categories: z.record(z.string().min(1), z.array(z.string().min(1)).min(MIN_CATEGORY_WORDS)),
  forbidden_combinations: z
    .array(
      z.object({
        id: RuleIdSchema,
        words: z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)]),
      })
    )
    .default([]),
});

export type RulesFile = z.infer<typeof RulesFileSchema>;

/**
 * Reject anything that could backtrack super-linearly: unbounded
 * quantifiers and large repeat bounds
 */
export function assertLinearPattern(source: string, ruleId: string): void {
  const unescaped = source.replace(/\\./g, '');

  if (/[*+]/.test(unescaped) || /\{\d*,\}/.test(unescaped)) {
    throw new ConfigurationError(`Rule ${ruleId}: unbounded quantifier in pattern "${source}"`);
  }

  for (const match of unescaped.matchAll(/\{(\d+)(?:,(\d+))?\}/g)) {
    const upper = Number(match[2] ?? match[1]);
    if (upper > MAX_REPEAT_BOUND) {
      throw new ConfigurationError(`Rule ${ruleId}: repeat bound ${upper} exceeds ${MAX_REPEAT_BOUND}`);
    }
  }
}

function compilePattern(source: string, ruleId: string): RegExp {
  try {
    return new RegExp(source, 'u');
  } catch (error) {
    throw new ConfigurationError(
      `Rule ${ruleId}: invalid pattern "${source}": ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

function compilePatternRule(rule: RulesFile['injection_rules'][number]): PatternRule {
  const patterns: RegExp[] = [];
  const compactPatterns: RegExp[] = [];
  for (const source of rule.patterns) {
    assertLinearPattern(source, rule.id);
    patterns.push(compilePattern(source.replace(APOSTROPHES, ' '), rule.id));
    compactPatterns.push(compilePattern(source.replace(PHRASE_SEPARATORS, ''), rule.id));
  }
  return Object.freeze({
    id: rule.id,
    patterns: Object.freeze(patterns),
    compactPatterns: Object.freeze(compactPatterns),
  });
}

function canonicalizeTermRule(
  rule: RulesFile['literal_rules'][number],
  project: (term: string) => string
): TermRule {
  const terms = rule.terms.map((term) => {
    const canonical = toTokenView(project(term));
    if (!canonical) {
      throw new ConfigurationError(`Rule ${rule.id}: term "${term}" is empty after normalization`);
    }
    return canonical;
  });
  return Object.freeze({ id: rule.id, terms: Object.freeze([...new Set(terms)]) });
}

function canonicalWord(word: string): string {
  return word.trim().toLowerCase();
}

/**
 * Turn a parsed rules document into frozen, ready-to-match tables
 */
export function buildSafetyRules(data: unknown): SafetyRules {
  const parsed = RulesFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid safety rules: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  const file = parsed.data;

  const seenIds = new Set<string>();
  const ruleIds = [
    ...file.injection_rules,
    ...file.literal_rules,
    ...file.leetspeak_rules,
    ...file.homophone_rules,
    ...file.story_rules,
    ...file.forbidden_combinations,
  ].map((rule) => rule.id);
  for (const id of ruleIds) {
    if (seenIds.has(id)) {
      throw new ConfigurationError(`Duplicate rule id: ${id}`);
    }
    seenIds.add(id);
  }

  const categories = new Map<string, KeywordCategory>();
  for (const [name, words] of Object.entries(file.categories)) {
    const key = canonicalWord(name);
    if (categories.has(key)) {
      throw new ConfigurationError(`Duplicate category: ${key}`);
    }
    const approved = new Set(words.map(canonicalWord));
    if (approved.size < MIN_CATEGORY_WORDS) {
      throw new ConfigurationError(`Category ${key} needs at least ${MIN_CATEGORY_WORDS} distinct words`);
    }
    categories.set(key, Object.freeze({ name: key, approved_words: approved }));
  }

  const allApproved = new Set<string>();
  for (const category of categories.values()) {
    for (const word of category.approved_words) {
      allApproved.add(word);
    }
  }

  const forbiddenCombinations = new Map<string, ForbiddenCombination>();
  for (const entry of file.forbidden_combinations) {
    const words = entry.words.map(canonicalWord);
    if (new Set(words).size !== words.length) {
      throw new ConfigurationError(`Combination ${entry.id} repeats a word`);
    }
    const unknown = words.filter((word) => !allApproved.has(word));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Combination ${entry.id} uses words outside every category: ${unknown.join(', ')}`);
    }
    const key = combinationKey(words);
    if (forbiddenCombinations.has(key)) {
      throw new ConfigurationError(`Combination ${entry.id} duplicates an earlier entry`);
    }
    const [a, b, c] = words;
    forbiddenCombinations.set(key, Object.freeze({ id: entry.id, words: Object.freeze([a, b, c] as const) }));
  }

  return Object.freeze({
    injection: Object.freeze(file.injection_rules.map(compilePatternRule)),
    literal: Object.freeze(file.literal_rules.map((rule) => canonicalizeTermRule(rule, foldText))),
    leetspeak: Object.freeze(file.leetspeak_rules.map((rule) => canonicalizeTermRule(rule, normalize))),
    homophone: Object.freeze(file.homophone_rules.map((rule) => canonicalizeTermRule(rule, foldText))),
    story: Object.freeze(file.story_rules.map((rule) => canonicalizeTermRule(rule, foldText))),
    categories,
    forbiddenCombinations,
    topics: new Set(file.topics.map(canonicalWord)),
    pronouns: new Set(file.pronouns.map(canonicalWord)),
  });
}

export function parseSafetyRules(source: string, origin = '<inline>'): SafetyRules {
  let data: unknown;
  try {
    data = yaml.load(source);
  } catch (error) {
    throw new ConfigurationError(
      `Could not parse safety rules from ${origin}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
  return buildSafetyRules(data);
}

/**
 * Read and validate the rules file. Any problem is fatal.
 */
export async function loadSafetyRules(filePath: string): Promise<SafetyRules> {
  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Safety rules file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Could not read safety rules from ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  const rules = parseSafetyRules(source, filePath);

  logger.info(
    {
      filePath,
      injectionRules: rules.injection.length,
      literalRules: rules.literal.length,
      leetspeakRules: rules.leetspeak.length,
      homophoneRules: rules.homophone.length,
      storyRules: rules.story.length,
      categories: rules.categories.size,
      forbiddenCombinations: rules.forbiddenCombinations.size,
    },
    'Safety rules loaded'
  );

  return rules;
}
