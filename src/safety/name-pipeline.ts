import type { SafetyLimits, SafetyRules } from '../rules/interface.js';
import type { ErrorKind } from '../types/safety.js';
import { detectBypass } from './bypass-detector.js';
import { cleanText, codePointLength, exceedsCodePoints, foldText, normalize } from './normalizer.js';
import { matchPatterns } from './pattern-matcher.js';

/**
 * Every projection of a name the stages look at
 */
export interface NameInput {
  raw: string;
  sanitized: string;
  folded: string;
  normalized: string;
}

export interface StageRejection {
  kind: ErrorKind;
  flags: string[];
}

export type NameStage = (input: NameInput) => StageRejection | null;

const ALLOWED_NAME = /^[\p{L}\p{M} '’-]+$/u;
const LETTER = /\p{L}/u;

export function prepareNameInput(raw: string): NameInput {
  return {
    raw,
    sanitized: cleanText(raw),
    folded: foldText(raw),
    normalized: normalize(raw),
  };
}

/**
 * Runs before anything is normalized, so oversized input costs nothing
 */
export function checkRawLength(raw: string, limits: SafetyLimits): StageRejection | null {
  if (exceedsCodePoints(raw, limits.maxRawNameLength)) {
    return { kind: 'CHARACTER_RULE_VIOLATION', flags: ['NAME_TOO_LONG'] };
  }
  return null;
}

export function characterRuleStage(limits: SafetyLimits): NameStage {
  return ({ raw, sanitized, normalized }) => {
    if (
      codePointLength(raw.trim()) > limits.maxNameLength ||
      codePointLength(sanitized) > limits.maxNameLength
    ) {
      return { kind: 'CHARACTER_RULE_VIOLATION', flags: ['NAME_TOO_LONG'] };
    }
    if (sanitized.length === 0) {
      return { kind: 'CHARACTER_RULE_VIOLATION', flags: ['EMPTY_NAME'] };
    }
    if (!ALLOWED_NAME.test(sanitized)) {
      return { kind: 'CHARACTER_RULE_VIOLATION', flags: ['INVALID_CHARACTERS'] };
    }
    // Only marks, hyphens or apostrophes left
    if (!LETTER.test(sanitized) || normalized.length === 0) {
      return { kind: 'CHARACTER_RULE_VIOLATION', flags: ['EMPTY_NAME'] };
    }
    return null;
  };
}

export const bypassStage: NameStage = ({ raw, normalized }) => {
  const flags = detectBypass(raw, normalized);
  return flags.length > 0 ? { kind: 'CHARACTER_RULE_VIOLATION', flags } : null;
};

export function patternStage(rules: SafetyRules): NameStage {
  return ({ folded, normalized }) => {
    const result = matchPatterns({ folded, normalized }, rules);
    if (result.matched && result.kind) {
      return { kind: result.kind, flags: result.rule_ids };
    }
    return null;
  };
}

/**
 * Cheapest checks first
 */
export function buildNamePipeline(rules: SafetyRules, limits: SafetyLimits): readonly NameStage[] {
  return [characterRuleStage(limits), bypassStage, patternStage(rules)];
}

export function runNamePipeline(stages: readonly NameStage[], input: NameInput): StageRejection | null {
  for (const stage of stages) {
    const rejection = stage(input);
    if (rejection) {
      return rejection;
    }
  }
  return null;
}
