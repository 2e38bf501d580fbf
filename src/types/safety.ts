/**
 * Per-request failure kinds. Every one of these is returned as data.
 */
export type ErrorKind =
  | 'PROMPT_INJECTION'
  | 'INAPPROPRIATE_CONTENT'
  | 'CHARACTER_RULE_VIOLATION'
  | 'DUPLICATE_SELECTION'
  | 'UNAPPROVED_SELECTION'
  | 'INAPPROPRIATE_COMBINATION'
  | 'RATE_LIMITED';

export type BypassFlag =
  | 'EXCESSIVE_REPETITION'
  | 'MIXED_SCRIPT'
  | 'INVISIBLE_CHARACTERS'
  | 'NUMERIC_TOKEN';

export type CharacterRuleFlag = 'NAME_TOO_LONG' | 'EMPTY_NAME' | 'INVALID_CHARACTERS';

export interface ValidationResult {
  is_valid: boolean;
  error_kind: ErrorKind | null;
  /** Gentle, non-technical message safe to show a child */
  child_message: string | null;
  /** Only set when is_valid is true */
  sanitized_text: string | null;
  /** Ordered, de-duplicated rule ids and flags */
  security_flags: string[];
}

export type SecurityEventKind = ErrorKind | 'COOLDOWN_STARTED';

/**
 * Audit record. Metadata only: never the raw or normalized input.
 */
export interface SecurityEvent {
  timestamp: string;
  session_id: string;
  event_kind: SecurityEventKind;
  matched_rule_ids: string[];
}

export type MatchKind = 'PROMPT_INJECTION' | 'INAPPROPRIATE_CONTENT';

export interface PatternMatchResult {
  matched: boolean;
  kind: MatchKind | null;
  rule_ids: string[];
}

export type CombinationOutcome =
  | { ok: true; words: [string, string, string] }
  | {
      ok: false;
      kind: 'DUPLICATE_SELECTION' | 'UNAPPROVED_SELECTION' | 'INAPPROPRIATE_COMBINATION';
      flags: string[];
    };

export interface StoryContentReview {
  safe: boolean;
  rule_ids: string[];
  truncated: boolean;
}

export interface StoryCharacterInput {
  name: string;
  pronouns: string;
}

export interface StoryRequestInput {
  characters: StoryCharacterInput[];
  topic: string;
  magic_words: {
    words: string[];
    categories: string[];
  };
}

export interface StoryRequestValidation {
  is_valid: boolean;
  issues: string[];
  characters: ValidationResult[];
  selection: ValidationResult | null;
}
