import { createLogger } from '../logger.js';
import type { SafetyLimits, SafetyRules } from '../rules/interface.js';
import type {
  ErrorKind,
  SecurityEvent,
  SecurityEventKind,
  StoryContentReview,
  StoryRequestInput,
  StoryRequestValidation,
  ValidationResult,
} from '../types/safety.js';
import type { AuditSink } from './audit.js';
import { validateCombination } from './combination-validator.js';
import { childMessageFor } from './messages.js';
import {
  buildNamePipeline,
  checkRawLength,
  prepareNameInput,
  runNamePipeline,
  type NameStage,
  type StageRejection,
} from './name-pipeline.js';
import type { RateLimiter } from './rate-limiter.js';
import { reviewStoryContent } from './story-review.js';
import type { UsageTracker } from './usage.js';

const logger = createLogger('safety-controller');

/**
 * Failures that count towards a session's cooldown. Duplicate and
 * unapproved selections are treated as UI glitches.
 */
const COUNTED_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'PROMPT_INJECTION',
  'INAPPROPRIATE_CONTENT',
  'CHARACTER_RULE_VIOLATION',
  'INAPPROPRIATE_COMBINATION',
]);

export interface SafetyControllerDeps {
  rules: SafetyRules;
  limits: SafetyLimits;
  rateLimiter: RateLimiter;
  auditSink: AuditSink;
  /** Receives events the primary sink failed on */
  fallbackSink?: AuditSink;
  usageTracker?: UsageTracker;
  clock?: () => Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function validResult(sanitized: string): ValidationResult {
  return {
    is_valid: true,
    error_kind: null,
    child_message: null,
    sanitized_text: sanitized,
    security_flags: [],
  };
}

function invalidResult(kind: ErrorKind, flags: readonly string[]): ValidationResult {
  return {
    is_valid: false,
    error_kind: kind,
    child_message: childMessageFor(kind),
    sanitized_text: null,
    security_flags: [...new Set(flags)],
  };
}

/**
 * Orchestrates the detectors into name and selection validation.
 *
 * Nothing here throws: every outcome, including an internal failure
 * (which fails closed), comes back as a ValidationResult.
 */
export class SafetyController {
  private readonly rules: SafetyRules;
  private readonly limits: SafetyLimits;
  private readonly rateLimiter: RateLimiter;
  private readonly auditSink: AuditSink;
  private readonly fallbackSink: AuditSink | undefined;
  private readonly usageTracker: UsageTracker | undefined;
  private readonly clock: () => Date;
  private readonly namePipeline: readonly NameStage[];

  constructor(deps: SafetyControllerDeps) {
    this.rules = deps.rules;
    this.limits = deps.limits;
    this.rateLimiter = deps.rateLimiter;
    this.auditSink = deps.auditSink;
    this.fallbackSink = deps.fallbackSink;
    this.usageTracker = deps.usageTracker;
    this.clock = deps.clock ?? (() => new Date());
    this.namePipeline = buildNamePipeline(this.rules, this.limits);
  }

  validateName(raw: string, sessionId: string): ValidationResult {
    try {
      if (this.isCoolingDown(sessionId)) {
        return invalidResult('RATE_LIMITED', ['COOLDOWN_ACTIVE']);
      }

      const tooLong = checkRawLength(raw, this.limits);
      if (tooLong) {
        return this.reject(sessionId, tooLong);
      }

      const input = prepareNameInput(raw);
      const rejection = runNamePipeline(this.namePipeline, input);
      if (rejection) {
        return this.reject(sessionId, rejection);
      }

      return validResult(input.sanitized);
    } catch (error) {
      return this.failClosed('name', sessionId, error);
    }
  }

  validateSelection(
    words: readonly string[],
    claimedCategories: readonly string[],
    sessionId: string
  ): ValidationResult {
    try {
      if (this.isCoolingDown(sessionId)) {
        return invalidResult('RATE_LIMITED', ['COOLDOWN_ACTIVE']);
      }

      const outcome = validateCombination(words, claimedCategories, this.rules);

      if (!outcome.ok) {
        if (outcome.kind === 'INAPPROPRIATE_COMBINATION') {
          return this.reject(sessionId, { kind: outcome.kind, flags: outcome.flags });
        }
        logger.debug({ sessionId, kind: outcome.kind, flags: outcome.flags }, 'Selection rejected');
        return invalidResult(outcome.kind, outcome.flags);
      }

      this.recordUsage(outcome.words, claimedCategories);
      return validResult(outcome.words.join(' '));
    } catch (error) {
      return this.failClosed('selection', sessionId, error);
    }
  }

  /**
   * Whole story request: characters, pronouns, topic and magic words
   */
  validateStoryRequest(request: StoryRequestInput, sessionId: string): StoryRequestValidation {
    const issues: string[] = [];

    if (request.characters.length === 0) {
      issues.push('NO_CHARACTERS');
    } else if (request.characters.length > this.limits.maxCharacters) {
      issues.push('TOO_MANY_CHARACTERS');
    }

    if (!this.rules.topics.has(request.topic.trim().toLowerCase())) {
      issues.push('INVALID_TOPIC');
    }

    const characters = request.characters.slice(0, this.limits.maxCharacters).map((character, index) => {
      if (!this.rules.pronouns.has(character.pronouns.trim().toLowerCase())) {
        issues.push(`INVALID_PRONOUNS_${index + 1}`);
      }
      const result = this.validateName(character.name, sessionId);
      if (!result.is_valid) {
        issues.push(`INVALID_NAME_${index + 1}`);
      }
      return result;
    });

    const selection = this.validateSelection(request.magic_words.words, request.magic_words.categories, sessionId);
    if (!selection.is_valid) {
      issues.push('INVALID_MAGIC_WORDS');
    }

    return { is_valid: issues.length === 0, issues, characters, selection };
  }

  reviewStoryContent(content: string): StoryContentReview {
    const review = reviewStoryContent(content, this.rules, this.limits.maxStoryContentLength);
    if (!review.safe) {
      logger.warn({ ruleIds: review.rule_ids, contentLength: content.length }, 'Story content flagged');
    }
    return review;
  }

  private isCoolingDown(sessionId: string): boolean {
    const check = this.rateLimiter.check(sessionId);
    if (check.limited) {
      logger.debug({ sessionId, retryAt: check.retry_at }, 'Request short-circuited by cooldown');
    }
    return check.limited;
  }

  private reject(sessionId: string, rejection: StageRejection): ValidationResult {
    if (COUNTED_KINDS.has(rejection.kind)) {
      const record = this.rateLimiter.recordViolation(sessionId);
      this.emit(sessionId, rejection.kind, rejection.flags);
      if (record.cooldown_until !== null) {
        this.emit(sessionId, 'COOLDOWN_STARTED', [`VIOLATIONS_${record.violation_count}`]);
      }
    }
    return invalidResult(rejection.kind, rejection.flags);
  }

  private failClosed(operation: string, sessionId: string, error: unknown): ValidationResult {
    logger.error({ operation, sessionId, error: errorMessage(error) }, 'Validation failed unexpectedly');
    return invalidResult('CHARACTER_RULE_VIOLATION', ['INTERNAL_ERROR']);
  }

  private recordUsage(words: readonly string[], claimedCategories: readonly string[]): void {
    const tracker = this.usageTracker;
    if (!tracker) {
      return;
    }
    words.forEach((word, index) => {
      try {
        tracker.increment(claimedCategories[index].trim().toLowerCase(), word);
      } catch (error) {
        logger.debug({ error: errorMessage(error) }, 'Usage count not recorded');
      }
    });
  }

  /**
   * Fire-and-forget. A failing sink never reaches the caller.
   */
  private emit(sessionId: string, kind: SecurityEventKind, ruleIds: readonly string[]): void {
    const event: SecurityEvent = {
      timestamp: this.clock().toISOString(),
      session_id: sessionId,
      event_kind: kind,
      matched_rule_ids: [...new Set(ruleIds)],
    };
    this.deliver(this.auditSink, event, (error) => this.emitFallback(event, error));
  }

  private emitFallback(event: SecurityEvent, cause: unknown): void {
    logger.warn({ eventKind: event.event_kind, error: errorMessage(cause) }, 'Audit sink failed');
    if (!this.fallbackSink) {
      return;
    }
    this.deliver(this.fallbackSink, event, (error) => {
      logger.debug({ eventKind: event.event_kind, error: errorMessage(error) }, 'Fallback audit sink failed, event dropped');
    });
  }

  private deliver(sink: AuditSink, event: SecurityEvent, onError: (error: unknown) => void): void {
    try {
      const pending = sink.emit(event);
      if (pending instanceof Promise) {
        void pending.catch(onError);
      }
    } catch (error) {
      onError(error);
    }
  }
}
