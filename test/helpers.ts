import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { SafetyLimits } from '../src/rules/interface.js';
import { parseSafetyRules } from '../src/rules/loader.js';
import { MemoryAuditSink, type AuditSink } from '../src/safety/audit.js';
import { SafetyController } from '../src/safety/controller.js';
import { foldText, normalize } from '../src/safety/normalizer.js';
import type { DetectionText } from '../src/safety/pattern-matcher.js';
import { RateLimiter } from '../src/safety/rate-limiter.js';
import { InMemoryUsageTracker, type UsageTracker } from '../src/safety/usage.js';

export const RULES_PATH = fileURLToPath(new URL('../data/safety-rules.yaml', import.meta.url));

export const rules = parseSafetyRules(readFileSync(RULES_PATH, 'utf-8'), RULES_PATH);

export const limits: SafetyLimits = {
  maxRawNameLength: 200,
  maxNameLength: 50,
  maxStoryContentLength: 20000,
  maxCharacters: 5,
};

export const START_TIME = Date.parse('2026-03-01T10:00:00.000Z');

export const ZWSP = String.fromCodePoint(0x200b);
export const RLO = String.fromCodePoint(0x202e);
export const CYRILLIC_CAPITAL_A = String.fromCodePoint(0x410);

export function detectionText(raw: string): DetectionText {
  return { folded: foldText(raw), normalized: normalize(raw) };
}

export interface HarnessOptions {
  auditSink?: AuditSink;
  usageTracker?: UsageTracker;
}

/**
 * Controller wired to a fake clock and in-memory sinks
 */
export function createHarness(options: HarnessOptions = {}) {
  const clock = { now: START_TIME };
  const sink = new MemoryAuditSink(100);
  const fallback = new MemoryAuditSink(100);
  const usage = new InMemoryUsageTracker();
  const limiter = new RateLimiter({
    threshold: 3,
    windowMs: 300000,
    cooldownMs: 120000,
    idleTtlMs: 1800000,
    now: () => clock.now,
  });
  const controller = new SafetyController({
    rules,
    limits,
    rateLimiter: limiter,
    auditSink: options.auditSink ?? sink,
    fallbackSink: fallback,
    usageTracker: options.usageTracker ?? usage,
    clock: () => new Date(clock.now),
  });

  return { controller, limiter, sink, fallback, usage, clock };
}
