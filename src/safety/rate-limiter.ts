import { createLogger } from '../logger.js';

const logger = createLogger('rate-limiter');

export interface SessionRateState {
  session_id: string;
  violation_count: number;
  window_start: number;
  /** 0 when the session is not cooling down */
  cooldown_until: number;
  last_seen: number;
}

export interface RateLimiterOptions {
  /** Violations within the window that start a cooldown */
  threshold: number;
  windowMs: number;
  cooldownMs: number;
  /** Idle states older than this are evicted by the sweep */
  idleTtlMs: number;
  sweepIntervalMs?: number;
  now?: () => number;
}

export interface RateLimitCheck {
  limited: boolean;
  retry_at: number | null;
}

export interface ViolationRecord {
  violation_count: number;
  cooling: boolean;
  /** Set only when this violation started the cooldown */
  cooldown_until: number | null;
}

export interface RateLimiterStats {
  trackedSessions: number;
  coolingSessions: number;
}

/**
 * Per-session violation counter with an escalating cooldown.
 *
 * Normal -> Cooling once `threshold` violations land inside `windowMs`;
 * Cooling -> Normal (counter reset) once `cooldownMs` has elapsed.
 *
 * Every read-modify-write below is synchronous, so the event loop runs it
 * to completion before any other request for the same session is handled.
 */
export class RateLimiter {
  private store: Map<string, SessionRateState> = new Map();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
    this.startCleanup(options.sweepIntervalMs ?? 60000);
  }

  private startCleanup(intervalMs: number): void {
    this.cleanupInterval = setInterval(() => {
      this.sweep();
    }, intervalMs);
    this.cleanupInterval.unref();
  }

  /**
   * Whether the session is cooling down. A finished cooldown resets the
   * session back to Normal.
   */
  public check(sessionId: string): RateLimitCheck {
    const entry = this.store.get(sessionId);
    if (!entry || entry.cooldown_until === 0) {
      return { limited: false, retry_at: null };
    }

    const now = this.now();
    if (now >= entry.cooldown_until) {
      entry.violation_count = 0;
      entry.window_start = now;
      entry.cooldown_until = 0;
      entry.last_seen = now;
      logger.debug({ sessionId }, 'Cooldown finished');
      return { limited: false, retry_at: null };
    }

    return { limited: true, retry_at: entry.cooldown_until };
  }

  public recordViolation(sessionId: string): ViolationRecord {
    const now = this.now();
    let entry = this.store.get(sessionId);

    if (!entry) {
      entry = {
        session_id: sessionId,
        violation_count: 0,
        window_start: now,
        cooldown_until: 0,
        last_seen: now,
      };
      this.store.set(sessionId, entry);
    }

    entry.last_seen = now;

    if (entry.cooldown_until !== 0 && now < entry.cooldown_until) {
      return { violation_count: entry.violation_count, cooling: true, cooldown_until: null };
    }

    if (entry.cooldown_until !== 0 || now - entry.window_start >= this.options.windowMs) {
      entry.violation_count = 0;
      entry.window_start = now;
      entry.cooldown_until = 0;
    }

    entry.violation_count += 1;

    if (entry.violation_count >= this.options.threshold) {
      entry.cooldown_until = now + this.options.cooldownMs;
      logger.warn(
        { sessionId, count: entry.violation_count, threshold: this.options.threshold, cooldownUntil: entry.cooldown_until },
        'Violation threshold reached, cooldown started'
      );
      return { violation_count: entry.violation_count, cooling: true, cooldown_until: entry.cooldown_until };
    }

    return { violation_count: entry.violation_count, cooling: false, cooldown_until: null };
  }

  /**
   * Drop sessions that are idle past the TTL and not cooling
   */
  public sweep(): number {
    const now = this.now();
    let evicted = 0;
    for (const [key, entry] of this.store.entries()) {
      const cooling = entry.cooldown_until !== 0 && now < entry.cooldown_until;
      if (!cooling && now - entry.last_seen >= this.options.idleTtlMs) {
        this.store.delete(key);
        evicted += 1;
      }
    }
    if (evicted > 0) {
      logger.debug({ evicted, remaining: this.store.size }, 'Evicted idle rate-limit states');
    }
    return evicted;
  }

  public getState(sessionId: string): Readonly<SessionRateState> | undefined {
    return this.store.get(sessionId);
  }

  public getStats(): RateLimiterStats {
    const now = this.now();
    let coolingSessions = 0;
    for (const entry of this.store.values()) {
      if (entry.cooldown_until !== 0 && now < entry.cooldown_until) {
        coolingSessions += 1;
      }
    }
    return { trackedSessions: this.store.size, coolingSessions };
  }

  public reset(sessionId: string): void {
    this.store.delete(sessionId);
  }

  public destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.store.clear();
  }
}
