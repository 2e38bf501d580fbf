import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RateLimiter } from '../src/safety/rate-limiter.js';
import { START_TIME } from './helpers.js';

describe('RateLimiter', () => {
  let clock: { now: number };
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = { now: START_TIME };
    limiter = new RateLimiter({
      threshold: 3,
      windowMs: 300000,
      cooldownMs: 120000,
      idleTtlMs: 1800000,
      now: () => clock.now,
    });
  });

  afterEach(() => {
    limiter.destroy();
  });

  it('does not limit an unknown session', () => {
    expect(limiter.check('s1')).toEqual({ limited: false, retry_at: null });
  });

  it('starts a cooldown on the third violation inside the window', () => {
    expect(limiter.recordViolation('s1')).toEqual({ violation_count: 1, cooling: false, cooldown_until: null });
    clock.now += 1000;
    expect(limiter.recordViolation('s1')).toEqual({ violation_count: 2, cooling: false, cooldown_until: null });
    clock.now += 1000;
    expect(limiter.recordViolation('s1')).toEqual({
      violation_count: 3,
      cooling: true,
      cooldown_until: START_TIME + 2000 + 120000,
    });
    expect(limiter.check('s1')).toEqual({ limited: true, retry_at: START_TIME + 122000 });
  });

  it('does not count violations recorded while cooling', () => {
    limiter.recordViolation('s1');
    limiter.recordViolation('s1');
    limiter.recordViolation('s1');
    expect(limiter.recordViolation('s1')).toEqual({ violation_count: 3, cooling: true, cooldown_until: null });
  });

  it('returns to normal with a fresh counter once the cooldown has elapsed', () => {
    limiter.recordViolation('s1');
    limiter.recordViolation('s1');
    limiter.recordViolation('s1');

    clock.now += 119999;
    expect(limiter.check('s1').limited).toBe(true);

    clock.now += 1;
    expect(limiter.check('s1')).toEqual({ limited: false, retry_at: null });
    expect(limiter.getState('s1')?.violation_count).toBe(0);
    expect(limiter.recordViolation('s1').violation_count).toBe(1);
  });

  it('resets the counter when the window has passed', () => {
    limiter.recordViolation('s1');
    limiter.recordViolation('s1');
    clock.now += 300000;
    expect(limiter.recordViolation('s1')).toEqual({ violation_count: 1, cooling: false, cooldown_until: null });
  });

  it('keeps sessions independent', () => {
    limiter.recordViolation('s1');
    limiter.recordViolation('s1');
    limiter.recordViolation('s1');
    expect(limiter.check('s2').limited).toBe(false);
    expect(limiter.recordViolation('s2').violation_count).toBe(1);
  });

  it('starts exactly one cooldown when violations arrive concurrently', async () => {
    const records = await Promise.all(
      Array.from({ length: 6 }, () => Promise.resolve().then(() => limiter.recordViolation('s1')))
    );
    const started = records.filter((record) => record.cooldown_until !== null);
    expect(started).toHaveLength(1);
    expect(records.map((record) => record.violation_count)).toEqual([1, 2, 3, 3, 3, 3]);
  });

  it('evicts idle sessions but keeps cooling ones', () => {
    limiter.recordViolation('idle');
    clock.now += 1800000 - 60000;
    limiter.recordViolation('hot');
    limiter.recordViolation('hot');
    limiter.recordViolation('hot');
    expect(limiter.getStats()).toEqual({ trackedSessions: 2, coolingSessions: 1 });

    clock.now += 60000;
    expect(limiter.sweep()).toBe(1);
    expect(limiter.getState('idle')).toBeUndefined();
    expect(limiter.getState('hot')).toBeDefined();
  });

  it('forgets a session on reset', () => {
    limiter.recordViolation('s1');
    limiter.reset('s1');
    expect(limiter.getState('s1')).toBeUndefined();
  });
});
