import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { Config } from './config.js';
import type { SafetyRules } from './rules/interface.js';
import { createSafetyRoutes } from './routes/safety.js';
import { LoggerAuditSink, MemoryAuditSink, type AuditSink } from './safety/audit.js';
import { SafetyController } from './safety/controller.js';
import { RateLimiter } from './safety/rate-limiter.js';
import { InMemoryUsageTracker } from './safety/usage.js';

export interface SafetyService {
  app: Hono;
  controller: SafetyController;
  rateLimiter: RateLimiter;
  usageTracker: InMemoryUsageTracker;
  fallbackSink: MemoryAuditSink;
}

export interface BuildAppOptions {
  auditSink?: AuditSink;
  now?: () => number;
}

/**
 * Wire rules, limiter, sinks and routes into one application
 */
export function buildApp(config: Config, rules: SafetyRules, options: BuildAppOptions = {}): SafetyService {
  const now = options.now ?? Date.now;

  const rateLimiter = new RateLimiter({
    threshold: config.rateLimit.threshold,
    windowMs: config.rateLimit.windowMs,
    cooldownMs: config.rateLimit.cooldownMs,
    idleTtlMs: config.rateLimit.idleTtlMs,
    now,
  });
  const usageTracker = new InMemoryUsageTracker();
  const fallbackSink = new MemoryAuditSink(config.audit.bufferSize);

  const controller = new SafetyController({
    rules,
    limits: config.limits,
    rateLimiter,
    auditSink: options.auditSink ?? new LoggerAuditSink(),
    fallbackSink,
    usageTracker,
    clock: () => new Date(now()),
  });

  const app = new Hono();

  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
  }));

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date(now()).toISOString(),
      rateLimiter: rateLimiter.getStats(),
    });
  });

  app.route('/api/safety', createSafetyRoutes(controller, rules));

  return { app, controller, rateLimiter, usageTracker, fallbackSink };
}
