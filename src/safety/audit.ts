import { createLogger, type Logger } from '../logger.js';
import type { SecurityEvent } from '../types/safety.js';

/**
 * Destination for security events. May be sync or async; callers never
 * wait on it.
 */
export interface AuditSink {
  emit(event: SecurityEvent): void | Promise<void>;
}

/**
 * Writes each event as a structured log line on the security-audit logger
 */
export class LoggerAuditSink implements AuditSink {
  constructor(private readonly logger: Logger = createLogger('security-audit')) {}

  emit(event: SecurityEvent): void {
    this.logger.warn({ event }, 'Security event');
  }
}

/**
 * Bounded ring buffer of the most recent events
 */
export class MemoryAuditSink implements AuditSink {
  private events: SecurityEvent[] = [];

  constructor(private readonly capacity = 500) {}

  emit(event: SecurityEvent): void {
    this.events.push(event);
    if (this.events.length > this.capacity) {
      this.events.splice(0, this.events.length - this.capacity);
    }
  }

  recent(limit = this.capacity): SecurityEvent[] {
    if (limit <= 0) {
      return [];
    }
    return this.events.slice(-limit);
  }

  get size(): number {
    return this.events.length;
  }

  clear(): void {
    this.events = [];
  }
}
