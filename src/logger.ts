import { randomUUID } from 'crypto';
import pino from 'pino';

const baseLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  base: {
    service: 'tale-guard',
    version: '1.0.0',
  },
});

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return baseLogger.child({ module: name });
}

export function generateRequestId(): string {
  return randomUUID();
}

export const logger = createLogger('root');
