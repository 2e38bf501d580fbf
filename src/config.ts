import { z } from 'zod';
import { createLogger } from './logger.js';
import { ConfigurationError } from './rules/interface.js';

const logger = createLogger('config');

const ConfigSchema = z.object({
  port: z.coerce.number().int().positive().default(3000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  rulesPath: z.string().min(1).default('./data/safety-rules.yaml'),
  limits: z.object({
    maxRawNameLength: z.coerce.number().int().positive().default(200),
    maxNameLength: z.coerce.number().int().positive().default(50),
    maxStoryContentLength: z.coerce.number().int().positive().default(20000),
    maxCharacters: z.coerce.number().int().positive().default(5),
  }),
  // Violations per session before a cooldown kicks in
  rateLimit: z.object({
    threshold: z.coerce.number().int().positive().default(3),
    windowMs: z.coerce.number().int().positive().default(300000),
    cooldownMs: z.coerce.number().int().positive().default(120000),
    idleTtlMs: z.coerce.number().int().positive().default(1800000),
  }),
  audit: z.object({
    bufferSize: z.coerce.number().int().positive().default(500),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (config) {
    return config;
  }

  const rawConfig = {
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    rulesPath: env.SAFETY_RULES_PATH,
    limits: {
      maxRawNameLength: env.MAX_RAW_NAME_LENGTH,
      maxNameLength: env.MAX_NAME_LENGTH,
      maxStoryContentLength: env.MAX_STORY_CONTENT_LENGTH,
      maxCharacters: env.MAX_CHARACTERS,
    },
    rateLimit: {
      threshold: env.RATE_LIMIT_THRESHOLD,
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      cooldownMs: env.RATE_LIMIT_COOLDOWN_MS,
      idleTtlMs: env.RATE_LIMIT_IDLE_TTL_MS,
    },
    audit: {
      bufferSize: env.AUDIT_BUFFER_SIZE,
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    logger.error({ issues: parsed.error.issues }, 'Failed to load configuration');
    throw new ConfigurationError(
      `Configuration validation failed: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }

  if (parsed.data.limits.maxNameLength > parsed.data.limits.maxRawNameLength) {
    throw new ConfigurationError('MAX_NAME_LENGTH cannot exceed MAX_RAW_NAME_LENGTH');
  }

  config = parsed.data;
  logger.info({ config }, 'Configuration loaded');
  return config;
}

export function getConfig(): Config {
  if (!config) {
    return loadConfig();
  }
  return config;
}

/**
 * Drop the cached configuration (tests only)
 */
export function resetConfig(): void {
  config = null;
}
