import { Hono } from 'hono';
import { z } from 'zod';
import { createLogger, generateRequestId } from '../logger.js';
import type { SafetyRules } from '../rules/interface.js';
import type { SafetyController } from '../safety/controller.js';
import { SELECTION_SIZE } from '../safety/combination-validator.js';

const logger = createLogger('routes-safety');

/**
 * Zod schemas for request validation. Sizes are kept loose enough that the
 * controller, not the schema, decides what a bad name or selection is.
 */
const SessionIdSchema = z.string().min(1).max(128);

const ValidateNameSchema = z.object({
  name: z.string().max(10000),
  session_id: SessionIdSchema,
});

const ValidateSelectionSchema = z.object({
  words: z.array(z.string().max(100)).length(SELECTION_SIZE),
  categories: z.array(z.string().max(100)).length(SELECTION_SIZE),
  session_id: SessionIdSchema,
});

const StoryRequestSchema = z.object({
  session_id: SessionIdSchema,
  topic: z.string().max(100),
  characters: z
    .array(
      z.object({
        name: z.string().max(10000),
        pronouns: z.string().max(20),
      })
    )
    .max(20),
  magic_words: z.object({
    words: z.array(z.string().max(100)).max(10),
    categories: z.array(z.string().max(100)).max(10),
  }),
});

const StoryContentSchema = z.object({
  content: z.string().max(200000),
});

async function readJson(req: { json: () => Promise<unknown> }): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    // Malformed JSON is reported by the schema as a missing body
    return undefined;
  }
}

/**
 * Create safety routes with an injected controller
 */
export function createSafetyRoutes(controller: SafetyController, rules: SafetyRules): Hono {
  const safetyRoutes = new Hono();

  /**
   * GET /api/safety/categories - Approved magic words per category, plus topics
   */
  safetyRoutes.get('/categories', (c) => {
    const categories: Record<string, string[]> = {};
    for (const category of rules.categories.values()) {
      categories[category.name] = [...category.approved_words];
    }
    return c.json({ categories, topics: [...rules.topics], pronouns: [...rules.pronouns] });
  });

  /**
   * POST /api/safety/name - Validate a character name
   */
  safetyRoutes.post('/name', async (c) => {
    const startTime = Date.now();
    const requestId = generateRequestId();

    try {
      const parsed = ValidateNameSchema.safeParse(await readJson(c.req));

      if (!parsed.success) {
        logger.warn({ requestId, errors: parsed.error.issues }, 'Invalid name validation request');
        return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
      }

      const { name, session_id } = parsed.data;
      const result = controller.validateName(name, session_id);

      const duration = Date.now() - startTime;
      logger.info(
        { requestId, sessionId: session_id, valid: result.is_valid, errorKind: result.error_kind, nameLength: name.length, duration },
        'Name validated'
      );

      return c.json(result);
    } catch (error) {
      const duration = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ requestId, error: errorMessage, duration }, 'Failed to validate name');
      return c.json({ error: 'Failed to validate name' }, 500);
    }
  });

  /**
   * POST /api/safety/selection - Validate three magic words
   */
  safetyRoutes.post('/selection', async (c) => {
    const startTime = Date.now();
    const requestId = generateRequestId();

    try {
      const parsed = ValidateSelectionSchema.safeParse(await readJson(c.req));

      if (!parsed.success) {
        logger.warn({ requestId, errors: parsed.error.issues }, 'Invalid selection validation request');
        return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
      }

      const { words, categories, session_id } = parsed.data;
      const result = controller.validateSelection(words, categories, session_id);

      const duration = Date.now() - startTime;
      logger.info(
        { requestId, sessionId: session_id, valid: result.is_valid, errorKind: result.error_kind, duration },
        'Selection validated'
      );

      return c.json(result);
    } catch (error) {
      const duration = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ requestId, error: errorMessage, duration }, 'Failed to validate selection');
      return c.json({ error: 'Failed to validate selection' }, 500);
    }
  });

  /**
   * POST /api/safety/story-request - Validate a full story request
   */
  safetyRoutes.post('/story-request', async (c) => {
    const startTime = Date.now();
    const requestId = generateRequestId();

    try {
      const parsed = StoryRequestSchema.safeParse(await readJson(c.req));

      if (!parsed.success) {
        logger.warn({ requestId, errors: parsed.error.issues }, 'Invalid story request');
        return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
      }

      const { session_id, ...request } = parsed.data;
      const result = controller.validateStoryRequest(request, session_id);

      const duration = Date.now() - startTime;
      logger.info({ requestId, sessionId: session_id, valid: result.is_valid, issues: result.issues, duration }, 'Story request validated');

      return c.json(result);
    } catch (error) {
      const duration = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ requestId, error: errorMessage, duration }, 'Failed to validate story request');
      return c.json({ error: 'Failed to validate story request' }, 500);
    }
  });

  /**
   * POST /api/safety/story-content - Review generated story text
   */
  safetyRoutes.post('/story-content', async (c) => {
    const startTime = Date.now();
    const requestId = generateRequestId();

    try {
      const parsed = StoryContentSchema.safeParse(await readJson(c.req));

      if (!parsed.success) {
        logger.warn({ requestId, errors: parsed.error.issues }, 'Invalid story content request');
        return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
      }

      const review = controller.reviewStoryContent(parsed.data.content);

      const duration = Date.now() - startTime;
      logger.info({ requestId, safe: review.safe, truncated: review.truncated, duration }, 'Story content reviewed');

      return c.json(review);
    } catch (error) {
      const duration = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ requestId, error: errorMessage, duration }, 'Failed to review story content');
      return c.json({ error: 'Failed to review story content' }, 500);
    }
  });

  return safetyRoutes;
}
