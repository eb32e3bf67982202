/**
 * Chat endpoint
 *
 * Natural language → draft intent → Intent → SQL → rows → summary
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { QuestionAnswerer } from '../lib/orchestrator/answer';
import { failureResponse, notInitialized } from './errors';

// Set on startup
let answerer: QuestionAnswerer | null = null;

/**
 * Set the answer pipeline (called on startup)
 */
export function setAnswerer(instance: QuestionAnswerer | null): void {
  answerer = instance;
}

export const MAX_QUESTION_LENGTH = 1000;

const chatRequestSchema = z.object({
  message: z.string().trim().min(1).max(MAX_QUESTION_LENGTH),
});

const chatRoute = new Hono();

/**
 * POST /api/chat
 * Answer a natural-language question
 */
chatRoute.post('/', async (c) => {
  if (!answerer) {
    return notInitialized(c);
  }

  const body: unknown = await c.req.json().catch(() => null);
  const parsed = chatRequestSchema.safeParse(body);
  if (!parsed.success) {
    return c.json(
      {
        error: 'Missing or invalid message field',
        message: `Send {"message": "..."} with at most ${MAX_QUESTION_LENGTH} characters.`,
      },
      400
    );
  }

  try {
    return c.json(await answerer.answer(parsed.data.message));
  } catch (error) {
    return failureResponse(c, error);
  }
});

/**
 * GET /api/chat/stats
 * Cache and fallback counters
 */
chatRoute.get('/stats', (c) => {
  if (!answerer) {
    return notInitialized(c);
  }
  return c.json(answerer.getStats());
});

export default chatRoute;
