/**
 * Query endpoint
 *
 * Accepts a draft intent directly (skipping the language model) and
 * answers it through the same sanitize → compile → execute pipeline.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { QuestionAnswerer } from '../lib/orchestrator/answer';
import { failureResponse, notInitialized } from './errors';

let answerer: QuestionAnswerer | null = null;

export function setAnswerer(instance: QuestionAnswerer | null): void {
  answerer = instance;
}

const queryRequestSchema = z.object({
  intent: z.record(z.unknown()),
  question: z.string().max(1000).optional(),
});

const queryRoute = new Hono();

/**
 * POST /api/query
 * Body: { intent: { query_type, metrics, ... }, question? }
 */
queryRoute.post('/', async (c) => {
  if (!answerer) {
    return notInitialized(c);
  }

  const body: unknown = await c.req.json().catch(() => null);
  const parsed = queryRequestSchema.safeParse(body);
  if (!parsed.success) {
    return c.json(
      {
        error: 'Invalid query',
        details: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
      400
    );
  }

  try {
    return c.json(await answerer.answerIntent(parsed.data.intent, parsed.data.question));
  } catch (error) {
    return failureResponse(c, error);
  }
});

export default queryRoute;
