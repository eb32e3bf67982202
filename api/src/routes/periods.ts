/**
 * Periods endpoint
 *
 * Year/month pairs that have data, for populating date pickers
 */

import { Hono } from 'hono';
import type { QuestionAnswerer } from '../lib/orchestrator/answer';
import { failureResponse, notInitialized } from './errors';

let answerer: QuestionAnswerer | null = null;

export function setAnswerer(instance: QuestionAnswerer | null): void {
  answerer = instance;
}

const periodsRoute = new Hono();

/**
 * GET /api/periods
 */
periodsRoute.get('/', async (c) => {
  if (!answerer) {
    return notInitialized(c);
  }
  try {
    const periods = await answerer.listPeriods();
    return c.json({ count: periods.length, periods });
  } catch (error) {
    return failureResponse(c, error);
  }
});

export default periodsRoute;
