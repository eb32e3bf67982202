import type { Context } from 'hono';
import { BackendError } from '../lib/orchestrator/answer';

/**
 * Map an infrastructure failure to a JSON error response.
 * Details go to the log, never to the client.
 */
export function failureResponse(c: Context, error: unknown): Response {
  if (error instanceof BackendError && error.stage === 'schema') {
    return c.json(
      {
        error: 'Database unavailable',
        message: 'The measurement database cannot be reached. Please try again later.',
      },
      503
    );
  }

  console.error('Request failed:', error);
  return c.json(
    {
      error: 'Query failed',
      message:
        error instanceof BackendError
          ? 'The database rejected the generated query.'
          : 'An unexpected error occurred.',
    },
    500
  );
}

export function notInitialized(c: Context): Response {
  return c.json({ error: 'Service not initialized' }, 503);
}
