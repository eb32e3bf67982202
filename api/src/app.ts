import { Hono } from 'hono';
import { cors } from 'hono/cors';
import chatRoute from './routes/chat';
import floatsRoute from './routes/floats';
import locationsRoute from './routes/locations';
import periodsRoute from './routes/periods';
import queryRoute from './routes/query';
import statusRoute from './routes/status';

/**
 * Build the HTTP application; handlers get their collaborators through
 * each route module's setter
 */
export function createApp(corsOrigins: string[]): Hono {
  const app = new Hono();

  app.use(
    '/api/*',
    cors({
      origin: corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
    })
  );

  // Mount routes
  app.route('/api', statusRoute);
  app.route('/api/chat', chatRoute);
  app.route('/api/query', queryRoute);
  app.route('/api/locations', locationsRoute);
  app.route('/api/floats', floatsRoute);
  app.route('/api/periods', periodsRoute);

  return app;
}
