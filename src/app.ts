import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppConfig } from './config.js';
import { checkHealth, type DatabasePing } from './db/health.js';
import type { JobRunner } from './jobs/runner.js';
import { requestLoggerMiddleware } from './middleware/requestLogger.js';
import { createJobRoutes } from './routes/jobs.js';
import { createStoryRoutes } from './routes/stories.js';
import type { StoryStorage } from './storage/interface.js';
import type { HealthResponse } from './types.js';
import { errorResponse, handleApiError } from './utils/errors.js';

export interface AppDeps {
  config: Pick<AppConfig, 'apiPrefix' | 'allowedOrigins' | 'debug'>;
  storage: StoryStorage;
  jobs: Pick<JobRunner, 'enqueue'>;
  ping: DatabasePing;
}

/**
 * Build the HTTP application
 *
 * Routes live under the configured API prefix; `/health` stays at the root
 * for load balancers.
 */
export function createApp({ config, storage, jobs, ping }: AppDeps) {
  const app = new Hono();

  const allowAll = config.allowedOrigins.includes('*');
  app.use('*', cors({
    origin: allowAll ? '*' : config.allowedOrigins,
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
    // Browsers refuse credentials with a wildcard origin
    credentials: !allowAll,
  }));

  app.use('*', requestLoggerMiddleware);

  // Global error handler - catches all unhandled errors across all routes
  app.onError((error, c) => {
    return handleApiError(c, error, 'An unexpected error occurred', config.debug);
  });

  app.notFound((c) => errorResponse(c, 'Route not found', 404));

  app.route(`${config.apiPrefix}/stories`, createStoryRoutes({ storage, jobs }));
  app.route(`${config.apiPrefix}/jobs`, createJobRoutes(storage));

  app.get('/health', async (c) => {
    const dbHealth = await checkHealth(ping);

    const body: HealthResponse = {
      status: dbHealth.status === 'healthy' ? 'ok' : dbHealth.status,
      timestamp: new Date().toISOString(),
      database: {
        connected: dbHealth.connected,
        status: dbHealth.status,
        responseTimeMs: dbHealth.responseTimeMs,
      },
    };
    if (dbHealth.error) {
      body.database.error = dbHealth.error;
    }

    return c.json(body, dbHealth.connected ? 200 : 503);
  });

  return app;
}
