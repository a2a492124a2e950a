/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { nanoid } from 'nanoid';

import { createAdminRoutes } from './routes/admin.js';
import { createFileRoutes } from './routes/files.js';
import { createHealthRoutes } from './routes/health.js';
import type { ApiServices } from './types.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * App configuration
 */
interface AppConfig {
  services: ApiServices;
  /** Turns request logging off (tests) */
  quiet?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, quiet } = config;
  const app = new Hono();

  // Global middleware
  if (quiet !== true) {
    app.use('*', logger());
  }
  app.use('*', async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? nanoid();
    c.set('requestId', requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  });

  app.route('/api/v1', createHealthRoutes());
  app.route('/api/v1', createFileRoutes({ fileService: services.fileService }));
  app.route('/api/v1', createAdminRoutes(services));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId'),
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: c.get('requestId'),
        },
      },
      500
    );
  });

  return app;
}
