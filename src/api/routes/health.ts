/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: { clock?: () => Date } = {}): Hono {
  const clock = deps.clock ?? (() => new Date());
  const app = new Hono();

  /**
   * GET /health
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: clock().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
