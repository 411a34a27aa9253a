/**
 * Health Routes
 * Public endpoints for health and API-key status checks
 */

import { Hono } from 'hono';

import { describeApiStatus } from '../../lib/config.js';
import type { CredentialState } from '../../types/index.js';

interface HealthRoutesDeps {
  credentials: CredentialState;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Liveness check
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: 'v1',
    });
  });

  /**
   * GET /status
   * Whether the provider API key is configured
   */
  app.get('/status', (c) => {
    return c.json(describeApiStatus(deps.credentials));
  });

  return app;
}
