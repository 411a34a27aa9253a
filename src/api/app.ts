/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import type { AgentMap } from '../agents/index.js';
import type { ActivityService, SessionService } from '../services/index.js';
import type { CredentialState } from '../types/index.js';

import { createRequestIdMiddleware } from './middleware/request-id.js';
import { createActivityRoutes } from './routes/activity.js';
import { createAgentRoutes } from './routes/agents.js';
import { createHealthRoutes } from './routes/health.js';
import { createOrchestratorRoutes } from './routes/orchestrator.js';
import { createSessionRoutes } from './routes/sessions.js';
import './types.js';

/**
 * App configuration
 */
export interface AppOptions {
  credentials: CredentialState;
  agents: AgentMap;
  sessionService: SessionService;
  activityService: ActivityService;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppOptions): Hono {
  const { credentials, agents, sessionService, activityService } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', logger());
  app.use(
    '*',
    cors({
      origin: config.allowedOrigins ?? ['http://localhost:3000'],
    })
  );
  app.use('*', createRequestIdMiddleware());

  app.route('/api/v1', createHealthRoutes({ credentials }));

  app.route(
    '/api/v1',
    createAgentRoutes({
      agents,
      modelOf: (id) => agents[id].model,
    })
  );

  app.route(
    '/api/v1',
    createOrchestratorRoutes({
      orchestrator: agents.orchestrator,
      sessionService,
    })
  );

  app.route('/api/v1', createSessionRoutes({ sessionService }));

  app.route('/api/v1', createActivityRoutes({ activityService }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') ?? 'unknown',
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
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      500
    );
  });

  return app;
}
