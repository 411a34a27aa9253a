/**
 * Session Routes
 * Read or discard a chat session's conversation history
 */

import { Hono } from 'hono';

import type { SessionService } from '../../services/index.js';
import { errorResponse, successResponse } from '../utils/response.js';

interface SessionRoutesDeps {
  sessionService: Pick<SessionService, 'getHistory' | 'deleteSession'>;
}

/**
 * Create session routes
 */
export function createSessionRoutes(deps: SessionRoutesDeps): Hono {
  const { sessionService } = deps;
  const app = new Hono();

  /**
   * GET /sessions/:id/history
   */
  app.get('/sessions/:id/history', (c) => {
    const sessionId = c.req.param('id');
    const result = sessionService.getHistory(sessionId);
    if (!result.success) {
      return errorResponse(c, result.error);
    }
    return successResponse(c, { sessionId, history: result.data });
  });

  /**
   * DELETE /sessions/:id
   */
  app.delete('/sessions/:id', (c) => {
    const result = sessionService.deleteSession(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error);
    }
    return c.body(null, 204);
  });

  return app;
}
