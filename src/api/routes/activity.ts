/**
 * Activity Routes
 */

import { Hono } from 'hono';

import type { ActivityService } from '../../services/index.js';
import { errorResponse, successResponse } from '../utils/response.js';

interface ActivityRoutesDeps {
  activityService: Pick<ActivityService, 'listActivity' | 'clearActivity'>;
}

export function createActivityRoutes(deps: ActivityRoutesDeps): Hono {
  const { activityService } = deps;
  const app = new Hono();

  /**
   * GET /activity
   * Recent agent activity, oldest first
   */
  app.get('/activity', (c) => {
    const result = activityService.listActivity();
    if (!result.success) {
      return errorResponse(c, result.error);
    }
    return successResponse(c, result.data);
  });

  /**
   * DELETE /activity
   */
  app.delete('/activity', (c) => {
    const result = activityService.clearActivity();
    if (!result.success) {
      return errorResponse(c, result.error);
    }
    return successResponse(c, result.data);
  });

  return app;
}
