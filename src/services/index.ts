/**
 * Service Layer Exports
 *
 * Services hold the presentation-side state the agents do not own:
 * - SessionService: per-session conversation history
 * - ActivityService: agent activity log
 */

export { createSessionService } from './session.service.js';
export type { SessionService, SessionServiceDb } from './session.service.js';
export {
  createSessionServiceDb,
  DEFAULT_MAX_SESSIONS,
  DEFAULT_MAX_TURNS_PER_SESSION,
} from './session.db.js';
export type { SessionStoreLimits } from './session.db.js';

export {
  createActivityService,
  formatActivityTimestamp,
} from './activity.service.js';
export type {
  ActivityService,
  ActivityServiceDb,
} from './activity.service.js';
export {
  createActivityServiceDb,
  DEFAULT_MAX_ACTIVITY_ENTRIES,
} from './activity.db.js';
