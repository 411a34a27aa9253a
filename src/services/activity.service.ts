/**
 * ActivityService Implementation
 *
 * Purpose: Record what each agent did, for display in the activity log.
 * Owns: activity entries
 * Dependencies: None (lowest level service)
 */

import type {
  ActivityEntry,
  ActivityEvent,
  ActivityRecorder,
  Result,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

/**
 * Storage abstraction for ActivityService
 * Allows swapping the in-memory store in tests
 */
export interface ActivityServiceDb {
  insertEntry: (entry: ActivityEntry) => void;
  listEntries: () => ActivityEntry[];
  clearEntries: () => number;
}

/**
 * ActivityService interface
 */
export interface ActivityService extends ActivityRecorder {
  listActivity(): Result<ActivityEntry[]>;
  clearActivity(): Result<{ cleared: number }>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format as 'YYYY-MM-DD HH:MM:SS' in local time
 */
export function formatActivityTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Create ActivityService instance
 */
export function createActivityService(deps: {
  db: ActivityServiceDb;
  now?: () => Date;
}): ActivityService {
  const { db } = deps;
  const now = deps.now ?? (() => new Date());

  return {
    /**
     * Record an activity event
     * Recording must never break the agent call that triggered it
     */
    record(event: ActivityEvent): void {
      try {
        db.insertEntry({
          timestamp: formatActivityTimestamp(now()),
          agent: event.agent,
          action: event.action,
          status: event.status,
        });
      } catch (error) {
        console.error('Failed to record activity:', error);
      }
    },

    listActivity(): Result<ActivityEntry[]> {
      try {
        return success(db.listEntries());
      } catch (error) {
        console.error('Failed to read activity log:', error);
        return failure('INTERNAL_ERROR', 'Failed to read activity log');
      }
    },

    clearActivity(): Result<{ cleared: number }> {
      try {
        return success({ cleared: db.clearEntries() });
      } catch (error) {
        console.error('Failed to clear activity log:', error);
        return failure('INTERNAL_ERROR', 'Failed to clear activity log');
      }
    },
  };
}
