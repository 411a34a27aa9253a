/**
 * ActivityService Database Adapter
 * In-memory store; entries live for the process lifetime
 */

import type { ActivityEntry } from '../types/index.js';

import type { ActivityServiceDb } from './activity.service.js';

/**
 * Default cap on retained entries; the oldest are dropped first
 */
export const DEFAULT_MAX_ACTIVITY_ENTRIES = 1000;

export function createActivityServiceDb(
  maxEntries: number = DEFAULT_MAX_ACTIVITY_ENTRIES
): ActivityServiceDb {
  let entries: ActivityEntry[] = [];

  return {
    insertEntry(entry) {
      entries.push(entry);
      if (entries.length > maxEntries) {
        entries = entries.slice(entries.length - maxEntries);
      }
    },

    listEntries() {
      return [...entries];
    },

    clearEntries() {
      const count = entries.length;
      entries = [];
      return count;
    },
  };
}
