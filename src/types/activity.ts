/**
 * Activity Types
 * Entries shown in the activity log
 */

export type ActivityStatus = 'success' | 'failure';

/**
 * Event to be recorded
 * Used as input to ActivityService.record()
 */
export interface ActivityEvent {
  agent: string; // display name, e.g. 'Data Research'
  action: string; // e.g. 'Enriched Acme Ltd'
  status: ActivityStatus;
}

/**
 * Stored activity entry
 */
export interface ActivityEntry extends ActivityEvent {
  timestamp: string; // 'YYYY-MM-DD HH:MM:SS', local time
}

/**
 * Minimal recorder interface agents depend on
 */
export interface ActivityRecorder {
  record(event: ActivityEvent): void;
}
