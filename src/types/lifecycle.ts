/**
 * @fileoverview Session lifecycle audit types
 */

/** Types of session lifecycle events recorded to the audit log */
export const LIFECYCLE_EVENT_TYPES = [
  'created', // Session record created and registered
  'started', // dtach launched for the session
  'finished', // Socket disappeared, session became inactive
  'killed', // Process tree signalled on user request
  'deleted', // Removed from the registry by the user
  'stale_cleaned', // Removed by the reconciliation sweep (log file missing)
  'launch_failed', // dtach could not be started
] as const;

export type LifecycleEventType = (typeof LIFECYCLE_EVENT_TYPES)[number];

/** A single entry in the session lifecycle audit log */
export interface LifecycleEntry {
  ts: number;
  event: LifecycleEventType;
  sessionId: string;
  command?: string;
  origin?: string;
  reason?: string;
  exitCode?: number | null;
  extra?: Record<string, unknown>;
}
