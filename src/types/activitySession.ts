/**
 * @fileoverview Type definitions for activity sessions read from the hook log.
 *
 * Claude Code hooks append one JSON record per event to a shared log file.
 * Each record becomes a raw {@link ActivitySession}; the tracker merges the
 * raw events of one session id into a single consolidated session.
 *
 * @module types/activitySession
 */

/** Every consolidated status, in display order. */
export const ACTIVITY_SESSION_STATUSES = [
  'ACTIVE',
  'WAITING_FOR_USER',
  'IDLE',
  'INACTIVE',
  'STOPPED',
] as const;

/**
 * Consolidated state of an activity session.
 */
export type ActivitySessionStatus = typeof ACTIVITY_SESSION_STATUSES[number];

/** Hook events written to the activity log. */
export const ACTIVITY_EVENT_TYPES = ['notification', 'stop', 'subagent_stop'] as const;

/**
 * Hook event that produced a raw activity event.
 */
export type ActivityEventType = typeof ACTIVITY_EVENT_TYPES[number];

/**
 * A logical unit of user activity in one project.
 *
 * Raw events and merged sessions share this shape. Values are replaced,
 * never mutated, when events are merged.
 */
export interface ActivitySession {
  /** Project the session belongs to (directory name of the session cwd) */
  projectName: string;

  /** Claude Code session id; the merge key */
  sessionId: string;

  /** When the event happened, or for a merged session the first event */
  startTime: Date;

  /** Set only by stop events */
  endTime?: Date;

  /** Reported or inferred status */
  status: ActivitySessionStatus;

  /** Hook event type of the (representative) event */
  eventType?: ActivityEventType;

  /** Extra fields carried by the hook record, in record order */
  metadata: Record<string, string>;
}

/**
 * Whether an event type marks the end of a turn.
 *
 * `subagent_stop` only ends a subagent; the main session keeps running.
 */
export function isStopEvent(eventType: ActivityEventType | undefined): boolean {
  return eventType === 'stop';
}
