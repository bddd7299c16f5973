/**
 * @fileoverview Consolidation of raw hook events into one session per id.
 *
 * The hooks log one record per event, so a single Claude Code session shows
 * up many times in the log. This module folds those events into the one
 * session value the rest of the daemon works with.
 *
 * @module utils/sessionMerge
 */

import {
  isStopEvent,
  type ActivitySession,
  type ActivitySessionStatus,
} from '../types/activitySession';

/**
 * A stop event younger than this means Claude just finished its turn and is
 * waiting for the user; older stops mean the session went quiet.
 */
export const WAITING_FOR_USER_THRESHOLD_MS = 60 * 1000;

/**
 * Infers the consolidated status from a session's most recent event.
 *
 * @param latest - Most recent event of the session
 * @param now - Reference time for the recency check
 */
export function inferSessionStatus(latest: ActivitySession, now: Date): ActivitySessionStatus {
  if (!isStopEvent(latest.eventType)) {
    return latest.status;
  }

  const ageMs = now.getTime() - latest.startTime.getTime();
  return ageMs <= WAITING_FOR_USER_THRESHOLD_MS ? 'WAITING_FOR_USER' : 'INACTIVE';
}

/**
 * Merges raw events into exactly one session per session id.
 *
 * Rules, per session id:
 * - the most recent event supplies project name, metadata and event type
 * - start time is the earliest event's start time
 * - end time comes from the most recent event that carries one
 * - status is inferred by {@link inferSessionStatus}
 *
 * Events with identical timestamps keep their input order, so the last one
 * written wins. Output sessions appear in order of first occurrence.
 *
 * @param events - Raw events, in log order
 * @param now - Reference time for status inference
 */
export function mergeActivityEvents(
  events: readonly ActivitySession[],
  now: Date = new Date()
): ActivitySession[] {
  const groups = new Map<string, ActivitySession[]>();
  for (const event of events) {
    const group = groups.get(event.sessionId);
    if (group) {
      group.push(event);
    } else {
      groups.set(event.sessionId, [event]);
    }
  }

  const merged: ActivitySession[] = [];

  for (const [sessionId, group] of groups) {
    // Array.prototype.sort is stable, which keeps ties in input order
    const ordered = [...group].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
    const earliest = ordered[0];
    const latest = ordered[ordered.length - 1];

    let endTime: Date | undefined;
    for (const event of ordered) {
      if (event.endTime) {
        endTime = event.endTime;
      }
    }

    merged.push({
      projectName: latest.projectName,
      sessionId,
      startTime: earliest.startTime,
      ...(endTime ? { endTime } : {}),
      status: inferSessionStatus(latest, now),
      ...(latest.eventType ? { eventType: latest.eventType } : {}),
      metadata: { ...latest.metadata },
    });
  }

  return merged;
}
