/**
 * @fileoverview Type definitions for usage snapshots published by the daemon.
 *
 * A {@link MonitoringSnapshot} is built once per collection cycle. Before it
 * is handed to the file writer it is flattened into a
 * {@link MonitoringSnapshotRecord}, the JSON shape the display client reads.
 *
 * @module types/monitoring
 */

import { z } from 'zod';
import {
  ACTIVITY_EVENT_TYPES,
  ACTIVITY_SESSION_STATUSES,
  type ActivitySession,
} from './activitySession';

/**
 * Schema version for the persisted snapshot file.
 * Increment when making breaking changes to the record structure.
 */
export const SNAPSHOT_SCHEMA_VERSION = 1;

/**
 * One 5-hour billing block as reported by ccusage.
 */
export interface UsageSession {
  /** Block id (ccusage uses the block start timestamp) */
  sessionId: string;

  /** Block start */
  startTime: Date;

  /** Scheduled end of the 5-hour window */
  endTime?: Date;

  /** Input tokens consumed */
  inputTokens: number;

  /** Output tokens generated */
  outputTokens: number;

  /** Tokens written to the prompt cache */
  cacheCreationTokens: number;

  /** Tokens read from the prompt cache */
  cacheReadTokens: number;

  /** Total tokens as reported by ccusage */
  totalTokens: number;

  /** Cost in USD */
  costUsd: number;

  /** Whether the block is the one currently in progress */
  isActive: boolean;
}

/**
 * Failure bookkeeping owned by the usage collector.
 */
export interface ErrorStatus {
  /** Collections failed in a row; 0 after any success */
  consecutiveFailures: number;

  /** Message of the most recent failure */
  errorMessage: string | null;

  /** When the most recent failure happened */
  lastFailureAt: Date | null;
}

/**
 * Everything the daemon knows after one collection cycle.
 */
export interface MonitoringSnapshot {
  readonly currentSessions: readonly UsageSession[];
  readonly totalSessionsThisMonth: number;
  readonly totalCostThisMonth: number;
  readonly maxTokensPerSession: number;
  readonly lastUpdate: Date;
  readonly billingPeriodStart: Date;
  readonly billingPeriodEnd: Date;
  /** Current activity sessions; empty when the hook log has none */
  readonly activitySessions: readonly ActivitySession[];
}

const usageSessionRecordSchema = z.object({
  sessionId: z.string(),
  startTime: z.string(),
  endTime: z.string().nullable(),
  inputTokens: z.number(),
  outputTokens: z.number(),
  cacheCreationTokens: z.number(),
  cacheReadTokens: z.number(),
  totalTokens: z.number(),
  costUsd: z.number(),
  isActive: z.boolean(),
});

const activitySessionRecordSchema = z.object({
  projectName: z.string(),
  sessionId: z.string(),
  startTime: z.string(),
  endTime: z.string().nullable(),
  status: z.enum(ACTIVITY_SESSION_STATUSES),
  eventType: z.enum(ACTIVITY_EVENT_TYPES).nullable(),
  metadata: z.record(z.string(), z.string()),
});

/**
 * Schema of the persisted snapshot file.
 */
export const monitoringSnapshotRecordSchema = z.object({
  schemaVersion: z.number(),
  currentSessions: z.array(usageSessionRecordSchema),
  totalSessionsThisMonth: z.number(),
  totalCostThisMonth: z.number(),
  maxTokensPerSession: z.number(),
  lastUpdate: z.string(),
  billingPeriodStart: z.string(),
  billingPeriodEnd: z.string(),
  activitySessions: z.array(activitySessionRecordSchema).default([]),
});

/** Plain JSON form of a {@link MonitoringSnapshot}. */
export type MonitoringSnapshotRecord = z.infer<typeof monitoringSnapshotRecordSchema>;

/**
 * Creates an error status with no recorded failures.
 */
export function createEmptyErrorStatus(): ErrorStatus {
  return { consecutiveFailures: 0, errorMessage: null, lastFailureAt: null };
}

/**
 * Flattens a snapshot into its persisted JSON form.
 */
export function toSnapshotRecord(snapshot: MonitoringSnapshot): MonitoringSnapshotRecord {
  return {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    currentSessions: snapshot.currentSessions.map(session => ({
      sessionId: session.sessionId,
      startTime: session.startTime.toISOString(),
      endTime: session.endTime ? session.endTime.toISOString() : null,
      inputTokens: session.inputTokens,
      outputTokens: session.outputTokens,
      cacheCreationTokens: session.cacheCreationTokens,
      cacheReadTokens: session.cacheReadTokens,
      totalTokens: session.totalTokens,
      costUsd: session.costUsd,
      isActive: session.isActive,
    })),
    totalSessionsThisMonth: snapshot.totalSessionsThisMonth,
    totalCostThisMonth: snapshot.totalCostThisMonth,
    maxTokensPerSession: snapshot.maxTokensPerSession,
    lastUpdate: snapshot.lastUpdate.toISOString(),
    billingPeriodStart: snapshot.billingPeriodStart.toISOString(),
    billingPeriodEnd: snapshot.billingPeriodEnd.toISOString(),
    activitySessions: snapshot.activitySessions.map(session => ({
      projectName: session.projectName,
      sessionId: session.sessionId,
      startTime: session.startTime.toISOString(),
      endTime: session.endTime ? session.endTime.toISOString() : null,
      status: session.status,
      eventType: session.eventType ?? null,
      metadata: { ...session.metadata },
    })),
  };
}

