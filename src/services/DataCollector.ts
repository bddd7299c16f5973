/**
 * @fileoverview Usage collector backed by the ccusage CLI.
 *
 * Each collection runs `ccusage blocks --json`, validates the report and
 * folds the billing blocks of the current billing period into a
 * {@link MonitoringSnapshot}. The activity tracker is refreshed on the way
 * so the snapshot also carries the current activity sessions.
 *
 * @module services/DataCollector
 */

import { z } from 'zod';
import type { DaemonConfig } from '../types/config';
import {
  createEmptyErrorStatus,
  type ErrorStatus,
  type MonitoringSnapshot,
  type UsageSession,
} from '../types/monitoring';
import type { ActivitySession } from '../types/activitySession';
import { CollectionError, errorMessage } from '../types';
import { getBillingPeriod, isWithinPeriod } from '../utils/billingPeriod';
import { withTimeout } from '../utils/timeout';
import type { SessionActivityTracker } from './SessionActivityTracker';
import type { SubprocessPool } from './SubprocessPool';
import { log, logDebug, logError } from './Logger';

/**
 * Source of usage snapshots, as the daemon sees it.
 */
export interface UsageCollector {
  /**
   * Bounded in time; never runs two collections at once.
   *
   * @throws CollectionError on any retryable failure, already counted in
   *   {@link getErrorStatus}
   */
  collect(): Promise<MonitoringSnapshot>;

  /** Current failure bookkeeping */
  getErrorStatus(): ErrorStatus;

  /**
   * Records a token count if it beats the maximum seen so far.
   *
   * @returns true if the maximum changed
   */
  updateMaxIfHigher(tokens: number): boolean;
}

const ccusageBlockSchema = z.object({
  id: z.string(),
  startTime: z.string().datetime({ offset: true }),
  endTime: z.string().datetime({ offset: true }).nullish(),
  actualEndTime: z.string().datetime({ offset: true }).nullish(),
  isActive: z.boolean(),
  isGap: z.boolean().optional(),
  tokenCounts: z.object({
    inputTokens: z.number(),
    outputTokens: z.number(),
    cacheCreationInputTokens: z.number().optional(),
    cacheReadInputTokens: z.number().optional(),
  }),
  totalTokens: z.number(),
  costUSD: z.number(),
});

const ccusageBlocksReportSchema = z.object({
  blocks: z.array(ccusageBlockSchema),
});

type CcusageBlock = z.infer<typeof ccusageBlockSchema>;

/**
 * Dependencies of the collector.
 */
export interface DataCollectorDependencies {
  /** Runs the ccusage command */
  pool: Pick<SubprocessPool, 'run'>;
  /** Refreshed on every collection; its sessions go into the snapshot */
  tracker?: Pick<SessionActivityTracker, 'updateFromLogFiles' | 'getActiveSessions'>;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

/**
 * Converts a ccusage block to a usage session.
 */
export function toUsageSession(block: CcusageBlock): UsageSession {
  return {
    sessionId: block.id,
    startTime: new Date(block.startTime),
    ...(block.endTime ? { endTime: new Date(block.endTime) } : {}),
    inputTokens: block.tokenCounts.inputTokens,
    outputTokens: block.tokenCounts.outputTokens,
    cacheCreationTokens: block.tokenCounts.cacheCreationInputTokens ?? 0,
    cacheReadTokens: block.tokenCounts.cacheReadInputTokens ?? 0,
    totalTokens: block.totalTokens,
    costUsd: block.costUSD,
    isActive: block.isActive,
  };
}

/**
 * Collects usage snapshots through ccusage.
 *
 * @example
 * ```typescript
 * const collector = new DataCollector(config, { pool: getSubprocessPool(), tracker });
 * const snapshot = await collector.collect();
 * console.log(`${snapshot.totalSessionsThisMonth} sessions this month`);
 * ```
 */
export class DataCollector implements UsageCollector {
  private errorStatus: ErrorStatus = createEmptyErrorStatus();

  /** Highest total tokens seen in any single billing block */
  private maxTokensPerSession = 0;

  /** Collection still running, possibly past its timeout */
  private inFlight: Promise<MonitoringSnapshot> | null = null;

  private readonly pool: Pick<SubprocessPool, 'run'>;
  private readonly tracker?: Pick<SessionActivityTracker, 'updateFromLogFiles' | 'getActiveSessions'>;
  private readonly now: () => Date;

  constructor(
    private readonly config: DaemonConfig,
    dependencies: DataCollectorDependencies
  ) {
    this.pool = dependencies.pool;
    this.tracker = dependencies.tracker;
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * Collects one snapshot, bounded by `collectTimeoutSeconds`.
   *
   * Every failure, including a timeout or a refusal because an earlier
   * collection is still running, is counted in the error status before the
   * CollectionError is thrown.
   */
  async collect(): Promise<MonitoringSnapshot> {
    if (this.inFlight) {
      const error = new CollectionError('Previous collection is still running');
      this.recordFailure(error);
      throw error;
    }

    const timeoutMs = this.config.collectTimeoutSeconds * 1000;
    const attempt = this.buildSnapshot();
    this.inFlight = attempt;
    const clear = (): void => {
      if (this.inFlight === attempt) {
        this.inFlight = null;
      }
    };
    void attempt.then(clear, clear);

    let snapshot: MonitoringSnapshot;
    try {
      snapshot = await withTimeout(attempt, timeoutMs, `Usage collection timed out after ${timeoutMs}ms`);
    } catch (error) {
      this.recordFailure(error);
      throw error instanceof CollectionError
        ? error
        : new CollectionError(`ccusage failed: ${errorMessage(error)}`, error);
    }

    if (this.errorStatus.consecutiveFailures > 0) {
      log(`DataCollector: recovered after ${this.errorStatus.consecutiveFailures} failure(s)`);
    }
    this.errorStatus = createEmptyErrorStatus();
    return snapshot;
  }

  getErrorStatus(): ErrorStatus {
    return { ...this.errorStatus };
  }

  updateMaxIfHigher(tokens: number): boolean {
    if (tokens <= this.maxTokensPerSession) {
      return false;
    }
    this.maxTokensPerSession = tokens;
    return true;
  }

  /**
   * Fetches the report and folds it into a snapshot.
   */
  private async buildSnapshot(): Promise<MonitoringSnapshot> {
    const blocks = await this.fetchBlocks();

    const now = this.now();
    const period = getBillingPeriod(now, this.config.billingStartDay);

    const currentSessions: UsageSession[] = [];
    for (const block of blocks) {
      if (block.isGap) continue;
      const session = toUsageSession(block);
      if (!session.isActive) {
        this.updateMaxIfHigher(session.totalTokens);
      }
      if (isWithinPeriod(session.startTime, period)) {
        currentSessions.push(session);
      }
    }

    const totalCost = currentSessions.reduce((sum, s) => sum + s.costUsd, 0);

    return {
      currentSessions,
      totalSessionsThisMonth: currentSessions.length,
      totalCostThisMonth: totalCost,
      maxTokensPerSession: this.maxTokensPerSession,
      lastUpdate: now,
      billingPeriodStart: period.start,
      billingPeriodEnd: period.end,
      activitySessions: await this.collectActivitySessions(),
    };
  }

  /**
   * Runs ccusage and returns the validated blocks.
   */
  private async fetchBlocks(): Promise<CcusageBlock[]> {
    const result = await this.pool.run(this.config.ccusageCommand, ['blocks', '--json'], {
      timeoutMs: this.config.collectTimeoutSeconds * 1000,
    });

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n')[0] || 'no output';
      throw new CollectionError(`ccusage exited with code ${result.exitCode}: ${detail}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch (error) {
      throw new CollectionError('ccusage returned invalid JSON', error);
    }

    const report = ccusageBlocksReportSchema.safeParse(parsed);
    if (!report.success) {
      const issue = report.error.issues[0];
      throw new CollectionError(
        `Unexpected ccusage report: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown shape'}`
      );
    }

    logDebug(`DataCollector: received ${report.data.blocks.length} blocks`);
    return report.data.blocks;
  }

  /**
   * Refreshes the tracker. A tracker failure leaves the previous sessions.
   */
  private async collectActivitySessions(): Promise<ActivitySession[]> {
    if (!this.tracker) {
      return [];
    }
    try {
      await this.tracker.updateFromLogFiles();
    } catch (error) {
      logError('DataCollector: failed to refresh activity sessions', error);
    }
    return this.tracker.getActiveSessions();
  }

  private recordFailure(error: unknown): void {
    this.errorStatus = {
      consecutiveFailures: this.errorStatus.consecutiveFailures + 1,
      errorMessage: errorMessage(error),
      lastFailureAt: this.now(),
    };
  }
}
