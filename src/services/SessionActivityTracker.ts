/**
 * @fileoverview Tracks Claude Code activity sessions from the hook log.
 *
 * The tracker discovers the hook activity log, re-parses it only when its
 * modification time changes, merges raw events into one session per id,
 * and evicts sessions by age. Once a 5-hour billing window has fully closed
 * it also truncates the log so it cannot grow without bound.
 *
 * All state is owned by the daemon's worker loop; nothing here is safe to
 * call concurrently with itself.
 *
 * @module services/SessionActivityTracker
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ActivitySession } from '../types/activitySession';
import { mergeActivityEvents } from '../utils/sessionMerge';
import { HOOK_LOG_DIR, HOOK_LOG_FILE_NAME } from '../utils/paths';
import { HookLogParser, type ActivityEventParser } from './HookLogParser';
import { log, logDebug, logError } from './Logger';

/** Sessions older than this are dropped on every refresh (30 days) */
export const SESSION_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

/** Length of a Claude billing window (5 hours) */
export const BILLING_WINDOW_MS = 5 * 60 * 60 * 1000;

/**
 * Options for SessionActivityTracker constructor.
 */
export interface SessionActivityTrackerOptions {
  /** Directory holding the hook log (default: /tmp/claude-monitor) */
  logDirectory?: string;
  /** Hook log file name (default: claude_activity.log) */
  logFileName?: string;
  /** Event parser (default: {@link HookLogParser}) */
  parser?: ActivityEventParser;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

/**
 * Diagnostic view of the modification-time cache.
 */
export interface TrackerCacheState {
  /** Number of sources with a recorded modification time */
  trackedSources: number;
  /** When the cache was last refreshed, or null if cold */
  lastCacheUpdate: Date | null;
}

/**
 * Maintains the list of current activity sessions.
 *
 * @example
 * ```typescript
 * const tracker = new SessionActivityTracker();
 * await tracker.updateFromLogFiles();
 * for (const session of tracker.getActiveSessions()) {
 *   console.log(`${session.projectName}: ${session.status}`);
 * }
 * await tracker.cleanupCompletedBillingSessions();
 * ```
 */
export class SessionActivityTracker {
  /** Consolidated sessions, in order of first appearance in the log */
  private activeSessions: ActivitySession[] = [];

  /** Last seen modification time (ms) per log source */
  private fileModificationTimes = new Map<string, number>();

  /** When the cache was last refreshed; null forces a full re-parse */
  private lastCacheUpdate: Date | null = null;

  private readonly logDirectory: string;
  private readonly logFileName: string;
  private readonly parser: ActivityEventParser;
  private readonly now: () => Date;

  constructor(options: SessionActivityTrackerOptions = {}) {
    this.logDirectory = options.logDirectory ?? HOOK_LOG_DIR;
    this.logFileName = options.logFileName ?? HOOK_LOG_FILE_NAME;
    this.parser = options.parser ?? new HookLogParser();
    this.now = options.now ?? (() => new Date());
    logDebug(`SessionActivityTracker watching ${path.join(this.logDirectory, this.logFileName)}`);
  }

  /**
   * Returns the configured log sources that currently exist.
   *
   * Only the single hook log is considered; other files in the directory
   * are ignored and a missing log is not an error.
   */
  async discoverLogFiles(): Promise<string[]> {
    const logPath = path.join(this.logDirectory, this.logFileName);
    try {
      const stat = await fs.promises.stat(logPath);
      return stat.isFile() ? [logPath] : [];
    } catch {
      return [];
    }
  }

  /**
   * Checks whether the parsed state still reflects the given sources.
   *
   * Valid only if the cache has been refreshed and every source's current
   * modification time equals the recorded one.
   */
  async isCacheValid(sources: readonly string[]): Promise<boolean> {
    if (this.lastCacheUpdate === null) {
      return false;
    }

    for (const source of sources) {
      const cached = this.fileModificationTimes.get(source);
      if (cached === undefined) {
        return false;
      }
      const current = await this.getModificationTime(source);
      if (current === null || current !== cached) {
        return false;
      }
    }

    return true;
  }

  /**
   * Re-parses the log sources when the cache is stale.
   *
   * @returns true if the sources were re-parsed, false if the cache was valid
   */
  async updateFromLogFiles(): Promise<boolean> {
    const sources = await this.discoverLogFiles();

    if (await this.isCacheValid(sources)) {
      logDebug('SessionActivityTracker: cache valid, skipping parse');
      return false;
    }

    const events: ActivitySession[] = [];
    const modificationTimes = new Map<string, number>();
    for (const source of sources) {
      // Taken before parsing, so a line appended mid-parse invalidates the cache
      const mtime = await this.getModificationTime(source);
      events.push(...await this.processLogFile(source));
      if (mtime !== null) {
        modificationTimes.set(source, mtime);
      }
    }

    this.activeSessions = mergeActivityEvents(events, this.now());
    this.cleanupOldSessions();
    this.fileModificationTimes = modificationTimes;
    this.lastCacheUpdate = this.now();

    logDebug(`SessionActivityTracker: ${events.length} events merged into ${this.activeSessions.length} sessions`);
    return true;
  }

  /**
   * Parses one source. A failure contributes zero events.
   */
  private async processLogFile(filePath: string): Promise<ActivitySession[]> {
    try {
      return await this.parser.parseLogFile(filePath);
    } catch (error) {
      logError(`SessionActivityTracker: failed to parse ${filePath}`, error);
      return [];
    }
  }

  /**
   * Drops sessions that started more than 30 days ago.
   */
  cleanupOldSessions(): void {
    const cutoff = this.now().getTime() - SESSION_RETENTION_MS;
    const before = this.activeSessions.length;
    this.activeSessions = this.activeSessions.filter(s => s.startTime.getTime() >= cutoff);

    const removed = before - this.activeSessions.length;
    if (removed > 0) {
      log(`SessionActivityTracker: removed ${removed} session(s) past retention`);
    }
  }

  /**
   * Drops sessions that started outside the current 5-hour billing window.
   *
   * When no session survives, the hook log is truncated to zero bytes and
   * the cache is reset so the next refresh starts cold. While any session
   * remains the log is left untouched, even if some sessions were dropped.
   */
  async cleanupCompletedBillingSessions(): Promise<void> {
    const cutoff = this.now().getTime() - BILLING_WINDOW_MS;
    const before = this.activeSessions.length;
    this.activeSessions = this.activeSessions.filter(s => s.startTime.getTime() >= cutoff);

    const removed = before - this.activeSessions.length;
    if (removed > 0) {
      log(`SessionActivityTracker: removed ${removed} session(s) outside the billing window`);
    }

    if (this.activeSessions.length > 0) {
      return;
    }

    for (const source of await this.discoverLogFiles()) {
      await fs.promises.truncate(source, 0);
      logDebug(`SessionActivityTracker: truncated ${source}`);
    }

    this.fileModificationTimes.clear();
    this.lastCacheUpdate = null;
  }

  /**
   * Returns the current sessions without any filtering.
   */
  getActiveSessions(): ActivitySession[] {
    return [...this.activeSessions];
  }

  /**
   * Returns sessions whose lifetime overlaps the given period.
   *
   * A session without an end time is treated as running until now.
   */
  getSessionsForPeriod(start: Date, end: Date): ActivitySession[] {
    const now = this.now().getTime();
    return this.activeSessions.filter(session => {
      const sessionEnd = session.endTime ? session.endTime.getTime() : now;
      return session.startTime.getTime() <= end.getTime() && sessionEnd >= start.getTime();
    });
  }

  /**
   * Finds a session by id.
   *
   * @returns The first matching session, or null if not found
   */
  getSessionById(sessionId: string): ActivitySession | null {
    return this.activeSessions.find(s => s.sessionId === sessionId) ?? null;
  }

  /**
   * Returns a snapshot of the cache for diagnostics.
   */
  getCacheState(): TrackerCacheState {
    return {
      trackedSources: this.fileModificationTimes.size,
      lastCacheUpdate: this.lastCacheUpdate,
    };
  }

  private async getModificationTime(filePath: string): Promise<number | null> {
    try {
      return (await fs.promises.stat(filePath)).mtimeMs;
    } catch {
      return null;
    }
  }
}
