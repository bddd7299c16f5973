/**
 * @fileoverview Tests for SessionActivityTracker.
 *
 * Uses a real temp log file for discovery, mtime caching and truncation,
 * with a stub parser where the exact events matter.
 *
 * @module SessionActivityTracker.test
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { SessionActivityTracker } from './SessionActivityTracker';
import { HookLogParser, type ActivityEventParser } from './HookLogParser';
import type { ActivitySession } from '../types/activitySession';
import { logError } from './Logger';

vi.mock('./Logger', () => ({
  log: vi.fn(),
  logDebug: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

const NOW = new Date('2025-07-06T12:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

let tmpDir: string;
let logPath: string;

function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * HOUR_MS);
}

function notification(sessionId: string, startTime: Date): ActivitySession {
  return {
    projectName: 'my-app',
    sessionId,
    startTime,
    status: 'ACTIVE',
    eventType: 'notification',
    metadata: {},
  };
}

interface StubParser extends ActivityEventParser {
  parseLogFile: Mock<[string], Promise<ActivitySession[]>>;
}

function stubParser(events: ActivitySession[]): StubParser {
  return { parseLogFile: vi.fn(async (_filePath: string) => events) };
}

function createTracker(parser: ActivityEventParser): SessionActivityTracker {
  return new SessionActivityTracker({ logDirectory: tmpDir, parser, now: () => NOW });
}

function writeHookLog(content = '{"placeholder":true}\n'): void {
  fs.writeFileSync(logPath, content);
}

describe('SessionActivityTracker', () => {
  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'claude-monitor-tracker-test-'));
    logPath = path.join(tmpDir, 'claude_activity.log');
    vi.mocked(logError).mockClear();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('discoverLogFiles', () => {
    it('returns the hook log when it exists', async () => {
      writeHookLog();
      expect(await createTracker(stubParser([])).discoverLogFiles()).toEqual([logPath]);
    });

    it('returns nothing when the log is missing', async () => {
      expect(await createTracker(stubParser([])).discoverLogFiles()).toEqual([]);
    });

    it('ignores other files in the directory', async () => {
      fs.writeFileSync(path.join(tmpDir, 'other.log'), '');
      expect(await createTracker(stubParser([])).discoverLogFiles()).toEqual([]);
    });
  });

  describe('isCacheValid', () => {
    it('is invalid for a fresh tracker', async () => {
      writeHookLog();
      expect(await createTracker(stubParser([])).isCacheValid([logPath])).toBe(false);
    });

    it('holds after a refresh until the source changes', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([]));
      await tracker.updateFromLogFiles();

      expect(await tracker.isCacheValid([logPath])).toBe(true);

      const later = new Date(Date.now() + 60_000);
      fs.utimesSync(logPath, later, later);
      expect(await tracker.isCacheValid([logPath])).toBe(false);
    });

    it('is invalid for a source it has not seen', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([]));
      await tracker.updateFromLogFiles();

      expect(await tracker.isCacheValid([path.join(tmpDir, 'other.log')])).toBe(false);
    });
  });

  describe('updateFromLogFiles', () => {
    it('merges events into one session per id', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([
        notification('a', hoursAgo(2)),
        notification('b', hoursAgo(1)),
        notification('a', hoursAgo(0.5)),
      ]));

      expect(await tracker.updateFromLogFiles()).toBe(true);

      const sessions = tracker.getActiveSessions();
      expect(sessions.map(s => s.sessionId)).toEqual(['a', 'b']);
      expect(sessions[0].startTime).toEqual(hoursAgo(2));
    });

    it('skips parsing while the log is unchanged', async () => {
      writeHookLog();
      const parser = stubParser([notification('a', hoursAgo(1))]);
      const tracker = createTracker(parser);

      expect(await tracker.updateFromLogFiles()).toBe(true);
      expect(await tracker.updateFromLogFiles()).toBe(false);
      expect(parser.parseLogFile).toHaveBeenCalledTimes(1);
    });

    it('re-parses when the log modification time changes', async () => {
      writeHookLog();
      const parser = stubParser([notification('a', hoursAgo(1))]);
      const tracker = createTracker(parser);
      await tracker.updateFromLogFiles();

      const later = new Date(Date.now() + 60_000);
      fs.utimesSync(logPath, later, later);

      expect(await tracker.updateFromLogFiles()).toBe(true);
      expect(parser.parseLogFile).toHaveBeenCalledTimes(2);
    });

    it('picks up lines appended while the log was being parsed', async () => {
      writeHookLog(
        '{"timestamp":"2025-07-06T11:00:00Z","session_id":"a","event_type":"notification","project_name":"widget"}\n'
      );
      const realParser = new HookLogParser();
      let appended = false;
      const parser: ActivityEventParser = {
        parseLogFile: async (filePath) => {
          const events = await realParser.parseLogFile(filePath);
          if (!appended) {
            appended = true;
            fs.appendFileSync(
              filePath,
              '{"timestamp":"2025-07-06T11:30:00Z","session_id":"b","event_type":"stop","project_name":"widget"}\n'
            );
            const later = new Date(Date.now() + 60_000);
            fs.utimesSync(filePath, later, later);
          }
          return events;
        },
      };
      const tracker = createTracker(parser);

      await tracker.updateFromLogFiles();
      expect(tracker.getSessionById('b')).toBeNull();

      expect(await tracker.updateFromLogFiles()).toBe(true);
      expect(tracker.getSessionById('b')?.status).toBe('INACTIVE');
    });

    it('drops sessions past the 30 day retention', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([
        notification('old', new Date(NOW.getTime() - 35 * DAY_MS)),
        notification('recent', new Date(NOW.getTime() - 5 * DAY_MS)),
      ]));

      await tracker.updateFromLogFiles();

      expect(tracker.getActiveSessions().map(s => s.sessionId)).toEqual(['recent']);
    });

    it('treats a parse failure as zero events', async () => {
      writeHookLog();
      const parser: ActivityEventParser = {
        parseLogFile: vi.fn(async () => {
          throw new Error('disk on fire');
        }),
      };
      const tracker = createTracker(parser);

      expect(await tracker.updateFromLogFiles()).toBe(true);
      expect(tracker.getActiveSessions()).toEqual([]);
      expect(logError).toHaveBeenCalledTimes(1);
    });

    it('parses the real hook log format', async () => {
      writeHookLog([
        '{"timestamp":"2025-07-06T11:00:00Z","session_id":"s1","event_type":"notification","project_name":"widget"}',
        '{"timestamp":"2025-07-06T11:59:30Z","session_id":"s1","event_type":"stop","project_name":"widget"}',
        '',
      ].join('\n'));
      const tracker = new SessionActivityTracker({ logDirectory: tmpDir, now: () => NOW });

      await tracker.updateFromLogFiles();

      expect(tracker.getActiveSessions()).toEqual([{
        projectName: 'widget',
        sessionId: 's1',
        startTime: new Date('2025-07-06T11:00:00Z'),
        endTime: new Date('2025-07-06T11:59:30Z'),
        status: 'WAITING_FOR_USER',
        eventType: 'stop',
        metadata: {},
      }]);
    });
  });

  describe('cleanupCompletedBillingSessions', () => {
    it('keeps the log while a session is inside the billing window', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([
        notification('expired', hoursAgo(6)),
        notification('current', hoursAgo(2)),
      ]));
      await tracker.updateFromLogFiles();

      await tracker.cleanupCompletedBillingSessions();

      expect(tracker.getActiveSessions().map(s => s.sessionId)).toEqual(['current']);
      expect(fs.statSync(logPath).size).toBeGreaterThan(0);
      expect(tracker.getCacheState().lastCacheUpdate).toEqual(NOW);
    });

    it('leaves everything alone while all sessions are inside the window', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([
        notification('a', hoursAgo(4.5)),
        notification('b', hoursAgo(1)),
      ]));
      await tracker.updateFromLogFiles();

      await tracker.cleanupCompletedBillingSessions();

      expect(tracker.getActiveSessions().map(s => s.sessionId)).toEqual(['a', 'b']);
      expect(fs.readFileSync(logPath, 'utf-8')).toBe('{"placeholder":true}\n');
    });

    it('truncates the log and resets the cache once every session expired', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([
        notification('six', hoursAgo(6)),
        notification('seven', hoursAgo(7)),
      ]));
      await tracker.updateFromLogFiles();

      await tracker.cleanupCompletedBillingSessions();

      expect(tracker.getActiveSessions()).toEqual([]);
      expect(fs.statSync(logPath).size).toBe(0);
      expect(tracker.getCacheState()).toEqual({ trackedSources: 0, lastCacheUpdate: null });
    });

    it('truncates the log when there were no sessions at all', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([]));

      await tracker.cleanupCompletedBillingSessions();

      expect(fs.statSync(logPath).size).toBe(0);
    });

    it('forces a re-parse after truncation', async () => {
      writeHookLog();
      const parser = stubParser([notification('expired', hoursAgo(6))]);
      const tracker = createTracker(parser);
      await tracker.updateFromLogFiles();
      await tracker.cleanupCompletedBillingSessions();

      expect(await tracker.updateFromLogFiles()).toBe(true);
      expect(parser.parseLogFile).toHaveBeenCalledTimes(2);
    });

    it('does nothing to a missing log', async () => {
      const tracker = createTracker(stubParser([]));
      await expect(tracker.cleanupCompletedBillingSessions()).resolves.toBeUndefined();
      expect(fs.existsSync(logPath)).toBe(false);
    });
  });

  describe('queries', () => {
    it('getSessionById returns the session or null', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([notification('a', hoursAgo(1))]));
      await tracker.updateFromLogFiles();

      expect(tracker.getSessionById('a')?.sessionId).toBe('a');
      expect(tracker.getSessionById('missing')).toBeNull();
    });

    it('getSessionsForPeriod returns overlapping sessions', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([
        notification('morning', hoursAgo(4)),
        notification('noon', hoursAgo(0.5)),
      ]));
      await tracker.updateFromLogFiles();

      const sessions = tracker.getSessionsForPeriod(hoursAgo(1), NOW);

      // Both are still running (no end time), so both overlap
      expect(sessions.map(s => s.sessionId)).toEqual(['morning', 'noon']);
      expect(tracker.getSessionsForPeriod(hoursAgo(10), hoursAgo(5))).toEqual([]);
    });

    it('getActiveSessions returns a copy', async () => {
      writeHookLog();
      const tracker = createTracker(stubParser([notification('a', hoursAgo(1))]));
      await tracker.updateFromLogFiles();

      tracker.getActiveSessions().pop();
      expect(tracker.getActiveSessions()).toHaveLength(1);
    });
  });
});
