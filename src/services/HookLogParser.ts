/**
 * @fileoverview Parser for the Claude Code hook activity log.
 *
 * The notification and stop hooks append one JSON record per event:
 *
 * ```json
 * {"timestamp":"2025-07-06T10:15:00Z","session_id":"abc","event_type":"stop",
 *  "project_name":"my-app","data":{"reason":"completed"}}
 * ```
 *
 * Each valid record becomes one raw {@link ActivitySession}. Invalid records
 * are skipped so one bad line never hides the rest of the file.
 *
 * @module services/HookLogParser
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  ACTIVITY_EVENT_TYPES,
  type ActivityEventType,
  type ActivitySession,
  type ActivitySessionStatus,
} from '../types/activitySession';
import { LogParseError, errorMessage } from '../types';
import { JsonlParser } from './JsonlParser';
import { logDebug } from './Logger';

/**
 * Turns one log source into raw activity events.
 */
export interface ActivityEventParser {
  /**
   * @throws LogParseError if the file cannot be read
   */
  parseLogFile(filePath: string): Promise<ActivitySession[]>;
}

const hookLogRecordSchema = z.object({
  timestamp: z.string().refine(value => !Number.isNaN(Date.parse(value)), {
    message: 'Invalid timestamp',
  }),
  session_id: z.string().min(1),
  event_type: z.enum(ACTIVITY_EVENT_TYPES),
  project_name: z.string().min(1).optional(),
  cwd: z.string().optional(),
  data: z.record(z.string(), z.unknown()).optional(),
});

/** One validated line of the hook log. */
export type HookLogRecord = z.infer<typeof hookLogRecordSchema>;

/** Status each hook event reports before merging */
const EVENT_STATUS: Record<ActivityEventType, ActivitySessionStatus> = {
  notification: 'ACTIVE',
  subagent_stop: 'ACTIVE',
  stop: 'STOPPED',
};

/**
 * Converts a validated hook record to a raw activity event.
 */
export function toActivitySession(record: HookLogRecord): ActivitySession {
  const timestamp = new Date(record.timestamp);
  const projectName = record.project_name
    || (record.cwd ? path.basename(record.cwd) : '')
    || 'unknown';

  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(record.data ?? {})) {
    metadata[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }

  return {
    projectName,
    sessionId: record.session_id,
    startTime: timestamp,
    ...(record.event_type === 'stop' ? { endTime: timestamp } : {}),
    status: EVENT_STATUS[record.event_type],
    eventType: record.event_type,
    metadata,
  };
}

/**
 * Streams a hook log file and returns its raw activity events in file order.
 */
export class HookLogParser implements ActivityEventParser {
  async parseLogFile(filePath: string): Promise<ActivitySession[]> {
    const events: ActivitySession[] = [];

    const parser = new JsonlParser({
      onRecord: (record) => {
        const result = hookLogRecordSchema.safeParse(record);
        if (!result.success) {
          logDebug(`HookLogParser: skipping invalid record in ${filePath}: ${result.error.issues[0]?.message}`);
          return;
        }
        events.push(toActivitySession(result.data));
      },
      onError: (error) => {
        logDebug(`HookLogParser: skipping malformed line in ${filePath}: ${error.message}`);
      },
    });

    await new Promise<void>((resolve, reject) => {
      const stream = fs.createReadStream(filePath, { encoding: 'utf8' });
      stream.on('data', (chunk) => parser.processChunk(String(chunk)));
      stream.on('end', () => {
        parser.flush();
        resolve();
      });
      stream.on('error', (error) => {
        reject(new LogParseError(`Failed to read ${filePath}: ${errorMessage(error)}`, filePath));
      });
    });

    const stats = parser.getStats();
    logDebug(`HookLogParser: ${events.length} events from ${stats.parsed} records in ${filePath}`);
    return events;
  }
}
