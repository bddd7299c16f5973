/**
 * @fileoverview Persistence of the monitoring snapshot for display clients.
 *
 * The daemon rewrites the snapshot file once per cycle; display clients read
 * it on their own schedule. Writes go to a temp file that is renamed over the
 * target, so a reader never sees a half-written snapshot.
 *
 * Storage location:
 * - Linux/Mac: ~/.config/claude-monitor/monitor_data.json
 * - Windows: %APPDATA%/claude-monitor/monitor_data.json
 *
 * @module services/DataFileManager
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  SNAPSHOT_SCHEMA_VERSION,
  monitoringSnapshotRecordSchema,
  type MonitoringSnapshotRecord,
} from '../types/monitoring';
import { DATA_FILE_NAME, getConfigDir } from '../utils/paths';
import { errorMessage } from '../types';
import { log, logDebug, logError } from './Logger';

/**
 * Destination for persisted snapshots.
 */
export interface SnapshotWriter {
  /**
   * @returns true if the record was written
   */
  writeMonitoringData(record: MonitoringSnapshotRecord): Promise<boolean>;
}

/**
 * Reads and writes the snapshot file.
 */
export class DataFileManager implements SnapshotWriter {
  constructor(private readonly dataFilePath: string = path.join(getConfigDir(), DATA_FILE_NAME)) {}

  /** Path of the snapshot file */
  get filePath(): string {
    return this.dataFilePath;
  }

  /**
   * Writes the record atomically via temp file and rename.
   *
   * Never throws; failures are logged and reported as false.
   */
  async writeMonitoringData(record: MonitoringSnapshotRecord): Promise<boolean> {
    const tmpPath = this.dataFilePath + '.tmp';
    try {
      await fs.promises.mkdir(path.dirname(this.dataFilePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, JSON.stringify(record, null, 2), 'utf-8');
      await fs.promises.rename(tmpPath, this.dataFilePath);
      return true;
    } catch (error) {
      logError(`Failed to write monitoring data to ${this.dataFilePath}`, error);
      await fs.promises.rm(tmpPath, { force: true }).catch(cleanupError => {
        logDebug(`Could not remove ${tmpPath}: ${errorMessage(cleanupError)}`);
      });
      return false;
    }
  }

  /**
   * Reads the last persisted record.
   *
   * @returns The record, or null if the file is missing or invalid
   */
  async readMonitoringData(): Promise<MonitoringSnapshotRecord | null> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.dataFilePath, 'utf-8');
    } catch {
      return null;
    }

    try {
      const result = monitoringSnapshotRecordSchema.safeParse(JSON.parse(content));
      if (!result.success) {
        log(`Ignoring invalid monitoring data in ${this.dataFilePath}`);
        return null;
      }
      if (result.data.schemaVersion !== SNAPSHOT_SCHEMA_VERSION) {
        log(`Monitoring data schema version mismatch: ${result.data.schemaVersion} vs ${SNAPSHOT_SCHEMA_VERSION}`);
      }
      return result.data;
    } catch (error) {
      logError(`Failed to parse monitoring data in ${this.dataFilePath}`, error);
      return null;
    }
  }
}
