/**
 * @fileoverview Well-known filesystem locations used by the daemon.
 *
 * Storage location:
 * - Linux/Mac: ~/.config/claude-monitor/
 * - Windows: %APPDATA%/claude-monitor/
 *
 * @module utils/paths
 */

import * as os from 'os';
import * as path from 'path';

/** Directory the Claude Code hooks append activity events to */
export const HOOK_LOG_DIR = process.platform === 'win32'
  ? path.join(os.tmpdir(), 'claude-monitor')
  : '/tmp/claude-monitor';

/** Name of the single activity log written by the hooks */
export const HOOK_LOG_FILE_NAME = 'claude_activity.log';

/** File name of the persisted snapshot */
export const DATA_FILE_NAME = 'monitor_data.json';

/** File name of the daemon configuration */
export const CONFIG_FILE_NAME = 'config.json';

/**
 * Gets the per-user configuration directory based on platform.
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), 'claude-monitor');
  }
  return path.join(os.homedir(), '.config', 'claude-monitor');
}

/**
 * Expands a leading `~` to the user's home directory.
 */
export function expandHome(filePath: string): string {
  return filePath.replace(/^~(?=$|[\\/])/, os.homedir());
}
