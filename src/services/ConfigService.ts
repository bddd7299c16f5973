/**
 * @fileoverview Loads the daemon configuration file.
 *
 * A missing file is not an error: every field has a default. A file that
 * cannot be read or does not validate is reported and the defaults are used
 * instead, so a typo never keeps the daemon from starting.
 *
 * @module services/ConfigService
 */

import * as fs from 'fs';
import * as path from 'path';
import { createConfig, daemonConfigSchema, type DaemonConfig } from '../types/config';
import { errorMessage } from '../types';
import { CONFIG_FILE_NAME, expandHome, getConfigDir } from '../utils/paths';
import { log, logError } from './Logger';

/**
 * Gets the default configuration file path.
 */
export function getDefaultConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

/**
 * Loads and validates the configuration.
 *
 * @param filePath - Config file; `~` is expanded (default: {@link getDefaultConfigPath})
 */
export async function loadConfig(filePath: string = getDefaultConfigPath()): Promise<DaemonConfig> {
  const resolved = expandHome(filePath);

  let content: string;
  try {
    content = await fs.promises.readFile(resolved, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      log(`No config file at ${resolved}, using defaults`);
    } else {
      logError(`Failed to read config file ${resolved}, using defaults`, error);
    }
    return createConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logError(`Config file ${resolved} is not valid JSON, using defaults: ${errorMessage(error)}`);
    return createConfig();
  }

  const result = daemonConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    logError(`Invalid config file ${resolved}, using defaults: ${issues}`);
    return createConfig();
  }

  log(`Loaded config from ${resolved}`);
  return {
    ...result.data,
    hookLogDirectory: expandHome(result.data.hookLogDirectory),
    dataFilePath: expandHome(result.data.dataFilePath),
    logFilePath: result.data.logFilePath === undefined ? undefined : expandHome(result.data.logFilePath),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
