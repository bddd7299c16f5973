/**
 * @fileoverview Daemon configuration schema and defaults.
 *
 * The configuration file is plain JSON; every field is optional and falls
 * back to the default listed here.
 *
 * @module types/config
 */

import * as path from 'path';
import { z } from 'zod';
import { DATA_FILE_NAME, HOOK_LOG_DIR, getConfigDir } from '../utils/paths';

const notificationSettingsSchema = z.object({
  /** Master switch for desktop notifications */
  enabled: z.boolean().default(true),
  /** Minimum seconds between two notifications of the same kind */
  throttleSeconds: z.number().int().min(0).default(300),
});

/**
 * Schema of the on-disk configuration file.
 */
export const daemonConfigSchema = z.object({
  /** Seconds between two collection cycles */
  collectionIntervalSeconds: z.number().positive().default(10),
  /** Upper bound for a single collector call */
  collectTimeoutSeconds: z.number().positive().default(60),
  /** Warn when an active billing block ends within this many minutes */
  timeRemainingAlertMinutes: z.number().int().min(0).default(30),
  /** Interval for the long-running session reminder */
  inactivityAlertMinutes: z.number().int().positive().default(10),
  /** Day of month the billing period starts on */
  billingStartDay: z.number().int().min(1).max(28).default(1),
  /** Command used to invoke ccusage */
  ccusageCommand: z.string().min(1).default('ccusage'),
  /** Directory holding the hook activity log */
  hookLogDirectory: z.string().min(1).default(HOOK_LOG_DIR),
  /** Where the snapshot is written */
  dataFilePath: z.string().min(1).default(path.join(getConfigDir(), DATA_FILE_NAME)),
  notifications: notificationSettingsSchema.default({}),
  /** Optional file the logger appends to */
  logFilePath: z.string().min(1).optional(),
  /** Enables debug logging */
  verbose: z.boolean().default(false),
});

/** Fully resolved daemon configuration. */
export type DaemonConfig = z.infer<typeof daemonConfigSchema>;

/** Configuration as written by the user, before defaults apply. */
export type DaemonConfigInput = z.input<typeof daemonConfigSchema>;

/**
 * Builds a configuration from partial input, applying every default.
 *
 * @throws ZodError if a provided value is invalid
 */
export function createConfig(input: DaemonConfigInput = {}): DaemonConfig {
  return daemonConfigSchema.parse(input);
}
