#!/usr/bin/env node
/**
 * @fileoverview Command line entry point for the monitoring daemon.
 *
 * Runs in the foreground until SIGINT or SIGTERM; a process supervisor
 * (launchd, systemd) is expected to keep it alive.
 *
 * @module main
 */

import { parseArgs } from 'util';
import { loadConfig } from './services/ConfigService';
import { closeLogger, initLogger, log, logError } from './services/Logger';
import { createMonitorDaemon } from './services/MonitorDaemon';
import { errorMessage } from './types';

export const USAGE = `Usage: claude-monitor-daemon [options]

Monitors Claude usage in the background and writes a snapshot for display clients.

Options:
  -c, --config <path>    Config file (default: ~/.config/claude-monitor/config.json)
  -l, --log-file <path>  Append log output to this file
  -v, --verbose          Enable debug logging
  -h, --help             Show this help`;

/** Parsed command line */
export interface CliOptions {
  configPath?: string;
  logFile?: string;
  verbose: boolean;
  help: boolean;
}

/**
 * Parses command line arguments (without the node and script entries).
 *
 * @throws TypeError on unknown options or missing option values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      'log-file': { type: 'string', short: 'l' },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    configPath: values.config,
    logFile: values['log-file'],
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

/**
 * Runs the daemon until it is stopped.
 *
 * @returns Process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(`claude-monitor-daemon: ${errorMessage(error)}\n`);
    console.error(USAGE);
    return 2;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = await loadConfig(options.configPath);
  initLogger({
    filePath: options.logFile ?? config.logFilePath,
    verbose: options.verbose || config.verbose,
  });

  const daemon = createMonitorDaemon(config);
  try {
    daemon.start();
    await daemon.waitUntilStopped();
    log('Daemon exited');
    return 0;
  } finally {
    daemon.dispose();
    await closeLogger();
  }
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    error => {
      logError('Fatal error', error);
      process.exitCode = 1;
    }
  );
}
