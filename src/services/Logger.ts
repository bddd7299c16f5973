/**
 * @fileoverview Simple logger that outputs to the console and an optional log file.
 */

import * as fs from 'fs';
import * as path from 'path';

/** Options accepted by {@link initLogger}. */
export interface LoggerOptions {
  /** File to append log lines to, in addition to the console */
  filePath?: string;
  /** Whether debug messages are emitted */
  verbose?: boolean;
}

let fileStream: fs.WriteStream | undefined;
let verboseEnabled = false;

/**
 * Initializes the logger. Calling it again replaces the previous settings.
 */
export function initLogger(options: LoggerOptions = {}): void {
  verboseEnabled = options.verbose ?? false;

  if (fileStream) {
    fileStream.end();
    fileStream = undefined;
  }

  if (options.filePath) {
    fs.mkdirSync(path.dirname(options.filePath), { recursive: true });
    const stream = fs.createWriteStream(options.filePath, { flags: 'a' });
    stream.on('error', (err) => {
      console.error(`[claude-monitor] log file error: ${err.message}`);
      if (fileStream === stream) {
        fileStream = undefined;
      }
    });
    fileStream = stream;
  }
}

/**
 * Flushes and closes the log file, if one is open.
 */
export function closeLogger(): Promise<void> {
  const stream = fileStream;
  fileStream = undefined;
  if (!stream) {
    return Promise.resolve();
  }
  return new Promise(resolve => stream.end(() => resolve()));
}

function format(level: string, message: string, args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const prefix = level ? `[${timestamp}] ${level}: ` : `[${timestamp}] `;
  return args.length > 0
    ? `${prefix}${message} ${JSON.stringify(args)}`
    : `${prefix}${message}`;
}

function write(formatted: string, toStderr: boolean): void {
  fileStream?.write(formatted + '\n');
  if (toStderr) {
    console.error(`[claude-monitor] ${formatted}`);
  } else {
    console.log(`[claude-monitor] ${formatted}`);
  }
}

/**
 * Logs an info message.
 */
export function log(message: string, ...args: unknown[]): void {
  write(format('', message, args), false);
}

/**
 * Logs a debug message. Dropped unless the logger is verbose.
 */
export function logDebug(message: string, ...args: unknown[]): void {
  if (!verboseEnabled) {
    return;
  }
  write(format('DEBUG', message, args), false);
}

/**
 * Logs a warning.
 */
export function logWarn(message: string, ...args: unknown[]): void {
  write(format('WARN', message, args), true);
}

/**
 * Logs an error message.
 */
export function logError(message: string, error?: unknown): void {
  let formatted = format('ERROR', message, []);
  if (error instanceof Error) {
    formatted += `\n  ${error.message}\n  ${error.stack}`;
  } else if (error) {
    formatted += `\n  ${JSON.stringify(error)}`;
  }
  write(formatted, true);
}
