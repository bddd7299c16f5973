/**
 * @fileoverview Bounded pool for running external commands.
 *
 * ccusage and the desktop notification commands all run through one shared
 * pool, so a burst of work never spawns more than a handful of children and
 * the daemon can kill everything it started on shutdown.
 *
 * @module services/SubprocessPool
 */

import { spawn, type ChildProcess } from 'child_process';
import { TimeoutError } from '../types';
import { log, logDebug } from './Logger';

/**
 * Output of a finished command.
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  /** Exit code, or null if the process was killed by a signal */
  exitCode: number | null;
}

/**
 * Options for a single command.
 */
export interface RunOptions {
  /** Kill the child and reject after this many milliseconds (default: 30000) */
  timeoutMs?: number;
}

interface QueuedCommand {
  command: string;
  args: string[];
  options: RunOptions;
  resolve: (result: CommandResult) => void;
  reject: (error: Error) => void;
}

/** Default per-command timeout (30 seconds) */
const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Runs commands with a concurrency limit and per-command timeouts.
 *
 * @example
 * ```typescript
 * const pool = getSubprocessPool();
 * const { stdout } = await pool.run('ccusage', ['blocks', '--json'], { timeoutMs: 60_000 });
 * ```
 */
export class SubprocessPool {
  private readonly running = new Set<ChildProcess>();
  private queue: QueuedCommand[] = [];

  constructor(private readonly maxConcurrent: number = 4) {}

  /** Number of children currently running */
  get activeCount(): number {
    return this.running.size;
  }

  /** Number of commands waiting for a free slot */
  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Runs a command and collects its output.
   *
   * Resolves for any exit code; callers decide what a non-zero exit means.
   *
   * @throws TimeoutError if the command outlives its timeout
   */
  run(command: string, args: string[] = [], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      this.queue.push({ command, args, options, resolve, reject });
      this.drain();
    });
  }

  /**
   * Kills running children and rejects queued commands.
   *
   * The pool stays usable; later calls to {@link run} spawn normally.
   */
  stop(): void {
    const queued = this.queue;
    this.queue = [];
    for (const item of queued) {
      item.reject(new Error(`Subprocess pool stopped before running ${item.command}`));
    }

    for (const child of this.running) {
      child.kill('SIGTERM');
    }

    log(`SubprocessPool stopped (${this.running.size} running, ${queued.length} queued)`);
  }

  private drain(): void {
    while (this.running.size < this.maxConcurrent && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next) {
        this.execute(next);
      }
    }
  }

  private execute(item: QueuedCommand): void {
    const { command, args, options } = item;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    logDebug(`SubprocessPool: running ${command} ${args.join(' ')}`);

    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.running.add(child);

    const chunks: Buffer[] = [];
    const errorChunks: Buffer[] = [];
    let settled = false;

    const finish = (outcome: { result: CommandResult } | { error: Error }): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      this.running.delete(child);
      if ('result' in outcome) {
        item.resolve(outcome.result);
      } else {
        item.reject(outcome.error);
      }
      this.drain();
    };

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      finish({ error: new TimeoutError(`${command} timed out after ${timeoutMs}ms`, timeoutMs) });
    }, timeoutMs);

    child.stdout?.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    child.stderr?.on('data', (chunk: Buffer) => {
      errorChunks.push(chunk);
    });

    child.on('close', (code) => {
      finish({
        result: {
          stdout: Buffer.concat(chunks).toString('utf8'),
          stderr: Buffer.concat(errorChunks).toString('utf8'),
          exitCode: code,
        },
      });
    });

    child.on('error', (error) => {
      finish({ error });
    });
  }
}

let sharedPool: SubprocessPool | null = null;

/**
 * Returns the process-wide pool, creating it on first use.
 */
export function getSubprocessPool(): SubprocessPool {
  if (!sharedPool) {
    sharedPool = new SubprocessPool();
  }
  return sharedPool;
}
