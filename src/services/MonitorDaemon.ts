/**
 * @fileoverview Background daemon that drives the collection cycle.
 *
 * The daemon owns one worker loop on the event loop. Every tick it checks
 * whether a collection is due and, if so, runs one cycle: collect a usage
 * snapshot, persist it, clean up activity sessions and evaluate alert
 * conditions. No failure inside a cycle stops the loop.
 *
 * Lifecycle:
 * - `start()` and `stop()` are idempotent
 * - SIGINT and SIGTERM request a graceful `stop()`
 * - `stop()` waits a bounded time for the worker, then stops the shared
 *   subprocess pool
 *
 * @module services/MonitorDaemon
 */

import type { DaemonConfig } from '../types/config';
import type { ErrorStatus, MonitoringSnapshot } from '../types/monitoring';
import { toSnapshotRecord } from '../types/monitoring';
import { CollectionError, TimeoutError } from '../types';
import { Ticker } from '../utils/ticker';
import { withTimeout } from '../utils/timeout';
import { DataCollector, type UsageCollector } from './DataCollector';
import { DataFileManager, type SnapshotWriter } from './DataFileManager';
import {
  DesktopNotificationChannel,
  NotificationManager,
  type Notifier,
} from './NotificationManager';
import { SessionActivityTracker } from './SessionActivityTracker';
import { getSubprocessPool, type SubprocessPool } from './SubprocessPool';
import { log, logDebug, logError, logWarn } from './Logger';

/**
 * Anything signal listeners can be attached to (normally `process`).
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Collaborators of the daemon.
 */
export interface MonitorDaemonDependencies {
  collector: UsageCollector;
  writer: SnapshotWriter;
  notifier: Notifier;
  tracker: Pick<SessionActivityTracker, 'cleanupCompletedBillingSessions'>;
  subprocessPool: Pick<SubprocessPool, 'stop'>;
  /** Where shutdown signals come from; null skips signal handling (default: process) */
  signals?: SignalSource | null;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

/**
 * Timing knobs. The defaults are what the daemon runs with.
 */
export interface MonitorDaemonOptions {
  /** Loop tick (default: 100ms) */
  tickIntervalMs?: number;
  /** Pause after an error escapes a cycle (default: 1000ms) */
  errorBackoffMs?: number;
  /** Longest `stop()` waits for the worker (default: 5000ms) */
  stopTimeoutMs?: number;
}

/** Lifecycle state; the only mutable lifecycle field */
type DaemonState =
  | { status: 'stopped' }
  | { status: 'running'; ticker: Ticker; worker: Promise<void> };

/** Signals that trigger a graceful shutdown */
const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** Error notifications start once failures exceed this count */
export const ERROR_NOTIFICATION_THRESHOLD = 5;

/** Sessions must run this long before inactivity reminders start */
const INACTIVITY_MIN_SESSION_MINUTES = 60;

/** Reminders also wait for this many inactivity intervals */
const INACTIVITY_MIN_INTERVALS = 6;

/**
 * Background monitoring daemon.
 *
 * @example
 * ```typescript
 * const daemon = createMonitorDaemon(await loadConfig());
 * daemon.start();
 * // ...
 * await daemon.stop();
 * daemon.dispose();
 * ```
 */
export class MonitorDaemon {
  private state: DaemonState = { status: 'stopped' };

  private readonly collector: UsageCollector;
  private readonly writer: SnapshotWriter;
  private readonly notifier: Notifier;
  private readonly tracker: Pick<SessionActivityTracker, 'cleanupCompletedBillingSessions'>;
  private readonly subprocessPool: Pick<SubprocessPool, 'stop'>;
  private readonly signals: SignalSource | null;
  private readonly now: () => Date;

  private readonly tickIntervalMs: number;
  private readonly errorBackoffMs: number;
  private readonly stopTimeoutMs: number;

  /** Completion of the last stop() */
  private pendingStop: Promise<void> = Promise.resolve();

  /** Registered signal listeners, removed on dispose */
  private signalListeners: Array<[NodeJS.Signals, () => void]> = [];

  constructor(
    readonly config: DaemonConfig,
    dependencies: MonitorDaemonDependencies,
    options: MonitorDaemonOptions = {}
  ) {
    this.collector = dependencies.collector;
    this.writer = dependencies.writer;
    this.notifier = dependencies.notifier;
    this.tracker = dependencies.tracker;
    this.subprocessPool = dependencies.subprocessPool;
    this.signals = dependencies.signals === undefined ? process : dependencies.signals;
    this.now = dependencies.now ?? (() => new Date());

    this.tickIntervalMs = options.tickIntervalMs ?? 100;
    this.errorBackoffMs = options.errorBackoffMs ?? 1000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;

    this.setupSignalHandlers();

    log(`Daemon initialized with collection interval: ${config.collectionIntervalSeconds}s`);
  }

  /** Whether the worker loop is running */
  get isRunning(): boolean {
    return this.state.status === 'running';
  }

  /**
   * Starts the worker loop. Does nothing if already running.
   */
  start(): void {
    if (this.state.status === 'running') {
      logWarn('Daemon is already running');
      return;
    }

    log('Starting daemon...');
    const ticker = new Ticker(this.tickIntervalMs);

    // Deferred by a microtask so start() itself never runs a cycle
    const worker = Promise.resolve()
      .then(() => this.runLoop(ticker))
      .catch(error => {
        logError('Daemon worker terminated unexpectedly', error);
        if (this.state.status === 'running' && this.state.ticker === ticker) {
          this.state = { status: 'stopped' };
        }
      });

    this.state = { status: 'running', ticker, worker };
    log('Daemon started successfully');
  }

  /**
   * Stops the worker loop and the subprocess pool. Does nothing if stopped.
   *
   * Never rejects: a worker that outlives the timeout is reported and left
   * behind.
   */
  async stop(): Promise<void> {
    if (this.state.status !== 'running') {
      return this.pendingStop;
    }

    const { ticker, worker } = this.state;
    this.state = { status: 'stopped' };
    ticker.cancel();
    this.pendingStop = this.shutdown(worker);
    return this.pendingStop;
  }

  /**
   * Resolves once the daemon has stopped, including pool shutdown when the
   * stop came from {@link stop}.
   */
  async waitUntilStopped(): Promise<void> {
    while (this.state.status === 'running') {
      await this.state.worker;
    }
    await this.pendingStop;
  }

  /**
   * Removes signal listeners. Call after {@link stop} when discarding the daemon.
   */
  dispose(): void {
    for (const [signal, listener] of this.signalListeners) {
      this.signals?.off(signal, listener);
    }
    this.signalListeners = [];
  }

  /**
   * Runs one collection cycle. Normally called by the worker loop.
   *
   * The collector bounds each collection in time and counts every failure;
   * those failures are handled here. Any other error propagates to the
   * loop's guard.
   */
  async runCollectionCycle(): Promise<void> {
    let snapshot: MonitoringSnapshot;
    try {
      logDebug('Collecting monitoring data...');
      snapshot = await this.collector.collect();
    } catch (error) {
      if (error instanceof CollectionError) {
        this.handleCollectionFailure(error);
        return;
      }
      throw error;
    }

    log(`Collected ${snapshot.currentSessions.length} sessions, total cost: $${snapshot.totalCostThisMonth.toFixed(4)}`);

    await this.persistSnapshot(snapshot);
    await this.cleanupActivitySessions();
    this.checkNotificationConditions(snapshot);
  }

  private setupSignalHandlers(): void {
    if (!this.signals) {
      return;
    }
    for (const signal of SHUTDOWN_SIGNALS) {
      const listener = (): void => this.handleSignal(signal);
      this.signals.on(signal, listener);
      this.signalListeners.push([signal, listener]);
    }
  }

  /**
   * Requests a stop. Teardown itself happens in {@link stop}.
   */
  private handleSignal(signal: NodeJS.Signals): void {
    log(`Received ${signal}, shutting down gracefully...`);
    this.stop().catch(error => logError(`Failed to stop after ${signal}`, error));
  }

  private async shutdown(worker: Promise<void>): Promise<void> {
    log('Stopping daemon...');

    try {
      await withTimeout(worker, this.stopTimeoutMs, `Daemon worker did not stop within ${this.stopTimeoutMs}ms`);
      log('Daemon stopped successfully');
    } catch (error) {
      logWarn(error instanceof TimeoutError ? error.message : 'Daemon worker failed while stopping');
    }

    try {
      this.subprocessPool.stop();
      log('Subprocess pool shut down successfully');
    } catch (error) {
      logError('Error shutting down subprocess pool', error);
    }
  }

  private async runLoop(ticker: Ticker): Promise<void> {
    log('Daemon main loop started');

    const intervalMs = this.config.collectionIntervalSeconds * 1000;
    let lastCollectionAt: number | null = null;

    while (!ticker.cancelled) {
      try {
        const cycleStart = this.now().getTime();
        if (lastCollectionAt === null || cycleStart - lastCollectionAt >= intervalMs) {
          await this.runCollectionCycle();
          lastCollectionAt = cycleStart;
        }
        await ticker.wait();
      } catch (error) {
        logError('Error in daemon main loop', error);
        await ticker.wait(this.errorBackoffMs);
      }
    }

    log('Daemon main loop stopped');
  }

  private async persistSnapshot(snapshot: MonitoringSnapshot): Promise<void> {
    try {
      const saved = await this.writer.writeMonitoringData(toSnapshotRecord(snapshot));
      if (saved) {
        logDebug('Data saved to file successfully');
      } else {
        logWarn('Failed to save data to file');
      }
    } catch (error) {
      logError('Error saving data to file', error);
    }
  }

  private async cleanupActivitySessions(): Promise<void> {
    try {
      await this.tracker.cleanupCompletedBillingSessions();
      logDebug('Activity session cleanup completed');
    } catch (error) {
      logError('Error during activity session cleanup', error);
    }
  }

  private handleCollectionFailure(error: CollectionError): void {
    const status = this.collector.getErrorStatus();
    if (status.consecutiveFailures > ERROR_NOTIFICATION_THRESHOLD) {
      logWarn(`Data collection has failed ${status.consecutiveFailures} consecutive times`);
      this.sendErrorNotification(status);
    } else {
      logError('Data collection failed', error);
    }
  }

  private sendErrorNotification(status: ErrorStatus): void {
    try {
      const message = `${status.consecutiveFailures} consecutive failures: ${status.errorMessage ?? 'unknown error'}`;
      this.notifier.sendErrorNotification(message);
    } catch (error) {
      logError('Failed to send error notification', error);
    }
  }

  /**
   * Evaluates alert conditions for every active billing block.
   *
   * The inactivity reminder uses the block start as a stand-in for the
   * last activity; ccusage reports no per-message timestamps here.
   */
  private checkNotificationConditions(snapshot: MonitoringSnapshot): void {
    try {
      const now = this.now().getTime();
      const inactivityMinutes = this.config.inactivityAlertMinutes;

      for (const session of snapshot.currentSessions) {
        if (!session.isActive || !session.endTime) {
          continue;
        }

        if (this.collector.updateMaxIfHigher(session.totalTokens)) {
          log(`New maximum tokens found during active session: ${session.totalTokens.toLocaleString('en-US')}`);
        }

        const minutesRemaining = Math.trunc((session.endTime.getTime() - now) / 60_000);
        if (minutesRemaining > 0 && minutesRemaining <= this.config.timeRemainingAlertMinutes) {
          this.notifier.sendTimeWarning(minutesRemaining);
        }

        const minutesSinceStart = Math.trunc((now - session.startTime.getTime()) / 60_000);
        if (
          minutesSinceStart >= INACTIVITY_MIN_SESSION_MINUTES &&
          minutesSinceStart % inactivityMinutes === 0 &&
          minutesSinceStart >= inactivityMinutes * INACTIVITY_MIN_INTERVALS
        ) {
          this.notifier.sendInactivityAlert(minutesSinceStart - INACTIVITY_MIN_SESSION_MINUTES);
        }
      }
    } catch (error) {
      logError('Error checking notification conditions', error);
    }
  }
}

/**
 * Builds a daemon with the production collaborators.
 */
export function createMonitorDaemon(config: DaemonConfig, options: MonitorDaemonOptions = {}): MonitorDaemon {
  const pool = getSubprocessPool();
  const tracker = new SessionActivityTracker({ logDirectory: config.hookLogDirectory });

  return new MonitorDaemon(
    config,
    {
      collector: new DataCollector(config, { pool, tracker }),
      writer: new DataFileManager(config.dataFilePath),
      notifier: new NotificationManager(new DesktopNotificationChannel(pool), {
        enabled: config.notifications.enabled,
        throttleSeconds: config.notifications.throttleSeconds,
      }),
      tracker,
      subprocessPool: pool,
    },
    options
  );
}
