/**
 * @fileoverview Desktop notifications for usage alerts.
 *
 * The daemon evaluates alert conditions every cycle, so the same condition
 * usually holds for many cycles in a row. Each notification kind is
 * throttled independently; delivery is fire-and-forget and failures only
 * reach the log.
 *
 * @module services/NotificationManager
 */

import type { SubprocessPool } from './SubprocessPool';
import { log, logError } from './Logger';

/**
 * Kinds of notification the daemon sends.
 */
export type NotificationKind = 'time_warning' | 'inactivity' | 'error';

/**
 * Alert sink used by the daemon.
 */
export interface Notifier {
  sendTimeWarning(minutesRemaining: number): void;
  sendInactivityAlert(minutesInactive: number): void;
  sendErrorNotification(message: string): void;
}

/**
 * Transport that actually shows a notification.
 */
export interface NotificationChannel {
  deliver(title: string, message: string): Promise<void>;
}

/**
 * Options for NotificationManager constructor.
 */
export interface NotificationManagerOptions {
  /** Master switch; when false notifications are only logged */
  enabled?: boolean;
  /** Minimum seconds between two notifications of one kind (default: 300) */
  throttleSeconds?: number;
  /** Clock, replaceable in tests */
  now?: () => number;
}

/**
 * Shows notifications with the platform's own command line tool:
 * `osascript` on macOS, `notify-send` on Linux. Elsewhere it only logs.
 */
export class DesktopNotificationChannel implements NotificationChannel {
  constructor(
    private readonly pool: Pick<SubprocessPool, 'run'>,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async deliver(title: string, message: string): Promise<void> {
    let command: string;
    let args: string[];

    switch (this.platform) {
      case 'darwin':
        command = 'osascript';
        args = ['-e', `display notification ${appleScriptString(message)} with title ${appleScriptString(title)}`];
        break;
      case 'linux':
        command = 'notify-send';
        args = ['--app-name=Claude Monitor', title, message];
        break;
      default:
        log(`Notification: ${title}: ${message}`);
        return;
    }

    const result = await this.pool.run(command, args, { timeoutMs: 10_000 });
    if (result.exitCode !== 0) {
      throw new Error(`${command} exited with code ${result.exitCode}: ${result.stderr.trim()}`);
    }
  }
}

/**
 * Quotes a value as an AppleScript string literal.
 */
export function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Sends throttled alerts through a notification channel.
 */
export class NotificationManager implements Notifier {
  private readonly lastFiredAt = new Map<NotificationKind, number>();
  private readonly enabled: boolean;
  private readonly throttleMs: number;
  private readonly now: () => number;

  constructor(
    private readonly channel: NotificationChannel,
    options: NotificationManagerOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.throttleMs = (options.throttleSeconds ?? 300) * 1000;
    this.now = options.now ?? Date.now;
  }

  sendTimeWarning(minutesRemaining: number): void {
    this.notify(
      'time_warning',
      'Claude session ending soon',
      `${minutesRemaining} minute${minutesRemaining === 1 ? '' : 's'} left in the current session`
    );
  }

  sendInactivityAlert(minutesInactive: number): void {
    this.notify(
      'inactivity',
      'Claude session inactive',
      `No activity for about ${minutesInactive} minutes`
    );
  }

  sendErrorNotification(message: string): void {
    this.notify('error', 'Claude monitor error', message);
  }

  /**
   * Checks if a kind fired too recently.
   */
  private isThrottled(kind: NotificationKind): boolean {
    const lastFired = this.lastFiredAt.get(kind);
    if (lastFired === undefined) return false;
    return (this.now() - lastFired) < this.throttleMs;
  }

  private notify(kind: NotificationKind, title: string, message: string): void {
    if (!this.enabled) {
      log(`Notification suppressed (disabled): ${title}: ${message}`);
      return;
    }
    if (this.isThrottled(kind)) {
      return;
    }

    this.lastFiredAt.set(kind, this.now());
    log(`Sending ${kind} notification: ${message}`);
    this.channel.deliver(title, message).catch(error => {
      logError(`Failed to deliver ${kind} notification`, error);
    });
  }
}
