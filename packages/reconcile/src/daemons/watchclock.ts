import { EventType, describeError, getClockStampPath } from '@nodeconf/core';
import type { WatchclockSettings } from '@nodeconf/core';
import { v4 as uuidv4 } from 'uuid';
import { runOrThrow } from '../system/executor.js';
import type { CommandRunner } from '../system/executor.js';
import { readOptional, writeSystemFile } from '../system/files.js';
import { logReconcileEvent, silentLogger } from '../utils/reconcile-logger.js';
import type { EngineLogger } from '../utils/reconcile-logger.js';

export interface WatchclockOptions {
  settings: WatchclockSettings;
  /** Holds the last-seen clock stamp and the event journal */
  stateDir: string;
  runner: CommandRunner;
  logger?: EngineLogger;
  /** Wall clock in whole seconds since the epoch */
  now?: () => number;
}

/** Outcome of one check. */
export interface ClockCheck {
  /** False when the service was not running and the clock was not compared */
  checked: boolean;
  /** Seconds between the stored stamp and now */
  deltaSeconds: number;
  restarted: boolean;
}

const SECONDS_PER_DAY = 24 * 60 * 60;

function systemClock(): number {
  return Math.floor(Date.now() / 1000);
}

// ─── Daemon Class ────────────────────────────────────────────────────────

/**
 * Restarts the radio daemon after a large jump of the system clock, such
 * as the first NTP or GPS fix on a board without an RTC.
 *
 * Lifecycle:
 *   new Watchclock(options) -> start() -> [polling loop] -> stop()
 *
 * Each cycle, while the service is active:
 *   1. Read the stamp written by the previous cycle
 *   2. Restart the service when the clock moved by at least the threshold
 *   3. Store the current time as the new stamp
 */
export class Watchclock {
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private readonly logger: EngineLogger;
  private readonly now: () => number;

  constructor(private readonly options: WatchclockOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? systemClock;
  }

  /**
   * Start the polling loop.
   * Runs the first check immediately, then sets up the interval.
   */
  start(): void {
    if (this.intervalHandle) return;

    void this.tick();
    this.intervalHandle = setInterval(() => {
      void this.tick();
    }, this.options.settings.intervalSeconds * 1000);
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  /** Execute a single check. */
  async runOnce(): Promise<ClockCheck> {
    const { settings, runner, stateDir } = this.options;
    const active = await runner.run('systemctl', ['is-active', '--quiet', settings.service]);
    if (active.exitCode !== 0) {
      return { checked: false, deltaSeconds: 0, restarted: false };
    }

    const stampPath = getClockStampPath(stateDir);
    const now = this.now();
    const stored = Number.parseInt((await readOptional(stampPath))?.trim() ?? '', 10);
    const deltaSeconds = Number.isNaN(stored) ? 0 : now - stored;
    await writeSystemFile(stampPath, `${now}\n`);

    if (Math.abs(deltaSeconds) < settings.thresholdDays * SECONDS_PER_DAY) {
      return { checked: true, deltaSeconds, restarted: false };
    }

    this.logger.warn(`Large time change detected (${deltaSeconds} seconds), restarting ${settings.service}`);
    await logReconcileEvent(
      stateDir,
      uuidv4(),
      EventType.ClockJumped,
      { delta_seconds: deltaSeconds, service: settings.service },
      this.logger,
    );
    await runOrThrow(runner, 'systemctl', ['restart', settings.service]);
    return { checked: true, deltaSeconds, restarted: true };
  }

  private async tick(): Promise<void> {
    try {
      await this.runOnce();
    } catch (err) {
      this.logger.warn(`watchclock: ${describeError(err)}`);
    }
  }
}
