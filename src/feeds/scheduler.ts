/**
 * NewsPulse — Refresh Scheduler
 *
 * Timer-driven trigger for the refresh cycle. Runs once on start, then on
 * every interval. A tick that lands while a cycle is still running is
 * skipped, so slow fetches never pile up.
 */

import type { RefreshReport } from '../types';
import { errorMessage, logger } from '../lib/logger';

export interface Refreshable {
  refresh(): Promise<RefreshReport>;
}

export interface SchedulerConfig {
  intervalMs: number;
}

const log = logger.child({ component: 'scheduler' });

export class RefreshScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<RefreshReport | null> | null = null;

  constructor(
    private readonly target: Refreshable,
    private readonly config: SchedulerConfig
  ) {
    if (!(config.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be positive, got ${config.intervalMs}`);
    }
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  get isRunning(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Start the schedule. The first cycle begins immediately.
   */
  start(): void {
    if (this.timer) return;

    log.info('Scheduler started', { intervalMs: this.config.intervalMs });

    this.timer = setInterval(() => this.trigger(), this.config.intervalMs);
    this.trigger();
  }

  /**
   * Stop future ticks. A cycle already running is left to finish.
   */
  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Scheduler stopped');
  }

  /**
   * Run a cycle now unless one is in progress.
   * Resolves to the report, or null when skipped or failed.
   */
  runNow(): Promise<RefreshReport | null> {
    if (this.inFlight) {
      log.warn('Refresh still running, skipping trigger');
      return Promise.resolve(null);
    }

    this.inFlight = this.target
      .refresh()
      .catch((error: unknown) => {
        log.error('Refresh cycle failed', { error: errorMessage(error) });
        return null;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }

  /**
   * Wait for the cycle in progress, if any.
   */
  async idle(): Promise<void> {
    await this.inFlight;
  }

  private trigger(): void {
    this.runNow().catch((error: unknown) => {
      log.error('Scheduler tick failed', { error: errorMessage(error) });
    });
  }
}
