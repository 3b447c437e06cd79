/**
 * Auto-Update Scheduler
 * Runs check-then-apply on the cadence stored in the update config
 */

import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import type { UpdateConfigStore } from '../config/store.js';
import type { AutoUpdateSchedule } from '../config/types.js';
import type { AutoUpdateSchedulerOptions, SchedulerRunResult } from './types.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Weekly runs happen on this weekday (0 = Sunday) */
export const WEEKLY_RUN_DAY = 0;

function parseTime(time: string): { hours: number; minutes: number } {
  const match = /^(\d{2}):(\d{2})$/.exec(time);
  const hours = match ? Number(match[1]) : 2;
  const minutes = match ? Number(match[2]) : 0;
  return { hours: Math.min(hours, 23), minutes: Math.min(minutes, 59) };
}

/**
 * Next run strictly after `now`, in local time. Hourly runs use only the
 * minute of `time`.
 */
export function computeNextRun(now: Date, schedule: AutoUpdateSchedule, time: string): Date {
  const { hours, minutes } = parseTime(time);
  const next = new Date(now.getTime());
  next.setSeconds(0, 0);

  switch (schedule) {
    case 'hourly': {
      next.setMinutes(minutes);
      if (next.getTime() <= now.getTime()) {
        next.setTime(next.getTime() + HOUR_MS);
      }
      return next;
    }
    case 'daily': {
      next.setHours(hours, minutes);
      if (next.getTime() <= now.getTime()) {
        next.setDate(next.getDate() + 1);
      }
      return next;
    }
    case 'weekly': {
      next.setHours(hours, minutes);
      const daysAhead = (WEEKLY_RUN_DAY - next.getDay() + 7) % 7;
      next.setDate(next.getDate() + daysAhead);
      if (next.getTime() <= now.getTime()) {
        next.setDate(next.getDate() + 7);
      }
      return next;
    }
  }
}

/**
 * Auto-Update Scheduler class
 */
export class AutoUpdateScheduler {
  private readonly config: UpdateConfigStore;
  private readonly updater: AutoUpdateSchedulerOptions['updater'];
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private nextRun: Date | null = null;

  constructor(options: AutoUpdateSchedulerOptions) {
    this.config = options.config;
    this.updater = options.updater;
    this.now = options.now ?? (() => new Date());
  }

  public isStarted(): boolean {
    return this.timer !== null;
  }

  public getNextRun(): Date | null {
    return this.nextRun;
  }

  /**
   * Start scheduling. A no-op when already started.
   */
  public start(): void {
    if (this.timer) {
      logger.info('Auto-update scheduler already running');
      return;
    }
    this.scheduleNext();
  }

  /**
   * Stop scheduling; a run already in flight finishes on its own
   */
  public stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.nextRun = null;
      logger.info('Stopped auto-update scheduler');
    }
  }

  /**
   * One check, followed by an apply when auto-update is enabled and an update is
   * available. Overlapping runs are skipped.
   */
  public async runOnce(): Promise<SchedulerRunResult> {
    if (this.running) {
      logger.debug('Scheduled update run already in progress, skipping');
      return { ran: false, reason: 'A scheduled run is already in progress' };
    }

    this.running = true;
    try {
      const check = await this.updater.checkForUpdates();
      if (check.status !== 'success' || !check.updateAvailable) {
        return { ran: true, check };
      }

      if (!this.config.autoUpdate().enabled) {
        logger.info('Update available but auto-update is disabled', { latestVersion: check.latestVersion });
        return { ran: true, check, reason: 'Auto-update is disabled' };
      }

      logger.info('Applying update from scheduler', { latestVersion: check.latestVersion });
      const update = await this.updater.performUpdate();
      return { ran: true, check, update };
    } finally {
      this.running = false;
    }
  }

  private scheduleNext(): void {
    const settings = this.config.autoUpdate();
    const now = this.now();
    const next = computeNextRun(now, settings.schedule, settings.time);
    const delay = Math.max(0, Math.min(next.getTime() - now.getTime(), 7 * DAY_MS + HOUR_MS));

    this.nextRun = next;
    this.timer = setTimeout(() => {
      this.runOnce()
        .catch((error: unknown) => {
          logger.error('Scheduled update run failed', { error: describeError(error) });
        })
        .finally(() => {
          if (this.timer) {
            this.scheduleNext();
          }
        });
    }, delay);

    logger.info('Next scheduled update run', { at: next.toISOString(), schedule: settings.schedule, enabled: settings.enabled });
  }
}
