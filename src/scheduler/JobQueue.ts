/**
 * In-process job queue: one-shot, fixed-interval and cron jobs on timers.
 *
 * A job runs to completion before its next run is armed; a failing run is
 * logged and the schedule continues. Nothing is retried.
 */

import { CronExpressionParser } from 'cron-parser';
import { schedulerLogger, serializeError } from '../logging/index.js';

export type JobCallback = () => Promise<void>;

export interface JobInfo {
  name: string;
  nextRun: Date;
}

interface Job {
  name: string;
  callback: JobCallback;
  /** Next run after a run that started at `from`; null ends the job. */
  following: (from: Date) => Date | null;
  nextRun: Date | null;
  timer?: NodeJS.Timeout;
}

// setTimeout delays are capped at 2^31 - 1 ms (about 24.8 days).
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function nextCronRun(expression: string, from: Date, tz = 'UTC'): Date {
  return CronExpressionParser.parse(expression, { currentDate: from, tz }).next().toDate();
}

export class JobQueue {
  private readonly jobs = new Map<string, Job>();
  private stopped = false;

  runOnce(name: string, callback: JobCallback, delayMs: number): void {
    this.add({ name, callback, following: () => null, nextRun: null }, new Date(Date.now() + delayMs));
  }

  runRepeating(name: string, callback: JobCallback, intervalMs: number, firstDelayMs = intervalMs): void {
    this.add(
      { name, callback, following: (from) => new Date(from.getTime() + intervalMs), nextRun: null },
      new Date(Date.now() + firstDelayMs),
    );
  }

  /**
   * Throws on an invalid expression.
   */
  runCron(name: string, callback: JobCallback, expression: string, tz = 'UTC'): void {
    const following = (from: Date) => nextCronRun(expression, from, tz);
    this.add({ name, callback, following, nextRun: null }, following(new Date()));
  }

  /**
   * Scheduled jobs ordered by next run.
   */
  list(): JobInfo[] {
    const jobs: JobInfo[] = [];
    for (const job of this.jobs.values()) {
      if (job.nextRun) {
        jobs.push({ name: job.name, nextRun: job.nextRun });
      }
    }
    return jobs.sort((a, b) => a.nextRun.getTime() - b.nextRun.getTime());
  }

  stop(): void {
    this.stopped = true;
    for (const job of this.jobs.values()) {
      clearTimeout(job.timer);
    }
    this.jobs.clear();
  }

  private add(job: Job, firstRun: Date): void {
    if (this.jobs.has(job.name)) {
      throw new Error(`Job ${job.name} is already scheduled`);
    }
    this.jobs.set(job.name, job);
    this.arm(job, firstRun);
    schedulerLogger.info({ job: job.name, nextRun: firstRun.toISOString() }, 'Job scheduled');
  }

  private arm(job: Job, at: Date): void {
    job.nextRun = at;
    const delay = Math.max(0, at.getTime() - Date.now());
    if (delay > MAX_TIMER_DELAY_MS) {
      job.timer = setTimeout(() => this.arm(job, at), MAX_TIMER_DELAY_MS);
      return;
    }
    job.timer = setTimeout(() => {
      void this.fire(job);
    }, delay);
  }

  private async fire(job: Job): Promise<void> {
    const startedAt = new Date();
    job.nextRun = null;
    schedulerLogger.info({ job: job.name }, 'Job started');

    try {
      await job.callback();
      schedulerLogger.info({ job: job.name, durationMs: Date.now() - startedAt.getTime() }, 'Job finished');
    } catch (error) {
      schedulerLogger.error({ job: job.name, err: serializeError(error) }, 'Job failed');
    }

    if (this.stopped) return;

    const next = job.following(startedAt);
    if (next) {
      this.arm(job, next);
    } else {
      this.jobs.delete(job.name);
    }
  }
}
