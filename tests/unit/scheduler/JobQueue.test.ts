import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JobQueue, nextCronRun } from '../../../src/scheduler/JobQueue.js';

describe('JobQueue', () => {
  let queue: JobQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T10:00:00Z'));
    queue = new JobQueue();
  });

  afterEach(() => {
    queue.stop();
    vi.useRealTimers();
  });

  it('runs a one-shot job once and forgets it', async () => {
    const job = vi.fn(async () => {});
    queue.runOnce('start', job, 3_000);

    expect(queue.list()).toEqual([{ name: 'start', nextRun: new Date('2024-01-15T10:00:03Z') }]);

    await vi.advanceTimersByTimeAsync(2_999);
    expect(job).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(job).toHaveBeenCalledTimes(1);
    expect(queue.list()).toEqual([]);
  });

  it('repeats at a fixed interval after a first delay', async () => {
    const job = vi.fn(async () => {});
    queue.runRepeating('balance_check', job, 60 * 60 * 1000, 5_000);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(job).toHaveBeenCalledTimes(1);
    expect(queue.list()).toEqual([{ name: 'balance_check', nextRun: new Date('2024-01-15T11:00:05Z') }]);

    await vi.advanceTimersByTimeAsync(2 * 60 * 60 * 1000);
    expect(job).toHaveBeenCalledTimes(3);
  });

  it('keeps the schedule after a failing run', async () => {
    const job = vi.fn(async () => {
      throw new Error('rpc unavailable');
    });
    queue.runRepeating('balance_check', job, 1_000, 1_000);

    await vi.advanceTimersByTimeAsync(3_000);

    expect(job).toHaveBeenCalledTimes(3);
    expect(queue.list()).toHaveLength(1);
  });

  it('fires a monthly cron job beyond the timer delay limit', async () => {
    vi.setSystemTime(new Date('2024-01-01T10:00:00Z'));
    const job = vi.fn(async () => {});
    queue.runCron('autoclaim', job, '0 9 1 * *', 'UTC');

    expect(queue.list()).toEqual([{ name: 'autoclaim', nextRun: new Date('2024-02-01T09:00:00Z') }]);

    await vi.advanceTimersByTimeAsync(new Date('2024-02-01T08:59:59Z').getTime() - Date.now());
    expect(job).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1_000);
    expect(job).toHaveBeenCalledTimes(1);
    expect(queue.list()).toEqual([{ name: 'autoclaim', nextRun: new Date('2024-03-01T09:00:00Z') }]);
  });

  it('lists jobs by next run and rejects duplicate names', () => {
    queue.runRepeating('balance_check', async () => {}, 60 * 60 * 1000, 5_000);
    queue.runOnce('start', async () => {}, 3_000);

    expect(queue.list().map((job) => job.name)).toEqual(['start', 'balance_check']);
    expect(() => queue.runOnce('start', async () => {}, 1)).toThrow('Job start is already scheduled');
  });

  it('stops every job', async () => {
    const job = vi.fn(async () => {});
    queue.runRepeating('balance_check', job, 1_000, 1_000);

    queue.stop();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(job).not.toHaveBeenCalled();
    expect(queue.list()).toEqual([]);
  });
});

describe('nextCronRun', () => {
  it('computes the next run in the given timezone', () => {
    expect(nextCronRun('0 9 1 * *', new Date('2024-01-15T10:00:00Z'), 'UTC'))
      .toEqual(new Date('2024-02-01T09:00:00Z'));
  });
});
