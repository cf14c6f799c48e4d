import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Mock } from 'vitest';

vi.mock('node-cron', () => {
  return {
    default: {
      schedule: vi.fn(() => ({ stop: vi.fn() })),
    },
  };
});

import cron from 'node-cron';
import { nextDailyRun, Scheduler, type JobDefinition } from '../../src/services/scheduler.service.js';

type Deferred = { promise: Promise<string>; resolve: (v: string) => void; reject: (e: Error) => void };

function deferred(): Deferred {
  let resolve: (v: string) => void = () => {};
  let reject: (e: Error) => void = () => {};
  const promise = new Promise<string>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const T = Date.parse('2024-01-01T00:00:00Z');

describe('scheduler.service', () => {
  afterEach(() => {
    vi.clearAllMocks();
    vi.useRealTimers();
  });

  it('runs a manual trigger and records the result', async () => {
    const run = vi.fn(async () => 'summary');
    const s = new Scheduler<string>([{ name: 'current', schedule: { kind: 'interval', everyMs: 15_000 }, run }], () => T);

    expect(s.trigger('current')).toEqual({ accepted: true });
    expect(s.status()[0]?.state).toBe('running');
    await s.whenIdle('current');

    expect(run).toHaveBeenCalledTimes(1);
    expect(s.status()).toEqual([
      { name: 'current', state: 'idle', lastRunAt: T, nextRunAt: null, lastError: null, lastResult: 'summary' },
    ]);
  });

  it('rejects a manual trigger and skips a tick while the job runs', async () => {
    const d = deferred();
    const run = vi.fn(() => d.promise);
    const s = new Scheduler<string>([{ name: 'historical', schedule: { kind: 'daily', hour: 0, minute: 30 }, run }]);

    expect(s.trigger('historical')).toEqual({ accepted: true });
    expect(s.trigger('historical')).toEqual({ accepted: false, reason: 'already_running' });
    expect(s.tick('historical')).toBe(false);
    expect(run).toHaveBeenCalledTimes(1);

    d.resolve('done');
    await s.whenIdle('historical');
    expect(s.trigger('historical')).toEqual({ accepted: true });
    await s.whenIdle('historical');
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('refuses unknown jobs', () => {
    const s = new Scheduler<string>([]);
    expect(s.trigger('current')).toEqual({ accepted: false, reason: 'unknown_job' });
  });

  it('records a thrown error as lastError and clears it on the next success', async () => {
    const run = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('db down'))
      .mockResolvedValueOnce('ok');
    const s = new Scheduler<string>([{ name: 'current', schedule: { kind: 'interval', everyMs: 1000 }, run }], () => T);

    s.trigger('current');
    await s.whenIdle('current');
    expect(s.status()[0]).toMatchObject({ state: 'idle', lastError: { code: 'INTERNAL_ERROR', message: 'db down' }, lastResult: null });

    s.trigger('current');
    await s.whenIdle('current');
    expect(s.status()[0]).toMatchObject({ lastError: null, lastResult: 'ok' });
  });

  it('catches a job that throws synchronously', async () => {
    const def: JobDefinition<string> = {
      name: 'current',
      schedule: { kind: 'interval', everyMs: 1000 },
      run: () => {
        throw new Error('not wired');
      },
    };
    const s = new Scheduler<string>([def]);

    expect(s.trigger('current')).toEqual({ accepted: true });
    await s.whenIdle('current');
    expect(s.status()[0]?.lastError).toEqual({ code: 'INTERNAL_ERROR', message: 'not wired' });
  });

  it('fires the interval job from its timer', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(T);
    const run = vi.fn(async () => 'tick');
    const s = new Scheduler<string>([{ name: 'current', schedule: { kind: 'interval', everyMs: 15_000 }, run }]);

    s.start();
    expect(s.status()[0]?.nextRunAt).toBe(T + 15_000);

    await vi.advanceTimersByTimeAsync(15_000);
    await s.whenIdle('current');
    expect(run).toHaveBeenCalledTimes(1);
    expect(s.status()[0]).toMatchObject({ lastRunAt: T + 15_000, nextRunAt: T + 30_000 });

    await s.stop();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(run).toHaveBeenCalledTimes(1);
    expect(s.status()[0]?.nextRunAt).toBeNull();
  });

  it('schedules the daily job as a UTC cron task', () => {
    const s = new Scheduler<string>(
      [{ name: 'historical', schedule: { kind: 'daily', hour: 0, minute: 30 }, run: async () => 'x' }],
      () => T
    );
    s.start();

    const schedule = cron.schedule as unknown as Mock;
    expect(schedule).toHaveBeenCalledTimes(1);
    expect(schedule.mock.calls[0]?.[0]).toBe('30 0 * * *');
    expect(schedule.mock.calls[0]?.[2]).toEqual({ timezone: 'UTC' });
    expect(s.status()[0]?.nextRunAt).toBe(Date.parse('2024-01-01T00:30:00Z'));
    expect(s.isStarted()).toBe(true);
  });

  it('waits for a running job when stopping', async () => {
    const d = deferred();
    const s = new Scheduler<string>([{ name: 'current', schedule: { kind: 'interval', everyMs: 1000 }, run: () => d.promise }]);
    s.trigger('current');

    let stopped = false;
    const stopping = s.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    d.resolve('late');
    await stopping;
    expect(s.status()[0]).toMatchObject({ state: 'idle', lastResult: 'late' });
  });

  it('computes the next daily run in UTC', () => {
    expect(nextDailyRun(Date.parse('2024-01-01T00:10:00Z'), 0, 30)).toBe(Date.parse('2024-01-01T00:30:00Z'));
    expect(nextDailyRun(Date.parse('2024-01-01T00:30:00Z'), 0, 30)).toBe(Date.parse('2024-01-02T00:30:00Z'));
    expect(nextDailyRun(Date.parse('2024-12-31T23:00:00Z'), 0, 30)).toBe(Date.parse('2025-01-01T00:30:00Z'));
  });
});
