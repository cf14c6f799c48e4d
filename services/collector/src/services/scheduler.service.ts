import cron from 'node-cron';
import { toErrorInfo, type ErrorInfo } from '../errors.js';
import { logger } from '../logger.js';
import { jobDuration, jobRuns } from '../metrics/metrics.js';

export type JobName = 'current' | 'historical';

export type JobSchedule =
  | { kind: 'interval'; everyMs: number }
  | { kind: 'daily'; hour: number; minute: number }; // UTC

export type JobDefinition<R> = {
  name: JobName;
  schedule: JobSchedule;
  run: () => Promise<R>;
};

export type JobState<R> = {
  name: JobName;
  state: 'idle' | 'running';
  lastRunAt: number | null;
  nextRunAt: number | null;
  lastError: ErrorInfo | null;
  lastResult: R | null;
};

export type TriggerResult =
  | { accepted: true }
  | { accepted: false; reason: 'already_running' | 'unknown_job' };

type Entry<R> = {
  def: JobDefinition<R>;
  state: JobState<R>;
  running: Promise<void> | null;
  stopTimer: (() => void) | null;
};

const DAY_MS = 86_400_000;

export function nextDailyRun(now: number, hour: number, minute: number): number {
  const d = new Date(now);
  const today = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate(), hour, minute);
  return today > now ? today : today + DAY_MS;
}

/**
 * Runs each job on its own cadence, one run per job at a time.
 *
 * Timer ticks and manual triggers share one acquire-run-release path: a tick on a
 * running job is skipped, a manual trigger on a running job is refused. Whatever a job
 * throws ends up in its `lastError`.
 */
export class Scheduler<R> {
  private readonly jobs = new Map<JobName, Entry<R>>();
  private started = false;

  constructor(defs: readonly JobDefinition<R>[], private readonly now: () => number = Date.now) {
    for (const def of defs) {
      this.jobs.set(def.name, {
        def,
        state: { name: def.name, state: 'idle', lastRunAt: null, nextRunAt: null, lastError: null, lastResult: null },
        running: null,
        stopTimer: null,
      });
    }
  }

  isStarted(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    for (const entry of this.jobs.values()) {
      const { name, schedule } = entry.def;
      if (schedule.kind === 'interval') {
        entry.state.nextRunAt = this.now() + schedule.everyMs;
        const timer = setInterval(() => {
          entry.state.nextRunAt = this.now() + schedule.everyMs;
          this.tick(name);
        }, schedule.everyMs);
        entry.stopTimer = () => clearInterval(timer);
      } else {
        entry.state.nextRunAt = nextDailyRun(this.now(), schedule.hour, schedule.minute);
        const task = cron.schedule(
          `${schedule.minute} ${schedule.hour} * * *`,
          () => {
            entry.state.nextRunAt = nextDailyRun(this.now() + 60_000, schedule.hour, schedule.minute);
            this.tick(name);
          },
          { timezone: 'UTC' }
        );
        entry.stopTimer = () => task.stop();
      }
      logger.info({ job: name, schedule, nextRunAt: entry.state.nextRunAt }, '[scheduler] job scheduled');
    }
  }

  /** Stops the timers and waits for running jobs to finish. */
  async stop(): Promise<void> {
    this.started = false;
    const pending: Promise<void>[] = [];
    for (const entry of this.jobs.values()) {
      entry.stopTimer?.();
      entry.stopTimer = null;
      entry.state.nextRunAt = null;
      if (entry.running) pending.push(entry.running);
    }
    await Promise.all(pending);
    logger.info('[scheduler] stopped');
  }

  /** Timer path: a tick on a running job is a logged no-op. */
  tick(name: JobName): boolean {
    const res = this.launch(name);
    if (!res.accepted) {
      jobRuns.inc({ job: name, outcome: 'skipped' });
      logger.info({ job: name, reason: res.reason }, '[scheduler] tick skipped');
    }
    return res.accepted;
  }

  /** Manual path: refused while the job is running. */
  trigger(name: JobName): TriggerResult {
    const res = this.launch(name);
    if (!res.accepted) {
      jobRuns.inc({ job: name, outcome: 'rejected' });
      logger.warn({ job: name, reason: res.reason }, '[scheduler] trigger rejected');
    } else {
      logger.info({ job: name }, '[scheduler] manual trigger accepted');
    }
    return res;
  }

  status(): JobState<R>[] {
    return [...this.jobs.values()].map((e) => ({ ...e.state }));
  }

  /** Resolves once the job's current run (if any) has completed. */
  async whenIdle(name: JobName): Promise<void> {
    const entry = this.jobs.get(name);
    if (entry?.running) await entry.running;
  }

  private launch(name: JobName): TriggerResult {
    const entry = this.jobs.get(name);
    if (!entry) return { accepted: false, reason: 'unknown_job' };
    if (entry.state.state === 'running') return { accepted: false, reason: 'already_running' };

    entry.state.state = 'running';
    const startedAt = this.now();
    const stopTimer = jobDuration.startTimer({ job: name });
    logger.info({ job: name }, '[scheduler] job started');

    // a synchronous throw from run() lands in the rejection handler too
    entry.running = new Promise<R>((resolve) => resolve(entry.def.run()))
      .then(
        (result) => {
          entry.state.lastResult = result;
          entry.state.lastError = null;
          jobRuns.inc({ job: name, outcome: 'ok' });
          logger.info({ job: name, ms: this.now() - startedAt }, '[scheduler] job finished');
        },
        (err: unknown) => {
          entry.state.lastError = toErrorInfo(err);
          jobRuns.inc({ job: name, outcome: 'error' });
          logger.error({ job: name, err }, '[scheduler] job failed');
        }
      )
      .finally(() => {
        stopTimer();
        entry.state.lastRunAt = startedAt;
        if (!this.started) entry.state.nextRunAt = null;
        else if (entry.def.schedule.kind === 'daily') {
          entry.state.nextRunAt = nextDailyRun(this.now(), entry.def.schedule.hour, entry.def.schedule.minute);
        }
        entry.state.state = 'idle';
        entry.running = null;
      });

    return { accepted: true };
  }
}
