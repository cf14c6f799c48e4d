import type { ErrorInfo } from '../errors.js';
import type { CandleStore } from '../repositories/store.js';
import type { CollectionStats } from '../types/domain.js';
import type { RunMode, RunSummary, RunTotals, UnitResult } from './collection.service.js';
import type { JobName, JobState, Scheduler } from './scheduler.service.js';

export type TriggerOutcome =
  | { accepted: true }
  | { accepted: false; rejected: 'already_running' | 'unknown_job' };

export type RunDigest = {
  mode: RunMode;
  startedAt: string;
  finishedAt: string;
  partial: boolean;
  totals: RunTotals;
  failures: UnitResult[];
};

export type JobStatusView = {
  name: JobName;
  state: 'idle' | 'running';
  nextRunAt: string | null;
  lastRunAt: string | null;
  lastError: ErrorInfo | null;
  lastResult: RunDigest | null;
};

const iso = (ms: number | null) => (ms === null ? null : new Date(ms).toISOString());

function digest(s: RunSummary | null): RunDigest | null {
  if (!s) return null;
  return {
    mode: s.mode,
    startedAt: new Date(s.startedAt).toISOString(),
    finishedAt: new Date(s.finishedAt).toISOString(),
    partial: s.partial,
    totals: s.totals,
    failures: s.units.filter((u) => u.status === 'failed'),
  };
}

function toView(j: JobState<RunSummary>): JobStatusView {
  return {
    name: j.name,
    state: j.state,
    nextRunAt: iso(j.nextRunAt),
    lastRunAt: iso(j.lastRunAt),
    lastError: j.lastError,
    lastResult: digest(j.lastResult),
  };
}

/** The operations the collector exposes to the outside world. */
export class CollectorControl {
  constructor(
    private readonly scheduler: Scheduler<RunSummary>,
    private readonly store: CandleStore
  ) {}

  triggerCurrentCollection(): TriggerOutcome {
    return this.trigger('current');
  }

  triggerHistoricalCollection(): TriggerOutcome {
    return this.trigger('historical');
  }

  getJobStatus(): JobStatusView[] {
    return this.scheduler.status().map(toView);
  }

  isSchedulerRunning(): boolean {
    return this.scheduler.isStarted();
  }

  getCollectionStats(): Promise<CollectionStats> {
    return this.store.getCollectionStats();
  }

  private trigger(name: JobName): TriggerOutcome {
    const res = this.scheduler.trigger(name);
    return res.accepted ? res : { accepted: false, rejected: res.reason };
  }
}
