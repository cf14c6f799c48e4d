import { Registry, collectDefaultMetrics, Counter, Histogram } from 'prom-client';
export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const httpReqDuration = new Histogram({
  name: 'http_request_duration_ms',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'code'],
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
  registers: [registry]
});

export const adapterRequests = new Counter({
  name: 'collector_adapter_requests_total',
  help: 'Market-data requests by exchange and outcome',
  labelNames: ['exchange', 'outcome'],
  registers: [registry]
});

export const unitsTotal = new Counter({
  name: 'collector_units_total',
  help: 'Collected series units by mode and status',
  labelNames: ['mode', 'status'],
  registers: [registry]
});

export const candlesWritten = new Counter({
  name: 'collector_candles_total',
  help: 'Candles handled by the upsert engine',
  labelNames: ['mode', 'result'],
  registers: [registry]
});

export const jobRuns = new Counter({
  name: 'collector_job_runs_total',
  help: 'Scheduler job runs by outcome',
  labelNames: ['job', 'outcome'],
  registers: [registry]
});

export const jobDuration = new Histogram({
  name: 'collector_job_duration_ms',
  help: 'Scheduler job duration',
  labelNames: ['job'],
  buckets: [100, 500, 1000, 5000, 15000, 60000, 300000, 1800000, 3600000],
  registers: [registry]
});
