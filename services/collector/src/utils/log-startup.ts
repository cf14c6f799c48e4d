import { logger } from '../logger.js';
import { config } from '../config.js';
import { supportedVenues } from '../exchanges/venues.js';
import { readinessSvc, type HealthDeps } from '../services/health.service.js';

const ROUTES: Array<{ method: string; path: string }> = [
  // ops
  { method: 'GET', path: '/health/liveness' },
  { method: 'GET', path: '/health/readiness' },
  { method: 'GET', path: '/ops/metrics' },
  // collection
  { method: 'GET', path: '/collection/status' },
  { method: 'GET', path: '/collection/stats' },
  { method: 'POST', path: '/collection/trigger/current' },
  { method: 'POST', path: '/collection/trigger/historical' }
];

export async function logStartupBanner(health: HealthDeps) {
  const ready = await readinessSvc(health);

  logger.info({
    env: config.env,
    port: config.port,
    apiPrefix: config.apiPrefix,
    database: ready.checks.db,
    redis: ready.checks.redis,
    scheduler: config.scheduler.enabled ? 'on' : 'off',
    venues: supportedVenues(),
    historyStart: new Date(config.collection.historyStart).toISOString()
  }, 'service startup');

  logger.info('available routes:');
  for (const r of ROUTES) {
    logger.info(`${r.method.padEnd(6)} ${config.apiPrefix}${r.path}`);
  }
}
