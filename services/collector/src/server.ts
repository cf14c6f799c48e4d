import type { Server } from 'node:http';
import { buildApp } from './app.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { ensureSchema, pool } from './db/pool.js';
import { createRedis, shutdownRedis } from './redis/index.js';
import { createCcxtAdapter } from './exchanges/venues.js';
import { AdapterRegistry } from './exchanges/registry.js';
import { PgCandleStore } from './repositories/candles.repo.js';
import { MemoryCursorStore, RedisCursorStore } from './repositories/cursors.repo.js';
import { BackfillWalker } from './services/backfill.service.js';
import { CollectionService, type RunSummary } from './services/collection.service.js';
import { CollectorControl } from './services/control.service.js';
import { Scheduler } from './services/scheduler.service.js';
import { logStartupBanner } from './utils/log-startup.js';

const redis = createRedis(config.redisUrl);
const store = new PgCandleStore(pool);
const cursors = redis ? new RedisCursorStore(redis, config.cursorPrefix) : new MemoryCursorStore();
const adapters = new AdapterRegistry((exchange) => createCcxtAdapter(exchange, config.retry));
const walker = new BackfillWalker({
  store,
  cursors,
  historyStart: config.collection.historyStart,
  pageSize: config.collection.backfillPageSize,
  now: Date.now,
});
const collection = new CollectionService({ store, adapters, walker, options: config.collection });
const scheduler = new Scheduler<RunSummary>([
  {
    name: 'current',
    schedule: { kind: 'interval', everyMs: config.scheduler.currentEveryMs },
    run: () => collection.runCurrent(),
  },
  {
    name: 'historical',
    schedule: { kind: 'daily', ...config.scheduler.historicalAt },
    run: () => collection.runHistorical(),
  },
]);
const control = new CollectorControl(scheduler, store);
const health = { store, redis };

let server: Server | null = null;

async function main() {
  if (config.autoMigrate) await ensureSchema(pool);
  if (!redis) logger.warn('REDIS_URL not set, backfill cursors are kept in memory');

  const app = buildApp({ control, health, apiKey: config.apiKey });
  server = app.listen(config.port, () => {
    logger.info({ port: config.port, prefix: config.apiPrefix }, 'collector listening');
    void logStartupBanner(health);
  });

  if (config.scheduler.enabled) scheduler.start();
  else logger.warn('scheduler disabled, collection runs only on manual trigger');
}

// ---- global process error traps ----
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaughtException');
  void shutdown(1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'unhandledRejection');
  void shutdown(1);
});

process.on('SIGINT', () => void shutdown(0));
process.on('SIGTERM', () => void shutdown(0));

let closing = false;
async function shutdown(code: number) {
  if (closing) return;
  closing = true;
  logger.info('shutting down...');
  const http = server;
  if (http) await new Promise<void>((resolve) => http.close(() => resolve()));
  // lets in-flight runs commit their current page
  await scheduler.stop();
  await Promise.allSettled([pool.end(), shutdownRedis(redis)]);
  logger.info('bye');
  process.exit(code);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'startup failed');
  void shutdown(1);
});
