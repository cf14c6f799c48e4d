// services/collector/src/config.ts
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3040),
  API_PREFIX: z.string().default('/api/v1'),
  API_KEY: z.string().optional(),

  DATABASE_URL: z.string().optional(),
  PGHOST: z.string().optional(),
  PGPORT: z.coerce.number().optional(),
  PGDATABASE: z.string().optional(),
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),
  DB_AUTO_MIGRATE: z.union([z.literal('1'), z.literal('0')]).default('0'),

  REDIS_URL: z.string().optional(),
  CURSOR_PREFIX: z.string().default('cursor'),

  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),

  // collection
  SCHEDULER_ENABLED: z.union([z.literal('1'), z.literal('0')]).default('1'),
  HISTORY_START: z.string().datetime({ offset: true }).default('2020-01-01T00:00:00Z'),
  CURRENT_INTERVAL_MS: z.coerce.number().int().positive().default(15_000),
  HISTORICAL_CRON_HOUR: z.coerce.number().int().min(0).max(23).default(0),
  HISTORICAL_CRON_MINUTE: z.coerce.number().int().min(0).max(59).default(30),
  CURRENT_CANDLE_COUNT: z.coerce.number().int().min(1).max(10).default(2),
  BACKFILL_PAGE_SIZE: z.coerce.number().int().positive().default(1000),
  GLOBAL_CONCURRENCY: z.coerce.number().int().positive().default(8),
  PER_EXCHANGE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  CURRENT_BUDGET_MS: z.coerce.number().int().positive().default(12_000),
  HISTORICAL_BUDGET_MS: z.coerce.number().int().positive().default(3 * 3600 * 1000),

  // exchange retries
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  RETRY_BASE_MS: z.coerce.number().int().positive().default(500),
  RETRY_MAX_MS: z.coerce.number().int().positive().default(30_000),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  console.error('Invalid environment:', parsed.error.flatten());
  process.exit(1);
}
const e = parsed.data;

function buildPgUrl() {
  if (e.DATABASE_URL) return e.DATABASE_URL;
  if (e.PGHOST && e.PGUSER && e.PGDATABASE) {
    const pw = e.PGPASSWORD ? `:${encodeURIComponent(e.PGPASSWORD)}` : '';
    const host = encodeURIComponent(e.PGHOST);
    const port = e.PGPORT ? `:${e.PGPORT}` : '';
    return `postgres://${encodeURIComponent(e.PGUSER)}${pw}@${host}${port}/${encodeURIComponent(e.PGDATABASE)}`;
  }
  return undefined;
}

export const config = {
  env: e.NODE_ENV,
  port: e.PORT,
  apiPrefix: e.API_PREFIX,
  apiKey: e.API_KEY,

  databaseUrl: buildPgUrl(),
  autoMigrate: e.DB_AUTO_MIGRATE === '1',
  redisUrl: e.REDIS_URL,
  cursorPrefix: e.CURSOR_PREFIX,

  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',

  scheduler: {
    enabled: e.SCHEDULER_ENABLED === '1',
    currentEveryMs: e.CURRENT_INTERVAL_MS,
    historicalAt: { hour: e.HISTORICAL_CRON_HOUR, minute: e.HISTORICAL_CRON_MINUTE },
  },

  collection: {
    historyStart: Date.parse(e.HISTORY_START),
    currentCandleCount: e.CURRENT_CANDLE_COUNT,
    backfillPageSize: e.BACKFILL_PAGE_SIZE,
    globalConcurrency: e.GLOBAL_CONCURRENCY,
    perExchangeConcurrency: e.PER_EXCHANGE_CONCURRENCY,
    currentBudgetMs: e.CURRENT_BUDGET_MS,
    historicalBudgetMs: e.HISTORICAL_BUDGET_MS,
  },

  retry: {
    maxAttempts: e.RETRY_MAX_ATTEMPTS,
    baseMs: e.RETRY_BASE_MS,
    maxMs: e.RETRY_MAX_MS,
  },
} as const;
