import type { Redis } from 'ioredis';
import { redisHealth } from '../redis/index.js';
import type { CandleStore } from '../repositories/store.js';

export type CheckStatus = 'ok' | 'fail' | 'disabled';

export type Readiness = {
  status: 'ready' | 'not_ready';
  checks: { db: CheckStatus; redis: CheckStatus };
};

export type HealthDeps = { store: CandleStore; redis: Redis | null };

export async function readinessSvc({ store, redis }: HealthDeps): Promise<Readiness> {
  const [dbOk, redisOk] = await Promise.allSettled([store.ping(), redis ? redisHealth(redis) : Promise.resolve(true)]);
  const checks = {
    db: dbOk.status === 'fulfilled' && dbOk.value ? 'ok' : 'fail',
    redis: !redis ? 'disabled' : redisOk.status === 'fulfilled' && redisOk.value ? 'ok' : 'fail'
  } satisfies Readiness['checks'];
  const status = checks.db === 'ok' && checks.redis !== 'fail' ? 'ready' : 'not_ready';
  return { status, checks };
}
