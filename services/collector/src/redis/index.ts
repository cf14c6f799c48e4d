import { Redis } from 'ioredis';
import { logger } from '../logger.js';

function attachLoggers(client: Redis, label: string) {
  client.on('ready',        () => logger.info({ label }, 'redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ label, delay }, 'redis reconnecting'));
  client.on('end',          () => logger.warn({ label }, 'redis end'));
  client.on('error',        (err: Error) => logger.error({ label, err }, 'redis error'));
}

/** Cursor client, or null when no REDIS_URL is configured (cursors then live in memory). */
export function createRedis(url: string | undefined): Redis | null {
  if (!url) return null;
  // ioredis parses redis/rediss, auth and db index from the URL
  const client = new Redis(url, { maxRetriesPerRequest: 3, enableAutoPipelining: true });
  attachLoggers(client, 'cursors');
  return client;
}

export async function redisHealth(client: Redis): Promise<boolean> {
  try {
    const pong = await client.ping();
    return pong === 'PONG';
  } catch {
    return false;
  }
}

export async function shutdownRedis(client: Redis | null): Promise<void> {
  if (!client) return;
  await client.quit().catch(() => client.disconnect());
}
