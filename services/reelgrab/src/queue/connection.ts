import type { ConnectionOptions } from 'bullmq';

/**
 * Splits a `redis://` or `rediss://` URL into the discrete options BullMQ
 * hands to its Redis client. Workers need `maxRetriesPerRequest: null` for
 * their blocking commands; the API fails fast instead.
 */
export function createRedisConnectionOptions(redisUrl: string, kind: 'api' | 'worker'): ConnectionOptions {
  const url = new URL(redisUrl);
  const db = Number.parseInt(url.pathname.replace(/^\//, ''), 10);

  return {
    host: url.hostname,
    port: url.port ? Number.parseInt(url.port, 10) : 6379,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: Number.isFinite(db) ? db : 0,
    tls: url.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: kind === 'worker' ? null : 1,
    enableReadyCheck: true,
  };
}
