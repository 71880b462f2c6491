import { Redis } from 'ioredis';

/**
 * Publisher connection; subscribers open their own.
 *
 * Commands fail fast while Redis is unreachable instead of queueing, so a
 * best-effort publish always settles.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
