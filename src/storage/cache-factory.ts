import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Config } from '../config.js';
import { MemoryCacheStore, type Clock } from './cache-store.js';
import { RedisCacheStore } from './redis-store.js';
import { TwoTierCache } from './two-tier-cache.js';

export interface CacheTiers {
  cache: TwoTierCache;
  /** Open Redis connection, null when the shared tier is in memory */
  redis: Redis | null;
  /**
   * Drop expired entries from every in-memory tier, returning how many were
   * removed. Redis expires its own keys.
   */
  sweep(): Promise<number>;
}

/**
 * Build the local tier and the shared tier from config. Without REDIS_URL the
 * shared tier is a second bounded memory store, swept with the local one.
 */
export function createCacheTiers(config: Config, logger: Logger, now: Clock = Date.now): CacheTiers {
  const { redisUrl, redisKeyPrefix, localMaxEntries } = config.cache;

  const local = new MemoryCacheStore({ name: 'memory-local', maxEntries: localMaxEntries, now });
  const memoryStores = [local];

  let redis: Redis | null = null;
  let backing: MemoryCacheStore | RedisCacheStore;
  if (redisUrl) {
    redis = new Redis(redisUrl, { maxRetriesPerRequest: 1 });
    redis.on('ready', () => logger.info('Redis client ready'));
    redis.on('error', (err: Error) => logger.error({ error: err.message }, 'Redis client error'));
    redis.on('end', () => logger.warn('Redis connection ended'));
    backing = new RedisCacheStore(redis, redisKeyPrefix);
  } else {
    logger.warn('REDIS_URL not set, using an in-memory store as the shared cache tier');
    const memoryBacking = new MemoryCacheStore({
      name: 'memory-backing',
      maxEntries: localMaxEntries,
      now,
    });
    memoryStores.push(memoryBacking);
    backing = memoryBacking;
  }

  const cache = new TwoTierCache({
    local,
    backing,
    logger,
    localTtlCapMs: config.cache.localTtlCapMs,
    defaultTtlMs: config.cache.defaultTtlMs,
    now,
  });

  return {
    cache,
    redis,
    async sweep() {
      const counts = await Promise.all(memoryStores.map((store) => store.cleanup()));
      return counts.reduce((total, count) => total + count, 0);
    },
  };
}
