import { CacheBackendError, type CacheStoreOperation } from '../errors.js';
import type { CacheStore } from './cache-store.js';

/**
 * Subset of the ioredis client used by the store. An ioredis `Redis`
 * instance satisfies it.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
  exists(key: string): Promise<number>;
}

/**
 * Shared backing tier stored in Redis. Expiry is delegated to Redis through
 * `PX`; every I/O fault surfaces as a CacheBackendError.
 */
export class RedisCacheStore implements CacheStore {
  readonly name = 'redis';

  constructor(
    private readonly redis: RedisCommands,
    private readonly keyPrefix: string = ''
  ) {}

  async get(key: string): Promise<string | null> {
    return this.run('get', () => this.redis.get(this.prefixed(key)));
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    const ttl = Math.ceil(ttlMs);
    if (ttl <= 0) {
      await this.remove(key);
      return;
    }
    await this.run('set', () => this.redis.set(this.prefixed(key), value, 'PX', ttl));
  }

  async remove(key: string): Promise<void> {
    await this.run('remove', () => this.redis.del(this.prefixed(key)));
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.run('exists', () => this.redis.exists(this.prefixed(key)));
    return count > 0;
  }

  private prefixed(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private async run<T>(operation: CacheStoreOperation, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      throw new CacheBackendError(this.name, operation, error);
    }
  }
}
