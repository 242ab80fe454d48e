import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import pino from 'pino';
import { CacheBackendError } from '../errors.js';
import { MemoryCacheStore, type CacheStore } from './cache-store.js';
import { TwoTierCache } from './two-tier-cache.js';

const logger = pino({ level: 'silent' });
const ValueSchema = z.object({ n: z.number() });

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

class BrokenStore implements CacheStore {
  readonly name = 'broken';
  writes = 0;

  async get(): Promise<string | null> {
    throw new CacheBackendError(this.name, 'get', new Error('connection reset'));
  }

  async set(): Promise<void> {
    this.writes++;
    throw new CacheBackendError(this.name, 'set', new Error('connection reset'));
  }

  async remove(): Promise<void> {
    throw new CacheBackendError(this.name, 'remove', new Error('connection reset'));
  }

  async exists(): Promise<boolean> {
    throw new CacheBackendError(this.name, 'exists', new Error('connection reset'));
  }
}

describe('TwoTierCache', () => {
  let now: number;
  const clock = () => now;
  let local: MemoryCacheStore;
  let backing: MemoryCacheStore;
  let cache: TwoTierCache;

  const createCache = (localStore: CacheStore, backingStore: CacheStore) =>
    new TwoTierCache({
      local: localStore,
      backing: backingStore,
      logger,
      localTtlCapMs: 5 * MINUTE,
      defaultTtlMs: HOUR,
      now: clock,
    });

  beforeEach(() => {
    now = Date.parse('2026-01-01T00:00:00.000Z');
    local = new MemoryCacheStore({ now: clock });
    backing = new MemoryCacheStore({ now: clock });
    cache = createCache(local, backing);
  });

  it('returns what was written', async () => {
    await cache.set('k', { n: 1 }, HOUR);

    expect(await cache.get('k', ValueSchema)).toEqual({ n: 1 });
    expect(await local.exists('k')).toBe(true);
    expect(await backing.exists('k')).toBe(true);
  });

  it('returns null on a miss', async () => {
    expect(await cache.get('missing', ValueSchema)).toBeNull();
  });

  it('caps the local copy and serves the backing copy after it lapses', async () => {
    await cache.set('k', { n: 1 }, HOUR);

    now += 5 * MINUTE;
    expect(await local.exists('k')).toBe(false);
    expect(await cache.get('k', ValueSchema)).toEqual({ n: 1 });

    // The backing hit was promoted into the local tier
    expect(await local.exists('k')).toBe(true);
  });

  it('promotes a value written by another instance', async () => {
    const otherLocal = new MemoryCacheStore({ now: clock });
    const other = createCache(otherLocal, backing);

    await cache.set('k', { n: 7 }, HOUR);

    expect(await otherLocal.exists('k')).toBe(false);
    expect(await other.get('k', ValueSchema)).toEqual({ n: 7 });
    expect(await otherLocal.exists('k')).toBe(true);
  });

  it('never lets a promoted copy outlive the backing entry', async () => {
    const otherLocal = new MemoryCacheStore({ now: clock });
    const other = createCache(otherLocal, backing);

    await cache.set('k', { n: 1 }, 2 * MINUTE);
    now += MINUTE;
    await other.get('k', ValueSchema);

    now += MINUTE - 1;
    expect(await otherLocal.exists('k')).toBe(true);
    now += 1;
    expect(await otherLocal.exists('k')).toBe(false);
    expect(await other.get('k', ValueSchema)).toBeNull();
  });

  it('uses the default TTL when none is given', async () => {
    await cache.set('k', { n: 1 }, null);

    now += HOUR - 1;
    expect(await cache.get('k', ValueSchema)).toEqual({ n: 1 });
    now += 1;
    expect(await cache.get('k', ValueSchema)).toBeNull();
  });

  it('skips writes with a non-positive TTL', async () => {
    await cache.set('k', { n: 1 }, 0);

    expect(await cache.exists('k')).toBe(false);
  });

  it('treats an entry that fails validation as a miss', async () => {
    await cache.set('k', { n: 'not a number' }, HOUR);

    expect(await cache.get('k', ValueSchema)).toBeNull();
  });

  it('treats undecodable text as a miss', async () => {
    await backing.set('k', '{not json', HOUR);

    expect(await cache.get('k', ValueSchema)).toBeNull();
  });

  it('removes from both tiers', async () => {
    await cache.set('k', { n: 1 }, HOUR);
    await cache.remove('k');

    expect(await local.exists('k')).toBe(false);
    expect(await backing.exists('k')).toBe(false);
    expect(await cache.exists('k')).toBe(false);
  });

  it('reports existence from either tier', async () => {
    await backing.set('k', 'anything', HOUR);

    expect(await cache.exists('k')).toBe(true);
  });

  it('counts an undecodable entry as present even though get misses', async () => {
    await local.set('k', '{not json', HOUR);

    expect(await cache.exists('k')).toBe(true);
    expect(await cache.get('k', ValueSchema)).toBeNull();
  });

  describe('with a failing backing store', () => {
    let broken: BrokenStore;

    beforeEach(() => {
      broken = new BrokenStore();
      cache = createCache(local, broken);
    });

    it('still writes and serves the local tier', async () => {
      await cache.set('k', { n: 3 }, HOUR);

      expect(broken.writes).toBe(1);
      expect(await cache.get('k', ValueSchema)).toEqual({ n: 3 });
    });

    it('degrades reads to a miss', async () => {
      expect(await cache.get('k', ValueSchema)).toBeNull();
      expect(await cache.exists('k')).toBe(false);
    });

    it('still removes the local copy', async () => {
      await cache.set('k', { n: 3 }, HOUR);
      await cache.remove('k');

      expect(await local.exists('k')).toBe(false);
    });
  });

  describe('with a failing local store', () => {
    let broken: BrokenStore;

    beforeEach(() => {
      broken = new BrokenStore();
      cache = createCache(broken, backing);
    });

    it('still writes the backing tier', async () => {
      await cache.set('k', { n: 1 }, HOUR);

      expect(broken.writes).toBe(1);
      expect(await backing.exists('k')).toBe(true);
    });

    it('serves reads from the backing tier', async () => {
      await cache.set('k', { n: 1 }, HOUR);

      expect(await cache.get('k', ValueSchema)).toEqual({ n: 1 });
      expect(await cache.exists('k')).toBe(true);
    });
  });

  it('rejects when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(cache.get('k', ValueSchema, controller.signal)).rejects.toBe(
      controller.signal.reason
    );
    await expect(cache.set('k', { n: 1 }, HOUR, controller.signal)).rejects.toBe(
      controller.signal.reason
    );
  });
});
