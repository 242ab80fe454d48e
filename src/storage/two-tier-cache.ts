/**
 * Two-Tier Cache
 *
 * A fast process-local tier in front of a shared backing tier (Redis in
 * production). Reads go local first and promote backing hits into the local
 * tier; writes go to both tiers independently.
 *
 * Both tiers hold the same serialized CacheEntry envelope, so a backing hit
 * knows its absolute expiry and the local copy never outlives it.
 *
 * Store faults never reach the caller: reads degrade to a miss, writes and
 * removals are logged. Only an aborted signal propagates.
 */

import type { z } from 'zod';
import type { Logger } from 'pino';
import { CacheEntrySchema, type CacheEntry } from '../types/index.js';
import { abortable, isAborted } from '../utils/abort.js';
import type { CacheStore, Clock } from './cache-store.js';

export const DEFAULT_LOCAL_TTL_CAP_MS = 5 * 60 * 1000;
export const DEFAULT_TTL_MS = 60 * 60 * 1000;

export type CacheTier = 'local' | 'backing';

export interface TwoTierCacheOptions {
  local: CacheStore;
  backing: CacheStore;
  logger: Logger;
  /** Upper bound on how long an entry may live in the local tier */
  localTtlCapMs?: number;
  /** TTL used when a write names none */
  defaultTtlMs?: number;
  now?: Clock;
}

interface CachedValue<T> {
  value: T;
  raw: string;
  remainingMs: number;
}

export class TwoTierCache {
  private readonly local: CacheStore;
  private readonly backing: CacheStore;
  private readonly log: Logger;
  private readonly localTtlCapMs: number;
  private readonly defaultTtlMs: number;
  private readonly now: Clock;

  constructor(options: TwoTierCacheOptions) {
    this.local = options.local;
    this.backing = options.backing;
    this.log = options.logger.child({ component: 'TwoTierCache' });
    this.localTtlCapMs = options.localTtlCapMs ?? DEFAULT_LOCAL_TTL_CAP_MS;
    this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Read-through lookup. Returns null on a miss, on an expired entry, and on
   * an entry that no longer matches `schema`.
   */
  async get<T>(key: string, schema: z.ZodType<T>, signal?: AbortSignal): Promise<T | null> {
    signal?.throwIfAborted();

    const local = await this.read('local', this.local, key, schema, signal);
    if (local) {
      this.log.debug({ key }, 'Cache hit (local)');
      return local.value;
    }

    const backing = await this.read('backing', this.backing, key, schema, signal);
    if (!backing) {
      this.log.debug({ key }, 'Cache miss');
      return null;
    }

    this.log.debug({ key }, 'Cache hit (backing)');
    const localTtlMs = Math.min(backing.remainingMs, this.localTtlCapMs);
    await this.write('local', this.local, key, backing.raw, localTtlMs, signal);
    return backing.value;
  }

  /**
   * Write-through to both tiers. The local copy is capped at the local TTL;
   * the backing copy gets the full TTL (the default TTL when `ttlMs` is null
   * or omitted).
   */
  async set<T>(key: string, value: T, ttlMs?: number | null, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const effectiveTtlMs = ttlMs ?? this.defaultTtlMs;
    if (effectiveTtlMs <= 0) {
      this.log.debug({ key, ttlMs: effectiveTtlMs }, 'Skipping cache write with non-positive TTL');
      return;
    }

    const createdAt = this.now();
    const entry: CacheEntry = {
      key,
      data: value,
      createdAt: new Date(createdAt).toISOString(),
      expiresAt: new Date(createdAt + effectiveTtlMs).toISOString(),
    };
    const raw = JSON.stringify(entry);

    await Promise.all([
      this.write('local', this.local, key, raw, Math.min(effectiveTtlMs, this.localTtlCapMs), signal),
      this.write('backing', this.backing, key, raw, effectiveTtlMs, signal),
    ]);

    this.log.debug({ key, ttlMs: effectiveTtlMs }, 'Cache set');
  }

  async remove(key: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    await Promise.all(
      ([['local', this.local], ['backing', this.backing]] as const).map(async ([tier, store]) => {
        try {
          await abortable(store.remove(key), signal);
        } catch (error) {
          if (isAborted(signal)) throw error;
          this.log.warn({ err: error, key, tier, store: store.name }, 'Cache remove failed');
        }
      })
    );

    this.log.debug({ key }, 'Cache removed');
  }

  /**
   * Presence check: true when either store holds an unexpired value for
   * `key`. The envelope is not decoded, so an entry that `get` would reject
   * still counts as present until it expires or is overwritten.
   */
  async exists(key: string, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();

    if (await this.has('local', this.local, key, signal)) return true;
    return this.has('backing', this.backing, key, signal);
  }

  private async has(
    tier: CacheTier,
    store: CacheStore,
    key: string,
    signal?: AbortSignal
  ): Promise<boolean> {
    try {
      return await abortable(store.exists(key), signal);
    } catch (error) {
      if (isAborted(signal)) throw error;
      this.log.warn({ err: error, key, tier, store: store.name }, 'Cache exists check failed');
      return false;
    }
  }

  private async read<T>(
    tier: CacheTier,
    store: CacheStore,
    key: string,
    schema: z.ZodType<T>,
    signal?: AbortSignal
  ): Promise<CachedValue<T> | null> {
    let raw: string | null;
    try {
      raw = await abortable(store.get(key), signal);
    } catch (error) {
      if (isAborted(signal)) throw error;
      this.log.warn({ err: error, key, tier, store: store.name }, 'Cache read failed, treating as miss');
      return null;
    }
    if (raw === null) return null;

    const decoded = this.decode(raw, schema);
    if (!decoded) {
      this.log.warn({ key, tier }, 'Ignoring cache entry that does not decode');
      return null;
    }

    const remainingMs = decoded.expiresAt - this.now();
    if (remainingMs <= 0) return null;

    return { value: decoded.value, raw, remainingMs };
  }

  private async write(
    tier: CacheTier,
    store: CacheStore,
    key: string,
    raw: string,
    ttlMs: number,
    signal?: AbortSignal
  ): Promise<void> {
    try {
      await abortable(store.set(key, raw, ttlMs), signal);
    } catch (error) {
      if (isAborted(signal)) throw error;
      this.log.warn({ err: error, key, tier, store: store.name }, 'Cache write failed');
    }
  }

  private decode<T>(raw: string, schema: z.ZodType<T>): { value: T; expiresAt: number } | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }

    const entry = CacheEntrySchema.safeParse(json);
    if (!entry.success) return null;

    const value = schema.safeParse(entry.data.data);
    if (!value.success) return null;

    return { value: value.data, expiresAt: Date.parse(entry.data.expiresAt) };
  }
}
