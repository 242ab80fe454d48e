/**
 * Location Service
 *
 * Aggregation orchestrator in front of the registered providers. Every
 * lookup runs the same sequence:
 *
 * 1. derive the cache key from the canonicalized inputs
 * 2. return a cache hit unchanged
 * 3. otherwise try providers one at a time in registry order; the first
 *    usable result is cached (when that provider allows it) and returned
 * 4. when no provider produced a usable result, return an empty result whose
 *    provider name is "None"
 *
 * Provider failures and empty answers only move the loop on to the next
 * provider. Cancellation is the one outcome that propagates to the caller.
 *
 * Concurrent misses on the same key are not coalesced; each caller runs the
 * provider chain on its own.
 */

import type { z } from 'zod';
import type { Logger } from 'pino';
import type { LocationOperation } from '../errors.js';
import type { TwoTierCache } from '../storage/two-tier-cache.js';
import {
  GeocodeResultSchema,
  NO_PROVIDER,
  RouteResultSchema,
  emptyGeocodeResult,
  emptyRouteResult,
  type Coordinates,
  type GeocodeResult,
  type HealthSnapshot,
  type RouteResult,
} from '../types/index.js';
import { abortable, isAborted } from '../utils/abort.js';
import { geocodeKey, reverseGeocodeKey, routeKey } from '../utils/cache-key.js';
import type { LocationProvider } from './location-provider.js';
import type { ProviderRegistry } from './provider-registry.js';

/** Result of asking a single provider */
export type AttemptOutcome<T> =
  | { status: 'success'; result: T }
  | { status: 'empty' }
  | { status: 'error'; error: unknown };

interface LookupPlan<T> {
  operation: Exclude<LocationOperation, 'health'>;
  key: string;
  schema: z.ZodType<T>;
  /** Request fields included in log lines */
  context: Record<string, unknown>;
  invoke(provider: LocationProvider, signal?: AbortSignal): Promise<T>;
  isUsable(result: T): boolean;
  exhausted(): T;
}

export interface LocationServiceDeps {
  registry: ProviderRegistry;
  cache: TwoTierCache;
  logger: Logger;
}

export class LocationService {
  private readonly registry: ProviderRegistry;
  private readonly cache: TwoTierCache;
  private readonly log: Logger;

  constructor(deps: LocationServiceDeps) {
    this.registry = deps.registry;
    this.cache = deps.cache;
    this.log = deps.logger.child({ component: 'LocationService' });
  }

  geocode(address: string, signal?: AbortSignal): Promise<GeocodeResult> {
    return this.lookup(
      {
        operation: 'geocode',
        key: geocodeKey(address),
        schema: GeocodeResultSchema,
        context: { address },
        invoke: (provider, s) => provider.geocode(address, s),
        isUsable: (result) => result.coordinates !== null,
        exhausted: () => emptyGeocodeResult(NO_PROVIDER, { address }),
      },
      signal
    );
  }

  reverseGeocode(coordinates: Coordinates, signal?: AbortSignal): Promise<GeocodeResult> {
    return this.lookup(
      {
        operation: 'reverseGeocode',
        key: reverseGeocodeKey(coordinates),
        schema: GeocodeResultSchema,
        context: { coordinates },
        invoke: (provider, s) => provider.reverseGeocode(coordinates, s),
        isUsable: (result) => result.formattedAddress.length > 0,
        exhausted: () => emptyGeocodeResult(NO_PROVIDER, { coordinates }),
      },
      signal
    );
  }

  route(from: Coordinates, to: Coordinates, signal?: AbortSignal): Promise<RouteResult> {
    return this.lookup(
      {
        operation: 'route',
        key: routeKey(from, to),
        schema: RouteResultSchema,
        context: { from, to },
        invoke: (provider, s) => provider.route(from, to, s),
        isUsable: (result) => result.distanceMeters > 0,
        exhausted: () => emptyRouteResult(NO_PROVIDER, from, to),
      },
      signal
    );
  }

  /**
   * Probe every registered provider concurrently. A probe that throws counts
   * as unhealthy; the snapshot always has one entry per provider.
   */
  async getProvidersHealth(signal?: AbortSignal): Promise<HealthSnapshot> {
    signal?.throwIfAborted();

    const results = await Promise.all(
      this.registry.list().map(async ({ descriptor, provider }) => {
        try {
          const healthy = await abortable(provider.isHealthy(signal), signal);
          return [descriptor.name, healthy] as const;
        } catch (error) {
          if (isAborted(signal)) throw error;
          this.log.warn({ err: error, provider: descriptor.name }, 'Provider health probe failed');
          return [descriptor.name, false] as const;
        }
      })
    );

    return Object.fromEntries(results);
  }

  private async lookup<T>(plan: LookupPlan<T>, signal?: AbortSignal): Promise<T> {
    const { operation, key, context } = plan;

    const cached = await this.cache.get(key, plan.schema, signal);
    if (cached !== null) {
      this.log.debug({ operation, key, ...context }, 'Serving cached result');
      return cached;
    }

    for (const { descriptor, provider } of this.registry.list()) {
      signal?.throwIfAborted();
      this.log.debug({ operation, provider: descriptor.name }, 'Attempting provider');

      const outcome = await this.attempt(plan, provider, signal);

      if (outcome.status === 'success') {
        if (descriptor.allowsCaching) {
          await this.cache.set(key, outcome.result, descriptor.cacheTtlMs, signal);
          this.log.debug({ operation, key, provider: descriptor.name }, 'Cached provider result');
        }
        return outcome.result;
      }

      if (outcome.status === 'empty') {
        this.log.info({ operation, provider: descriptor.name, ...context }, 'Provider returned no result');
      } else {
        this.log.warn(
          { err: outcome.error, operation, provider: descriptor.name, ...context },
          'Provider failed'
        );
      }
    }

    this.log.error({ operation, ...context }, 'All providers failed');
    return plan.exhausted();
  }

  private async attempt<T>(
    plan: LookupPlan<T>,
    provider: LocationProvider,
    signal?: AbortSignal
  ): Promise<AttemptOutcome<T>> {
    try {
      const result = await abortable(plan.invoke(provider, signal), signal);
      return plan.isUsable(result) ? { status: 'success', result } : { status: 'empty' };
    } catch (error) {
      if (isAborted(signal)) throw error;
      return { status: 'error', error };
    }
  }
}
