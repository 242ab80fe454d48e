import type { Coordinates, GeocodeResult, RouteResult } from '../types/index.js';

/**
 * Contract implemented by every location vendor client (TomTom, HERE, ...).
 *
 * Implementations throw a ProviderError on transport or response failures
 * and return an empty result (no coordinates, no formatted address, zero
 * distance) when the vendor simply has no answer.
 */
export interface LocationProvider {
  readonly name: string;
  /** Whether the vendor's terms allow server-side caching of its responses */
  readonly allowsCaching: boolean;
  /** Preferred TTL for cached responses; null means the cache default */
  readonly cacheTtlMs: number | null;

  geocode(address: string, signal?: AbortSignal): Promise<GeocodeResult>;
  reverseGeocode(coordinates: Coordinates, signal?: AbortSignal): Promise<GeocodeResult>;
  route(from: Coordinates, to: Coordinates, signal?: AbortSignal): Promise<RouteResult>;
  isHealthy(signal?: AbortSignal): Promise<boolean>;
}

// Provider factory function type
export type ProviderFactory = () => LocationProvider;
