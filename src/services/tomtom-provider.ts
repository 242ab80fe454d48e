import { z } from 'zod';
import type { Logger } from 'pino';
import {
  type Coordinates,
  type GeocodeResult,
  type RouteResult,
  emptyGeocodeResult,
  emptyRouteResult,
} from '../types/index.js';
import type { LocationProvider } from './location-provider.js';
import { fetchProviderJson } from './provider-http.js';

// TomTom API response schemas (subset of fields we use)
const TomTomAddressSchema = z.object({
  municipality: z.string().optional(),
  countrySubdivision: z.string().optional(),
  postalCode: z.string().optional(),
  countryCode: z.string().optional(),
  freeformAddress: z.string(),
});
type TomTomAddress = z.infer<typeof TomTomAddressSchema>;

const TomTomGeocodeResponseSchema = z.object({
  results: z.array(
    z.object({
      score: z.number(),
      address: TomTomAddressSchema,
      position: z.object({
        lat: z.number(),
        lon: z.number(),
      }),
    })
  ),
});

const TomTomReverseGeocodeResponseSchema = z.object({
  addresses: z.array(
    z.object({
      address: TomTomAddressSchema,
      position: z.string(),
    })
  ),
});

const TomTomRouteResponseSchema = z.object({
  routes: z.array(
    z.object({
      summary: z.object({
        lengthInMeters: z.number(),
        travelTimeInSeconds: z.number(),
      }),
      legs: z
        .array(
          z.object({
            points: z
              .array(
                z.object({
                  latitude: z.number(),
                  longitude: z.number(),
                })
              )
              .optional(),
          })
        )
        .optional(),
    })
  ),
});

const HEALTH_CHECK_ADDRESS = 'London';

export interface TomTomProviderOptions {
  apiKey: string;
  logger: Logger;
  baseUrl?: string;
  requestTimeoutMs?: number;
}

/**
 * TomTom client. TomTom's terms of service prohibit server-side caching, so
 * its results are served but never stored.
 */
export class TomTomProvider implements LocationProvider {
  readonly name = 'TomTom';
  readonly allowsCaching = false;
  readonly cacheTtlMs = null;
  private apiKey: string;
  private baseUrl: string;
  private requestTimeoutMs: number;
  private log: Logger;

  constructor(options: TomTomProviderOptions) {
    if (!options.apiKey) {
      throw new Error('TomTom API is not configured. Please set TOMTOM_API_KEY.');
    }
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? 'https://api.tomtom.com';
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
    this.log = options.logger.child({ component: 'TomTomProvider' });
  }

  async geocode(address: string, signal?: AbortSignal): Promise<GeocodeResult> {
    const url = new URL(`${this.baseUrl}/search/2/geocode/${encodeURIComponent(address)}.json`);
    url.searchParams.set('key', this.apiKey);
    url.searchParams.set('limit', '1');

    const parsed = await fetchProviderJson({
      provider: this.name,
      operation: 'geocode',
      url,
      schema: TomTomGeocodeResponseSchema,
      timeoutMs: this.requestTimeoutMs,
      signal,
    });

    const result = parsed.results[0];
    if (!result) {
      return emptyGeocodeResult(this.name, { address });
    }

    return {
      ...this.mapAddress(result.address),
      address,
      coordinates: {
        lat: result.position.lat,
        lng: result.position.lon,
      },
      confidence: Math.min(result.score / 100, 1),
    };
  }

  async reverseGeocode(coordinates: Coordinates, signal?: AbortSignal): Promise<GeocodeResult> {
    const url = new URL(
      `${this.baseUrl}/search/2/reverseGeocode/${coordinates.lat},${coordinates.lng}.json`
    );
    url.searchParams.set('key', this.apiKey);

    const parsed = await fetchProviderJson({
      provider: this.name,
      operation: 'reverseGeocode',
      url,
      schema: TomTomReverseGeocodeResponseSchema,
      timeoutMs: this.requestTimeoutMs,
      signal,
    });

    const result = parsed.addresses[0];
    if (!result) {
      return emptyGeocodeResult(this.name, { coordinates });
    }

    return {
      ...this.mapAddress(result.address),
      address: result.address.freeformAddress,
      coordinates,
      confidence: 1,
    };
  }

  async route(from: Coordinates, to: Coordinates, signal?: AbortSignal): Promise<RouteResult> {
    const locations = `${from.lat},${from.lng}:${to.lat},${to.lng}`;
    const url = new URL(`${this.baseUrl}/routing/1/calculateRoute/${locations}/json`);
    url.searchParams.set('key', this.apiKey);
    url.searchParams.set('routeType', 'fastest');

    const parsed = await fetchProviderJson({
      provider: this.name,
      operation: 'route',
      url,
      schema: TomTomRouteResponseSchema,
      timeoutMs: this.requestTimeoutMs,
      signal,
    });

    const route = parsed.routes[0];
    if (!route) {
      return emptyRouteResult(this.name, from, to);
    }

    return {
      origin: from,
      destination: to,
      distanceMeters: route.summary.lengthInMeters,
      durationSeconds: route.summary.travelTimeInSeconds,
      routePoints: (route.legs ?? []).flatMap((leg) =>
        (leg.points ?? []).map((point) => ({ lat: point.latitude, lng: point.longitude }))
      ),
      instructions: '',
      providerName: this.name,
      responseTime: new Date().toISOString(),
    };
  }

  async isHealthy(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.geocode(HEALTH_CHECK_ADDRESS, signal);
      return true;
    } catch (error) {
      signal?.throwIfAborted();
      this.log.warn({ err: error }, 'TomTom health check failed');
      return false;
    }
  }

  private mapAddress(address: TomTomAddress) {
    return {
      formattedAddress: address.freeformAddress,
      countryCode: address.countryCode ?? '',
      postalCode: address.postalCode ?? '',
      city: address.municipality ?? '',
      state: address.countrySubdivision ?? '',
      providerName: this.name,
      responseTime: new Date().toISOString(),
    };
  }
}
