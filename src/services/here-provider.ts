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

// HERE API response schemas
const HereItemSchema = z.object({
  title: z.string(),
  address: z.object({
    label: z.string().optional(),
    countryCode: z.string().optional(),
    state: z.string().optional(),
    city: z.string().optional(),
    postalCode: z.string().optional(),
  }),
  position: z.object({
    lat: z.number(),
    lng: z.number(),
  }),
  scoring: z
    .object({
      queryScore: z.number().optional(),
    })
    .optional(),
});
type HereItem = z.infer<typeof HereItemSchema>;

const HereGeocodeResponseSchema = z.object({
  items: z.array(HereItemSchema),
});

const HereRouteResponseSchema = z.object({
  routes: z.array(
    z.object({
      sections: z.array(
        z.object({
          summary: z.object({
            duration: z.number(), // seconds
            length: z.number(), // meters
          }),
        })
      ),
    })
  ),
});

const HEALTH_CHECK_ADDRESS = 'London';

export interface HereProviderOptions {
  apiKey: string;
  logger: Logger;
  cacheTtlMs: number;
  geocodingBaseUrl?: string;
  reverseGeocodeBaseUrl?: string;
  routingBaseUrl?: string;
  requestTimeoutMs?: number;
}

/**
 * HERE client. HERE permits caching its responses for a bounded period.
 */
export class HereProvider implements LocationProvider {
  readonly name = 'HERE';
  readonly allowsCaching = true;
  readonly cacheTtlMs: number;
  private apiKey: string;
  private geocodingBaseUrl: string;
  private reverseGeocodeBaseUrl: string;
  private routingBaseUrl: string;
  private requestTimeoutMs: number;
  private log: Logger;

  constructor(options: HereProviderOptions) {
    if (!options.apiKey) {
      throw new Error('HERE API is not configured. Please set HERE_API_KEY.');
    }
    this.apiKey = options.apiKey;
    this.cacheTtlMs = options.cacheTtlMs;
    this.geocodingBaseUrl = options.geocodingBaseUrl ?? 'https://geocode.search.hereapi.com';
    this.reverseGeocodeBaseUrl =
      options.reverseGeocodeBaseUrl ?? 'https://revgeocode.search.hereapi.com';
    this.routingBaseUrl = options.routingBaseUrl ?? 'https://router.hereapi.com';
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
    this.log = options.logger.child({ component: 'HereProvider' });
  }

  async geocode(address: string, signal?: AbortSignal): Promise<GeocodeResult> {
    const url = new URL(`${this.geocodingBaseUrl}/v1/geocode`);
    url.searchParams.set('apiKey', this.apiKey);
    url.searchParams.set('q', address);
    url.searchParams.set('limit', '1');

    const parsed = await fetchProviderJson({
      provider: this.name,
      operation: 'geocode',
      url,
      schema: HereGeocodeResponseSchema,
      timeoutMs: this.requestTimeoutMs,
      signal,
    });

    const item = parsed.items[0];
    if (!item) {
      return emptyGeocodeResult(this.name, { address });
    }

    return {
      ...this.mapItem(item),
      address,
      coordinates: {
        lat: item.position.lat,
        lng: item.position.lng,
      },
      confidence: item.scoring?.queryScore ?? 1,
    };
  }

  async reverseGeocode(coordinates: Coordinates, signal?: AbortSignal): Promise<GeocodeResult> {
    const url = new URL(`${this.reverseGeocodeBaseUrl}/v1/revgeocode`);
    url.searchParams.set('apiKey', this.apiKey);
    url.searchParams.set('at', `${coordinates.lat},${coordinates.lng}`);
    url.searchParams.set('limit', '1');

    const parsed = await fetchProviderJson({
      provider: this.name,
      operation: 'reverseGeocode',
      url,
      schema: HereGeocodeResponseSchema,
      timeoutMs: this.requestTimeoutMs,
      signal,
    });

    const item = parsed.items[0];
    if (!item) {
      return emptyGeocodeResult(this.name, { coordinates });
    }

    const mapped = this.mapItem(item);
    return {
      ...mapped,
      address: mapped.formattedAddress,
      coordinates,
      confidence: 1,
    };
  }

  async route(from: Coordinates, to: Coordinates, signal?: AbortSignal): Promise<RouteResult> {
    const url = new URL(`${this.routingBaseUrl}/v8/routes`);
    url.searchParams.set('apiKey', this.apiKey);
    url.searchParams.set('transportMode', 'car');
    url.searchParams.set('origin', `${from.lat},${from.lng}`);
    url.searchParams.set('destination', `${to.lat},${to.lng}`);
    url.searchParams.set('return', 'summary');

    const parsed = await fetchProviderJson({
      provider: this.name,
      operation: 'route',
      url,
      schema: HereRouteResponseSchema,
      timeoutMs: this.requestTimeoutMs,
      signal,
    });

    const route = parsed.routes[0];
    if (!route || route.sections.length === 0) {
      return emptyRouteResult(this.name, from, to);
    }

    // A route through via points comes back as several sections
    let distanceMeters = 0;
    let durationSeconds = 0;
    for (const section of route.sections) {
      distanceMeters += section.summary.length;
      durationSeconds += section.summary.duration;
    }

    return {
      origin: from,
      destination: to,
      distanceMeters,
      durationSeconds,
      routePoints: [],
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
      this.log.warn({ err: error }, 'HERE health check failed');
      return false;
    }
  }

  private mapItem(item: HereItem) {
    return {
      formattedAddress: item.address.label ?? item.title,
      countryCode: item.address.countryCode ?? '',
      postalCode: item.address.postalCode ?? '',
      city: item.address.city ?? '',
      state: item.address.state ?? '',
      providerName: this.name,
      responseTime: new Date().toISOString(),
    };
  }
}
