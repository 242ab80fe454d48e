import { z } from 'zod';

// Provider identifiers accepted in configuration
export const ProviderIdSchema = z.enum(['tomtom', 'here']);
export type ProviderId = z.infer<typeof ProviderIdSchema>;

// Provider name reported on results when every provider came back empty
export const NO_PROVIDER = 'None';

// Coordinates
export const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});
export type Coordinates = z.infer<typeof CoordinatesSchema>;

// Geocode / reverse-geocode result
export const GeocodeResultSchema = z.object({
  address: z.string(),
  coordinates: CoordinatesSchema.nullable(),
  confidence: z.number(),
  formattedAddress: z.string(),
  countryCode: z.string(),
  postalCode: z.string(),
  city: z.string(),
  state: z.string(),
  providerName: z.string(),
  responseTime: z.string().datetime(),
});
export type GeocodeResult = z.infer<typeof GeocodeResultSchema>;

// Route result
export const RouteResultSchema = z.object({
  origin: CoordinatesSchema,
  destination: CoordinatesSchema,
  distanceMeters: z.number().nonnegative(),
  durationSeconds: z.number().nonnegative(),
  routePoints: z.array(CoordinatesSchema),
  instructions: z.string(),
  providerName: z.string(),
  responseTime: z.string().datetime(),
});
export type RouteResult = z.infer<typeof RouteResultSchema>;

// Capability description of a registered provider
export interface ProviderDescriptor {
  readonly name: string;
  readonly allowsCaching: boolean;
  readonly cacheTtlMs: number | null;
  readonly priority: number;
}

export type HealthSnapshot = Record<string, boolean>;

// Cache entry envelope written to both cache tiers
export const CacheEntrySchema = z.object({
  key: z.string(),
  data: z.unknown(),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
});
export type CacheEntry = z.infer<typeof CacheEntrySchema>;

// Gateway query schemas
// Query strings arrive as text; blank values must not coerce to 0
const latitude = z.string().trim().min(1).pipe(z.coerce.number().min(-90).max(90));
const longitude = z.string().trim().min(1).pipe(z.coerce.number().min(-180).max(180));

export const GeocodeQuerySchema = z.object({
  address: z.string().trim().min(1, 'Address is required'),
});
export type GeocodeQuery = z.infer<typeof GeocodeQuerySchema>;

export const ReverseGeocodeQuerySchema = z.object({
  latitude,
  longitude,
});
export type ReverseGeocodeQuery = z.infer<typeof ReverseGeocodeQuerySchema>;

export const RouteQuerySchema = z.object({
  fromLat: latitude,
  fromLon: longitude,
  toLat: latitude,
  toLon: longitude,
});
export type RouteQuery = z.infer<typeof RouteQuerySchema>;

export function emptyGeocodeResult(
  providerName: string,
  fields: { address?: string; coordinates?: Coordinates | null } = {}
): GeocodeResult {
  return {
    address: fields.address ?? '',
    coordinates: fields.coordinates ?? null,
    confidence: 0,
    formattedAddress: '',
    countryCode: '',
    postalCode: '',
    city: '',
    state: '',
    providerName,
    responseTime: new Date().toISOString(),
  };
}

export function emptyRouteResult(
  providerName: string,
  origin: Coordinates,
  destination: Coordinates
): RouteResult {
  return {
    origin,
    destination,
    distanceMeters: 0,
    durationSeconds: 0,
    routePoints: [],
    instructions: '',
    providerName,
    responseTime: new Date().toISOString(),
  };
}
