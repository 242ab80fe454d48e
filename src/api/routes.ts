import { Router, type Request, type Response, type NextFunction } from 'express';
import type { LocationService } from '../services/location-service.js';
import type { ProviderRegistry } from '../services/provider-registry.js';
import type { TwoTierCache } from '../storage/two-tier-cache.js';
import {
  GeocodeQuerySchema,
  ReverseGeocodeQuerySchema,
  RouteQuerySchema,
} from '../types/index.js';

// Error handler helper. A request whose client already disconnected has
// nobody to answer, so its failure is only logged.
function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch((error: unknown) => {
      if (res.locals.signal.aborted) {
        res.locals.log.info({ err: error }, 'Client disconnected before the response was written');
        return;
      }
      next(error);
    });
  };
}

export function createLocationRouter(
  service: LocationService,
  cache: TwoTierCache,
  registry: ProviderRegistry
): Router {
  const router = Router();

  // GET /api/location/geocode?address= - Address to coordinates
  router.get(
    '/geocode',
    asyncHandler(async (req, res) => {
      const parseResult = GeocodeQuerySchema.safeParse(req.query);

      if (!parseResult.success) {
        res.status(400).json({
          success: false,
          error: 'Invalid query parameters',
          details: parseResult.error.errors,
        });
        return;
      }

      const { address } = parseResult.data;
      const result = await service.geocode(address, res.locals.signal);

      if (!result.coordinates) {
        res.status(404).json({
          success: false,
          error: `No location found for address: ${address}`,
        });
        return;
      }

      res.json({
        success: true,
        result,
      });
    })
  );

  // GET /api/location/reverse-geocode?latitude=&longitude= - Coordinates to address
  router.get(
    '/reverse-geocode',
    asyncHandler(async (req, res) => {
      const parseResult = ReverseGeocodeQuerySchema.safeParse(req.query);

      if (!parseResult.success) {
        res.status(400).json({
          success: false,
          error: 'Invalid coordinates',
          details: parseResult.error.errors,
        });
        return;
      }

      const { latitude, longitude } = parseResult.data;
      const result = await service.reverseGeocode(
        { lat: latitude, lng: longitude },
        res.locals.signal
      );

      if (!result.formattedAddress) {
        res.status(404).json({
          success: false,
          error: `No address found for coordinates: ${latitude},${longitude}`,
        });
        return;
      }

      res.json({
        success: true,
        result,
      });
    })
  );

  // GET /api/location/route?fromLat=&fromLon=&toLat=&toLon= - Driving route
  router.get(
    '/route',
    asyncHandler(async (req, res) => {
      const parseResult = RouteQuerySchema.safeParse(req.query);

      if (!parseResult.success) {
        res.status(400).json({
          success: false,
          error: 'Invalid coordinates',
          details: parseResult.error.errors,
        });
        return;
      }

      const { fromLat, fromLon, toLat, toLon } = parseResult.data;
      const result = await service.route(
        { lat: fromLat, lng: fromLon },
        { lat: toLat, lng: toLon },
        res.locals.signal
      );

      if (result.distanceMeters <= 0) {
        res.status(404).json({
          success: false,
          error: 'No route found between the given coordinates',
        });
        return;
      }

      res.json({
        success: true,
        result,
      });
    })
  );

  // GET /api/location/health - Probe every provider
  router.get(
    '/health',
    asyncHandler(async (req, res) => {
      const providers = await service.getProvidersHealth(res.locals.signal);
      const states = Object.values(providers);
      const healthyCount = states.filter(Boolean).length;

      let status: 'healthy' | 'degraded' | 'unhealthy';
      if (healthyCount === states.length) {
        status = 'healthy';
      } else if (healthyCount > 0) {
        status = 'degraded';
      } else {
        status = 'unhealthy';
      }

      res.status(status === 'unhealthy' ? 503 : 200).json({
        success: status !== 'unhealthy',
        status,
        providers,
        timestamp: new Date().toISOString(),
      });
    })
  );

  // GET /api/location/providers - Registered providers in fallback order
  router.get('/providers', (req, res) => {
    res.json({
      success: true,
      providers: registry.descriptors(),
      default: registry.getDefaultProvider(),
    });
  });

  // GET /api/location/cache/:key - Whether a cache key is present
  router.get(
    '/cache/:key',
    asyncHandler(async (req, res) => {
      const { key } = req.params;
      const exists = await cache.exists(key, res.locals.signal);

      res.json({
        success: true,
        key,
        exists,
      });
    })
  );

  // DELETE /api/location/cache/:key - Evict a key from both tiers
  router.delete(
    '/cache/:key',
    asyncHandler(async (req, res) => {
      const { key } = req.params;
      await cache.remove(key, res.locals.signal);

      res.json({
        success: true,
        message: 'Cache entry removed',
        key,
      });
    })
  );

  return router;
}
