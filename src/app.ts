import express from 'express';
import type { Logger } from 'pino';
import { createLocationRouter } from './api/routes.js';
import { requestContext } from './api/request-context.js';
import type { LocationService } from './services/location-service.js';
import type { ProviderRegistry } from './services/provider-registry.js';
import type { TwoTierCache } from './storage/two-tier-cache.js';

export interface AppDependencies {
  service: LocationService;
  cache: TwoTierCache;
  registry: ProviderRegistry;
  logger: Logger;
  isDevelopment: boolean;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(requestContext(deps.logger));
  app.use(express.json());

  // CORS for browser clients
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Request-Id');

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }

    next();
  });

  // Routes
  app.use('/api/location', createLocationRouter(deps.service, deps.cache, deps.registry));

  // Root endpoint
  app.get('/', (req, res) => {
    res.json({
      name: 'Location Cache Gateway',
      version: '1.0.0',
      providers: deps.registry.getAvailableProviders(),
      endpoints: {
        geocode: 'GET /api/location/geocode?address=',
        reverseGeocode: 'GET /api/location/reverse-geocode?latitude=&longitude=',
        route: 'GET /api/location/route?fromLat=&fromLon=&toLat=&toLon=',
        health: 'GET /api/location/health',
        providers: 'GET /api/location/providers',
        cacheExists: 'GET /api/location/cache/:key',
        cacheRemove: 'DELETE /api/location/cache/:key',
      },
    });
  });

  // Error handling middleware
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      // Express recognizes error handlers by their four parameters
      _next: express.NextFunction
    ) => {
      res.locals.log.error({ err }, 'Unhandled request error');

      res.status(500).json({
        success: false,
        error: err.message,
        ...(deps.isDevelopment && { stack: err.stack }),
      });
    }
  );

  return app;
}
