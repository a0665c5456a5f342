import express from 'express';
import type { Express } from 'express';
import type { Server } from 'node:http';
import type { FavouritesComparer } from './core/favourites/FavouritesComparison.js';
import type { ForecastService } from './core/forecast/ForecastService.js';
import type { UnitSystem } from './core/units/unitConverter.js';
import { createFavouritesRouter } from './http/favouritesRouter.js';
import { createForecastRouter } from './http/forecastRouter.js';
import type { FavouriteLocationRepository } from './persistence/repositories/FavouriteLocationRepository.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger({ component: 'server' });

export interface AppDependencies {
  forecastService: ForecastService;
  favouriteRepository: FavouriteLocationRepository;
  favouritesComparer: FavouritesComparer;
  defaultUnits: UnitSystem;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.use('/forecast', createForecastRouter(deps.forecastService, deps.defaultUnits));
  app.use(
    '/favourites',
    createFavouritesRouter(deps.favouriteRepository, deps.favouritesComparer, deps.defaultUnits)
  );

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(app: Express, port: number, host: string = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
