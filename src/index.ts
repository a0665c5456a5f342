// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { OpenMeteoAdapter } from './adapters/weather/OpenMeteoAdapter.js';
import { OpenMeteoAirQualityAdapter } from './adapters/weather/OpenMeteoAirQualityAdapter.js';
import { ForecastCache } from './core/cache/ForecastCache.js';
import { ForecastService } from './core/forecast/ForecastService.js';
import { FavouritesComparer } from './core/favourites/FavouritesComparison.js';
import type { AirQualityReading } from './core/insights/airQuality.js';
import type { ForecastBundle } from './core/model/forecast.js';
import { closeDatabase, getDatabase } from './persistence/database.js';
import { FavouriteLocationRepository } from './persistence/repositories/FavouriteLocationRepository.js';
import { ForecastPrefetchJob } from './scheduler/ForecastPrefetchJob.js';
import { scheduleForecastPrefetch } from './scheduler/index.js';
import { createApp, startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting forecast engine');

  try {
    const config = loadConfig();

    const weatherAdapter = new OpenMeteoAdapter(config);
    const airQualityAdapter = new OpenMeteoAirQualityAdapter(config);
    // One cache per upstream for the whole process, passed explicitly to whoever needs it
    const cacheTtlMs = config.cacheTtlMinutes * 60 * 1000;
    const forecastCache = new ForecastCache<ForecastBundle>({ ttlMs: cacheTtlMs });
    const airQualityCache = new ForecastCache<AirQualityReading>({ ttlMs: cacheTtlMs });
    const forecastService = new ForecastService(
      weatherAdapter,
      forecastCache,
      { port: airQualityAdapter, cache: airQualityCache },
      {
        forecastDays: config.forecastDays,
        defaultTimezone: config.timezone,
      }
    );

    const favouriteRepository = new FavouriteLocationRepository(getDatabase(config.databasePath));
    const favouritesComparer = new FavouritesComparer(forecastService);

    const prefetchJob = new ForecastPrefetchJob(forecastService, favouriteRepository, config.defaultUnits);
    const prefetchTask = scheduleForecastPrefetch(prefetchJob, config.prefetchCron, config.timezone);

    const app = createApp({
      forecastService,
      favouriteRepository,
      favouritesComparer,
      defaultUnits: config.defaultUnits,
    });
    const server = await startServer(app, config.port, config.host);

    logger.info({ host: config.host, port: config.port }, 'Server started successfully');

    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, 'Shutting down');
      prefetchTask.stop();
      server.close(() => {
        closeDatabase();
        process.exit(0);
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
