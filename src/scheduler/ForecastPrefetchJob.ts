import type { ForecastService } from '../core/forecast/ForecastService.js';
import type { UnitSystem } from '../core/units/unitConverter.js';
import type { FavouriteLocationRepository } from '../persistence/repositories/FavouriteLocationRepository.js';
import { createLogger } from '../utils/logger.js';

export interface PrefetchResult {
  warmed: number;
  failed: number;
}

/** Keeps favourite locations warm in the forecast cache. */
export class ForecastPrefetchJob {
  private readonly logger = createLogger({ job: 'ForecastPrefetchJob' });

  constructor(
    private readonly forecastService: ForecastService,
    private readonly favouriteRepository: FavouriteLocationRepository,
    private readonly units: UnitSystem
  ) {}

  async run(): Promise<PrefetchResult> {
    const logger = this.logger.child({ method: 'run' });
    const favourites = this.favouriteRepository.list();
    if (favourites.length === 0) {
      logger.debug('No favourites to prefetch');
      return { warmed: 0, failed: 0 };
    }

    let warmed = 0;
    let failed = 0;
    for (const favourite of favourites) {
      const bundle = await this.forecastService.getForecast({
        latitude: favourite.latitude,
        longitude: favourite.longitude,
        units: this.units,
        timezone: favourite.timezone,
      });
      if (bundle) {
        warmed += 1;
      } else {
        failed += 1;
        logger.warn({ favourite: favourite.label }, 'Prefetch failed');
      }
    }

    logger.info({ warmed, failed }, 'Forecast prefetch finished');
    return { warmed, failed };
  }
}
