import type { FavouriteLocation } from '../../persistence/repositories/FavouriteLocationRepository.js';
import { createLogger } from '../../utils/logger.js';
import type { ForecastService } from '../forecast/ForecastService.js';
import { resolveTodayAggregate, type OptionalNumber } from '../model/forecast.js';
import { formatPercent, formatTemperature, formatWindSpeed } from '../units/formatting.js';
import type { UnitSystem } from '../units/unitConverter.js';

export const MAX_COMPARED_FAVOURITES = 3;

export interface ComparisonRow {
  favouriteId: number;
  label: string;
  high: OptionalNumber;
  low: OptionalNumber;
  rainProbabilityMax: OptionalNumber;
  windSpeedMax: OptionalNumber;
  uvIndexMax: OptionalNumber;
}

export interface FavouritesComparison {
  rows: ComparisonRow[];
  /** Favourites whose forecast could not be fetched. */
  unavailable: string[];
  text: string;
}

const NAME_WIDTH = 28;

function truncateName(name: string): string {
  return name.length > NAME_WIDTH ? `${name.slice(0, NAME_WIDTH - 1)}…` : name;
}

export function formatComparisonTable(rows: readonly ComparisonRow[], units: UnitSystem): string {
  if (rows.length === 0) {
    return 'No data could be fetched for the selected favourites.';
  }

  const header = `${'Place'.padEnd(NAME_WIDTH)} ${'High'.padStart(10)} ${'Low'.padStart(10)} ${'Rain%'.padStart(7)} ${'Wind'.padStart(11)} ${'UV'.padStart(5)}`;
  const lines = ["Comparing today's forecast:", '', header, '-'.repeat(header.length)];

  for (const row of rows) {
    const uv = row.uvIndexMax === undefined ? 'N/A' : row.uvIndexMax.toFixed(1);
    lines.push(
      [
        truncateName(row.label).padEnd(NAME_WIDTH),
        formatTemperature(row.high, units).padStart(10),
        formatTemperature(row.low, units).padStart(10),
        formatPercent(row.rainProbabilityMax).padStart(7),
        formatWindSpeed(row.windSpeedMax, units).padStart(11),
        uv.padStart(5),
      ].join(' ')
    );
  }
  return lines.join('\n');
}

export class FavouritesComparer {
  private readonly logger = createLogger({ service: 'FavouritesComparer' });

  constructor(private readonly forecastService: ForecastService) {}

  /** Today's headline numbers for up to three favourites, in the order given. */
  async compare(favourites: readonly FavouriteLocation[], units: UnitSystem): Promise<FavouritesComparison> {
    const chosen = favourites.slice(0, MAX_COMPARED_FAVOURITES);
    const rows: ComparisonRow[] = [];
    const unavailable: string[] = [];

    for (const favourite of chosen) {
      const bundle = await this.forecastService.getForecast({
        latitude: favourite.latitude,
        longitude: favourite.longitude,
        units,
        timezone: favourite.timezone,
      });
      if (!bundle) {
        unavailable.push(favourite.label);
        continue;
      }
      const today = resolveTodayAggregate(bundle);
      rows.push({
        favouriteId: favourite.id,
        label: favourite.label,
        high: today?.temperatureMax,
        low: today?.temperatureMin,
        rainProbabilityMax: today?.precipitationProbabilityMax,
        windSpeedMax: today?.windSpeedMax,
        uvIndexMax: today?.uvIndexMax,
      });
    }

    this.logger.info({ compared: rows.length, unavailable: unavailable.length }, 'Favourites compared');
    return { rows, unavailable, text: formatComparisonTable(rows, units) };
  }
}
