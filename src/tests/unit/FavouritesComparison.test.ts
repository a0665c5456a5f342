import { describe, it, expect, vi } from 'vitest';
import { FavouritesComparer, formatComparisonTable } from '../../core/favourites/FavouritesComparison.js';
import type { ForecastService } from '../../core/forecast/ForecastService.js';
import { normalizeForecast } from '../../core/model/forecast.js';
import type { FavouriteLocation } from '../../persistence/repositories/FavouriteLocationRepository.js';
import { rawForecast } from '../fixtures/forecast.js';

function favourite(id: number, name: string, country: string): FavouriteLocation {
  return {
    id,
    name,
    country,
    latitude: 59 + id,
    longitude: 10,
    timezone: 'Europe/Oslo',
    label: `${name}, ${country}`,
    createdAt: 0,
  };
}

const HEADER = 'Place                              High        Low   Rain%        Wind    UV';

describe('formatComparisonTable', () => {
  it('renders one aligned row per place', () => {
    const text = formatComparisonTable(
      [
        {
          favouriteId: 1,
          label: 'Oslo, Norway',
          high: 19,
          low: 8,
          rainProbabilityMax: 30,
          windSpeedMax: 28,
          uvIndexMax: 5,
        },
      ],
      'metric'
    );

    expect(text.split('\n')).toEqual([
      "Comparing today's forecast:",
      '',
      HEADER,
      '-'.repeat(76),
      'Oslo, Norway                    19.0 °C     8.0 °C     30%   28.0 km/h   5.0',
    ]);
  });

  it('truncates long names and shows N/A for gaps', () => {
    const text = formatComparisonTable(
      [
        {
          favouriteId: 2,
          label: 'Bergen Lufthavn Flesland, Vestland, Norway',
          high: undefined,
          low: undefined,
          rainProbabilityMax: undefined,
          windSpeedMax: undefined,
          uvIndexMax: undefined,
        },
      ],
      'imperial'
    );

    expect(text.split('\n')[4]).toBe('Bergen Lufthavn Flesland, V…        N/A        N/A     N/A         N/A   N/A');
  });

  it('explains an empty comparison', () => {
    expect(formatComparisonTable([], 'metric')).toBe('No data could be fetched for the selected favourites.');
  });
});

describe('FavouritesComparer', () => {
  it("compares today's numbers and reports places without data", async () => {
    const getForecast = vi
      .fn()
      .mockResolvedValueOnce(normalizeForecast(rawForecast()))
      .mockResolvedValueOnce(undefined);
    const forecastService = { getForecast } as unknown as ForecastService;
    const comparer = new FavouritesComparer(forecastService);

    const result = await comparer.compare([favourite(1, 'Oslo', 'Norway'), favourite(2, 'Tromsø', 'Norway')], 'metric');

    expect(result.rows).toEqual([
      {
        favouriteId: 1,
        label: 'Oslo, Norway',
        high: 19,
        low: 8,
        rainProbabilityMax: 30,
        windSpeedMax: 28,
        uvIndexMax: 5,
      },
    ]);
    expect(result.unavailable).toEqual(['Tromsø, Norway']);
    expect(getForecast).toHaveBeenNthCalledWith(2, {
      latitude: 61,
      longitude: 10,
      units: 'metric',
      timezone: 'Europe/Oslo',
    });
  });

  it('compares at most three favourites', async () => {
    const getForecast = vi.fn().mockResolvedValue(normalizeForecast(rawForecast()));
    const comparer = new FavouritesComparer({ getForecast } as unknown as ForecastService);

    const result = await comparer.compare(
      [1, 2, 3, 4].map((id) => favourite(id, `Place ${id}`, 'Norway')),
      'imperial'
    );

    expect(result.rows.map((row) => row.favouriteId)).toEqual([1, 2, 3]);
    expect(getForecast).toHaveBeenCalledTimes(3);
    expect(result.text.split('\n')[4]).toBe(
      'Place 1, Norway                 66.2 °F    46.4 °F     30%    17.4 mph   5.0'
    );
  });
});
