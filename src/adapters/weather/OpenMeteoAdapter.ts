import { z } from 'zod';
import type { Config } from '../../config/index.js';
import type { ForecastRequest, RawForecastBundle, WeatherPort } from '../../ports/WeatherPort.js';
import { WeatherFetchError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const CURRENT_FIELDS = [
  'temperature_2m',
  'relative_humidity_2m',
  'apparent_temperature',
  'precipitation',
  'rain',
  'weather_code',
  'wind_speed_10m',
  'wind_direction_10m',
  'pressure_msl',
  'is_day',
];

const HOURLY_FIELDS = [
  'temperature_2m',
  'apparent_temperature',
  'relative_humidity_2m',
  'precipitation_probability',
  'uv_index',
  'wind_speed_10m',
  'weather_code',
];

const DAILY_FIELDS = [
  'weather_code',
  'temperature_2m_max',
  'temperature_2m_min',
  'apparent_temperature_max',
  'apparent_temperature_min',
  'uv_index_max',
  'precipitation_sum',
  'precipitation_probability_max',
  'wind_speed_10m_max',
  'sunrise',
  'sunset',
];

const numberSeries = z.array(z.number().nullable()).optional();
const stringSeries = z.array(z.string().nullable()).optional();
const optionalNumber = z.number().nullable().optional();

const rawForecastSchema: z.ZodType<RawForecastBundle> = z.object({
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  timezone: z.string().optional(),
  current: z
    .object({
      time: z.string().optional(),
      temperature_2m: optionalNumber,
      apparent_temperature: optionalNumber,
      relative_humidity_2m: optionalNumber,
      precipitation: optionalNumber,
      rain: optionalNumber,
      weather_code: optionalNumber,
      wind_speed_10m: optionalNumber,
      wind_direction_10m: optionalNumber,
      pressure_msl: optionalNumber,
      is_day: optionalNumber,
    })
    .optional(),
  hourly: z
    .object({
      time: z.array(z.string()).optional(),
      temperature_2m: numberSeries,
      apparent_temperature: numberSeries,
      relative_humidity_2m: numberSeries,
      precipitation_probability: numberSeries,
      uv_index: numberSeries,
      wind_speed_10m: numberSeries,
      weather_code: numberSeries,
    })
    .optional(),
  daily: z
    .object({
      time: z.array(z.string()).optional(),
      temperature_2m_max: numberSeries,
      temperature_2m_min: numberSeries,
      apparent_temperature_max: numberSeries,
      apparent_temperature_min: numberSeries,
      uv_index_max: numberSeries,
      precipitation_sum: numberSeries,
      precipitation_probability_max: numberSeries,
      wind_speed_10m_max: numberSeries,
      weather_code: numberSeries,
      sunrise: stringSeries,
      sunset: stringSeries,
    })
    .optional(),
});

export class OpenMeteoAdapter implements WeatherPort {
  private readonly logger = createLogger({ adapter: 'OpenMeteoAdapter' });
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<Config, 'openMeteoBaseUrl' | 'requestTimeoutMs'>) {
    this.baseUrl = config.openMeteoBaseUrl;
    this.timeoutMs = config.requestTimeoutMs;
  }

  async getForecast(request: ForecastRequest): Promise<RawForecastBundle> {
    const logger = this.logger.child({
      method: 'getForecast',
      lat: request.latitude,
      lon: request.longitude,
    });

    const url = this.buildUrl(request);
    logger.info('Fetching forecast');

    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      logger.error({ error }, 'Open-Meteo request failed');
      throw new WeatherFetchError('Open-Meteo request failed', undefined, { cause: error });
    }

    if (!response.ok) {
      logger.error({ status: response.status }, 'Open-Meteo API request failed');
      throw new WeatherFetchError(`Open-Meteo API error: ${response.status}`, response.status);
    }

    const parsed = rawForecastSchema.safeParse(await response.json());
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues.length }, 'Open-Meteo payload did not match schema');
      throw new WeatherFetchError('Open-Meteo payload did not match schema', response.status, {
        cause: parsed.error,
      });
    }

    logger.info(
      { hours: parsed.data.hourly?.time?.length ?? 0, days: parsed.data.daily?.time?.length ?? 0 },
      'Forecast fetched'
    );
    return parsed.data;
  }

  private buildUrl(request: ForecastRequest): string {
    const params = new URLSearchParams({
      latitude: String(request.latitude),
      longitude: String(request.longitude),
      timezone: request.timezone || 'auto',
      current: CURRENT_FIELDS.join(','),
      hourly: HOURLY_FIELDS.join(','),
      daily: DAILY_FIELDS.join(','),
      forecast_days: String(request.forecastDays),
    });
    return `${this.baseUrl}?${params.toString()}`;
  }
}
