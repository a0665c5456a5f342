import { z } from 'zod';
import type { Config } from '../../config/index.js';
import type { AirQualityPort, AirQualityRequest, RawAirQuality } from '../../ports/AirQualityPort.js';
import { WeatherFetchError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const CURRENT_FIELDS = ['european_aqi', 'us_aqi', 'uv_index'];

const optionalNumber = z.number().nullable().optional();

const airQualityResponseSchema = z.object({
  current: z
    .object({
      time: z.string().optional(),
      european_aqi: optionalNumber,
      us_aqi: optionalNumber,
      uv_index: optionalNumber,
    })
    .optional(),
});

export class OpenMeteoAirQualityAdapter implements AirQualityPort {
  private readonly logger = createLogger({ adapter: 'OpenMeteoAirQualityAdapter' });
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<Config, 'airQualityBaseUrl' | 'requestTimeoutMs'>) {
    this.baseUrl = config.airQualityBaseUrl;
    this.timeoutMs = config.requestTimeoutMs;
  }

  async getAirQuality(request: AirQualityRequest): Promise<RawAirQuality> {
    const logger = this.logger.child({
      method: 'getAirQuality',
      lat: request.latitude,
      lon: request.longitude,
    });

    const params = new URLSearchParams({
      latitude: String(request.latitude),
      longitude: String(request.longitude),
      timezone: request.timezone || 'auto',
      current: CURRENT_FIELDS.join(','),
    });

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}?${params.toString()}`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.error({ error }, 'Air quality request failed');
      throw new WeatherFetchError('Air quality request failed', undefined, { cause: error });
    }

    if (!response.ok) {
      logger.error({ status: response.status }, 'Air quality API request failed');
      throw new WeatherFetchError(`Air quality API error: ${response.status}`, response.status);
    }

    const parsed = airQualityResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues.length }, 'Air quality payload did not match schema');
      throw new WeatherFetchError('Air quality payload did not match schema', response.status, {
        cause: parsed.error,
      });
    }

    logger.debug('Air quality fetched');
    return parsed.data.current ?? {};
  }
}
