import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      openMeteoBaseUrl: 'https://api.open-meteo.com/v1/forecast',
      airQualityBaseUrl: 'https://air-quality-api.open-meteo.com/v1/air-quality',
      forecastDays: 12,
      requestTimeoutMs: 10000,
      cacheTtlMinutes: 20,
      prefetchCron: '*/15 * * * *',
      defaultUnits: 'metric',
      timezone: 'auto',
      logLevel: 'info',
      host: '0.0.0.0',
      port: 5000,
    });
  });

  it('reads and coerces environment values', () => {
    const config = loadConfig({
      FORECAST_DAYS: '7',
      CACHE_TTL_MINUTES: '5',
      DEFAULT_UNITS: 'imperial',
      PORT: '8080',
      DATABASE_PATH: '/tmp/forecast-test.db',
      TIMEZONE: '',
    });

    expect(config.forecastDays).toBe(7);
    expect(config.cacheTtlMinutes).toBe(5);
    expect(config.defaultUnits).toBe('imperial');
    expect(config.port).toBe(8080);
    expect(config.databasePath).toBe('/tmp/forecast-test.db');
    expect(config.timezone).toBe('auto');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ FORECAST_DAYS: '30' })).toThrow(ConfigError);
    expect(() => loadConfig({ DEFAULT_UNITS: 'kelvin' })).toThrow(/defaultUnits/);
  });
});
