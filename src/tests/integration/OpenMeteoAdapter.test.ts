import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenMeteoAdapter } from '../../adapters/weather/OpenMeteoAdapter.js';
import { WeatherFetchError } from '../../utils/errors.js';
import { rawForecast } from '../fixtures/forecast.js';

describe('OpenMeteoAdapter', () => {
  const adapter = new OpenMeteoAdapter({
    openMeteoBaseUrl: 'https://weather.test/v1/forecast',
    requestTimeoutMs: 1000,
  });
  const request = { latitude: 59.91, longitude: 10.75, timezone: 'Europe/Oslo', forecastDays: 12 };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requests every field group and returns the payload', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify(rawForecast()), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await adapter.getForecast(request);

    expect(result.hourly?.time).toHaveLength(6);
    expect(result.daily?.precipitation_sum).toEqual([0.4, 0, 6.2]);

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.origin + url.pathname).toBe('https://weather.test/v1/forecast');
    expect(url.searchParams.get('latitude')).toBe('59.91');
    expect(url.searchParams.get('longitude')).toBe('10.75');
    expect(url.searchParams.get('timezone')).toBe('Europe/Oslo');
    expect(url.searchParams.get('forecast_days')).toBe('12');
    expect(url.searchParams.get('hourly')).toBe(
      'temperature_2m,apparent_temperature,relative_humidity_2m,precipitation_probability,uv_index,wind_speed_10m,weather_code'
    );
    expect(url.searchParams.get('daily')?.split(',')).toContain('wind_speed_10m_max');
    expect(url.searchParams.get('current')?.split(',')).toContain('is_day');
  });

  it('falls back to automatic timezone detection', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify({}), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await adapter.getForecast({ ...request, timezone: '' });

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.searchParams.get('timezone')).toBe('auto');
  });

  it('throws on a non-ok status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('oops', { status: 500 })));

    const error = await adapter.getForecast(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WeatherFetchError);
    expect(error).toMatchObject({ message: 'Open-Meteo API error: 500', status: 500, code: 'ADAPTER_WEATHER' });
  });

  it('throws when the network call fails', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(adapter.getForecast(request)).rejects.toThrow('Open-Meteo request failed');
  });

  it('rejects payloads of the wrong shape', async () => {
    const body = JSON.stringify({ hourly: { time: ['2026-10-19T00:00'], temperature_2m: ['warm'] } });
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(body, { status: 200 })));

    await expect(adapter.getForecast(request)).rejects.toThrow('Open-Meteo payload did not match schema');
  });
});
