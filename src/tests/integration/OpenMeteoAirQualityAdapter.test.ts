import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenMeteoAirQualityAdapter } from '../../adapters/weather/OpenMeteoAirQualityAdapter.js';
import { WeatherFetchError } from '../../utils/errors.js';

describe('OpenMeteoAirQualityAdapter', () => {
  const adapter = new OpenMeteoAirQualityAdapter({
    airQualityBaseUrl: 'https://air.test/v1/air-quality',
    requestTimeoutMs: 1000,
  });
  const request = { latitude: 59.91, longitude: 10.75, timezone: 'Europe/Oslo' };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requests current indices and returns them', async () => {
    const payload = { current: { time: '2026-10-19T10:00', european_aqi: 18, us_aqi: 42, uv_index: 1.5 } };
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify(payload), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await adapter.getAirQuality(request);

    expect(result).toEqual(payload.current);
    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.origin + url.pathname).toBe('https://air.test/v1/air-quality');
    expect(url.searchParams.get('latitude')).toBe('59.91');
    expect(url.searchParams.get('timezone')).toBe('Europe/Oslo');
    expect(url.searchParams.get('current')).toBe('european_aqi,us_aqi,uv_index');
  });

  it('returns an empty reading when the payload has no current block', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(JSON.stringify({}), { status: 200 })));

    await expect(adapter.getAirQuality(request)).resolves.toEqual({});
  });

  it('throws on a non-ok status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('oops', { status: 502 })));

    const error = await adapter.getAirQuality(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WeatherFetchError);
    expect(error).toMatchObject({ message: 'Air quality API error: 502', status: 502 });
  });

  it('throws when the network call fails', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(adapter.getAirQuality(request)).rejects.toThrow('Air quality request failed');
  });

  it('rejects a payload of the wrong shape', async () => {
    const payload = { current: { european_aqi: 'high' } };
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(JSON.stringify(payload), { status: 200 })));

    await expect(adapter.getAirQuality(request)).rejects.toThrow('Air quality payload did not match schema');
  });
});
