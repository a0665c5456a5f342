import { describe, it, expect } from 'vitest';
import {
  categorizeWeatherCode,
  describeWeatherCode,
  isSnowCode,
  isThunderstormCode,
  weatherIcon,
} from '../../core/weather/weatherCodes.js';

describe('weatherCodes', () => {
  it('describes listed codes', () => {
    expect(describeWeatherCode(0)).toBe('Clear sky');
    expect(describeWeatherCode(48)).toBe('Depositing rime fog');
    expect(describeWeatherCode(82)).toBe('Violent rain showers');
    expect(describeWeatherCode(99)).toBe('Thunderstorm with heavy hail');
  });

  it('falls back for unlisted and absent codes', () => {
    expect(describeWeatherCode(42)).toBe('Weather code 42');
    expect(describeWeatherCode(undefined)).toBe('Unknown');
  });

  it.each([
    [0, 'clear'],
    [1, 'partly-cloudy'],
    [2, 'partly-cloudy'],
    [3, 'overcast'],
    [45, 'fog'],
    [48, 'fog'],
    [51, 'drizzle'],
    [57, 'drizzle'],
    [61, 'rain'],
    [67, 'rain'],
    [71, 'snow'],
    [77, 'snow'],
    [80, 'showers'],
    [82, 'showers'],
    [85, 'snow-showers'],
    [86, 'snow-showers'],
    [95, 'thunderstorm'],
    [99, 'thunderstorm'],
    [10, 'unknown'],
  ] as const)('categorizes code %i as %s', (code, category) => {
    expect(categorizeWeatherCode(code)).toBe(category);
  });

  it('maps categories to icons', () => {
    expect(weatherIcon(0)).toBe('☀️');
    expect(weatherIcon(96)).toBe('⛈️');
    expect(weatherIcon(undefined)).toBe('🌡️');
  });

  it('flags snow and thunderstorm codes', () => {
    expect(isSnowCode(73)).toBe(true);
    expect(isSnowCode(85)).toBe(true);
    expect(isSnowCode(63)).toBe(false);
    expect(isThunderstormCode(95)).toBe(true);
    expect(isThunderstormCode(94)).toBe(false);
    expect(isThunderstormCode(undefined)).toBe(false);
  });
});
