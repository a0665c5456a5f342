import { describe, it, expect } from 'vitest';
import { clampScore, computeComfortIndex } from '../../core/scoring/comfortScorer.js';

describe('computeComfortIndex', () => {
  it('scores ideal conditions as 100', () => {
    expect(
      computeComfortIndex({ temperature: 19, humidity: 50, windSpeed: 10, uvIndex: 2, rainProbability: 0 })
    ).toBe(100);
  });

  it('sums the tiered penalties', () => {
    // temperature 10, humidity 8, wind 7, uv 7, rain 15
    expect(
      computeComfortIndex({ temperature: 23, humidity: 75, windSpeed: 30, uvIndex: 6, rainProbability: 60 })
    ).toBe(53);
  });

  it('clamps at zero', () => {
    expect(
      computeComfortIndex({ temperature: 45, humidity: 90, windSpeed: 70, uvIndex: 9, rainProbability: 90 })
    ).toBe(0);
  });

  it('penalises dry air', () => {
    expect(computeComfortIndex({ temperature: 19, humidity: 30 })).toBe(90);
  });

  it('caps the temperature penalty at 60', () => {
    expect(computeComfortIndex({ temperature: -30 })).toBe(40);
  });

  it('treats missing optional readings as no penalty', () => {
    expect(computeComfortIndex({ temperature: 21 })).toBe(95);
  });

  it('returns undefined without a temperature', () => {
    expect(computeComfortIndex({ temperature: undefined, humidity: 50 })).toBeUndefined();
  });

  it('converts imperial inputs before scoring', () => {
    // 68 °F = 20 °C; 25 mph ≈ 40.2 km/h lands in the 40 km/h tier
    expect(computeComfortIndex({ temperature: 68, windSpeed: 25 }, 'imperial')).toBe(82.5);
    expect(computeComfortIndex({ temperature: 20, windSpeed: 25 }, 'metric')).toBe(90.5);
  });
});

describe('clampScore', () => {
  it('bounds to 0..100', () => {
    expect(clampScore(-5)).toBe(0);
    expect(clampScore(120)).toBe(100);
    expect(clampScore(42.5)).toBe(42.5);
  });
});
