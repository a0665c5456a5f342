import { describe, it, expect } from 'vitest';
import { buildDailyAlerts, buildMicroSummary, interpretUv, moonPhaseFor } from '../../core/insights/conditions.js';

describe('interpretUv', () => {
  it.each([
    [0, 'Low'],
    [2.9, 'Low'],
    [3, 'Moderate'],
    [6, 'High'],
    [8, 'Very high'],
    [11, 'Extreme'],
  ] as const)('maps %d to %s', (uv, level) => {
    expect(interpretUv(uv)).toBe(level);
  });

  it('returns undefined without a reading', () => {
    expect(interpretUv(undefined)).toBeUndefined();
  });
});

describe('moonPhaseFor', () => {
  it('starts the cycle at the reference new moon', () => {
    const phase = moonPhaseFor(new Date(Date.UTC(2000, 0, 6)));
    expect(phase.name).toBe('New moon');
    expect(phase.fraction).toBe(0);
  });

  it('reaches full moon half a cycle later', () => {
    const phase = moonPhaseFor(new Date(Date.UTC(2000, 0, 21)));
    expect(phase).toMatchObject({ icon: '🌕', name: 'Full moon' });
  });

  it('handles dates before the reference', () => {
    const phase = moonPhaseFor(new Date(Date.UTC(1999, 11, 30)));
    expect(phase.fraction).toBeGreaterThan(0.75);
    expect(phase.fraction).toBeLessThan(0.78);
    expect(phase.name).toBe('Last quarter');
  });
});

describe('buildMicroSummary', () => {
  it('combines feel, wind, rain and storm hints', () => {
    expect(
      buildMicroSummary({
        temperature: 14,
        apparentTemperature: 11,
        rainProbability: 60,
        windSpeed: 30,
        weatherCode: 95,
        bestHour: '2026-10-19T14:00',
      })
    ).toBe('Chilly, breezy, rain possible, storm risk. Best outdoors ~14:00');
  });

  it('falls back to the air temperature', () => {
    expect(
      buildMicroSummary({
        temperature: 29,
        apparentTemperature: undefined,
        rainProbability: 10,
        windSpeed: 5,
        weatherCode: 0,
        bestHour: undefined,
      })
    ).toBe('Warm');
  });

  it('says mixed conditions when nothing is known', () => {
    expect(
      buildMicroSummary({
        temperature: undefined,
        apparentTemperature: undefined,
        rainProbability: undefined,
        windSpeed: undefined,
        weatherCode: undefined,
        bestHour: undefined,
      })
    ).toBe('Mixed conditions');
  });
});

describe('buildDailyAlerts', () => {
  it('raises every alert that applies', () => {
    expect(buildDailyAlerts({ rainProbability: 80, windSpeedMax: 60, weatherCode: 96, uvIndexMax: 8 })).toEqual([
      'Heavy rain likely today.',
      'Very windy/gusty later today.',
      'Thunderstorms possible.',
      'Very strong UV around midday.',
    ]);
  });

  it('stays quiet on a calm day', () => {
    expect(buildDailyAlerts({ rainProbability: 79, windSpeedMax: 59, weatherCode: 3, uvIndexMax: 7.9 })).toEqual([]);
    expect(
      buildDailyAlerts({ rainProbability: undefined, windSpeedMax: undefined, weatherCode: undefined, uvIndexMax: undefined })
    ).toEqual([]);
  });
});
