import { samplesForDay, type HourlySample } from '../model/forecast.js';
import { IDEAL_TEMPERATURE_C } from './comfortScorer.js';

/** Hours scoring below this are not worth recommending. */
export const MIN_ACCEPTABLE_HOUR_SCORE = 40;

const OVERCAST_OR_FOG_CODES = new Set([3, 45, 48]);

/**
 * Outdoor suitability of a single hour. Undefined when the hour has no
 * temperature; missing rain, wind and weather code count as zero.
 */
export function scoreOutdoorHour(sample: HourlySample): number | undefined {
  if (sample.temperature === undefined) {
    return undefined;
  }

  const rain = sample.precipitationProbability ?? 0;
  const wind = sample.windSpeed ?? 0;
  const code = sample.weatherCode ?? 0;

  let score = 100;

  if (rain >= 70 || code >= 95) {
    score -= 70;
  } else if (rain >= 40) {
    score -= 40;
  } else if (rain >= 20) {
    score -= 15;
  }

  score -= Math.min(50, Math.abs(sample.temperature - IDEAL_TEMPERATURE_C) * 2.5);

  if (wind > 50) {
    score -= 30;
  } else if (wind > 35) {
    score -= 15;
  } else if (wind > 25) {
    score -= 5;
  }

  if (OVERCAST_OR_FOG_CODES.has(code)) {
    score -= 5;
  }

  return score;
}

/**
 * Best outdoor hour among samples in chronological order. The first maximal
 * hour wins ties; returns undefined when nothing reaches the acceptance bar.
 */
export function findBestHour(samples: readonly HourlySample[]): string | undefined {
  let bestScore = Number.NEGATIVE_INFINITY;
  let bestTime: string | undefined;

  for (const sample of samples) {
    const score = scoreOutdoorHour(sample);
    if (score === undefined) continue;
    if (score > bestScore) {
      bestScore = score;
      bestTime = sample.time;
    }
  }

  if (bestTime === undefined || bestScore < MIN_ACCEPTABLE_HOUR_SCORE) {
    return undefined;
  }
  return bestTime;
}

export function findBestHourForDay(
  samples: readonly HourlySample[],
  date: string
): string | undefined {
  return findBestHour(samplesForDay(samples, date));
}
