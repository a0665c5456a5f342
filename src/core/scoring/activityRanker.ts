import { clockLabel, localHour, type HourlySample } from '../model/forecast.js';
import { computeComfortIndex } from './comfortScorer.js';

export type Activity = 'walking' | 'sport' | 'stargazing';

export interface RankedHour {
  time: string;
  /** `HH:MM` local time. */
  label: string;
  score: number;
}

export type ActivityRanking = Record<Activity, RankedHour[]>;

interface ThresholdPenalty {
  above: number;
  perUnit: number;
}

/**
 * One weighted-penalty model for every activity:
 *
 *   score = comfortWeight·comfort + skyWeight·sky + nightBonus
 *           − rainPerPercent·rain − wind excess − uv excess
 */
interface ActivityCoefficients {
  comfortWeight: number;
  skyWeight: number;
  nightBonus: number;
  rainPerPercent: number;
  wind?: ThresholdPenalty;
  uv?: ThresholdPenalty;
}

export const ACTIVITY_COEFFICIENTS: Readonly<Record<Activity, ActivityCoefficients>> = {
  walking: { comfortWeight: 1, skyWeight: 0, nightBonus: 0, rainPerPercent: 0.6, wind: { above: 25, perUnit: 0.4 } },
  sport: { comfortWeight: 1, skyWeight: 0, nightBonus: 0, rainPerPercent: 0.7, uv: { above: 5, perUnit: 4 } },
  stargazing: { comfortWeight: 0, skyWeight: 1, nightBonus: 15, rainPerPercent: 0.8 },
};

export const TOP_HOURS_PER_ACTIVITY = 3;

export interface HourFeatures {
  comfort: number;
  sky: number;
  isNight: boolean;
  rain: number;
  wind: number;
  uv: number;
}

function skyBonus(code: number): number {
  if (code === 0 || code === 1) return 20;
  if (code === 2) return 5;
  return -10;
}

function isNightHour(hour: number | undefined): boolean {
  return hour !== undefined && (hour >= 19 || hour <= 5);
}

function excess(value: number, penalty: ThresholdPenalty | undefined): number {
  return penalty ? Math.max(0, value - penalty.above) * penalty.perUnit : 0;
}

function extractFeatures(sample: HourlySample): HourFeatures | undefined {
  if (sample.temperature === undefined) {
    return undefined;
  }
  // Comfort here ignores humidity.
  const comfort =
    computeComfortIndex({
      temperature: sample.temperature,
      windSpeed: sample.windSpeed,
      uvIndex: sample.uvIndex,
      rainProbability: sample.precipitationProbability,
    }) ?? 0;

  return {
    comfort,
    sky: skyBonus(sample.weatherCode ?? 0),
    isNight: isNightHour(localHour(sample.time)),
    rain: sample.precipitationProbability ?? 0,
    wind: sample.windSpeed ?? 0,
    uv: sample.uvIndex ?? 0,
  };
}

export function scoreActivity(activity: Activity, features: HourFeatures): number {
  const c = ACTIVITY_COEFFICIENTS[activity];
  let score = 0;
  if (c.comfortWeight !== 0) score += c.comfortWeight * features.comfort;
  if (c.skyWeight !== 0) score += c.skyWeight * features.sky;
  if (features.isNight) score += c.nightBonus;
  score -= features.rain * c.rainPerPercent;
  score -= excess(features.wind, c.wind);
  score -= excess(features.uv, c.uv);
  return score;
}

/**
 * Top hours per activity. Input is expected in chronological order; the sort
 * is stable, so equal scores keep their earlier hour first.
 */
export function rankActivityHours(samples: readonly HourlySample[]): ActivityRanking {
  const scored = samples.flatMap((sample) => {
    const features = extractFeatures(sample);
    return features ? [{ time: sample.time, features }] : [];
  });

  const rank = (activity: Activity): RankedHour[] =>
    scored
      .map(({ time, features }) => ({ time, label: clockLabel(time), score: scoreActivity(activity, features) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, TOP_HOURS_PER_ACTIVITY);

  return {
    walking: rank('walking'),
    sport: rank('sport'),
    stargazing: rank('stargazing'),
  };
}
