import type { OptionalNumber } from '../model/forecast.js';
import { fToC, mphToKmh, type UnitSystem } from '../units/unitConverter.js';

export interface ComfortInputs {
  temperature: OptionalNumber;
  humidity?: OptionalNumber;
  windSpeed?: OptionalNumber;
  uvIndex?: OptionalNumber;
  rainProbability?: OptionalNumber;
}

export const IDEAL_TEMPERATURE_C = 19;
const MAX_TEMPERATURE_PENALTY = 60;
const TEMPERATURE_PENALTY_PER_DEGREE = 2.5;

function humidityPenalty(humidity: OptionalNumber): number {
  if (humidity === undefined) return 0;
  if (humidity >= 85) return 15;
  if (humidity >= 70) return 8;
  if (humidity <= 30) return 10;
  return 0;
}

function windPenalty(windKmh: OptionalNumber): number {
  if (windKmh === undefined) return 0;
  if (windKmh >= 60) return 25;
  if (windKmh >= 40) return 15;
  if (windKmh >= 25) return 7;
  return 0;
}

function uvPenalty(uv: OptionalNumber): number {
  if (uv === undefined) return 0;
  if (uv >= 8) return 12;
  if (uv >= 6) return 7;
  if (uv >= 3) return 3;
  return 0;
}

function rainPenalty(rainProbability: OptionalNumber): number {
  if (rainProbability === undefined) return 0;
  if (rainProbability >= 80) return 25;
  if (rainProbability >= 60) return 15;
  if (rainProbability >= 30) return 7;
  return 0;
}

export function clampScore(score: number): number {
  return Math.max(0, Math.min(100, score));
}

/**
 * 0–100 outdoor comfort index (higher = nicer).
 *
 * Temperature distance from 19 °C dominates; humidity, wind, UV and rain
 * probability each subtract a tiered penalty. Imperial inputs (°F, mph) are
 * converted to metric before scoring.
 */
export function computeComfortIndex(
  inputs: ComfortInputs,
  units: UnitSystem = 'metric'
): number | undefined {
  if (inputs.temperature === undefined) {
    return undefined;
  }

  const temperatureC = units === 'imperial' ? fToC(inputs.temperature) : inputs.temperature;
  const windKmh = units === 'imperial' ? mphToKmh(inputs.windSpeed) : inputs.windSpeed;

  let score = 100;
  score -= Math.min(
    MAX_TEMPERATURE_PENALTY,
    Math.abs(temperatureC - IDEAL_TEMPERATURE_C) * TEMPERATURE_PENALTY_PER_DEGREE
  );
  score -= humidityPenalty(inputs.humidity);
  score -= windPenalty(windKmh);
  score -= uvPenalty(inputs.uvIndex);
  score -= rainPenalty(inputs.rainProbability);

  return clampScore(score);
}
