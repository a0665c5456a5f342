import type { OptionalNumber } from '../model/forecast.js';
import { clockLabel } from '../model/forecast.js';
import { isThunderstormCode } from '../weather/weatherCodes.js';

export type UvLevel = 'Low' | 'Moderate' | 'High' | 'Very high' | 'Extreme';

export function interpretUv(uv: OptionalNumber): UvLevel | undefined {
  if (uv === undefined) return undefined;
  if (uv < 3) return 'Low';
  if (uv < 6) return 'Moderate';
  if (uv < 8) return 'High';
  if (uv < 11) return 'Very high';
  return 'Extreme';
}

export interface MoonPhase {
  icon: string;
  name: string;
  /** 0 = new moon, 0.5 = full moon. */
  fraction: number;
}

const KNOWN_NEW_MOON_MS = Date.UTC(2000, 0, 6);
const SYNODIC_MONTH_DAYS = 29.53058867;
const MS_PER_DAY = 86_400_000;

export function moonPhaseFor(date: Date): MoonPhase {
  const days = (date.getTime() - KNOWN_NEW_MOON_MS) / MS_PER_DAY;
  const phase = ((days % SYNODIC_MONTH_DAYS) + SYNODIC_MONTH_DAYS) % SYNODIC_MONTH_DAYS;
  const fraction = phase / SYNODIC_MONTH_DAYS;

  if (fraction < 0.03 || fraction > 0.97) return { icon: '🌑', name: 'New moon', fraction };
  if (fraction < 0.22) return { icon: '🌒', name: 'Waxing crescent', fraction };
  if (fraction < 0.28) return { icon: '🌓', name: 'First quarter', fraction };
  if (fraction < 0.47) return { icon: '🌔', name: 'Waxing gibbous', fraction };
  if (fraction < 0.53) return { icon: '🌕', name: 'Full moon', fraction };
  if (fraction < 0.72) return { icon: '🌖', name: 'Waning gibbous', fraction };
  if (fraction < 0.78) return { icon: '🌗', name: 'Last quarter', fraction };
  return { icon: '🌘', name: 'Waning crescent', fraction };
}

export interface HeadlineInputs {
  temperature: OptionalNumber;
  apparentTemperature: OptionalNumber;
  rainProbability: OptionalNumber;
  windSpeed: OptionalNumber;
  weatherCode: OptionalNumber;
  bestHour: string | undefined;
}

/** One-line header such as `Chilly, breezy. Best outdoors ~14:00`. */
export function buildMicroSummary(inputs: HeadlineInputs): string {
  const parts: string[] = [];
  const base = inputs.apparentTemperature ?? inputs.temperature;

  if (base !== undefined) {
    if (base <= 5) parts.push('Very cold');
    else if (base <= 12) parts.push('Chilly');
    else if (base <= 20) parts.push('Cool');
    else if (base <= 27) parts.push('Mild');
    else parts.push('Warm');
  }
  if (inputs.windSpeed !== undefined && inputs.windSpeed >= 25) parts.push('breezy');
  if (inputs.rainProbability !== undefined && inputs.rainProbability >= 40) parts.push('rain possible');
  if (isThunderstormCode(inputs.weatherCode)) parts.push('storm risk');

  let line = parts.length > 0 ? parts.join(', ') : 'Mixed conditions';
  if (inputs.bestHour?.includes('T')) {
    line += `. Best outdoors ~${clockLabel(inputs.bestHour)}`;
  }
  return line;
}

export interface AlertInputs {
  rainProbability: OptionalNumber;
  windSpeedMax: OptionalNumber;
  weatherCode: OptionalNumber;
  uvIndexMax: OptionalNumber;
}

export function buildDailyAlerts(inputs: AlertInputs): string[] {
  const alerts: string[] = [];
  if (inputs.rainProbability !== undefined && inputs.rainProbability >= 80) {
    alerts.push('Heavy rain likely today.');
  }
  if (inputs.windSpeedMax !== undefined && inputs.windSpeedMax >= 60) {
    alerts.push('Very windy/gusty later today.');
  }
  if (isThunderstormCode(inputs.weatherCode)) {
    alerts.push('Thunderstorms possible.');
  }
  if (inputs.uvIndexMax !== undefined && inputs.uvIndexMax >= 8) {
    alerts.push('Very strong UV around midday.');
  }
  return alerts;
}
