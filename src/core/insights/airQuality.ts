import type { RawAirQuality } from '../../ports/AirQualityPort.js';
import { toOptionalNumber, type OptionalNumber } from '../model/forecast.js';

export type EuropeanAqiLevel = 'Good' | 'Fair' | 'Moderate' | 'Poor' | 'Very poor' | 'Extremely poor';

export type UsAqiLevel =
  | 'Good'
  | 'Moderate'
  | 'Unhealthy for sensitive groups'
  | 'Unhealthy'
  | 'Very unhealthy'
  | 'Hazardous';

export interface AirQualityReading {
  time: string | undefined;
  europeanAqi: OptionalNumber;
  usAqi: OptionalNumber;
  uvIndex: OptionalNumber;
}

export interface AirQualitySummary extends AirQualityReading {
  europeanLevel: EuropeanAqiLevel | undefined;
  usLevel: UsAqiLevel | undefined;
  /** US level when reported, else the European one. */
  overall: EuropeanAqiLevel | UsAqiLevel | undefined;
  text: string;
}

export function normalizeAirQuality(raw: RawAirQuality): AirQualityReading {
  return {
    time: raw.time || undefined,
    europeanAqi: toOptionalNumber(raw.european_aqi),
    usAqi: toOptionalNumber(raw.us_aqi),
    uvIndex: toOptionalNumber(raw.uv_index),
  };
}

export function interpretEuropeanAqi(value: OptionalNumber): EuropeanAqiLevel | undefined {
  if (value === undefined) return undefined;
  if (value <= 20) return 'Good';
  if (value <= 40) return 'Fair';
  if (value <= 60) return 'Moderate';
  if (value <= 80) return 'Poor';
  if (value <= 100) return 'Very poor';
  return 'Extremely poor';
}

export function interpretUsAqi(value: OptionalNumber): UsAqiLevel | undefined {
  if (value === undefined) return undefined;
  if (value <= 50) return 'Good';
  if (value <= 100) return 'Moderate';
  if (value <= 150) return 'Unhealthy for sensitive groups';
  if (value <= 200) return 'Unhealthy';
  if (value <= 300) return 'Very unhealthy';
  return 'Hazardous';
}

/** True for levels that warrant caution for sensitive people. */
export function isPoorAirQuality(level: string | undefined): boolean {
  if (level === undefined) return false;
  const lower = level.toLowerCase();
  return ['unhealthy', 'poor', 'hazard'].some((word) => lower.includes(word));
}

export function summarizeAirQuality(reading: AirQualityReading): AirQualitySummary {
  const europeanLevel = interpretEuropeanAqi(reading.europeanAqi);
  const usLevel = interpretUsAqi(reading.usAqi);
  const overall = reading.usAqi !== undefined ? usLevel : europeanLevel;

  const lines = [
    reading.europeanAqi === undefined
      ? 'European AQI: N/A'
      : `European AQI: ${reading.europeanAqi.toFixed(0)} (${europeanLevel})`,
    reading.usAqi === undefined ? 'US AQI:       N/A' : `US AQI:       ${reading.usAqi.toFixed(0)} (${usLevel})`,
    isPoorAirQuality(overall)
      ? 'Tip: limit heavy outdoor exercise if you have heart or lung conditions.'
      : 'Tip: air quality is okay for normal outdoor plans.',
  ];

  return { ...reading, europeanLevel, usLevel, overall, text: lines.join('\n') };
}
