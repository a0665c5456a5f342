import { averageHumidity, clockLabel, dayLabel, type DailyAggregate, type HourlySample, type OptionalNumber } from '../model/forecast.js';
import { formatPrecipitation, formatTemperature, formatWindSpeed } from '../units/formatting.js';
import type { UnitSystem } from '../units/unitConverter.js';
import { describeWeatherCode, weatherIcon } from '../weather/weatherCodes.js';
import { interpretUv, type UvLevel } from './conditions.js';

export interface DailyDetail extends DailyAggregate {
  label: string;
  icon: string;
  description: string;
  /** Mean of the hourly humidity samples sharing the day's date prefix. */
  humidityAverage: OptionalNumber;
  uvLevel: UvLevel | undefined;
}

export function buildDailyDetails(daily: readonly DailyAggregate[], hourly: readonly HourlySample[]): DailyDetail[] {
  return daily.map((day) => ({
    ...day,
    label: dayLabel(day.date),
    icon: weatherIcon(day.weatherCode),
    description: describeWeatherCode(day.weatherCode),
    humidityAverage: averageHumidity(hourly, day.date),
    uvLevel: interpretUv(day.uvIndexMax),
  }));
}

function formatDay(detail: DailyDetail, units: UnitSystem): string {
  const lines = [
    `${detail.label}: ${detail.icon} ${detail.description}`,
    `  Max temp:    ${formatTemperature(detail.temperatureMax, units)}`,
    `  Min temp:    ${formatTemperature(detail.temperatureMin, units)}`,
    `  Feels max:   ${formatTemperature(detail.apparentTemperatureMax, units)}`,
    `  Feels min:   ${formatTemperature(detail.apparentTemperatureMin, units)}`,
  ];
  if (detail.humidityAverage !== undefined) {
    lines.push(`  Avg humidity:${detail.humidityAverage.toFixed(0)} %`);
  }
  if (detail.uvIndexMax !== undefined) {
    lines.push(`  UV max:      ${detail.uvIndexMax.toFixed(1)} (${interpretUv(detail.uvIndexMax)})`);
  }
  if (detail.precipitationSum !== undefined) {
    const chance =
      detail.precipitationProbabilityMax === undefined
        ? ''
        : ` (chance ${detail.precipitationProbabilityMax.toFixed(0)}%)`;
    lines.push(`  Rain:        ${formatPrecipitation(detail.precipitationSum, units)}${chance}`);
  }
  if (detail.windSpeedMax !== undefined) {
    lines.push(`  Max wind:    ${formatWindSpeed(detail.windSpeedMax, units)}`);
  }
  const sunrise = detail.sunrise ? clockLabel(detail.sunrise) : 'N/A';
  const sunset = detail.sunset ? clockLabel(detail.sunset) : 'N/A';
  lines.push(`  Sunrise:     ${sunrise}   |   Sunset: ${sunset}`);
  return lines.join('\n');
}

/** Day-by-day detail blocks separated by a blank line. */
export function formatDailyDetails(details: readonly DailyDetail[], units: UnitSystem): string {
  if (details.length === 0) {
    return 'No forecast data.';
  }
  return details.map((detail) => formatDay(detail, units)).join('\n\n');
}
