import {
  localHour,
  resolveToday,
  resolveTodayAggregate,
  samplesForDay,
  weekdayLabel,
  type ForecastBundle,
  type HourlySample,
} from '../model/forecast.js';
import { formatTemperature, formatTemperaturePoint } from '../units/formatting.js';
import type { UnitSystem } from '../units/unitConverter.js';
import { describeWeatherCode, weatherIcon } from '../weather/weatherCodes.js';
import { interpretUv } from './conditions.js';

export interface DayPeriod {
  name: string;
  /** Inclusive start hour. */
  from: number;
  /** Exclusive end hour. */
  to: number;
}

export const DAY_PERIODS: readonly DayPeriod[] = [
  { name: 'Morning', from: 6, to: 12 },
  { name: 'Afternoon', from: 12, to: 18 },
  { name: 'Evening', from: 18, to: 24 },
];

const OUTLOOK_DAYS = 4;

function temperatureWord(average: number): string {
  if (average <= 5) return 'very cold';
  if (average <= 12) return 'chilly';
  if (average <= 20) return 'cool to mild';
  if (average <= 27) return 'warm';
  return 'hot';
}

function showerWords(maxRain: number): string {
  if (maxRain >= 70) return 'with frequent showers';
  if (maxRain >= 40) return 'with some showers around';
  if (maxRain >= 20) return 'with a small chance of showers';
  return 'mostly dry';
}

/**
 * One sentence for a period of the day. Hours without a temperature are
 * skipped; missing rain and weather code count as zero. The period's first
 * hour supplies the condition wording.
 */
export function describePeriod(period: DayPeriod, samples: readonly HourlySample[], units: UnitSystem): string {
  const hours = samples.flatMap((sample) => {
    const hour = localHour(sample.time);
    if (sample.temperature === undefined || hour === undefined) return [];
    if (hour < period.from || hour >= period.to) return [];
    return [
      {
        temperature: sample.temperature,
        rain: sample.precipitationProbability ?? 0,
        code: sample.weatherCode ?? 0,
      },
    ];
  });

  const first = hours[0];
  if (first === undefined) {
    return `${period.name}: No data.`;
  }

  const average = hours.reduce((sum, hour) => sum + hour.temperature, 0) / hours.length;
  const maxRain = Math.max(...hours.map((hour) => hour.rain));
  const words = [temperatureWord(average), showerWords(maxRain), `(${describeWeatherCode(first.code).toLowerCase()})`];
  return `${period.name}: ${words.join(' ')}, around ${formatTemperaturePoint(average, units)}.`;
}

/** Narrative card: today's periods, a short outlook and a UV note. */
export function buildStoryText(bundle: ForecastBundle, units: UnitSystem): string {
  const today = resolveToday(bundle);
  const lines: string[] = ['Today’s story:'];

  if (today) {
    const todayHours = samplesForDay(bundle.hourly, today);
    for (const period of DAY_PERIODS) {
      lines.push(describePeriod(period, todayHours, units));
    }
  } else {
    lines.push('No hourly data to build today’s story.');
  }

  lines.push('', 'Next few days:');
  const outlook = bundle.daily.slice(0, OUTLOOK_DAYS);
  if (outlook.length >= 2) {
    for (const day of outlook) {
      let line =
        `${weekdayLabel(day.date)}: ${weatherIcon(day.weatherCode)} ${describeWeatherCode(day.weatherCode)}, ` +
        `${formatTemperature(day.temperatureMin, units)} – ${formatTemperature(day.temperatureMax, units)}`;
      if (day.precipitationProbabilityMax !== undefined) {
        line += `, rain chance ${day.precipitationProbabilityMax.toFixed(0)}%`;
      }
      lines.push(line);
    }
  } else {
    lines.push('Not enough forecast data for a multi-day summary.');
  }

  const uv = resolveTodayAggregate(bundle)?.uvIndexMax;
  if (uv !== undefined) {
    lines.push('', `UV today: ${uv.toFixed(1)} (${interpretUv(uv)}).`);
    if (uv >= 7) {
      lines.push('Afternoons are quite bright – sunscreen and sunglasses strongly recommended.');
    } else if (uv >= 4) {
      lines.push('Some sun protection is a good idea if you’re outside for longer periods.');
    }
  }

  return lines.join('\n');
}
