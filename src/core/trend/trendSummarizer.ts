import { dayLabel, type DailyAggregate, type OptionalNumber } from '../model/forecast.js';
import { formatPrecipitation, formatTemperature, formatWindSpeed } from '../units/formatting.js';
import type { UnitSystem } from '../units/unitConverter.js';

export const MAX_OVERVIEW_DAYS = 12;
const TREND_WINDOW_DAYS = 3;

export type TemperatureRange =
  | { kind: 'full'; low: number; high: number }
  | { kind: 'highs-only'; high: number }
  | { kind: 'lows-only'; low: number }
  | { kind: 'unavailable' };

export type TrendDirection = 'stable' | 'turns milder' | 'cools down' | 'insufficient data';

export type RainCharacter =
  | 'mostly dry'
  | 'showery with dry spells'
  | 'several wetter days'
  | 'unavailable';

export type TemperatureBand = 'mostly cold' | 'rather cool' | 'mild' | 'warm' | 'quite hot' | 'mixed';

export type RainBand = 'with several wet days' | 'with occasional showers' | 'and often dry';

export type NotableKind = 'warmest' | 'coldest' | 'wettest' | 'windiest';

export interface NotableDay {
  kind: NotableKind;
  date: string;
  /** Position of the day within the summarized window. */
  index: number;
  value: number;
}

export interface TrendOverview {
  dayCount: number;
  range: TemperatureRange;
  trend: TrendDirection;
  /** Late-window average high minus early-window average high, when computable. */
  trendDelta: number | undefined;
  rainCharacter: RainCharacter;
  totalPrecipitation: number | undefined;
  averageHigh: number | undefined;
  notableDays: NotableDay[];
  temperatureBand: TemperatureBand;
  rainBand: RainBand;
  headline: string;
}

function defined(values: readonly OptionalNumber[]): number[] {
  return values.filter((value): value is number => value !== undefined);
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function resolveRange(highs: readonly number[], lows: readonly number[]): TemperatureRange {
  if (highs.length > 0 && lows.length > 0) {
    return { kind: 'full', low: Math.min(...lows), high: Math.max(...highs) };
  }
  if (highs.length > 0) return { kind: 'highs-only', high: Math.max(...highs) };
  if (lows.length > 0) return { kind: 'lows-only', low: Math.min(...lows) };
  return { kind: 'unavailable' };
}

function resolveTrend(highs: readonly number[]): { trend: TrendDirection; delta: number | undefined } {
  if (highs.length < 2) {
    return { trend: 'insufficient data', delta: undefined };
  }
  const window = Math.min(TREND_WINDOW_DAYS, highs.length);
  const delta = mean(highs.slice(-window)) - mean(highs.slice(0, window));
  if (Math.abs(delta) < 1) return { trend: 'stable', delta };
  return { trend: delta > 0 ? 'turns milder' : 'cools down', delta };
}

function rainCharacterFor(total: number | undefined): RainCharacter {
  if (total === undefined) return 'unavailable';
  if (total < 2) return 'mostly dry';
  if (total < 10) return 'showery with dry spells';
  return 'several wetter days';
}

function temperatureBandFor(averageHigh: number | undefined): TemperatureBand {
  if (averageHigh === undefined) return 'mixed';
  if (averageHigh <= 5) return 'mostly cold';
  if (averageHigh <= 12) return 'rather cool';
  if (averageHigh <= 20) return 'mild';
  if (averageHigh <= 27) return 'warm';
  return 'quite hot';
}

function rainBandFor(total: number | undefined): RainBand {
  if (total !== undefined && total > 8) return 'with several wet days';
  if (total !== undefined && total > 2) return 'with occasional showers';
  return 'and often dry';
}

/**
 * Linear scan for the extreme of one field. Days without the field are
 * skipped; a later day only replaces the current pick when strictly better,
 * so the earliest day wins ties.
 */
function pickExtreme(
  days: readonly DailyAggregate[],
  kind: NotableKind,
  field: (day: DailyAggregate) => OptionalNumber,
  direction: 'max' | 'min'
): NotableDay | undefined {
  let pick: NotableDay | undefined;
  for (const [index, day] of days.entries()) {
    const value = field(day);
    if (value === undefined) continue;
    const better = pick === undefined || (direction === 'max' ? value > pick.value : value < pick.value);
    if (better) {
      pick = { kind, date: day.date, index, value };
    }
  }
  return pick;
}

export function summarizeTrend(daily: readonly DailyAggregate[]): TrendOverview {
  const days = daily.slice(0, MAX_OVERVIEW_DAYS);

  const highs = defined(days.map((day) => day.temperatureMax));
  const lows = defined(days.map((day) => day.temperatureMin));
  const rainTotals = defined(days.map((day) => day.precipitationSum));

  const totalPrecipitation =
    rainTotals.length > 0 ? rainTotals.reduce((sum, value) => sum + value, 0) : undefined;
  const averageHigh = highs.length > 0 ? mean(highs) : undefined;
  const { trend, delta } = resolveTrend(highs);

  const notableDays = [
    pickExtreme(days, 'warmest', (day) => day.temperatureMax, 'max'),
    pickExtreme(days, 'coldest', (day) => day.temperatureMin, 'min'),
    pickExtreme(days, 'wettest', (day) => day.precipitationSum, 'max'),
    pickExtreme(days, 'windiest', (day) => day.windSpeedMax, 'max'),
  ].filter((day): day is NotableDay => day !== undefined);

  const temperatureBand = temperatureBandFor(averageHigh);
  const rainBand = rainBandFor(totalPrecipitation);

  return {
    dayCount: days.length,
    range: resolveRange(highs, lows),
    trend,
    trendDelta: delta,
    rainCharacter: rainCharacterFor(totalPrecipitation),
    totalPrecipitation,
    averageHigh,
    notableDays,
    temperatureBand,
    rainBand,
    headline: `The next ${days.length} days look ${temperatureBand} ${rainBand}.`,
  };
}

const TREND_SENTENCES: Record<TrendDirection, string> = {
  stable: 'it stays fairly similar from the start to the end of the period.',
  'turns milder': 'it slowly turns milder towards the end of the period.',
  'cools down': 'it gradually cools down towards the end of the period.',
  'insufficient data': 'not enough data to judge.',
};

const RAIN_SENTENCES: Record<RainCharacter, string> = {
  'mostly dry': 'mostly dry, only small amounts of rain expected.',
  'showery with dry spells': 'a few showery days, but also dry spells.',
  'several wetter days': 'several wetter days mixed into the period.',
  unavailable: 'no rain totals available.',
};

function rangeLine(range: TemperatureRange, units: UnitSystem): string {
  switch (range.kind) {
    case 'full':
      return `Temperatures range roughly from ${formatTemperature(range.low, units)} to ${formatTemperature(range.high, units)}.`;
    case 'highs-only':
      return `Highs up to about ${formatTemperature(range.high, units)}.`;
    case 'lows-only':
      return `Lows down to about ${formatTemperature(range.low, units)}.`;
    case 'unavailable':
      return 'Temperature range: N/A.';
  }
}

function notableLine(day: NotableDay, units: UnitSystem): string {
  const label = dayLabel(day.date);
  switch (day.kind) {
    case 'warmest':
      return `Warmest: ${label} – ${formatTemperature(day.value, units)}.`;
    case 'coldest':
      return `Coldest: ${label} – ${formatTemperature(day.value, units)}.`;
    case 'wettest':
      return `Wettest: ${label} – ${formatPrecipitation(day.value, units)}.`;
    case 'windiest':
      return `Windiest: ${label} – gusts up to ${formatWindSpeed(day.value, units)}.`;
  }
}

/** Plain-text narrative of an overview, values rendered in the requested units. */
export function formatTrendOverview(overview: TrendOverview, units: UnitSystem): string {
  if (overview.dayCount === 0) {
    return 'No forecast available.';
  }

  const lines: string[] = [];
  lines.push(`${overview.dayCount}-day overview:`);
  lines.push(`• ${rangeLine(overview.range, units)}`);
  lines.push(`• Trend: ${TREND_SENTENCES[overview.trend]}`);
  lines.push(`• Rain character: ${RAIN_SENTENCES[overview.rainCharacter]}`);
  lines.push('');
  lines.push('Notable days:');
  for (const day of overview.notableDays) {
    lines.push(`• ${notableLine(day, units)}`);
  }
  lines.push('');
  lines.push(`Headline: ${overview.headline}`);
  return lines.join('\n');
}
