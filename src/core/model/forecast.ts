import type {
  RawCurrentWeather,
  RawDailyWeather,
  RawForecastBundle,
  RawHourlyWeather,
} from '../../ports/WeatherPort.js';

/** A numeric reading that the model may not have produced. */
export type OptionalNumber = number | undefined;

export interface HourlySample {
  /** Local ISO-8601 timestamp, minute precision (e.g. `2026-10-19T14:00`). */
  time: string;
  temperature: OptionalNumber;
  apparentTemperature: OptionalNumber;
  relativeHumidity: OptionalNumber;
  precipitationProbability: OptionalNumber;
  uvIndex: OptionalNumber;
  windSpeed: OptionalNumber;
  weatherCode: OptionalNumber;
}

export interface DailyAggregate {
  /** ISO date (`YYYY-MM-DD`). */
  date: string;
  temperatureMax: OptionalNumber;
  temperatureMin: OptionalNumber;
  apparentTemperatureMax: OptionalNumber;
  apparentTemperatureMin: OptionalNumber;
  uvIndexMax: OptionalNumber;
  precipitationSum: OptionalNumber;
  precipitationProbabilityMax: OptionalNumber;
  windSpeedMax: OptionalNumber;
  weatherCode: OptionalNumber;
  sunrise: string | undefined;
  sunset: string | undefined;
}

export interface CurrentConditions {
  time: string | undefined;
  temperature: OptionalNumber;
  apparentTemperature: OptionalNumber;
  relativeHumidity: OptionalNumber;
  precipitation: OptionalNumber;
  rain: OptionalNumber;
  weatherCode: OptionalNumber;
  windSpeed: OptionalNumber;
  windDirection: OptionalNumber;
  pressure: OptionalNumber;
  isDay: boolean | undefined;
}

export interface ForecastBundle {
  timezone: string | undefined;
  current: CurrentConditions;
  hourly: HourlySample[];
  daily: DailyAggregate[];
}

export function toOptionalNumber(value: unknown): OptionalNumber {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toOptionalInteger(value: unknown): OptionalNumber {
  const numeric = toOptionalNumber(value);
  return numeric === undefined ? undefined : Math.trunc(numeric);
}

function toOptionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function at<T>(series: readonly T[] | undefined, index: number): T | undefined {
  return series?.[index];
}

function normalizeCurrent(raw: RawCurrentWeather | undefined): CurrentConditions {
  const isDay = toOptionalNumber(raw?.is_day);
  return {
    time: toOptionalString(raw?.time),
    temperature: toOptionalNumber(raw?.temperature_2m),
    apparentTemperature: toOptionalNumber(raw?.apparent_temperature),
    relativeHumidity: toOptionalNumber(raw?.relative_humidity_2m),
    precipitation: toOptionalNumber(raw?.precipitation),
    rain: toOptionalNumber(raw?.rain),
    weatherCode: toOptionalInteger(raw?.weather_code),
    windSpeed: toOptionalNumber(raw?.wind_speed_10m),
    windDirection: toOptionalNumber(raw?.wind_direction_10m),
    pressure: toOptionalNumber(raw?.pressure_msl),
    isDay: isDay === undefined ? undefined : isDay !== 0,
  };
}

function normalizeHourly(raw: RawHourlyWeather | undefined): HourlySample[] {
  const times = raw?.time ?? [];
  const samples: HourlySample[] = [];
  times.forEach((time, i) => {
    if (!toOptionalString(time)) return;
    samples.push({
      time,
      temperature: toOptionalNumber(at(raw?.temperature_2m, i)),
      apparentTemperature: toOptionalNumber(at(raw?.apparent_temperature, i)),
      relativeHumidity: toOptionalNumber(at(raw?.relative_humidity_2m, i)),
      precipitationProbability: toOptionalNumber(at(raw?.precipitation_probability, i)),
      uvIndex: toOptionalNumber(at(raw?.uv_index, i)),
      windSpeed: toOptionalNumber(at(raw?.wind_speed_10m, i)),
      weatherCode: toOptionalInteger(at(raw?.weather_code, i)),
    });
  });
  return samples;
}

function normalizeDaily(raw: RawDailyWeather | undefined): DailyAggregate[] {
  const dates = raw?.time ?? [];
  const days: DailyAggregate[] = [];
  dates.forEach((date, i) => {
    if (!toOptionalString(date)) return;
    days.push({
      date,
      temperatureMax: toOptionalNumber(at(raw?.temperature_2m_max, i)),
      temperatureMin: toOptionalNumber(at(raw?.temperature_2m_min, i)),
      apparentTemperatureMax: toOptionalNumber(at(raw?.apparent_temperature_max, i)),
      apparentTemperatureMin: toOptionalNumber(at(raw?.apparent_temperature_min, i)),
      uvIndexMax: toOptionalNumber(at(raw?.uv_index_max, i)),
      precipitationSum: toOptionalNumber(at(raw?.precipitation_sum, i)),
      precipitationProbabilityMax: toOptionalNumber(at(raw?.precipitation_probability_max, i)),
      windSpeedMax: toOptionalNumber(at(raw?.wind_speed_10m_max, i)),
      weatherCode: toOptionalInteger(at(raw?.weather_code, i)),
      sunrise: toOptionalString(at(raw?.sunrise, i)),
      sunset: toOptionalString(at(raw?.sunset, i)),
    });
  });
  return days;
}

/**
 * Converts the raw parallel-array payload into typed records. This is the only
 * place that inspects value types; everything downstream trusts `OptionalNumber`.
 */
export function normalizeForecast(raw: RawForecastBundle): ForecastBundle {
  return {
    timezone: toOptionalString(raw.timezone),
    current: normalizeCurrent(raw.current),
    hourly: normalizeHourly(raw.hourly),
    daily: normalizeDaily(raw.daily),
  };
}

/** Lexical match on the date prefix; no calendar arithmetic. */
export function belongsToDay(timestamp: string, date: string): boolean {
  return timestamp.startsWith(date);
}

export function samplesForDay(samples: readonly HourlySample[], date: string): HourlySample[] {
  return samples.filter((sample) => belongsToDay(sample.time, date));
}

export function datePart(timestamp: string): string {
  return timestamp.split('T')[0] ?? timestamp;
}

/** `HH:MM` portion of a local timestamp, or the input unchanged when it has no time part. */
export function clockLabel(timestamp: string): string {
  const time = timestamp.split('T')[1];
  return time === undefined ? timestamp : time.slice(0, 5);
}

export function localHour(timestamp: string): number | undefined {
  const time = timestamp.split('T')[1];
  if (time === undefined) return undefined;
  const hour = Number.parseInt(time.slice(0, 2), 10);
  return Number.isNaN(hour) ? undefined : hour;
}

/** The forecast's "today": the date of the current observation, else the first daily entry. */
export function resolveToday(bundle: ForecastBundle): string | undefined {
  if (bundle.current.time?.includes('T')) {
    return datePart(bundle.current.time);
  }
  return bundle.daily[0]?.date;
}

/** The daily entry for the forecast's today, else the first daily entry. */
export function resolveTodayAggregate(bundle: ForecastBundle): DailyAggregate | undefined {
  const today = resolveToday(bundle);
  return bundle.daily.find((day) => day.date === today) ?? bundle.daily[0];
}

/** Mean relative humidity of the hourly samples on `date`. */
export function averageHumidity(samples: readonly HourlySample[], date: string): OptionalNumber {
  const values = samplesForDay(samples, date)
    .map((sample) => sample.relativeHumidity)
    .filter((value): value is number => value !== undefined);
  if (values.length === 0) return undefined;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function parseDate(date: string): Date | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) return undefined;
  const parsed = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/** `Mon 03 Jun` style label for an ISO date; falls back to the input. */
export function dayLabel(date: string): string {
  const parsed = parseDate(date);
  const weekday = parsed && WEEKDAYS[parsed.getUTCDay()];
  const month = parsed && MONTHS[parsed.getUTCMonth()];
  if (!parsed || weekday === undefined || month === undefined) return date;
  return `${weekday} ${String(parsed.getUTCDate()).padStart(2, '0')} ${month}`;
}

export function weekdayLabel(date: string): string {
  const parsed = parseDate(date);
  return (parsed && WEEKDAYS[parsed.getUTCDay()]) ?? date;
}

/**
 * Reads a local wall-clock timestamp (`YYYY-MM-DDTHH:MM`) as if it were UTC,
 * so arithmetic on it does not depend on the host time zone.
 */
export function parseWallClock(timestamp: string): Date | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2}))?/.exec(timestamp);
  if (!match) return undefined;
  const parsed = new Date(
    Date.UTC(
      Number(match[1]),
      Number(match[2]) - 1,
      Number(match[3]),
      Number(match[4] ?? 0),
      Number(match[5] ?? 0)
    )
  );
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}
