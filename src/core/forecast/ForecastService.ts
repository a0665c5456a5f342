import type { AirQualityPort } from '../../ports/AirQualityPort.js';
import type { WeatherPort } from '../../ports/WeatherPort.js';
import { createLogger } from '../../utils/logger.js';
import type { ForecastCache } from '../cache/ForecastCache.js';
import { buildActivitiesText } from '../insights/activityAdvice.js';
import {
  normalizeAirQuality,
  summarizeAirQuality,
  type AirQualityReading,
  type AirQualitySummary,
} from '../insights/airQuality.js';
import { buildDailyAlerts, buildMicroSummary, interpretUv, moonPhaseFor, type MoonPhase, type UvLevel } from '../insights/conditions.js';
import { buildDailyDetails, formatDailyDetails, type DailyDetail } from '../insights/dailyDetail.js';
import { buildStoryText } from '../insights/story.js';
import { buildSuggestions } from '../insights/suggestions.js';
import {
  averageHumidity,
  clockLabel,
  normalizeForecast,
  parseWallClock,
  resolveToday,
  resolveTodayAggregate,
  samplesForDay,
  type CurrentConditions,
  type DailyAggregate,
  type ForecastBundle,
} from '../model/forecast.js';
import { rankActivityHours, type ActivityRanking } from '../scoring/activityRanker.js';
import { findBestHour } from '../scoring/bestHourSelector.js';
import { computeComfortIndex } from '../scoring/comfortScorer.js';
import { formatTrendOverview, summarizeTrend, type TrendOverview } from '../trend/trendSummarizer.js';
import type { UnitSystem } from '../units/unitConverter.js';
import { categorizeWeatherCode, describeWeatherCode, weatherIcon, type WeatherCategory } from '../weather/weatherCodes.js';

export interface ForecastQuery {
  latitude: number;
  longitude: number;
  units: UnitSystem;
  timezone?: string;
  /** ISO date to focus hourly insights on; defaults to the forecast's today. */
  day?: string;
}

export interface HourlyComfortPoint {
  time: string;
  label: string;
  comfort: number | undefined;
}

export interface ForecastInsights {
  location: { latitude: number; longitude: number; timezone: string | undefined };
  /** Unit system the caller renders in. Numeric fields stay metric. */
  units: UnitSystem;
  day: string | undefined;
  current: CurrentConditions & {
    description: string;
    category: WeatherCategory;
    icon: string;
  };
  today: (DailyAggregate & { uvLevel: UvLevel | undefined }) | undefined;
  hourlyComfort: HourlyComfortPoint[];
  bestHour: { time: string; label: string } | undefined;
  activities: ActivityRanking;
  overview: TrendOverview;
  overviewText: string;
  microSummary: string;
  alerts: string[];
  moonPhase: MoonPhase | undefined;
  /** Undefined when the air-quality lookup failed or returned nothing usable. */
  airQuality: AirQualitySummary | undefined;
  suggestions: string;
  story: string;
  dailyDetails: DailyDetail[];
  dailyText: string;
  activitiesText: string;
}

export interface ForecastServiceOptions {
  forecastDays: number;
  defaultTimezone: string;
}

export interface AirQualitySource {
  port: AirQualityPort;
  cache: ForecastCache<AirQualityReading>;
}

/**
 * Runs every scorer over one cached forecast bundle. The cache instances are
 * owned by the caller so their lifetime matches the application shell.
 */
export class ForecastService {
  private readonly logger = createLogger({ service: 'ForecastService' });

  constructor(
    private readonly weatherPort: WeatherPort,
    private readonly cache: ForecastCache<ForecastBundle>,
    private readonly airQuality: AirQualitySource,
    private readonly options: ForecastServiceOptions
  ) {}

  async getForecast(query: ForecastQuery): Promise<ForecastBundle | undefined> {
    return this.cache.getOrFetch(query.latitude, query.longitude, query.units, async () => {
      const raw = await this.weatherPort.getForecast({
        latitude: query.latitude,
        longitude: query.longitude,
        timezone: query.timezone ?? this.options.defaultTimezone,
        forecastDays: this.options.forecastDays,
      });
      return normalizeForecast(raw);
    });
  }

  /** Air quality through its own cache; a failed lookup leaves the previous entry and yields undefined. */
  async getAirQuality(query: ForecastQuery): Promise<AirQualityReading | undefined> {
    return this.airQuality.cache.getOrFetch(query.latitude, query.longitude, query.units, async () => {
      const raw = await this.airQuality.port.getAirQuality({
        latitude: query.latitude,
        longitude: query.longitude,
        timezone: query.timezone ?? this.options.defaultTimezone,
      });
      return normalizeAirQuality(raw);
    });
  }

  async getInsights(query: ForecastQuery): Promise<ForecastInsights | undefined> {
    const logger = this.logger.child({ method: 'getInsights', lat: query.latitude, lon: query.longitude });
    const [bundle, airQuality] = await Promise.all([this.getForecast(query), this.getAirQuality(query)]);
    if (!bundle) {
      logger.warn('No forecast available');
      return undefined;
    }
    if (!airQuality) {
      logger.debug('No air quality available');
    }
    const insights = deriveInsights(bundle, query, airQuality);
    logger.info(
      {
        day: insights.day,
        bestHour: insights.bestHour?.label,
        trend: insights.overview.trend,
        airQuality: insights.airQuality?.overall,
      },
      'Forecast insights derived'
    );
    return insights;
  }
}

export function deriveInsights(
  bundle: ForecastBundle,
  query: ForecastQuery,
  airQualityReading?: AirQualityReading
): ForecastInsights {
  const todayDate = resolveToday(bundle);
  const day = query.day ?? todayDate;
  const today = resolveTodayAggregate(bundle);
  const dayHours = day ? samplesForDay(bundle.hourly, day) : [];

  const current = bundle.current;
  const bestHourTime = findBestHour(dayHours);
  const activities = rankActivityHours(dayHours);
  const overview = summarizeTrend(bundle.daily);
  const observedAt = current.time ? parseWallClock(current.time) : undefined;
  const airQuality = airQualityReading ? summarizeAirQuality(airQualityReading) : undefined;
  const dailyDetails = buildDailyDetails(bundle.daily, bundle.hourly);

  return {
    location: { latitude: query.latitude, longitude: query.longitude, timezone: bundle.timezone },
    units: query.units,
    day,
    current: {
      ...current,
      description: describeWeatherCode(current.weatherCode),
      category: categorizeWeatherCode(current.weatherCode),
      icon: weatherIcon(current.weatherCode),
    },
    today: today ? { ...today, uvLevel: interpretUv(today.uvIndexMax) } : undefined,
    hourlyComfort: dayHours.map((sample) => ({
      time: sample.time,
      label: clockLabel(sample.time),
      comfort: computeComfortIndex({
        temperature: sample.temperature,
        humidity: sample.relativeHumidity,
        windSpeed: sample.windSpeed,
        uvIndex: sample.uvIndex,
        rainProbability: sample.precipitationProbability,
      }),
    })),
    bestHour: bestHourTime ? { time: bestHourTime, label: clockLabel(bestHourTime) } : undefined,
    activities,
    overview,
    overviewText: formatTrendOverview(overview, query.units),
    microSummary: buildMicroSummary({
      temperature: current.temperature,
      apparentTemperature: current.apparentTemperature,
      rainProbability: today?.precipitationProbabilityMax,
      windSpeed: today?.windSpeedMax,
      weatherCode: current.weatherCode,
      bestHour: bestHourTime,
    }),
    alerts: buildDailyAlerts({
      rainProbability: today?.precipitationProbabilityMax,
      windSpeedMax: today?.windSpeedMax,
      weatherCode: current.weatherCode,
      uvIndexMax: today?.uvIndexMax,
    }),
    moonPhase: observedAt ? moonPhaseFor(observedAt) : undefined,
    airQuality,
    suggestions: buildSuggestions({
      temperature: current.temperature,
      apparentTemperature: current.apparentTemperature,
      uvIndexMax: today?.uvIndexMax,
      rainProbability: today?.precipitationProbabilityMax,
      windSpeedMax: today?.windSpeedMax,
      humidityAverage: today ? averageHumidity(bundle.hourly, today.date) : undefined,
      airQuality: airQuality?.overall,
      weatherCode: current.weatherCode,
    }),
    story: buildStoryText(bundle, query.units),
    dailyDetails,
    dailyText: formatDailyDetails(dailyDetails, query.units),
    activitiesText: buildActivitiesText({
      temperature: current.temperature,
      apparentTemperature: current.apparentTemperature,
      uvIndexMax: today?.uvIndexMax,
      rainProbability: today?.precipitationProbabilityMax,
      windSpeedMax: today?.windSpeedMax,
      weatherCode: today?.weatherCode,
      bestHour: bestHourTime,
      ranking: activities,
    }),
  };
}
