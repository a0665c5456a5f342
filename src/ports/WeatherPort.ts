/**
 * Raw Open-Meteo forecast payload. Every series is a parallel array aligned
 * by position within its group; entries may be null when the model has no value.
 */
export interface RawCurrentWeather {
  time?: string;
  temperature_2m?: number | null;
  apparent_temperature?: number | null;
  relative_humidity_2m?: number | null;
  precipitation?: number | null;
  rain?: number | null;
  weather_code?: number | null;
  wind_speed_10m?: number | null;
  wind_direction_10m?: number | null;
  pressure_msl?: number | null;
  is_day?: number | null;
}

export interface RawHourlyWeather {
  time?: string[];
  temperature_2m?: Array<number | null>;
  apparent_temperature?: Array<number | null>;
  relative_humidity_2m?: Array<number | null>;
  precipitation_probability?: Array<number | null>;
  uv_index?: Array<number | null>;
  wind_speed_10m?: Array<number | null>;
  weather_code?: Array<number | null>;
}

export interface RawDailyWeather {
  time?: string[];
  temperature_2m_max?: Array<number | null>;
  temperature_2m_min?: Array<number | null>;
  apparent_temperature_max?: Array<number | null>;
  apparent_temperature_min?: Array<number | null>;
  uv_index_max?: Array<number | null>;
  precipitation_sum?: Array<number | null>;
  precipitation_probability_max?: Array<number | null>;
  wind_speed_10m_max?: Array<number | null>;
  weather_code?: Array<number | null>;
  sunrise?: Array<string | null>;
  sunset?: Array<string | null>;
}

export interface RawForecastBundle {
  latitude?: number;
  longitude?: number;
  timezone?: string;
  current?: RawCurrentWeather;
  hourly?: RawHourlyWeather;
  daily?: RawDailyWeather;
}

export interface ForecastRequest {
  latitude: number;
  longitude: number;
  timezone: string;
  forecastDays: number;
}

export interface WeatherPort {
  /** Resolves with metric values (°C, km/h, mm). Rejects on transport or payload failure. */
  getForecast(request: ForecastRequest): Promise<RawForecastBundle>;
}
