/**
 * WMO weather interpretation codes as reported by Open-Meteo.
 */
export type WeatherCategory =
  | 'clear'
  | 'partly-cloudy'
  | 'overcast'
  | 'fog'
  | 'drizzle'
  | 'rain'
  | 'snow'
  | 'showers'
  | 'snow-showers'
  | 'thunderstorm'
  | 'unknown';

export const WEATHER_DESCRIPTIONS: Readonly<Record<number, string>> = {
  0: 'Clear sky',
  1: 'Mainly clear',
  2: 'Partly cloudy',
  3: 'Overcast',
  45: 'Fog',
  48: 'Depositing rime fog',
  51: 'Light drizzle',
  53: 'Moderate drizzle',
  55: 'Dense drizzle',
  56: 'Light freezing drizzle',
  57: 'Dense freezing drizzle',
  61: 'Slight rain',
  63: 'Moderate rain',
  65: 'Heavy rain',
  66: 'Light freezing rain',
  67: 'Heavy freezing rain',
  71: 'Slight snowfall',
  73: 'Moderate snowfall',
  75: 'Heavy snowfall',
  77: 'Snow grains',
  80: 'Slight rain showers',
  81: 'Moderate rain showers',
  82: 'Violent rain showers',
  85: 'Slight snow showers',
  86: 'Heavy snow showers',
  95: 'Thunderstorm',
  96: 'Thunderstorm with slight hail',
  99: 'Thunderstorm with heavy hail',
};

export const CATEGORY_ICONS: Readonly<Record<WeatherCategory, string>> = {
  clear: '☀️',
  'partly-cloudy': '⛅',
  overcast: '☁️',
  fog: '🌫️',
  drizzle: '🌦️',
  rain: '🌧️',
  snow: '❄️',
  showers: '🌧️',
  'snow-showers': '🌨️',
  thunderstorm: '⛈️',
  unknown: '🌡️',
};

export function describeWeatherCode(code: number | undefined): string {
  if (code === undefined) return 'Unknown';
  return WEATHER_DESCRIPTIONS[code] ?? `Weather code ${code}`;
}

export function categorizeWeatherCode(code: number | undefined): WeatherCategory {
  if (code === undefined) return 'unknown';
  if (code === 0) return 'clear';
  if (code === 1 || code === 2) return 'partly-cloudy';
  if (code === 3) return 'overcast';
  if (code === 45 || code === 48) return 'fog';
  if (code >= 51 && code <= 57) return 'drizzle';
  if (code >= 61 && code <= 67) return 'rain';
  if (code >= 71 && code <= 77) return 'snow';
  if (code >= 80 && code <= 82) return 'showers';
  if (code >= 85 && code <= 86) return 'snow-showers';
  if (code >= 95) return 'thunderstorm';
  return 'unknown';
}

export function weatherIcon(code: number | undefined): string {
  return CATEGORY_ICONS[categorizeWeatherCode(code)];
}

export function isSnowCode(code: number | undefined): boolean {
  const category = categorizeWeatherCode(code);
  return category === 'snow' || category === 'snow-showers';
}

export function isThunderstormCode(code: number | undefined): boolean {
  return code !== undefined && code >= 95;
}
