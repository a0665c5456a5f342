import { z } from 'zod';
import { UNIT_SYSTEMS } from '../core/units/unitConverter.js';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Open-Meteo
  openMeteoBaseUrl: z.string().url().default('https://api.open-meteo.com/v1/forecast'),
  forecastDays: z.coerce.number().int().min(1).max(16).default(12),
  airQualityBaseUrl: z.string().url().default('https://air-quality-api.open-meteo.com/v1/air-quality'),
  requestTimeoutMs: z.coerce.number().int().positive().default(10000),

  // Forecast cache
  cacheTtlMinutes: z.coerce.number().positive().default(20),
  prefetchCron: z.string().min(1).default('*/15 * * * *'),

  // Presentation
  defaultUnits: z.enum(UNIT_SYSTEMS).default('metric'),
  timezone: z.string().default('auto'),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
  databasePath: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    openMeteoBaseUrl: env('OPEN_METEO_BASE_URL'),
    forecastDays: env('FORECAST_DAYS'),
    airQualityBaseUrl: env('AIR_QUALITY_BASE_URL'),
    requestTimeoutMs: env('REQUEST_TIMEOUT_MS'),
    cacheTtlMinutes: env('CACHE_TTL_MINUTES'),
    prefetchCron: env('PREFETCH_CRON'),
    defaultUnits: env('DEFAULT_UNITS'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
    databasePath: env('DATABASE_PATH'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}
