import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const configSchema = z.object({
  // Location lookup
  zip: z
    .string()
    .regex(/^\d{5}$/, 'must be a 5-digit ZIP code')
    .default('64093'), // Warrensburg, MO
  country: z.string().min(1).default('USA'),
  userAgent: z.string().min(1).default('WeatherApp/1.0'), // Nominatim requires one
  geocoderUrl: z.string().url().default('https://nominatim.openstreetmap.org/search'),

  // Forecast
  forecastUrl: z.string().url().default('https://api.open-meteo.com/v1/forecast'),
  timezone: z
    .string()
    .refine(isValidTimeZone, 'must be an IANA time zone')
    .default('America/Chicago'),
  httpTimeoutMs: z.coerce.number().int().positive().default(10000),

  // Storage
  dbDriver: z.enum(['sqlite', 'mysql']).default('sqlite'),
  databasePath: z.string().min(1).default('data/weather.db'),
  dbHost: z.string().min(1).default('localhost'),
  dbPort: z.coerce.number().int().positive().default(3306),
  dbUser: z.string().min(1).default('root'),
  dbPassword: z.string().default(''),
  dbName: z.string().min(1).default('weather'),

  // App
  logLevel: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

export type Config = z.infer<typeof configSchema>;

export const MYSQL_CONNECTION_KEYS = ['dbHost', 'dbUser', 'dbPassword', 'dbName'] as const;

export type ConfigOverrides = Partial<Record<keyof Config, string>>;

/**
 * Build the configuration from environment variables, with CLI-provided
 * overrides taking precedence over the environment.
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw: Record<string, string | undefined> = {
    zip: env('ZIP'),
    country: env('COUNTRY'),
    userAgent: env('USER_AGENT'),
    geocoderUrl: env('GEOCODER_URL'),
    forecastUrl: env('FORECAST_URL'),
    timezone: env('TIMEZONE'),
    httpTimeoutMs: env('HTTP_TIMEOUT_MS'),
    dbDriver: env('DB_DRIVER'),
    databasePath: env('DATABASE_PATH'),
    dbHost: env('DB_HOST'),
    dbPort: env('DB_PORT'),
    dbUser: env('DB_USER'),
    dbPassword: env('DB_PASS'),
    dbName: env('DB_NAME'),
    logLevel: env('LOG_LEVEL'),
  };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }
  // Connection settings without an explicit driver mean a MySQL server
  if (raw.dbDriver === undefined && MYSQL_CONNECTION_KEYS.some((key) => raw[key] !== undefined)) {
    raw.dbDriver = 'mysql';
  }

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
        cause: error,
      });
    }
    throw error;
  }
}
