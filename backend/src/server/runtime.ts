import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const envSchema = z.object({
  PORT: z.string().default('3001'),
  NODE_ENV: z.string().default('development'),
  OPENWEATHER_API_KEY: z.string().default(''),
  OPENWEATHER_BASE_URL: z.string().url().default('https://api.openweathermap.org/data/2.5'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  LOG_DIR: z.string().optional(),
  CORS_ORIGIN: z.string().default(''),
});

const env = envSchema.parse(process.env);

export const PORT = env.PORT;
export const NODE_ENV = env.NODE_ENV;
export const IS_PRODUCTION = env.NODE_ENV === 'production';

export const OPENWEATHER_API_KEY = env.OPENWEATHER_API_KEY;
export const OPENWEATHER_BASE_URL = env.OPENWEATHER_BASE_URL.replace(/\/+$/, '');

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 10000);
export const WEATHER_MAX_RETRIES = parsePositiveInt(process.env.WEATHER_MAX_RETRIES, 3);
export const WEATHER_BACKOFF_BASE_MS = parsePositiveInt(process.env.WEATHER_BACKOFF_BASE_MS, 1000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const LOG_LEVEL = env.LOG_LEVEL ?? (IS_PRODUCTION ? 'info' : 'debug');
export const LOG_DIR = env.LOG_DIR?.trim() || null;

export const SERVICE_VERSION = process.env.npm_package_version || '1.0.0';

export const CORS_ALLOWLIST = env.CORS_ORIGIN
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);
