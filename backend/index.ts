import { attachErrorHandlers, createApp } from './src/server/create-app.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  NODE_ENV,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  OPENWEATHER_API_KEY,
  OPENWEATHER_BASE_URL,
  WEATHER_MAX_RETRIES,
  WEATHER_BACKOFF_BASE_MS,
} from './src/server/runtime.js';
import { createFetchWithTimeout } from './src/utils/http-client.js';
import { logger } from './src/utils/logger.js';
import { createWeatherService, WeatherService } from './src/utils/weather-service.js';
import { registerFishingRoutes } from './src/routes/fishing.js';
import { registerHealthRoutes } from './src/routes/health.js';

interface BuildServerOptions {
  weatherService: WeatherService;
  now?: () => Date;
}

export const buildServer = ({ weatherService, now }: BuildServerOptions) => {
  const server = createApp({
    isProduction: IS_PRODUCTION,
    corsAllowlist: CORS_ALLOWLIST,
    rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
  });
  registerHealthRoutes(server);
  registerFishingRoutes({ app: server, weatherService, now });
  attachErrorHandlers(server);
  return server;
};

const fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS);

export const weatherService = createWeatherService({
  fetchWithTimeout,
  apiKey: OPENWEATHER_API_KEY,
  baseUrl: OPENWEATHER_BASE_URL,
  maxRetries: WEATHER_MAX_RETRIES,
  backoffBaseMs: WEATHER_BACKOFF_BASE_MS,
});

export const app = buildServer({ weatherService });

if (NODE_ENV !== 'test') {
  if (!OPENWEATHER_API_KEY) {
    logger.warn('OPENWEATHER_API_KEY is not set; weather lookups will be rejected by the provider');
  }
  startServer({ app, port: PORT });
}
