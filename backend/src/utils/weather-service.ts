import { setTimeout as delay } from 'node:timers/promises';
import { WeatherFailure, WeatherServiceError, isRetryableErrorKind } from './errors.js';
import { DEFAULT_FETCH_HEADERS, FetchTimeoutError, FetchWithTimeout } from './http-client.js';
import { LocationQuery, locationQueryParams, parseLocationQuery } from './location.js';
import { Logger, logger as defaultLogger } from './logger.js';
import { WeatherObservation, openWeatherCurrentSchema, toWeatherObservation } from './weather.js';

export type WeatherResult = { ok: true; observation: WeatherObservation } | { ok: false; error: WeatherFailure };

export interface GetWeatherOptions {
  signal?: AbortSignal;
}

export interface WeatherService {
  getWeather(location: string, options?: GetWeatherOptions): Promise<WeatherResult>;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const abortableSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

interface CreateWeatherServiceOptions {
  fetchWithTimeout: FetchWithTimeout;
  apiKey: string;
  baseUrl: string;
  maxRetries?: number;
  backoffBaseMs?: number;
  sleep?: Sleep;
  log?: Logger;
}

const describeQuery = (query: LocationQuery): string =>
  query.kind === 'coordinates' ? `lat=${query.lat}, lon=${query.lon}` : `'${query.name}'`;

const classifyAttemptError = (error: unknown, signal: AbortSignal | undefined): WeatherServiceError => {
  if (error instanceof WeatherServiceError) {
    return error;
  }
  if (signal?.aborted) {
    return new WeatherServiceError('cancelled', 'Weather check was cancelled', { cause: error });
  }
  if (error instanceof FetchTimeoutError) {
    return new WeatherServiceError('timeout', 'Weather API request timed out', { cause: error });
  }
  return new WeatherServiceError('provider_error', 'Unable to connect to weather API', { cause: error });
};

const cancelledFailure = (): WeatherResult => ({
  ok: false,
  error: { kind: 'cancelled', message: 'Weather check was cancelled' },
});

export const createWeatherService = ({
  fetchWithTimeout,
  apiKey,
  baseUrl,
  maxRetries = 3,
  backoffBaseMs = 1000,
  sleep = abortableSleep,
  log = defaultLogger,
}: CreateWeatherServiceOptions): WeatherService => {
  const attempts = Math.max(1, Math.floor(maxRetries));

  const fetchOnce = async (location: string, query: LocationQuery, signal: AbortSignal | undefined): Promise<WeatherObservation> => {
    const params = new URLSearchParams({
      ...locationQueryParams(query),
      appid: apiKey,
      units: 'metric',
      lang: 'en',
    });
    const readObservation = async (response: Response): Promise<WeatherObservation> => {
      if (!response.ok) {
        // Release the pooled connection before giving up on this response.
        await response.body?.cancel();
        if (response.status === 404) {
          throw new WeatherServiceError(
            'not_found',
            `Location '${location}' not found. Please check spelling or try coordinates (lat,lon)`,
          );
        }
        throw new WeatherServiceError('provider_error', `Weather API returned status ${response.status}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new WeatherServiceError('provider_error', 'Weather API returned a body that is not JSON', { cause: error });
      }

      const parsed = openWeatherCurrentSchema.safeParse(body);
      if (!parsed.success) {
        log.error('Failed to parse weather API response', { issues: parsed.error.issues.map((issue) => issue.path.join('.')) });
        throw new WeatherServiceError('provider_error', 'Unable to parse weather data: unexpected API response format');
      }
      return toWeatherObservation(parsed.data);
    };

    return fetchWithTimeout(`${baseUrl}/weather?${params.toString()}`, readObservation, {
      headers: DEFAULT_FETCH_HEADERS,
      signal,
    });
  };

  const getWeather = async (location: string, { signal }: GetWeatherOptions = {}): Promise<WeatherResult> => {
    const query = parseLocationQuery(location);
    log.info(`Fetching weather for location: ${location}`);
    log.debug(`Resolved location query: ${describeQuery(query)}`);

    for (let attempt = 0; attempt < attempts; attempt += 1) {
      if (signal?.aborted) {
        return cancelledFailure();
      }
      try {
        const observation = await fetchOnce(location, query, signal);
        log.info(`Weather fetched successfully for ${location} (attempt ${attempt + 1}/${attempts})`);
        return { ok: true, observation };
      } catch (rawError) {
        const error = classifyAttemptError(rawError, signal);
        if (!isRetryableErrorKind(error.kind)) {
          if (error.kind === 'cancelled') {
            log.info(`Weather check for ${location} cancelled`);
          } else {
            log.error(`Weather lookup failed for ${location}: ${error.message}`);
          }
          return { ok: false, error: { kind: error.kind, message: error.message } };
        }

        log.warn(`Attempt ${attempt + 1}/${attempts} failed for ${location}: ${error.message}`);
        if (attempt < attempts - 1) {
          const waitMs = backoffBaseMs * 2 ** attempt;
          log.info(`Retrying in ${waitMs}ms...`);
          try {
            await sleep(waitMs, signal);
          } catch (sleepError) {
            if (signal?.aborted) {
              return cancelledFailure();
            }
            throw sleepError;
          }
        }
      }
    }

    log.error(`All ${attempts} attempts failed for ${location}`);
    return {
      ok: false,
      error: {
        kind: 'provider_error',
        message: `Unable to fetch weather data after ${attempts} attempts. Please try again later or check alternative sources.`,
      },
    };
  };

  return { getWeather };
};
