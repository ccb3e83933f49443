import { z } from 'zod';

export interface WeatherObservation {
  readonly temperature: number;
  readonly feelsLike: number;
  readonly humidity: number;
  readonly windSpeed: number;
  readonly windDirection: number;
  readonly condition: string;
  readonly cloudCoverage: number;
  /** Meters. `null` when the provider omits it, which is not the same as zero visibility. */
  readonly visibility: number | null;
  readonly pressure: number;
}

// OpenWeather "current weather" body; only the fields the advisor reads.
export const openWeatherCurrentSchema = z.object({
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number().min(0).max(100),
    pressure: z.number(),
  }),
  wind: z.object({
    speed: z.number().min(0),
    deg: z.number().min(0).max(360).nullish(),
  }),
  weather: z.array(z.object({ description: z.string() })).min(1),
  clouds: z.object({
    all: z.number().min(0).max(100),
  }),
  visibility: z.number().min(0).nullish(),
});

export type OpenWeatherCurrentPayload = z.infer<typeof openWeatherCurrentSchema>;

export const toWeatherObservation = (payload: OpenWeatherCurrentPayload): WeatherObservation =>
  Object.freeze({
    temperature: payload.main.temp,
    feelsLike: payload.main.feels_like,
    humidity: payload.main.humidity,
    windSpeed: payload.wind.speed,
    windDirection: payload.wind.deg ?? 0,
    condition: payload.weather[0].description,
    cloudCoverage: payload.clouds.all,
    visibility: payload.visibility ?? null,
    pressure: payload.main.pressure,
  });

/** Wire shape returned to API callers. */
export interface WeatherPayload {
  temperature: number;
  feels_like: number;
  humidity: number;
  wind_speed: number;
  wind_direction: number;
  weather_condition: string;
  cloud_coverage: number;
  visibility: number | null;
  pressure: number;
}

export const toWeatherPayload = (observation: WeatherObservation): WeatherPayload => ({
  temperature: observation.temperature,
  feels_like: observation.feelsLike,
  humidity: observation.humidity,
  wind_speed: observation.windSpeed,
  wind_direction: observation.windDirection,
  weather_condition: observation.condition,
  cloud_coverage: observation.cloudCoverage,
  visibility: observation.visibility,
  pressure: observation.pressure,
});
