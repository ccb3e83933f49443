import { FetchWithTimeout, ReadResponse } from '../src/utils/http-client.js';
import { Logger } from '../src/utils/logger.js';
import { WeatherObservation } from '../src/utils/weather.js';

export const makeObservation = (overrides: Partial<WeatherObservation> = {}): WeatherObservation => ({
  temperature: 28.5,
  feelsLike: 30.2,
  humidity: 75,
  windSpeed: 3.5,
  windDirection: 180,
  condition: 'clear sky',
  cloudCoverage: 20,
  visibility: 10000,
  pressure: 1013,
  ...overrides,
});

export const openWeatherBody = () => ({
  coord: { lon: 80.27, lat: 13.08 },
  weather: [{ id: 800, main: 'Clear', description: 'clear sky', icon: '01d' }],
  main: { temp: 28.5, feels_like: 30.2, humidity: 75, pressure: 1013 },
  visibility: 10000,
  wind: { speed: 3.5, deg: 180 },
  clouds: { all: 20 },
  name: 'Chennai',
});

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

/** Fake fetch that plays back responses (or rejections) in order and records every URL it was asked for. */
export const queuedFetch = (steps: Array<Response | Error>) => {
  const urls: string[] = [];
  const fetchWithTimeout: FetchWithTimeout = async <T>(url: string, read: ReadResponse<T>): Promise<T> => {
    urls.push(url);
    const step = steps.shift();
    if (!step) {
      throw new Error(`Unexpected request to ${url}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    return read(step);
  };
  return { fetchWithTimeout, urls };
};

export const recordingSleep = () => {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { sleep, delays };
};

export const silentLogger = (): Logger => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
});

/** Response whose headers arrive but whose body sends a partial chunk and then stalls. */
export const stalledBodyResponse = () =>
  new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"main":'));
      },
    }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );

/** Response whose body records whether it was cancelled. */
export const trackedResponse = (body: string, status: number) => {
  const state = { cancelled: false };
  const response = new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode(body));
      },
      cancel() {
        state.cancelled = true;
      },
    }),
    { status },
  );
  return { response, state };
};
