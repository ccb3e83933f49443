import { PipelineStage, runFishingSafetyCheck } from '../src/utils/fishing-pipeline.js';
import { WeatherResult, WeatherService } from '../src/utils/weather-service.js';
import { makeObservation, silentLogger } from './helpers.js';

const serviceReturning = (result: WeatherResult): WeatherService => ({
  getWeather: jest.fn(async () => result),
});

const run = (weatherService: WeatherService, location = 'Chennai') => {
  const stages: PipelineStage[] = [];
  const pending = runFishingSafetyCheck({
    location,
    checkDate: '2026-03-01',
    weatherService,
    onStage: (stage) => stages.push(stage),
    log: silentLogger(),
  });
  return { pending, stages };
};

describe('runFishingSafetyCheck', () => {
  test('calm conditions flow through every stage to a safe recommendation', async () => {
    const observation = makeObservation();
    const { pending, stages } = run(serviceReturning({ ok: true, observation }));

    const result = await pending;

    expect(stages).toEqual(['fetching', 'classifying', 'recommending', 'done']);
    if (result.status !== 'done') {
      throw new Error(`expected done, got ${result.status}`);
    }
    expect(result.observation).toBe(observation);
    expect(result.assessment).toEqual({ riskFactors: [], riskLevel: 'low' });
    expect(result.recommendation.safeToFish).toBe(true);
    expect(result.recommendation.bestFishingHours).toBe('05:00–09:00 or 16:00–18:00');
    expect(result.recommendation.precautions).toHaveLength(5);
    expect(result.location).toBe('Chennai');
    expect(result.checkDate).toBe('2026-03-01');
  });

  test('stormy conditions produce an unsafe high risk recommendation', async () => {
    const observation = makeObservation({ windSpeed: 12, visibility: 500, condition: 'heavy rain' });
    const { pending } = run(serviceReturning({ ok: true, observation }));

    const result = await pending;

    expect(result.status).toBe('done');
    expect(result.recommendation.riskLevel).toBe('high');
    expect(result.recommendation.riskFactors).toEqual(['high_wind', 'poor_visibility', 'bad_weather']);
    expect(result.recommendation.precautions).toHaveLength(6);
  });

  test('a fetch failure skips classification and returns the unknown recommendation', async () => {
    const { pending, stages } = run(
      serviceReturning({ ok: false, error: { kind: 'not_found', message: "Location 'Atlantis' not found" } }),
      'Atlantis',
    );

    const result = await pending;

    expect(stages).toEqual(['fetching', 'failed']);
    expect(result).toEqual({
      status: 'failed',
      location: 'Atlantis',
      checkDate: '2026-03-01',
      error: { kind: 'not_found', message: "Location 'Atlantis' not found" },
      recommendation: {
        safeToFish: false,
        riskLevel: 'unknown',
        recommendation: "Unable to provide fishing recommendation due to error: Location 'Atlantis' not found",
        riskFactors: [],
        bestFishingHours: null,
        precautions: [],
      },
    });
  });

  test('an exception from the weather service becomes an unknown failure', async () => {
    const weatherService: WeatherService = {
      getWeather: jest.fn(async (): Promise<WeatherResult> => {
        throw new Error('socket exploded');
      }),
    };
    const { pending, stages } = run(weatherService);

    const result = await pending;

    expect(stages).toEqual(['fetching', 'failed']);
    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.error).toEqual({ kind: 'unknown', message: 'An unexpected error occurred while fetching weather' });
    }
    expect(result.recommendation.recommendation).toBe(
      'Unable to provide fishing recommendation due to error: An unexpected error occurred while fetching weather',
    );
  });

  test('the abort signal is handed to the weather service', async () => {
    const getWeather = jest.fn(async (): Promise<WeatherResult> => ({ ok: true, observation: makeObservation() }));
    const controller = new AbortController();

    await runFishingSafetyCheck({
      location: 'Chennai',
      checkDate: '2026-03-01',
      weatherService: { getWeather },
      signal: controller.signal,
      log: silentLogger(),
    });

    expect(getWeather).toHaveBeenCalledWith('Chennai', { signal: controller.signal });
  });

  test('separate runs share no state', async () => {
    const weatherService = serviceReturning({ ok: true, observation: makeObservation({ humidity: 95 }) });

    const first = await run(weatherService).pending;
    const second = await run(weatherService).pending;

    expect(second).toEqual(first);
    expect(second.recommendation).not.toBe(first.recommendation);
  });
});
