import { WeatherFailure } from './errors.js';
import { Logger, logger as defaultLogger } from './logger.js';
import { FishingRecommendation, buildFishingRecommendation } from './recommendation.js';
import { RiskAssessment, UNKNOWN_RISK_ASSESSMENT, classifyRisk } from './risk.js';
import { WeatherObservation } from './weather.js';
import { WeatherResult, WeatherService } from './weather-service.js';

export type PipelineStage = 'fetching' | 'classifying' | 'recommending' | 'done' | 'failed';

interface PipelineContext {
  location: string;
  checkDate: string;
}

export type FishingSafetyResult =
  | (PipelineContext & {
      status: 'done';
      observation: WeatherObservation;
      assessment: RiskAssessment;
      recommendation: FishingRecommendation;
    })
  | (PipelineContext & {
      status: 'failed';
      error: WeatherFailure;
      recommendation: FishingRecommendation;
    });

interface RunFishingSafetyCheckOptions {
  location: string;
  checkDate: string;
  weatherService: WeatherService;
  signal?: AbortSignal;
  onStage?: (stage: PipelineStage) => void;
  log?: Logger;
}

const UNEXPECTED_FETCH_MESSAGE = 'An unexpected error occurred while fetching weather';

/**
 * Fetch, classify, recommend. A failed fetch skips the remaining stages and
 * yields the `unknown` recommendation carrying the failure message.
 */
export const runFishingSafetyCheck = async ({
  location,
  checkDate,
  weatherService,
  signal,
  onStage,
  log = defaultLogger,
}: RunFishingSafetyCheckOptions): Promise<FishingSafetyResult> => {
  const enter = (stage: PipelineStage) => {
    log.debug(`Pipeline stage: ${stage}`, { location });
    onStage?.(stage);
  };

  log.info(`Running weather check for ${location} on ${checkDate}`);
  enter('fetching');

  let fetched: WeatherResult;
  try {
    fetched = await weatherService.getWeather(location, { signal });
  } catch (unexpected) {
    log.error('Unexpected error while fetching weather', { error: unexpected instanceof Error ? unexpected.stack : String(unexpected) });
    fetched = { ok: false, error: { kind: 'unknown', message: UNEXPECTED_FETCH_MESSAGE } };
  }

  if (fetched.ok) {
    const { observation } = fetched;
    log.info(`Weather fetched successfully: ${observation.temperature}°C, ${observation.windSpeed} m/s`);

    enter('classifying');
    const assessment = classifyRisk(observation, log);

    enter('recommending');
    const recommendation = buildFishingRecommendation({ location, observation, assessment, log });

    enter('done');
    return { status: 'done', location, checkDate, observation, assessment, recommendation };
  }

  const { error } = fetched;
  log.error(`Weather check failed for ${location}: ${error.message}`, { kind: error.kind });
  enter('failed');
  const recommendation = buildFishingRecommendation({
    location,
    observation: null,
    assessment: UNKNOWN_RISK_ASSESSMENT,
    failureMessage: error.message,
    log,
  });
  return { status: 'failed', location, checkDate, error, recommendation };
};
