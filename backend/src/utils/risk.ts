import { Logger, logger as defaultLogger } from './logger.js';
import { WeatherObservation } from './weather.js';

export type RiskFactor =
  | 'high_wind'
  | 'moderate_wind'
  | 'poor_visibility'
  | 'bad_weather'
  | 'cold_temperature'
  | 'extreme_heat'
  | 'high_humidity';

export type RiskLevel = 'low' | 'medium' | 'high' | 'unknown';

export interface RiskAssessment {
  readonly riskFactors: readonly RiskFactor[];
  readonly riskLevel: RiskLevel;
}

export const HIGH_WIND_MS = 10;
export const MODERATE_WIND_MS = 5;
export const POOR_VISIBILITY_M = 1000;
export const COLD_TEMPERATURE_C = 15;
export const EXTREME_HEAT_C = 38;
export const HIGH_HUMIDITY_PCT = 85;

const BAD_WEATHER_KEYWORDS = ['rain', 'storm', 'thunderstorm'];
const MAJOR_RISK_FACTORS: ReadonlySet<RiskFactor> = new Set<RiskFactor>(['high_wind', 'bad_weather', 'poor_visibility']);

export const UNKNOWN_RISK_ASSESSMENT: RiskAssessment = Object.freeze({ riskFactors: Object.freeze([]), riskLevel: 'unknown' });

// Any major factor is high; otherwise two or more minor factors make it medium.
export const deriveRiskLevel = (riskFactors: readonly RiskFactor[]): RiskLevel => {
  if (riskFactors.some((factor) => MAJOR_RISK_FACTORS.has(factor))) {
    return 'high';
  }
  if (riskFactors.length >= 2) {
    return 'medium';
  }
  return 'low';
};

export const classifyRisk = (observation: WeatherObservation | null, log: Logger = defaultLogger): RiskAssessment => {
  if (!observation) {
    log.warn('Skipping risk analysis - no weather data');
    return UNKNOWN_RISK_ASSESSMENT;
  }

  const riskFactors: RiskFactor[] = [];
  const flag = (factor: RiskFactor, detail: string) => {
    riskFactors.push(factor);
    log.info(`Risk: ${factor} (${detail})`);
  };

  if (observation.windSpeed > HIGH_WIND_MS) {
    flag('high_wind', `${observation.windSpeed} m/s`);
  } else if (observation.windSpeed > MODERATE_WIND_MS) {
    flag('moderate_wind', `${observation.windSpeed} m/s`);
  }

  if (observation.visibility !== null && observation.visibility < POOR_VISIBILITY_M) {
    flag('poor_visibility', `${observation.visibility}m`);
  }

  const condition = observation.condition.toLowerCase();
  if (BAD_WEATHER_KEYWORDS.some((keyword) => condition.includes(keyword))) {
    flag('bad_weather', observation.condition);
  }

  if (observation.temperature < COLD_TEMPERATURE_C) {
    flag('cold_temperature', `${observation.temperature}°C`);
  } else if (observation.temperature > EXTREME_HEAT_C) {
    flag('extreme_heat', `${observation.temperature}°C`);
  }

  if (observation.humidity > HIGH_HUMIDITY_PCT) {
    flag('high_humidity', `${observation.humidity}%`);
  }

  const riskLevel = deriveRiskLevel(riskFactors);
  log.info(`Risk analysis complete: ${riskLevel} (${riskFactors.length} factors)`);

  return Object.freeze({ riskFactors: Object.freeze(riskFactors), riskLevel });
};
