import { Logger, logger as defaultLogger } from './logger.js';
import { RiskAssessment, RiskFactor, RiskLevel } from './risk.js';
import { WeatherObservation } from './weather.js';

export interface FishingRecommendation {
  readonly safeToFish: boolean;
  readonly riskLevel: RiskLevel;
  readonly recommendation: string;
  readonly riskFactors: readonly RiskFactor[];
  readonly bestFishingHours: string | null;
  readonly precautions: readonly string[];
}

interface TierAdvice {
  safeToFish: boolean;
  bestFishingHours: string | null;
  precautions: readonly string[];
}

const TIER_ADVICE: Record<Exclude<RiskLevel, 'unknown'>, TierAdvice> = {
  high: {
    safeToFish: false,
    bestFishingHours: null,
    precautions: [
      'Do NOT go fishing in these conditions',
      'Wait for weather to improve',
      'Check weather again in 6-12 hours',
      'Listen to local fisheries department advisories',
    ],
  },
  // Caution tier, still reported as unsafe.
  medium: {
    safeToFish: false,
    bestFishingHours: '05:00–08:00',
    precautions: [
      "Only if you're experienced",
      'Ensure all safety equipment onboard',
      'Stay close to shore',
      'Monitor weather updates continuously',
      'Have communication equipment ready',
      'Inform family/authorities of your trip',
    ],
  },
  low: {
    safeToFish: true,
    bestFishingHours: '05:00–09:00 or 16:00–18:00',
    precautions: [
      'Carry sufficient drinking water',
      'Apply sunscreen (SPF 30+)',
      'Wear life jackets',
      'Bring first aid kit',
      'Keep emergency contacts handy',
    ],
  },
};

// bad_weather is already covered by the tier's base advice.
export const FACTOR_PRECAUTIONS: Partial<Record<RiskFactor, string>> = {
  high_wind: 'Strong winds - avoid deep sea fishing',
  moderate_wind: 'Moderate winds - stay alert',
  poor_visibility: 'Poor visibility - use fog horn and navigation lights',
  cold_temperature: 'Cold weather - wear warm clothing',
  extreme_heat: 'Extreme heat - take frequent breaks, stay hydrated',
  high_humidity: 'High humidity - ensure good ventilation on boat',
};

const buildNarrative = (riskLevel: Exclude<RiskLevel, 'unknown'>, location: string, observation: WeatherObservation | null): string => {
  switch (riskLevel) {
    case 'high':
      return `⚠️ NOT SAFE for fishing in ${location}. High risk conditions detected. Please postpone your trip.`;
    case 'medium':
      return (
        `⚠️ CAUTION advised for fishing in ${location}. Moderate risk conditions. ` +
        'Only experienced fishermen with proper safety equipment should proceed.'
      );
    case 'low': {
      const conditions = observation
        ? `Temperature: ${observation.temperature}°C, Wind: ${observation.windSpeed} m/s. `
        : '';
      return `✅ GOOD conditions for fishing in ${location}! ${conditions}Enjoy your fishing trip!`;
    }
  }
};

interface BuildFishingRecommendationOptions {
  location: string;
  observation: WeatherObservation | null;
  assessment: RiskAssessment;
  /** Shown in the narrative when there is no observation to assess. */
  failureMessage?: string;
  log?: Logger;
}

export const buildFishingRecommendation = ({
  location,
  observation,
  assessment,
  failureMessage,
  log = defaultLogger,
}: BuildFishingRecommendationOptions): FishingRecommendation => {
  const { riskLevel, riskFactors } = assessment;

  if (riskLevel === 'unknown') {
    const reason = failureMessage || 'weather data unavailable';
    log.info('Recommendation generated: Safe=false, Risk=unknown');
    return Object.freeze({
      safeToFish: false,
      riskLevel,
      recommendation: `Unable to provide fishing recommendation due to error: ${reason}`,
      riskFactors: Object.freeze([]),
      bestFishingHours: null,
      precautions: Object.freeze([]),
    });
  }

  const advice = TIER_ADVICE[riskLevel];
  const factorPrecautions = riskFactors.flatMap((factor) => {
    const precaution = FACTOR_PRECAUTIONS[factor];
    return precaution ? [precaution] : [];
  });

  log.info(`Recommendation generated: Safe=${advice.safeToFish}, Risk=${riskLevel}`);

  return Object.freeze({
    safeToFish: advice.safeToFish,
    riskLevel,
    recommendation: buildNarrative(riskLevel, location, observation),
    riskFactors: Object.freeze([...riskFactors]),
    bestFishingHours: advice.bestFishingHours,
    precautions: Object.freeze([...advice.precautions, ...factorPrecautions]),
  });
};

/** Wire shape returned to API callers. */
export interface FishingAdvicePayload {
  safe_to_fish: boolean;
  risk_level: RiskLevel;
  recommendation: string;
  risk_factors: RiskFactor[];
  best_fishing_hours: string | null;
  precautions: string[];
}

export const toFishingAdvicePayload = (recommendation: FishingRecommendation): FishingAdvicePayload => ({
  safe_to_fish: recommendation.safeToFish,
  risk_level: recommendation.riskLevel,
  recommendation: recommendation.recommendation,
  risk_factors: [...recommendation.riskFactors],
  best_fishing_hours: recommendation.bestFishingHours,
  precautions: [...recommendation.precautions],
});
