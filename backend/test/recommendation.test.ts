import { buildFishingRecommendation, toFishingAdvicePayload } from '../src/utils/recommendation.js';
import { RiskAssessment, UNKNOWN_RISK_ASSESSMENT, classifyRisk } from '../src/utils/risk.js';
import { makeObservation, silentLogger } from './helpers.js';

const LOW_PRECAUTIONS = [
  'Carry sufficient drinking water',
  'Apply sunscreen (SPF 30+)',
  'Wear life jackets',
  'Bring first aid kit',
  'Keep emergency contacts handy',
];

const HIGH_PRECAUTIONS = [
  'Do NOT go fishing in these conditions',
  'Wait for weather to improve',
  'Check weather again in 6-12 hours',
  'Listen to local fisheries department advisories',
];

const MEDIUM_PRECAUTIONS = [
  "Only if you're experienced",
  'Ensure all safety equipment onboard',
  'Stay close to shore',
  'Monitor weather updates continuously',
  'Have communication equipment ready',
  'Inform family/authorities of your trip',
];

const recommend = (overrides: Parameters<typeof makeObservation>[0] = {}) => {
  const observation = makeObservation(overrides);
  const assessment = classifyRisk(observation, silentLogger());
  return buildFishingRecommendation({ location: 'Chennai', observation, assessment, log: silentLogger() });
};

describe('buildFishingRecommendation', () => {
  test('low risk is safe with the full morning and evening window', () => {
    expect(recommend()).toEqual({
      safeToFish: true,
      riskLevel: 'low',
      recommendation: '✅ GOOD conditions for fishing in Chennai! Temperature: 28.5°C, Wind: 3.5 m/s. Enjoy your fishing trip!',
      riskFactors: [],
      bestFishingHours: '05:00–09:00 or 16:00–18:00',
      precautions: LOW_PRECAUTIONS,
    });
  });

  test('high risk is unsafe, has no window, and appends mapped factor precautions', () => {
    const recommendation = recommend({ windSpeed: 12, visibility: 500, condition: 'heavy rain' });
    expect(recommendation.safeToFish).toBe(false);
    expect(recommendation.riskLevel).toBe('high');
    expect(recommendation.recommendation).toBe(
      '⚠️ NOT SAFE for fishing in Chennai. High risk conditions detected. Please postpone your trip.',
    );
    expect(recommendation.riskFactors).toEqual(['high_wind', 'poor_visibility', 'bad_weather']);
    expect(recommendation.bestFishingHours).toBeNull();
    expect(recommendation.precautions).toEqual([
      ...HIGH_PRECAUTIONS,
      'Strong winds - avoid deep sea fishing',
      'Poor visibility - use fog horn and navigation lights',
    ]);
  });

  test('medium risk is treated as unsafe with the early morning window', () => {
    const recommendation = recommend({ windSpeed: 7, temperature: 10 });
    expect(recommendation.safeToFish).toBe(false);
    expect(recommendation.riskLevel).toBe('medium');
    expect(recommendation.recommendation).toBe(
      '⚠️ CAUTION advised for fishing in Chennai. Moderate risk conditions. Only experienced fishermen with proper safety equipment should proceed.',
    );
    expect(recommendation.bestFishingHours).toBe('05:00–08:00');
    expect(recommendation.precautions).toEqual([
      ...MEDIUM_PRECAUTIONS,
      'Moderate winds - stay alert',
      'Cold weather - wear warm clothing',
    ]);
  });

  test('a single minor factor keeps low advice and adds its precaution without dedup', () => {
    const recommendation = recommend({ temperature: 39 });
    expect(recommendation.safeToFish).toBe(true);
    expect(recommendation.precautions).toEqual([...LOW_PRECAUTIONS, 'Extreme heat - take frequent breaks, stay hydrated']);
  });

  test('precaution count is base count plus mapped factors in evaluation order', () => {
    const recommendation = recommend({ windSpeed: 6, temperature: 12, humidity: 90 });
    expect(recommendation.riskLevel).toBe('medium');
    expect(recommendation.precautions).toHaveLength(MEDIUM_PRECAUTIONS.length + 3);
    expect(recommendation.precautions.slice(-3)).toEqual([
      'Moderate winds - stay alert',
      'Cold weather - wear warm clothing',
      'High humidity - ensure good ventilation on boat',
    ]);
  });

  test('unknown risk explains the failure and offers nothing else', () => {
    const recommendation = buildFishingRecommendation({
      location: 'Atlantis',
      observation: null,
      assessment: UNKNOWN_RISK_ASSESSMENT,
      failureMessage: 'Weather API request timed out',
      log: silentLogger(),
    });
    expect(recommendation).toEqual({
      safeToFish: false,
      riskLevel: 'unknown',
      recommendation: 'Unable to provide fishing recommendation due to error: Weather API request timed out',
      riskFactors: [],
      bestFishingHours: null,
      precautions: [],
    });
  });

  test('the assessment passed in is not modified', () => {
    const assessment: RiskAssessment = { riskFactors: ['high_wind'], riskLevel: 'high' };
    buildFishingRecommendation({ location: 'Chennai', observation: makeObservation({ windSpeed: 11 }), assessment, log: silentLogger() });
    expect(assessment).toEqual({ riskFactors: ['high_wind'], riskLevel: 'high' });
  });
});

describe('toFishingAdvicePayload', () => {
  test('renames fields for the API response', () => {
    expect(toFishingAdvicePayload(recommend({ humidity: 90 }))).toEqual({
      safe_to_fish: true,
      risk_level: 'low',
      recommendation: '✅ GOOD conditions for fishing in Chennai! Temperature: 28.5°C, Wind: 3.5 m/s. Enjoy your fishing trip!',
      risk_factors: ['high_humidity'],
      best_fishing_hours: '05:00–09:00 or 16:00–18:00',
      precautions: [...LOW_PRECAUTIONS, 'High humidity - ensure good ventilation on boat'],
    });
  });
});
