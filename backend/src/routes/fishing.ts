import { Express, Request, Response } from 'express';
import { z } from 'zod';
import { httpStatusForErrorKind } from '../utils/errors.js';
import { runFishingSafetyCheck } from '../utils/fishing-pipeline.js';
import { logger } from '../utils/logger.js';
import { toFishingAdvicePayload } from '../utils/recommendation.js';
import { daysBetweenIsoDates, formatIsoDateUtc, shiftIsoDateUtc } from '../utils/time.js';
import { toWeatherPayload } from '../utils/weather.js';
import { WeatherService } from '../utils/weather-service.js';

export const MAX_DAYS_IN_PAST = 30;
export const MAX_DAYS_AHEAD = 7;

const DISALLOWED_LOCATION_FRAGMENTS = ['<', '>', ';', '--', '/*', '*/', 'DROP', 'DELETE'];

export const createWeatherCheckRequestSchema = (now: () => Date) =>
  z.object({
    location: z
      .string({ required_error: 'location is required' })
      .trim()
      .min(2, 'location must be between 2 and 100 characters')
      .max(100, 'location must be between 2 and 100 characters')
      .refine((value) => !DISALLOWED_LOCATION_FRAGMENTS.some((fragment) => value.toUpperCase().includes(fragment)), {
        message: 'location contains invalid characters',
      }),
    check_date: z
      .string({ required_error: 'check_date is required' })
      .trim()
      .superRefine((value, ctx) => {
        const today = formatIsoDateUtc(now()) ?? '';
        const offsetDays = daysBetweenIsoDates(today, value);
        if (offsetDays === null) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'check_date must be a valid date in YYYY-MM-DD format' });
          return;
        }
        if (offsetDays < -MAX_DAYS_IN_PAST) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Date too far in past (max ${MAX_DAYS_IN_PAST} days, earliest ${shiftIsoDateUtc(today, -MAX_DAYS_IN_PAST)}). Requested: ${value}, Today: ${today}`,
          });
        } else if (offsetDays > MAX_DAYS_AHEAD) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Date too far in future (max ${MAX_DAYS_AHEAD} days, latest ${shiftIsoDateUtc(today, MAX_DAYS_AHEAD)}). Requested: ${value}, Today: ${today}`,
          });
        }
      }),
  });

interface RegisterFishingRoutesOptions {
  app: Express;
  weatherService: WeatherService;
  now?: () => Date;
}

export const registerFishingRoutes = ({ app, weatherService, now = () => new Date() }: RegisterFishingRoutesOptions) => {
  const requestSchema = createWeatherCheckRequestSchema(now);

  app.post('/api/v1/weather/check', async (req: Request, res: Response) => {
    const parsed = requestSchema.safeParse(req.body);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => ({ field: issue.path.join('.'), issue: issue.message }));
      logger.warn('Rejected weather check request', { details });
      res.status(400).json({
        error: 'validation_error',
        message: details[0]?.issue ?? 'Invalid request',
        details,
      });
      return;
    }

    const { location, check_date: checkDate } = parsed.data;
    logger.info(`Weather check request: location=${location}, date=${checkDate}`);

    const controller = new AbortController();
    const abortOnDisconnect = () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    };
    res.on('close', abortOnDisconnect);

    try {
      const result = await runFishingSafetyCheck({ location, checkDate, weatherService, signal: controller.signal });
      if (controller.signal.aborted) {
        logger.info(`Client disconnected before weather check for ${location} completed`);
        return;
      }

      const checkedAt = now().toISOString();
      const fishingAdvice = toFishingAdvicePayload(result.recommendation);

      if (result.status === 'failed') {
        res.status(httpStatusForErrorKind(result.error.kind)).json({
          error: result.error.kind,
          message: result.error.message,
          location,
          check_date: checkDate,
          checked_at: checkedAt,
          weather: null,
          fishing_advice: fishingAdvice,
        });
        return;
      }

      logger.info(
        `Weather check successful: location=${location}, safe=${fishingAdvice.safe_to_fish}, risk=${fishingAdvice.risk_level}`,
      );
      res.json({
        location,
        check_date: checkDate,
        checked_at: checkedAt,
        weather: toWeatherPayload(result.observation),
        fishing_advice: fishingAdvice,
      });
    } catch (error) {
      logger.error('Unexpected error in weather check', { error: error instanceof Error ? error.stack : String(error) });
      if (res.headersSent) {
        return;
      }
      res.status(500).json({
        error: 'internal_error',
        message: 'An unexpected error occurred. Please try again later.',
      });
    } finally {
      res.off('close', abortOnDisconnect);
    }
  });
};
