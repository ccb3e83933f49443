export type WeatherErrorKind = 'not_found' | 'timeout' | 'provider_error' | 'unknown' | 'cancelled';

export interface WeatherFailure {
  kind: WeatherErrorKind;
  message: string;
}

/**
 * Classified failure of a single provider call. The retry loop decides
 * from `kind` whether another attempt is worth making.
 */
export class WeatherServiceError extends Error {
  readonly kind: WeatherErrorKind;

  constructor(kind: WeatherErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WeatherServiceError';
    this.kind = kind;
  }
}

export const isRetryableErrorKind = (kind: WeatherErrorKind): boolean => kind === 'timeout' || kind === 'provider_error';

const HTTP_STATUS_BY_KIND: Record<WeatherErrorKind, number> = {
  not_found: 404,
  timeout: 503,
  provider_error: 503,
  cancelled: 499,
  unknown: 500,
};

export const httpStatusForErrorKind = (kind: WeatherErrorKind): number => HTTP_STATUS_BY_KIND[kind];
