// src/common/errors/weather.errors.ts

/**
 * Failure kinds raised by the location resolver and the forecast pipeline.
 *
 * Every error thrown by the core is a `WeatherError` subclass, so callers can
 * branch on `instanceof` or on the `kind` discriminant.
 */
export enum WeatherErrorKind {
  NOT_FOUND = 'NOT_FOUND',
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
  UPSTREAM_READ_ERROR = 'UPSTREAM_READ_ERROR',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  TIME_PARSE_ERROR = 'TIME_PARSE_ERROR',
  STORE_READ_ERROR = 'STORE_READ_ERROR',
  STORE_WRITE_ERROR = 'STORE_WRITE_ERROR',
  DEADLINE_EXCEEDED = 'DEADLINE_EXCEEDED',
}

export interface WeatherErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export abstract class WeatherError extends Error {
  abstract readonly kind: WeatherErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options: WeatherErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details;
  }
}

/** The geocoder returned no candidates for the name. */
export class LocationNotFoundError extends WeatherError {
  readonly kind = WeatherErrorKind.NOT_FOUND;
}

/** Transport-level failure, timeout or non-2xx status from an upstream API. */
export class UpstreamUnavailableError extends WeatherError {
  readonly kind = WeatherErrorKind.UPSTREAM_UNAVAILABLE;
}

/** The upstream answered but its body could not be read. */
export class UpstreamReadError extends WeatherError {
  readonly kind = WeatherErrorKind.UPSTREAM_READ_ERROR;
}

export class MalformedResponseError extends WeatherError {
  readonly kind = WeatherErrorKind.MALFORMED_RESPONSE;
}

export class TimeParseError extends WeatherError {
  readonly kind = WeatherErrorKind.TIME_PARSE_ERROR;
}

export class StoreReadError extends WeatherError {
  readonly kind = WeatherErrorKind.STORE_READ_ERROR;
}

/** Write-back after a successful geocode failed; the coordinate is discarded. */
export class StoreWriteError extends WeatherError {
  readonly kind = WeatherErrorKind.STORE_WRITE_ERROR;
}

export class DeadlineExceededError extends WeatherError {
  readonly kind = WeatherErrorKind.DEADLINE_EXCEEDED;
}

/**
 * Message of anything that was thrown.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
