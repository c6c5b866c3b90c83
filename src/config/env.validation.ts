// src/config/env.validation.ts

import { Transform, TransformFnParams, plainToInstance } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';
import { flattenValidationErrors } from '../common/utils/payload-validator.util';

export const DEFAULT_GEOCODING_API_URL = 'https://geocoding-api.open-meteo.com/v1';
export const DEFAULT_FORECAST_API_URL = 'https://api.open-meteo.com/v1';
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 10000;
export const DEFAULT_WEATHER_QUERY_DEADLINE_MS = 15000;

// reads the raw value: implicit conversion has already turned 'false' into true by now
const toBoolean = ({ obj, key }: TransformFnParams): boolean => {
  const raw: unknown = obj[key];
  return raw === true || raw === 'true' || raw === '1';
};

/**
 * Environment variables recognised by the service, with their defaults.
 */
export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  // unset: pg falls back to PGHOST / PGUSER / ...
  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsInt()
  @Min(1)
  DATABASE_POOL_SIZE: number = 10;

  /** Keep running when PostgreSQL is unreachable at start-up (every lookup then fails). */
  @Transform(toBoolean)
  @IsBoolean()
  ALLOW_NO_DATABASE: boolean = false;

  @IsUrl({ require_tld: false })
  GEOCODING_API_URL: string = DEFAULT_GEOCODING_API_URL;

  @IsUrl({ require_tld: false })
  FORECAST_API_URL: string = DEFAULT_FORECAST_API_URL;

  /** Per-request timeout for each upstream call */
  @IsInt()
  @Min(1)
  UPSTREAM_TIMEOUT_MS: number = DEFAULT_UPSTREAM_TIMEOUT_MS;

  /** Total budget for one name -> forecast query */
  @IsInt()
  @Min(1)
  WEATHER_QUERY_DEADLINE_MS: number = DEFAULT_WEATHER_QUERY_DEADLINE_MS;

  /**
   * Treat a failed cache lookup as a miss and go to the geocoder instead of
   * failing with STORE_READ_ERROR.
   */
  @Transform(toBoolean)
  @IsBoolean()
  LOCATION_CACHE_READ_ERROR_AS_MISS: boolean = false;
}

/**
 * `validate` hook for ConfigModule.forRoot
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(`Invalid environment configuration: ${flattenValidationErrors(errors).join('; ')}`);
  }
  return validated;
}
