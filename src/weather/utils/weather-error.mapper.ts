// src/weather/utils/weather-error.mapper.ts
import { HttpStatus } from '@nestjs/common';
import { ErrorCode } from '../../common/dto/standard-response.dto';
import { WeatherError, WeatherErrorKind } from '../../common/errors/weather.errors';

export interface MappedWeatherError {
  status: HttpStatus;
  code: ErrorCode;
}

const ERROR_MAP: Record<WeatherErrorKind, MappedWeatherError> = {
  [WeatherErrorKind.NOT_FOUND]: { status: HttpStatus.NOT_FOUND, code: ErrorCode.NOT_FOUND },
  [WeatherErrorKind.UPSTREAM_UNAVAILABLE]: { status: HttpStatus.BAD_GATEWAY, code: ErrorCode.PROVIDER_ERROR },
  [WeatherErrorKind.UPSTREAM_READ_ERROR]: { status: HttpStatus.BAD_GATEWAY, code: ErrorCode.PROVIDER_ERROR },
  [WeatherErrorKind.MALFORMED_RESPONSE]: { status: HttpStatus.BAD_GATEWAY, code: ErrorCode.PROVIDER_ERROR },
  [WeatherErrorKind.TIME_PARSE_ERROR]: { status: HttpStatus.BAD_GATEWAY, code: ErrorCode.PROVIDER_ERROR },
  [WeatherErrorKind.STORE_READ_ERROR]: { status: HttpStatus.INTERNAL_SERVER_ERROR, code: ErrorCode.STORAGE_ERROR },
  [WeatherErrorKind.STORE_WRITE_ERROR]: { status: HttpStatus.INTERNAL_SERVER_ERROR, code: ErrorCode.STORAGE_ERROR },
  [WeatherErrorKind.DEADLINE_EXCEEDED]: { status: HttpStatus.GATEWAY_TIMEOUT, code: ErrorCode.TIMEOUT },
};

/**
 * HTTP status and envelope code for a core failure
 */
export function mapWeatherError(error: WeatherError): MappedWeatherError {
  return ERROR_MAP[error.kind];
}
