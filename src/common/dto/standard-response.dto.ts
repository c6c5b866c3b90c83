// src/common/dto/standard-response.dto.ts

/**
 * Response envelope shared by every endpoint.
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ErrorResponse;
}

export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export function successResponse<T>(data: T): StandardResponse<T> {
  return {
    success: true,
    data,
  };
}

export function errorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): StandardResponse<never> {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

/**
 * Error codes exposed to clients
 */
export enum ErrorCode {
  // request validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // the place name could not be geocoded
  NOT_FOUND = 'NOT_FOUND',

  // geocoding / forecast upstream failed or answered with garbage
  PROVIDER_ERROR = 'PROVIDER_ERROR',

  // the location cache could not be read or written
  STORAGE_ERROR = 'STORAGE_ERROR',

  // the query ran past its deadline
  TIMEOUT = 'TIMEOUT',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
