// src/common/adapters/base-http.adapter.ts

import { Logger } from '@nestjs/common';
import { AxiosError, AxiosInstance, isAxiosError } from 'axios';
import {
  UpstreamReadError,
  UpstreamUnavailableError,
  WeatherError,
  extractErrorMessage,
} from '../errors/weather.errors';

/**
 * Base class for upstream API adapters
 *
 * Provides:
 * - an injected axios client
 * - translation of axios failures into the weather error taxonomy
 * - logging
 */
export abstract class BaseHttpAdapter {
  protected readonly logger: Logger;

  constructor(
    adapterName: string,
    protected readonly httpClient: AxiosInstance
  ) {
    this.logger = new Logger(adapterName);
  }

  /**
   * Runs an upstream request; anything that is not already a `WeatherError`
   * is rethrown as `UpstreamUnavailableError` (no usable response) or
   * `UpstreamReadError` (success status, body lost).
   */
  protected async request<T>(errorContext: string, requestFn: () => Promise<T>): Promise<T> {
    try {
      return await requestFn();
    } catch (error) {
      if (error instanceof WeatherError) {
        throw error;
      }
      const mapped = this.toUpstreamError(errorContext, error);
      this.logger.warn(mapped.message);
      throw mapped;
    }
  }

  private toUpstreamError(errorContext: string, error: unknown): WeatherError {
    if (isAxiosError(error)) {
      const status = error.response?.status;
      if (status !== undefined && (status < 200 || status >= 300)) {
        return new UpstreamUnavailableError(`${errorContext}: upstream answered HTTP ${status}`, {
          cause: error,
          details: { status },
        });
      }
      // 2xx headers already arrived, or the body could not be decoded: the read itself failed
      if (status !== undefined || error.code === AxiosError.ERR_BAD_RESPONSE) {
        return new UpstreamReadError(`${errorContext}: ${error.message}`, {
          cause: error,
          details: status !== undefined ? { status } : undefined,
        });
      }
      return new UpstreamUnavailableError(`${errorContext}: ${error.message}`, {
        cause: error,
        details: error.code ? { code: error.code } : undefined,
      });
    }
    return new UpstreamUnavailableError(`${errorContext}: ${extractErrorMessage(error)}`, {
      cause: error,
    });
  }
}
