// src/forecast/services/forecast-client.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { BaseHttpAdapter } from '../../common/adapters/base-http.adapter';
import { UpstreamReadError } from '../../common/errors/weather.errors';
import { Coordinate } from '../../locations/interfaces/location.interface';
import { FORECAST_HTTP_CLIENT, HOURLY_VARIABLE } from '../forecast.constants';

/**
 * Open-Meteo forecast adapter
 *
 * API docs: https://open-meteo.com/en/docs
 */
@Injectable()
export class ForecastClientService extends BaseHttpAdapter {
  constructor(@Inject(FORECAST_HTTP_CLIENT) httpClient: AxiosInstance) {
    super(ForecastClientService.name, httpClient);
  }

  /**
   * Fetches the hourly 2 m temperature series for a point.
   *
   * @returns the response body, unparsed
   * @throws UpstreamUnavailableError | UpstreamReadError
   */
  async fetchForecast(coordinate: Coordinate, signal?: AbortSignal): Promise<string> {
    const latitude = coordinate.latitude.toFixed(6);
    const longitude = coordinate.longitude.toFixed(6);

    const body = await this.request(`Forecast request for ${latitude},${longitude} failed`, async () => {
      const response = await this.httpClient.get<unknown>('/forecast', {
        params: {
          latitude,
          longitude,
          hourly: HOURLY_VARIABLE,
        },
        // keep the body as text, parsing belongs to the transformer
        responseType: 'text',
        signal,
      });
      return response.data;
    });

    if (typeof body !== 'string') {
      throw new UpstreamReadError(`Forecast body for ${latitude},${longitude} is not text`);
    }

    this.logger.debug(`Forecast for ${latitude},${longitude}: ${body.length} bytes`);
    return body;
  }
}
