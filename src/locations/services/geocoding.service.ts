// src/locations/services/geocoding.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { BaseHttpAdapter } from '../../common/adapters/base-http.adapter';
import { LocationNotFoundError } from '../../common/errors/weather.errors';
import { parsePayload } from '../../common/utils/payload-validator.util';
import { GeocodingResponseDto } from '../dto/geocoding-response.dto';
import { Coordinate } from '../interfaces/location.interface';
import { GEOCODING_HTTP_CLIENT } from '../locations.constants';

/**
 * Open-Meteo geocoding adapter
 *
 * API docs: https://open-meteo.com/en/docs/geocoding-api
 */
@Injectable()
export class GeocodingService extends BaseHttpAdapter {
  constructor(@Inject(GEOCODING_HTTP_CLIENT) httpClient: AxiosInstance) {
    super(GeocodingService.name, httpClient);
  }

  /**
   * Resolves a free-text place name to the upstream's best match.
   *
   * The first result is taken as-is; the upstream's relevance order is trusted.
   *
   * @throws LocationNotFoundError when the search has no candidates
   */
  async lookup(name: string, signal?: AbortSignal): Promise<Coordinate> {
    const body = await this.request(`Geocoding lookup for "${name}" failed`, async () => {
      const response = await this.httpClient.get<unknown>('/search', {
        params: {
          name,
          count: 1,
          language: 'en',
          format: 'json',
        },
        signal,
      });
      return response.data;
    });

    const payload = parsePayload(GeocodingResponseDto, body, 'Geocoding');
    const first = payload.results?.[0];
    if (!first) {
      throw new LocationNotFoundError(`No coordinates found for "${name}"`, {
        details: { name },
      });
    }

    this.logger.debug(`Geocoded "${name}" to ${first.latitude},${first.longitude}`);
    return { latitude: first.latitude, longitude: first.longitude };
  }
}
