// src/locations/services/location-resolver.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StoreReadError } from '../../common/errors/weather.errors';
import { Coordinate } from '../interfaces/location.interface';
import { CityStoreService } from './city-store.service';
import { GeocodingService } from './geocoding.service';

/**
 * Location resolver (cache-aside)
 *
 * 1. look the name up in the `cities` table
 * 2. on a miss, ask the geocoder
 * 3. write the answer back before returning it
 *
 * A failed write-back fails the whole resolution.
 */
@Injectable()
export class LocationResolverService {
  private readonly logger = new Logger(LocationResolverService.name);
  private readonly readErrorAsMiss: boolean;

  constructor(
    private readonly cityStore: CityStoreService,
    private readonly geocoding: GeocodingService,
    configService: ConfigService
  ) {
    this.readErrorAsMiss = configService.get<boolean>('LOCATION_CACHE_READ_ERROR_AS_MISS', false);
  }

  async resolve(name: string, signal?: AbortSignal): Promise<Coordinate> {
    const cached = await this.cityStore.find(name);

    switch (cached.status) {
      case 'hit':
        this.logger.debug(`Cache hit for "${name}"`);
        return cached.coordinate;
      case 'error':
        if (!this.readErrorAsMiss) {
          throw new StoreReadError(`Could not read cached coordinates for "${name}"`, {
            cause: cached.cause,
            details: { name },
          });
        }
        this.logger.warn(`Cache unreadable for "${name}", falling back to the geocoder`);
        break;
      case 'miss':
        this.logger.debug(`Cache miss for "${name}"`);
        break;
    }

    const coordinate = await this.geocoding.lookup(name, signal);
    const inserted = await this.cityStore.save({ name, coordinate });
    if (inserted) {
      this.logger.log(`Cached coordinates for "${name}"`);
    }
    return coordinate;
  }
}
