// src/locations/locations.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpClientFactory } from '../common/utils/http-client.factory';
import { DEFAULT_GEOCODING_API_URL, DEFAULT_UPSTREAM_TIMEOUT_MS } from '../config/env.validation';
import { GEOCODING_HTTP_CLIENT } from './locations.constants';
import { CityStoreService } from './services/city-store.service';
import { GeocodingService } from './services/geocoding.service';
import { LocationResolverService } from './services/location-resolver.service';

@Module({
  providers: [
    {
      provide: GEOCODING_HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        HttpClientFactory.create({
          baseURL: configService.get<string>('GEOCODING_API_URL', DEFAULT_GEOCODING_API_URL),
          timeout: configService.get<number>('UPSTREAM_TIMEOUT_MS', DEFAULT_UPSTREAM_TIMEOUT_MS),
        }),
    },
    CityStoreService,
    GeocodingService,
    LocationResolverService,
  ],
  exports: [LocationResolverService],
})
export class LocationsModule {}
