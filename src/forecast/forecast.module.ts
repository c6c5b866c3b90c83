// src/forecast/forecast.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpClientFactory } from '../common/utils/http-client.factory';
import { DEFAULT_FORECAST_API_URL, DEFAULT_UPSTREAM_TIMEOUT_MS } from '../config/env.validation';
import { FORECAST_HTTP_CLIENT } from './forecast.constants';
import { ForecastClientService } from './services/forecast-client.service';
import { ForecastTransformerService } from './services/forecast-transformer.service';

@Module({
  providers: [
    {
      provide: FORECAST_HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        HttpClientFactory.create({
          baseURL: configService.get<string>('FORECAST_API_URL', DEFAULT_FORECAST_API_URL),
          timeout: configService.get<number>('UPSTREAM_TIMEOUT_MS', DEFAULT_UPSTREAM_TIMEOUT_MS),
        }),
    },
    ForecastClientService,
    ForecastTransformerService,
  ],
  exports: [ForecastClientService, ForecastTransformerService],
})
export class ForecastModule {}
