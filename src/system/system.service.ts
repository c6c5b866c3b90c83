// src/system/system.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_FORECAST_API_URL, DEFAULT_GEOCODING_API_URL } from '../config/env.validation';
import { DatabaseService } from '../database/database.service';

export interface SystemStatus {
  database: 'connected' | 'unavailable';
  upstreams: {
    geocoding: string;
    forecast: string;
  };
}

/**
 * Reports what the service is running against, so an operator can tell a
 * cache outage from an upstream one.
 */
@Injectable()
export class SystemService {
  constructor(
    private readonly configService: ConfigService,
    private readonly database: DatabaseService
  ) {}

  getStatus(): SystemStatus {
    return {
      database: this.database.isDbConnected() ? 'connected' : 'unavailable',
      upstreams: {
        geocoding: this.configService.get<string>('GEOCODING_API_URL', DEFAULT_GEOCODING_API_URL),
        forecast: this.configService.get<string>('FORECAST_API_URL', DEFAULT_FORECAST_API_URL),
      },
    };
  }
}
