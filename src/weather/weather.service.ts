// src/weather/weather.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { withDeadline } from '../common/utils/deadline.util';
import { DEFAULT_WEATHER_QUERY_DEADLINE_MS } from '../config/env.validation';
import { WeatherDisplay } from '../forecast/interfaces/forecast.interface';
import { ForecastClientService } from '../forecast/services/forecast-client.service';
import { ForecastTransformerService } from '../forecast/services/forecast-transformer.service';
import { LocationResolverService } from '../locations/services/location-resolver.service';

/**
 * City name -> hourly forecast
 *
 * Resolution and forecast run one after the other under a single deadline;
 * nothing is shared between queries except the database pool.
 */
@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);
  private readonly deadlineMs: number;

  constructor(
    private readonly locationResolver: LocationResolverService,
    private readonly forecastClient: ForecastClientService,
    private readonly forecastTransformer: ForecastTransformerService,
    configService: ConfigService
  ) {
    this.deadlineMs = configService.get<number>('WEATHER_QUERY_DEADLINE_MS', DEFAULT_WEATHER_QUERY_DEADLINE_MS);
  }

  async getWeather(city: string): Promise<WeatherDisplay> {
    const display = await withDeadline(this.deadlineMs, `Weather query for "${city}"`, async (signal) => {
      const coordinate = await this.locationResolver.resolve(city, signal);
      const rawBody = await this.forecastClient.fetchForecast(coordinate, signal);
      return this.forecastTransformer.transform(city, rawBody);
    });

    this.logger.log(`Served ${display.forecasts.length} hourly entries for "${city}"`);
    return display;
  }
}
