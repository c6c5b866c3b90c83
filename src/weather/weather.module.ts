// src/weather/weather.module.ts
import { Module } from '@nestjs/common';
import { ForecastModule } from '../forecast/forecast.module';
import { LocationsModule } from '../locations/locations.module';
import { WeatherController } from './weather.controller';
import { WeatherService } from './weather.service';

@Module({
  imports: [LocationsModule, ForecastModule],
  controllers: [WeatherController],
  providers: [WeatherService],
})
export class WeatherModule {}
