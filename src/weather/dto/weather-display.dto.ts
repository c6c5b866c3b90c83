// src/weather/dto/weather-display.dto.ts
import { ApiProperty } from '@nestjs/swagger';
import { DisplayForecastEntry, WeatherDisplay } from '../../forecast/interfaces/forecast.interface';

/**
 * Swagger shapes of the weather payload
 */
export class DisplayForecastEntryDto implements DisplayForecastEntry {
  @ApiProperty({ example: 'Mon 14:00' })
  label!: string;

  @ApiProperty({ example: '18.5°C' })
  temperatureLabel!: string;
}

export class WeatherDisplayDto implements WeatherDisplay {
  @ApiProperty({ example: 'Paris' })
  city!: string;

  @ApiProperty({ type: [DisplayForecastEntryDto] })
  forecasts!: DisplayForecastEntryDto[];
}
