// src/forecast/dto/forecast-response.dto.ts
import { Type } from 'class-transformer';
import { IsArray, IsDefined, IsNumber, IsObject, IsOptional, IsString, ValidateNested } from 'class-validator';

/**
 * `time[i]` and `temperature_2m[i]` together form one sample.
 */
export class HourlySeriesDto {
  @IsArray()
  @IsString({ each: true })
  time!: string[];

  @IsArray()
  @IsNumber({}, { each: true })
  temperature_2m!: number[];
}

/**
 * Forecast API body. Only `hourly` is consumed.
 */
export class ForecastResponseDto {
  @IsOptional()
  @IsNumber()
  latitude?: number;

  @IsOptional()
  @IsNumber()
  longitude?: number;

  @IsOptional()
  @IsString()
  timezone?: string;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => HourlySeriesDto)
  hourly!: HourlySeriesDto;
}
