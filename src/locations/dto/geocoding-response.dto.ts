// src/locations/dto/geocoding-response.dto.ts
import { Type } from 'class-transformer';
import { IsArray, IsNumber, IsOptional, IsString, ValidateNested } from 'class-validator';

/**
 * One candidate of the geocoding search. Only the coordinates are used.
 */
export class GeocodingResultDto {
  @IsNumber()
  latitude!: number;

  @IsNumber()
  longitude!: number;

  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsString()
  country?: string;
}

/**
 * The geocoding API omits `results` entirely when nothing matches.
 */
export class GeocodingResponseDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => GeocodingResultDto)
  results?: GeocodingResultDto[];
}
