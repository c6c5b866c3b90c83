// src/weather/weather.controller.ts
import { Controller, Get, HttpException, Query } from '@nestjs/common';
import { ApiExtraModels, ApiOperation, ApiResponse, ApiTags, getSchemaPath } from '@nestjs/swagger';
import { ApiErrorResponseDto, ApiSuccessResponseDto } from '../common/dto/api-response.dto';
import { errorResponse, successResponse } from '../common/dto/standard-response.dto';
import { WeatherError } from '../common/errors/weather.errors';
import { WeatherDisplayDto } from './dto/weather-display.dto';
import { WeatherQueryDto } from './dto/weather-query.dto';
import { mapWeatherError } from './utils/weather-error.mapper';
import { WeatherService } from './weather.service';

@ApiTags('weather')
@ApiExtraModels(ApiSuccessResponseDto, WeatherDisplayDto)
@Controller('weather')
export class WeatherController {
  constructor(private readonly weatherService: WeatherService) {}

  @Get()
  @ApiOperation({
    summary: 'Hourly temperature forecast for a place',
    description:
      'Resolves the place name to coordinates (cached in PostgreSQL after the first ' +
      'geocoding lookup), then returns the hourly 2 m temperature forecast as display rows.\n\n' +
      '- `label`: abbreviated weekday and 24-hour time, e.g. `Mon 14:00`\n' +
      '- `temperatureLabel`: one decimal plus unit, e.g. `18.5°C`',
  })
  @ApiResponse({
    status: 200,
    description: 'Forecast rows (standard envelope)',
    schema: {
      allOf: [
        { $ref: getSchemaPath(ApiSuccessResponseDto) },
        { properties: { data: { $ref: getSchemaPath(WeatherDisplayDto) } } },
      ],
    },
  })
  @ApiResponse({ status: 400, description: 'Missing or invalid `city`' })
  @ApiResponse({ status: 404, description: 'Place name could not be geocoded', type: ApiErrorResponseDto })
  @ApiResponse({ status: 500, description: 'Location cache unavailable', type: ApiErrorResponseDto })
  @ApiResponse({ status: 502, description: 'Upstream failure or unexpected upstream payload', type: ApiErrorResponseDto })
  @ApiResponse({ status: 504, description: 'Query ran past its deadline', type: ApiErrorResponseDto })
  async getWeather(@Query() query: WeatherQueryDto) {
    try {
      const display = await this.weatherService.getWeather(query.city);
      return successResponse(display);
    } catch (error) {
      if (error instanceof WeatherError) {
        const { status, code } = mapWeatherError(error);
        throw new HttpException(errorResponse(code, error.message, { kind: error.kind }), status, {
          cause: error,
        });
      }
      throw error;
    }
  }
}
