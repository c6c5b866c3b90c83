// src/forecast/services/forecast-transformer.service.ts
import { Injectable } from '@nestjs/common';
import { DateTime } from 'luxon';
import { MalformedResponseError, TimeParseError } from '../../common/errors/weather.errors';
import { parsePayload } from '../../common/utils/payload-validator.util';
import { ForecastResponseDto } from '../dto/forecast-response.dto';
import {
  FORECAST_LABEL_FORMAT,
  FORECAST_LABEL_LOCALE,
  FORECAST_TIME_LAYOUT,
} from '../forecast.constants';
import { DisplayForecastEntry, WeatherDisplay } from '../interfaces/forecast.interface';
import { formatTemperature } from '../utils/temperature-format.util';

/**
 * Turns a raw forecast body into display rows.
 *
 * All-or-nothing: one bad timestamp or a length mismatch between the two
 * hourly arrays rejects the whole body.
 */
@Injectable()
export class ForecastTransformerService {
  transform(cityName: string, rawBody: string): WeatherDisplay {
    const { time, temperature_2m: temperatures } = this.parse(rawBody).hourly;

    if (time.length !== temperatures.length) {
      throw new MalformedResponseError(
        `Forecast arrays differ in length: ${time.length} times, ${temperatures.length} temperatures`,
        { details: { times: time.length, temperatures: temperatures.length } }
      );
    }

    const forecasts: DisplayForecastEntry[] = time.map((timestamp, i) => ({
      label: this.formatLabel(timestamp, i),
      temperatureLabel: formatTemperature(temperatures[i]),
    }));

    return { city: cityName, forecasts };
  }

  private parse(rawBody: string): ForecastResponseDto {
    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch (error) {
      throw new MalformedResponseError('Forecast response is not valid JSON', { cause: error });
    }
    return parsePayload(ForecastResponseDto, payload, 'Forecast');
  }

  private formatLabel(timestamp: string, index: number): string {
    // upstream times are wall-clock values; UTC keeps luxon from shifting them
    const parsed = DateTime.fromFormat(timestamp, FORECAST_TIME_LAYOUT, {
      zone: 'utc',
      locale: FORECAST_LABEL_LOCALE,
    });
    // fromFormat is case-insensitive and rolls hour 24 into the next day; only canonical text passes
    if (!parsed.isValid || parsed.toFormat(FORECAST_TIME_LAYOUT) !== timestamp) {
      throw new TimeParseError(
        `Forecast time "${timestamp}" at index ${index} does not match ${FORECAST_TIME_LAYOUT}`,
        { details: { timestamp, index, reason: parsed.invalidReason ?? 'not in canonical form' } }
      );
    }
    return parsed.toFormat(FORECAST_LABEL_FORMAT);
  }
}
