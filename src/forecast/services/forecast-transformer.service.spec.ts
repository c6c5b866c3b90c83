// src/forecast/services/forecast-transformer.service.spec.ts

import { ForecastTransformerService } from './forecast-transformer.service';
import {
  MalformedResponseError,
  TimeParseError,
  WeatherErrorKind,
} from '../../common/errors/weather.errors';

function body(time: unknown, temperatures: unknown, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    latitude: 48.86,
    longitude: 2.35,
    timezone: 'GMT',
    ...extra,
    hourly: { time, temperature_2m: temperatures },
  });
}

describe('ForecastTransformerService', () => {
  let transformer: ForecastTransformerService;

  beforeEach(() => {
    transformer = new ForecastTransformerService();
  });

  it('formats a single sample', () => {
    const display = transformer.transform('Paris', body(['2024-03-11T14:00'], [18.45]));

    expect(display).toEqual({
      city: 'Paris',
      forecasts: [{ label: 'Mon 14:00', temperatureLabel: '18.5°C' }],
    });
  });

  it('keeps one entry per sample in upstream order', () => {
    const display = transformer.transform(
      'Oslo',
      body(
        ['2024-03-10T23:00', '2024-03-11T00:00', '2024-03-09T06:30'],
        [-1.2, -1.25, 4]
      )
    );

    expect(display.forecasts).toEqual([
      { label: 'Sun 23:00', temperatureLabel: '-1.2°C' },
      { label: 'Mon 00:00', temperatureLabel: '-1.3°C' },
      { label: 'Sat 06:30', temperatureLabel: '4.0°C' },
    ]);
  });

  it('returns an empty list for an empty series', () => {
    expect(transformer.transform('Paris', body([], []))).toEqual({ city: 'Paris', forecasts: [] });
  });

  it('does not require the unused top-level fields', () => {
    const raw = JSON.stringify({ hourly: { time: ['2024-03-12T09:00'], temperature_2m: [7] } });

    expect(transformer.transform('Paris', raw).forecasts).toEqual([
      { label: 'Tue 09:00', temperatureLabel: '7.0°C' },
    ]);
  });

  describe('malformed bodies', () => {
    it('rejects invalid JSON', () => {
      expect(() => transformer.transform('Paris', '{"hourly":')).toThrow(
        new MalformedResponseError('Forecast response is not valid JSON')
      );
    });

    it('rejects a body without hourly data', () => {
      expect(() => transformer.transform('Paris', JSON.stringify({ latitude: 48.86 }))).toThrow(
        MalformedResponseError
      );
    });

    it('rejects non-numeric temperatures', () => {
      expect(() => transformer.transform('Paris', body(['2024-03-11T14:00'], ['18.4']))).toThrow(
        MalformedResponseError
      );
    });

    it('rejects null temperatures', () => {
      expect(() => transformer.transform('Paris', body(['2024-03-11T14:00'], [null]))).toThrow(
        MalformedResponseError
      );
    });

    it('rejects a temperature array shorter than the time array', () => {
      let caught: unknown;
      try {
        transformer.transform('Paris', body(['2024-03-11T14:00', '2024-03-11T15:00'], [18.45]));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MalformedResponseError);
      expect(caught).toMatchObject({
        kind: WeatherErrorKind.MALFORMED_RESPONSE,
        message: 'Forecast arrays differ in length: 2 times, 1 temperatures',
      });
    });

    it('rejects a temperature array longer than the time array', () => {
      expect(() => transformer.transform('Paris', body(['2024-03-11T14:00'], [18.45, 19]))).toThrow(
        MalformedResponseError
      );
    });
  });

  describe('time layout', () => {
    it.each([
      ['seconds', '2024-03-11T14:00:00'],
      ['a zone suffix', '2024-03-11T14:00Z'],
      ['a space separator', '2024-03-11 14:00'],
      ['an impossible date', '2024-02-30T14:00'],
      ['single-digit hour', '2024-03-11T4:00'],
      ['hour 24', '2024-03-11T24:00'],
      ['minute 60', '2024-03-11T14:60'],
      ['a lowercase separator', '2024-03-11t14:00'],
    ])('fails the whole batch on %s', (_, bad) => {
      expect(() =>
        transformer.transform('Paris', body(['2024-03-11T13:00', bad], [10, 11]))
      ).toThrow(TimeParseError);
    });

    it('does not roll hour 24 over into the next day', () => {
      let caught: unknown;
      try {
        transformer.transform('X', body(['2024-03-11T24:00'], [1]));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(TimeParseError);
      expect(caught).toMatchObject({
        kind: WeatherErrorKind.TIME_PARSE_ERROR,
        details: { timestamp: '2024-03-11T24:00', index: 0 },
      });
    });

    it('names the offending entry', () => {
      expect(() =>
        transformer.transform('Paris', body(['2024-03-11T13:00', 'tomorrow'], [10, 11]))
      ).toThrow('Forecast time "tomorrow" at index 1 does not match yyyy-MM-dd\'T\'HH:mm');
    });
  });
});
