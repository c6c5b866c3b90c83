// src/config/env.validation.spec.ts

import { validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
  it('applies defaults when nothing is set', () => {
    const env = validateEnvironment({});

    expect(env.PORT).toBe(3000);
    expect(env.DATABASE_URL).toBeUndefined();
    expect(env.DATABASE_POOL_SIZE).toBe(10);
    expect(env.ALLOW_NO_DATABASE).toBe(false);
    expect(env.GEOCODING_API_URL).toBe('https://geocoding-api.open-meteo.com/v1');
    expect(env.FORECAST_API_URL).toBe('https://api.open-meteo.com/v1');
    expect(env.UPSTREAM_TIMEOUT_MS).toBe(10000);
    expect(env.WEATHER_QUERY_DEADLINE_MS).toBe(15000);
    expect(env.LOCATION_CACHE_READ_ERROR_AS_MISS).toBe(false);
  });

  it('converts numeric and boolean strings', () => {
    const env = validateEnvironment({
      PORT: '8080',
      UPSTREAM_TIMEOUT_MS: '2500',
      ALLOW_NO_DATABASE: 'true',
      LOCATION_CACHE_READ_ERROR_AS_MISS: 'false',
    });

    expect(env.PORT).toBe(8080);
    expect(env.UPSTREAM_TIMEOUT_MS).toBe(2500);
    expect(env.ALLOW_NO_DATABASE).toBe(true);
    expect(env.LOCATION_CACHE_READ_ERROR_AS_MISS).toBe(false);
  });

  it('accepts upstream URLs without a top-level domain', () => {
    const env = validateEnvironment({ GEOCODING_API_URL: 'http://localhost:8081/v1' });

    expect(env.GEOCODING_API_URL).toBe('http://localhost:8081/v1');
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => validateEnvironment({ UPSTREAM_TIMEOUT_MS: 'soon' })).toThrow(
      'Invalid environment configuration: UPSTREAM_TIMEOUT_MS:'
    );
  });

  it('rejects a zero deadline', () => {
    expect(() => validateEnvironment({ WEATHER_QUERY_DEADLINE_MS: '0' })).toThrow('WEATHER_QUERY_DEADLINE_MS');
  });

  it('rejects a malformed upstream URL', () => {
    expect(() => validateEnvironment({ FORECAST_API_URL: 'not a url' })).toThrow('FORECAST_API_URL');
  });
});
