// src/forecast/utils/temperature-format.util.ts
import { TEMPERATURE_UNIT_SUFFIX } from '../forecast.constants';

/**
 * Rounds half away from zero on the number's shortest decimal form, so
 * 18.45 becomes 18.5 even though its binary value sits just below 18.45.
 */
export function roundHalfAwayFromZero(value: number, digits: number): number {
  const magnitude = shiftDecimal(Math.round(shiftDecimal(Math.abs(value), digits)), -digits);
  return value < 0 ? -magnitude : magnitude;
}

function shiftDecimal(value: number, places: number): number {
  const [mantissa, exponent = '0'] = String(value).split('e');
  return Number(`${mantissa}e${Number(exponent) + places}`);
}

/**
 * `18.45` -> `18.5°C`. Negative values that round to zero keep their sign: `-0.0°C`.
 */
export function formatTemperature(celsius: number): string {
  const rounded = roundHalfAwayFromZero(celsius, 1);
  // toFixed drops the sign of -0
  const sign = Object.is(rounded, -0) ? '-' : '';
  return `${sign}${rounded.toFixed(1)}${TEMPERATURE_UNIT_SUFFIX}`;
}
