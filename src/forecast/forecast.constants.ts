// src/forecast/forecast.constants.ts

/** Injection token of the axios instance bound to the forecast API */
export const FORECAST_HTTP_CLIENT = Symbol('FORECAST_HTTP_CLIENT');

/**
 * Layout of `hourly.time` entries (luxon tokens): local wall time, minute
 * precision, no zone suffix. If the upstream format changes, change it here.
 */
export const FORECAST_TIME_LAYOUT = "yyyy-MM-dd'T'HH:mm";

/** Label layout, e.g. `Mon 14:00` */
export const FORECAST_LABEL_FORMAT = 'ccc HH:mm';

export const FORECAST_LABEL_LOCALE = 'en-US';

/** Upstream temperatures are requested and rendered in Celsius; units are never negotiated. */
export const TEMPERATURE_UNIT_SUFFIX = '°C';

export const HOURLY_VARIABLE = 'temperature_2m';
