// src/locations/locations.constants.ts

/** Injection token of the axios instance bound to the geocoding API */
export const GEOCODING_HTTP_CLIENT = Symbol('GEOCODING_HTTP_CLIENT');
