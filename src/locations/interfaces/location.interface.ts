// src/locations/interfaces/location.interface.ts

/**
 * WGS84 point, decimal degrees
 */
export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Row of the `cities` table; `name` is the natural key.
 */
export interface NamedLocation {
  name: string;
  coordinate: Coordinate;
}

/**
 * Result of a cache lookup. A failing store is reported as `error` rather
 * than being folded into `miss`, so the resolver can decide what to do.
 */
export type CachedCoordinate =
  | { status: 'hit'; coordinate: Coordinate }
  | { status: 'miss' }
  | { status: 'error'; cause: unknown };
