/** Placeholder used for any location field that could not be resolved. */
export const UNKNOWN_LOCATION = 'Unknown';

/** Geographic origin of a network address. */
export interface GeoResult {
  readonly country: string;
  readonly city: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
}

export const UNKNOWN_GEO: GeoResult = Object.freeze({
  country: UNKNOWN_LOCATION,
  city: UNKNOWN_LOCATION,
  latitude: null,
  longitude: null,
});

/**
 * Maps a network address to its geographic origin.
 *
 * Implementations never throw: anything they cannot resolve comes back
 * as the matching field of `UNKNOWN_GEO`.
 */
export interface GeoResolver {
  resolve(address: string): GeoResult;
}
