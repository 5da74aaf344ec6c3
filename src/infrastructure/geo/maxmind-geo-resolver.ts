import { existsSync } from 'node:fs';
import { open } from 'maxmind';
import type { CityResponse } from 'maxmind';
import type { Logger } from 'pino';
import { UNKNOWN_GEO, UNKNOWN_LOCATION } from '../../domain/index.js';
import type { GeoResolver, GeoResult } from '../../domain/index.js';

/** Minimal shape of a City record this resolver reads. */
export interface CityRecord {
  readonly country?: { readonly names?: { readonly en?: string } };
  readonly city?: { readonly names?: { readonly en?: string } };
  readonly location?: { readonly latitude?: number; readonly longitude?: number };
}

/** Anything that can look up a City record. A maxmind `Reader<CityResponse>` fits. */
export interface CityLookup {
  get(address: string): CityRecord | null;
}

/**
 * GeoResolver backed by a MaxMind City database.
 *
 * Constructed with `null` when the database could not be opened; it
 * then answers every lookup with the unknown result.
 */
export class MaxmindGeoResolver implements GeoResolver {
  constructor(private readonly reader: CityLookup | null) {}

  /**
   * Opens the database at `path`.
   *
   * A missing or unreadable file yields a resolver without a database;
   * the failure is logged, never thrown.
   */
  static async open(path: string, log: Logger): Promise<MaxmindGeoResolver> {
    if (!existsSync(path)) {
      log.warn({ path }, 'GeoIP database not found — city/country/coords will be unknown');
      return new MaxmindGeoResolver(null);
    }

    try {
      const reader = await open<CityResponse>(path);
      log.info({ path }, 'GeoIP database loaded');
      return new MaxmindGeoResolver(reader);
    } catch (err: unknown) {
      log.warn({ err, path }, 'Failed to open GeoIP database — geo lookup disabled');
      return new MaxmindGeoResolver(null);
    }
  }

  get available(): boolean {
    return this.reader !== null;
  }

  resolve(address: string): GeoResult {
    if (this.reader === null) return UNKNOWN_GEO;

    let record: CityRecord | null;
    try {
      // Throws on anything that is not a syntactically valid IP address.
      record = this.reader.get(address);
    } catch {
      return UNKNOWN_GEO;
    }
    if (record === null) return UNKNOWN_GEO;

    return {
      country: record.country?.names?.en || UNKNOWN_LOCATION,
      city: record.city?.names?.en || UNKNOWN_LOCATION,
      latitude: record.location?.latitude ?? null,
      longitude: record.location?.longitude ?? null,
    };
  }
}
