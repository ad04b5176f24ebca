/**
 * Address and postcode lookup against the OS Places API (LPI dataset).
 * Great Britain only; results are returned in British National Grid and
 * converted to WGS84 here.
 */

import { z } from 'zod';
import type { LonLat } from '../../lib/geo/types';
import { GeocodingError } from './errors';
import { bngToWgs84 } from './geo/coordinates';

export interface AddressMatch {
  address: string;
  administrativeArea: string | null;
  classification: string | null;
  status: string | null;
  /** Match confidence, 0–1 */
  matchScore: number;
  bng: { x: number; y: number };
  location: LonLat;
}

export interface Geocoder {
  /** Best match for the query, or null when nothing matches */
  geocode(query: string): Promise<AddressMatch | null>;
}

export interface OsPlacesOptions {
  apiKey: string;
  url: string;
  timeoutMs: number;
}

// England, Scotland and Wales; excludes the Channel Islands and Isle of Man
const COUNTRY_FILTER = 'COUNTRY_CODE:E COUNTRY_CODE:S COUNTRY_CODE:W';

const LpiRecord = z.object({
  ADDRESS: z.string(),
  ADMINISTRATIVE_AREA: z.string().optional(),
  CLASSIFICATION_CODE_DESCRIPTION: z.string().optional(),
  BLPU_STATE_CODE_DESCRIPTION: z.string().optional(),
  MATCH: z.coerce.number(),
  X_COORDINATE: z.coerce.number(),
  Y_COORDINATE: z.coerce.number(),
});

const PlacesResponse = z.object({
  results: z.array(z.object({ LPI: LpiRecord })).optional(),
});

type LpiRecord = z.infer<typeof LpiRecord>;

export function toAddressMatch(lpi: LpiRecord): AddressMatch {
  const bng = { x: lpi.X_COORDINATE, y: lpi.Y_COORDINATE };
  return {
    address: lpi.ADDRESS,
    administrativeArea: lpi.ADMINISTRATIVE_AREA ?? null,
    classification: lpi.CLASSIFICATION_CODE_DESCRIPTION ?? null,
    status: lpi.BLPU_STATE_CODE_DESCRIPTION ?? null,
    matchScore: lpi.MATCH,
    bng,
    location: bngToWgs84(bng),
  };
}

export function createOsPlacesGeocoder(options: OsPlacesOptions): Geocoder {
  return {
    async geocode(query: string): Promise<AddressMatch | null> {
      const trimmed = query.trim();
      if (!trimmed) return null;

      const params = new URLSearchParams({
        query: trimmed,
        fq: COUNTRY_FILTER,
        dataset: 'LPI',
        maxresults: '1',
        key: options.apiKey,
      });

      let response: Response;
      try {
        response = await fetch(`${options.url}?${params}`, {
          signal: AbortSignal.timeout(options.timeoutMs),
        });
      } catch (error) {
        console.error('[geocode] Request failed:', { query: trimmed, error });
        throw new GeocodingError('Address lookup could not be reached', { cause: error });
      }

      if (!response.ok) {
        console.error('[geocode] Lookup failed:', { query: trimmed, status: response.status });
        throw new GeocodingError(`Address lookup failed with HTTP ${response.status}`);
      }

      const parsed = PlacesResponse.safeParse(await response.json());
      if (!parsed.success) {
        console.error('[geocode] Unexpected response:', parsed.error.issues);
        throw new GeocodingError('Address lookup returned an unexpected response');
      }

      const first = parsed.data.results?.[0];
      return first ? toAddressMatch(first.LPI) : null;
    },
  };
}
