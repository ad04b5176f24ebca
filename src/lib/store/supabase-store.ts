import type { SupabaseClient } from '@supabase/supabase-js';
import { SpatialQueryError } from '../errors';
import type { SpatialQuery } from './spatial-query';
import type { SpatialStore, StoreRow } from './types';

/** Name of the PostGIS function in supabase/migrations */
export const FEATURES_WITHIN_RADIUS_RPC = 'features_within_radius';

function isStoreRow(value: unknown): value is StoreRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * SpatialStore backed by a PostGIS function exposed through PostgREST.
 *
 * The function evaluates the same distance predicate as `query.text` and
 * returns each row as JSON with the geography serialized as GeoJSON.
 */
export class SupabaseSpatialStore implements SpatialStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly timeoutMs: number,
  ) {}

  async query(query: SpatialQuery): Promise<StoreRow[]> {
    let response: { data: unknown; error: { message: string } | null };
    try {
      response = await this.client
        .rpc(FEATURES_WITHIN_RADIUS_RPC, {
          source_table: query.source,
          center_lon: query.center.lon,
          center_lat: query.center.lat,
          radius_m: query.radiusMeters,
        })
        .abortSignal(AbortSignal.timeout(this.timeoutMs));
    } catch (error) {
      console.error('[geodata] Store request failed:', { source: query.source, error });
      throw new SpatialQueryError(query.source, `Store request for ${query.source} failed`, { cause: error });
    }

    const { data, error } = response;
    if (error) {
      console.error('[geodata] Store query failed:', { source: query.source, message: error.message });
      throw new SpatialQueryError(query.source, `${FEATURES_WITHIN_RADIUS_RPC} error for ${query.source}: ${error.message}`);
    }

    if (data === null) return [];
    if (!Array.isArray(data)) {
      throw new SpatialQueryError(query.source, `Expected an array of rows from ${query.source}`);
    }

    const rows: StoreRow[] = [];
    for (const row of data) {
      if (!isStoreRow(row)) {
        throw new SpatialQueryError(query.source, `Row from ${query.source} is not an object`);
      }
      rows.push(row);
    }
    return rows;
  }
}
