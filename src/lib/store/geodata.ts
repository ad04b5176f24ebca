import type { Feature, Geometry } from 'geojson';
import type { GeoFeatureTable } from '../../../lib/geo/types';
import { TtlCache } from '../cache';
import { GeometryParseError } from '../errors';
import { parseGeography } from '../geo/geometry';
import type { SpatialQuery } from './spatial-query';
import { GEOGRAPHY_COLUMN, type SpatialStore, type StoreRow } from './types';

export const DEFAULT_GEODATA_TTL_MS = 10 * 60 * 1000;

/**
 * Turn raw store rows into a feature table. The geography column becomes
 * each feature's geometry and is dropped from its properties.
 *
 * Any row whose geography cannot be parsed aborts the whole table: a table
 * with silently missing rows would undercount crime downstream.
 */
export function toFeatureTable(source: string, rows: StoreRow[]): GeoFeatureTable {
  const features: Array<Feature<Geometry, Record<string, unknown>>> = rows.map((row, index) => {
    const parsed = parseGeography(row[GEOGRAPHY_COLUMN]);
    if (!parsed.ok) {
      throw new GeometryParseError(source, index, parsed.reason);
    }

    const properties: Record<string, unknown> = {};
    for (const [column, value] of Object.entries(row)) {
      if (column !== GEOGRAPHY_COLUMN) properties[column] = value;
    }

    return { type: 'Feature', geometry: parsed.geometry, properties };
  });

  return { source, crs: 'EPSG:4326', features };
}

/**
 * Executes spatial queries and materializes feature tables.
 *
 * Features:
 * - Results cached per query text for a fixed TTL
 * - Concurrent identical queries share one store round trip
 *
 * Cached tables are shared between callers and must be treated as
 * read-only; filtering produces new arrays.
 */
export class GeodataFetcher {
  private cache: TtlCache<GeoFeatureTable>;

  constructor(
    private readonly store: SpatialStore,
    ttlMs: number = DEFAULT_GEODATA_TTL_MS,
  ) {
    this.cache = new TtlCache(ttlMs);
  }

  async fetch(query: SpatialQuery): Promise<GeoFeatureTable> {
    const { value, hit } = await this.cache.getOrLoad(query.text, async () => {
      const rows = await this.store.query(query);
      return toFeatureTable(query.source, rows);
    });

    console.info(`[geodata] ${hit ? 'HIT' : 'MISS'}`, {
      source: query.source,
      radiusMeters: query.radiusMeters,
      features: value.features.length,
    });
    return value;
  }

  /**
   * Get cache statistics
   */
  getCacheStats(): { entries: number } {
    return { entries: this.cache.size };
  }

  /**
   * Clear all cached tables
   */
  clearCache(): void {
    this.cache.clear();
  }
}
