import type { LonLat } from '../../../lib/geo/types';

export interface SpatialQuery {
  source: string;
  center: LonLat;
  radiusMeters: number;
  /** Rendered statement; also the cache identity of the query */
  text: string;
}

/**
 * Build a query selecting every row of `source` whose geography lies within
 * `radiusMeters` of the centre point. Distances are measured on the
 * geography type, so the radius is in metres on the ground.
 */
export function buildSpatialQuery(source: string, lon: number, lat: number, radiusMeters: number): SpatialQuery {
  const text = [
    'SELECT a.*',
    `FROM ${source} a`,
    'WHERE ST_Distance(',
    '  a.geography,',
    `  ST_GeogFromText('POINT(${lon} ${lat})')`,
    `) <= ${radiusMeters}`,
  ].join('\n');

  return {
    source,
    center: { lon, lat },
    radiusMeters,
    text,
  };
}
