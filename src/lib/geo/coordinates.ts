import proj4 from 'proj4';
import type { CrsCode, LonLat } from '../../../lib/geo/types';

// British National Grid (OSGB36 / Transverse Mercator) with the standard
// 7-parameter Helmert shift to WGS84. Accurate to a few metres.
proj4.defs(
  'EPSG:27700',
  '+proj=tmerc +lat_0=49 +lon_0=-2 +k=0.9996012717 +x_0=400000 +y_0=-100000 +ellps=airy ' +
  '+towgs84=446.448,-125.157,542.06,0.15,0.247,0.842,-20.489 +units=m +no_defs'
);

const BNG: CrsCode = 'EPSG:27700';
const WGS84: CrsCode = 'EPSG:4326';
const WEB_MERCATOR: CrsCode = 'EPSG:3857';

export interface ProjectedPoint {
  x: number;
  y: number;
}

function transform(from: CrsCode, to: CrsCode, x: number, y: number): [number, number] {
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new RangeError(`Cannot transform non-finite coordinate (${x}, ${y}) from ${from}`);
  }
  const [outX, outY] = proj4(from, to, [x, y]);
  return [outX, outY];
}

/** Easting/northing → lon/lat */
export function bngToWgs84(point: ProjectedPoint): LonLat {
  const [lon, lat] = transform(BNG, WGS84, point.x, point.y);
  return { lon, lat };
}

/** Easting/northing → Web Mercator metres */
export function bngToWebMercator(point: ProjectedPoint): ProjectedPoint {
  const [x, y] = transform(BNG, WEB_MERCATOR, point.x, point.y);
  return { x, y };
}

/** lon/lat → easting/northing */
export function wgs84ToBng(point: LonLat): ProjectedPoint {
  const [x, y] = transform(WGS84, BNG, point.lon, point.lat);
  return { x, y };
}
