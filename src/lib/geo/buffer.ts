import * as turf from '@turf/turf';
import type { Feature, Polygon } from 'geojson';
import type { BBox, LatLngBounds, LonLat } from '../../../lib/geo/types';

/** Metres per degree of latitude, used as a flat small-angle conversion */
export const METERS_PER_DEGREE = 111320;

const CIRCLE_SEGMENTS = 64;

export interface BufferGeometry {
  center: LonLat;
  radiusMeters: number;
  radiusDegrees: number;
  polygon: Feature<Polygon>;
  bbox: BBox;
}

/**
 * Circle of `radiusMeters` around `center`, drawn in degree space.
 *
 * Not geodesic: the same degree radius is used for lon and lat, which is
 * good enough to frame a viewport a few hundred metres across.
 */
export function buildBuffer(center: LonLat, radiusMeters: number): BufferGeometry {
  if (!Number.isFinite(radiusMeters) || radiusMeters < 0) {
    throw new RangeError(`Buffer radius must be a non-negative number of metres, got ${radiusMeters}`);
  }

  const radiusDegrees = radiusMeters / METERS_PER_DEGREE;
  const ring: Array<[number, number]> = [];
  for (let i = 0; i < CIRCLE_SEGMENTS; i++) {
    const angle = (2 * Math.PI * i) / CIRCLE_SEGMENTS;
    ring.push([
      center.lon + radiusDegrees * Math.cos(angle),
      center.lat + radiusDegrees * Math.sin(angle),
    ]);
  }
  ring.push(ring[0]);

  const polygon = turf.polygon([ring], { radiusMeters });
  const [minLon, minLat, maxLon, maxLat] = turf.bbox(polygon);

  return {
    center,
    radiusMeters,
    radiusDegrees,
    polygon,
    bbox: [minLon, minLat, maxLon, maxLat],
  };
}

export function bboxToLatLngBounds(bbox: BBox): LatLngBounds {
  const [minLon, minLat, maxLon, maxLat] = bbox;
  return [
    [minLat, minLon],
    [maxLat, maxLon],
  ];
}

export function bboxContains(bbox: BBox, point: LonLat): boolean {
  return point.lon >= bbox[0] && point.lon <= bbox[2] && point.lat >= bbox[1] && point.lat <= bbox[3];
}
