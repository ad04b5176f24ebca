/**
 * Parsing and validation of serialized geography values.
 *
 * The store returns each row's geography as GeoJSON, either as text or as an
 * already-decoded object. Anything that is not a well-formed WGS84 geometry
 * is rejected with a reason string; the caller decides how to fail.
 */

import type { Geometry, Position } from 'geojson';

export type GeometryParseResult =
  | { ok: true; geometry: Geometry }
  | { ok: false; reason: string };

// ────────────────────────── Position helpers ──────────────────────────

function isPosition(value: unknown): value is Position {
  if (!Array.isArray(value) || value.length < 2) return false;
  const [lon, lat] = value;
  if (typeof lon !== 'number' || typeof lat !== 'number') return false;
  if (!Number.isFinite(lon) || !Number.isFinite(lat)) return false;
  return lon >= -180 && lon <= 180 && lat >= -90 && lat <= 90;
}

function isLine(value: unknown): value is Position[] {
  return Array.isArray(value) && value.length >= 2 && value.every(isPosition);
}

function isRing(value: unknown): value is Position[] {
  if (!Array.isArray(value) || value.length < 4 || !value.every(isPosition)) return false;
  const first = value[0];
  const last = value[value.length - 1];
  return first[0] === last[0] && first[1] === last[1];
}

function isPolygonRings(value: unknown): value is Position[][] {
  return Array.isArray(value) && value.length > 0 && value.every(isRing);
}

// ────────────────────────── Geometry validation ──────────────────────────

export function validateGeometry(value: unknown): GeometryParseResult {
  if (!value || typeof value !== 'object') return { ok: false, reason: 'not an object' };

  const type = 'type' in value ? value.type : undefined;
  const coordinates = 'coordinates' in value ? value.coordinates : undefined;

  switch (type) {
    case 'Point':
      return isPosition(coordinates)
        ? { ok: true, geometry: { type, coordinates } }
        : { ok: false, reason: 'Point needs one [lon, lat] position' };
    case 'MultiPoint':
      return Array.isArray(coordinates) && coordinates.length > 0 && coordinates.every(isPosition)
        ? { ok: true, geometry: { type, coordinates } }
        : { ok: false, reason: 'MultiPoint needs at least one position' };
    case 'LineString':
      return isLine(coordinates)
        ? { ok: true, geometry: { type, coordinates } }
        : { ok: false, reason: 'LineString needs at least two positions' };
    case 'MultiLineString':
      return Array.isArray(coordinates) && coordinates.length > 0 && coordinates.every(isLine)
        ? { ok: true, geometry: { type, coordinates } }
        : { ok: false, reason: 'MultiLineString needs at least one line' };
    case 'Polygon':
      return isPolygonRings(coordinates)
        ? { ok: true, geometry: { type, coordinates } }
        : { ok: false, reason: 'Polygon rings must be closed with at least four positions' };
    case 'MultiPolygon':
      return Array.isArray(coordinates) && coordinates.length > 0 && coordinates.every(isPolygonRings)
        ? { ok: true, geometry: { type, coordinates } }
        : { ok: false, reason: 'MultiPolygon needs at least one valid polygon' };
    default:
      return { ok: false, reason: `unsupported geometry type ${JSON.stringify(type)}` };
  }
}

/**
 * Decode a geography column value (GeoJSON text or object).
 */
export function parseGeography(raw: unknown): GeometryParseResult {
  if (raw === null || raw === undefined) return { ok: false, reason: 'geography is null' };

  if (typeof raw === 'string') {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, reason: `not GeoJSON text (${message})` };
    }
    return validateGeometry(decoded);
  }

  return validateGeometry(raw);
}
