import { describe, expect, it } from 'vitest';
import { parseGeography } from './geometry';

const SQUARE = [[[-1.9, 52.48], [-1.89, 52.48], [-1.89, 52.49], [-1.9, 52.49], [-1.9, 52.48]]];

describe('parseGeography', () => {
  it('decodes GeoJSON text', () => {
    const result = parseGeography('{"type":"Point","coordinates":[-1.9,52.48]}');
    expect(result).toEqual({ ok: true, geometry: { type: 'Point', coordinates: [-1.9, 52.48] } });
  });

  it('accepts an already-decoded polygon', () => {
    const result = parseGeography({ type: 'Polygon', coordinates: SQUARE });
    expect(result.ok).toBe(true);
  });

  it('rejects null', () => {
    expect(parseGeography(null)).toEqual({ ok: false, reason: 'geography is null' });
  });

  it('rejects malformed text', () => {
    const result = parseGeography('POINT(');
    expect(result.ok).toBe(false);
  });

  it('rejects an unclosed ring', () => {
    const open = [[[-1.9, 52.48], [-1.89, 52.48], [-1.89, 52.49], [-1.9, 52.49]]];
    expect(parseGeography({ type: 'Polygon', coordinates: open })).toEqual({
      ok: false,
      reason: 'Polygon rings must be closed with at least four positions',
    });
  });

  it('rejects coordinates outside lon/lat range', () => {
    const result = parseGeography({ type: 'Point', coordinates: [406000, 286500] });
    expect(result).toEqual({ ok: false, reason: 'Point needs one [lon, lat] position' });
  });

  it('rejects unsupported types', () => {
    expect(parseGeography({ type: 'GeometryCollection', geometries: [] })).toEqual({
      ok: false,
      reason: 'unsupported geometry type "GeometryCollection"',
    });
  });
});
