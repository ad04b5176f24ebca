/**
 * Geographic types shared by the store, the insight engine and the map.
 *
 * Coordinates follow GeoJSON order throughout: [lon, lat].
 */

import type { Feature, Geometry, GeoJsonProperties } from 'geojson';

export type CrsCode = 'EPSG:27700' | 'EPSG:4326' | 'EPSG:3857';

export interface LonLat {
  lon: number;
  lat: number;
}

/** [minLon, minLat, maxLon, maxLat] */
export type BBox = [number, number, number, number];

/** Leaflet-style bounds: [[south, west], [north, east]] */
export type LatLngBounds = [[number, number], [number, number]];

/**
 * Thematic layers the user can switch on.
 * `crime` doubles as the event source for the insight engine.
 */
export type LayerKey = 'buildings' | 'streetLights' | 'landUse' | 'greenspace' | 'crime';

export type GeometryKind = 'polygon' | 'point';

export interface LayerConfig {
  key: LayerKey;
  label: string;
  geometry: GeometryKind;
}

export const LAYERS: Record<LayerKey, LayerConfig> = {
  buildings: { key: 'buildings', label: 'Buildings', geometry: 'polygon' },
  streetLights: { key: 'streetLights', label: 'Street Lights', geometry: 'point' },
  landUse: { key: 'landUse', label: 'Land Use', geometry: 'polygon' },
  greenspace: { key: 'greenspace', label: 'Greenspace', geometry: 'polygon' },
  crime: { key: 'crime', label: 'Crime', geometry: 'point' },
};

/** Sidebar order */
export const LAYER_KEYS: LayerKey[] = ['buildings', 'streetLights', 'landUse', 'greenspace', 'crime'];

export function isLayerKey(value: string): value is LayerKey {
  return Object.prototype.hasOwnProperty.call(LAYERS, value);
}

/**
 * A table of features fetched for one spatial query.
 * Every feature carries a parsed, validated geometry; the serialized
 * geography column is not part of `properties`.
 */
export interface GeoFeatureTable<P extends GeoJsonProperties = Record<string, unknown>> {
  source: string;
  crs: 'EPSG:4326';
  features: Array<Feature<Geometry, P>>;
}
