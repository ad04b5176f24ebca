import type { Feature, Geometry, Polygon } from 'geojson';
import { cellToLatLng, latLngToCell } from 'h3-js';
import { LAYERS, type GeoFeatureTable, type GeometryKind, type LatLngBounds, type LayerKey } from '../../../lib/geo/types';
import { formatDate } from '../../../lib/utils/formatters';
import { bboxToLatLngBounds, type BufferGeometry } from '../geo/buffer';
import type { AddressMatch } from '../geocoding';
import type { CrimeEvent } from '../types/crime';

export const DEFAULT_CENTER: [number, number] = [52.4814, -1.8998];
export const DEFAULT_ZOOM = 14;
export const ADDRESS_ZOOM = 16;
export const MAX_ZOOM = 19;

/** Zoom from which every crime is drawn on its own */
export const UNCLUSTERED_ZOOM = 18;

export interface PathStyle {
  color: string;
  fillColor: string;
  weight: number;
  fillOpacity: number;
  fill: boolean;
  /** Circle marker radius in pixels, point layers only */
  radius?: number;
}

type FeatureLayerKey = Exclude<LayerKey, 'crime'>;

export const LAYER_STYLES: Record<LayerKey, PathStyle> = {
  landUse: { color: '#f3f2f2', fillColor: '#FADADD', weight: 1, fillOpacity: 1, fill: true },
  greenspace: { color: '#f3f2f2', fillColor: '#cee967', weight: 1, fillOpacity: 1, fill: true },
  buildings: { color: '#f3f2f2', fillColor: '#a39f9c', weight: 1, fillOpacity: 1, fill: true },
  streetLights: { color: '#000000', fillColor: '#ffbe0a', weight: 1, fillOpacity: 0.6, fill: true, radius: 4 },
  crime: { color: '#1C56F6', fillColor: '#1C56F6', weight: 0.5, fillOpacity: 1, fill: true, radius: 6 },
};

export const BUFFER_STYLE: PathStyle = {
  color: '#1C56F6',
  fillColor: '#1C56F6',
  weight: 2,
  fillOpacity: 0.2,
  fill: false,
};

/** Bottom to top */
export const DRAW_ORDER: LayerKey[] = ['landUse', 'greenspace', 'buildings', 'streetLights', 'crime'];

// Attribute shown on hover for each feature layer
const TOOLTIP_FIELDS: Record<FeatureLayerKey, { field: string; fallback: string }> = {
  landUse: { field: 'description', fallback: 'Description' },
  greenspace: { field: 'function', fallback: 'Description' },
  buildings: { field: 'description', fallback: 'Description' },
  streetLights: { field: 'description', fallback: 'Street Light' },
};

export interface TileLayerSpec {
  id: 'road' | 'light';
  name: string;
  url: string;
  attribution: string;
}

const TILE_ATTRIBUTION = '&copy; <a href="https://www.ordnancesurvey.co.uk/">Ordnance Survey</a>';
const TILE_BASE = 'https://api.os.uk/maps/raster/v1/zxy';

export type MapView =
  | { kind: 'center'; center: [number, number]; zoom: number }
  | { kind: 'bounds'; bounds: LatLngBounds };

export interface MapFeature {
  id: string;
  geometry: Geometry;
  tooltip: string;
}

export interface MapLayerModel {
  key: FeatureLayerKey;
  label: string;
  geometry: GeometryKind;
  style: PathStyle;
  features: MapFeature[];
}

export interface CrimePoint {
  id: string;
  position: [number, number];
  tooltip: string;
}

export interface LegendEntry {
  label: string;
  color: string;
  symbol: 'square' | 'circle' | 'line';
}

export interface MapModel {
  view: MapView;
  maxZoom: number;
  tiles: TileLayerSpec[];
  marker: { position: [number, number]; label: string } | null;
  buffer: { polygon: Feature<Polygon>; radiusMeters: number; style: PathStyle } | null;
  layers: MapLayerModel[];
  crime: { style: PathStyle; points: CrimePoint[] } | null;
  legend: LegendEntry[];
}

export interface MapModelInput {
  address: AddressMatch | null;
  buffer: BufferGeometry | null;
  /** Fetched feature layers; only these are drawn */
  layers: Partial<Record<FeatureLayerKey, GeoFeatureTable>>;
  /** Crime events to plot, or null when the crime layer is off */
  crimeEvents: readonly CrimeEvent[] | null;
  tileApiKey: string | null;
}

export function tileLayers(apiKey: string | null): TileLayerSpec[] {
  if (!apiKey) return [];
  const key = encodeURIComponent(apiKey);
  return [
    { id: 'road', name: 'OS Maps Road', url: `${TILE_BASE}/Road_3857/{z}/{x}/{y}.png?key=${key}`, attribution: TILE_ATTRIBUTION },
    { id: 'light', name: 'OS Maps Light', url: `${TILE_BASE}/Light_3857/{z}/{x}/{y}.png?key=${key}`, attribution: TILE_ATTRIBUTION },
  ];
}

function tooltipFor(layer: FeatureLayerKey, properties: Record<string, unknown>): string {
  const { field, fallback } = TOOLTIP_FIELDS[layer];
  const value = properties[field];
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

export function crimeTooltip(event: CrimeEvent): string {
  const date = event.date ? formatDate(event.date) : 'Date unknown';
  return `${event.type ?? 'Crime type'} — ${date}`;
}

function toLayerModel(key: FeatureLayerKey, table: GeoFeatureTable): MapLayerModel {
  return {
    key,
    label: LAYERS[key].label,
    geometry: LAYERS[key].geometry,
    style: LAYER_STYLES[key],
    features: table.features.map((feature, index) => ({
      id: `${key}-${index}`,
      geometry: feature.geometry,
      tooltip: tooltipFor(key, feature.properties),
    })),
  };
}

/**
 * Legend entries for the layers on the map, in draw order, with the buffer last.
 */
export function buildLegend(active: ReadonlySet<LayerKey>, hasBuffer: boolean): LegendEntry[] {
  const entries: LegendEntry[] = DRAW_ORDER.filter((key) => active.has(key)).map((key) => ({
    label: LAYERS[key].label,
    color: LAYER_STYLES[key].fillColor,
    symbol: LAYERS[key].geometry === 'polygon' ? 'square' : 'circle',
  }));
  if (hasBuffer) entries.push({ label: 'Buffer', color: BUFFER_STYLE.color, symbol: 'line' });
  return entries;
}

export function mapView(address: AddressMatch | null, buffer: BufferGeometry | null): MapView {
  if (!address) return { kind: 'center', center: DEFAULT_CENTER, zoom: DEFAULT_ZOOM };
  if (buffer && buffer.radiusMeters > 0) return { kind: 'bounds', bounds: bboxToLatLngBounds(buffer.bbox) };
  return { kind: 'center', center: [address.location.lat, address.location.lon], zoom: ADDRESS_ZOOM };
}

/**
 * Identity of a view by value. Filter changes rebuild the model with an
 * equal view, and the map must not re-fit for those.
 */
export function viewKey(view: MapView): string {
  if (view.kind === 'bounds') return `bounds:${view.bounds.flat().join(',')}`;
  return `center:${view.center.join(',')}@${view.zoom}`;
}

/**
 * Everything the map component draws, derived from the analysis result.
 */
export function buildMapModel(input: MapModelInput): MapModel {
  const { address, tileApiKey } = input;
  const buffer = input.buffer && input.buffer.radiusMeters > 0 ? input.buffer : null;

  const layers: MapLayerModel[] = [];
  const active = new Set<LayerKey>();
  for (const key of DRAW_ORDER) {
    if (key === 'crime') continue;
    const table = input.layers[key];
    if (!table) continue;
    layers.push(toLayerModel(key, table));
    active.add(key);
  }

  let crime: MapModel['crime'] = null;
  if (input.crimeEvents) {
    active.add('crime');
    crime = {
      style: LAYER_STYLES.crime,
      points: input.crimeEvents.map((event): CrimePoint => ({
        id: event.id,
        position: [event.lat, event.lon],
        tooltip: crimeTooltip(event),
      })),
    };
  }

  return {
    view: mapView(address, buffer),
    maxZoom: MAX_ZOOM,
    tiles: tileLayers(tileApiKey),
    marker: address ? { position: [address.location.lat, address.location.lon], label: address.address } : null,
    buffer: buffer ? { polygon: buffer.polygon, radiusMeters: buffer.radiusMeters, style: BUFFER_STYLE } : null,
    layers,
    crime,
    legend: buildLegend(active, buffer !== null),
  };
}

export interface CrimeCluster {
  id: string;
  position: [number, number];
  points: CrimePoint[];
}

/**
 * H3 resolution used to group crime at a map zoom, or null once points are
 * drawn individually. Roughly one cell per 80px marker footprint.
 */
export function clusterResolution(zoom: number): number | null {
  if (zoom >= UNCLUSTERED_ZOOM) return null;
  return Math.min(10, Math.max(4, Math.floor(zoom) - 7));
}

/**
 * Group crime points into H3 cells for the current zoom. A cell holding a
 * single point is placed at that point; larger groups sit at the cell centre.
 */
export function clusterCrimePoints(points: readonly CrimePoint[], zoom: number): CrimeCluster[] {
  const resolution = clusterResolution(zoom);
  if (resolution === null) {
    return points.map((point): CrimeCluster => ({ id: point.id, position: point.position, points: [point] }));
  }

  const groups = new Map<string, CrimePoint[]>();
  for (const point of points) {
    const cell = latLngToCell(point.position[0], point.position[1], resolution);
    const group = groups.get(cell);
    if (group) group.push(point);
    else groups.set(cell, [point]);
  }

  return [...groups.entries()].map(([cell, members]): CrimeCluster => {
    if (members.length === 1) return { id: members[0].id, position: members[0].position, points: members };
    const [lat, lng] = cellToLatLng(cell);
    return { id: cell, position: [lat, lng], points: members };
  });
}
