import * as turf from '@turf/turf';
import type { Geometry } from 'geojson';
import type { GeoFeatureTable } from '../../../lib/geo/types';
import { GridDataError } from '../errors';
import {
  CELL_ATTRIBUTE_COLUMNS,
  type CellAttribute,
  type CrimeEvent,
  type HexCell,
} from '../types/crime';

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Calendar date (YYYY-MM-DD) of a stored timestamp, time of day discarded.
 * Returns null for anything that is not a real date.
 */
export function toCalendarDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const match = CALENDAR_DATE.exec(value.trim());
  if (!match) return null;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return `${year}-${month}-${day}`;
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() === '' ? null : value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * A stored feature count: null when the column is empty, otherwise a
 * non-negative integer. Anything else would fall between the bucket
 * thresholds and silently drop crime from a theme, so it fails the table.
 */
function toCount(value: unknown, cellId: string, column: string): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;

  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new GridDataError(cellId, column, value);
  }
  return parsed;
}

function representativePoint(geometry: Geometry): [number, number] {
  if (geometry.type === 'Point') {
    const [lon, lat] = geometry.coordinates;
    return [lon, lat];
  }
  const [lon, lat] = turf.centroid(geometry).geometry.coordinates;
  return [lon, lat];
}

/**
 * Map the crime table's rows to events. Non-point geometries are placed at
 * their centroid.
 */
export function toCrimeEvents(table: GeoFeatureTable): CrimeEvent[] {
  return table.features.map((feature, index) => {
    const props = feature.properties;
    const [lon, lat] = representativePoint(feature.geometry);
    return {
      id: toText(props.id) ?? String(index),
      type: toText(props.crime_type),
      date: toCalendarDate(props.crime_date),
      timestamp: toText(props.crime_date),
      cellId: toText(props.h3_11),
      lon,
      lat,
    };
  });
}

/**
 * Map the grid table's rows to cells. Rows without a cell id cannot take
 * part in the join and are left out; a malformed count throws `GridDataError`.
 */
export function toHexCells(table: GeoFeatureTable): HexCell[] {
  const cells: HexCell[] = [];
  for (const feature of table.features) {
    const cellId = toText(feature.properties.h3_cell_11);
    if (cellId === null) continue;

    const count = (attribute: CellAttribute) => {
      const column = CELL_ATTRIBUTE_COLUMNS[attribute];
      return toCount(feature.properties[column], cellId, column);
    };
    cells.push({
      cellId,
      lightCount: count('lightCount'),
      greenspaceCount: count('greenspaceCount'),
      residentialBuildingCount: count('residentialBuildingCount'),
      retailBuildingCount: count('retailBuildingCount'),
      mixedUseCount: count('mixedUseCount'),
      residentialSiteCount: count('residentialSiteCount'),
      retailSiteCount: count('retailSiteCount'),
      industrialSiteCount: count('industrialSiteCount'),
    });
  }
  return cells;
}
