/**
 * Crime events and the environmental hex grid they are joined to.
 */

/**
 * One recorded crime, located by a point and linked to the H3 (res 11)
 * cell it falls in.
 */
export interface CrimeEvent {
  id: string;
  type: string | null;
  /** Calendar date of the event, YYYY-MM-DD; null when the source date is unusable */
  date: string | null;
  /** Timestamp as stored, for tooltips */
  timestamp: string | null;
  cellId: string | null;
  lon: number;
  lat: number;
}

/**
 * Per-cell environmental counts. A null count means the grid has no value
 * for that attribute; such a cell matches no bucket on that attribute.
 */
export interface HexCellCounts {
  lightCount: number | null;
  greenspaceCount: number | null;
  residentialBuildingCount: number | null;
  retailBuildingCount: number | null;
  mixedUseCount: number | null;
  residentialSiteCount: number | null;
  retailSiteCount: number | null;
  industrialSiteCount: number | null;
}

export type CellAttribute = keyof HexCellCounts;

export interface HexCell extends HexCellCounts {
  cellId: string;
}

/**
 * Grid row columns (snake_case as stored)
 */
export interface HexCellRow {
  h3_cell_11: string;
  light_count: number | string | null;
  greenspace_count: number | string | null;
  residential_building_count: number | string | null;
  retail_building_count: number | string | null;
  mixed_use_count: number | string | null;
  residential_site_count: number | string | null;
  retail_site_count: number | string | null;
  industrial_site_count: number | string | null;
}

export const CELL_ATTRIBUTE_COLUMNS: Record<CellAttribute, Exclude<keyof HexCellRow, 'h3_cell_11'>> = {
  lightCount: 'light_count',
  greenspaceCount: 'greenspace_count',
  residentialBuildingCount: 'residential_building_count',
  retailBuildingCount: 'retail_building_count',
  mixedUseCount: 'mixed_use_count',
  residentialSiteCount: 'residential_site_count',
  retailSiteCount: 'retail_site_count',
  industrialSiteCount: 'industrial_site_count',
};
