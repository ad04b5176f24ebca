import type { CellAttribute, HexCell } from '../types/crime';

export type ThemeKey = 'lighting' | 'greenspace' | 'buildings' | 'landUseSites';

/**
 * Comparison against a cell attribute count. All given bounds must hold.
 */
export interface CountThreshold {
  eq?: number;
  gte?: number;
  gt?: number;
  lte?: number;
}

export interface BucketDefinition {
  key: string;
  /** Series label on the chart */
  label: string;
  /** Heading on the headline stat card */
  statLabel: string;
  attribute: CellAttribute;
  threshold: CountThreshold;
}

export interface ThemeDefinition {
  key: ThemeKey;
  title: string;
  /**
   * Exclusive themes partition the crime-present cells: every cell with a
   * count for the attribute falls in exactly one bucket.
   */
  exclusive: boolean;
  buckets: BucketDefinition[];
}

export interface CrimeFilter {
  crimeTypes: ReadonlySet<string>;
  /** Inclusive calendar dates, YYYY-MM-DD */
  dateRange?: { start: string; end: string };
}

export interface JoinedCell {
  cell: HexCell;
  /** Null when no filtered event fell in the cell */
  crimeCount: number | null;
}

export interface GridJoin {
  cells: JoinedCell[];
  /** Cell ids seen more than once in the grid; only the first row is kept */
  duplicateCellIds: string[];
}

/** One row of the long-format chart table */
export interface MonthlyCount {
  /** YYYY-MM */
  month: string;
  count: number;
  group: string;
}

export interface BucketTotal {
  key: string;
  label: string;
  statLabel: string;
  total: number;
  cellCount: number;
}

export interface InsightResult {
  theme: ThemeKey | null;
  title: string;
  /** Overall series first, then each bucket in definition order */
  series: MonthlyCount[];
  totals: BucketTotal[];
  /** Count of the filtered events */
  overallTotal: number;
  /** Sum of crime counts over the joined, crime-present cells */
  joinedTotal: number;
}
