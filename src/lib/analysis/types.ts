import type { LayerKey } from '../../../lib/geo/types';
import type { TrendChartModel } from '../charts/trend-chart';
import type { AddressMatch } from '../geocoding';
import type { InsightResult } from '../insights/types';
import type { MapModel } from '../map/map-model';

export interface DateRange {
  /** YYYY-MM-DD, inclusive */
  start: string;
  /** YYYY-MM-DD, inclusive */
  end: string;
}

/**
 * Everything the user has chosen on the page. Immutable; each change of
 * input is a new request.
 */
export interface AreaRequest {
  readonly query: string;
  readonly radiusMeters: number;
  readonly layers: ReadonlySet<LayerKey>;
  readonly crimeTypes: ReadonlySet<string>;
  /** Null means the full span of the fetched crime */
  readonly dateRange: DateRange | null;
  readonly feature: LayerKey | null;
}

/**
 * Conditions the user can fix by changing their inputs. Shown inline;
 * they never fail the request.
 */
export type NoticeKind =
  | 'no-match'
  | 'increase-buffer'
  | 'select-crime-data'
  | 'select-crime-type'
  | 'select-feature'
  | 'feature-not-in-layers'
  | 'no-filtered-crime';

export interface Notice {
  kind: NoticeKind;
  message: string;
}

export const NOTICE_MESSAGES: Record<NoticeKind, string> = {
  'no-match': 'No address match found',
  'increase-buffer': 'Please increase buffer size',
  'select-crime-data': 'Please select crime data',
  'select-crime-type': 'Please select crime type',
  'select-feature': 'Please select a feature to generate insight',
  'feature-not-in-layers': 'Please add the selected feature to the map layers',
  'no-filtered-crime': 'No crime matches the selected types and dates',
};

export function notice(kind: NoticeKind): Notice {
  return { kind, message: NOTICE_MESSAGES[kind] };
}

export interface CrimeSummary {
  /** Crime types present in the buffer, in first-appearance order */
  options: string[];
  /** Earliest and latest event dates in the buffer */
  extent: DateRange | null;
  total: number;
  filteredCount: number;
}

/** JSON body of GET /api/insight */
export interface AreaAnalysis {
  address: AddressMatch | null;
  radiusMeters: number;
  notices: Notice[];
  map: MapModel;
  crime: CrimeSummary | null;
  insight: { result: InsightResult; chart: TrendChartModel } | null;
}
