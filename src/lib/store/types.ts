import type { SpatialQuery } from './spatial-query';

/**
 * A raw row as returned by the store: attribute columns plus a
 * serialized `geography` column.
 */
export type StoreRow = Record<string, unknown>;

export const GEOGRAPHY_COLUMN = 'geography';

/**
 * Executes spatial queries against the analytical store.
 * Read-only; implementations must throw on failure rather than return
 * an empty row set.
 */
export interface SpatialStore {
  query(query: SpatialQuery): Promise<StoreRow[]>;
}
