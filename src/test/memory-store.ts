import type { SpatialQuery } from '@/lib/store/spatial-query';
import type { SpatialStore, StoreRow } from '@/lib/store/types';

/**
 * In-process SpatialStore for tests. Returns every row registered for the
 * query's source (no distance filtering) and records the queries it served.
 */
export class MemorySpatialStore implements SpatialStore {
  readonly queries: SpatialQuery[] = [];
  private failures = new Map<string, Error>();

  constructor(private readonly tables: Record<string, StoreRow[]> = {}) {}

  setTable(source: string, rows: StoreRow[]): void {
    this.tables[source] = rows;
  }

  failOn(source: string, error: Error): void {
    this.failures.set(source, error);
  }

  recover(source: string): void {
    this.failures.delete(source);
  }

  async query(query: SpatialQuery): Promise<StoreRow[]> {
    this.queries.push(query);
    const failure = this.failures.get(query.source);
    if (failure) throw failure;
    return (this.tables[query.source] ?? []).map((row) => ({ ...row }));
  }

  countFor(source: string): number {
    return this.queries.filter((query) => query.source === source).length;
  }
}

export function pointGeography(lon: number, lat: number): string {
  return JSON.stringify({ type: 'Point', coordinates: [lon, lat] });
}

export function squareGeography(lon: number, lat: number, size = 0.001): string {
  return JSON.stringify({
    type: 'Polygon',
    coordinates: [[
      [lon, lat],
      [lon + size, lat],
      [lon + size, lat + size],
      [lon, lat + size],
      [lon, lat],
    ]],
  });
}
