import type { CrimeEvent, HexCell } from '../types/crime';
import type { GridJoin } from './types';

/**
 * Number of events per cell id. Events without a cell id are not counted.
 */
export function countCrimesByCell(events: readonly CrimeEvent[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const { cellId } of events) {
    if (cellId === null) continue;
    counts.set(cellId, (counts.get(cellId) ?? 0) + 1);
  }
  return counts;
}

/**
 * Left join of the grid onto per-cell crime counts. Every grid cell appears
 * once; a cell with no events keeps `crimeCount: null`, which is distinct
 * from a recorded zero.
 */
export function joinGridWithCrimes(grid: readonly HexCell[], counts: ReadonlyMap<string, number>): GridJoin {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  const cells: GridJoin['cells'] = [];

  for (const cell of grid) {
    if (seen.has(cell.cellId)) {
      duplicates.add(cell.cellId);
      continue;
    }
    seen.add(cell.cellId);
    cells.push({ cell, crimeCount: counts.get(cell.cellId) ?? null });
  }

  return { cells, duplicateCellIds: [...duplicates] };
}
