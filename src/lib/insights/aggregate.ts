import type { LayerKey } from '../../../lib/geo/types';
import type { CrimeEvent, HexCell } from '../types/crime';
import { toMonth } from './filter';
import { countCrimesByCell, joinGridWithCrimes } from './join';
import { FEATURE_THEMES, THEMES, matchesThreshold } from './themes';
import type { BucketTotal, InsightResult, JoinedCell, MonthlyCount, ThemeDefinition } from './types';

export const OVERALL_GROUP = 'Total crime';

/**
 * Events per calendar month, ascending, tagged with `group`.
 * Months without events are omitted.
 */
export function monthlySeries(events: readonly CrimeEvent[], group: string): MonthlyCount[] {
  const counts = new Map<string, number>();
  for (const { date } of events) {
    if (date === null) continue;
    const month = toMonth(date);
    counts.set(month, (counts.get(month) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([month, count]) => ({ month, count, group }));
}

/**
 * Bucket totals and series for one theme over the crime-present cells of a join.
 */
export function aggregateTheme(
  theme: ThemeDefinition,
  joined: readonly JoinedCell[],
  filtered: readonly CrimeEvent[],
): { totals: BucketTotal[]; series: MonthlyCount[] } {
  const present = joined.filter((entry): entry is JoinedCell & { crimeCount: number } => entry.crimeCount !== null);
  const totals: BucketTotal[] = [];
  const series: MonthlyCount[] = [];

  for (const bucket of theme.buckets) {
    const cells = present.filter(({ cell }) => matchesThreshold(cell[bucket.attribute], bucket.threshold));
    const cellIds = new Set(cells.map(({ cell }) => cell.cellId));

    totals.push({
      key: bucket.key,
      label: bucket.label,
      statLabel: bucket.statLabel,
      total: cells.reduce((sum, { crimeCount }) => sum + crimeCount, 0),
      cellCount: cells.length,
    });

    const inBucket = filtered.filter((event) => event.cellId !== null && cellIds.has(event.cellId));
    series.push(...monthlySeries(inBucket, bucket.label));
  }

  return { totals, series };
}

/**
 * Full insight for a feature: join the filtered events onto the grid, bucket
 * the crime-present cells by the feature's theme and assemble the long-format
 * series with the overall series first.
 */
export function computeInsight(
  feature: LayerKey,
  grid: readonly HexCell[],
  filtered: readonly CrimeEvent[],
): { insight: InsightResult; duplicateCellIds: string[] } {
  const { cells, duplicateCellIds } = joinGridWithCrimes(grid, countCrimesByCell(filtered));
  const joinedTotal = cells.reduce((sum, { crimeCount }) => sum + (crimeCount ?? 0), 0);
  const overall = monthlySeries(filtered, OVERALL_GROUP);

  const themeKey = FEATURE_THEMES[feature];
  if (themeKey === null) {
    return {
      insight: { theme: null, title: 'Crime', series: overall, totals: [], overallTotal: filtered.length, joinedTotal },
      duplicateCellIds,
    };
  }

  const theme = THEMES[themeKey];
  const { totals, series } = aggregateTheme(theme, cells, filtered);
  return {
    insight: {
      theme: theme.key,
      title: theme.title,
      series: [...overall, ...series],
      totals,
      overallTotal: filtered.length,
      joinedTotal,
    },
    duplicateCellIds,
  };
}
