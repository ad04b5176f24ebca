import { describe, expect, it } from 'vitest';
import { crimeEvent, hexCell } from '@/test/fixtures';
import type { CrimeEvent, HexCell } from '@/lib/types/crime';
import { aggregateTheme, computeInsight, monthlySeries, OVERALL_GROUP } from './aggregate';
import { countCrimesByCell, joinGridWithCrimes } from './join';
import { THEMES } from './themes';

function eventsIn(cellId: string, dates: string[]): CrimeEvent[] {
  return dates.map((date) => crimeEvent({ cellId, date }));
}

describe('monthlySeries', () => {
  it('groups by calendar month in ascending order', () => {
    const events = [
      crimeEvent({ date: '2024-03-01' }),
      crimeEvent({ date: '2023-12-31' }),
      crimeEvent({ date: '2024-03-31' }),
    ];

    expect(monthlySeries(events, 'Dark Areas')).toEqual([
      { month: '2023-12', count: 1, group: 'Dark Areas' },
      { month: '2024-03', count: 2, group: 'Dark Areas' },
    ]);
  });

  it('is empty for no events', () => {
    expect(monthlySeries([], OVERALL_GROUP)).toEqual([]);
  });
});

describe('computeInsight', () => {
  it('splits crime by lighting level', () => {
    const grid = [hexCell('A', { lightCount: 0 }), hexCell('B', { lightCount: 1 }), hexCell('C', { lightCount: 5 })];
    const filtered = [
      ...eventsIn('A', ['2024-01-03', '2024-01-09', '2024-02-11']),
      ...eventsIn('B', ['2024-01-20', '2024-02-02']),
    ];

    const { insight } = computeInsight('streetLights', grid, filtered);

    expect(insight.theme).toBe('lighting');
    expect(insight.totals.map(({ label, total }) => [label, total])).toEqual([
      ['Dark Areas', 3],
      ['Slightly lit', 2],
      ['Well Lit', 0],
    ]);
    expect(insight.overallTotal).toBe(5);
    expect(insight.series).toEqual([
      { month: '2024-01', count: 3, group: 'Total crime' },
      { month: '2024-02', count: 2, group: 'Total crime' },
      { month: '2024-01', count: 2, group: 'Dark Areas' },
      { month: '2024-02', count: 1, group: 'Dark Areas' },
      { month: '2024-01', count: 1, group: 'Slightly lit' },
      { month: '2024-02', count: 1, group: 'Slightly lit' },
    ]);
  });

  it('gives only the overall series for the crime feature', () => {
    const grid = [hexCell('A')];
    const { insight } = computeInsight('crime', grid, eventsIn('A', ['2024-05-05']));

    expect(insight).toEqual({
      theme: null,
      title: 'Crime',
      series: [{ month: '2024-05', count: 1, group: 'Total crime' }],
      totals: [],
      overallTotal: 1,
      joinedTotal: 1,
    });
  });

  it('counts events outside the grid in the overall series only', () => {
    const grid = [hexCell('A', { greenspaceCount: 2 })];
    const filtered = [...eventsIn('A', ['2024-01-01']), ...eventsIn('outside', ['2024-01-02']), crimeEvent({ cellId: null })];

    const { insight } = computeInsight('greenspace', grid, filtered);

    expect(insight.overallTotal).toBe(3);
    expect(insight.joinedTotal).toBe(1);
    expect(insight.totals.map(({ total }) => total)).toEqual([0, 1]);
  });

  it('passes duplicated grid cells back to the caller', () => {
    const { duplicateCellIds } = computeInsight('buildings', [hexCell('A'), hexCell('A')], []);
    expect(duplicateCellIds).toEqual(['A']);
  });
});

describe('aggregateTheme', () => {
  const grid: HexCell[] = [
    hexCell('c1', { lightCount: 0, greenspaceCount: 0, residentialBuildingCount: 2, retailBuildingCount: 1 }),
    hexCell('c2', { lightCount: 1, greenspaceCount: 3, residentialBuildingCount: 1 }),
    hexCell('c3', { lightCount: 2, greenspaceCount: 0, mixedUseCount: 4 }),
    hexCell('c4', { lightCount: 3, greenspaceCount: 1, residentialSiteCount: 1, industrialSiteCount: 1 }),
    hexCell('c5', { lightCount: 12, greenspaceCount: 0, retailBuildingCount: 2, retailSiteCount: 1 }),
    hexCell('c6', { lightCount: 0, greenspaceCount: 5 }),
  ];
  const filtered = [
    ...eventsIn('c1', ['2024-01-01', '2024-01-15', '2024-03-02']),
    ...eventsIn('c2', ['2024-02-01']),
    ...eventsIn('c3', ['2024-02-11', '2024-02-12']),
    ...eventsIn('c4', ['2024-03-30']),
    ...eventsIn('c5', ['2024-01-09', '2024-04-01', '2024-04-02', '2024-04-03']),
  ];
  const { cells } = joinGridWithCrimes(grid, countCrimesByCell(filtered));
  const joinedTotal = 11;

  it.each(['lighting', 'greenspace'] as const)('partitions the joined total for %s', (key) => {
    const { totals } = aggregateTheme(THEMES[key], cells, filtered);
    expect(totals.reduce((sum, { total }) => sum + total, 0)).toBe(joinedTotal);
  });

  it.each(['buildings', 'landUseSites'] as const)('bounds each %s bucket by the joined total', (key) => {
    const { totals } = aggregateTheme(THEMES[key], cells, filtered);
    for (const { total } of totals) {
      expect(total).toBeLessThanOrEqual(joinedTotal);
    }
  });

  it('lets a cell fall in several building buckets', () => {
    const { totals } = aggregateTheme(THEMES.buildings, cells, filtered);
    expect(totals.map(({ key, total, cellCount }) => [key, total, cellCount])).toEqual([
      ['residential', 4, 2],
      ['retail', 7, 2],
      ['mixedUse', 2, 1],
    ]);
  });

  it('ignores cells without crime', () => {
    const { totals } = aggregateTheme(THEMES.greenspace, cells, filtered);
    expect(totals.find(({ key }) => key === 'nearGreenspace')).toEqual({
      key: 'nearGreenspace',
      label: 'Near greenspace',
      statLabel: 'Crimes near greenspaces',
      total: 2,
      cellCount: 2,
    });
  });

  it('gives a bucket series that sums to the bucket total', () => {
    const { totals, series } = aggregateTheme(THEMES.lighting, cells, filtered);
    for (const { label, total } of totals) {
      const sum = series.filter(({ group }) => group === label).reduce((acc, { count }) => acc + count, 0);
      expect(sum).toBe(total);
    }
  });
});
