import { describe, expect, it } from 'vitest';
import { buildTrendChart, monthRange, TREND_PALETTE } from './trend-chart';

describe('monthRange', () => {
  it('spans a year boundary', () => {
    expect(monthRange('2023-11', '2024-02')).toEqual(['2023-11', '2023-12', '2024-01', '2024-02']);
  });

  it('is empty for malformed months', () => {
    expect(monthRange('2024-13', '2024-14')).toEqual([]);
  });
});

describe('buildTrendChart', () => {
  const rows = [
    { month: '2024-01', count: 5, group: 'Total crime' },
    { month: '2024-03', count: 2, group: 'Total crime' },
    { month: '2024-01', count: 4, group: 'Dark Areas' },
    { month: '2024-03', count: 1, group: 'Well Lit' },
  ];

  it('draws one line per group in first-appearance order', () => {
    const chart = buildTrendChart(rows, 'Monthly Crime Statistics');

    expect(chart.title).toBe('Monthly Crime Statistics');
    expect(chart.groups).toEqual(['Total crime', 'Dark Areas', 'Well Lit']);
    expect(chart.colors).toEqual({
      'Total crime': '#1C56F6',
      'Dark Areas': '#226E9C',
      'Well Lit': '#3C93C2',
    });
  });

  it('has a tick for every month and leaves gaps empty', () => {
    const chart = buildTrendChart(rows, 'Monthly Crime Statistics');

    expect(chart.months).toEqual(['2024-01', '2024-02', '2024-03']);
    expect(chart.data[1]).toEqual({
      month: '2024-02',
      label: 'February 2024',
      values: { 'Total crime': null, 'Dark Areas': null, 'Well Lit': null },
    });
    expect(chart.data[2].values).toEqual({ 'Total crime': 2, 'Dark Areas': null, 'Well Lit': 1 });
  });

  it('leaves a fifth of headroom above the highest count', () => {
    const [low, high] = buildTrendChart(rows, 'Monthly Crime Statistics').yDomain;
    expect(low).toBe(0);
    expect(high).toBeCloseTo(6);
  });

  it('falls back to a unit axis with no data', () => {
    const chart = buildTrendChart([], 'Monthly Crime Statistics');
    expect(chart.yDomain).toEqual([0, 1]);
    expect(chart.months).toEqual([]);
    expect(chart.data).toEqual([]);
  });

  it('reuses the palette past five groups', () => {
    const many = ['a', 'b', 'c', 'd', 'e', 'f'].map((group) => ({ month: '2024-01', count: 1, group }));
    const chart = buildTrendChart(many, 'Monthly Crime Statistics');
    expect(chart.colors.f).toBe(TREND_PALETTE[0]);
    expect(chart.colors.e).toBe(TREND_PALETTE[4]);
  });
});
