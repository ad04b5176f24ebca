import { scaleLinear, scaleOrdinal } from 'd3-scale';
import { formatMonth } from '../../../lib/utils/formatters';
import type { MonthlyCount } from '../insights/types';

/** Line colours, assigned to groups in order of first appearance */
export const TREND_PALETTE = ['#1C56F6', '#226E9C', '#3C93C2', '#9EC9E2', '#E4F1F7'] as const;

const HEADROOM = 1.2;

export interface TrendPoint {
  /** YYYY-MM */
  month: string;
  label: string;
  /** Count per group; null where the group has no row for the month */
  values: Record<string, number | null>;
}

export interface TrendChartModel {
  title: string;
  groups: string[];
  months: string[];
  data: TrendPoint[];
  yDomain: [number, number];
  yTicks: number[];
  colors: Record<string, string>;
}

function parseMonth(month: string): { year: number; month: number } | null {
  const match = /^(\d{4})-(\d{2})$/.exec(month);
  if (!match) return null;
  const value = { year: Number(match[1]), month: Number(match[2]) };
  return value.month >= 1 && value.month <= 12 ? value : null;
}

/**
 * Every calendar month from `first` to `last` inclusive, as YYYY-MM.
 */
export function monthRange(first: string, last: string): string[] {
  const start = parseMonth(first);
  const end = parseMonth(last);
  if (!start || !end) return [];

  const months: string[] = [];
  let { year, month } = start;
  while (year < end.year || (year === end.year && month <= end.month)) {
    months.push(`${year}-${String(month).padStart(2, '0')}`);
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
  return months;
}

/**
 * Chart model for a long-format (month, count, group) table: one line per
 * group, one x tick per calendar month between the first and last month
 * present. Groups past the fifth reuse the palette from the start.
 */
export function buildTrendChart(rows: readonly MonthlyCount[], title: string): TrendChartModel {
  const groups: string[] = [];
  const byGroup = new Map<string, Map<string, number>>();
  let max = 0;

  for (const row of rows) {
    let counts = byGroup.get(row.group);
    if (!counts) {
      counts = new Map();
      byGroup.set(row.group, counts);
      groups.push(row.group);
    }
    counts.set(row.month, (counts.get(row.month) ?? 0) + row.count);
    max = Math.max(max, counts.get(row.month) ?? 0);
  }

  const present = rows.map((row) => row.month).sort();
  const months = present.length > 0 ? monthRange(present[0], present[present.length - 1]) : [];

  const data = months.map((month) => {
    const values: Record<string, number | null> = {};
    for (const group of groups) {
      values[group] = byGroup.get(group)?.get(month) ?? null;
    }
    return { month, label: formatMonth(month, true), values };
  });

  const yDomain: [number, number] = max > 0 ? [0, max * HEADROOM] : [0, 1];
  const color = scaleOrdinal<string, string>().domain(groups).range(TREND_PALETTE);
  const colors: Record<string, string> = {};
  for (const group of groups) colors[group] = color(group);

  return {
    title,
    groups,
    months,
    data,
    yDomain,
    yTicks: scaleLinear().domain(yDomain).ticks(5),
    colors,
  };
}
