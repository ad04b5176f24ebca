/**
 * Shared formatting utilities for stat cards, tooltips and chart axes
 */

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

/**
 * Format a count with UK grouping, handling null/undefined
 * Returns en-dash for missing values
 */
export function formatNumber(val: number | null | undefined): string {
  if (val === null || val === undefined) return '–';
  return val.toLocaleString('en-GB');
}

/**
 * "2024-03" → "March"; with year: "March 2024".
 * Unparseable input is returned as given.
 */
export function formatMonth(month: string, withYear = false): string {
  const match = /^(\d{4})-(\d{2})$/.exec(month);
  if (!match) return month;
  const name = MONTH_NAMES[Number(match[2]) - 1];
  if (!name) return month;
  return withYear ? `${name} ${match[1]}` : name;
}

/** "2024-01-15" → "15/01/2024" */
export function formatDate(date: string): string {
  const parts = date.split('-');
  if (parts.length !== 3) return date;
  return `${parts[2]}/${parts[1]}/${parts[0]}`;
}

export function formatMeters(meters: number): string {
  return `${formatNumber(meters)}m`;
}
