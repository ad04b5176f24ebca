import type { CrimeEvent } from '../types/crime';
import type { CrimeFilter } from './types';

/**
 * Events whose type is selected and whose calendar date lies in the range,
 * both ends inclusive. No selected types means no events. Events without a
 * usable date are always dropped, since no monthly series can count them.
 */
export function filterCrimeEvents(events: readonly CrimeEvent[], filter: CrimeFilter): CrimeEvent[] {
  if (filter.crimeTypes.size === 0) return [];
  const { dateRange } = filter;

  return events.filter((event) => {
    if (event.type === null || !filter.crimeTypes.has(event.type)) return false;
    if (event.date === null) return false;
    if (!dateRange) return true;
    // YYYY-MM-DD strings order the same way as the dates they name
    return event.date >= dateRange.start && event.date <= dateRange.end;
  });
}

/**
 * Distinct crime types, in the order they first appear
 */
export function crimeTypeOptions(events: readonly CrimeEvent[]): string[] {
  const seen = new Set<string>();
  for (const event of events) {
    if (event.type !== null) seen.add(event.type);
  }
  return [...seen];
}

/**
 * Earliest and latest calendar dates among the events, or null if none has a date
 */
export function dateExtent(events: readonly CrimeEvent[]): { start: string; end: string } | null {
  let start: string | null = null;
  let end: string | null = null;
  for (const { date } of events) {
    if (date === null) continue;
    if (start === null || date < start) start = date;
    if (end === null || date > end) end = date;
  }
  return start !== null && end !== null ? { start, end } : null;
}

/** YYYY-MM of a YYYY-MM-DD date */
export function toMonth(date: string): string {
  return date.slice(0, 7);
}
