/**
 * Series utilities
 *
 * Ordering, merging and selection helpers for price series. All functions
 * return new arrays; inputs are never mutated.
 */

import type { IsoDate, PricePoint } from '../types';

function byDateAscending(a: { date: IsoDate }, b: { date: IsoDate }): number {
  return a.date.localeCompare(b.date);
}

/**
 * Sort points ascending by date (copy)
 */
export function sortSeriesAscending<T extends { date: IsoDate }>(points: readonly T[]): T[] {
  return [...points].sort(byDateAscending);
}

/**
 * Keep the most recent `count` points, ascending by date
 *
 * A count that is not a positive finite number keeps everything.
 */
export function takeMostRecent<T extends { date: IsoDate }>(
  points: readonly T[],
  count: number
): T[] {
  const sorted = sortSeriesAscending(points);
  if (!Number.isFinite(count) || count <= 0 || sorted.length <= count) {
    return sorted;
  }
  return sorted.slice(sorted.length - Math.floor(count));
}

/**
 * Merge several point lists by date, later lists winning on conflict
 *
 * @returns Merged points sorted ascending, one per date
 */
export function mergeSeries<T extends { date: IsoDate }>(...lists: ReadonlyArray<readonly T[]>): T[] {
  const dateMap = new Map<IsoDate, T>();

  for (const list of lists) {
    for (const point of list) {
      dateMap.set(point.date, point);
    }
  }

  return Array.from(dateMap.values()).sort(byDateAscending);
}

export interface SelectSeriesOptions {
  startDate?: IsoDate; // inclusive
  endDate?: IsoDate; // inclusive
  limit?: number; // most recent N after date filtering
}

/**
 * Select points the way a price store answers a range query:
 * filter by inclusive date range, keep the most recent `limit`, return ascending.
 */
export function selectSeries<T extends PricePoint>(
  points: readonly T[],
  options: SelectSeriesOptions = {}
): T[] {
  const { startDate, endDate, limit } = options;

  const inRange = points.filter(
    (point) =>
      (startDate === undefined || point.date >= startDate) &&
      (endDate === undefined || point.date <= endDate)
  );

  return limit === undefined ? sortSeriesAscending(inRange) : takeMostRecent(inRange, limit);
}
