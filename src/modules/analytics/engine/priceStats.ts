/**
 * Summary statistics over a price series.
 */

import type { PriceStats, Series } from '../types';
import { sortSeriesAscending } from './series';

/**
 * Min/max/mean close, record count and date range; null for an empty series.
 */
export function computePriceStats(series: Series): PriceStats | null {
  if (series.length === 0) {
    return null;
  }

  const sorted = sortSeriesAscending(series);
  const closes = sorted.map((p) => p.closePrice);

  return {
    minPrice: Math.min(...closes),
    maxPrice: Math.max(...closes),
    avgPrice: closes.reduce((a, b) => a + b, 0) / closes.length,
    totalRecords: sorted.length,
    dateRangeStart: sorted[0].date,
    dateRangeEnd: sorted[sorted.length - 1].date,
  };
}
