/**
 * Moving average calculations
 *
 * Pure functions for computing trailing simple moving averages.
 */

import type { MovingAveragePoint, Series } from '../types';
import { roundTo } from './rounding';
import { sortSeriesAscending } from './series';

function isValidWindow(window: number): boolean {
  return Number.isInteger(window) && window > 0;
}

/**
 * Trailing simple moving average of close prices.
 *
 * Returns an empty list when the series is shorter than the window (not enough
 * history). Otherwise one point per date from the window-th date onward,
 * ascending, with the average rounded to 2 decimals.
 */
export function computeMovingAverage(series: Series, window: number): MovingAveragePoint[] {
  if (!isValidWindow(window) || series.length < window) {
    return [];
  }

  const sorted = sortSeriesAscending(series);
  const results: MovingAveragePoint[] = [];

  for (let i = window - 1; i < sorted.length; i++) {
    const sum = sorted.slice(i - window + 1, i + 1).reduce((total, point) => total + point.closePrice, 0);
    results.push({
      date: sorted[i].date,
      closePrice: sorted[i].closePrice,
      movingAverage: roundTo(sum / window, 2),
    });
  }

  return results;
}
