/**
 * Linear trend projection
 *
 * Fits a least-squares line over the most recent closes and extends it forward
 * one calendar day at a time from the last observed date.
 */

import { addDays, format, isValid, parseISO } from 'date-fns';
import type { ProjectedPrice, ProjectionOutcome, Series, StockId } from '../types';
import { classifyTrend } from './classifyTrend';
import { fitLinearTrend } from './regression';
import { roundTo } from './rounding';
import { takeMostRecent } from './series';

export const MIN_PROJECTION_POINTS = 10;

export interface ProjectionOptions {
  stockId: StockId;
  daysAhead: number;
  lookbackDays?: number; // keep only the most recent N points
}

/**
 * Compute a simple linear projection.
 *
 * - Fewer than 10 points: `{ error: 'Insufficient historical data' }`
 * - A last date that is not a calendar date: DEGENERATE_INPUT
 * - Projected prices are floored at 0 and rounded to 2 decimals
 * - Slope (daily change rate) and R² are rounded to 4 decimals
 */
export function computeProjection(series: Series, options: ProjectionOptions): ProjectionOutcome {
  const { stockId, daysAhead, lookbackDays } = options;

  const points = takeMostRecent(series, lookbackDays ?? Infinity);

  if (points.length < MIN_PROJECTION_POINTS) {
    return { error: 'Insufficient historical data', code: 'INSUFFICIENT_DATA' };
  }

  const n = points.length;
  const { slope, intercept, rSquared } = fitLinearTrend(points.map((p) => p.closePrice));
  const last = points[n - 1];
  const lastDay = parseISO(last.date);
  if (!isValid(lastDay)) {
    return {
      error: `Invalid price data: last date "${last.date}" is not a calendar date`,
      code: 'DEGENERATE_INPUT',
    };
  }

  const projections: ProjectedPrice[] = [];
  for (let i = 1; i <= daysAhead; i++) {
    const projectedPrice = intercept + slope * (n - 1 + i);
    projections.push({
      date: format(addDays(lastDay, i), 'yyyy-MM-dd'),
      projectedPrice: roundTo(Math.max(0, projectedPrice), 2),
    });
  }

  return {
    stockId,
    lastPrice: last.closePrice,
    lastDate: last.date,
    trend: classifyTrend(slope),
    dailyChangeRate: roundTo(slope, 4),
    rSquared: roundTo(rSquared, 4),
    projections,
  };
}
