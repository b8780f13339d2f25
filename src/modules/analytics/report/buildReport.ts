/**
 * Analytics report
 *
 * Runs stats, moving average, projection and volatility over one symbol's
 * series and collects the results (or their errors) into a single record.
 */

import {
  computeMovingAverage,
  computePriceStats,
  computeProjection,
  computeVolatility,
  selectSeries,
} from '../engine';
import type { AnalyticsParams, AnalyticsReport, Series } from '../types';

export const NO_PRICE_DATA = 'No price data found';
export const INSUFFICIENT_MOVING_AVERAGE_DATA = 'Insufficient data for moving average calculation';

/**
 * Build a report for one symbol.
 *
 * Each analysis sees the points a price store would return for it:
 * - stats: the whole history
 * - moving average: the date range, capped to the most recent maxPoints
 * - projection and volatility: the most recent lookback points (date range ignored)
 */
export function buildAnalyticsReport(
  symbol: string,
  series: Series,
  params: AnalyticsParams,
  now: Date = new Date()
): AnalyticsReport {
  const ranged = selectSeries(series, {
    startDate: params.startDate,
    endDate: params.endDate,
    limit: params.maxPoints,
  });

  const stats = computePriceStats(series);
  const movingAverage = computeMovingAverage(ranged, params.window);

  return {
    symbol,
    generatedAt: now.toISOString(),
    stats: stats ?? { error: NO_PRICE_DATA, code: 'INSUFFICIENT_DATA' },
    movingAverage:
      movingAverage.length > 0
        ? { window: params.window, points: movingAverage }
        : { error: INSUFFICIENT_MOVING_AVERAGE_DATA, code: 'INSUFFICIENT_DATA' },
    projection: computeProjection(series, {
      stockId: symbol,
      daysAhead: params.daysAhead,
      lookbackDays: params.projectionLookbackDays,
    }),
    volatility: computeVolatility(series, {
      stockId: symbol,
      lookbackDays: params.volatilityLookbackDays,
    }),
  };
}
