/**
 * Volatility metrics
 *
 * Annualized volatility of simple daily returns plus price-range figures.
 */

import type { Series, StockId, VolatilityOutcome } from '../types';
import { roundTo } from './rounding';
import { takeMostRecent } from './series';

export const TRADING_DAYS_PER_YEAR = 252;

export interface VolatilityOptions {
  stockId: StockId;
  lookbackDays?: number; // keep only the most recent N points
}

/**
 * Simple (arithmetic) returns between consecutive closes: (p[i] - p[i-1]) / p[i-1]
 */
export function dailyReturns(closes: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const previous = closes[i - 1];
    returns.push((closes[i] - previous) / previous);
  }
  return returns;
}

/**
 * Population standard deviation (divides by the number of values)
 */
export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const avg = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Compute volatility metrics over the supplied closes.
 *
 * Percentages are multiplied by 100 before rounding: volatility and price
 * range to 2 decimals, average daily return to 4.
 */
export function computeVolatility(series: Series, options: VolatilityOptions): VolatilityOutcome {
  const { stockId, lookbackDays } = options;
  const points = takeMostRecent(series, lookbackDays ?? Infinity);

  if (points.length < 2) {
    return { error: 'Insufficient data', code: 'INSUFFICIENT_DATA' };
  }

  const closes = points.map((p) => p.closePrice);
  const minPrice = Math.min(...closes);
  const maxPrice = Math.max(...closes);

  // Zero close: returns and range ratio would divide by zero
  if (minPrice === 0) {
    return {
      error: 'Invalid price data: minimum close price is zero',
      code: 'DEGENERATE_INPUT',
    };
  }

  const returns = dailyReturns(closes);
  const volatility = populationStdDev(returns) * Math.sqrt(TRADING_DAYS_PER_YEAR);
  const avgReturn = returns.reduce((a, b) => a + b, 0) / returns.length;

  return {
    stockId,
    periodDays: points.length,
    volatilityPct: roundTo(volatility * 100, 2),
    avgDailyReturnPct: roundTo(avgReturn * 100, 4),
    minPrice: roundTo(minPrice, 2),
    maxPrice: roundTo(maxPrice, 2),
    priceRangePct: roundTo(((maxPrice - minPrice) / minPrice) * 100, 2),
  };
}
