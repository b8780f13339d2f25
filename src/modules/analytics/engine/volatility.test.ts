import { describe, expect, it } from '@jest/globals';
import type { PricePoint } from '../types';
import { computeVolatility, dailyReturns, populationStdDev } from './volatility';

function seriesFrom(closes: number[]): PricePoint[] {
  return closes.map((closePrice, i) => ({
    date: `2024-03-${String(i + 1).padStart(2, '0')}`,
    closePrice,
  }));
}

describe('dailyReturns', () => {
  it('computes simple returns between consecutive closes', () => {
    expect(dailyReturns([100, 110, 99])).toEqual([0.1, -0.1]);
    expect(dailyReturns([5])).toEqual([]);
  });
});

describe('populationStdDev', () => {
  it('divides by the number of values', () => {
    expect(populationStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    expect(populationStdDev([])).toBe(0);
  });
});

describe('computeVolatility', () => {
  it('annualizes the population standard deviation of daily returns', () => {
    const result = computeVolatility(seriesFrom([100, 110, 99]), { stockId: 9 });
    expect(result).toEqual({
      stockId: 9,
      periodDays: 3,
      volatilityPct: 158.75,
      avgDailyReturnPct: 0,
      minPrice: 99,
      maxPrice: 110,
      priceRangePct: 11.11,
    });
  });

  it('rounds the average daily return to 4 decimals', () => {
    const result = computeVolatility(seriesFrom([100, 102, 101, 105, 104]), { stockId: 'X' });
    expect(result).toEqual({
      stockId: 'X',
      periodDays: 5,
      volatilityPct: 33.2,
      avgDailyReturnPct: 1.0069,
      minPrice: 100,
      maxPrice: 105,
      priceRangePct: 5,
    });
  });

  it('reports zero volatility for constant prices', () => {
    const result = computeVolatility(seriesFrom([25, 25, 25, 25]), { stockId: 1 });
    expect(result).toMatchObject({ volatilityPct: 0, avgDailyReturnPct: 0, priceRangePct: 0 });
  });

  it('returns an error for a single point', () => {
    expect(computeVolatility(seriesFrom([10]), { stockId: 1 })).toEqual({
      error: 'Insufficient data',
      code: 'INSUFFICIENT_DATA',
    });
  });

  it('returns an error instead of dividing by a zero close', () => {
    expect(computeVolatility(seriesFrom([10, 0, 12]), { stockId: 1 })).toEqual({
      error: 'Invalid price data: minimum close price is zero',
      code: 'DEGENERATE_INPUT',
    });
  });

  it('uses only the most recent lookbackDays points', () => {
    const result = computeVolatility(seriesFrom([1, 500, 100, 110, 99]), {
      stockId: 1,
      lookbackDays: 3,
    });
    expect(result).toMatchObject({ periodDays: 3, volatilityPct: 158.75, minPrice: 99 });
  });

  it('does not depend on the order of the input', () => {
    const ordered = seriesFrom([100, 102, 101, 105, 104]);
    const shuffled = [ordered[2], ordered[4], ordered[0], ordered[3], ordered[1]];
    expect(computeVolatility(shuffled, { stockId: 1 })).toEqual(
      computeVolatility(ordered, { stockId: 1 })
    );
  });
});
