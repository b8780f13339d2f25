import { describe, expect, it } from '@jest/globals';
import { computePriceStats } from './priceStats';

describe('computePriceStats', () => {
  it('summarises closes and the date range regardless of input order', () => {
    const stats = computePriceStats([
      { date: '2024-04-03', closePrice: 12 },
      { date: '2024-04-01', closePrice: 10 },
      { date: '2024-04-02', closePrice: 14 },
    ]);
    expect(stats).toEqual({
      minPrice: 10,
      maxPrice: 14,
      avgPrice: 12,
      totalRecords: 3,
      dateRangeStart: '2024-04-01',
      dateRangeEnd: '2024-04-03',
    });
  });

  it('returns null for an empty series', () => {
    expect(computePriceStats([])).toBeNull();
  });
});
