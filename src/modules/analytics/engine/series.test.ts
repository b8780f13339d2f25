import { describe, expect, it } from '@jest/globals';
import type { PricePoint } from '../types';
import { mergeSeries, selectSeries, sortSeriesAscending, takeMostRecent } from './series';

const points: PricePoint[] = [
  { date: '2024-01-04', closePrice: 13 },
  { date: '2024-01-02', closePrice: 11 },
  { date: '2024-01-05', closePrice: 14 },
  { date: '2024-01-03', closePrice: 12 },
];

describe('sortSeriesAscending', () => {
  it('returns a sorted copy without touching the input', () => {
    const sorted = sortSeriesAscending(points);
    expect(sorted.map((p) => p.date)).toEqual(['2024-01-02', '2024-01-03', '2024-01-04', '2024-01-05']);
    expect(points[0].date).toBe('2024-01-04');
  });
});

describe('takeMostRecent', () => {
  it('keeps the latest N points in ascending order', () => {
    expect(takeMostRecent(points, 2).map((p) => p.closePrice)).toEqual([13, 14]);
  });

  it('keeps everything when N is larger than the series or not positive', () => {
    expect(takeMostRecent(points, 10)).toHaveLength(4);
    expect(takeMostRecent(points, 0)).toHaveLength(4);
    expect(takeMostRecent(points, Infinity)).toHaveLength(4);
  });
});

describe('mergeSeries', () => {
  it('de-duplicates by date with later lists winning', () => {
    const merged = mergeSeries(
      [
        { date: '2024-01-03', closePrice: 1 },
        { date: '2024-01-02', closePrice: 2 },
      ],
      [{ date: '2024-01-03', closePrice: 99 }]
    );
    expect(merged).toEqual([
      { date: '2024-01-02', closePrice: 2 },
      { date: '2024-01-03', closePrice: 99 },
    ]);
  });
});

describe('selectSeries', () => {
  it('filters an inclusive date range', () => {
    const selected = selectSeries(points, { startDate: '2024-01-03', endDate: '2024-01-04' });
    expect(selected.map((p) => p.date)).toEqual(['2024-01-03', '2024-01-04']);
  });

  it('applies the limit to the most recent points after filtering', () => {
    const selected = selectSeries(points, { endDate: '2024-01-04', limit: 2 });
    expect(selected.map((p) => p.date)).toEqual(['2024-01-03', '2024-01-04']);
  });

  it('returns everything ascending without options', () => {
    expect(selectSeries(points).map((p) => p.closePrice)).toEqual([11, 12, 13, 14]);
  });
});
