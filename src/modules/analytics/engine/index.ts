/**
 * Analytics engine exports
 *
 * Pure engine functions - no I/O, no logging, no shared state.
 */

export { computeMovingAverage } from './movingAverages';
export { computeProjection, MIN_PROJECTION_POINTS } from './projection';
export type { ProjectionOptions } from './projection';
export { computeVolatility, dailyReturns, populationStdDev, TRADING_DAYS_PER_YEAR } from './volatility';
export type { VolatilityOptions } from './volatility';
export { computePriceStats } from './priceStats';
export { classifyTrend } from './classifyTrend';
export { fitLinearTrend } from './regression';
export type { LinearTrendFit } from './regression';
export { roundTo } from './rounding';
export { sortSeriesAscending, takeMostRecent, mergeSeries, selectSeries } from './series';
export type { SelectSeriesOptions } from './series';
