/**
 * Price analytics library entry point
 */

export * from './engine';
export * from './data';
export * from './report';
export { getAnalyticsConfig, loadEnv, validateParam, PARAM_SETTINGS } from './config';
export type { AnalyticsConfig, NumericParam } from './config';
export { ConfigError, SeriesFormatError } from './errors';
export { isAnalyticsError } from './types';
export type {
  AnalyticsError,
  AnalyticsErrorCode,
  AnalyticsParams,
  AnalyticsReport,
  IsoDate,
  MovingAveragePoint,
  MovingAverageSection,
  PricePoint,
  PriceStats,
  ProjectedPrice,
  ProjectionOutcome,
  ProjectionResult,
  Series,
  StockId,
  TrendLabel,
  VolatilityOutcome,
  VolatilityResult,
} from './types';
