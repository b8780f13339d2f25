/**
 * Analytics module types
 *
 * Core type definitions for price series and the analytics computed from them.
 */

// ISO calendar date, YYYY-MM-DD
export type IsoDate = string;

// Opaque stock identifier, passed through to results untouched
export type StockId = number | string;

// Daily close observation
export interface PricePoint {
  date: IsoDate;
  closePrice: number; // >= 0
}

// Ordered (or orderable) daily observations for one stock
export type Series = readonly PricePoint[];

export interface MovingAveragePoint {
  date: IsoDate;
  closePrice: number;
  movingAverage: number; // 2 decimals
}

export type TrendLabel = 'bullish' | 'bearish';

export interface ProjectedPrice {
  date: IsoDate;
  projectedPrice: number; // >= 0, 2 decimals
}

export interface ProjectionResult {
  stockId: StockId;
  lastPrice: number;
  lastDate: IsoDate;
  trend: TrendLabel;
  dailyChangeRate: number; // slope per position, 4 decimals
  rSquared: number; // 4 decimals
  projections: ProjectedPrice[];
}

export interface VolatilityResult {
  stockId: StockId;
  periodDays: number;
  volatilityPct: number; // annualized, 2 decimals
  avgDailyReturnPct: number; // 4 decimals
  minPrice: number; // 2 decimals
  maxPrice: number; // 2 decimals
  priceRangePct: number; // 2 decimals
}

export interface PriceStats {
  minPrice: number;
  maxPrice: number;
  avgPrice: number;
  totalRecords: number;
  dateRangeStart: IsoDate;
  dateRangeEnd: IsoDate;
}

export type AnalyticsErrorCode = 'INSUFFICIENT_DATA' | 'DEGENERATE_INPUT';

// Data-shaped failure; the engine never throws for data conditions
export interface AnalyticsError {
  error: string;
  code: AnalyticsErrorCode;
}

export type ProjectionOutcome = ProjectionResult | AnalyticsError;
export type VolatilityOutcome = VolatilityResult | AnalyticsError;

export function isAnalyticsError(value: unknown): value is AnalyticsError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'string'
  );
}

// Parameters shared by the report builder and the CLI
export interface AnalyticsParams {
  window: number;
  daysAhead: number;
  projectionLookbackDays: number;
  volatilityLookbackDays: number;
  maxPoints: number;
  startDate?: IsoDate;
  endDate?: IsoDate;
}

export interface MovingAverageSection {
  window: number;
  points: MovingAveragePoint[];
}

export interface AnalyticsReport {
  symbol: string;
  generatedAt: string; // ISO timestamp
  stats: PriceStats | AnalyticsError;
  movingAverage: MovingAverageSection | AnalyticsError;
  projection: ProjectionOutcome;
  volatility: VolatilityOutcome;
}
