/**
 * Trend classification engine
 *
 * Pure function that labels a fitted trend by the sign of its slope.
 */

import type { TrendLabel } from '../types';

/**
 * Classifies a trend slope:
 * - bullish: slope > 0
 * - bearish: slope <= 0 (a flat trend is bearish)
 */
export function classifyTrend(slope: number): TrendLabel {
  return slope > 0 ? 'bullish' : 'bearish';
}
