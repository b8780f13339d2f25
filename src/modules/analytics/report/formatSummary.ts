/**
 * Console summary lines for an analytics report
 */

import { isAnalyticsError } from '../types';
import type { AnalyticsError, AnalyticsReport } from '../types';

function errorLine(label: string, error: AnalyticsError): string {
  return `  ${label}: ⚠️  ${error.error}`;
}

export function formatReportSummary(report: AnalyticsReport): string[] {
  const { stats, movingAverage, projection, volatility } = report;
  const lines: string[] = [];

  if (isAnalyticsError(stats)) {
    lines.push(`📈 ${report.symbol}: ${stats.error}`);
  } else {
    lines.push(
      `📈 ${report.symbol}: ${stats.totalRecords} points (${stats.dateRangeStart} to ${stats.dateRangeEnd})`
    );
  }

  if (isAnalyticsError(movingAverage)) {
    lines.push(errorLine('Moving average', movingAverage));
  } else {
    const latest = movingAverage.points[movingAverage.points.length - 1];
    lines.push(
      `  Moving average (${movingAverage.window}d): ${latest.movingAverage} on ${latest.date}`
    );
  }

  if (isAnalyticsError(projection)) {
    lines.push(errorLine('Projection', projection));
  } else {
    const { projections } = projection;
    const horizon = projections[projections.length - 1];
    const target =
      projections.length > 0 ? `, ${horizon.projectedPrice} by ${horizon.date}` : '';
    lines.push(
      `  Projection: ${projection.trend} ${projection.dailyChangeRate}/day, R² ${projection.rSquared}${target}`
    );
  }

  if (isAnalyticsError(volatility)) {
    lines.push(errorLine('Volatility', volatility));
  } else {
    lines.push(
      `  Volatility (${volatility.periodDays}d): ${volatility.volatilityPct}% annualized, ` +
        `avg daily return ${volatility.avgDailyReturnPct}%, range ${volatility.priceRangePct}%`
    );
  }

  return lines;
}
