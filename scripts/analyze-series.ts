/**
 * Analyze series script
 *
 * Loads one symbol's daily price series, computes stats, moving average,
 * trend projection and volatility, and writes the report as JSON.
 *
 * This script:
 * 1. Loads .env.local / .env and reads ANALYTICS_* defaults
 * 2. Reads the series from --file paths, or <ANALYTICS_DATA_DIR>/<SYMBOL>.json
 * 3. Builds the analytics report (CLI flags override env defaults)
 * 4. Writes <ANALYTICS_REPORT_DIR>/analytics.<SYMBOL>.json, or prints it with --stdout
 *
 * Usage:
 *   tsx scripts/analyze-series.ts AAPL --window 50 --days-ahead 14
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { parseArgs } from '../src/modules/analytics/cli/parseArgs';
import { getAnalyticsConfig, loadEnv } from '../src/modules/analytics/config';
import { getSeriesFilePath, loadSeries } from '../src/modules/analytics/data';
import { buildAnalyticsReport, formatReportSummary } from '../src/modules/analytics/report';

function getReportFilePath(reportDir: string, symbol: string): string {
  if (!existsSync(reportDir)) {
    mkdirSync(reportDir, { recursive: true });
  }
  return join(reportDir, `analytics.${symbol.replace(/[^A-Z0-9_-]/g, '_')}.json`);
}

async function main() {
  loadEnv();

  const args = parseArgs(process.argv.slice(2));
  const config = getAnalyticsConfig();
  const params = { ...config.params, ...args.overrides };

  const files = args.files.length > 0 ? args.files : [getSeriesFilePath(config.dataDir, args.symbol)];
  const series = loadSeries(files);

  if (!args.stdout) {
    console.log(`📥 Loaded ${series.length} points for ${args.symbol} from ${files.join(', ')}\n`);
  }

  const report = buildAnalyticsReport(args.symbol, series, params);

  if (args.stdout) {
    process.stdout.write(JSON.stringify(report, null, 2) + '\n');
    return;
  }

  for (const line of formatReportSummary(report)) {
    console.log(line);
  }

  const reportPath = getReportFilePath(config.reportDir, args.symbol);
  writeFileSync(reportPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  console.log(`\n✅ Report written to ${reportPath}`);
}

main().catch((error) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
