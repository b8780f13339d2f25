/**
 * Command line parsing for the analyze-series script
 */

import { validateParam } from '../config';
import type { NumericParam } from '../config';
import { ConfigError } from '../errors';
import type { AnalyticsParams, IsoDate } from '../types';

export interface AnalyzeArgs {
  symbol: string;
  files: string[];
  overrides: Partial<AnalyticsParams>;
  stdout: boolean;
}

const NUMERIC_FLAGS = new Map<string, NumericParam>([
  ['--window', 'window'],
  ['--days-ahead', 'daysAhead'],
  ['--lookback', 'projectionLookbackDays'],
  ['--vol-lookback', 'volatilityLookbackDays'],
  ['--max-points', 'maxPoints'],
]);

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function requireValue(args: readonly string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return value;
}

function parseDateFlag(value: string, flag: string): IsoDate {
  if (!DATE_PATTERN.test(value)) {
    throw new ConfigError(`${flag} must be in YYYY-MM-DD format, got ${value}`);
  }
  return value;
}

/**
 * Parse `<SYMBOL> [--file path]... [--window N] [--days-ahead N] [--lookback N]
 * [--vol-lookback N] [--max-points N] [--start YYYY-MM-DD] [--end YYYY-MM-DD] [--stdout]`
 */
export function parseArgs(args: readonly string[]): AnalyzeArgs {
  let symbol: string | undefined;
  const files: string[] = [];
  const overrides: Partial<AnalyticsParams> = {};
  let stdout = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const numericParam = NUMERIC_FLAGS.get(arg);

    if (numericParam !== undefined) {
      const raw = requireValue(args, i, arg);
      overrides[numericParam] = validateParam(numericParam, Number(raw));
      i++;
    } else if (arg === '--file') {
      files.push(requireValue(args, i, arg));
      i++;
    } else if (arg === '--start') {
      overrides.startDate = parseDateFlag(requireValue(args, i, arg), arg);
      i++;
    } else if (arg === '--end') {
      overrides.endDate = parseDateFlag(requireValue(args, i, arg), arg);
      i++;
    } else if (arg === '--stdout') {
      stdout = true;
    } else if (arg.startsWith('--')) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else if (symbol === undefined) {
      symbol = arg.trim().toUpperCase();
    } else {
      throw new ConfigError(`Unexpected argument: ${arg}`);
    }
  }

  if (!symbol) {
    throw new ConfigError('Usage: analyze-series <SYMBOL> [--file path] [--window N] ...');
  }

  if (overrides.startDate && overrides.endDate && overrides.startDate > overrides.endDate) {
    throw new ConfigError('--start must not be after --end');
  }

  return { symbol, files, overrides, stdout };
}
