/**
 * Analytics configuration
 *
 * Defaults come from environment variables (optionally loaded from .env.local
 * then .env with dotenv). Bounds mirror the limits the price API put on its
 * query parameters.
 *
 * Env vars:
 * - ANALYTICS_DATA_DIR: directory holding <SYMBOL>.json series files (default: data/prices)
 * - ANALYTICS_REPORT_DIR: directory reports are written to (default: reports)
 * - ANALYTICS_MA_WINDOW: moving average window (default: 20)
 * - ANALYTICS_PROJECTION_DAYS_AHEAD: calendar days to project (default: 30)
 * - ANALYTICS_PROJECTION_LOOKBACK_DAYS: points used for the trend fit (default: 90)
 * - ANALYTICS_VOLATILITY_LOOKBACK_DAYS: points used for volatility (default: 30)
 * - ANALYTICS_MAX_POINTS: most recent points used for moving averages (default: 1000)
 */

import { config } from 'dotenv';
import { existsSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { ConfigError } from './errors';
import type { AnalyticsParams } from './types';

export type NumericParam = Exclude<keyof AnalyticsParams, 'startDate' | 'endDate'>;

interface ParamSetting {
  envVar: string;
  fallback: number;
  min: number;
  max: number;
}

export const PARAM_SETTINGS: Record<NumericParam, ParamSetting> = {
  window: { envVar: 'ANALYTICS_MA_WINDOW', fallback: 20, min: 5, max: 200 },
  daysAhead: { envVar: 'ANALYTICS_PROJECTION_DAYS_AHEAD', fallback: 30, min: 1, max: 365 },
  projectionLookbackDays: {
    envVar: 'ANALYTICS_PROJECTION_LOOKBACK_DAYS',
    fallback: 90,
    min: 10,
    max: 365,
  },
  volatilityLookbackDays: {
    envVar: 'ANALYTICS_VOLATILITY_LOOKBACK_DAYS',
    fallback: 30,
    min: 5,
    max: 365,
  },
  maxPoints: { envVar: 'ANALYTICS_MAX_POINTS', fallback: 1000, min: 1, max: 10000 },
};

export interface AnalyticsConfig {
  dataDir: string;
  reportDir: string;
  params: AnalyticsParams;
}

/**
 * Load .env.local then .env from `cwd`.
 * Uses override: false so values already in the environment win.
 */
export function loadEnv(cwd: string = process.cwd()): void {
  for (const candidate of ['.env.local', '.env']) {
    const path = resolve(cwd, candidate);
    if (existsSync(path)) {
      config({ path, override: false });
    }
  }
}

/**
 * Check a numeric parameter against its bounds.
 * Throws ConfigError for non-integers and out-of-range values.
 */
export function validateParam(name: NumericParam, value: number): number {
  const { min, max } = PARAM_SETTINGS[name];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got ${value}`);
  }
  return value;
}

/**
 * Read a numeric parameter from the environment.
 * Unset means the default; an invalid value warns and falls back to the default.
 */
export function readParamFromEnv(name: NumericParam, env: NodeJS.ProcessEnv): number {
  const { envVar, fallback } = PARAM_SETTINGS[name];
  const raw = env[envVar];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  try {
    return validateParam(name, Number(raw.trim()));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️  Invalid ${envVar}="${raw}" (${reason}). Defaulting to ${fallback}.`);
    return fallback;
  }
}

function resolveDir(raw: string | undefined, fallback: string, cwd: string): string {
  const dir = raw === undefined || raw.trim() === '' ? fallback : raw.trim();
  return isAbsolute(dir) ? dir : resolve(cwd, dir);
}

export function getAnalyticsConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AnalyticsConfig {
  return {
    dataDir: resolveDir(env.ANALYTICS_DATA_DIR, 'data/prices', cwd),
    reportDir: resolveDir(env.ANALYTICS_REPORT_DIR, 'reports', cwd),
    params: {
      window: readParamFromEnv('window', env),
      daysAhead: readParamFromEnv('daysAhead', env),
      projectionLookbackDays: readParamFromEnv('projectionLookbackDays', env),
      volatilityLookbackDays: readParamFromEnv('volatilityLookbackDays', env),
      maxPoints: readParamFromEnv('maxPoints', env),
    },
  };
}
