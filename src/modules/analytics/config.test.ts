import { afterEach, describe, expect, it, jest } from '@jest/globals';
import { resolve } from 'path';
import { getAnalyticsConfig, readParamFromEnv, validateParam } from './config';
import { ConfigError } from './errors';

describe('getAnalyticsConfig', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('uses defaults when nothing is set', () => {
    expect(getAnalyticsConfig({}, '/srv/analytics')).toEqual({
      dataDir: resolve('/srv/analytics', 'data/prices'),
      reportDir: resolve('/srv/analytics', 'reports'),
      params: {
        window: 20,
        daysAhead: 30,
        projectionLookbackDays: 90,
        volatilityLookbackDays: 30,
        maxPoints: 1000,
      },
    });
  });

  it('reads overrides from the environment', () => {
    const config = getAnalyticsConfig(
      {
        ANALYTICS_DATA_DIR: '/var/prices',
        ANALYTICS_REPORT_DIR: 'out',
        ANALYTICS_MA_WINDOW: '50',
        ANALYTICS_PROJECTION_DAYS_AHEAD: '7',
        ANALYTICS_PROJECTION_LOOKBACK_DAYS: '120',
        ANALYTICS_VOLATILITY_LOOKBACK_DAYS: '60',
        ANALYTICS_MAX_POINTS: '250',
      },
      '/srv/analytics'
    );
    expect(config.dataDir).toBe('/var/prices');
    expect(config.reportDir).toBe(resolve('/srv/analytics', 'out'));
    expect(config.params).toEqual({
      window: 50,
      daysAhead: 7,
      projectionLookbackDays: 120,
      volatilityLookbackDays: 60,
      maxPoints: 250,
    });
  });

  it('warns and falls back on invalid values', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(readParamFromEnv('window', { ANALYTICS_MA_WINDOW: '3' })).toBe(20);
    expect(readParamFromEnv('daysAhead', { ANALYTICS_PROJECTION_DAYS_AHEAD: 'soon' })).toBe(30);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn.mock.calls[0][0]).toBe(
      '⚠️  Invalid ANALYTICS_MA_WINDOW="3" (window must be an integer between 5 and 200, got 3). Defaulting to 20.'
    );
  });
});

describe('validateParam', () => {
  it('accepts values inside the bounds', () => {
    expect(validateParam('projectionLookbackDays', 10)).toBe(10);
    expect(validateParam('volatilityLookbackDays', 365)).toBe(365);
  });

  it('rejects out-of-range and fractional values', () => {
    expect(() => validateParam('projectionLookbackDays', 9)).toThrow(ConfigError);
    expect(() => validateParam('daysAhead', 366)).toThrow(
      'daysAhead must be an integer between 1 and 365, got 366'
    );
    expect(() => validateParam('window', 7.5)).toThrow(ConfigError);
  });
});
