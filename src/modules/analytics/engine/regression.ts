/**
 * Ordinary least squares trend fitting
 *
 * Fits y = intercept + slope * x where x is the zero-based position of each
 * value. Position-based: gaps between observation dates do not affect the fit.
 */

export interface LinearTrendFit {
  slope: number;
  intercept: number;
  rSquared: number;
}

function mean(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Fit a least-squares line through values indexed 0..n-1.
 *
 * R² is 1 - SS_res / SS_tot over the fitted values. A series whose values are
 * all equal (including a single value) is fitted exactly by its flat line and
 * reports R² = 1; this is decided on the values, not on SS_tot, since a mean of
 * decimal prices such as 19.99 is not exact in binary.
 */
export function fitLinearTrend(values: readonly number[]): LinearTrendFit {
  const n = values.length;
  if (n === 0) {
    return { slope: 0, intercept: 0, rSquared: 1 };
  }

  const first = values[0];
  if (values.every((y) => y === first)) {
    return { slope: 0, intercept: first, rSquared: 1 };
  }

  const yMean = mean(values);

  const xMean = (n - 1) / 2;
  let sxx = 0;
  let sxy = 0;
  values.forEach((y, x) => {
    sxx += (x - xMean) ** 2;
    sxy += (x - xMean) * (y - yMean);
  });

  const slope = sxy / sxx;
  const intercept = yMean - slope * xMean;

  let ssRes = 0;
  let ssTot = 0;
  values.forEach((y, x) => {
    ssRes += (y - (intercept + slope * x)) ** 2;
    ssTot += (y - yMean) ** 2;
  });

  const rSquared = 1 - ssRes / ssTot;

  return { slope, intercept, rSquared };
}
