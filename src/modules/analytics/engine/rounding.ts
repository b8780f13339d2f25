/**
 * Decimal rounding
 *
 * One convention for every rounded output: half away from zero, applied to
 * the decimal representation of the value (so 1.005 rounds to 1.01 even though
 * its binary value sits just below 1.005).
 */

function shiftDecimal(value: number, exponent: number): number {
  const [mantissa, exp] = String(value).split('e');
  return Number(`${mantissa}e${Number(exp ?? 0) + exponent}`);
}

/**
 * Round to a fixed number of decimal places, half away from zero.
 *
 * Non-finite values pass through unchanged; -0 is normalised to 0.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const magnitude = shiftDecimal(Math.round(shiftDecimal(Math.abs(value), decimals)), -decimals);
  const rounded = value < 0 ? -magnitude : magnitude;

  return rounded === 0 ? 0 : rounded;
}
