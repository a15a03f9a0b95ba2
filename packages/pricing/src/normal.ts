/**
 * Standard normal distribution helpers.
 *
 * The CDF uses the Abramowitz & Stegun 7.1.26 rational approximation of erf
 * (absolute error below 1.5e-7). Only the upper tail is approximated; the
 * other half is its complement, so `normalCdf(x) + normalCdf(-x) === 1` up to
 * rounding.
 */

const P = 0.3275911;
const A1 = 0.254829592;
const A2 = -0.284496736;
const A3 = 1.421413741;
const A4 = -1.453152027;
const A5 = 1.061405429;

/** Upper tail `1 - N(x)` for x >= 0. */
function upperTail(x: number): number {
  const z = x / Math.SQRT2;
  const t = 1 / (1 + P * z);
  const poly = t * (A1 + t * (A2 + t * (A3 + t * (A4 + t * A5))));
  return 0.5 * poly * Math.exp(-z * z);
}

export function normalCdf(x: number): number {
  if (Number.isNaN(x)) return Number.NaN;
  return x >= 0 ? 1 - upperTail(x) : upperTail(-x);
}
