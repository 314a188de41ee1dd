/**
 * Growth-curve primitives: CAGR, compound projection, confidence bands.
 */

import { EngineError } from "./errors";

/** rate = (end/start)^(1/years) - 1 */
export function cagr(start: number, end: number, years: number): number {
  if (!(years > 0)) {
    throw new EngineError("INVALID_YEARS", `Years must be positive (got ${years})`);
  }
  if (!(start > 0) || !(end > 0)) {
    throw new EngineError(
      "NON_POSITIVE_SALARY",
      `Start and end salaries must be positive (got ${start} and ${end})`
    );
  }
  return Math.pow(end / start, 1 / years) - 1;
}

/** initial × (1 + annualRate)^years */
export function project(initial: number, annualRate: number, years: number): number {
  return initial * Math.pow(1 + annualRate, years);
}

// Acklam's rational approximation of the inverse standard normal CDF.
const A = [
  -3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2,
  1.38357751867269e2, -3.066479806614716e1, 2.506628277459239,
];
const B = [
  -5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2,
  6.680131188771972e1, -1.328068155288572e1,
];
const C = [
  -7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838,
  -2.549732539343734, 4.374664141464968, 2.938163982698783,
];
const D = [
  7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996,
  3.754408661907416,
];
const P_LOW = 0.02425;

/** Standard normal quantile for p in (0,1). Relative error below 1.2e-9. */
export function normalQuantile(p: number): number {
  if (!(p > 0 && p < 1)) {
    throw new EngineError("INVALID_CONFIDENCE", `Probability must be in (0,1) (got ${p})`);
  }
  if (p < P_LOW) {
    const q = Math.sqrt(-2 * Math.log(p));
    return (
      (((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
      ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1)
    );
  }
  if (p > 1 - P_LOW) {
    return -normalQuantile(1 - p);
  }
  const q = p - 0.5;
  const r = q * q;
  return (
    ((((((A[0] * r + A[1]) * r + A[2]) * r + A[3]) * r + A[4]) * r + A[5]) * q) /
    (((((B[0] * r + B[1]) * r + B[2]) * r + B[3]) * r + B[4]) * r + 1)
  );
}

export interface ConfidenceBand {
  lower: number;
  upper: number;
}

/**
 * Symmetric band base × (1 ± z × spread), z the two-sided quantile for
 * confidenceLevel (0.95 → 1.96).
 */
export function confidenceInterval(
  base: number,
  confidenceLevel: number,
  spread: number
): ConfidenceBand {
  if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
    throw new EngineError(
      "INVALID_CONFIDENCE",
      `Confidence level must be in (0,1) (got ${confidenceLevel})`
    );
  }
  const z = normalQuantile((1 + confidenceLevel) / 2);
  const halfWidth = base * z * spread;
  return { lower: base - halfWidth, upper: base + halfWidth };
}

/** Linear interpolation for percentiles (e.g. p=25 → 25th percentile). */
export function percentile(sorted: number[], p: number): number | null {
  if (sorted.length === 0) return null;
  const idx = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo];
  const frac = idx - lo;
  return sorted[lo] * (1 - frac) + sorted[hi] * frac;
}
