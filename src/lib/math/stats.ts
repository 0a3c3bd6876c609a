/**
 * Descriptive statistics used by the session-level analyzers.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Sample (Bessel-corrected) standard deviation; 0 below two samples. */
export function standardDeviation(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - m) * (v - m);
  return Math.sqrt(ss / (values.length - 1));
}

/** Coefficient of variation (%), 0 when the mean is ~0. */
export function coefficientOfVariation(values: readonly number[]): number {
  const m = mean(values);
  if (Math.abs(m) < 1e-9) return 0;
  return (standardDeviation(values) / m) * 100;
}

export interface LinearTrend {
  slope: number;
  intercept: number;
  rSquared: number;
}

/**
 * Ordinary least squares of `ys` against their index 0..n-1.
 */
export function linearRegression(ys: readonly number[]): LinearTrend {
  const n = ys.length;
  if (n < 2) return { slope: 0, intercept: ys[0] ?? 0, rSquared: 0 };

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumX2 = 0;
  for (let i = 0; i < n; i++) {
    sumX += i;
    sumY += ys[i];
    sumXY += i * ys[i];
    sumX2 += i * i;
  }

  const denom = n * sumX2 - sumX * sumX;
  if (Math.abs(denom) < 1e-12) {
    return { slope: 0, intercept: sumY / n, rSquared: 0 };
  }

  const slope = (n * sumXY - sumX * sumY) / denom;
  const intercept = (sumY - slope * sumX) / n;
  const meanY = sumY / n;

  let ssTot = 0;
  let ssRes = 0;
  for (let i = 0; i < n; i++) {
    const predicted = slope * i + intercept;
    ssTot += (ys[i] - meanY) * (ys[i] - meanY);
    ssRes += (ys[i] - predicted) * (ys[i] - predicted);
  }

  const rSquared = ssTot > 1e-12 ? Math.max(0, 1 - ssRes / ssTot) : 0;
  return { slope, intercept, rSquared };
}

/** Robinson symmetry index: |L−R| / (0.5·(L+R)) × 100. */
export function robinsonSymmetryIndex(left: number, right: number): number {
  const avg = 0.5 * (left + right);
  if (Math.abs(avg) < 1e-9) return 0;
  return (Math.abs(left - right) / avg) * 100;
}

export function range(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return max - min;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
