/**
 * Score normalization and series statistics
 * All scores are normalized to 0-100 scale
 */

export function clamp(value: number, min: number = 0, max: number = 100): number {
  if (Number.isNaN(value)) return min;
  return Math.min(Math.max(value, min), max);
}

export function linearScale(
  value: number,
  inputMin: number,
  inputMax: number,
  outputMin: number = 0,
  outputMax: number = 100
): number {
  if (inputMax === inputMin) return value >= inputMax ? outputMax : outputMin;

  const normalized = (value - inputMin) / (inputMax - inputMin);
  return clamp(outputMin + normalized * (outputMax - outputMin), outputMin, outputMax);
}

export function roundScore(score: number, decimals: number = 1): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population standard deviation. */
export function stddev(values: readonly number[], avg: number = mean(values)): number {
  if (values.length === 0) return 0;
  let sumSqDiff = 0;
  for (const v of values) {
    sumSqDiff += (v - avg) ** 2;
  }
  return Math.sqrt(sumSqDiff / values.length);
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

/**
 * Least-squares slope of ys over xs. Returns 0 when fewer than two points or
 * when every x is identical.
 */
export function linearRegressionSlope(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return 0;

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumXX = 0;
  for (let i = 0; i < n; i++) {
    sumX += xs[i];
    sumY += ys[i];
    sumXY += xs[i] * ys[i];
    sumXX += xs[i] * xs[i];
  }

  const denominator = n * sumXX - sumX * sumX;
  if (denominator === 0) return 0;
  return (n * sumXY - sumX * sumY) / denominator;
}

/** Weighted contribution of a 0-100 sub-score, kept to 2 decimals. */
export function contribution(weight: number, subscore: number): number {
  return roundScore(weight * clamp(subscore), 2);
}

/** Final score: rounded sum of contributions, clamped to 0-100. */
export function composeScore(contributions: readonly number[]): number {
  let sum = 0;
  for (const c of contributions) sum += c;
  return clamp(Math.round(sum));
}
