/**
 * Descriptive statistics shared by the job and cluster aggregators.
 *
 * Sums are always taken over an ascending copy of the values so that the
 * result does not depend on the order rows arrived in.
 */

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Arithmetic mean of an ascending list, clamped to `[min, max]`: rounding in
 * the running sum can otherwise land the quotient just past either end, as
 * with three readings of 0.1.
 */
export function mean(sorted: readonly number[]): number {
  if (sorted.length === 0) throw new RangeError('mean of an empty list');
  let sum = 0;
  for (const v of sorted) sum += v;
  return Math.min(Math.max(sum / sorted.length, sorted[0]), sorted[sorted.length - 1]);
}

/**
 * Percentile by linear interpolation between closest ranks.
 *
 * For N sorted values the p-th percentile sits at index `p/100 * (N-1)`;
 * a fractional index interpolates between the two neighbouring values.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) throw new RangeError('percentile of an empty list');
  if (!(p >= 0 && p <= 100)) throw new RangeError(`percentile out of range: ${p}`);

  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  if (lower === upper) return sorted[lower];

  const fraction = index - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

export interface NumericSummary {
  count: number;
  mean: number;
  min: number;
  max: number;
}

/** Count, mean, min and max of an ascending list, or null when it is empty. */
export function summarize(sorted: readonly number[]): NumericSummary | null {
  if (sorted.length === 0) return null;
  return {
    count: sorted.length,
    mean: mean(sorted),
    min: sorted[0],
    max: sorted[sorted.length - 1],
  };
}

export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
  return denominator === 0 ? fallback : numerator / denominator;
}
