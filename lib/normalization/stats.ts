export interface ColumnStats {
  count: number;
  mean: number | null;
  std: number | null;    // sample standard deviation (denominator n - 1)
}

export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population standard deviation (denominator n). Used only for run summaries. */
export function populationStd(values: readonly number[]): number {
  const mu = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - mu) * (v - mu);
  return Math.sqrt(ss / values.length);
}

/**
 * Mean and sample standard deviation of the present values. With fewer than
 * two observations the deviation is undefined (null).
 */
export function columnStats(values: readonly number[]): ColumnStats {
  const count = values.length;
  if (count === 0) return { count, mean: null, std: null };

  // constant input: exact mean, zero spread
  const first = values[0];
  if (values.every((v) => v === first)) {
    return { count, mean: first, std: count < 2 ? null : 0 };
  }

  const mu = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - mu) * (v - mu);
  return { count, mean: mu, std: Math.sqrt(ss / (count - 1)) };
}
