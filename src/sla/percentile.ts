/**
 * Interpolated-rank percentile.
 *
 * P_k is the value at position (k/100)·(n−1) of the ascending sample, with
 * linear interpolation between the two neighbouring order statistics.
 */
export function percentile(values: readonly number[], k: number): number | null {
  if (values.length === 0) return null;
  if (k < 0 || k > 100) throw new RangeError(`Percentile out of range: ${k}`);

  const sorted = [...values].sort((a, b) => a - b);
  const pos = (k / 100) * (sorted.length - 1);
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function median(values: readonly number[]): number | null {
  return percentile(values, 50);
}

/** Round half away from zero to a fixed number of decimals */
export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.sign(value) * Math.round((Math.abs(value) + Number.EPSILON) * factor) / factor;
}
