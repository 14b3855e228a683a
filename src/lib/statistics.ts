export interface IndexedValue {
  row: number;
  value: number;
}

/** Non-missing values of a column paired with their row index. */
export function presentValues(values: readonly (number | null)[]): IndexedValue[] {
  const out: IndexedValue[] = [];
  values.forEach((value, row) => {
    if (value !== null && !Number.isNaN(value)) out.push({ row, value });
  });
  return out;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Sample standard deviation (n - 1). NaN for fewer than two values. */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  let squares = 0;
  for (const v of values) squares += (v - m) * (v - m);
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Quantile with linear interpolation between the closest ranks.
 * `sorted` must be ascending.
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return NaN;
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export interface IqrBounds {
  q1: number;
  q3: number;
  lower: number;
  upper: number;
}

export function iqrBounds(values: readonly number[], k = 1.5): IqrBounds {
  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  return { q1, q3, lower: q1 - k * iqr, upper: q3 + k * iqr };
}

/**
 * Pearson correlation over rows where both columns have a value.
 * NaN when fewer than two pairs remain or either side has zero variance.
 */
export function pearson(xs: readonly (number | null)[], ys: readonly (number | null)[]): number {
  const px: number[] = [];
  const py: number[] = [];
  const n = Math.min(xs.length, ys.length);
  for (let i = 0; i < n; i++) {
    const x = xs[i];
    const y = ys[i];
    if (x === null || y === null || Number.isNaN(x) || Number.isNaN(y)) continue;
    px.push(x);
    py.push(y);
  }
  if (px.length < 2) return NaN;

  const mx = mean(px);
  const my = mean(py);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < px.length; i++) {
    const dx = px[i] - mx;
    const dy = py[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return NaN;
  return sxy / Math.sqrt(sxx * syy);
}

export function percentOf(count: number, total: number): number {
  return (count / total) * 100;
}
