import { Candle, ReturnPoint } from '../../domain/types/market.types';

export const EPSILON = 1e-12;

export function clamp(x: number, a: number, b: number): number {
  return Math.max(a, Math.min(b, x));
}

export function mean(arr: readonly number[]): number {
  if (!arr.length) return 0;
  return arr.reduce((s, n) => s + n, 0) / arr.length;
}

/** Population standard deviation (divides by n, not n - 1). */
export function stddev(arr: readonly number[]): number {
  if (!arr.length) return 0;
  const m = mean(arr);
  return Math.sqrt(arr.reduce((s, n) => s + (n - m) * (n - m), 0) / arr.length);
}

/** Pearson correlation of two equal-length series; 0 when either has no variance relative to its magnitude. */
export function pearson(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  if (n < 2) return 0;
  let sumA = 0, sumB = 0, sumA2 = 0, sumB2 = 0, sumAB = 0;
  for (let i = 0; i < n; i++) {
    const x = a[a.length - n + i];
    const y = b[b.length - n + i];
    sumA += x; sumB += y; sumA2 += x * x; sumB2 += y * y; sumAB += x * y;
  }
  const num = n * sumAB - sumA * sumB;
  const den = Math.sqrt((n * sumA2 - sumA * sumA) * (n * sumB2 - sumB * sumB));
  if (!(den > EPSILON * n * Math.sqrt(sumA2 * sumB2))) return 0;
  return clamp(num / den, -1, 1);
}

/**
 * Lag-k autocorrelation around the series mean. The no-variance guard is
 * relative to the series' own magnitude, so rescaling the input leaves the
 * result unchanged.
 */
export function autocorrelation(arr: readonly number[], lag: number = 1): number {
  if (arr.length <= lag + 1) return 0;
  const m = mean(arr);
  let num = 0;
  let den = 0;
  let sumSq = 0;
  for (let i = 0; i < arr.length; i++) {
    const d = arr[i] - m;
    den += d * d;
    sumSq += arr[i] * arr[i];
    if (i >= lag) num += d * (arr[i - lag] - m);
  }
  if (!(den > EPSILON * sumSq)) return 0;
  return num / den;
}

/** (value - mean) / std, or 0 when the distribution is degenerate. */
export function zScore(value: number, m: number, sd: number): number {
  if (!(sd > EPSILON)) return 0;
  return (value - m) / sd;
}

/** Simple close-to-close returns, stamped with the later candle's open time. */
export function candleReturns(candles: readonly Candle[]): ReturnPoint[] {
  const out: ReturnPoint[] = [];
  for (let i = 1; i < candles.length; i++) {
    const prev = candles[i - 1].close;
    if (!(Math.abs(prev) > EPSILON)) continue;
    out.push({ timestamp: candles[i].openTime, value: candles[i].close / prev - 1 });
  }
  return out;
}

export function sum(arr: readonly number[]): number {
  return arr.reduce((s, n) => s + n, 0);
}
