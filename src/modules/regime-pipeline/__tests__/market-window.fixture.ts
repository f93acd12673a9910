import { Candle, MarketWindow } from '../../../domain/types/market.types';

export const HOUR = 3_600_000;
export const AS_OF = Date.UTC(2024, 0, 31);

export function makeWindow(overrides: Partial<MarketWindow> = {}): MarketWindow {
  return {
    symbol: 'BTC/USDT',
    asOf: AS_OF,
    candles: {},
    liquidations: [],
    funding: [],
    ...overrides,
  };
}

/**
 * Candles whose close-to-close returns are `returns`, the last one opening at `end`.
 * `volumes` must have returns.length + 1 entries when given.
 */
export function candlesFromReturns(
  returns: readonly number[],
  volumes?: readonly number[],
  stepMs: number = HOUR,
  end: number = AS_OF,
): Candle[] {
  const closes = [100];
  for (const r of returns) closes.push(closes[closes.length - 1] * (1 + r));
  return closes.map((close, i) => ({
    openTime: end - (closes.length - 1 - i) * stepMs,
    open: close,
    high: close,
    low: close,
    close,
    volume: volumes ? volumes[i] : 100,
  }));
}

export function alternating(count: number, a: number, b: number): number[] {
  return Array.from({ length: count }, (_, i) => (i % 2 === 0 ? a : b));
}
