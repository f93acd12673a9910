import { Series } from './unavailable.type';

export type Timeframe = '1h' | '4h' | '1d' | '1w';

// Ordered shortest to longest.
export const TIMEFRAMES: readonly Timeframe[] = ['1h', '4h', '1d', '1w'];

export const TIMEFRAME_HOURS: Readonly<Record<Timeframe, number>> = {
  '1h': 1,
  '4h': 4,
  '1d': 24,
  '1w': 168,
};

export function isTimeframe(value: string): value is Timeframe {
  return (TIMEFRAMES as readonly string[]).includes(value);
}

export interface Candle {
  readonly openTime: number; // ms epoch
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export type LiquidationSide = 'LONG' | 'SHORT';

export interface LiquidationRecord {
  readonly timestamp: number;
  readonly usdAmount: number;
  readonly side: LiquidationSide;
  readonly price?: number;
}

export interface FundingSample {
  readonly timestamp: number;
  readonly rate: number;
}

export interface ReturnPoint {
  readonly timestamp: number;
  readonly value: number;
}

/**
 * Everything the analyzers see for one symbol in one cycle. Built by the window
 * provider, never mutated afterwards.
 */
export interface MarketWindow {
  readonly symbol: string;
  readonly asOf: number;
  readonly candles: Readonly<Partial<Record<Timeframe, Series<Candle>>>>;
  readonly liquidations: Series<LiquidationRecord>;
  readonly funding: Series<FundingSample>;
}
