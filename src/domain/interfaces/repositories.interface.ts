import { MarketEventEntity } from '../entities/market-event.entity';
import { MarketEvent } from '../types/event.types';
import { Candle, FundingSample, LiquidationRecord, Timeframe } from '../types/market.types';
import { CombinedReport } from '../types/results.types';

export interface IMarketDataRepository {
  /** The latest `limit` candles opening at or before `asOf`, oldest first. */
  findCandles(symbol: string, timeframe: Timeframe, asOf: number, limit: number): Promise<Candle[]>;
  /** Records with from < timestamp <= to. */
  findLiquidations(symbol: string, from: number, to: number): Promise<LiquidationRecord[]>;
  findFundingRates(symbol: string, from: number, to: number): Promise<FundingSample[]>;
}

export interface ICorrelationBaselineRepository {
  findValue(pair: string): Promise<number | null>;
  upsert(pair: string, value: number): Promise<void>;
}

export interface ICycleReportRepository {
  /** Stores the report and its events atomically; returns the number of events written. */
  saveCycle(report: CombinedReport, events: readonly MarketEvent[]): Promise<number>;
  findLatest(): Promise<CombinedReport | null>;
}

export interface IMarketEventRepository {
  findRecent(limit: number): Promise<MarketEventEntity[]>;
}
