import { MarketEvent, SinkAck } from '../types/event.types';
import { MarketWindow, Timeframe } from '../types/market.types';
import { CombinedReport } from '../types/results.types';
import { Unavailable } from '../types/unavailable.type';

export interface IWindowProvider {
  /**
   * Missing sub-series come back as Unavailable markers inside the window; the
   * whole call is Unavailable only when nothing could be read for the symbol.
   */
  fetchWindow(
    symbol: string,
    timeframes: readonly Timeframe[],
    asOf: number,
    signal?: AbortSignal,
  ): Promise<MarketWindow | Unavailable>;
}

export interface ICorrelationBaselineStore {
  getBaseline(pair: string): Promise<number | Unavailable>;
  setBaseline(pair: string, value: number): Promise<void>;
}

export interface IEventSink {
  open(): Promise<void>;
  submit(events: readonly MarketEvent[], report: CombinedReport): Promise<SinkAck>;
  close(): Promise<void>;
}

/** One delivery target (webhook set, chat). Throws SinkDeliveryError on failure. */
export interface INotificationChannel {
  readonly name: string;
  send(event: MarketEvent): Promise<void>;
}
