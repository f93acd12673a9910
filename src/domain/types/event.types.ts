import { AnalysisPayload } from './results.types';

export type EventSeverity = 'INFO' | 'WARNING' | 'CRITICAL';

export type MarketEventType =
  | 'LIQUIDATION_CASCADE'
  | 'FUNDING_ANOMALY'
  | 'FUNDING_REVERSAL'
  | 'VOLATILITY_REGIME_CHANGE'
  | 'REGIME_CONFIRMED'
  | 'CORRELATION_BREAK';

/** Routing key for notification endpoints. */
export type EventSource = 'CASCADE' | 'FUNDING' | 'VOLATILITY' | 'REGIME' | 'CORRELATION';

export interface MarketEvent {
  readonly eventType: MarketEventType;
  readonly source: EventSource;
  readonly severity: EventSeverity;
  readonly subject: string; // symbol or pair key
  readonly title: string;
  readonly description: string;
  readonly payload: AnalysisPayload;
  readonly timestamp: number;
}

export type SinkAck =
  | { readonly ok: true; readonly persistedEvents: number; readonly queuedNotifications: number }
  | { readonly ok: false; readonly error: string };
