import { MultiTimeframeConfig } from '../../config/pipeline.config';
import { EventSeverity, MarketEvent } from '../../domain/types/event.types';
import {
  CascadeResult,
  CombinedReport,
  CorrelationResult,
  FundingAnomalyResult,
  MultiTimeframeResult,
  VolatilityRegime,
  VolatilityResult,
} from '../../domain/types/results.types';
import { isUnavailable } from '../../domain/types/unavailable.type';

export interface EmissionContext {
  readonly symbols: readonly string[];
  /** Regime recorded for each symbol by the last committed cycle. */
  readonly previousRegimes: Readonly<Record<string, VolatilityRegime>>;
  readonly multiTimeframe: Pick<MultiTimeframeConfig, 'highConfidence'>;
}

/**
 * Turns a report into events. Pure: the same report and previous regimes
 * always give the same list, grouped by analyzer type, symbols in config order.
 */
export function evaluateEvents(report: CombinedReport, ctx: EmissionContext): MarketEvent[] {
  const ts = report.cycleTimestamp;
  const present = ctx.symbols.filter((s) => report.perSymbol[s] !== undefined);
  const events: MarketEvent[] = [];

  for (const symbol of present) {
    const cascade = report.perSymbol[symbol].cascade;
    if (cascade !== null && !isUnavailable(cascade)) {
      const event = cascadeEvent(cascade, ts);
      if (event) events.push(event);
    }
  }

  for (const symbol of present) {
    const funding = report.perSymbol[symbol].funding;
    if (!isUnavailable(funding)) {
      const event = fundingEvent(funding, ts);
      if (event) events.push(event);
    }
  }

  for (const symbol of present) {
    const volatility = report.perSymbol[symbol].volatility;
    if (!isUnavailable(volatility)) {
      const event = volatilityEvent(volatility, ctx.previousRegimes[symbol], ts);
      if (event) events.push(event);
    }
  }

  for (const symbol of present) {
    const regime = report.perSymbol[symbol].regime;
    if (!isUnavailable(regime)) {
      const event = regimeEvent(regime, ctx.multiTimeframe.highConfidence, ts);
      if (event) events.push(event);
    }
  }

  for (const outcome of Object.values(report.pairwise)) {
    if (!isUnavailable(outcome) && outcome.breakout) events.push(correlationEvent(outcome, ts));
  }

  return events;
}

export function cascadeEvent(result: CascadeResult, ts: number): MarketEvent | null {
  if (result.severity < 3) return null;
  return {
    eventType: 'LIQUIDATION_CASCADE',
    source: 'CASCADE',
    severity: result.severity >= 4 ? 'CRITICAL' : 'WARNING',
    subject: result.symbol,
    title: `Liquidation Cascade Detected - ${result.symbol}`,
    description: `Large liquidation event with velocity ${result.velocityUsdPerHour.toFixed(0)} USD/h (severity ${result.severity}, ${result.sideBias})`,
    payload: result,
    timestamp: ts,
  };
}

// An anomaly already covers the reversal that caused it.
export function fundingEvent(result: FundingAnomalyResult, ts: number): MarketEvent | null {
  if (result.isAnomaly) {
    return {
      eventType: 'FUNDING_ANOMALY',
      source: 'FUNDING',
      severity: 'WARNING',
      subject: result.symbol,
      title: `Funding Rate Anomaly - ${result.symbol}`,
      description: `Extreme funding detected: ${result.fundingRate.toFixed(4)} (z ${result.zScore.toFixed(2)})`,
      payload: result,
      timestamp: ts,
    };
  }
  if (result.reversalDetected) {
    return {
      eventType: 'FUNDING_REVERSAL',
      source: 'FUNDING',
      severity: 'INFO',
      subject: result.symbol,
      title: `Funding Reversal Signal - ${result.symbol}`,
      description: `Funding trend reversal detected at level: ${result.extremeLevel}`,
      payload: result,
      timestamp: ts,
    };
  }
  return null;
}

export function volatilityEvent(
  result: VolatilityResult,
  previous: VolatilityRegime | undefined,
  ts: number,
): MarketEvent | null {
  if (previous === result.regime) return null;
  return {
    eventType: 'VOLATILITY_REGIME_CHANGE',
    source: 'VOLATILITY',
    severity: volatilitySeverity(result.regime),
    subject: result.symbol,
    title: `Volatility Regime Change - ${result.symbol}`,
    description: `Volatility changed from ${previous ?? 'UNKNOWN'} to ${result.regime}`,
    payload: result,
    timestamp: ts,
  };
}

function volatilitySeverity(regime: VolatilityRegime): EventSeverity {
  switch (regime) {
    case 'EXTREME':
      return 'CRITICAL';
    case 'EXPLOSIVE':
      return 'WARNING';
    case 'STABLE':
    case 'HIGH_VOL':
      return 'INFO';
  }
}

export function regimeEvent(
  result: MultiTimeframeResult,
  highConfidence: number,
  ts: number,
): MarketEvent | null {
  if (result.confidence === null || result.confidence < highConfidence) return null;
  return {
    eventType: 'REGIME_CONFIRMED',
    source: 'REGIME',
    severity: 'INFO',
    subject: result.symbol,
    title: `Regime Confirmed - ${result.symbol}`,
    description: `Multi-timeframe confirmation for ${result.primaryRegime} regime (${result.agreementCount}/${result.availableTimeframes} timeframes)`,
    payload: result,
    timestamp: ts,
  };
}

export function correlationEvent(result: CorrelationResult, ts: number): MarketEvent {
  return {
    eventType: 'CORRELATION_BREAK',
    source: 'CORRELATION',
    severity: 'WARNING',
    subject: result.pair,
    title: `Correlation Break - ${result.pair}`,
    description: `Pair correlation moved to ${result.currentCorrelation.toFixed(2)} from baseline ${(result.baselineCorrelation ?? 0).toFixed(2)}`,
    payload: result,
    timestamp: ts,
  };
}
