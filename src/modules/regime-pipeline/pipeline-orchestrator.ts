import { PipelineConfig } from '../../config/pipeline.config';
import { CycleAbortedError, CycleInProgressError, errorMessage } from '../../domain/errors';
import {
  ICorrelationBaselineStore,
  IEventSink,
  IWindowProvider,
} from '../../domain/interfaces/services.interface';
import { MarketEvent, SinkAck } from '../../domain/types/event.types';
import { MarketWindow } from '../../domain/types/market.types';
import {
  CombinedReport,
  CorrelationOutcome,
  REPORT_SCHEMA_VERSION,
  SymbolReport,
  VolatilityRegime,
} from '../../domain/types/results.types';
import { Unavailable, isUnavailable, unavailable } from '../../domain/types/unavailable.type';
import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { CascadeAnalyzer } from './analyzers/cascade.analyzer';
import {
  CorrelationAnalyzer,
  ReturnSeries,
  pairKey,
  symbolPairs,
} from './analyzers/correlation.analyzer';
import { FundingAnomalyAnalyzer } from './analyzers/funding-anomaly.analyzer';
import { MultiTimeframeAnalyzer } from './analyzers/multi-timeframe.analyzer';
import { VolatilityRegimeAnalyzer } from './analyzers/volatility-regime.analyzer';
import { evaluateEvents } from './emission-policy';
import { RegimeStateStore } from './regime-state.store';
import { UnavailabilityTracker } from './unavailability-tracker';
import { candleReturns, mean } from './utilities';

const HOUR_MS = 3_600_000;

export interface CycleOptions {
  /** Cycle timestamp; defaults to now. Windows are read as of this instant. */
  asOf?: number;
  signal?: AbortSignal;
}

export interface CycleOutcome {
  report: CombinedReport;
  events: MarketEvent[];
  ack: SinkAck;
  /** Consecutive unavailable cycles per symbol, after this cycle. */
  consecutiveUnavailable: Record<string, number>;
  elapsedMs: number;
}

/**
 * Runs one cycle: fetch every symbol's window, run the per-symbol analyzers,
 * correlate the pairs, derive events and hand everything to the sink.
 * One cycle at a time; the volatility regime store is only advanced after
 * the sink acknowledged the cycle.
 */
@Injectable()
export class PipelineOrchestrator {
  private readonly logger = new Logger(PipelineOrchestrator.name);
  private readonly cascade: CascadeAnalyzer;
  private readonly funding: FundingAnomalyAnalyzer;
  private readonly volatility: VolatilityRegimeAnalyzer;
  private readonly multiTimeframe: MultiTimeframeAnalyzer;
  private readonly correlation: CorrelationAnalyzer;
  private running = false;

  constructor(
    @Inject('PipelineConfig') private readonly config: PipelineConfig,
    @Inject('IWindowProvider') private readonly windows: IWindowProvider,
    @Inject('ICorrelationBaselineStore') private readonly baselines: ICorrelationBaselineStore,
    @Inject('IEventSink') private readonly sink: IEventSink,
    private readonly regimeStore: RegimeStateStore,
    private readonly tracker: UnavailabilityTracker,
  ) {
    this.cascade = new CascadeAnalyzer(config.cascade);
    this.funding = new FundingAnomalyAnalyzer(config.funding);
    this.volatility = new VolatilityRegimeAnalyzer(config.volatility);
    this.multiTimeframe = new MultiTimeframeAnalyzer(config.multiTimeframe, config.timeframes);
    this.correlation = new CorrelationAnalyzer(config.correlation, config.symbols);
  }

  isRunning(): boolean {
    return this.running;
  }

  async runCycle(options: CycleOptions = {}): Promise<CycleOutcome> {
    if (this.running) throw new CycleInProgressError();
    this.running = true;
    try {
      return await this.execute(options.asOf ?? Date.now(), options.signal);
    } finally {
      this.running = false;
    }
  }

  private async execute(asOf: number, signal: AbortSignal | undefined): Promise<CycleOutcome> {
    const started = Date.now();
    const { symbols } = this.config;
    this.logger.info(`Cycle started for ${symbols.length} symbols`, {
      asOf: new Date(asOf).toISOString(),
    });

    throwIfAborted(signal, 'fetching windows');
    const windows = await Promise.all(symbols.map((s) => this.fetchWindow(s, asOf, signal)));
    throwIfAborted(signal, 'analysis');

    const perSymbol: Record<string, SymbolReport> = {};
    const returns: Record<string, ReturnSeries> = {};
    const averageVolumes: Record<string, number> = {};
    const availability: Record<string, boolean> = {};

    symbols.forEach((symbol, i) => {
      const window = windows[i];
      if (isUnavailable(window)) {
        this.logger.warn(`${symbol} unavailable this cycle: ${window.reason}`);
        perSymbol[symbol] = unavailableReport(window);
        returns[symbol] = window;
        availability[symbol] = false;
        return;
      }

      const report = this.analyzeSymbol(window);
      perSymbol[symbol] = report;
      availability[symbol] = !allUnavailable(report);
      returns[symbol] = this.hourlyReturns(window);
      averageVolumes[symbol] = this.averageHourlyVolume(window);
    });

    const pairwise = await this.correlate(asOf, returns, averageVolumes);

    const report: CombinedReport = {
      schemaVersion: REPORT_SCHEMA_VERSION,
      cycleTimestamp: asOf,
      perSymbol,
      pairwise,
    };

    const events = evaluateEvents(report, {
      symbols,
      previousRegimes: this.regimeStore.snapshot(),
      multiTimeframe: this.config.multiTimeframe,
    });

    throwIfAborted(signal, 'submitting to the sink');
    const consecutiveUnavailable = this.updateHealth(availability);
    const ack = await this.submit(events, report);

    if (ack.ok) {
      this.regimeStore.commit(regimeUpdates(report));
    } else {
      this.logger.error(`Sink rejected cycle, regime state not advanced: ${ack.error}`);
    }

    const elapsedMs = Date.now() - started;
    this.logger.info(`Cycle finished: ${events.length} events in ${elapsedMs}ms`, {
      events: countBySeverity(events),
      sinkOk: ack.ok,
    });

    return { report, events, ack, consecutiveUnavailable, elapsedMs };
  }

  private async fetchWindow(
    symbol: string,
    asOf: number,
    signal: AbortSignal | undefined,
  ): Promise<MarketWindow | Unavailable> {
    const timeoutMs = this.config.orchestrator.fetchTimeoutMs;
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<Unavailable>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(unavailable(`window fetch timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.windows.fetchWindow(symbol, this.config.timeframes, asOf, controller.signal),
        timeout,
      ]);
    } catch (error) {
      return unavailable(`window fetch failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private analyzeSymbol(window: MarketWindow): SymbolReport {
    const symbol = window.symbol;
    return {
      cascade: this.guard(symbol, 'cascade', () => this.cascade.analyze(window)),
      funding: this.guard(symbol, 'funding', () => this.funding.analyze(window)),
      volatility: this.guard(symbol, 'volatility', () => this.volatility.analyze(window)),
      regime: this.guard(symbol, 'regime', () => this.multiTimeframe.analyze(window)),
    };
  }

  // Analyzers do not throw on bad data; anything that escapes is a bug, kept local to the symbol.
  private guard<T>(symbol: string, analyzer: string, run: () => T): T | Unavailable {
    try {
      return run();
    } catch (error) {
      this.logger.error(`${analyzer} analyzer failed for ${symbol}`, error);
      return unavailable(`${analyzer}: ${errorMessage(error)}`);
    }
  }

  private async correlate(
    asOf: number,
    returns: Record<string, ReturnSeries>,
    averageVolumes: Record<string, number>,
  ): Promise<Record<string, CorrelationOutcome>> {
    const keys = symbolPairs(this.config.symbols).map(([a, b]) => pairKey(a, b));
    const values = await Promise.all(keys.map((key) => this.readBaseline(key)));
    const baselines: Record<string, number | Unavailable> = {};
    keys.forEach((key, i) => {
      baselines[key] = values[i];
    });

    let outcomes: CorrelationOutcome[];
    try {
      outcomes = this.correlation.analyze({ asOf, returns, baselines, averageVolumes });
    } catch (error) {
      this.logger.error('correlation analyzer failed', error);
      outcomes = keys.map((pair) => ({
        ...unavailable(`correlation: ${errorMessage(error)}`),
        pair,
      }));
    }

    const pairwise: Record<string, CorrelationOutcome> = {};
    for (const outcome of outcomes) pairwise[outcome.pair] = outcome;
    return pairwise;
  }

  private async readBaseline(pair: string): Promise<number | Unavailable> {
    try {
      return await this.baselines.getBaseline(pair);
    } catch (error) {
      this.logger.warn(`Baseline lookup failed for ${pair}`, error);
      return unavailable(`baseline: ${errorMessage(error)}`);
    }
  }

  private async submit(events: MarketEvent[], report: CombinedReport): Promise<SinkAck> {
    try {
      return await this.sink.submit(events, report);
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  private updateHealth(availability: Record<string, boolean>): Record<string, number> {
    const counts = this.tracker.recordCycle(availability);
    const alertAfter = this.config.orchestrator.unavailableAlertAfter;
    for (const [symbol, count] of Object.entries(counts)) {
      if (count >= alertAfter) {
        this.logger.warn(`${symbol} has been unavailable for ${count} consecutive cycles`);
      }
    }
    return counts;
  }

  private hourlyReturns(window: MarketWindow): ReturnSeries {
    const hourly = window.candles['1h'];
    if (!hourly) return unavailable('1h candles not requested');
    if (isUnavailable(hourly)) return hourly;
    return candleReturns([...hourly].sort((a, b) => a.openTime - b.openTime));
  }

  private averageHourlyVolume(window: MarketWindow): number {
    const hourly = window.candles['1h'];
    if (!hourly || isUnavailable(hourly)) return 0;
    const since = window.asOf - this.config.correlation.windowHours * HOUR_MS;
    return mean(hourly.filter((c) => c.openTime > since).map((c) => c.volume));
  }
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) throw new CycleAbortedError(stage);
}

function unavailableReport(marker: Unavailable): SymbolReport {
  return { cascade: marker, funding: marker, volatility: marker, regime: marker };
}

// A cascade of null means "nothing liquidated", which is data.
function allUnavailable(report: SymbolReport): boolean {
  return (
    isUnavailable(report.cascade) &&
    isUnavailable(report.funding) &&
    isUnavailable(report.volatility) &&
    isUnavailable(report.regime)
  );
}

function regimeUpdates(report: CombinedReport): Record<string, VolatilityRegime> {
  const updates: Record<string, VolatilityRegime> = {};
  for (const [symbol, entry] of Object.entries(report.perSymbol)) {
    if (!isUnavailable(entry.volatility)) updates[symbol] = entry.volatility.regime;
  }
  return updates;
}

function countBySeverity(events: readonly MarketEvent[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const e of events) counts[e.severity] = (counts[e.severity] ?? 0) + 1;
  return counts;
}
