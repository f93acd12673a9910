import { MultiTimeframeConfig } from '../../../config/pipeline.config';
import {
  Candle,
  MarketWindow,
  TIMEFRAME_HOURS,
  Timeframe,
} from '../../../domain/types/market.types';
import {
  MultiTimeframeOutcome,
  TimeframeRegime,
  TimeframeSignal,
} from '../../../domain/types/results.types';
import { isUnavailable, unavailable } from '../../../domain/types/unavailable.type';
import { candleReturns, mean, stddev, zScore } from '../utilities';

export interface RegimeAgreement {
  primaryRegime: TimeframeRegime;
  agreementCount: number;
  availableTimeframes: number;
  confidence: number | null;
}

/**
 * Classifies each timeframe independently from its price and volume z-scores,
 * then scores how many timeframes agree with the most common label.
 */
export class MultiTimeframeAnalyzer {
  constructor(
    private readonly cfg: MultiTimeframeConfig,
    private readonly timeframes: readonly Timeframe[],
  ) {}

  analyze(window: MarketWindow): MultiTimeframeOutcome {
    const ordered = [...this.timeframes].sort((a, b) => TIMEFRAME_HOURS[a] - TIMEFRAME_HOURS[b]);
    const perTimeframe: Partial<Record<Timeframe, TimeframeSignal>> = {};
    const labelled: Array<[Timeframe, TimeframeRegime]> = [];
    const unavailableTimeframes: Timeframe[] = [];

    for (const tf of ordered) {
      const series = window.candles[tf];
      const signal =
        series && !isUnavailable(series) ? this.timeframeSignal(series, tf, window.asOf) : null;
      if (!signal) {
        unavailableTimeframes.push(tf);
        continue;
      }
      perTimeframe[tf] = signal;
      labelled.push([tf, signal.regime]);
    }

    const agreement = aggregateRegimes(labelled);
    if (!agreement) {
      return unavailable('regime: no timeframe had enough candles');
    }

    return {
      kind: 'regime',
      symbol: window.symbol,
      perTimeframe,
      unavailableTimeframes,
      ...agreement,
    };
  }

  /**
   * The closing candle against the `baselineWindows[tf]` candles before it.
   * Null when fewer than minObservations baseline candles exist.
   */
  timeframeSignal(series: readonly Candle[], tf: Timeframe, asOf: number): TimeframeSignal | null {
    const candles = series
      .filter((c) => c.openTime <= asOf)
      .slice()
      .sort((a, b) => a.openTime - b.openTime);
    const w = this.cfg.baselineWindows[tf];

    const returns = candleReturns(candles).map((r) => r.value);
    const volumes = candles.map((c) => c.volume);
    const returnBase = returns.slice(-(w + 1), -1);
    const volumeBase = volumes.slice(-(w + 1), -1);
    if (returnBase.length < this.cfg.minObservations || volumeBase.length < this.cfg.minObservations) {
      return null;
    }

    const priceZ = zScore(returns[returns.length - 1], mean(returnBase), stddev(returnBase));
    const heat = zScore(volumes[volumes.length - 1], mean(volumeBase), stddev(volumeBase));

    return { regime: this.classify(priceZ, heat), priceZ, heat };
  }

  classify(priceZ: number, heat: number): TimeframeRegime {
    const c = this.cfg;
    if (priceZ > c.ignitionZ && heat > c.ignitionZ) return 'IGNITION';
    if (priceZ < c.coolingPriceZ && heat >= c.coolingMinHeat) return 'COOLING';
    if (Math.abs(priceZ) < c.chopBand) return 'CHOP';
    // Directional move without the volume to call it ignition or cooling.
    return 'NEUTRAL';
  }
}

/**
 * Mode of the labels; ties go to the label seen on the shortest timeframe.
 * `labelled` must be ordered shortest timeframe first.
 */
export function aggregateRegimes(
  labelled: ReadonlyArray<readonly [Timeframe, TimeframeRegime]>,
): RegimeAgreement | null {
  if (labelled.length === 0) return null;

  const counts = new Map<TimeframeRegime, number>();
  for (const [, regime] of labelled) counts.set(regime, (counts.get(regime) ?? 0) + 1);
  const best = Math.max(...counts.values());

  const primary = labelled.find(([, regime]) => counts.get(regime) === best);
  if (!primary) return null;

  return {
    primaryRegime: primary[1],
    agreementCount: best,
    availableTimeframes: labelled.length,
    confidence: labelled.length >= 2 ? best / labelled.length : null,
  };
}
