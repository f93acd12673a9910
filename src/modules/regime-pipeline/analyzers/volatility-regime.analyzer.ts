import { VolatilityConfig } from '../../../config/pipeline.config';
import { MarketWindow } from '../../../domain/types/market.types';
import { VolatilityOutcome, VolatilityRegime } from '../../../domain/types/results.types';
import { isUnavailable, unavailable } from '../../../domain/types/unavailable.type';
import { EPSILON, autocorrelation, candleReturns, clamp, mean, stddev } from '../utilities';

const HOURS_PER_YEAR = 24 * 365;

/**
 * Realized volatility of simple hourly returns, classified on its absolute
 * level. The ratio to baseline is reported but does not drive the regime.
 */
export class VolatilityRegimeAnalyzer {
  constructor(private readonly cfg: VolatilityConfig) {}

  analyze(window: MarketWindow): VolatilityOutcome {
    const hourly = window.candles['1h'];
    if (!hourly) return unavailable('volatility: 1h candles not requested');
    if (isUnavailable(hourly)) return unavailable(`volatility: ${hourly.reason}`);

    const candles = hourly
      .filter((c) => c.openTime <= window.asOf)
      .slice()
      .sort((a, b) => a.openTime - b.openTime)
      .slice(-(this.cfg.baselineHours + 1));

    const w = this.cfg.realizedWindow;
    const returns = candleReturns(candles).map((r) => r.value);
    if (returns.length < w) {
      // A short window would bias the estimate; report nothing instead.
      return unavailable(`volatility: ${returns.length} hourly returns, need ${w}`);
    }

    const volatility24h = stddev(returns.slice(-w));

    const rolling: number[] = [];
    for (let end = w; end <= returns.length; end++) {
      rolling.push(stddev(returns.slice(end - w, end)));
    }
    const baselineVolatility = mean(rolling);
    const volRatio = baselineVolatility > EPSILON ? volatility24h / baselineVolatility : volatility24h;

    const regime = this.classify(volatility24h);

    return {
      kind: 'volatility',
      symbol: window.symbol,
      volatility24h,
      annualizedVolatility: volatility24h * Math.sqrt(HOURS_PER_YEAR),
      baselineVolatility,
      volRatio,
      regime,
      clusteringProbability: clamp(autocorrelation(returns.map((r) => r * r), 1), 0, 1),
      riskMultiplier: this.cfg.riskMultipliers[regime],
      sampleCount: returns.length,
    };
  }

  /** Boundaries are inclusive on the calmer side: exactly b1 is STABLE. */
  classify(volatility: number): VolatilityRegime {
    const [stable, highVol, explosive] = this.cfg.boundaries;
    if (volatility <= stable) return 'STABLE';
    if (volatility <= highVol) return 'HIGH_VOL';
    if (volatility <= explosive) return 'EXPLOSIVE';
    return 'EXTREME';
  }
}
