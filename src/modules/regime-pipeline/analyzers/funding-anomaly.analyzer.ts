import { FundingConfig } from '../../../config/pipeline.config';
import { MarketWindow } from '../../../domain/types/market.types';
import { ExtremeLevel, FundingOutcome } from '../../../domain/types/results.types';
import { isUnavailable, unavailable } from '../../../domain/types/unavailable.type';
import { EPSILON, mean, stddev } from '../utilities';

const DAY_MS = 86_400_000;

/**
 * Z-score of the latest funding rate against the trailing window, using
 * population statistics so small windows give reproducible numbers.
 */
export class FundingAnomalyAnalyzer {
  constructor(private readonly cfg: FundingConfig) {}

  analyze(window: MarketWindow): FundingOutcome {
    if (isUnavailable(window.funding)) {
      return unavailable(`funding: ${window.funding.reason}`);
    }

    const since = window.asOf - this.cfg.windowDays * DAY_MS;
    const samples = window.funding
      .filter((s) => s.timestamp > since && s.timestamp <= window.asOf && Number.isFinite(s.rate))
      .slice()
      .sort((a, b) => a.timestamp - b.timestamp);

    if (samples.length === 0) {
      return unavailable('funding: no samples in trailing window');
    }

    const rates = samples.map((s) => s.rate);
    const current = rates[rates.length - 1];
    const previous = rates.length >= 2 ? rates[rates.length - 2] : null;
    const m = mean(rates);
    const sd = stddev(rates);
    const threshold = this.cfg.zThreshold;

    // No variance: z is pinned to 0 and nothing can be anomalous.
    const degenerate = !(sd > EPSILON);
    const z = (rate: number): number => (degenerate ? 0 : (rate - m) / sd);

    const zScore = z(current);
    const isAnomaly = !degenerate && Math.abs(zScore) >= threshold;
    const persistenceScore = degenerate
      ? 0
      : rates.filter((r) => Math.abs(z(r)) >= threshold).length / rates.length;

    const reversalDetected =
      previous !== null &&
      Math.sign(previous) * Math.sign(current) < 0 &&
      Math.abs(z(previous)) >= threshold;

    const reasons: string[] = [];
    if (isAnomaly) reasons.push(`Z-score anomaly: ${zScore.toFixed(2)}σ`);
    if (reversalDetected && previous !== null) {
      reasons.push(`Reversal ${current > previous ? '↑' : '↓'}: ${previous.toFixed(6)} → ${current.toFixed(6)}`);
    }

    return {
      kind: 'funding',
      symbol: window.symbol,
      fundingRate: current,
      mean: m,
      stdDev: sd,
      sampleCount: rates.length,
      zScore,
      isAnomaly,
      extremeLevel: this.extremeLevel(isAnomaly, zScore),
      persistenceScore,
      fundingChange: previous === null ? null : current - previous,
      reversalDetected,
      reasons,
    };
  }

  private extremeLevel(isAnomaly: boolean, zScore: number): ExtremeLevel {
    if (!isAnomaly) return 'NONE';
    return Math.abs(zScore) < this.cfg.zThreshold + 1 ? 'MODERATE' : 'HIGH';
  }
}
