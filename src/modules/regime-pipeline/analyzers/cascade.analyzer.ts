import { CascadeConfig } from '../../../config/pipeline.config';
import { ConfigurationError } from '../../../domain/errors';
import { LiquidationRecord, MarketWindow } from '../../../domain/types/market.types';
import {
  CascadeOutcome,
  CascadeSeverity,
  LiquidationLevel,
  SideBias,
} from '../../../domain/types/results.types';
import { isUnavailable, unavailable } from '../../../domain/types/unavailable.type';
import { sum } from '../utilities';

const HOUR_MS = 3_600_000;
const SEVERITIES: readonly CascadeSeverity[] = [1, 2, 3, 4, 5];

/**
 * Liquidation cascade severity from the velocity of liquidated USD over the
 * lookback. Returns null (not severity 0) when nothing was liquidated.
 */
export class CascadeAnalyzer {
  constructor(private readonly cfg: CascadeConfig) {
    if (!(cfg.lookbackHours > 0)) {
      throw new ConfigurationError(['cascade lookbackHours must be > 0']);
    }
  }

  analyze(window: MarketWindow): CascadeOutcome {
    if (isUnavailable(window.liquidations)) {
      return unavailable(`liquidations: ${window.liquidations.reason}`);
    }

    const since = window.asOf - this.cfg.lookbackHours * HOUR_MS;
    const records = window.liquidations.filter(
      (r) =>
        r.timestamp > since &&
        r.timestamp <= window.asOf &&
        Number.isFinite(r.usdAmount) &&
        r.usdAmount >= 0,
    );

    const longUsd = sum(records.filter((r) => r.side === 'LONG').map((r) => r.usdAmount));
    const shortUsd = sum(records.filter((r) => r.side === 'SHORT').map((r) => r.usdAmount));
    const total = longUsd + shortUsd;
    if (total <= 0) return null;

    const velocity = total / this.cfg.lookbackHours;
    const currentPrice = this.currentPrice(window);
    const levels = currentPrice === null ? [] : this.clusterLevels(records);

    return {
      kind: 'cascade',
      symbol: window.symbol,
      lookbackHours: this.cfg.lookbackHours,
      totalLiquidatedUsd: total,
      longLiquidatedUsd: longUsd,
      shortLiquidatedUsd: shortUsd,
      velocityUsdPerHour: velocity,
      severity: this.severityFor(velocity),
      sideBias: this.sideBias(longUsd, shortUsd),
      supportLevels: currentPrice === null
        ? []
        : levels.filter((l) => l.price <= currentPrice).sort((a, b) => b.price - a.price),
      resistanceLevels: currentPrice === null
        ? []
        : levels.filter((l) => l.price > currentPrice).sort((a, b) => a.price - b.price),
    };
  }

  /** A velocity equal to a boundary falls in the bucket above it. */
  severityFor(velocity: number): CascadeSeverity {
    const crossed = this.cfg.severityBoundaries.filter((b) => velocity >= b).length;
    return SEVERITIES[Math.min(crossed, SEVERITIES.length - 1)];
  }

  sideBias(longUsd: number, shortUsd: number): SideBias {
    const total = longUsd + shortUsd;
    if (total <= 0) return 'BALANCED';
    if (Math.abs(longUsd - shortUsd) / total <= this.cfg.balancedTolerance) return 'BALANCED';
    return longUsd > shortUsd ? 'LONG' : 'SHORT';
  }

  private currentPrice(window: MarketWindow): number | null {
    const hourly = window.candles['1h'];
    if (!hourly || isUnavailable(hourly) || hourly.length === 0) return null;
    return hourly[hourly.length - 1].close;
  }

  // Equal-width price bins across the observed range; top N bins by liquidated USD.
  private clusterLevels(records: readonly LiquidationRecord[]): LiquidationLevel[] {
    const priced = records.filter(
      (r): r is LiquidationRecord & { price: number } =>
        r.price !== undefined && Number.isFinite(r.price) && r.price > 0,
    );
    if (priced.length === 0 || this.cfg.topLevels === 0) return [];

    let min = Infinity;
    let max = -Infinity;
    for (const r of priced) {
      if (r.price < min) min = r.price;
      if (r.price > max) max = r.price;
    }
    const bins = this.cfg.levelBins;
    const width = (max - min) / bins;

    const acc = Array.from({ length: bins }, () => ({ usd: 0, weighted: 0, plain: 0, count: 0 }));
    for (const r of priced) {
      const idx = width > 0 ? Math.min(Math.floor((r.price - min) / width), bins - 1) : 0;
      const bin = acc[idx];
      bin.usd += r.usdAmount;
      bin.weighted += r.price * r.usdAmount;
      bin.plain += r.price;
      bin.count += 1;
    }

    return acc
      .filter((b) => b.count > 0)
      .sort((a, b) => b.usd - a.usd)
      .slice(0, this.cfg.topLevels)
      .map((b) => ({
        price: b.usd > 0 ? b.weighted / b.usd : b.plain / b.count,
        usdAmount: b.usd,
      }));
  }
}
