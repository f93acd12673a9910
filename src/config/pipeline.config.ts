import { Timeframe } from '../domain/types/market.types';
import { VolatilityRegime } from '../domain/types/results.types';

export interface CascadeConfig {
  readonly lookbackHours: number;
  /** Four ascending velocity boundaries (USD/h) splitting severities 1..5. */
  readonly severityBoundaries: readonly number[];
  /** Max |long - short| / total for a BALANCED side bias. */
  readonly balancedTolerance: number;
  readonly levelBins: number;
  readonly topLevels: number;
}

export interface FundingConfig {
  readonly windowDays: number;
  readonly zThreshold: number;
}

export interface VolatilityConfig {
  /** Number of hourly returns in the realized-volatility window. */
  readonly realizedWindow: number;
  readonly baselineHours: number;
  /** Upper bounds (inclusive) for STABLE, HIGH_VOL and EXPLOSIVE. */
  readonly boundaries: readonly [number, number, number];
  readonly riskMultipliers: Readonly<Record<VolatilityRegime, number>>;
}

export interface MultiTimeframeConfig {
  readonly baselineWindows: Readonly<Record<Timeframe, number>>;
  readonly minObservations: number;
  readonly ignitionZ: number;
  readonly coolingPriceZ: number;
  readonly coolingMinHeat: number;
  readonly chopBand: number;
  readonly highConfidence: number;
}

export interface CorrelationConfig {
  readonly windowHours: number;
  readonly minSamples: number;
  /** Absolute deviation from baseline, not a z-score. */
  readonly breakoutDelta: number;
}

export interface OrchestratorConfig {
  readonly fetchTimeoutMs: number;
  readonly cycleIntervalMinutes: number;
  readonly unavailableAlertAfter: number;
}

export interface PipelineConfig {
  readonly symbols: readonly string[];
  readonly timeframes: readonly Timeframe[];
  readonly cascade: CascadeConfig;
  readonly funding: FundingConfig;
  readonly volatility: VolatilityConfig;
  readonly multiTimeframe: MultiTimeframeConfig;
  readonly correlation: CorrelationConfig;
  readonly orchestrator: OrchestratorConfig;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  symbols: ['BTC/USDT', 'ETH/USDT', 'SOL/USDT'],
  timeframes: ['1h', '4h', '1d', '1w'],
  cascade: {
    lookbackHours: 24,
    severityBoundaries: [100_000, 200_000, 400_000, 600_000],
    balancedTolerance: 0.1,
    levelBins: 10,
    topLevels: 3,
  },
  funding: {
    windowDays: 30,
    zThreshold: 2.0,
  },
  volatility: {
    realizedWindow: 24,
    baselineHours: 24 * 30,
    boundaries: [0.01, 0.05, 0.1],
    riskMultipliers: { STABLE: 0.7, HIGH_VOL: 1.2, EXPLOSIVE: 1.8, EXTREME: 2.5 },
  },
  multiTimeframe: {
    baselineWindows: { '1h': 24, '4h': 24, '1d': 30, '1w': 12 },
    minObservations: 10,
    ignitionZ: 0.8,
    coolingPriceZ: -0.5,
    coolingMinHeat: 0,
    chopBand: 0.3,
    highConfidence: 0.7,
  },
  correlation: {
    windowHours: 24 * 7,
    minSamples: 24,
    breakoutDelta: 0.2,
  },
  orchestrator: {
    fetchTimeoutMs: 15_000,
    cycleIntervalMinutes: 60,
    unavailableAlertAfter: 3,
  },
};
