import { LiquidationSide, Timeframe } from './market.types';
import { Unavailable } from './unavailable.type';

export type CascadeSeverity = 1 | 2 | 3 | 4 | 5;
export type SideBias = LiquidationSide | 'BALANCED';

export interface LiquidationLevel {
  readonly price: number;
  readonly usdAmount: number;
}

export interface CascadeResult {
  readonly kind: 'cascade';
  readonly symbol: string;
  readonly lookbackHours: number;
  readonly totalLiquidatedUsd: number;
  readonly longLiquidatedUsd: number;
  readonly shortLiquidatedUsd: number;
  readonly velocityUsdPerHour: number;
  readonly severity: CascadeSeverity;
  readonly sideBias: SideBias;
  /** Nearest first. */
  readonly supportLevels: readonly LiquidationLevel[];
  /** Nearest first. */
  readonly resistanceLevels: readonly LiquidationLevel[];
}

export type ExtremeLevel = 'NONE' | 'MODERATE' | 'HIGH';

export interface FundingAnomalyResult {
  readonly kind: 'funding';
  readonly symbol: string;
  readonly fundingRate: number;
  readonly mean: number;
  readonly stdDev: number;
  readonly sampleCount: number;
  readonly zScore: number;
  readonly isAnomaly: boolean;
  readonly extremeLevel: ExtremeLevel;
  readonly persistenceScore: number;
  readonly fundingChange: number | null;
  readonly reversalDetected: boolean;
  readonly reasons: readonly string[];
}

export type VolatilityRegime = 'STABLE' | 'HIGH_VOL' | 'EXPLOSIVE' | 'EXTREME';

export const VOLATILITY_REGIMES: readonly VolatilityRegime[] = [
  'STABLE',
  'HIGH_VOL',
  'EXPLOSIVE',
  'EXTREME',
];

export interface VolatilityResult {
  readonly kind: 'volatility';
  readonly symbol: string;
  readonly volatility24h: number;
  readonly annualizedVolatility: number;
  readonly baselineVolatility: number;
  readonly volRatio: number;
  readonly regime: VolatilityRegime;
  readonly clusteringProbability: number;
  readonly riskMultiplier: number;
  readonly sampleCount: number;
}

export type TimeframeRegime = 'IGNITION' | 'COOLING' | 'CHOP' | 'NEUTRAL';

export interface TimeframeSignal {
  readonly regime: TimeframeRegime;
  readonly priceZ: number;
  readonly heat: number;
}

export interface MultiTimeframeResult {
  readonly kind: 'regime';
  readonly symbol: string;
  readonly perTimeframe: Readonly<Partial<Record<Timeframe, TimeframeSignal>>>;
  readonly unavailableTimeframes: readonly Timeframe[];
  readonly primaryRegime: TimeframeRegime;
  readonly agreementCount: number;
  readonly availableTimeframes: number;
  /** null when fewer than two timeframes had data. */
  readonly confidence: number | null;
}

export interface CorrelationResult {
  readonly kind: 'correlation';
  readonly pair: string;
  readonly symbols: readonly [string, string];
  readonly currentCorrelation: number;
  /** null when the baseline store had nothing for the pair. */
  readonly baselineCorrelation: number | null;
  readonly breakout: boolean;
  readonly leadAsset: string;
  readonly laggedCorrelations: Readonly<Record<string, number>>;
  readonly sampleCount: number;
}

export type AnalysisPayload =
  | CascadeResult
  | FundingAnomalyResult
  | VolatilityResult
  | MultiTimeframeResult
  | CorrelationResult;

/** null: the lookback contained no liquidations, so there is no cascade to report. */
export type CascadeOutcome = CascadeResult | null | Unavailable;
export type FundingOutcome = FundingAnomalyResult | Unavailable;
export type VolatilityOutcome = VolatilityResult | Unavailable;
export type MultiTimeframeOutcome = MultiTimeframeResult | Unavailable;
export type CorrelationOutcome = CorrelationResult | (Unavailable & { readonly pair: string });

export interface SymbolReport {
  readonly cascade: CascadeOutcome;
  readonly funding: FundingOutcome;
  readonly volatility: VolatilityOutcome;
  readonly regime: MultiTimeframeOutcome;
}

export const REPORT_SCHEMA_VERSION = 1;

export interface CombinedReport {
  readonly schemaVersion: number;
  readonly cycleTimestamp: number;
  readonly perSymbol: Readonly<Record<string, SymbolReport>>;
  readonly pairwise: Readonly<Record<string, CorrelationOutcome>>;
}
