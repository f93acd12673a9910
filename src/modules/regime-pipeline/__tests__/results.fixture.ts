import { MarketEvent } from '../../../domain/types/event.types';
import {
  CascadeResult,
  CorrelationResult,
  FundingAnomalyResult,
  MultiTimeframeResult,
  SymbolReport,
  VolatilityResult,
} from '../../../domain/types/results.types';

export function cascadeResult(overrides: Partial<CascadeResult> = {}): CascadeResult {
  return {
    kind: 'cascade',
    symbol: 'BTC/USDT',
    lookbackHours: 24,
    totalLiquidatedUsd: 2_400_000,
    longLiquidatedUsd: 1_200_000,
    shortLiquidatedUsd: 1_200_000,
    velocityUsdPerHour: 100_000,
    severity: 2,
    sideBias: 'BALANCED',
    supportLevels: [],
    resistanceLevels: [],
    ...overrides,
  };
}

export function fundingResult(overrides: Partial<FundingAnomalyResult> = {}): FundingAnomalyResult {
  return {
    kind: 'funding',
    symbol: 'BTC/USDT',
    fundingRate: 0.00125,
    mean: 0.0008,
    stdDev: 0.0003,
    sampleCount: 90,
    zScore: 1.5,
    isAnomaly: false,
    extremeLevel: 'NONE',
    persistenceScore: 0,
    fundingChange: 0.0001,
    reversalDetected: false,
    reasons: [],
    ...overrides,
  };
}

export function volatilityResult(overrides: Partial<VolatilityResult> = {}): VolatilityResult {
  return {
    kind: 'volatility',
    symbol: 'BTC/USDT',
    volatility24h: 0.021,
    annualizedVolatility: 0.021 * Math.sqrt(8760),
    baselineVolatility: 0.02,
    volRatio: 1.05,
    regime: 'HIGH_VOL',
    clusteringProbability: 0,
    riskMultiplier: 1.2,
    sampleCount: 720,
    ...overrides,
  };
}

export function regimeResult(overrides: Partial<MultiTimeframeResult> = {}): MultiTimeframeResult {
  return {
    kind: 'regime',
    symbol: 'BTC/USDT',
    perTimeframe: {},
    unavailableTimeframes: [],
    primaryRegime: 'IGNITION',
    agreementCount: 2,
    availableTimeframes: 4,
    confidence: 0.5,
    ...overrides,
  };
}

export function correlationResult(overrides: Partial<CorrelationResult> = {}): CorrelationResult {
  return {
    kind: 'correlation',
    pair: 'BTC/USDT:ETH/USDT',
    symbols: ['BTC/USDT', 'ETH/USDT'],
    currentCorrelation: 0.15,
    baselineCorrelation: 0.82,
    breakout: true,
    leadAsset: 'BTC/USDT',
    laggedCorrelations: {},
    sampleCount: 168,
    ...overrides,
  };
}

export function symbolReport(symbol: string, overrides: Partial<SymbolReport> = {}): SymbolReport {
  return {
    cascade: cascadeResult({ symbol }),
    funding: fundingResult({ symbol }),
    volatility: volatilityResult({ symbol }),
    regime: regimeResult({ symbol }),
    ...overrides,
  };
}

export function marketEvent(overrides: Partial<MarketEvent> = {}): MarketEvent {
  return {
    eventType: 'LIQUIDATION_CASCADE',
    source: 'CASCADE',
    severity: 'WARNING',
    subject: 'BTC/USDT',
    title: 'Liquidation Cascade Detected - BTC/USDT',
    description: 'Severity 2/5 liquidation cascade, BALANCED',
    payload: cascadeResult(),
    timestamp: Date.UTC(2024, 0, 31),
    ...overrides,
  };
}
