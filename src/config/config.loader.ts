import { ValidationError, validateSync } from 'class-validator';
import { ConfigurationError } from '../domain/errors';
import { isTimeframe } from '../domain/types/market.types';
import { DEFAULT_PIPELINE_CONFIG, PipelineConfig } from './pipeline.config';
import { PipelineConfigDto } from './pipeline-config.dto';

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads thresholds and lookbacks from the environment, falling back to
 * DEFAULT_PIPELINE_CONFIG, and validates the lot. Called once at startup;
 * any problem is a ConfigurationError listing every violation.
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const d = DEFAULT_PIPELINE_CONFIG;
  const dto = new PipelineConfigDto();

  dto.symbols = readList(env.SYMBOLS, d.symbols).map((s) => s.toUpperCase());
  dto.timeframes = readList(env.TIMEFRAMES, d.timeframes);

  dto.cascadeLookbackHours = readNumber(env.CASCADE_LOOKBACK_HOURS, d.cascade.lookbackHours);
  dto.cascadeSeverityBoundaries = readNumbers(
    env.CASCADE_SEVERITY_BOUNDARIES,
    d.cascade.severityBoundaries,
  );
  dto.cascadeBalancedTolerance = readNumber(
    env.CASCADE_BALANCED_TOLERANCE,
    d.cascade.balancedTolerance,
  );
  dto.cascadeLevelBins = readNumber(env.CASCADE_LEVEL_BINS, d.cascade.levelBins);
  dto.cascadeTopLevels = readNumber(env.CASCADE_TOP_LEVELS, d.cascade.topLevels);

  dto.fundingWindowDays = readNumber(env.FUNDING_WINDOW_DAYS, d.funding.windowDays);
  dto.fundingZThreshold = readNumber(env.FUNDING_Z_THRESHOLD, d.funding.zThreshold);

  dto.volatilityRealizedWindow = readNumber(
    env.VOLATILITY_REALIZED_WINDOW,
    d.volatility.realizedWindow,
  );
  dto.volatilityBaselineHours = readNumber(
    env.VOLATILITY_BASELINE_HOURS,
    d.volatility.baselineHours,
  );
  dto.volatilityBoundaries = readNumbers(env.VOLATILITY_BOUNDARIES, d.volatility.boundaries);
  const m = d.volatility.riskMultipliers;
  dto.volatilityRiskMultipliers = readNumbers(env.VOLATILITY_RISK_MULTIPLIERS, [
    m.STABLE,
    m.HIGH_VOL,
    m.EXPLOSIVE,
    m.EXTREME,
  ]);

  const w = d.multiTimeframe.baselineWindows;
  dto.mtfBaselineWindows = readNumbers(env.MTF_BASELINE_WINDOWS, [
    w['1h'],
    w['4h'],
    w['1d'],
    w['1w'],
  ]);
  dto.mtfMinObservations = readNumber(env.MTF_MIN_OBSERVATIONS, d.multiTimeframe.minObservations);
  dto.mtfIgnitionZ = readNumber(env.MTF_IGNITION_Z, d.multiTimeframe.ignitionZ);
  dto.mtfCoolingPriceZ = readNumber(env.MTF_COOLING_PRICE_Z, d.multiTimeframe.coolingPriceZ);
  dto.mtfCoolingMinHeat = readNumber(env.MTF_COOLING_MIN_HEAT, d.multiTimeframe.coolingMinHeat);
  dto.mtfChopBand = readNumber(env.MTF_CHOP_BAND, d.multiTimeframe.chopBand);
  dto.mtfHighConfidence = readNumber(env.MTF_HIGH_CONFIDENCE, d.multiTimeframe.highConfidence);

  dto.correlationWindowHours = readNumber(env.CORRELATION_WINDOW_HOURS, d.correlation.windowHours);
  dto.correlationMinSamples = readNumber(env.CORRELATION_MIN_SAMPLES, d.correlation.minSamples);
  dto.correlationBreakoutDelta = readNumber(
    env.CORRELATION_BREAKOUT_DELTA,
    d.correlation.breakoutDelta,
  );

  dto.fetchTimeoutMs = readNumber(env.FETCH_TIMEOUT_MS, d.orchestrator.fetchTimeoutMs);
  dto.cycleIntervalMinutes = readNumber(
    env.CYCLE_INTERVAL_MINUTES,
    d.orchestrator.cycleIntervalMinutes,
  );
  dto.unavailableAlertAfter = readNumber(
    env.UNAVAILABLE_ALERT_AFTER,
    d.orchestrator.unavailableAlertAfter,
  );

  const problems = [...flattenErrors(validateSync(dto)), ...crossFieldProblems(dto)];
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return deepFreeze(toPipelineConfig(dto));
}

function toPipelineConfig(dto: PipelineConfigDto): PipelineConfig {
  const [b1, b2, b3] = dto.volatilityBoundaries;
  const [stable, highVol, explosive, extreme] = dto.volatilityRiskMultipliers;
  const [w1h, w4h, w1d, w1w] = dto.mtfBaselineWindows;

  return {
    symbols: dto.symbols,
    timeframes: dto.timeframes.filter(isTimeframe),
    cascade: {
      lookbackHours: dto.cascadeLookbackHours,
      severityBoundaries: dto.cascadeSeverityBoundaries,
      balancedTolerance: dto.cascadeBalancedTolerance,
      levelBins: dto.cascadeLevelBins,
      topLevels: dto.cascadeTopLevels,
    },
    funding: {
      windowDays: dto.fundingWindowDays,
      zThreshold: dto.fundingZThreshold,
    },
    volatility: {
      realizedWindow: dto.volatilityRealizedWindow,
      baselineHours: dto.volatilityBaselineHours,
      boundaries: [b1, b2, b3],
      riskMultipliers: { STABLE: stable, HIGH_VOL: highVol, EXPLOSIVE: explosive, EXTREME: extreme },
    },
    multiTimeframe: {
      baselineWindows: { '1h': w1h, '4h': w4h, '1d': w1d, '1w': w1w },
      minObservations: dto.mtfMinObservations,
      ignitionZ: dto.mtfIgnitionZ,
      coolingPriceZ: dto.mtfCoolingPriceZ,
      coolingMinHeat: dto.mtfCoolingMinHeat,
      chopBand: dto.mtfChopBand,
      highConfidence: dto.mtfHighConfidence,
    },
    correlation: {
      windowHours: dto.correlationWindowHours,
      minSamples: dto.correlationMinSamples,
      breakoutDelta: dto.correlationBreakoutDelta,
    },
    orchestrator: {
      fetchTimeoutMs: dto.fetchTimeoutMs,
      cycleIntervalMinutes: dto.cycleIntervalMinutes,
      unavailableAlertAfter: dto.unavailableAlertAfter,
    },
  };
}

function crossFieldProblems(dto: PipelineConfigDto): string[] {
  const problems: string[] = [];

  if (!isStrictlyIncreasing(dto.cascadeSeverityBoundaries)) {
    problems.push('cascadeSeverityBoundaries must be strictly increasing');
  }
  if (dto.cascadeSeverityBoundaries.some((b) => !(b > 0))) {
    problems.push('cascadeSeverityBoundaries must be positive');
  }
  if (!isStrictlyIncreasing(dto.volatilityBoundaries)) {
    problems.push('volatilityBoundaries must be strictly increasing');
  }
  if (dto.volatilityBoundaries.some((b) => !(b > 0))) {
    problems.push('volatilityBoundaries must be positive');
  }
  if (!isNonDecreasing(dto.volatilityRiskMultipliers)) {
    problems.push('volatilityRiskMultipliers must not decrease with regime severity');
  }
  if (dto.volatilityBaselineHours < dto.volatilityRealizedWindow) {
    problems.push('volatilityBaselineHours must cover at least one realized-volatility window');
  }
  if (!(dto.mtfCoolingPriceZ < 0)) {
    problems.push('mtfCoolingPriceZ must be negative');
  }
  if (dto.mtfBaselineWindows.some((w) => w < dto.mtfMinObservations)) {
    problems.push('mtfBaselineWindows must each be at least mtfMinObservations');
  }
  if (dto.correlationMinSamples > dto.correlationWindowHours) {
    problems.push('correlationMinSamples cannot exceed correlationWindowHours');
  }

  return problems;
}

function flattenErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => {
    const own = Object.values(error.constraints ?? {}).map((c) => `${error.property}: ${c}`);
    return [...own, ...flattenErrors(error.children ?? [])];
  });
}

function isStrictlyIncreasing(values: readonly number[]): boolean {
  return values.every((v, i) => i === 0 || v > values[i - 1]);
}

function isNonDecreasing(values: readonly number[]): boolean {
  return values.every((v, i) => i === 0 || v >= values[i - 1]);
}

function readList(raw: string | undefined, fallback: readonly string[]): string[] {
  if (raw === undefined || raw.trim() === '') return [...fallback];
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function readNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  return Number(raw.trim());
}

function readNumbers(raw: string | undefined, fallback: readonly number[]): number[] {
  if (raw === undefined || raw.trim() === '') return [...fallback];
  return raw.split(',').map((s) => Number(s.trim()));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
