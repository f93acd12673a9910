import { CorrelationConfig } from '../../../config/pipeline.config';
import { ReturnPoint } from '../../../domain/types/market.types';
import { CorrelationOutcome } from '../../../domain/types/results.types';
import { Unavailable, isUnavailable } from '../../../domain/types/unavailable.type';
import { pearson } from '../utilities';

const HOUR_MS = 3_600_000;

export type ReturnSeries = readonly ReturnPoint[] | Unavailable;

export interface CorrelationInput {
  readonly asOf: number;
  readonly returns: Readonly<Record<string, ReturnSeries>>;
  readonly baselines: Readonly<Record<string, number | Unavailable>>;
  /** Average hourly volume per symbol, used only to break lead-asset ties. */
  readonly averageVolumes: Readonly<Record<string, number>>;
}

/** Unordered pair key, independent of argument order. */
export function pairKey(a: string, b: string): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

/** Every unordered pair, in configuration order. */
export function symbolPairs(symbols: readonly string[]): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i < symbols.length; i++) {
    for (let j = i + 1; j < symbols.length; j++) pairs.push([symbols[i], symbols[j]]);
  }
  return pairs;
}

export class CorrelationAnalyzer {
  constructor(
    private readonly cfg: CorrelationConfig,
    private readonly symbols: readonly string[],
  ) {}

  analyze(input: CorrelationInput): CorrelationOutcome[] {
    return symbolPairs(this.symbols).map(([a, b]) => this.analyzePair(a, b, input));
  }

  /** Absolute deviation test; a deviation exactly equal to the delta is not a breakout. */
  isBreakout(current: number, baseline: number): boolean {
    return Math.abs(current - baseline) > this.cfg.breakoutDelta;
  }

  private analyzePair(a: string, b: string, input: CorrelationInput): CorrelationOutcome {
    const pair = pairKey(a, b);
    const seriesA = input.returns[a];
    const seriesB = input.returns[b];
    if (!seriesA || isUnavailable(seriesA)) {
      return { kind: 'unavailable', reason: `correlation: no returns for ${a}`, pair };
    }
    if (!seriesB || isUnavailable(seriesB)) {
      return { kind: 'unavailable', reason: `correlation: no returns for ${b}`, pair };
    }

    const [xa, xb] = this.align(seriesA, seriesB, input.asOf);
    if (xa.length < this.cfg.minSamples) {
      return {
        kind: 'unavailable',
        reason: `correlation: ${xa.length} paired observations, need ${this.cfg.minSamples}`,
        pair,
      };
    }

    const current = pearson(xa, xb);
    const baselineEntry = input.baselines[pair];
    const baseline =
      baselineEntry === undefined || isUnavailable(baselineEntry) ? null : baselineEntry;

    // a_t against b_{t+1}, and the other way round
    const aLeads = pearson(xa.slice(0, -1), xb.slice(1));
    const bLeads = pearson(xb.slice(0, -1), xa.slice(1));

    return {
      kind: 'correlation',
      pair,
      symbols: [a, b],
      currentCorrelation: current,
      baselineCorrelation: baseline,
      breakout: baseline !== null && this.isBreakout(current, baseline),
      leadAsset: this.leadAsset(a, b, aLeads, bLeads, input.averageVolumes),
      laggedCorrelations: { [a]: aLeads, [b]: bLeads },
      sampleCount: xa.length,
    };
  }

  private leadAsset(
    a: string,
    b: string,
    aLeads: number,
    bLeads: number,
    volumes: Readonly<Record<string, number>>,
  ): string {
    if (Math.abs(aLeads) !== Math.abs(bLeads)) {
      return Math.abs(aLeads) > Math.abs(bLeads) ? a : b;
    }
    const volA = volumes[a] ?? 0;
    const volB = volumes[b] ?? 0;
    return volB > volA ? b : a;
  }

  // Inner join on timestamp within the trailing window, oldest first.
  private align(
    seriesA: readonly ReturnPoint[],
    seriesB: readonly ReturnPoint[],
    asOf: number,
  ): [number[], number[]] {
    const since = asOf - this.cfg.windowHours * HOUR_MS;
    const inWindow = (p: ReturnPoint): boolean =>
      p.timestamp > since && p.timestamp <= asOf && Number.isFinite(p.value);

    const byTime = new Map<number, number>();
    for (const p of seriesB) if (inWindow(p)) byTime.set(p.timestamp, p.value);

    const joined = seriesA
      .filter(inWindow)
      .filter((p) => byTime.has(p.timestamp))
      .slice()
      .sort((x, y) => x.timestamp - y.timestamp);

    return [joined.map((p) => p.value), joined.map((p) => byTime.get(p.timestamp) ?? 0)];
  }
}
