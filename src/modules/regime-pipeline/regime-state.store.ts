import { VolatilityRegime } from '../../domain/types/results.types';
import { Injectable } from '../../shared/decorators';

/**
 * Last volatility regime seen per symbol. The only analyzer state that
 * outlives a cycle; written by the orchestrator after the sink accepted
 * the cycle's events.
 */
@Injectable()
export class RegimeStateStore {
  private regimes = new Map<string, VolatilityRegime>();

  get(symbol: string): VolatilityRegime | undefined {
    return this.regimes.get(symbol);
  }

  snapshot(): Readonly<Record<string, VolatilityRegime>> {
    return Object.freeze(Object.fromEntries(this.regimes));
  }

  /** Applies every update at once; symbols not mentioned keep their regime. */
  commit(updates: Readonly<Record<string, VolatilityRegime>>): void {
    const next = new Map(this.regimes);
    for (const [symbol, regime] of Object.entries(updates)) next.set(symbol, regime);
    this.regimes = next;
  }

  clear(): void {
    this.regimes = new Map();
  }
}
