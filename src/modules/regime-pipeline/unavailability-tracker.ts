import { Injectable } from '../../shared/decorators';

/** Consecutive unavailable cycles per symbol; reset by the first usable cycle. */
@Injectable()
export class UnavailabilityTracker {
  private readonly streaks = new Map<string, number>();

  record(symbol: string, unavailable: boolean): number {
    const next = unavailable ? (this.streaks.get(symbol) ?? 0) + 1 : 0;
    this.streaks.set(symbol, next);
    return next;
  }

  recordCycle(availability: Readonly<Record<string, boolean>>): Record<string, number> {
    for (const [symbol, available] of Object.entries(availability)) this.record(symbol, !available);
    return this.counts();
  }

  count(symbol: string): number {
    return this.streaks.get(symbol) ?? 0;
  }

  counts(): Record<string, number> {
    return Object.fromEntries(this.streaks);
  }
}
