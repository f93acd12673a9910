import { CorrelationConfig } from '../../../config/pipeline.config';
import { ReturnPoint } from '../../../domain/types/market.types';
import { CorrelationOutcome, CorrelationResult } from '../../../domain/types/results.types';
import { isUnavailable, unavailable } from '../../../domain/types/unavailable.type';
import {
  CorrelationAnalyzer,
  CorrelationInput,
  pairKey,
  symbolPairs,
} from '../analyzers/correlation.analyzer';
import { AS_OF, HOUR } from './market-window.fixture';

const cfg: CorrelationConfig = { windowHours: 168, minSamples: 24, breakoutDelta: 0.25 };
const BTC = 'BTC/USDT';
const ETH = 'ETH/USDT';
const SOL = 'SOL/USDT';

const pattern = (i: number): number => (((i * 7) % 11) - 5) / 1000;

function series(count: number, value: (i: number) => number): ReturnPoint[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: AS_OF - (count - 1 - i) * HOUR,
    value: value(i),
  }));
}

function input(overrides: Partial<CorrelationInput>): CorrelationInput {
  return { asOf: AS_OF, returns: {}, baselines: {}, averageVolumes: {}, ...overrides };
}

function expectResult(outcome: CorrelationOutcome): CorrelationResult {
  if (isUnavailable(outcome)) throw new Error(outcome.reason);
  return outcome;
}

describe('CorrelationAnalyzer', () => {
  it('builds unordered pair keys', () => {
    expect(pairKey(ETH, BTC)).toBe('BTC/USDT:ETH/USDT');
    expect(pairKey(BTC, ETH)).toBe('BTC/USDT:ETH/USDT');
    expect(symbolPairs([BTC, ETH, SOL])).toEqual([
      [BTC, ETH],
      [BTC, SOL],
      [ETH, SOL],
    ]);
  });

  it('flags a breakout from the stored baseline', () => {
    const analyzer = new CorrelationAnalyzer(cfg, [BTC, ETH]);
    const [outcome] = analyzer.analyze(
      input({
        returns: { [BTC]: series(48, pattern), [ETH]: series(48, pattern) },
        baselines: { [pairKey(BTC, ETH)]: 0.5 },
      }),
    );
    const result = expectResult(outcome);

    expect(result.currentCorrelation).toBeCloseTo(1, 9);
    expect(result.baselineCorrelation).toBe(0.5);
    expect(result.breakout).toBe(true);
    expect(result.sampleCount).toBe(48);
  });

  it('treats a deviation equal to the delta as no breakout', () => {
    const analyzer = new CorrelationAnalyzer(cfg, [BTC, ETH]);
    expect(analyzer.isBreakout(0.75, 0.5)).toBe(false);
    expect(analyzer.isBreakout(0.15, 0.82)).toBe(true);
  });

  it('reports no breakout without a baseline', () => {
    const analyzer = new CorrelationAnalyzer(cfg, [BTC, ETH]);
    const returns = { [BTC]: series(48, pattern), [ETH]: series(48, pattern) };

    const missing = expectResult(analyzer.analyze(input({ returns }))[0]);
    expect(missing.baselineCorrelation).toBeNull();
    expect(missing.breakout).toBe(false);

    const down = expectResult(
      analyzer.analyze(input({ returns, baselines: { [pairKey(BTC, ETH)]: unavailable('db') } }))[0],
    );
    expect(down.baselineCorrelation).toBeNull();
  });

  it('picks the asset whose past moves the other as the leader', () => {
    const analyzer = new CorrelationAnalyzer(cfg, [BTC, ETH]);
    // ETH repeats BTC one hour later
    const result = expectResult(
      analyzer.analyze(
        input({ returns: { [BTC]: series(48, pattern), [ETH]: series(48, (i) => pattern(i - 1)) } }),
      )[0],
    );

    expect(result.laggedCorrelations[BTC]).toBeCloseTo(1, 9);
    expect(Math.abs(result.laggedCorrelations[ETH])).toBeLessThan(1);
    expect(result.leadAsset).toBe(BTC);
  });

  it('breaks lead ties on volume, then on configuration order', () => {
    const analyzer = new CorrelationAnalyzer(cfg, [BTC, ETH]);
    const returns = { [BTC]: series(48, pattern), [ETH]: series(48, pattern) };

    const byVolume = analyzer.analyze(input({ returns, averageVolumes: { [BTC]: 10, [ETH]: 20 } }));
    expect(expectResult(byVolume[0]).leadAsset).toBe(ETH);

    const byOrder = analyzer.analyze(input({ returns, averageVolumes: { [BTC]: 10, [ETH]: 10 } }));
    expect(expectResult(byOrder[0]).leadAsset).toBe(BTC);
  });

  it('is unavailable with too few paired observations', () => {
    const analyzer = new CorrelationAnalyzer(cfg, [BTC, ETH]);
    const [outcome] = analyzer.analyze(
      input({ returns: { [BTC]: series(10, pattern), [ETH]: series(48, pattern) } }),
    );

    expect(isUnavailable(outcome)).toBe(true);
    expect(outcome.pair).toBe('BTC/USDT:ETH/USDT');
  });

  it('marks every pair touching a missing symbol unavailable', () => {
    const analyzer = new CorrelationAnalyzer(cfg, [BTC, ETH, SOL]);
    const outcomes = analyzer.analyze(
      input({
        returns: {
          [BTC]: series(48, pattern),
          [ETH]: series(48, pattern),
          [SOL]: unavailable('timeout'),
        },
      }),
    );

    expect(outcomes.map((o) => [o.pair, isUnavailable(o)])).toEqual([
      ['BTC/USDT:ETH/USDT', false],
      ['BTC/USDT:SOL/USDT', true],
      ['ETH/USDT:SOL/USDT', true],
    ]);
  });

  it('only pairs observations inside the window', () => {
    const analyzer = new CorrelationAnalyzer({ ...cfg, windowHours: 20 }, [BTC, ETH]);
    const [outcome] = analyzer.analyze(
      input({ returns: { [BTC]: series(48, pattern), [ETH]: series(48, pattern) } }),
    );
    expect(isUnavailable(outcome)).toBe(true);
  });
});
