import { DEFAULT_PIPELINE_CONFIG } from '../../../config/pipeline.config';
import { Candle } from '../../../domain/types/market.types';
import { isUnavailable } from '../../../domain/types/unavailable.type';
import { MultiTimeframeAnalyzer, aggregateRegimes } from '../analyzers/multi-timeframe.analyzer';
import { HOUR, alternating, candlesFromReturns, makeWindow } from './market-window.fixture';

const cfg = DEFAULT_PIPELINE_CONFIG.multiTimeframe;

// 24 baseline candles: returns of +/-1% (std 0.01), volumes 90/110 (mean 100, std 10)
function hourlySeries(lastReturn: number, lastVolume: number, stepMs: number = HOUR): Candle[] {
  const returns = [...alternating(24, 0.01, -0.01), lastReturn];
  const volumes = [100, ...alternating(24, 90, 110), lastVolume];
  return candlesFromReturns(returns, volumes, stepMs);
}

describe('MultiTimeframeAnalyzer', () => {
  const analyzer = new MultiTimeframeAnalyzer(cfg, ['1h', '4h', '1d', '1w']);

  it.each([
    [0.05, 200, 'IGNITION'],
    [-0.05, 200, 'COOLING'],
    [0.005, 100, 'NEUTRAL'],
    [0.001, 100, 'CHOP'],
  ] as const)('labels a %p return on volume %p as %s', (ret, volume, expected) => {
    const signal = analyzer.timeframeSignal(hourlySeries(ret, volume), '1h', Number.MAX_SAFE_INTEGER);
    expect(signal?.regime).toBe(expected);
  });

  it('scores volume heat against the baseline', () => {
    const signal = analyzer.timeframeSignal(hourlySeries(0.05, 200), '1h', Number.MAX_SAFE_INTEGER);
    expect(signal?.heat).toBeCloseTo(10, 9);
    expect(signal?.priceZ).toBeCloseTo(5, 6);
  });

  it('returns null below the minimum number of observations', () => {
    const candles = candlesFromReturns(alternating(6, 0.01, -0.01));
    expect(analyzer.timeframeSignal(candles, '1h', Number.MAX_SAFE_INTEGER)).toBeNull();
  });

  it('aggregates agreeing timeframes and lists the missing ones', () => {
    const result = analyzer.analyze(
      makeWindow({
        candles: {
          '1h': hourlySeries(0.05, 200),
          '4h': hourlySeries(0.05, 200, 4 * HOUR),
        },
      }),
    );
    if (isUnavailable(result)) throw new Error(result.reason);

    expect(result.primaryRegime).toBe('IGNITION');
    expect(result.agreementCount).toBe(2);
    expect(result.availableTimeframes).toBe(2);
    expect(result.confidence).toBe(1);
    expect(result.unavailableTimeframes).toEqual(['1d', '1w']);
    expect(Object.keys(result.perTimeframe)).toEqual(['1h', '4h']);
  });

  it('leaves confidence null with a single timeframe', () => {
    const result = analyzer.analyze(makeWindow({ candles: { '1h': hourlySeries(0.001, 100) } }));
    if (isUnavailable(result)) throw new Error(result.reason);

    expect(result.primaryRegime).toBe('CHOP');
    expect(result.confidence).toBeNull();
  });

  it('is unavailable when no timeframe has enough candles', () => {
    expect(isUnavailable(analyzer.analyze(makeWindow()))).toBe(true);
  });

  it('applies the classification rules in order', () => {
    expect(analyzer.classify(0.8, 5)).toBe('NEUTRAL');
    expect(analyzer.classify(0.81, 0.81)).toBe('IGNITION');
    expect(analyzer.classify(-0.5, 0)).toBe('NEUTRAL');
    expect(analyzer.classify(-0.6, 0)).toBe('COOLING');
    expect(analyzer.classify(-0.6, -0.1)).toBe('NEUTRAL');
    expect(analyzer.classify(0.29, -3)).toBe('CHOP');
  });
});

describe('aggregateRegimes', () => {
  it('takes the most common label', () => {
    expect(
      aggregateRegimes([
        ['1h', 'IGNITION'],
        ['4h', 'IGNITION'],
        ['1d', 'COOLING'],
        ['1w', 'CHOP'],
      ]),
    ).toEqual({ primaryRegime: 'IGNITION', agreementCount: 2, availableTimeframes: 4, confidence: 0.5 });
  });

  it('breaks ties toward the shortest timeframe', () => {
    expect(aggregateRegimes([['1h', 'CHOP'], ['4h', 'COOLING']])?.primaryRegime).toBe('CHOP');
  });

  it('returns null for no labels', () => {
    expect(aggregateRegimes([])).toBeNull();
  });
});
