import { DEFAULT_ENGINE_CONFIG } from '../../src/config/ConfigLoader';
import { TrendClassifier } from '../../src/engine/TrendClassifier';
import { IndicatorComputer } from '../../src/indicators/IndicatorComputer';
import type { TimeframeSeries } from '../../src/types';
import { createCandle, fallingCandles, flatCandles, risingCandles } from '../fixtures/candles';

function manualSeries(emaShort: number[], emaLong: number[], atr: number): TimeframeSeries {
  const n = emaShort.length;
  const zeros = new Array<number>(n).fill(0);
  return {
    timeframe: '1h',
    candles: emaShort.map((_, i) => createCandle({ timestamp: i + 1 })),
    emaShort,
    emaLong,
    oscillator: new Array<number>(n).fill(50),
    macdLine: zeros,
    macdSignal: zeros,
    histogram: zeros,
    volatility: new Array<number>(n).fill(atr),
    moneyFlow: new Array<number>(n).fill(50),
  };
}

describe('TrendClassifier', () => {
  const classifier = new TrendClassifier(DEFAULT_ENGINE_CONFIG.trend);
  const computer = new IndicatorComputer(DEFAULT_ENGINE_CONFIG.indicators);

  it('should read an accelerating rise as strong_bull', () => {
    const reading = classifier.classify(computer.compute('1h', risingCandles()));
    expect(reading.trend).toBe('strong_bull');
    expect(reading.spread).toBeGreaterThan(0);
    expect(reading.strength).toBeGreaterThanOrEqual(1);
  });

  it('should read an accelerating decline as strong_bear', () => {
    const reading = classifier.classify(computer.compute('1h', fallingCandles()));
    expect(reading.trend).toBe('strong_bear');
    expect(reading.spread).toBeLessThan(0);
  });

  it('should read a flat market as sideways', () => {
    expect(classifier.classify(computer.compute('1h', flatCandles())).trend).toBe('sideways');
  });

  it('should read a widening spread below the strong threshold as bull', () => {
    const reading = classifier.classify(manualSeries([10, 10, 10, 10, 11], [9.5, 9.5, 9.5, 9.5, 10], 2));
    expect(reading).toEqual({ timeframe: '1h', trend: 'bull', strength: 0.5, spread: 1 });
  });

  it('should read a narrowing positive spread as sideways', () => {
    const reading = classifier.classify(manualSeries([10, 11, 11, 11, 11], [9.5, 9.5, 9.5, 9.5, 10], 2));
    expect(reading.trend).toBe('sideways');
  });

  it('should read a widening negative spread as strong_bear', () => {
    const reading = classifier.classify(manualSeries([10, 9, 9, 9, 7], [10, 10, 10, 10, 10], 2));
    expect(reading.trend).toBe('strong_bear');
    expect(reading.strength).toBe(1.5);
  });

  it('should treat a spread under the minimum strength as sideways', () => {
    const reading = classifier.classify(manualSeries([10, 10, 10, 10, 10.05], [10, 10, 10, 10, 10], 2));
    expect(reading.trend).toBe('sideways');
  });

  it('should read zero strength when ATR is zero', () => {
    const reading = classifier.classify(manualSeries([10, 10, 10, 10, 11], [9.5, 9.5, 9.5, 9.5, 10], 0));
    expect(reading.strength).toBe(0);
    expect(reading.trend).toBe('sideways');
  });

  it('should map trend codes to sides', () => {
    expect(TrendClassifier.side('strong_bull')).toBe(1);
    expect(TrendClassifier.side('bull')).toBe(1);
    expect(TrendClassifier.side('sideways')).toBe(0);
    expect(TrendClassifier.side('bear')).toBe(-1);
    expect(TrendClassifier.side('strong_bear')).toBe(-1);
    expect(TrendClassifier.isStrong('strong_bear')).toBe(true);
    expect(TrendClassifier.isStrong('bull')).toBe(false);
  });
});
