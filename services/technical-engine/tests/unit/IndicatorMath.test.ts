/**
 * Unit tests for IndicatorMath
 */

import { IndicatorMath } from '../../src/indicators/IndicatorMath';
import { createCandle, risingCandles } from '../fixtures/candles';

describe('IndicatorMath', () => {
  describe('ema', () => {
    it('should seed with the first value', () => {
      expect(IndicatorMath.ema([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
    });

    it('should return an empty series for empty input', () => {
      expect(IndicatorMath.ema([], 10)).toEqual([]);
    });

    it('should keep one value per input element', () => {
      const values = Array.from({ length: 50 }, (_, i) => i);
      expect(IndicatorMath.ema(values, 10)).toHaveLength(50);
    });
  });

  describe('wilder', () => {
    it('should use a running mean during warm-up', () => {
      expect(IndicatorMath.wilder([2, 4, 6], 2)).toEqual([2, 3, 4.5]);
    });
  });

  describe('rsi', () => {
    it('should start at 50 and follow Wilder averages', () => {
      const rsi = IndicatorMath.rsi([1, 2, 1, 2], 2);
      expect(rsi).toHaveLength(4);
      expect(rsi[0]).toBe(50);
      expect(rsi[1]).toBe(100);
      expect(rsi[2]).toBeCloseTo(50, 10);
      expect(rsi[3]).toBeCloseTo(75, 10);
    });

    it('should read 100 for a strictly rising series', () => {
      const closes = Array.from({ length: 30 }, (_, i) => 100 + i);
      const rsi = IndicatorMath.rsi(closes, 14);
      expect(rsi[rsi.length - 1]).toBe(100);
    });

    it('should read 50 when price never moves', () => {
      const rsi = IndicatorMath.rsi(new Array<number>(20).fill(10), 14);
      expect(rsi.every((v) => v === 50)).toBe(true);
    });
  });

  describe('macd', () => {
    it('should derive histogram as line minus signal', () => {
      const closes = Array.from({ length: 60 }, (_, i) => 100 + Math.sin(i / 5) * 3);
      const { line, signal, histogram } = IndicatorMath.macd(closes, 12, 26, 9);

      expect(line).toHaveLength(60);
      expect(signal).toHaveLength(60);
      expect(histogram[0]).toBe(0);
      histogram.forEach((h, i) => expect(h).toBeCloseTo(line[i] - signal[i], 12));
    });

    it('should have a positive histogram in an accelerating rise', () => {
      const closes = risingCandles().map((c) => c.close);
      const { line, histogram } = IndicatorMath.macd(closes, 12, 26, 9);
      expect(line[line.length - 1]).toBeGreaterThan(0);
      expect(histogram[histogram.length - 1]).toBeGreaterThan(0);
    });
  });

  describe('trueRange / atr', () => {
    it('should include gaps from the previous close', () => {
      const candles = [
        createCandle({ timestamp: 1, high: 11, low: 9, close: 10 }),
        createCandle({ timestamp: 2, high: 15, low: 13, close: 14 }),
        createCandle({ timestamp: 3, high: 14.5, low: 13.5, close: 14 }),
      ];
      expect(IndicatorMath.trueRange(candles)).toEqual([2, 5, 1]);
      expect(IndicatorMath.atr(candles, 2)).toEqual([2, 3.5, 2.25]);
    });
  });

  describe('mfi', () => {
    it('should read 100 while typical price keeps rising', () => {
      const candles = [
        createCandle({ timestamp: 1, high: 11, low: 9, close: 10 }),
        createCandle({ timestamp: 2, high: 12, low: 10, close: 11 }),
        createCandle({ timestamp: 3, high: 13, low: 11, close: 12 }),
      ];
      expect(IndicatorMath.mfi(candles, 14)).toEqual([50, 100, 100]);
    });

    it('should balance positive and negative flow', () => {
      const candles = [
        createCandle({ timestamp: 1, high: 10, low: 10, close: 10, volume: 1 }),
        createCandle({ timestamp: 2, high: 20, low: 20, close: 20, volume: 1 }),
        createCandle({ timestamp: 3, high: 10, low: 10, close: 10, volume: 2 }),
      ];
      // positive flow 20 * 1, negative flow 10 * 2
      expect(IndicatorMath.mfi(candles, 14)[2]).toBe(50);
    });
  });

  describe('ratioOscillator', () => {
    it('should handle empty sides', () => {
      expect(IndicatorMath.ratioOscillator(0, 0)).toBe(50);
      expect(IndicatorMath.ratioOscillator(5, 0)).toBe(100);
      expect(IndicatorMath.ratioOscillator(0, 5)).toBe(0);
      expect(IndicatorMath.ratioOscillator(3, 1)).toBe(75);
    });
  });

  describe('validateCandles', () => {
    it('should accept a clean sequence', () => {
      expect(IndicatorMath.validateCandles(risingCandles(40))).toBeNull();
    });

    it('should report non-finite values', () => {
      const candles = [createCandle({ timestamp: 1 }), createCandle({ timestamp: 2, close: Number.NaN })];
      expect(IndicatorMath.validateCandles(candles)).toBe('non-finite value at index 1');
    });

    it('should report high below low', () => {
      const candles = [createCandle({ timestamp: 1, high: 98, low: 99 })];
      expect(IndicatorMath.validateCandles(candles)).toBe('high below low at index 0');
    });

    it('should report negative volume', () => {
      const candles = [createCandle({ timestamp: 1, volume: -1 })];
      expect(IndicatorMath.validateCandles(candles)).toBe('negative volume at index 0');
    });

    it('should report timestamps out of order', () => {
      const candles = [createCandle({ timestamp: 2 }), createCandle({ timestamp: 2 })];
      expect(IndicatorMath.validateCandles(candles)).toBe('timestamps not ascending at index 1');
    });
  });
});
