/**
 * IndicatorMath - Pure indicator calculations
 *
 * Every function returns a series with exactly one value per input
 * element. Warm-up values are computed from the available prefix
 * instead of being dropped or padded with NaN.
 *
 * Core Functions:
 * - ema(): exponential moving average seeded with the first value
 * - rsi(): Wilder RSI, 0-100
 * - macd(): line, signal and histogram
 * - atr(): Wilder average true range
 * - mfi(): money flow index, 0-100
 */

import type { Candle } from '../types';

export interface MacdSeries {
  line: number[];
  signal: number[];
  histogram: number[];
}

export class IndicatorMath {
  static ema(values: readonly number[], period: number): number[] {
    const out: number[] = [];
    if (values.length === 0) return out;

    const k = 2 / (period + 1);
    out.push(values[0]);
    for (let i = 1; i < values.length; i++) {
      out.push(values[i] * k + out[i - 1] * (1 - k));
    }
    return out;
  }

  /**
   * Wilder smoothing: running mean over the first `period` samples,
   * then avg = (prev * (period - 1) + x) / period.
   */
  static wilder(values: readonly number[], period: number): number[] {
    const out: number[] = [];
    let sum = 0;
    for (let i = 0; i < values.length; i++) {
      if (i < period) {
        sum += values[i];
        out.push(sum / (i + 1));
      } else {
        out.push((out[i - 1] * (period - 1) + values[i]) / period);
      }
    }
    return out;
  }

  static rsi(closes: readonly number[], period: number): number[] {
    if (closes.length === 0) return [];

    const gains: number[] = [];
    const losses: number[] = [];
    for (let i = 1; i < closes.length; i++) {
      const change = closes[i] - closes[i - 1];
      gains.push(change > 0 ? change : 0);
      losses.push(change < 0 ? -change : 0);
    }

    const avgGain = IndicatorMath.wilder(gains, period);
    const avgLoss = IndicatorMath.wilder(losses, period);

    const out: number[] = [50];
    for (let i = 0; i < gains.length; i++) {
      out.push(IndicatorMath.ratioOscillator(avgGain[i], avgLoss[i]));
    }
    return out;
  }

  static macd(
    closes: readonly number[],
    fast: number,
    slow: number,
    signalPeriod: number
  ): MacdSeries {
    const fastEma = IndicatorMath.ema(closes, fast);
    const slowEma = IndicatorMath.ema(closes, slow);
    const line = fastEma.map((value, i) => value - slowEma[i]);
    const signal = IndicatorMath.ema(line, signalPeriod);
    const histogram = line.map((value, i) => value - signal[i]);
    return { line, signal, histogram };
  }

  static trueRange(candles: readonly Candle[]): number[] {
    return candles.map((candle, i) => {
      const range = candle.high - candle.low;
      if (i === 0) return range;
      const prevClose = candles[i - 1].close;
      return Math.max(range, Math.abs(candle.high - prevClose), Math.abs(candle.low - prevClose));
    });
  }

  static atr(candles: readonly Candle[], period: number): number[] {
    return IndicatorMath.wilder(IndicatorMath.trueRange(candles), period);
  }

  static mfi(candles: readonly Candle[], period: number): number[] {
    if (candles.length === 0) return [];

    const typical = candles.map((c) => (c.high + c.low + c.close) / 3);
    const out: number[] = [50];

    for (let i = 1; i < candles.length; i++) {
      let positive = 0;
      let negative = 0;
      for (let j = Math.max(1, i - period + 1); j <= i; j++) {
        const flow = typical[j] * candles[j].volume;
        if (typical[j] > typical[j - 1]) positive += flow;
        else if (typical[j] < typical[j - 1]) negative += flow;
      }
      out.push(IndicatorMath.ratioOscillator(positive, negative));
    }
    return out;
  }

  /**
   * 100 - 100 / (1 + up / down), with 100 when only `up` is present
   * and 50 when both sides are empty.
   */
  static ratioOscillator(up: number, down: number): number {
    if (down === 0) return up === 0 ? 50 : 100;
    return 100 - 100 / (1 + up / down);
  }

  /**
   * Validate candle integrity. Returns a description of the first
   * problem found, or null when the sequence is usable.
   */
  static validateCandles(candles: readonly Candle[]): string | null {
    for (let i = 0; i < candles.length; i++) {
      const c = candles[i];
      const values = [c.timestamp, c.open, c.high, c.low, c.close, c.volume];
      if (!values.every(Number.isFinite)) {
        return `non-finite value at index ${i}`;
      }
      if (c.high < c.low) {
        return `high below low at index ${i}`;
      }
      if (c.volume < 0) {
        return `negative volume at index ${i}`;
      }
      if (i > 0 && c.timestamp <= candles[i - 1].timestamp) {
        return `timestamps not ascending at index ${i}`;
      }
    }
    return null;
  }
}
