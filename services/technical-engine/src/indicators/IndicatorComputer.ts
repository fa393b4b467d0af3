/**
 * IndicatorComputer - Candle sequence to TimeframeSeries
 *
 * Rejects a timeframe outright when the sequence is too short or
 * malformed; nothing is padded.
 */

import { DataInsufficientError, DataUnavailableError } from '../errors';
import type { IndicatorConfig } from '../config/schema';
import type { Candle, Timeframe, TimeframeSeries } from '../types';
import { IndicatorMath } from './IndicatorMath';

export class IndicatorComputer {
  constructor(private readonly config: IndicatorConfig) {}

  get minCandles(): number {
    return this.config.minCandles;
  }

  compute(timeframe: Timeframe, candles: readonly Candle[] | null): TimeframeSeries {
    if (candles === null || candles.length === 0) {
      throw new DataUnavailableError(timeframe, 'empty result');
    }

    const problem = IndicatorMath.validateCandles(candles);
    if (problem) {
      throw new DataUnavailableError(timeframe, problem);
    }

    if (candles.length < this.config.minCandles) {
      throw new DataInsufficientError(timeframe, candles.length, this.config.minCandles);
    }

    const closes = candles.map((c) => c.close);
    const macd = IndicatorMath.macd(
      closes,
      this.config.macdFast,
      this.config.macdSlow,
      this.config.macdSignal
    );

    return {
      timeframe,
      candles,
      emaShort: IndicatorMath.ema(closes, this.config.emaShort),
      emaLong: IndicatorMath.ema(closes, this.config.emaLong),
      oscillator: IndicatorMath.rsi(closes, this.config.rsiPeriod),
      macdLine: macd.line,
      macdSignal: macd.signal,
      histogram: macd.histogram,
      volatility: IndicatorMath.atr(candles, this.config.atrPeriod),
      moneyFlow: IndicatorMath.mfi(candles, this.config.mfiPeriod),
    };
  }
}
