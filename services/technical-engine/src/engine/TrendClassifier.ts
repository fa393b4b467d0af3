/**
 * TrendClassifier - EMA spread trend reading per timeframe
 *
 * bull: emaShort above emaLong and the spread widened over the last
 * `spreadLookback` candles. strong_bull when |spread| / ATR reaches
 * `strongStrength`. Bear is symmetric; anything else, including a
 * spread under `minStrength` ATRs, is sideways.
 */

import type { TrendConfig } from '../config/schema';
import { TREND_CODE_VALUE, type TimeframeSeries, type TrendCode, type TrendReading } from '../types';

export type TrendSide = -1 | 0 | 1;

export class TrendClassifier {
  constructor(private readonly config: TrendConfig) {}

  classify(series: TimeframeSeries): TrendReading {
    const last = series.candles.length - 1;
    const spread = series.emaShort[last] - series.emaLong[last];
    const pastIndex = Math.max(0, last - this.config.spreadLookback);
    const pastSpread = series.emaShort[pastIndex] - series.emaLong[pastIndex];
    const atr = series.volatility[last];
    const strength = atr > 0 && Number.isFinite(spread) ? Math.abs(spread) / atr : 0;

    let trend: TrendCode = 'sideways';
    if (strength < this.config.minStrength) {
      trend = 'sideways';
    } else if (spread > 0 && spread > pastSpread) {
      trend = strength >= this.config.strongStrength ? 'strong_bull' : 'bull';
    } else if (spread < 0 && spread < pastSpread) {
      trend = strength >= this.config.strongStrength ? 'strong_bear' : 'bear';
    }

    return { timeframe: series.timeframe, trend, strength, spread };
  }

  static side(trend: TrendCode): TrendSide {
    const value = TREND_CODE_VALUE[trend];
    if (value > 0) return 1;
    if (value < 0) return -1;
    return 0;
  }

  static isStrong(trend: TrendCode): boolean {
    return trend === 'strong_bull' || trend === 'strong_bear';
  }
}
