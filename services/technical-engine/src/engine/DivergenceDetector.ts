/**
 * DivergenceDetector - Price/indicator divergence on the lowest timeframe
 *
 * Pivots use a symmetric window: a pivot low is strictly below every
 * other low within ±pivotWindow candles (highs mirror this). The two
 * most recent pivot lows (or highs) are compared against the
 * oscillator and the momentum histogram at the same indices.
 *
 * detect() never throws. Missing or misaligned series, short windows
 * and degenerate arithmetic all return the neutral finding.
 */

import { Logger } from '@sigil/shared';
import type { DivergenceConfig } from '../config/schema';
import type {
  DivergenceFinding,
  DivergenceSide,
  DivergenceStrength,
  IndicatorDivergence,
  OverallBias,
  Pivot,
  TimeframeSeries,
  TrendCode,
} from '../types';
import { TrendClassifier } from './TrendClassifier';

type IndicatorKind = 'oscillator' | 'momentum';

interface DetectionWindow {
  lows: number[];
  highs: number[];
  closes: number[];
  volumes: number[];
  oscillator: number[];
  histogram: number[];
  moneyFlow: number[];
  emaShort: number[];
  emaLong: number[];
}

const NO_DIVERGENCE: IndicatorDivergence = {
  type: 'none',
  confirmed: false,
  strength: 'weak',
  ratio: 0,
  pivotIndex: -1,
};

export class DivergenceDetector {
  constructor(
    private readonly config: DivergenceConfig,
    private readonly logger: Logger = Logger.getInstance('technical-engine')
  ) {}

  static neutral(): DivergenceFinding {
    return {
      oscillator: { ...NO_DIVERGENCE },
      momentum: { ...NO_DIVERGENCE },
      overallBias: 'neutral',
      dominantSide: 'none',
      bullishScore: 0,
      bearishScore: 0,
      volumeSurge: false,
      confidence: 0,
    };
  }

  detect(series: TimeframeSeries | undefined, majorTrend: TrendCode): DivergenceFinding {
    if (!series) return DivergenceDetector.neutral();

    try {
      const window = this.sliceWindow(series);
      if (!window) return DivergenceDetector.neutral();
      return this.analyse(window, majorTrend);
    } catch (error) {
      this.logger.debug('Divergence detection degraded to neutral', undefined, {
        timeframe: series.timeframe,
        error: error instanceof Error ? error.message : String(error),
      });
      return DivergenceDetector.neutral();
    }
  }

  /**
   * Strict pivots over ±window. Edges without a full window never qualify.
   */
  static findPivots(values: readonly number[], window: number, kind: 'low' | 'high'): Pivot[] {
    const pivots: Pivot[] = [];
    for (let i = window; i < values.length - window; i++) {
      let isPivot = true;
      for (let j = i - window; j <= i + window && isPivot; j++) {
        if (j === i) continue;
        isPivot = kind === 'low' ? values[i] < values[j] : values[i] > values[j];
      }
      if (isPivot) pivots.push({ index: i, price: values[i] });
    }
    return pivots;
  }

  classifyStrength(ratio: number): DivergenceStrength {
    if (ratio > this.config.strongRatio) return 'strong';
    if (ratio > this.config.mediumRatio) return 'medium';
    return 'weak';
  }

  private sliceWindow(series: TimeframeSeries): DetectionWindow | null {
    const n = series.candles.length;
    const aligned = [
      series.oscillator,
      series.histogram,
      series.moneyFlow,
      series.emaShort,
      series.emaLong,
    ].every((values) => values.length === n);
    if (!aligned) return null;

    const start = Math.max(0, n - this.config.lookback);
    const candles = series.candles.slice(start);
    if (candles.length < 2 * this.config.pivotWindow + 1) return null;

    return {
      lows: candles.map((c) => c.low),
      highs: candles.map((c) => c.high),
      closes: candles.map((c) => c.close),
      volumes: candles.map((c) => c.volume),
      oscillator: series.oscillator.slice(start),
      histogram: series.histogram.slice(start),
      moneyFlow: series.moneyFlow.slice(start),
      emaShort: series.emaShort.slice(start),
      emaLong: series.emaLong.slice(start),
    };
  }

  private analyse(window: DetectionWindow, majorTrend: TrendCode): DivergenceFinding {
    const pivotLows = DivergenceDetector.findPivots(window.lows, this.config.pivotWindow, 'low');
    const pivotHighs = DivergenceDetector.findPivots(window.highs, this.config.pivotWindow, 'high');

    const oscillator = this.detectIndicatorSafely(window, window.oscillator, 'oscillator', pivotLows, pivotHighs);
    const momentum = this.detectIndicatorSafely(window, window.histogram, 'momentum', pivotLows, pivotHighs);

    let bullishScore = 0;
    let bearishScore = 0;
    for (const found of [oscillator, momentum]) {
      if (found.type === 'none') continue;
      const score =
        this.config.strengthScores[found.strength] + (found.confirmed ? this.config.confirmationBonus : 0);
      if (found.type === 'bullish') bullishScore += score;
      else bearishScore += score;
    }

    const volumeSurge = this.hasVolumeSurge(window.volumes);
    if (volumeSurge) {
      if (bullishScore > bearishScore) bullishScore += this.config.volumeSurgeBonus;
      else if (bearishScore > bullishScore) bearishScore += this.config.volumeSurgeBonus;
    }

    let dominantSide: DivergenceSide = 'none';
    if (bullishScore > bearishScore) dominantSide = 'bullish';
    else if (bearishScore > bullishScore) dominantSide = 'bearish';

    const trendSide = TrendClassifier.side(majorTrend);
    let overallBias: OverallBias = 'neutral';
    if (dominantSide === 'bullish') {
      overallBias = trendSide > 0 ? 'continuation' : 'bullish-reversal';
    } else if (dominantSide === 'bearish') {
      overallBias = trendSide < 0 ? 'continuation' : 'bearish-reversal';
    }

    const dominantScore =
      dominantSide === 'bullish' ? bullishScore : dominantSide === 'bearish' ? bearishScore : 0;

    return {
      oscillator,
      momentum,
      overallBias,
      dominantSide,
      bullishScore,
      bearishScore,
      volumeSurge,
      confidence: Math.min(1, dominantScore),
    };
  }

  /**
   * A degenerate reading on one indicator leaves the other one intact.
   */
  private detectIndicatorSafely(
    window: DetectionWindow,
    values: number[],
    kind: IndicatorKind,
    pivotLows: Pivot[],
    pivotHighs: Pivot[]
  ): IndicatorDivergence {
    try {
      return this.detectIndicator(window, values, kind, pivotLows, pivotHighs);
    } catch (error) {
      this.logger.debug(`Divergence on ${kind} degraded to none`, undefined, {
        error: error instanceof Error ? error.message : String(error),
      });
      return { ...NO_DIVERGENCE };
    }
  }

  private detectIndicator(
    window: DetectionWindow,
    values: number[],
    kind: IndicatorKind,
    pivotLows: Pivot[],
    pivotHighs: Pivot[]
  ): IndicatorDivergence {
    const bullish = this.comparePivots(values, kind, pivotLows, 'bullish');
    const bearish = this.comparePivots(values, kind, pivotHighs, 'bearish');

    let found: IndicatorDivergence | null = bullish ?? bearish;
    if (bullish && bearish) {
      found = bearish.pivotIndex > bullish.pivotIndex ? bearish : bullish;
    }
    if (!found) return { ...NO_DIVERGENCE };

    return { ...found, confirmed: this.isConfirmed(window, found.type === 'bullish' ? 1 : -1) };
  }

  private comparePivots(
    values: number[],
    kind: IndicatorKind,
    pivots: Pivot[],
    type: 'bullish' | 'bearish'
  ): IndicatorDivergence | null {
    if (pivots.length < 2) return null;

    const first = pivots[pivots.length - 2];
    const second = pivots[pivots.length - 1];
    const firstValue = values[first.index];
    const secondValue = values[second.index];

    const diverges =
      type === 'bullish'
        ? second.price < first.price && secondValue > firstValue
        : second.price > first.price && secondValue < firstValue;
    if (!diverges) return null;

    const ratio = this.strengthRatio(kind, first, second, firstValue, secondValue);
    return {
      type,
      confirmed: false,
      strength: this.classifyStrength(ratio),
      ratio,
      pivotIndex: second.index,
    };
  }

  /**
   * Oscillator: points moved per percent of price moved.
   * Momentum histogram: both deltas in price units.
   */
  private strengthRatio(
    kind: IndicatorKind,
    first: Pivot,
    second: Pivot,
    firstValue: number,
    secondValue: number
  ): number {
    const indicatorDelta = Math.abs(secondValue - firstValue);
    const priceDelta = Math.abs(second.price - first.price);
    const priceMove =
      kind === 'oscillator' ? (priceDelta / Math.min(first.price, second.price)) * 100 : priceDelta;

    const ratio = indicatorDelta / priceMove;
    if (!Number.isFinite(ratio) || ratio < 0) {
      throw new Error(`Degenerate divergence ratio for ${kind}`);
    }
    return ratio;
  }

  private isConfirmed(window: DetectionWindow, direction: 1 | -1): boolean {
    const last = window.closes.length - 1;
    if (last < 1) return false;

    const closeMove = window.closes[last] - window.closes[last - 1];
    const flowMove = window.moneyFlow[last] - window.moneyFlow[last - 1];
    const spreadNow = window.emaShort[last] - window.emaLong[last];
    const spreadPrev = window.emaShort[last - 1] - window.emaLong[last - 1];
    const emaMove = window.emaShort[last] - window.emaShort[last - 1];

    const priceTurned = direction * closeMove > 0;
    const flowTurned = direction * flowMove > 0;
    const emaTurned = direction * (spreadNow - spreadPrev) > 0 || direction * emaMove > 0;

    return priceTurned && flowTurned && emaTurned;
  }

  private hasVolumeSurge(volumes: number[]): boolean {
    const lookback = this.config.volumeLookback;
    const last = volumes.length - 1;
    if (last < lookback) return false;

    const trailing = volumes.slice(last - lookback, last);
    const mean = trailing.reduce((sum, v) => sum + v, 0) / trailing.length;
    return mean > 0 && volumes[last] > mean * this.config.volumeSurgeMultiplier;
  }
}
