/**
 * ScoringEngine - Snapshot + divergence to ScoreBundle
 *
 * Every sub-score is a 0-100 normalisation taken relative to a
 * reference side: the requested direction or, without one, the side
 * of the major trend. 50 is neutral. Timeframe weights follow the
 * selector vote (highest timeframe weighs most).
 *
 * Default technical score weights:
 *   trend 0.30, momentum 0.20, volatility 0.10, divergence 0.15,
 *   structure 0.10, micro 0.10, smartEntry 0.05
 */

import type { GradeThresholds, ScoringConfig } from '../config/schema';
import {
  TREND_CODE_VALUE,
  type Direction,
  type DivergenceFinding,
  type Grade,
  type RiskClass,
  type ScoreBundle,
  type Snapshot,
  type SubScores,
  type TimeframeSeries,
} from '../types';
import { TrendClassifier, type TrendSide } from './TrendClassifier';

export function clampScore(value: number, min: number = 0, max: number = 100): number {
  if (Number.isNaN(value)) return (min + max) / 2;
  return Math.min(max, Math.max(min, value));
}

export function gradeFor(score: number, thresholds: GradeThresholds): Grade {
  if (score >= thresholds.A) return 'A';
  if (score >= thresholds.B) return 'B';
  if (score >= thresholds.C) return 'C';
  return 'D';
}

export function directionSide(direction: Direction | null): TrendSide {
  if (direction === 'long') return 1;
  if (direction === 'short') return -1;
  return 0;
}

export function divergenceSide(finding: DivergenceFinding): TrendSide {
  if (finding.dominantSide === 'bullish') return 1;
  if (finding.dominantSide === 'bearish') return -1;
  return 0;
}

interface WeightedSeries {
  weight: number;
  series: TimeframeSeries;
  side: TrendSide;
}

export class ScoringEngine {
  constructor(private readonly config: ScoringConfig) {}

  /**
   * Side every sub-score is measured against.
   */
  static referenceSide(snapshot: Snapshot): TrendSide {
    const requested = directionSide(snapshot.direction);
    return requested !== 0 ? requested : TrendClassifier.side(snapshot.majorTrend.trend);
  }

  score(snapshot: Snapshot, divergence: DivergenceFinding): ScoreBundle {
    const side = ScoringEngine.referenceSide(snapshot);
    const weighted = this.weightedSeries(snapshot);

    const sub: SubScores = {
      trend: this.trendScore(snapshot, side),
      momentum: clampScore(50 + 50 * side * this.weightedMomentum(weighted)),
      volatility: this.volatilityScore(weighted),
      divergence: this.divergenceScore(divergence, side),
      structure: this.structureScore(weighted, side),
      micro: this.microScore(weighted, side),
      smartEntry: this.smartEntryScore(divergence, side),
    };

    const w = this.config.weights;
    const technicalScore = clampScore(
      w.trend * sub.trend +
        w.momentum * sub.momentum +
        w.volatility * sub.volatility +
        w.divergence * sub.divergence +
        w.structure * sub.structure +
        w.micro * sub.micro +
        w.smartEntry * sub.smartEntry
    );

    return {
      ...sub,
      technicalScore,
      matchRatio: ScoringEngine.matchRatio(snapshot, weighted),
      grade: gradeFor(technicalScore, this.config.grades),
      confidence: this.confidence(weighted, divergence, side),
      riskClass: this.riskClass(sub.volatility, sub.divergence),
    };
  }

  /**
   * Neutral bundle used when no evaluation was possible.
   */
  neutral(): ScoreBundle {
    return {
      trend: 50,
      momentum: 50,
      volatility: 50,
      divergence: 50,
      structure: 50,
      micro: 50,
      smartEntry: 50,
      technicalScore: 0,
      matchRatio: 0,
      grade: 'D',
      confidence: 0,
      riskClass: 'high',
    };
  }

  private weightedSeries(snapshot: Snapshot): WeightedSeries[] {
    const n = snapshot.timeframes.length;
    const out: WeightedSeries[] = [];
    snapshot.timeframes.forEach((timeframe, i) => {
      const series = snapshot.series.get(timeframe);
      const reading = snapshot.readings.get(timeframe);
      if (series && reading) {
        out.push({ weight: n - i, series, side: TrendClassifier.side(reading.trend) });
      }
    });
    return out;
  }

  private trendScore(snapshot: Snapshot, side: TrendSide): number {
    const { trend, share } = snapshot.majorTrend;
    const aligned = side * TREND_CODE_VALUE[trend];
    return clampScore(50 + 25 * aligned * (0.5 + 0.5 * share));
  }

  /**
   * Signed momentum in [-1, 1] for the last candle of one timeframe:
   * half RSI distance from 50, half histogram sign scaled by ATR.
   */
  static momentum(series: TimeframeSeries): number {
    const last = series.candles.length - 1;
    const rsi = series.oscillator[last];
    const hist = series.histogram[last];
    const atr = series.volatility[last];

    const rsiPart = (rsi - 50) / 50;
    const histMagnitude = atr > 0 ? Math.min(1, Math.abs(hist) / atr) : hist !== 0 ? 1 : 0;
    const value = 0.5 * rsiPart + 0.5 * Math.sign(hist) * histMagnitude;
    return Number.isFinite(value) ? value : 0;
  }

  private weightedMomentum(weighted: WeightedSeries[]): number {
    return weightedMean(weighted.map((w): [number, number] => [ScoringEngine.momentum(w.series), w.weight]));
  }

  private volatilityScore(weighted: WeightedSeries[]): number {
    const atrPct = weightedMean(
      weighted.map((w): [number, number] => {
        const last = w.series.candles.length - 1;
        const close = w.series.candles[last].close;
        return [close > 0 ? (w.series.volatility[last] / close) * 100 : Number.NaN, w.weight];
      })
    );
    return clampScore(100 - this.config.volatilityPenaltyPerPct * atrPct);
  }

  private divergenceScore(divergence: DivergenceFinding, side: TrendSide): number {
    const alignment = divergenceSide(divergence) * side;
    return clampScore(50 + 50 * divergence.confidence * alignment);
  }

  /**
   * Agreement of the two lowest timeframes: agree 1, sideways 0.5, oppose 0.
   */
  private structureScore(weighted: WeightedSeries[], side: TrendSide): number {
    if (side === 0 || weighted.length === 0) return 50;
    const lowest = weighted.slice(-2);
    const agreement = weightedMean(
      lowest.map((w): [number, number] => [w.side === side ? 1 : w.side === 0 ? 0.5 : 0, w.weight])
    );
    return clampScore(100 * agreement);
  }

  private microScore(weighted: WeightedSeries[], side: TrendSide): number {
    const lowest = weighted[weighted.length - 1];
    if (!lowest) return 50;
    return clampScore(50 + 25 * side * lowest.side + 25 * side * ScoringEngine.momentum(lowest.series));
  }

  private smartEntryScore(divergence: DivergenceFinding, side: TrendSide): number {
    const alignment = divergenceSide(divergence) * side;
    if (divergence.overallBias === 'neutral' || alignment === 0) return 50;
    if (alignment < 0) return 20;
    return divergence.overallBias === 'continuation' ? 80 : 65;
  }

  /**
   * Share of directional timeframe weight agreeing with the requested
   * direction; 50 without a direction or without directional readings.
   */
  private static matchRatio(snapshot: Snapshot, weighted: WeightedSeries[]): number {
    const side = directionSide(snapshot.direction);
    if (side === 0) return 50;

    let agreeing = 0;
    let opposing = 0;
    for (const w of weighted) {
      if (w.side === side) agreeing += w.weight;
      else if (w.side === -side) opposing += w.weight;
    }
    if (agreeing + opposing === 0) return 50;
    return clampScore((100 * agreeing) / (agreeing + opposing));
  }

  private confidence(weighted: WeightedSeries[], divergence: DivergenceFinding, side: TrendSide): number {
    const total = weighted.reduce((sum, w) => sum + w.weight, 0);
    if (total === 0) return 0;

    const net = weighted.reduce((sum, w) => sum + w.weight * w.side, 0);
    let value = Math.abs(net) / total;
    if (side !== 0 && divergenceSide(divergence) * side < 0) {
      value -= this.config.opposingDivergencePenalty;
    }
    return clampScore(value, 0, 1);
  }

  private riskClass(volatility: number, divergence: number): RiskClass {
    if (volatility >= this.config.lowRiskVolatility && divergence >= 50) return 'low';
    if (volatility >= this.config.mediumRiskVolatility && volatility < this.config.lowRiskVolatility) {
      return 'medium';
    }
    return 'high';
  }
}

function weightedMean(pairs: Array<[number, number]>): number {
  let sum = 0;
  let weights = 0;
  for (const [value, weight] of pairs) {
    if (!Number.isFinite(value)) continue;
    sum += value * weight;
    weights += weight;
  }
  return weights > 0 ? sum / weights : 0;
}
