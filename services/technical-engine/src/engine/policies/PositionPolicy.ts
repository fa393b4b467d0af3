/**
 * PositionPolicy - ROI driven review of an open position
 *
 * Thresholds are checked from the top: take profit, trailing stop,
 * deep loss (lower timeframe check), otherwise keep.
 */

import type { PositionConfig } from '../../config/schema';
import type { Direction, PositionState, Snapshot, Timeframe, TrendReading } from '../../types';
import { TrendClassifier } from '../TrendClassifier';
import { directionSide } from '../ScoringEngine';
import type { PolicyOutcome } from './types';

export class PositionPolicy {
  constructor(private readonly config: PositionConfig) {}

  get shortTimeframes(): Timeframe[] {
    return this.config.shortTimeframes;
  }

  /**
   * Levered ROI in percent. Uses the supplied roi, else the mark price,
   * else the last close of the lowest analysed timeframe.
   */
  roi(position: PositionState, snapshot?: Snapshot): number {
    if (position.roi !== undefined) return position.roi;
    const mark = position.markPrice ?? PositionPolicy.lastClose(snapshot);
    if (mark === undefined || position.entryPrice <= 0) return 0;

    const leverage = position.leverage ?? this.config.defaultLeverage;
    const changePct = ((mark - position.entryPrice) / position.entryPrice) * 100;
    return changePct * leverage * directionSide(position.side);
  }

  /**
   * Unlevered price move in percent, signed by side.
   */
  lossPct(position: PositionState, snapshot?: Snapshot): number {
    const leverage = position.leverage ?? this.config.defaultLeverage;
    const roi = this.roi(position, snapshot);
    return leverage > 0 ? roi / leverage : roi;
  }

  needsLowerTimeframeCheck(roi: number): boolean {
    return roi <= this.config.lossThreshold;
  }

  decide(position: PositionState, roi: number, lowerReadings: TrendReading[] = []): PolicyOutcome {
    const cfg = this.config;

    if (roi >= cfg.takeProfitThreshold) {
      const closeFraction = cfg.takeProfitCloseFraction;
      return {
        decision: 'close-partial',
        allowed: false,
        reason: `ROI ${roi.toFixed(1)}% >= ${cfg.takeProfitThreshold}%: close ${Math.round(closeFraction * 100)}%`,
        reasons: [`take profit at ROI ${roi.toFixed(1)}%`],
        position: { roi, closeFraction, keepFraction: 1 - closeFraction },
      };
    }

    if (roi >= cfg.trailThreshold) {
      const dynamicStop = PositionPolicy.dynamicStop(position.entryPrice, position.side, cfg.dynamicStopPct);
      return {
        decision: 'keep',
        allowed: true,
        reason: `ROI ${roi.toFixed(1)}% >= ${cfg.trailThreshold}%: trail stop to ${dynamicStop}`,
        reasons: [`dynamic stop ${dynamicStop}`],
        position: { roi, dynamicStop },
      };
    }

    if (roi <= cfg.lossThreshold) {
      return this.lowerTimeframeDecision(position.side, roi, lowerReadings);
    }

    return {
      decision: 'keep',
      allowed: true,
      reason: `ROI ${roi.toFixed(1)}% within thresholds`,
      reasons: [],
      position: { roi },
    };
  }

  private lowerTimeframeDecision(side: Direction, roi: number, readings: TrendReading[]): PolicyOutcome {
    const positionSide = directionSide(side);
    const opposing = readings.filter((r) => TrendClassifier.side(r.trend) === -positionSide);
    const checkedTimeframes = readings.map((r) => r.timeframe);
    const reasons = readings.map((r) => `${r.timeframe}: ${r.trend}`);
    const count = opposing.length;
    const summary = `${count}/${this.config.shortTimeframes.length} lower timeframes against ${side}`;

    if (count >= this.config.reverseMinOpposing) {
      return {
        decision: 'reverse',
        allowed: false,
        reason: `ROI ${roi.toFixed(1)}%: ${summary}`,
        reasons,
        position: { roi, opposingTimeframes: count, checkedTimeframes },
      };
    }

    if (count > 0) {
      const closeFraction = this.config.partialCloseFraction;
      return {
        decision: 'close-partial',
        allowed: false,
        reason: `ROI ${roi.toFixed(1)}%: ${summary}, close ${Math.round(closeFraction * 100)}%`,
        reasons,
        position: {
          roi,
          closeFraction,
          keepFraction: 1 - closeFraction,
          opposingTimeframes: count,
          checkedTimeframes,
        },
      };
    }

    const warning =
      readings.length === 0
        ? `ROI ${roi.toFixed(1)}% with lower timeframes unavailable`
        : `ROI ${roi.toFixed(1)}% with no lower timeframe reversal`;
    return {
      decision: 'keep',
      allowed: true,
      reason: warning,
      reasons,
      position: { roi, opposingTimeframes: 0, checkedTimeframes, warning },
    };
  }

  static dynamicStop(entryPrice: number, side: Direction, pct: number): number {
    const factor = side === 'long' ? 1 + pct / 100 : 1 - pct / 100;
    return Number((entryPrice * factor).toFixed(8));
  }

  private static lastClose(snapshot?: Snapshot): number | undefined {
    if (!snapshot) return undefined;
    const lowest = snapshot.timeframes[snapshot.timeframes.length - 1];
    const candles = snapshot.series.get(lowest)?.candles;
    return candles && candles.length > 0 ? candles[candles.length - 1].close : undefined;
  }
}
