/**
 * SmartEntryValidator - Entry score, grade and gate
 *
 * entryScore = matchWeight * matchRatio + technicalWeight * technicalScore
 *            + major trend bonus + bias bonus - opposing divergence penalties
 *
 * Reversal bias with a C or D grade always blocks.
 */

import type { EntryConfig, GradeThresholds } from '../config/schema';
import {
  TREND_CODE_VALUE,
  type Direction,
  type DivergenceFinding,
  type EntryMode,
  type EntryVerdict,
  type IndicatorDivergence,
  type MajorTrend,
  type OverallBias,
  type ScoreBundle,
} from '../types';
import { clampScore, directionSide, gradeFor } from './ScoringEngine';

export function isReversalBias(bias: OverallBias): boolean {
  return bias === 'bullish-reversal' || bias === 'bearish-reversal';
}

export class SmartEntryValidator {
  constructor(
    private readonly config: EntryConfig,
    private readonly grades: GradeThresholds
  ) {}

  validate(
    scores: ScoreBundle,
    divergence: DivergenceFinding,
    majorTrend: MajorTrend,
    direction: Direction | null
  ): EntryVerdict {
    const reasons: string[] = [];
    const side = directionSide(direction);

    const base =
      this.config.matchWeight * scores.matchRatio + this.config.technicalWeight * scores.technicalScore;
    reasons.push(
      `match ${scores.matchRatio.toFixed(1)} / technical ${scores.technicalScore.toFixed(1)}`
    );

    const aligned = side * TREND_CODE_VALUE[majorTrend.trend];
    const trendBonus = this.trendBonus(aligned);
    reasons.push(`major trend ${majorTrend.trend} (+${trendBonus})`);

    const biasBonus = this.biasBonus(divergence.overallBias);
    reasons.push(`bias ${divergence.overallBias} (${biasBonus >= 0 ? '+' : ''}${biasBonus})`);

    let penalty = 0;
    const opposing = this.opposingDivergences(divergence, side);
    if (opposing.some((d) => d.strength === 'strong')) {
      penalty += this.config.strongOpposingPenalty;
      reasons.push(`strong opposing divergence (-${this.config.strongOpposingPenalty})`);
    }
    if (opposing.some((d) => !d.confirmed)) {
      penalty += this.config.unconfirmedOpposingPenalty;
      reasons.push(`unconfirmed opposing divergence (-${this.config.unconfirmedOpposingPenalty})`);
    }

    const entryScore = clampScore(base + trendBonus + biasBonus - penalty);
    const entryGrade = gradeFor(entryScore, this.grades);

    let entryMode: EntryMode = 'ok';
    if (entryGrade === 'C') {
      entryMode = 'warn';
      reasons.push(`grade C entry (${entryScore.toFixed(1)}): proceed with caution`);
    } else if (entryGrade === 'D') {
      entryMode = 'block';
      reasons.push(`grade D entry (${entryScore.toFixed(1)}): blocked`);
    }

    if (isReversalBias(divergence.overallBias) && (entryGrade === 'C' || entryGrade === 'D')) {
      if (entryMode !== 'block') {
        reasons.push(`${divergence.overallBias} with grade ${entryGrade}: blocked`);
      }
      entryMode = 'block';
    }

    return {
      entryScore,
      entryGrade,
      entryMode,
      entryAllowed: entryMode !== 'block',
      reasons,
    };
  }

  private trendBonus(aligned: number): number {
    const bonus = this.config.trendBonus;
    if (aligned >= 2) return bonus.strongAligned;
    if (aligned === 1) return bonus.aligned;
    if (aligned === 0) return bonus.neutral;
    return bonus.opposed;
  }

  private biasBonus(bias: OverallBias): number {
    if (bias === 'continuation') return this.config.biasBonus.continuation;
    if (bias === 'neutral') return this.config.biasBonus.neutral;
    return this.config.biasBonus.reversal;
  }

  private opposingDivergences(divergence: DivergenceFinding, side: number): IndicatorDivergence[] {
    if (side === 0) return [];
    return [divergence.oscillator, divergence.momentum].filter(
      (d) => (d.type === 'bullish' && side < 0) || (d.type === 'bearish' && side > 0)
    );
  }
}
