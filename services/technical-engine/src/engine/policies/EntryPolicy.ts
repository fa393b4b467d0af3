import { TrendClassifier } from '../TrendClassifier';
import { directionSide } from '../ScoringEngine';
import type { PolicyInput, PolicyOutcome } from './types';

/**
 * New signal: enter when the validator allows it, skip when the entry
 * grade is D against the major trend, wait otherwise.
 */
export class EntryPolicy {
  decide({ snapshot, entry }: PolicyInput): PolicyOutcome {
    const reasons = [...entry.reasons];

    if (entry.entryAllowed) {
      return {
        decision: 'enter',
        allowed: true,
        reason: `entry allowed (grade ${entry.entryGrade}, score ${entry.entryScore.toFixed(1)})`,
        reasons,
      };
    }

    const side = directionSide(snapshot.direction);
    const trendSide = TrendClassifier.side(snapshot.majorTrend.trend);
    const opposed = side !== 0 && trendSide === -side;

    if (entry.entryGrade === 'D' && opposed) {
      return {
        decision: 'skip',
        allowed: false,
        reason: `entry grade D against ${snapshot.majorTrend.trend} major trend`,
        reasons,
      };
    }

    return {
      decision: 'wait',
      allowed: false,
      reason: `entry blocked (grade ${entry.entryGrade}), waiting for confirmation`,
      reasons,
    };
  }
}
