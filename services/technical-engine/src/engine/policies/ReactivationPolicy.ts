import type { ReactivationConfig } from '../../config/schema';
import type { PolicyInput, PolicyOutcome } from './types';

/**
 * Pending signal review. Both thresholds must hold; anything less keeps
 * the signal pending with no side effects.
 */
export class ReactivationPolicy {
  constructor(private readonly config: ReactivationConfig) {}

  decide({ scores }: PolicyInput): PolicyOutcome {
    const matchOk = scores.matchRatio >= this.config.minMatchRatio;
    const technicalOk = scores.technicalScore >= this.config.minTechnicalScore;
    const reasons = [
      `match ${scores.matchRatio.toFixed(1)} ${matchOk ? '>=' : '<'} ${this.config.minMatchRatio}`,
      `technical ${scores.technicalScore.toFixed(1)} ${technicalOk ? '>=' : '<'} ${this.config.minTechnicalScore}`,
    ];

    if (matchOk && technicalOk) {
      return { decision: 'enter', allowed: true, reason: 'reactivated', reasons };
    }
    return { decision: 'wait', allowed: false, reason: 'insufficient match', reasons };
  }
}
