import type { ReversalConfig } from '../../config/schema';
import type { Direction } from '../../types';
import type { PolicyInput, PolicyOutcome } from './types';

/**
 * Reversal-risk monitor for an open position. `lossPct` is the
 * unlevered price move against entry, signed by side.
 */
export class ReversalPolicy {
  constructor(private readonly config: ReversalConfig) {}

  decide({ divergence, entry }: PolicyInput, side: Direction, lossPct: number, roi: number): PolicyOutcome {
    const opposingBias =
      (side === 'long' && divergence.overallBias === 'bearish-reversal') ||
      (side === 'short' && divergence.overallBias === 'bullish-reversal');
    const weak = entry.entryGrade === 'D';
    const reasons = [
      `loss ${lossPct.toFixed(2)}%`,
      `bias ${divergence.overallBias}`,
      `entry grade ${entry.entryGrade}`,
    ];
    const advice = { roi, lossPct };

    if (lossPct <= this.config.closeLossPct && (opposingBias || weak)) {
      return {
        decision: 'close',
        allowed: false,
        reason: `loss ${lossPct.toFixed(2)}% with ${opposingBias ? divergence.overallBias : 'grade D'}`,
        reasons,
        position: advice,
      };
    }

    if (opposingBias || weak) {
      return {
        decision: 'reversal-risk',
        allowed: false,
        reason: opposingBias ? `${divergence.overallBias} against ${side}` : 'technical grade D',
        reasons,
        position: advice,
      };
    }

    if (lossPct <= this.config.riskLossPct) {
      return {
        decision: 'reversal-risk',
        allowed: false,
        reason: `loss ${lossPct.toFixed(2)}% beyond ${this.config.riskLossPct}%`,
        reasons,
        position: advice,
      };
    }

    return { decision: 'keep', allowed: true, reason: 'no reversal risk', reasons, position: advice };
  }
}
