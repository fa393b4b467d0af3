/**
 * DecisionNotifier - Formats a Decision and hands it to the sink
 *
 * Delivery is fire-and-forget: notify() returns immediately and a
 * failed send is logged, never rethrown.
 */

import { Logger } from '@sigil/shared';
import type { Decision, DecisionKind, NotificationSink } from '../types';

const DECISION_EMOJI: Record<DecisionKind, string> = {
  enter: '🟢',
  wait: '🟡',
  skip: '⚫',
  'reversal-risk': '🟠',
  close: '🔴',
  'close-partial': '✂️',
  keep: '🔵',
  reverse: '🔁',
};

export class DecisionNotifier {
  constructor(
    private readonly sink: NotificationSink,
    private readonly logger: Logger = Logger.getInstance('technical-engine')
  ) {}

  /**
   * One-line summary followed by the audit reasons.
   */
  static format(decision: Decision): string {
    const { symbol, context, direction, evidence } = decision;
    const { scores, divergence, majorTrend } = evidence;
    const side = direction ? direction.toUpperCase() : 'ANY';

    const header =
      `${DECISION_EMOJI[decision.decision]} ${symbol} ${side} | ${context} -> ${decision.decision.toUpperCase()}` +
      ` | ${decision.reason}`;

    if (!decision.evaluated) {
      return header;
    }

    const lines = [
      header,
      `Score: ${scores.technicalScore.toFixed(1)} (${scores.grade}) | Match: ${scores.matchRatio.toFixed(0)}% | ` +
        `Risk: ${scores.riskClass}`,
      `Trend: ${majorTrend.trend} [${evidence.timeframes.join('/')}] | Bias: ${divergence.overallBias}`,
    ];

    if (evidence.entry) {
      lines.push(
        `Entry: ${evidence.entry.entryScore.toFixed(1)} (${evidence.entry.entryGrade}/${evidence.entry.entryMode})`
      );
    }

    const position = decision.position;
    if (position) {
      const parts = [`ROI ${position.roi.toFixed(1)}%`];
      if (position.dynamicStop !== undefined) parts.push(`stop ${position.dynamicStop}`);
      if (position.closeFraction !== undefined) {
        parts.push(`close ${Math.round(position.closeFraction * 100)}%`);
      }
      if (position.warning) parts.push(`warning: ${position.warning}`);
      lines.push(`Position: ${parts.join(' | ')}`);
    }

    for (const reason of decision.reasons) {
      lines.push(`- ${reason}`);
    }
    return lines.join('\n');
  }

  notify(decision: Decision): void {
    const text = DecisionNotifier.format(decision);
    Promise.resolve()
      .then(() => this.sink.send(text))
      .catch((error: unknown) => {
        this.logger.warn(`Notification for ${decision.symbol} failed`, undefined, {
          context: decision.context,
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }
}
