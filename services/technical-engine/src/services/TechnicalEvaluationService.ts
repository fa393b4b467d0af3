/**
 * TechnicalEvaluationService - Records and announces engine decisions
 *
 * Sits outside the engine boundary:
 * - dedupes concurrent identical requests (symbol, context, direction, position)
 * - persists decisions through the SignalStore
 * - writes the decision audit log
 * - forwards summaries to the notifier, with a per-key cooldown
 *
 * A reactivation check that is not allowed has no side effects.
 */

import { Logger } from '@sigil/shared';
import { DecisionEngine } from '../engine/DecisionEngine';
import { toError } from '../errors';
import { DecisionNotifier } from '../notifications/DecisionNotifier';
import type { Decision, EvaluationRequest, SignalStore } from '../types';

export interface EvaluationServiceOptions {
  notifier?: DecisionNotifier;
  /** Suppress repeat notifications of the same decision for a symbol/context */
  notifyCooldownMs?: number;
  logger?: Logger;
}

export class TechnicalEvaluationService {
  private readonly inFlight = new Map<string, Promise<Decision>>();
  private readonly lastNotified = new Map<string, { decision: string; at: number }>();
  private readonly notifier?: DecisionNotifier;
  private readonly notifyCooldownMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly engine: DecisionEngine,
    private readonly store: SignalStore,
    options: EvaluationServiceOptions = {}
  ) {
    this.notifier = options.notifier;
    this.notifyCooldownMs = options.notifyCooldownMs ?? 15 * 60 * 1000;
    this.logger = options.logger ?? Logger.getInstance('technical-engine');
  }

  static key(request: Pick<EvaluationRequest, 'symbol' | 'context'>): string {
    return `${request.symbol.toUpperCase()}:${request.context}`;
  }

  static inFlightKey(request: EvaluationRequest): string {
    const position = request.position;
    const positionKey = position
      ? [position.side, position.entryPrice, position.markPrice, position.leverage, position.roi].join('|')
      : '-';
    return `${TechnicalEvaluationService.key(request)}:${request.direction ?? 'any'}:${positionKey}`;
  }

  /**
   * Evaluate and record. Concurrent identical requests share one run.
   */
  evaluate(request: EvaluationRequest): Promise<Decision> {
    const key = TechnicalEvaluationService.inFlightKey(request);
    const existing = this.inFlight.get(key);
    if (existing) {
      this.logger.debug(`Joining in-flight evaluation ${key}`, request.correlationId);
      return existing;
    }

    const run = this.run(request).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  get notifiedCount(): number {
    return this.lastNotified.size;
  }

  private async run(request: EvaluationRequest): Promise<Decision> {
    const decision = await this.engine.evaluate(request);

    if (decision.context === 'reactivation' && !decision.allowed) {
      return decision;
    }

    await this.record(decision, request.correlationId);
    this.announce(decision);
    return decision;
  }

  private async record(decision: Decision, correlationId?: string): Promise<void> {
    try {
      await this.store.saveDecision(decision.symbol, decision.context, decision.evidence.scores, decision);
    } catch (caught) {
      this.logger.error(`Failed to save decision for ${decision.symbol}`, toError(caught), correlationId, {
        context: decision.context,
        decision: decision.decision,
      });
    }

    this.logger.logDecision({
      symbol: decision.symbol,
      context: decision.context,
      decision: decision.decision,
      allowed: decision.allowed,
      evaluated: decision.evaluated,
      reason: decision.reason,
      direction: decision.direction ?? undefined,
      technicalScore: decision.evidence.scores.technicalScore,
      matchRatio: decision.evidence.scores.matchRatio,
      grade: decision.evidence.scores.grade,
      entryScore: decision.evidence.entry?.entryScore,
      reasons: decision.reasons,
      correlationId,
    });
  }

  private announce(decision: Decision): void {
    if (!this.notifier || !TechnicalEvaluationService.isNotable(decision)) return;

    const key = TechnicalEvaluationService.key(decision);
    const previous = this.lastNotified.get(key);
    if (
      previous &&
      previous.decision === decision.decision &&
      decision.timestamp - previous.at < this.notifyCooldownMs
    ) {
      return;
    }

    this.pruneNotified(decision.timestamp);
    this.lastNotified.set(key, { decision: decision.decision, at: decision.timestamp });
    this.notifier.notify(decision);
  }

  private pruneNotified(now: number): void {
    for (const [key, entry] of this.lastNotified) {
      if (now - entry.at >= this.notifyCooldownMs) this.lastNotified.delete(key);
    }
  }

  /**
   * Plain 'keep' without advice is not worth a message.
   */
  static isNotable(decision: Decision): boolean {
    if (!decision.evaluated) return decision.context === 'entry';
    if (decision.decision !== 'keep') return true;
    const advice = decision.position;
    return Boolean(advice && (advice.warning || advice.dynamicStop !== undefined));
  }
}
