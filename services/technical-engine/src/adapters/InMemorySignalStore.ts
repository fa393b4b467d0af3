/**
 * In-process SignalStore
 *
 * Keeps pending signals per context and an append-only decision history.
 * An entry that ends in 'wait' is queued for reactivation. A pending
 * signal leaves the queue once a decision resolves it: reactivation
 * 'enter', or a position 'close' / 'reverse'.
 */

import type {
  Decision,
  DecisionKind,
  EvaluationContext,
  ScoreBundle,
  SignalStore,
  StoredSignal,
} from '../types';

export interface DecisionRecord {
  symbol: string;
  context: EvaluationContext;
  scores: ScoreBundle;
  decision: Decision;
  savedAt: number;
}

const RESOLVING: Record<EvaluationContext, readonly DecisionKind[]> = {
  entry: [],
  reactivation: ['enter'],
  position: ['close', 'reverse'],
  reversal: ['close'],
};

export class InMemorySignalStore implements SignalStore {
  private pending = new Map<string, StoredSignal>();
  private history: DecisionRecord[] = [];

  addSignal(signal: StoredSignal): void {
    this.pending.set(signal.id, { ...signal });
  }

  removeSignal(id: string): boolean {
    return this.pending.delete(id);
  }

  async saveDecision(
    symbol: string,
    context: EvaluationContext,
    scores: ScoreBundle,
    decision: Decision
  ): Promise<void> {
    this.history.push({ symbol, context, scores, decision, savedAt: Date.now() });

    if (context === 'entry' && decision.evaluated && decision.decision === 'wait' && decision.direction) {
      this.queueReactivation(symbol, decision);
      return;
    }

    for (const [id, signal] of this.pending) {
      if (signal.symbol !== symbol || signal.context !== context) continue;

      if (decision.evaluated && RESOLVING[context].includes(decision.decision)) {
        this.pending.delete(id);
      } else {
        this.pending.set(id, {
          ...signal,
          lastDecision: decision.decision,
          lastEvaluatedAt: decision.timestamp,
        });
      }
    }
  }

  private queueReactivation(symbol: string, decision: Decision): void {
    const direction = decision.direction;
    if (!direction) return;
    for (const signal of this.pending.values()) {
      if (signal.symbol === symbol && signal.context === 'reactivation') return;
    }
    const id = `${symbol}-${decision.timestamp}`;
    this.pending.set(id, {
      id,
      symbol,
      direction,
      context: 'reactivation',
      createdAt: decision.timestamp,
      lastDecision: decision.decision,
      lastEvaluatedAt: decision.timestamp,
    });
  }

  async getPending(context: EvaluationContext): Promise<StoredSignal[]> {
    return [...this.pending.values()]
      .filter((signal) => signal.context === context)
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  getDecisions(symbol?: string): DecisionRecord[] {
    return symbol ? this.history.filter((r) => r.symbol === symbol) : [...this.history];
  }
}
