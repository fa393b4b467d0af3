/**
 * PendingSignalSweeper - Periodic review of stored signals
 *
 * Pulls pending signals per context from the store and re-evaluates
 * them. Work for one symbol runs sequentially; different symbols run
 * concurrently.
 */

import { Logger } from '@sigil/shared';
import { toError } from '../errors';
import type { Decision, EvaluationContext, SignalStore, StoredSignal } from '../types';
import { TechnicalEvaluationService } from './TechnicalEvaluationService';

export interface SweeperOptions {
  intervalMs?: number;
  contexts?: EvaluationContext[];
  logger?: Logger;
}

export class PendingSignalSweeper {
  private readonly intervalMs: number;
  private readonly contexts: EvaluationContext[];
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly service: TechnicalEvaluationService,
    private readonly store: SignalStore,
    options: SweeperOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 5 * 60 * 1000;
    this.contexts = options.contexts ?? ['reactivation', 'position'];
    this.logger = options.logger ?? Logger.getInstance('technical-engine');
  }

  /**
   * One pass over every configured context. Skipped while a pass is running.
   */
  async sweep(): Promise<Decision[]> {
    if (this.running) {
      this.logger.debug('Sweep already running, skipping');
      return [];
    }
    this.running = true;
    const timerId = this.logger.startTimer('sweep');

    try {
      const decisions: Decision[] = [];
      for (const context of this.contexts) {
        const pending = await this.store.getPending(context);
        decisions.push(...(await this.reviewAll(pending)));
      }
      this.logger.endTimer(timerId, { reviewed: decisions.length });
      return decisions;
    } catch (caught) {
      this.logger.endTimer(timerId, { failed: true });
      throw caught;
    } finally {
      this.running = false;
    }
  }

  start(): void {
    if (this.timer) return;
    this.logger.info(`Pending signal sweeper started (every ${this.intervalMs}ms)`);
    this.timer = setInterval(() => {
      this.sweep().catch((caught) => {
        this.logger.error('Pending signal sweep failed', toError(caught));
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info('Pending signal sweeper stopped');
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  private async reviewAll(pending: StoredSignal[]): Promise<Decision[]> {
    const bySymbol = new Map<string, StoredSignal[]>();
    for (const signal of pending) {
      const group = bySymbol.get(signal.symbol) ?? [];
      group.push(signal);
      bySymbol.set(signal.symbol, group);
    }

    const results = await Promise.all(
      [...bySymbol.values()].map(async (group) => {
        const decisions: Decision[] = [];
        for (const signal of group) {
          decisions.push(
            await this.service.evaluate({
              symbol: signal.symbol,
              direction: signal.direction,
              context: signal.context,
              position: signal.position,
            })
          );
        }
        return decisions;
      })
    );
    return results.flat();
  }
}
