/**
 * DecisionEngine - Context policies over one shared evidence pipeline
 *
 * candles -> indicators -> trend readings -> snapshot -> divergence
 *         -> scores -> entry verdict -> context policy -> Decision
 *
 * Every call recomputes from scratch; the engine holds no state between
 * evaluations. Expected failures (missing data, aborted fetches) and
 * unexpected ones alike resolve to a fail-closed Decision with
 * `evaluated: false`; evaluate() does not reject.
 *
 * Events:
 * - 'timeframe:dropped' (symbol, DroppedTimeframe)
 * - 'decision' (Decision)
 */

import { EventEmitter } from 'events';
import { Logger } from '@sigil/shared';
import { DEFAULT_ENGINE_CONFIG } from '../config/ConfigLoader';
import type { EngineConfig } from '../config/schema';
import { EvaluationImpossibleError, toError } from '../errors';
import { IndicatorComputer } from '../indicators/IndicatorComputer';
import type {
  CandleSource,
  Decision,
  DecisionKind,
  Direction,
  EvaluationContext,
  EvaluationRequest,
  MajorTrend,
  TrendReading,
} from '../types';
import { DivergenceDetector } from './DivergenceDetector';
import { ScoringEngine } from './ScoringEngine';
import { SmartEntryValidator } from './SmartEntryValidator';
import { SnapshotBuilder, type DroppedTimeframe } from './SnapshotBuilder';
import { TrendClassifier } from './TrendClassifier';
import {
  EntryPolicy,
  PositionPolicy,
  ReactivationPolicy,
  ReversalPolicy,
  type PolicyInput,
  type PolicyOutcome,
} from './policies';

export interface DecisionEngineOptions {
  config?: EngineConfig;
  logger?: Logger;
}

const NEUTRAL_MAJOR_TREND: MajorTrend = {
  trend: 'sideways',
  share: 0,
  weights: { bull: 0, bear: 0, sideways: 0 },
};

export class DecisionEngine extends EventEmitter {
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly snapshots: SnapshotBuilder;
  private readonly divergence: DivergenceDetector;
  private readonly scoring: ScoringEngine;
  private readonly validator: SmartEntryValidator;
  private readonly entryPolicy = new EntryPolicy();
  private readonly reactivationPolicy: ReactivationPolicy;
  private readonly positionPolicy: PositionPolicy;
  private readonly reversalPolicy: ReversalPolicy;

  constructor(candles: CandleSource, options: DecisionEngineOptions = {}) {
    super();
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.logger = options.logger ?? Logger.getInstance('technical-engine');

    this.snapshots = new SnapshotBuilder(
      candles,
      new IndicatorComputer(this.config.indicators),
      new TrendClassifier(this.config.trend),
      this.config.selector,
      this.config.indicators.candleLimit,
      this.logger
    );
    this.divergence = new DivergenceDetector(this.config.divergence, this.logger);
    this.scoring = new ScoringEngine(this.config.scoring);
    this.validator = new SmartEntryValidator(this.config.entry, this.config.scoring.grades);
    this.reactivationPolicy = new ReactivationPolicy(this.config.reactivation);
    this.positionPolicy = new PositionPolicy(this.config.position);
    this.reversalPolicy = new ReversalPolicy(this.config.reversal);
  }

  getConfig(): EngineConfig {
    return this.config;
  }

  async evaluate(request: EvaluationRequest): Promise<Decision> {
    const correlationId = request.correlationId ?? Logger.generateCorrelationId();
    const timerId = this.logger.startTimer('evaluate', correlationId, {
      symbol: request.symbol,
      context: request.context,
    });

    let decision: Decision;
    try {
      decision = await this.runPipeline(request, correlationId);
    } catch (caught) {
      decision = this.failClosed(request, caught, correlationId);
    }

    this.logger.endTimer(timerId, { decision: decision.decision, evaluated: decision.evaluated });
    try {
      this.emit('decision', decision);
    } catch (caught) {
      this.logger.error('Decision listener failed', toError(caught), correlationId, {
        symbol: request.symbol,
        context: request.context,
      });
    }
    return decision;
  }

  private async runPipeline(request: EvaluationRequest, correlationId: string): Promise<Decision> {
    const { symbol, context, signal } = request;
    signal?.throwIfAborted();

    const direction: Direction | null = request.direction ?? request.position?.side ?? null;
    if ((context === 'position' || context === 'reversal') && !request.position) {
      throw new EvaluationImpossibleError(`${context} evaluation requires position state`);
    }

    const { snapshot, dropped } = await this.snapshots.build({ symbol, direction, signal, correlationId });
    this.reportDropped(symbol, dropped);

    const lowest = snapshot.timeframes[snapshot.timeframes.length - 1];
    const divergence = this.divergence.detect(snapshot.series.get(lowest), snapshot.majorTrend.trend);
    const scores = this.scoring.score(snapshot, divergence);
    const entry = this.validator.validate(scores, divergence, snapshot.majorTrend, direction);
    const input: PolicyInput = { snapshot, scores, divergence, entry };

    const outcome = await this.applyPolicy(request, input);

    const readings: TrendReading[] = [];
    for (const tf of snapshot.timeframes) {
      const reading = snapshot.readings.get(tf);
      if (reading) readings.push(reading);
    }

    this.logger.info(`Evaluated ${symbol} (${context}): ${outcome.decision}`, correlationId, {
      technicalScore: Number(scores.technicalScore.toFixed(2)),
      matchRatio: Number(scores.matchRatio.toFixed(2)),
      grade: scores.grade,
      bias: divergence.overallBias,
      timeframes: snapshot.timeframes,
    });

    return {
      symbol,
      context,
      direction,
      decision: outcome.decision,
      allowed: outcome.allowed,
      evaluated: true,
      reason: outcome.reason,
      reasons: outcome.reasons,
      evidence: {
        scores,
        divergence,
        entry,
        majorTrend: snapshot.majorTrend,
        timeframes: snapshot.timeframes,
        readings,
      },
      position: outcome.position,
      timestamp: Date.now(),
    };
  }

  private async applyPolicy(request: EvaluationRequest, input: PolicyInput): Promise<PolicyOutcome> {
    const { position } = request;

    switch (request.context) {
      case 'entry':
        return this.entryPolicy.decide(input);
      case 'reactivation':
        return this.reactivationPolicy.decide(input);
      case 'position': {
        if (!position) throw new EvaluationImpossibleError('position evaluation requires position state');
        const roi = this.positionPolicy.roi(position, input.snapshot);
        let lower: TrendReading[] = [];
        if (this.positionPolicy.needsLowerTimeframeCheck(roi)) {
          const result = await this.snapshots.readTimeframes(
            request.symbol,
            this.positionPolicy.shortTimeframes,
            request.signal
          );
          this.reportDropped(request.symbol, result.dropped);
          lower = result.readings;
        }
        return this.positionPolicy.decide(position, roi, lower);
      }
      case 'reversal': {
        if (!position) throw new EvaluationImpossibleError('reversal evaluation requires position state');
        return this.reversalPolicy.decide(
          input,
          position.side,
          this.positionPolicy.lossPct(position, input.snapshot),
          this.positionPolicy.roi(position, input.snapshot)
        );
      }
    }
  }

  private reportDropped(symbol: string, dropped: DroppedTimeframe[]): void {
    for (const d of dropped) {
      this.emit('timeframe:dropped', symbol, d);
    }
  }

  private failClosed(request: EvaluationRequest, caught: unknown, correlationId: string): Decision {
    const error = toError(caught);
    let reason: string;

    if (request.signal?.aborted) {
      reason = 'evaluation cancelled';
      this.logger.info(`Evaluation of ${request.symbol} cancelled`, correlationId);
    } else if (error instanceof EvaluationImpossibleError) {
      reason = error.message;
      this.logger.warn(`No evaluation possible for ${request.symbol}`, correlationId, {
        context: request.context,
        dropped: error.dropped,
      });
    } else {
      reason = `evaluation failed: ${error.message}`;
      this.logger.error(`Evaluation of ${request.symbol} failed`, error, correlationId, {
        context: request.context,
      });
    }

    return DecisionEngine.noEvaluation(request, reason, this.scoring);
  }

  static failClosedKind(context: EvaluationContext): DecisionKind {
    return context === 'entry' ? 'skip' : 'wait';
  }

  /**
   * Fully populated, neutral Decision for evaluations that never ran.
   */
  static noEvaluation(request: EvaluationRequest, reason: string, scoring: ScoringEngine): Decision {
    return {
      symbol: request.symbol,
      context: request.context,
      direction: request.direction ?? request.position?.side ?? null,
      decision: DecisionEngine.failClosedKind(request.context),
      allowed: false,
      evaluated: false,
      reason,
      reasons: [reason],
      evidence: {
        scores: scoring.neutral(),
        divergence: DivergenceDetector.neutral(),
        entry: null,
        majorTrend: { ...NEUTRAL_MAJOR_TREND, weights: { ...NEUTRAL_MAJOR_TREND.weights } },
        timeframes: [],
        readings: [],
      },
      timestamp: Date.now(),
    };
  }
}
