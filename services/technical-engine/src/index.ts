/**
 * Technical Evaluation Engine
 *
 * Multi-timeframe technical evaluation of trading signals and open
 * positions: indicators, trend readings, divergence, scoring, entry
 * validation and per-context decisions.
 */

import { Logger } from '@sigil/shared';
import { loadEngineConfig } from './config/ConfigLoader';
import type { EngineConfigInput } from './config/schema';
import { DecisionEngine } from './engine/DecisionEngine';
import { DecisionNotifier } from './notifications/DecisionNotifier';
import { PendingSignalSweeper } from './services/PendingSignalSweeper';
import { TechnicalEvaluationService } from './services/TechnicalEvaluationService';
import type { CandleSource, NotificationSink, SignalStore } from './types';

export * from './types';
export * from './errors';
export * from './config';
export { IndicatorMath, type MacdSeries } from './indicators/IndicatorMath';
export { IndicatorComputer } from './indicators/IndicatorComputer';
export { TrendClassifier, type TrendSide } from './engine/TrendClassifier';
export {
  SnapshotBuilder,
  type DroppedTimeframe,
  type SnapshotRequest,
  type SnapshotResult,
} from './engine/SnapshotBuilder';
export { DivergenceDetector } from './engine/DivergenceDetector';
export { ScoringEngine, clampScore, gradeFor } from './engine/ScoringEngine';
export { SmartEntryValidator, isReversalBias } from './engine/SmartEntryValidator';
export { DecisionEngine, type DecisionEngineOptions } from './engine/DecisionEngine';
export * from './engine/policies';
export { BybitCandleSource, type BybitCandleSourceOptions } from './adapters/BybitCandleSource';
export { InMemorySignalStore, type DecisionRecord } from './adapters/InMemorySignalStore';
export { DecisionNotifier } from './notifications/DecisionNotifier';
export {
  TechnicalEvaluationService,
  type EvaluationServiceOptions,
} from './services/TechnicalEvaluationService';
export { PendingSignalSweeper, type SweeperOptions } from './services/PendingSignalSweeper';

export interface TechnicalEngineDeps {
  candles: CandleSource;
  store: SignalStore;
  sink?: NotificationSink;
  config?: EngineConfigInput;
  env?: NodeJS.ProcessEnv;
  sweepIntervalMs?: number;
}

export interface TechnicalEngine {
  engine: DecisionEngine;
  service: TechnicalEvaluationService;
  sweeper: PendingSignalSweeper;
}

/**
 * Wire the engine and its collaborators. Configuration comes from
 * `config` with ENGINE_* variables from `env` layered on top.
 */
export function createTechnicalEngine(deps: TechnicalEngineDeps): TechnicalEngine {
  const logger = Logger.getInstance('technical-engine');
  const config = loadEngineConfig(deps.config, deps.env ?? process.env);

  const engine = new DecisionEngine(deps.candles, { config, logger });
  const notifier = deps.sink ? new DecisionNotifier(deps.sink, logger) : undefined;
  const service = new TechnicalEvaluationService(engine, deps.store, { notifier, logger });
  const sweeper = new PendingSignalSweeper(service, deps.store, {
    intervalMs: deps.sweepIntervalMs,
    logger,
  });

  return { engine, service, sweeper };
}
