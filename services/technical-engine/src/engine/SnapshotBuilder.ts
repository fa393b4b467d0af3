/**
 * SnapshotBuilder - Timeframe set selection and major trend vote
 *
 * Tries each configured timeframe set in order and keeps the first one
 * where every timeframe fetched and computed cleanly. A timeframe is
 * fetched at most once per build, even when several sets share it.
 */

import { Logger } from '@sigil/shared';
import type { SelectorConfig } from '../config/schema';
import { DataInsufficientError, EvaluationImpossibleError, toError } from '../errors';
import { IndicatorComputer } from '../indicators/IndicatorComputer';
import type {
  CandleSource,
  Direction,
  MajorTrend,
  Snapshot,
  Timeframe,
  TimeframeSeries,
  TrendCode,
  TrendReading,
  TrendWeights,
} from '../types';
import { TrendClassifier } from './TrendClassifier';

export interface DroppedTimeframe {
  timeframe: Timeframe;
  kind: 'insufficient' | 'unavailable';
  reason: string;
}

export interface SnapshotResult {
  snapshot: Snapshot;
  dropped: DroppedTimeframe[];
}

export interface SnapshotRequest {
  symbol: string;
  direction: Direction | null;
  signal?: AbortSignal;
  correlationId?: string;
}

type LoadOutcome = { ok: true; series: TimeframeSeries } | { ok: false; dropped: DroppedTimeframe };

export class SnapshotBuilder {
  constructor(
    private readonly candles: CandleSource,
    private readonly indicators: IndicatorComputer,
    private readonly classifier: TrendClassifier,
    private readonly config: SelectorConfig,
    private readonly candleLimit: number,
    private readonly logger: Logger = Logger.getInstance('technical-engine')
  ) {}

  async build(request: SnapshotRequest): Promise<SnapshotResult> {
    const { symbol, signal, correlationId } = request;
    const loads = new Map<Timeframe, Promise<LoadOutcome>>();

    const load = (timeframe: Timeframe): Promise<LoadOutcome> => {
      let pending = loads.get(timeframe);
      if (!pending) {
        pending = this.loadTimeframe(symbol, timeframe, signal);
        loads.set(timeframe, pending);
      }
      return pending;
    };

    for (const set of this.config.timeframeSets) {
      const outcomes = await Promise.all(set.map(load));
      signal?.throwIfAborted();

      const series: TimeframeSeries[] = [];
      for (const outcome of outcomes) {
        if (outcome.ok) series.push(outcome.series);
      }

      if (series.length === set.length) {
        const readings = series.map((s) => this.classifier.classify(s));
        const snapshot: Snapshot = {
          symbol,
          direction: request.direction,
          timeframes: [...set],
          series: new Map(series.map((s) => [s.timeframe, s])),
          readings: new Map(readings.map((r) => [r.timeframe, r])),
          majorTrend: SnapshotBuilder.majorTrend(readings),
        };
        return { snapshot, dropped: await this.collectDropped(loads) };
      }

      this.logger.debug(`Timeframe set ${set.join(',')} rejected for ${symbol}`, correlationId);
    }

    const dropped = await this.collectDropped(loads);
    const reasons: Partial<Record<Timeframe, string>> = {};
    for (const d of dropped) reasons[d.timeframe] = d.reason;

    throw new EvaluationImpossibleError(
      `No timeframe set has sufficient data for ${symbol}`,
      reasons
    );
  }

  /**
   * Classify a list of timeframes outside the selected set (position checks).
   * Timeframes that fail are skipped.
   */
  async readTimeframes(
    symbol: string,
    timeframes: readonly Timeframe[],
    signal?: AbortSignal
  ): Promise<{ readings: TrendReading[]; dropped: DroppedTimeframe[] }> {
    const outcomes = await Promise.all(timeframes.map((tf) => this.loadTimeframe(symbol, tf, signal)));
    signal?.throwIfAborted();

    const readings: TrendReading[] = [];
    const dropped: DroppedTimeframe[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) readings.push(this.classifier.classify(outcome.series));
      else dropped.push(outcome.dropped);
    }
    return { readings, dropped };
  }

  private async loadTimeframe(
    symbol: string,
    timeframe: Timeframe,
    signal?: AbortSignal
  ): Promise<LoadOutcome> {
    try {
      const candles = await this.candles.fetch(symbol, timeframe, this.candleLimit, signal);
      return { ok: true, series: this.indicators.compute(timeframe, candles) };
    } catch (caught) {
      const error = toError(caught);
      const kind = error instanceof DataInsufficientError ? 'insufficient' : 'unavailable';

      if (kind === 'unavailable') {
        this.logger.warn(`Timeframe ${timeframe} unavailable for ${symbol}`, undefined, {
          timeframe,
          error: error.message,
        });
      } else {
        this.logger.info(`Timeframe ${timeframe} excluded for ${symbol}: ${error.message}`);
      }
      return { ok: false, dropped: { timeframe, kind, reason: error.message } };
    }
  }

  private async collectDropped(
    loads: Map<Timeframe, Promise<LoadOutcome>>
  ): Promise<DroppedTimeframe[]> {
    const dropped: DroppedTimeframe[] = [];
    for (const outcome of await Promise.all(loads.values())) {
      if (!outcome.ok) dropped.push(outcome.dropped);
    }
    return dropped;
  }

  /**
   * Weighted vote across readings ordered highest timeframe first.
   * Weight of reading i is (n - i). A tie at the top resolves to sideways.
   */
  static majorTrend(readings: readonly TrendReading[]): MajorTrend {
    const n = readings.length;
    const weights: TrendWeights = { bull: 0, bear: 0, sideways: 0 };
    let strongBull = 0;
    let strongBear = 0;

    readings.forEach((reading, i) => {
      const weight = n - i;
      const side = TrendClassifier.side(reading.trend);
      if (side > 0) {
        weights.bull += weight;
        if (reading.trend === 'strong_bull') strongBull += weight;
      } else if (side < 0) {
        weights.bear += weight;
        if (reading.trend === 'strong_bear') strongBear += weight;
      } else {
        weights.sideways += weight;
      }
    });

    const total = weights.bull + weights.bear + weights.sideways;
    if (total === 0) {
      return { trend: 'sideways', share: 0, weights };
    }

    let trend: TrendCode = 'sideways';
    let winner = weights.sideways;
    if (weights.bull > weights.bear && weights.bull > weights.sideways) {
      trend = strongBull * 2 > weights.bull ? 'strong_bull' : 'bull';
      winner = weights.bull;
    } else if (weights.bear > weights.bull && weights.bear > weights.sideways) {
      trend = strongBear * 2 > weights.bear ? 'strong_bear' : 'bear';
      winner = weights.bear;
    }

    return { trend, share: winner / total, weights };
  }
}
