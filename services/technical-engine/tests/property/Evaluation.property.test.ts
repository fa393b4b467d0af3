/**
 * Property-based tests for the evaluation pipeline
 */

import * as fc from 'fast-check';
import { DEFAULT_ENGINE_CONFIG } from '../../src/config/ConfigLoader';
import { DecisionEngine } from '../../src/engine/DecisionEngine';
import { DivergenceDetector } from '../../src/engine/DivergenceDetector';
import { gradeFor } from '../../src/engine/ScoringEngine';
import { SmartEntryValidator } from '../../src/engine/SmartEntryValidator';
import { IndicatorComputer } from '../../src/indicators/IndicatorComputer';
import type {
  Candle,
  DivergenceFinding,
  Grade,
  IndicatorDivergence,
  ScoreBundle,
  TrendCode,
} from '../../src/types';
import { FakeCandleSource, createQuietLogger, risingCandles } from '../fixtures/candles';

const config = DEFAULT_ENGINE_CONFIG;
const GRADE_RANK: Record<Grade, number> = { D: 0, C: 1, B: 2, A: 3 };
const TREND_CODES: TrendCode[] = ['strong_bear', 'bear', 'sideways', 'bull', 'strong_bull'];

const stepArb = fc.record({
  change: fc.double({ min: -0.05, max: 0.05, noNaN: true }),
  range: fc.double({ min: 0, max: 0.03, noNaN: true }),
  volume: fc.double({ min: 0, max: 1_000_000, noNaN: true }),
});

const candlesArb = fc.array(stepArb, { minLength: 40, maxLength: 120 }).map((steps): Candle[] => {
  let close = 100;
  return steps.map((step, i) => {
    const open = close;
    close = Math.max(0.01, close * (1 + step.change));
    const top = Math.max(open, close);
    const bottom = Math.min(open, close);
    return {
      timestamp: 1_700_000_000_000 + i * 60_000,
      open,
      high: top * (1 + step.range),
      low: bottom * (1 - step.range),
      close,
      volume: step.volume,
    };
  });
});

const divergenceArb: fc.Arbitrary<IndicatorDivergence> = fc.record({
  type: fc.constantFrom('none' as const, 'bullish' as const, 'bearish' as const),
  confirmed: fc.boolean(),
  strength: fc.constantFrom('weak' as const, 'medium' as const, 'strong' as const),
  ratio: fc.double({ min: 0, max: 10, noNaN: true }),
  pivotIndex: fc.integer({ min: -1, max: 60 }),
});

const findingArb: fc.Arbitrary<DivergenceFinding> = fc.record({
  oscillator: divergenceArb,
  momentum: divergenceArb,
  overallBias: fc.constantFrom(
    'neutral' as const,
    'bullish-reversal' as const,
    'bearish-reversal' as const,
    'continuation' as const
  ),
  dominantSide: fc.constantFrom('none' as const, 'bullish' as const, 'bearish' as const),
  bullishScore: fc.double({ min: 0, max: 1, noNaN: true }),
  bearishScore: fc.double({ min: 0, max: 1, noNaN: true }),
  volumeSurge: fc.boolean(),
  confidence: fc.double({ min: 0, max: 1, noNaN: true }),
});

function bundle(matchRatio: number, technicalScore: number): ScoreBundle {
  return {
    trend: 50,
    momentum: 50,
    volatility: 50,
    divergence: 50,
    structure: 50,
    micro: 50,
    smartEntry: 50,
    technicalScore,
    matchRatio,
    grade: gradeFor(technicalScore, config.scoring.grades),
    confidence: 0.5,
    riskClass: 'medium',
  };
}

describe('Evaluation Property Tests', () => {
  const logger = createQuietLogger();

  it('should keep every score within 0-100 for arbitrary candles', async () => {
    await fc.assert(
      fc.asyncProperty(
        candlesArb,
        fc.constantFrom('long' as const, 'short' as const, null),
        async (candles, direction) => {
          const engine = new DecisionEngine(new FakeCandleSource({}, candles), { logger });
          const decision = await engine.evaluate({ symbol: 'TESTUSDT', direction, context: 'entry' });
          const { scores, divergence } = decision.evidence;

          for (const value of [
            scores.trend,
            scores.momentum,
            scores.volatility,
            scores.divergence,
            scores.structure,
            scores.micro,
            scores.smartEntry,
            scores.technicalScore,
            scores.matchRatio,
          ]) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(100);
          }
          expect(scores.confidence).toBeGreaterThanOrEqual(0);
          expect(scores.confidence).toBeLessThanOrEqual(1);
          expect(divergence.confidence).toBeGreaterThanOrEqual(0);
          expect(divergence.confidence).toBeLessThanOrEqual(1);
          expect(decision.evaluated).toBe(true);
        }
      ),
      { numRuns: 40 }
    );
  });

  it('should never grade a higher score lower', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 100, noNaN: true }),
        fc.double({ min: 0, max: 100, noNaN: true }),
        (a, b) => {
          const [low, high] = a <= b ? [a, b] : [b, a];
          const grades = config.scoring.grades;
          expect(GRADE_RANK[gradeFor(high, grades)]).toBeGreaterThanOrEqual(GRADE_RANK[gradeFor(low, grades)]);
        }
      ),
      { numRuns: 200 }
    );
  });

  it('should detect the same divergence for the same series', () => {
    const computer = new IndicatorComputer(config.indicators);
    const detector = new DivergenceDetector(config.divergence, logger);

    fc.assert(
      fc.property(candlesArb, fc.constantFrom(...TREND_CODES), (candles, trend) => {
        const series = computer.compute('15m', candles);
        expect(detector.detect(series, trend)).toEqual(detector.detect(series, trend));
      }),
      { numRuns: 50 }
    );
  });

  it('should block every reversal-biased entry graded C or D', () => {
    const validator = new SmartEntryValidator(config.entry, config.scoring.grades);

    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 100, noNaN: true }),
        fc.double({ min: 0, max: 100, noNaN: true }),
        findingArb,
        fc.constantFrom(...TREND_CODES),
        fc.constantFrom('long' as const, 'short' as const, null),
        (matchRatio, technicalScore, finding, trend, direction) => {
          const verdict = validator.validate(
            bundle(matchRatio, technicalScore),
            finding,
            { trend, share: 1, weights: { bull: 0, bear: 0, sideways: 0 } },
            direction
          );

          expect(verdict.entryScore).toBeGreaterThanOrEqual(0);
          expect(verdict.entryScore).toBeLessThanOrEqual(100);
          expect(verdict.entryAllowed).toBe(verdict.entryMode !== 'block');

          const reversal =
            finding.overallBias === 'bullish-reversal' || finding.overallBias === 'bearish-reversal';
          if (reversal && (verdict.entryGrade === 'C' || verdict.entryGrade === 'D')) {
            expect(verdict.entryMode).toBe('block');
          }
          if (verdict.entryGrade === 'D') {
            expect(verdict.entryAllowed).toBe(false);
          }
        }
      ),
      { numRuns: 300 }
    );
  });

  it('should always resolve to a fully populated decision', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 0, max: 60 }),
        fc.constantFrom('entry' as const, 'reactivation' as const),
        async (count, context) => {
          const engine = new DecisionEngine(new FakeCandleSource({}, risingCandles(count)), { logger });
          const decision = await engine.evaluate({ symbol: 'TESTUSDT', direction: 'long', context });

          expect(decision.evidence.scores).toBeDefined();
          expect(decision.evidence.divergence).toBeDefined();
          if (count < config.indicators.minCandles) {
            expect(decision.evaluated).toBe(false);
            expect(decision.decision).toBe(context === 'entry' ? 'skip' : 'wait');
          } else {
            expect(decision.evaluated).toBe(true);
          }
        }
      ),
      { numRuns: 30 }
    );
  });
});
