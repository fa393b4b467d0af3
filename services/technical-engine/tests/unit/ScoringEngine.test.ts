import { DEFAULT_ENGINE_CONFIG } from '../../src/config/ConfigLoader';
import { DivergenceDetector } from '../../src/engine/DivergenceDetector';
import { ScoringEngine, clampScore, gradeFor } from '../../src/engine/ScoringEngine';
import { SnapshotBuilder } from '../../src/engine/SnapshotBuilder';
import { TrendClassifier } from '../../src/engine/TrendClassifier';
import { IndicatorComputer } from '../../src/indicators/IndicatorComputer';
import type { Candle, Direction, DivergenceFinding, Snapshot } from '../../src/types';
import { FakeCandleSource, createQuietLogger, flatCandles, risingCandles } from '../fixtures/candles';

const config = DEFAULT_ENGINE_CONFIG;

async function snapshotOf(candles: Candle[], direction: Direction | null): Promise<Snapshot> {
  const builder = new SnapshotBuilder(
    new FakeCandleSource({}, candles),
    new IndicatorComputer(config.indicators),
    new TrendClassifier(config.trend),
    config.selector,
    config.indicators.candleLimit,
    createQuietLogger()
  );
  const { snapshot } = await builder.build({ symbol: 'BTCUSDT', direction });
  return snapshot;
}

function finding(overrides: Partial<DivergenceFinding>): DivergenceFinding {
  return { ...DivergenceDetector.neutral(), ...overrides };
}

describe('ScoringEngine', () => {
  const scoring = new ScoringEngine(config.scoring);

  describe('score', () => {
    it('should score an aligned strong trend as grade A', async () => {
      const scores = scoring.score(await snapshotOf(risingCandles(), 'long'), DivergenceDetector.neutral());

      expect(scores.trend).toBe(100);
      expect(scores.structure).toBe(100);
      expect(scores.divergence).toBe(50);
      expect(scores.smartEntry).toBe(50);
      expect(scores.momentum).toBeGreaterThan(75);
      expect(scores.micro).toBeGreaterThan(85);
      expect(scores.matchRatio).toBe(100);
      expect(scores.technicalScore).toBeGreaterThan(75);
      expect(scores.grade).toBe('A');
      expect(scores.confidence).toBe(1);
      expect(scores.riskClass).toBe('low');
    });

    it('should score a direction against the trend as grade D', async () => {
      const scores = scoring.score(await snapshotOf(risingCandles(), 'short'), DivergenceDetector.neutral());

      expect(scores.trend).toBe(0);
      expect(scores.structure).toBe(0);
      expect(scores.momentum).toBeLessThan(25);
      expect(scores.matchRatio).toBe(0);
      expect(scores.technicalScore).toBeLessThan(45);
      expect(scores.grade).toBe('D');
    });

    it('should measure against the major trend when no direction is given', async () => {
      const scores = scoring.score(await snapshotOf(risingCandles(), null), DivergenceDetector.neutral());

      expect(scores.trend).toBe(100);
      expect(scores.matchRatio).toBe(50);
    });

    it('should score a flat market around neutral', async () => {
      const scores = scoring.score(await snapshotOf(flatCandles(), 'long'), DivergenceDetector.neutral());

      expect(scores.trend).toBe(50);
      expect(scores.momentum).toBeCloseTo(50, 6);
      expect(scores.volatility).toBeCloseTo(92, 6);
      expect(scores.structure).toBe(50);
      expect(scores.micro).toBeCloseTo(50, 6);
      expect(scores.technicalScore).toBeCloseTo(54.2, 5);
      expect(scores.grade).toBe('C');
      expect(scores.matchRatio).toBe(50);
      expect(scores.confidence).toBe(0);
    });

    it('should reward divergence aligned with the direction', async () => {
      const snapshot = await snapshotOf(risingCandles(), 'long');
      const scores = scoring.score(
        snapshot,
        finding({ dominantSide: 'bullish', overallBias: 'continuation', bullishScore: 0.5, confidence: 0.5 })
      );

      expect(scores.divergence).toBe(75);
      expect(scores.smartEntry).toBe(80);
    });

    it('should penalise divergence against the direction', async () => {
      const snapshot = await snapshotOf(risingCandles(), 'short');
      const scores = scoring.score(
        snapshot,
        finding({ dominantSide: 'bullish', overallBias: 'continuation', bullishScore: 0.5, confidence: 0.5 })
      );

      expect(scores.divergence).toBe(25);
      expect(scores.smartEntry).toBe(20);
      expect(scores.confidence).toBeCloseTo(0.85, 10);
    });

    it('should score an aligned reversal divergence at 65', async () => {
      const snapshot = await snapshotOf(risingCandles(), 'long');
      const scores = scoring.score(
        snapshot,
        finding({ dominantSide: 'bullish', overallBias: 'bullish-reversal', bullishScore: 0.4, confidence: 0.4 })
      );

      expect(scores.smartEntry).toBe(65);
    });

    it('should classify risk by volatility', async () => {
      const snapshot = await snapshotOf(flatCandles(), 'long');
      const medium = new ScoringEngine({ ...config.scoring, volatilityPenaltyPerPct: 100 });
      const high = new ScoringEngine({ ...config.scoring, volatilityPenaltyPerPct: 200 });

      expect(medium.score(snapshot, DivergenceDetector.neutral()).riskClass).toBe('medium');
      expect(high.score(snapshot, DivergenceDetector.neutral()).riskClass).toBe('high');
    });
  });

  describe('neutral', () => {
    it('should return a fully populated neutral bundle', () => {
      expect(scoring.neutral()).toEqual({
        trend: 50,
        momentum: 50,
        volatility: 50,
        divergence: 50,
        structure: 50,
        micro: 50,
        smartEntry: 50,
        technicalScore: 0,
        matchRatio: 0,
        grade: 'D',
        confidence: 0,
        riskClass: 'high',
      });
    });
  });

  describe('helpers', () => {
    it('should clamp scores and map NaN to the midpoint', () => {
      expect(clampScore(-5)).toBe(0);
      expect(clampScore(150)).toBe(100);
      expect(clampScore(42)).toBe(42);
      expect(clampScore(Number.NaN)).toBe(50);
      expect(clampScore(2, 0, 1)).toBe(1);
    });

    it('should grade at the configured boundaries', () => {
      const grades = config.scoring.grades;
      expect(gradeFor(75, grades)).toBe('A');
      expect(gradeFor(74.99, grades)).toBe('B');
      expect(gradeFor(60, grades)).toBe('B');
      expect(gradeFor(45, grades)).toBe('C');
      expect(gradeFor(44.9, grades)).toBe('D');
    });
  });
});
