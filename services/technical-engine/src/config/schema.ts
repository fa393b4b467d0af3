import { z } from 'zod';
import { TIMEFRAMES, type Timeframe } from '../types';

export const TimeframeSchema = z.enum(TIMEFRAMES);

const TIMEFRAME_MINUTES: Record<Timeframe, number> = {
  '1m': 1,
  '3m': 3,
  '5m': 5,
  '15m': 15,
  '30m': 30,
  '1h': 60,
  '2h': 120,
  '4h': 240,
  '1d': 1440,
};

export function timeframeMinutes(timeframe: Timeframe): number {
  return TIMEFRAME_MINUTES[timeframe];
}

function isDescending(set: Timeframe[]): boolean {
  return set.every((tf, i) => i === 0 || timeframeMinutes(set[i - 1]) > timeframeMinutes(tf));
}

// Indicator Computer
export const IndicatorConfigSchema = z
  .object({
    emaShort: z.number().int().min(2).max(200).default(10),
    emaLong: z.number().int().min(3).max(400).default(30),
    rsiPeriod: z.number().int().min(2).max(100).default(14),
    macdFast: z.number().int().min(2).max(100).default(12),
    macdSlow: z.number().int().min(3).max(200).default(26),
    macdSignal: z.number().int().min(2).max(100).default(9),
    atrPeriod: z.number().int().min(2).max(100).default(14),
    mfiPeriod: z.number().int().min(2).max(100).default(14),
    minCandles: z.number().int().min(10).max(1000).default(35),
    candleLimit: z.number().int().min(10).max(1000).default(200),
  })
  .refine((data) => data.emaShort < data.emaLong, {
    message: 'emaShort must be less than emaLong',
    path: ['emaShort'],
  })
  .refine((data) => data.macdFast < data.macdSlow, {
    message: 'macdFast must be less than macdSlow',
    path: ['macdFast'],
  })
  .refine((data) => data.minCandles <= data.candleLimit, {
    message: 'minCandles must not exceed candleLimit',
    path: ['minCandles'],
  });

// Trend Classifier
export const TrendConfigSchema = z.object({
  spreadLookback: z.number().int().min(1).max(20).default(3),
  strongStrength: z.number().min(0.1).max(10).default(1.0),
  // Spreads below this fraction of ATR read as sideways
  minStrength: z.number().min(0).max(1).default(0.05),
});

// Timeframe Selector
export const SelectorConfigSchema = z.object({
  timeframeSets: z
    .array(
      z.array(TimeframeSchema).min(2).refine(isDescending, {
        message: 'Timeframe sets must be ordered from highest to lowest',
      })
    )
    .min(1)
    .default([
      ['4h', '1h', '30m', '15m'],
      ['1h', '30m', '15m', '5m'],
    ]),
});

// Divergence Detector
export const DivergenceConfigSchema = z
  .object({
    lookback: z.number().int().min(10).max(500).default(60),
    pivotWindow: z.number().int().min(1).max(10).default(2),
    strongRatio: z.number().positive().default(3.0),
    mediumRatio: z.number().positive().default(1.5),
    strengthScores: z
      .object({
        weak: z.number().min(0).max(1).default(0.2),
        medium: z.number().min(0).max(1).default(0.3),
        strong: z.number().min(0).max(1).default(0.4),
      })
      .default({}),
    confirmationBonus: z.number().min(0).max(1).default(0.1),
    volumeLookback: z.number().int().min(2).max(100).default(10),
    volumeSurgeMultiplier: z.number().min(1).max(10).default(1.3),
    volumeSurgeBonus: z.number().min(0).max(1).default(0.05),
  })
  .refine((data) => data.mediumRatio < data.strongRatio, {
    message: 'mediumRatio must be less than strongRatio',
    path: ['mediumRatio'],
  });

export const ScoringWeightsSchema = z
  .object({
    trend: z.number().min(0).max(1).default(0.3),
    momentum: z.number().min(0).max(1).default(0.2),
    volatility: z.number().min(0).max(1).default(0.1),
    divergence: z.number().min(0).max(1).default(0.15),
    structure: z.number().min(0).max(1).default(0.1),
    micro: z.number().min(0).max(1).default(0.1),
    smartEntry: z.number().min(0).max(1).default(0.05),
  })
  .refine((w) => Math.abs(Object.values(w).reduce((sum, v) => sum + v, 0) - 1) <= 0.001, {
    message: 'Scoring weights must sum to 1',
    path: ['trend'],
  });

export const GradeThresholdsSchema = z
  .object({
    A: z.number().min(0).max(100).default(75),
    B: z.number().min(0).max(100).default(60),
    C: z.number().min(0).max(100).default(45),
  })
  .refine((g) => g.A > g.B && g.B > g.C, {
    message: 'Grade thresholds must be strictly descending',
    path: ['A'],
  });

// Scorer
export const ScoringConfigSchema = z.object({
  weights: ScoringWeightsSchema.default({}),
  grades: GradeThresholdsSchema.default({}),
  volatilityPenaltyPerPct: z.number().min(0).max(100).default(20),
  opposingDivergencePenalty: z.number().min(0).max(1).default(0.15),
  lowRiskVolatility: z.number().min(0).max(100).default(65),
  mediumRiskVolatility: z.number().min(0).max(100).default(40),
});

// Smart Entry Validator
export const EntryConfigSchema = z.object({
  matchWeight: z.number().min(0).max(1).default(0.4),
  technicalWeight: z.number().min(0).max(1).default(0.4),
  trendBonus: z
    .object({
      strongAligned: z.number().default(10),
      aligned: z.number().default(6),
      neutral: z.number().default(4),
      opposed: z.number().default(2),
    })
    .default({}),
  biasBonus: z
    .object({
      continuation: z.number().default(10),
      neutral: z.number().default(5),
      reversal: z.number().default(-5),
    })
    .default({}),
  strongOpposingPenalty: z.number().min(0).max(100).default(15),
  unconfirmedOpposingPenalty: z.number().min(0).max(100).default(5),
});

// Reactivation policy
export const ReactivationConfigSchema = z.object({
  minMatchRatio: z.number().min(0).max(100).default(60),
  minTechnicalScore: z.number().min(0).max(100).default(55),
});

// Position policy (ROI in percent, levered)
export const PositionConfigSchema = z
  .object({
    lossThreshold: z.number().max(0).default(-30),
    trailThreshold: z.number().min(0).default(60),
    takeProfitThreshold: z.number().min(0).default(100),
    takeProfitCloseFraction: z.number().gt(0).lt(1).default(0.7),
    dynamicStopPct: z.number().min(0).max(50).default(5),
    shortTimeframes: z.array(TimeframeSchema).min(1).default(['1m', '5m', '15m']),
    reverseMinOpposing: z.number().int().min(1).default(2),
    partialCloseFraction: z.number().gt(0).lt(1).default(0.5),
    defaultLeverage: z.number().min(1).max(200).default(1),
  })
  .refine((p) => p.trailThreshold < p.takeProfitThreshold, {
    message: 'trailThreshold must be less than takeProfitThreshold',
    path: ['trailThreshold'],
  });

// Reversal-risk monitor (unlevered loss in percent)
export const ReversalConfigSchema = z
  .object({
    closeLossPct: z.number().max(0).default(-5),
    riskLossPct: z.number().max(0).default(-3),
  })
  .refine((r) => r.closeLossPct < r.riskLossPct, {
    message: 'closeLossPct must be below riskLossPct',
    path: ['closeLossPct'],
  });

export const EngineConfigSchema = z.object({
  indicators: IndicatorConfigSchema.default({}),
  trend: TrendConfigSchema.default({}),
  selector: SelectorConfigSchema.default({}),
  divergence: DivergenceConfigSchema.default({}),
  scoring: ScoringConfigSchema.default({}),
  entry: EntryConfigSchema.default({}),
  reactivation: ReactivationConfigSchema.default({}),
  position: PositionConfigSchema.default({}),
  reversal: ReversalConfigSchema.default({}),
});

export type IndicatorConfig = z.infer<typeof IndicatorConfigSchema>;
export type TrendConfig = z.infer<typeof TrendConfigSchema>;
export type SelectorConfig = z.infer<typeof SelectorConfigSchema>;
export type DivergenceConfig = z.infer<typeof DivergenceConfigSchema>;
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;
export type GradeThresholds = z.infer<typeof GradeThresholdsSchema>;
export type EntryConfig = z.infer<typeof EntryConfigSchema>;
export type ReactivationConfig = z.infer<typeof ReactivationConfigSchema>;
export type PositionConfig = z.infer<typeof PositionConfigSchema>;
export type ReversalConfig = z.infer<typeof ReversalConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
