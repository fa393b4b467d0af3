/**
 * Core type definitions for the Technical Evaluation Engine
 */

// Candle Data Structure
export interface Candle {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export const TIMEFRAMES = ['1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '1d'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export type Direction = 'long' | 'short';

export type EvaluationContext = 'entry' | 'reactivation' | 'position' | 'reversal';

// Indicator Types
export interface TimeframeSeries {
  timeframe: Timeframe;
  candles: readonly Candle[];
  emaShort: number[];
  emaLong: number[];
  oscillator: number[]; // RSI, 0-100
  macdLine: number[];
  macdSignal: number[];
  histogram: number[];
  volatility: number[]; // ATR, price units
  moneyFlow: number[]; // MFI, 0-100
}

// Trend Types
export type TrendCode = 'strong_bear' | 'bear' | 'sideways' | 'bull' | 'strong_bull';

export const TREND_CODE_VALUE: Record<TrendCode, -2 | -1 | 0 | 1 | 2> = {
  strong_bear: -2,
  bear: -1,
  sideways: 0,
  bull: 1,
  strong_bull: 2,
};

export interface TrendReading {
  timeframe: Timeframe;
  trend: TrendCode;
  strength: number; // |spread| / ATR
  spread: number;
}

export interface TrendWeights {
  bull: number;
  bear: number;
  sideways: number;
}

export interface MajorTrend {
  trend: TrendCode;
  share: number; // winner weight / total weight, 0-1
  weights: TrendWeights;
}

export interface Snapshot {
  symbol: string;
  direction: Direction | null;
  timeframes: Timeframe[]; // highest first
  series: ReadonlyMap<Timeframe, TimeframeSeries>;
  readings: ReadonlyMap<Timeframe, TrendReading>;
  majorTrend: MajorTrend;
}

// Divergence Types
export type DivergenceType = 'none' | 'bullish' | 'bearish';
export type DivergenceStrength = 'weak' | 'medium' | 'strong';
export type DivergenceSide = 'none' | 'bullish' | 'bearish';
export type OverallBias = 'neutral' | 'bullish-reversal' | 'bearish-reversal' | 'continuation';

export interface IndicatorDivergence {
  type: DivergenceType;
  confirmed: boolean;
  strength: DivergenceStrength;
  ratio: number;
  /** Index of the later pivot within the analysed window, -1 when none */
  pivotIndex: number;
}

export interface DivergenceFinding {
  oscillator: IndicatorDivergence;
  momentum: IndicatorDivergence;
  overallBias: OverallBias;
  dominantSide: DivergenceSide;
  bullishScore: number;
  bearishScore: number;
  volumeSurge: boolean;
  confidence: number; // 0-1
}

export interface Pivot {
  index: number;
  price: number;
}

// Scoring Types
export type Grade = 'A' | 'B' | 'C' | 'D';
export type RiskClass = 'low' | 'medium' | 'high';

export interface SubScores {
  trend: number;
  momentum: number;
  volatility: number;
  divergence: number;
  structure: number;
  micro: number;
  smartEntry: number;
}

export interface ScoreBundle extends SubScores {
  technicalScore: number;
  matchRatio: number;
  grade: Grade;
  confidence: number;
  riskClass: RiskClass;
}

// Entry Validation Types
export type EntryMode = 'ok' | 'warn' | 'block';

export interface EntryVerdict {
  entryScore: number;
  entryGrade: Grade;
  entryMode: EntryMode;
  entryAllowed: boolean;
  reasons: string[];
}

// Decision Types
export type DecisionKind =
  | 'enter'
  | 'wait'
  | 'skip'
  | 'reversal-risk'
  | 'close'
  | 'close-partial'
  | 'keep'
  | 'reverse';

export interface PositionState {
  side: Direction;
  entryPrice: number;
  markPrice?: number;
  leverage?: number;
  /** Levered ROI in percent; computed from prices when omitted */
  roi?: number;
}

export interface PositionAdvice {
  roi: number;
  closeFraction?: number;
  keepFraction?: number;
  dynamicStop?: number;
  opposingTimeframes?: number;
  checkedTimeframes?: Timeframe[];
  warning?: string;
  lossPct?: number;
}

export interface DecisionEvidence {
  scores: ScoreBundle;
  divergence: DivergenceFinding;
  entry: EntryVerdict | null;
  majorTrend: MajorTrend;
  timeframes: Timeframe[];
  readings: TrendReading[];
}

export interface Decision {
  symbol: string;
  context: EvaluationContext;
  direction: Direction | null;
  decision: DecisionKind;
  allowed: boolean;
  evaluated: boolean;
  reason: string;
  reasons: string[];
  evidence: DecisionEvidence;
  position?: PositionAdvice;
  timestamp: number;
}

export interface EvaluationRequest {
  symbol: string;
  direction?: Direction | null;
  context: EvaluationContext;
  position?: PositionState;
  signal?: AbortSignal;
  correlationId?: string;
}

// Collaborator contracts
export interface CandleSource {
  fetch(
    symbol: string,
    timeframe: Timeframe,
    limit: number,
    signal?: AbortSignal
  ): Promise<Candle[] | null>;
}

export interface StoredSignal {
  id: string;
  symbol: string;
  direction: Direction;
  context: EvaluationContext;
  createdAt: number;
  position?: PositionState;
  lastDecision?: DecisionKind;
  lastEvaluatedAt?: number;
}

export interface SignalStore {
  saveDecision(
    symbol: string,
    context: EvaluationContext,
    scores: ScoreBundle,
    decision: Decision
  ): Promise<void>;
  getPending(context: EvaluationContext): Promise<StoredSignal[]>;
}

export interface NotificationSink {
  send(text: string): Promise<void>;
}
