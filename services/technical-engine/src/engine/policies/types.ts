import type {
  DecisionKind,
  DivergenceFinding,
  EntryVerdict,
  PositionAdvice,
  ScoreBundle,
  Snapshot,
} from '../../types';

export interface PolicyInput {
  snapshot: Snapshot;
  scores: ScoreBundle;
  divergence: DivergenceFinding;
  entry: EntryVerdict;
}

export interface PolicyOutcome {
  decision: DecisionKind;
  /** Whether the signal may proceed, or the position may stay as it is */
  allowed: boolean;
  reason: string;
  reasons: string[];
  position?: PositionAdvice;
}
