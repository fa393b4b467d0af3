/**
 * Error taxonomy for the evaluation pipeline
 *
 * DataInsufficient and DataUnavailable exclude a single timeframe.
 * EvaluationImpossible ends the evaluation with a fail-closed decision.
 */

import type { Timeframe } from '../types';

export class DataInsufficientError extends Error {
  constructor(
    public readonly timeframe: Timeframe,
    public readonly received: number,
    public readonly required: number
  ) {
    super(`Insufficient candles for ${timeframe}: ${received} < ${required}`);
    this.name = 'DataInsufficientError';
  }
}

export class DataUnavailableError extends Error {
  constructor(
    public readonly timeframe: Timeframe,
    reason: string
  ) {
    super(`Candles unavailable for ${timeframe}: ${reason}`);
    this.name = 'DataUnavailableError';
  }
}

export class EvaluationImpossibleError extends Error {
  constructor(
    message: string,
    public readonly dropped: Partial<Record<Timeframe, string>> = {}
  ) {
    super(message);
    this.name = 'EvaluationImpossibleError';
  }
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(`Configuration validation error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
