/**
 * Engine configuration loader
 *
 * Precedence (highest first): ENGINE_* environment variables, explicit
 * overrides, schema defaults. The merged object is validated by zod.
 */

import { ConfigValidationError } from '../errors';
import { EngineConfigSchema, type EngineConfig, type EngineConfigInput } from './schema';

type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge plain objects; arrays and scalars from `top` replace `base`.
 */
export function deepMerge(base: unknown, top: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(top)) {
    return top === undefined ? base : top;
  }
  const merged: ConfigLayer = { ...base };
  for (const [key, value] of Object.entries(top)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}

function setPath(target: ConfigLayer, pathParts: string[], value: unknown): void {
  let cursor = target;
  for (const part of pathParts.slice(0, -1)) {
    const next = cursor[part];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: ConfigLayer = {};
      cursor[part] = created;
      cursor = created;
    }
  }
  cursor[pathParts[pathParts.length - 1]] = value;
}

const NUMERIC_ENV: Record<string, string[]> = {
  ENGINE_MIN_CANDLES: ['indicators', 'minCandles'],
  ENGINE_CANDLE_LIMIT: ['indicators', 'candleLimit'],
  ENGINE_DIVERGENCE_LOOKBACK: ['divergence', 'lookback'],
  ENGINE_PIVOT_WINDOW: ['divergence', 'pivotWindow'],
  ENGINE_REACTIVATION_MIN_MATCH: ['reactivation', 'minMatchRatio'],
  ENGINE_REACTIVATION_MIN_TECHNICAL: ['reactivation', 'minTechnicalScore'],
  ENGINE_POSITION_LOSS_THRESHOLD: ['position', 'lossThreshold'],
  ENGINE_POSITION_DEFAULT_LEVERAGE: ['position', 'defaultLeverage'],
};

/**
 * Parse "4h,1h,30m,15m;1h,30m,15m,5m" into ordered timeframe sets.
 * Values are validated by the schema afterwards.
 */
export function parseTimeframeSets(raw: string): string[][] {
  return raw
    .split(';')
    .map((set) =>
      set
        .split(',')
        .map((tf) => tf.trim())
        .filter((tf) => tf.length > 0)
    )
    .filter((set) => set.length > 0);
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};

  for (const [name, pathParts] of Object.entries(NUMERIC_ENV)) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== '') {
      setPath(layer, pathParts, Number(raw));
    }
  }

  if (env.ENGINE_TIMEFRAME_SETS) {
    setPath(layer, ['selector', 'timeframeSets'], parseTimeframeSets(env.ENGINE_TIMEFRAME_SETS));
  }

  return layer;
}

/**
 * Build a validated engine configuration.
 */
export function loadEngineConfig(
  overrides: EngineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const merged = deepMerge(overrides, configFromEnv(env));
  const result = EngineConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigValidationError(issues.join('; '), issues);
  }
  return result.data;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});
