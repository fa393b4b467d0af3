/**
 * Bybit kline adapter for the CandleSource contract
 *
 * Public v5 market endpoint, linear perpetuals. Responses are cached
 * per (symbol, timeframe, limit) for a short TTL. No retries: a failed
 * request surfaces as an error and the engine drops the timeframe.
 */

import { z } from 'zod';
import { Logger } from '@sigil/shared';
import type { Candle, CandleSource, Timeframe } from '../types';

const INTERVALS: Record<Timeframe, string> = {
  '1m': '1',
  '3m': '3',
  '5m': '5',
  '15m': '15',
  '30m': '30',
  '1h': '60',
  '2h': '120',
  '4h': '240',
  '1d': 'D',
};

// [startTime, open, high, low, close, volume, turnover]
const KlineResponseSchema = z.object({
  retCode: z.number(),
  retMsg: z.string(),
  result: z
    .object({
      symbol: z.string().optional(),
      category: z.string().optional(),
      list: z.array(z.array(z.string()).min(6)),
    })
    .optional(),
});

export interface BybitCandleSourceOptions {
  baseUrl?: string;
  timeoutMs?: number;
  cacheTtlMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

interface CacheEntry {
  candles: Candle[];
  timestamp: number;
}

// Every evaluation owns its candles
function cloneCandles(candles: Candle[]): Candle[] {
  return candles.map((candle) => ({ ...candle }));
}

export class BybitCandleSource implements CandleSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly cacheTtlMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(options: BybitCandleSourceOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://api.bybit.com';
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.cacheTtlMs = options.cacheTtlMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? Logger.getInstance('technical-engine:bybit');
  }

  static interval(timeframe: Timeframe): string {
    return INTERVALS[timeframe];
  }

  async fetch(
    symbol: string,
    timeframe: Timeframe,
    limit: number,
    signal?: AbortSignal
  ): Promise<Candle[] | null> {
    const cacheKey = `${symbol.toUpperCase()}_${timeframe}_${limit}`;
    const cached = this.cache.get(cacheKey);
    if (cached && Date.now() - cached.timestamp <= this.cacheTtlMs) {
      this.logger.logCacheOperation('get', cacheKey, true);
      return cloneCandles(cached.candles);
    }

    const params = new URLSearchParams({
      category: 'linear',
      symbol: symbol.toUpperCase(),
      interval: BybitCandleSource.interval(timeframe),
      limit: Math.min(limit, 1000).toString(),
    });
    const body = await this.request(`/v5/market/kline?${params.toString()}`, signal);

    const parsed = KlineResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Malformed kline response for ${symbol} ${timeframe}`);
    }
    if (parsed.data.retCode !== 0) {
      throw new Error(`Bybit API error: ${parsed.data.retMsg}`);
    }
    if (!parsed.data.result || parsed.data.result.list.length === 0) {
      return null;
    }

    const candles: Candle[] = parsed.data.result.list.map((row) => ({
      timestamp: parseInt(row[0], 10),
      open: parseFloat(row[1]),
      high: parseFloat(row[2]),
      low: parseFloat(row[3]),
      close: parseFloat(row[4]),
      volume: parseFloat(row[5]),
    }));

    // Bybit returns newest first
    candles.sort((a, b) => a.timestamp - b.timestamp);

    const now = Date.now();
    this.pruneCache(now);
    this.cache.set(cacheKey, { candles, timestamp: now });
    return cloneCandles(candles);
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private pruneCache(now: number): void {
    for (const [key, entry] of this.cache) {
      if (now - entry.timestamp > this.cacheTtlMs) this.cache.delete(key);
    }
  }

  private async request(path: string, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const startedAt = Date.now();
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'GET',
        headers: { 'Content-Type': 'application/json' },
        signal: controller.signal,
      });
      this.logger.logHttpRequest('GET', path, response.status, Date.now() - startedAt);

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }
      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(signal?.aborted ? 'Request aborted' : 'Request timeout');
      }
      throw new Error(`Request failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
