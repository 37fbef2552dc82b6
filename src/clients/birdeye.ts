import { createHttp } from '../lib/http';
import { RequestPacer } from '../lib/rateLimiter';
import { toUnixSeconds } from '../lib/time';
import type {
  BarSource,
  PriceResult,
  PriceSuccess,
  ProviderInterval,
  RawOhlcvItem,
  RawPricePoint,
} from '../types/price';
import { SourceClient } from './base';
import { fail, toPriceResult, type Outcome } from './outcome';
import { birdeyeItemsEnvelope, birdeyePriceEnvelope, parseHistoryItems, parseOhlcvItems } from './schemas';

export const BIRDEYE_BASE_URL = 'https://public-api.birdeye.so';
export const SOL_MINT = 'So11111111111111111111111111111111111111112';

export interface BirdeyeOptions {
  requestsPerMinute?: number;
  minIntervalMs?: number;
  retryLimit?: number;
  baseUrl?: string;
  priceCacheSize?: number;
}

function extractPrice(body: unknown): Outcome<PriceSuccess> {
  const parsed = birdeyePriceEnvelope.safeParse(body);
  if (!parsed.success) return fail('malformed', 'malformed response');
  const { success, message, data } = parsed.data;
  if (!success || data?.value == null) return fail('empty', message || 'empty response');
  return {
    ok: true,
    value: {
      success: true,
      value: data.value,
      updatedAt: data.updateUnixTime ?? undefined,
      change24h: data.priceChange24h ?? undefined,
    },
  };
}

function extractItems(body: unknown): Outcome<unknown[]> {
  const parsed = birdeyeItemsEnvelope.safeParse(body);
  if (!parsed.success) return fail('malformed', 'malformed response');
  const { success, message, data } = parsed.data;
  if (!success || !data) return fail('empty', message || 'empty response');
  return { ok: true, value: data.items ?? [] };
}

/**
 * Primary price source. Point lookups are memoized per (address, second);
 * range lookups are best-effort and come back empty on any failure.
 */
export class BirdeyeClient extends SourceClient implements BarSource {
  readonly name = 'birdeye';

  constructor(apiKey: string, opts: BirdeyeOptions = {}) {
    const http = createHttp({
      baseUrl: opts.baseUrl ?? BIRDEYE_BASE_URL,
      headers: { 'x-chain': 'solana', 'X-API-KEY': apiKey },
      retryLimit: opts.retryLimit,
    });
    const pacer = new RequestPacer({
      maxPerWindow: opts.requestsPerMinute ?? 800,
      minIntervalMs: opts.minIntervalMs ?? 80,
      label: 'birdeye',
    });
    super(http, pacer, opts.priceCacheSize);
  }

  fetchPriceAt(address: string, timestamp: number, useCache = true): Promise<PriceResult> {
    return this.cachedPrice(address, timestamp, useCache, async (unixtime) => {
      const outcome = await this.call('defi/historical_price_unix', { address, unixtime }, 15_000, extractPrice);
      return toPriceResult(outcome);
    });
  }

  fetchSolPriceAt(timestamp: number, useCache = true): Promise<PriceResult> {
    return this.fetchPriceAt(SOL_MINT, timestamp, useCache);
  }

  async fetchCurrentPrice(address: string): Promise<PriceResult> {
    const outcome = await this.call('defi/price', { address }, 10_000, extractPrice);
    return toPriceResult(outcome);
  }

  async fetchHistory(address: string, from: number, to: number, interval: ProviderInterval = '1m'): Promise<RawPricePoint[]> {
    const items = await this.fetchRange(
      'defi/history_price',
      { address, address_type: 'token', type: interval, time_from: toUnixSeconds(from), time_to: toUnixSeconds(to) },
      'history'
    );
    return parseHistoryItems(items);
  }

  async fetchOHLCV(address: string, from: number, to: number, interval: ProviderInterval = '1m'): Promise<RawOhlcvItem[]> {
    const items = await this.fetchRange(
      'defi/ohlcv',
      { address, type: interval, time_from: toUnixSeconds(from), time_to: toUnixSeconds(to) },
      'OHLCV'
    );
    return parseOhlcvItems(items);
  }

  private async fetchRange(path: string, params: Record<string, string | number>, what: string): Promise<unknown[]> {
    const outcome = await this.call(path, params, 30_000, extractItems);
    if (!outcome.ok) {
      console.warn(`Birdeye ${what} failed for ${params.address}: ${outcome.error}`);
      return [];
    }
    return outcome.value;
  }
}
