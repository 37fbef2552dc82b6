import { z } from 'zod';
import { createHttp } from '../lib/http';
import { RequestPacer } from '../lib/rateLimiter';
import { toUnixSeconds } from '../lib/time';
import type { PriceResult, PriceSuccess } from '../types/price';
import { SourceClient } from './base';
import { fail, toPriceResult, type Outcome } from './outcome';
import { numeric } from './schemas';
import { SOL_MINT } from './birdeye';

export const SOLSCAN_BASE_URL = 'https://pro-api.solscan.io/v2.0';

export interface SolscanOptions {
  requestsPerMinute?: number;
  retryLimit?: number;
  baseUrl?: string;
  priceCacheSize?: number;
}

export type PriceExtraction = {
  name: string;
  extract: (body: unknown) => number | undefined;
};

function attempt<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, pick: (v: T) => number): PriceExtraction {
  return {
    name,
    extract: (body) => {
      const parsed = schema.safeParse(body);
      return parsed.success ? pick(parsed.data) : undefined;
    },
  };
}

const priceField = z.object({ price: numeric });
const valueField = z.object({ value: numeric });

// Tried in order; the first shape that yields a number wins.
export const SOLSCAN_PRICE_EXTRACTIONS: readonly PriceExtraction[] = [
  attempt('price', priceField, (b) => b.price),
  attempt('data.price', z.object({ data: priceField }), (b) => b.data.price),
  attempt('data[0].price', z.object({ data: z.tuple([priceField]).rest(z.unknown()) }), (b) => b.data[0].price),
  attempt('data[0].value', z.object({ data: z.tuple([valueField]).rest(z.unknown()) }), (b) => b.data[0].value),
];

export function extractSolscanPrice(body: unknown): number | undefined {
  for (const strategy of SOLSCAN_PRICE_EXTRACTIONS) {
    const value = strategy.extract(body);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Backup price source. Point queries are sent as the one-second range
 * [from, from + 1] unless the caller gives an explicit end.
 */
export class SolscanClient extends SourceClient {
  readonly name = 'solscan';

  constructor(apiToken: string, opts: SolscanOptions = {}) {
    const rpm = opts.requestsPerMinute ?? 1000;
    const http = createHttp({
      baseUrl: opts.baseUrl ?? SOLSCAN_BASE_URL,
      headers: { token: apiToken },
      retryLimit: opts.retryLimit,
    });
    const pacer = new RequestPacer({ maxPerWindow: rpm, minIntervalMs: 60_000 / rpm, label: 'solscan' });
    super(http, pacer, opts.priceCacheSize);
  }

  fetchPriceAt(address: string, fromTime: number, useCache = true, toTime?: number): Promise<PriceResult> {
    const rangeEnd = toTime !== undefined ? toUnixSeconds(toTime) : undefined;
    return this.cachedPrice(
      address,
      fromTime,
      useCache,
      async (from) => {
        const to = rangeEnd ?? from + 1;
        const outcome = await this.call('token/price', { address, from_time: from, to_time: to }, 15_000, (body) =>
          priceOutcome(body, from)
        );
        return toPriceResult(outcome);
      },
      rangeEnd
    );
  }

  fetchCurrentPrice(address: string): Promise<PriceResult> {
    return this.fetchPriceAt(address, Math.floor(Date.now() / 1000), false);
  }

  fetchSolPriceAt(timestamp: number, useCache = true): Promise<PriceResult> {
    return this.fetchPriceAt(SOL_MINT, timestamp, useCache);
  }
}

function priceOutcome(body: unknown, at: number): Outcome<PriceSuccess> {
  const value = extractSolscanPrice(body);
  if (value === undefined) return fail('empty', 'price not found in response');
  return { ok: true, value: { success: true, value, updatedAt: at } };
}
