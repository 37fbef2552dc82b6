import type { Got } from 'got';
import { RequestPacer } from '../lib/rateLimiter';
import { toUnixSeconds } from '../lib/time';
import type { ClientStatsSnapshot, PriceResult, PriceSource, PriceSuccess } from '../types/price';
import { ClientStats } from './stats';
import { classifyError, classifyResponse, type Outcome } from './outcome';

export type SearchParams = Record<string, string | number>;

// Oldest entries are dropped past this many cached point prices
export const DEFAULT_PRICE_CACHE_SIZE = 10_000;

export abstract class SourceClient implements PriceSource {
  abstract readonly name: string;

  protected readonly stats = new ClientStats();
  private readonly priceCache = new Map<string, PriceSuccess>();
  private readonly inFlight = new Map<string, Promise<PriceResult>>();

  constructor(
    protected readonly http: Got,
    protected readonly pacer: RequestPacer,
    private readonly priceCacheSize = DEFAULT_PRICE_CACHE_SIZE
  ) {}

  abstract fetchPriceAt(address: string, timestamp: number, useCache?: boolean): Promise<PriceResult>;
  abstract fetchCurrentPrice(address: string): Promise<PriceResult>;

  getStatistics(): ClientStatsSnapshot {
    return this.stats.snapshot();
  }

  clearCache() {
    this.priceCache.clear();
    this.stats.resetCacheHits();
  }

  /**
   * Point lookups go through here. Only successful results are memoized,
   * keyed by address and the second-resolution timestamp (plus `rangeEnd`
   * when the lookup covers an explicit range). Concurrent lookups for one
   * key share a single upstream request.
   */
  protected async cachedPrice(
    address: string,
    timestamp: number,
    useCache: boolean,
    load: (timestampSec: number) => Promise<PriceResult>,
    rangeEnd?: number
  ): Promise<PriceResult> {
    const ts = toUnixSeconds(timestamp);
    if (!useCache) return load(ts);

    const key = rangeEnd === undefined ? `${address}_${ts}` : `${address}_${ts}_${rangeEnd}`;
    const hit = this.priceCache.get(key) ?? this.inFlight.get(key);
    if (hit) {
      this.stats.cacheHit();
      return hit;
    }

    const pending = load(ts)
      .then((result) => {
        if (result.success) this.remember(key, result);
        return result;
      })
      .finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, pending);
    return pending;
  }

  private remember(key: string, result: PriceSuccess) {
    this.priceCache.delete(key);
    this.priceCache.set(key, result);
    while (this.priceCache.size > this.priceCacheSize) {
      const oldest = this.priceCache.keys().next();
      if (oldest.done) break;
      this.priceCache.delete(oldest.value);
    }
  }

  /**
   * Paced GET with status/transport classification. `extract` turns a parsed
   * 200 body into a value or a failure; success/failure counters follow the
   * final outcome.
   */
  protected async call<T>(
    path: string,
    searchParams: SearchParams,
    timeoutMs: number,
    extract: (body: unknown) => Outcome<T>
  ): Promise<Outcome<T>> {
    await this.pacer.acquire();
    this.stats.request();

    let outcome: Outcome<T>;
    try {
      const res = await this.http.get(path, { searchParams, timeout: timeoutMs });
      const classified = classifyResponse(res.statusCode, res.body);
      outcome = classified.ok ? extract(classified.value) : classified;
    } catch (err) {
      outcome = classifyError(err);
    }

    if (outcome.ok) this.stats.success();
    else this.stats.failure();
    return outcome;
  }
}
