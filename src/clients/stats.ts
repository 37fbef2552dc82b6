import type { ClientStatsSnapshot } from '../types/price';

export class ClientStats {
  private total = 0;
  private succeeded = 0;
  private failed = 0;
  private hits = 0;

  request() { this.total += 1; }
  success() { this.succeeded += 1; }
  failure() { this.failed += 1; }
  cacheHit() { this.hits += 1; }
  resetCacheHits() { this.hits = 0; }

  snapshot(): ClientStatsSnapshot {
    const rate = this.total > 0 ? (this.succeeded / this.total) * 100 : 0;
    return {
      totalRequests: this.total,
      successfulRequests: this.succeeded,
      failedRequests: this.failed,
      cacheHits: this.hits,
      successRate: Math.round(rate * 10) / 10,
    };
  }
}
