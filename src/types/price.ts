export type FailureReason =
  | 'empty'
  | 'malformed'
  | 'credential'
  | 'rate_limited'
  | 'http'
  | 'timeout'
  | 'transport';

export type PriceSuccess = {
  success: true;
  value: number;          // USD
  updatedAt?: number;     // unix seconds
  change24h?: number;
};

export type PriceFailure = {
  success: false;
  reason: FailureReason;
  error: string;
};

export type PriceResult = PriceSuccess | PriceFailure;

export type ClientStatsSnapshot = {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cacheHits: number;
  successRate: number;    // percent, one decimal
};

// Raw provider shapes
export type RawPricePoint = {
  unixTime: number;
  value: number;
};

export type RawOhlcvItem = {
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
  unixTime: number;
};

export const CHART_INTERVALS = ['1m', '5m', '15m', '1h', '4h', '1d'] as const;
export type ChartInterval = (typeof CHART_INTERVALS)[number];

export type ProviderInterval =
  | '1m' | '3m' | '5m' | '15m' | '30m'
  | '1H' | '2H' | '4H' | '6H' | '8H' | '12H'
  | '1D' | '3D' | '1W' | '1M';

export interface PriceSource {
  readonly name: string;
  fetchPriceAt(address: string, timestamp: number, useCache?: boolean): Promise<PriceResult>;
  fetchCurrentPrice(address: string): Promise<PriceResult>;
}

export interface BarSource {
  fetchHistory(address: string, from: number, to: number, interval: ProviderInterval): Promise<RawPricePoint[]>;
  fetchOHLCV(address: string, from: number, to: number, interval: ProviderInterval): Promise<RawOhlcvItem[]>;
}
