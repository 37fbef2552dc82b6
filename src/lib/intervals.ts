import type { ChartInterval, ProviderInterval } from '../types/price';

const PROVIDER_INTERVAL: Record<ChartInterval, ProviderInterval> = {
  '1m': '1m',
  '5m': '5m',
  '15m': '15m',
  '1h': '1H',
  '4h': '4H',
  '1d': '1D',
};

const INTERVAL_SECONDS: Record<ChartInterval, number> = {
  '1m': 60,
  '5m': 300,
  '15m': 900,
  '1h': 3600,
  '4h': 14400,
  '1d': 86400,
};

export const toProviderInterval = (interval: ChartInterval): ProviderInterval => PROVIDER_INTERVAL[interval];

export const intervalSeconds = (interval: ChartInterval): number => INTERVAL_SECONDS[interval];
