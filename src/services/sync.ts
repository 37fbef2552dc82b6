import { intervalSeconds, toProviderInterval } from '../lib/intervals';
import type { BarSource, ChartInterval } from '../types/price';
import type { CanonicalBar } from '../types/kline';
import { pricePointToCanonical, rawBarToCanonical } from './canonical';
import { loadSeries, mergeAndSave } from './merger';
import { klinePath } from './paths';

export type SyncSource = 'ohlcv' | 'history';

export interface SyncRequest {
  token: string;
  interval: ChartInterval;
  hours: number;
  decimals: number;
  source: SyncSource;
}

export interface SyncDeps {
  bars: BarSource;
  dataDir: string;
  now?: () => number;
}

export type SyncSummary = {
  token: string;
  interval: ChartInterval;
  path: string;
  fetched: number;
  stored: number;
  from: number;
  to: number;
  firstTime?: number;
  lastTime?: number;
};

// Upstream caps one range response at this many bars
export const MAX_BARS_PER_REQUEST = 1000;

export function planWindows(from: number, to: number, intervalSec: number, maxBars = MAX_BARS_PER_REQUEST): Array<[number, number]> {
  if (to <= from || intervalSec <= 0) return [];
  const span = intervalSec * maxBars;
  const windows: Array<[number, number]> = [];
  for (let start = from; start < to; start += span) {
    windows.push([start, Math.min(to, start + span)]);
  }
  return windows;
}

async function fetchWindow(req: SyncRequest, bars: BarSource, start: number, end: number): Promise<CanonicalBar[]> {
  const interval = toProviderInterval(req.interval);
  if (req.source === 'history') {
    const points = await bars.fetchHistory(req.token, start, end, interval);
    return points.map((p) => pricePointToCanonical(p, req.decimals));
  }
  const items = await bars.fetchOHLCV(req.token, start, end, interval);
  return items.map((item) => rawBarToCanonical(item, req.decimals));
}

/**
 * Fetches `hours` of bars ending now and merges them into the token's series.
 * Empty windows are skipped; whatever arrived is still merged.
 */
export async function syncToken(req: SyncRequest, deps: SyncDeps): Promise<SyncSummary> {
  const filePath = klinePath(deps.dataDir, req.token, req.interval);
  const to = Math.floor((deps.now ?? Date.now)() / 1000);
  const from = to - Math.round(req.hours * 3600);

  const fetched: CanonicalBar[] = [];
  for (const [start, end] of planWindows(from, to, intervalSeconds(req.interval))) {
    fetched.push(...(await fetchWindow(req, deps.bars, start, end)));
  }

  const series = fetched.length ? await mergeAndSave(filePath, fetched) : await loadSeries(filePath);
  console.log(`Synced ${req.token} ${req.interval}: ${fetched.length} fetched, ${series.length} stored`);

  return {
    token: req.token,
    interval: req.interval,
    path: filePath,
    fetched: fetched.length,
    stored: series.length,
    from,
    to,
    firstTime: series[0]?.timestampSec,
    lastTime: series[series.length - 1]?.timestampSec,
  };
}
