import type { ChartInterval } from '../types/price';
import type { SyncSummary } from './sync';

export const SERIES_CHANNEL = 'klines:updates';

export interface Publisher {
  publish(channel: string, message: string): Promise<number>;
}

export type SeriesUpdate = {
  type: 'series';
  token: string;
  interval: ChartInterval;
  count: number;
  fetched: number;
  lastTime?: number;      // ms
  updated_at: number;
};

export async function publishSeriesUpdate(publisher: Publisher, summary: SyncSummary, now = Date.now()): Promise<SeriesUpdate> {
  const update: SeriesUpdate = {
    type: 'series',
    token: summary.token,
    interval: summary.interval,
    count: summary.stored,
    fetched: summary.fetched,
    lastTime: summary.lastTime !== undefined ? summary.lastTime * 1000 : undefined,
    updated_at: now,
  };
  await publisher.publish(SERIES_CHANNEL, JSON.stringify(update));
  return update;
}
