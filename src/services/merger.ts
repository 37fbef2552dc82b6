import { z } from 'zod';
import type { CanonicalBar, SeriesStats } from '../types/kline';
import { fromStoredBar, toStoredBar } from './canonical';
import { atomicLoad, atomicSave, fileSize } from './store';

const storedBar = z.object({
  timestamp: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

const seriesDocument = z.array(z.unknown());

export async function loadSeries(filePath: string): Promise<CanonicalBar[]> {
  const rows = await atomicLoad<unknown[]>(filePath, [], seriesDocument);
  const bars: CanonicalBar[] = [];
  let skipped = 0;
  for (const row of rows) {
    const parsed = storedBar.safeParse(row);
    if (parsed.success) bars.push(fromStoredBar(parsed.data));
    else skipped += 1;
  }
  if (skipped) console.warn(`[merge] skipped ${skipped} malformed bars in ${filePath}`);
  return bars;
}

/** Keyed by timestampSec; incoming bars replace existing ones. Ascending. */
export function mergeBars(existing: readonly CanonicalBar[], incoming: readonly CanonicalBar[]): CanonicalBar[] {
  const byTime = new Map<number, CanonicalBar>();
  for (const bar of existing) byTime.set(bar.timestampSec, bar);
  for (const bar of incoming) byTime.set(bar.timestampSec, bar);
  return [...byTime.values()].sort((a, b) => a.timestampSec - b.timestampSec);
}

export async function mergeAndSave(filePath: string, newBars: readonly CanonicalBar[]): Promise<CanonicalBar[]> {
  const existing = await loadSeries(filePath);
  const merged = mergeBars(existing, newBars);
  const saved = await atomicSave(filePath, merged.map(toStoredBar));
  if (!saved) console.warn(`[merge] ${filePath} not updated; previous series kept`);
  return merged;
}

export async function seriesStats(filePath: string): Promise<SeriesStats> {
  const size = await fileSize(filePath);
  if (size === undefined) return { exists: false, barCount: 0 };

  const bars = await loadSeries(filePath);
  if (!bars.length) return { exists: true, barCount: 0, empty: true, fileSize: size };

  return {
    exists: true,
    barCount: bars.length,
    firstTime: bars[0].timestampSec * 1000,
    lastTime: bars[bars.length - 1].timestampSec * 1000,
    fileSize: size,
  };
}
