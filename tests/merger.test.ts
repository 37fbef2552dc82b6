import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { loadSeries, mergeAndSave, mergeBars, seriesStats } from '../src/services/merger';
import type { CanonicalBar } from '../src/types/kline';

const bar = (timestampSec: number, close: number, volume = 1): CanonicalBar => ({
  timestampSec,
  open: close,
  high: close,
  low: close,
  close,
  volume,
});

describe('mergeBars', () => {
  it('replaces bars at the same timestamp and sorts ascending', () => {
    const merged = mergeBars([bar(200, 2), bar(100, 1)], [bar(100, 9, 5), bar(50, 0.5)]);
    expect(merged).toEqual([bar(50, 0.5), bar(100, 9, 5), bar(200, 2)]);
  });

  it('keeps the last incoming bar when a batch repeats a timestamp', () => {
    expect(mergeBars([], [bar(60, 1), bar(60, 2)])).toEqual([bar(60, 2)]);
  });
});

describe('mergeAndSave', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kline-merge-'));
    file = path.join(dir, 'klines', 'mint_1m.json');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('overwrites revised bars and leaves the others alone', async () => {
    await mergeAndSave(file, [bar(100, 1), bar(200, 2)]);

    const merged = await mergeAndSave(file, [bar(100, 1.5, 7)]);

    expect(merged).toEqual([bar(100, 1.5, 7), bar(200, 2)]);
    expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual([
      { timestamp: 100_000, open: 1.5, high: 1.5, low: 1.5, close: 1.5, volume: 7 },
      { timestamp: 200_000, open: 2, high: 2, low: 2, close: 2, volume: 1 },
    ]);
  });

  it('is idempotent', async () => {
    const batch = [bar(300, 3), bar(100, 1)];
    const first = await mergeAndSave(file, batch);
    const contents = await fs.readFile(file, 'utf8');

    const second = await mergeAndSave(file, batch);

    expect(second).toEqual(first);
    expect(await fs.readFile(file, 'utf8')).toBe(contents);
  });

  it('skips malformed rows in an existing document', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(
      file,
      JSON.stringify([{ timestamp: 60_000, open: 1, high: 1, low: 1, close: 1, volume: 1 }, { timestamp: 'x' }]),
      'utf8'
    );

    expect(await loadSeries(file)).toEqual([bar(60, 1)]);
    expect(console.warn).toHaveBeenCalledWith(`[merge] skipped 1 malformed bars in ${file}`);
  });

  it('returns the merged series even when the save fails', async () => {
    await mergeAndSave(file, [bar(100, 1)]);
    vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('read-only'));

    expect(await mergeAndSave(file, [bar(200, 2)])).toEqual([bar(100, 1), bar(200, 2)]);
    expect(await loadSeries(file)).toEqual([bar(100, 1)]);
  });
});

describe('seriesStats', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kline-stats-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reports a missing series', async () => {
    expect(await seriesStats(path.join(dir, 'none.json'))).toEqual({ exists: false, barCount: 0 });
  });

  it('reports an empty series', async () => {
    const file = path.join(dir, 'empty.json');
    await fs.writeFile(file, '[]', 'utf8');
    expect(await seriesStats(file)).toEqual({ exists: true, barCount: 0, empty: true, fileSize: 2 });
  });

  it('reports bounds in milliseconds', async () => {
    const file = path.join(dir, 'series.json');
    await mergeAndSave(file, [bar(1700000060, 1), bar(1700000000, 1)]);
    const size = (await fs.stat(file)).size;

    expect(await seriesStats(file)).toEqual({
      exists: true,
      barCount: 2,
      firstTime: 1700000000000,
      lastTime: 1700000060000,
      fileSize: size,
    });
  });
});
