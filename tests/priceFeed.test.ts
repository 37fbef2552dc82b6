import { describe, it, expect, vi } from 'vitest';
import { fetchPriceWithFallback } from '../src/services/priceFeed';
import type { PriceResult, PriceSource } from '../src/types/price';

const MINT = 'TestMint' + '1'.repeat(34);

function source(name: string, result: PriceResult) {
  return {
    name,
    fetchPriceAt: vi.fn(async (_address: string, _ts: number): Promise<PriceResult> => result),
    fetchCurrentPrice: vi.fn(async (_address: string): Promise<PriceResult> => result),
  } satisfies PriceSource;
}

describe('fetchPriceWithFallback', () => {
  it('answers from the primary without asking the backup', async () => {
    const primary = source('birdeye', { success: true, value: 1.5 });
    const backup = source('solscan', { success: true, value: 9 });

    const res = await fetchPriceWithFallback(primary, backup, MINT, 1700000000);

    expect(res).toEqual({ source: 'birdeye', result: { success: true, value: 1.5 } });
    expect(primary.fetchPriceAt).toHaveBeenCalledWith(MINT, 1700000000);
    expect(backup.fetchPriceAt).not.toHaveBeenCalled();
  });

  it('falls back with the same address and timestamp', async () => {
    const primary = source('birdeye', { success: false, reason: 'rate_limited', error: 'rate limited' });
    const backup = source('solscan', { success: true, value: 2, updatedAt: 1700000000 });

    const res = await fetchPriceWithFallback(primary, backup, MINT, 1700000000);

    expect(res.source).toBe('solscan');
    expect(backup.fetchPriceAt).toHaveBeenCalledWith(MINT, 1700000000);
  });

  it('reports both errors when both sources fail', async () => {
    const primary = source('birdeye', { success: false, reason: 'timeout', error: 'timeout' });
    const backup = source('solscan', { success: false, reason: 'empty', error: 'price not found in response' });

    expect(await fetchPriceWithFallback(primary, backup, MINT, 1700000000)).toEqual({
      source: null,
      result: {
        success: false,
        reason: 'empty',
        error: 'birdeye: timeout; solscan: price not found in response',
      },
      errors: { birdeye: 'timeout', solscan: 'price not found in response' },
    });
  });

  it('uses the live price when no timestamp is given', async () => {
    const primary = source('birdeye', { success: true, value: 3 });
    const backup = source('solscan', { success: true, value: 4 });

    await fetchPriceWithFallback(primary, backup, MINT);

    expect(primary.fetchCurrentPrice).toHaveBeenCalledWith(MINT);
    expect(primary.fetchPriceAt).not.toHaveBeenCalled();
  });
});
