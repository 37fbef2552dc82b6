import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { loadTrades, recordTrades } from '../src/services/trades';
import type { TransferInput } from '../src/types/kline';

const WALLET = 'Wallet' + '2'.repeat(36);
const OTHER = 'Other' + '3'.repeat(37);
const STRANGER = 'Third' + '6'.repeat(37);
const MINT_A = 'MintA' + '4'.repeat(37);
const MINT_B = 'MintB' + '5'.repeat(37);

const buy = (signature: string, timestampSec: number, mint = MINT_A, solDelta = -1): TransferInput => ({
  transfer: { fromUserAccount: OTHER, toUserAccount: WALLET, mint, tokenAmount: 4_000_000_000 },
  solDelta,
  timestampSec,
  signature,
});

const sell = (signature: string, timestampSec: number, mint = MINT_A): TransferInput => ({
  transfer: { fromUserAccount: WALLET, toUserAccount: OTHER, mint, tokenAmount: 2_000_000_000 },
  solDelta: 1,
  timestampSec,
  signature,
});

describe('trade ledger', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kline-trades-'));
    file = path.join(dir, 'trades', `${WALLET}.json`);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('records buys and sells in time order and drops unrelated transfers', async () => {
    const unrelated: TransferInput = {
      transfer: { fromUserAccount: OTHER, toUserAccount: OTHER, mint: MINT_A, tokenAmount: 1 },
      solDelta: 0,
      timestampSec: 50,
      signature: 'x',
    };

    const { recorded, trades } = await recordTrades(file, WALLET, [sell('s2', 200), unrelated, buy('s1', 100)]);

    expect(recorded).toBe(2);
    expect(trades).toEqual([
      { timestampSec: 100, signature: 's1', side: 'buy', tokenMint: MINT_A, tokenAmount: 4, solAmount: 1, price: 0.25 },
      { timestampSec: 200, signature: 's2', side: 'sell', tokenMint: MINT_A, tokenAmount: 2, solAmount: 1, price: 0.5 },
    ]);
    expect(await loadTrades(file)).toEqual(trades);
  });

  it('replaces a re-recorded transfer instead of duplicating it', async () => {
    await recordTrades(file, WALLET, [buy('s1', 100)]);

    const { trades } = await recordTrades(file, WALLET, [buy('s1', 100, MINT_A, -2)]);

    expect(trades).toHaveLength(1);
    expect(trades[0].solAmount).toBe(2);
  });

  it('does not create a ledger when nothing was recorded', async () => {
    const { recorded, trades } = await recordTrades(file, STRANGER, [buy('s1', 100)]);

    expect(recorded).toBe(0);
    expect(trades).toEqual([]);
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('filters by token and keeps the most recent entries', async () => {
    await recordTrades(file, WALLET, [buy('s1', 100), buy('s2', 200, MINT_B), sell('s3', 300), buy('s4', 400)]);

    const onlyA = await loadTrades(file, { token: MINT_A });
    expect(onlyA.map((t) => t.signature)).toEqual(['s1', 's3', 's4']);

    const lastTwo = await loadTrades(file, { token: MINT_A, limit: 2 });
    expect(lastTwo.map((t) => t.signature)).toEqual(['s3', 's4']);
  });
});
