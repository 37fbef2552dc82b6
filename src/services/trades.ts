import { z } from 'zod';
import type { CanonicalTrade, TransferInput } from '../types/kline';
import { rawTransferToTrade } from './canonical';
import { atomicLoad, atomicSave } from './store';

const tradeRecord = z.object({
  timestampSec: z.number(),
  signature: z.string(),
  side: z.enum(['buy', 'sell']),
  tokenMint: z.string(),
  tokenAmount: z.number(),
  solAmount: z.number(),
  price: z.number(),
});

const tradeLedger = z.array(tradeRecord);

export interface TradeFilter {
  token?: string;
  limit?: number;
}

const tradeKey = (t: CanonicalTrade) => `${t.signature}:${t.tokenMint}:${t.side}`;

export async function loadTrades(filePath: string, filter: TradeFilter = {}): Promise<CanonicalTrade[]> {
  const all = await atomicLoad<CanonicalTrade[]>(filePath, [], tradeLedger);
  const matching = filter.token ? all.filter((t) => t.tokenMint === filter.token) : all;
  return filter.limit !== undefined ? matching.slice(-filter.limit) : matching;
}

/**
 * Converts transfers for `wallet` into trades and merges them into the
 * wallet's ledger. Re-recording a transfer replaces the earlier entry.
 */
export async function recordTrades(
  filePath: string,
  wallet: string,
  inputs: readonly TransferInput[]
): Promise<{ recorded: number; trades: CanonicalTrade[] }> {
  const fresh: CanonicalTrade[] = [];
  for (const input of inputs) {
    const trade = rawTransferToTrade(
      input.transfer,
      wallet,
      input.solDelta,
      input.timestampSec,
      input.signature,
      input.tokenDecimals
    );
    if (trade) fresh.push(trade);
  }

  const byKey = new Map<string, CanonicalTrade>();
  for (const t of await loadTrades(filePath)) byKey.set(tradeKey(t), t);
  for (const t of fresh) byKey.set(tradeKey(t), t);

  const trades = [...byKey.values()].sort((a, b) => a.timestampSec - b.timestampSec);
  if (fresh.length) {
    const saved = await atomicSave(filePath, trades);
    if (!saved) console.warn(`[trades] ${filePath} not updated`);
  }
  return { recorded: fresh.length, trades };
}
