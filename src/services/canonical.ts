import type { RawOhlcvItem, RawPricePoint } from '../types/price';
import type { CanonicalBar, CanonicalTrade, StoredBar, TokenTransfer, TradeMark } from '../types/kline';

const BUY_COLOR = '#26a69a';
const SELL_COLOR = '#ef5350';

/** raw / 10^decimals; zero or missing input is 0. */
export function normalize(raw: number | null | undefined, decimals: number): number {
  if (raw == null || raw === 0) return 0;
  return raw / 10 ** decimals;
}

export const normalizeAmount = normalize;

// decimals === 0 means the provider already returned human-scale prices
const divisorFor = (decimals: number) => (decimals > 0 ? 10 ** decimals : 1);

export function rawBarToCanonical(item: RawOhlcvItem, decimals = 0): CanonicalBar {
  const divisor = divisorFor(decimals);
  return {
    timestampSec: item.unixTime,
    open: item.o / divisor,
    high: item.h / divisor,
    low: item.l / divisor,
    close: item.c / divisor,
    // volume is already human-scale upstream
    volume: item.v,
  };
}

/** A single history point becomes a flat bar with no volume. */
export function pricePointToCanonical(point: RawPricePoint, decimals = 0): CanonicalBar {
  const price = point.value / divisorFor(decimals);
  return {
    timestampSec: point.unixTime,
    open: price,
    high: price,
    low: price,
    close: price,
    volume: 0,
  };
}

/**
 * Classifies a token transfer relative to `wallet`: tokens arriving are a buy,
 * tokens leaving are a sell. Transfers that touch neither side are ignored.
 */
export function rawTransferToTrade(
  transfer: TokenTransfer,
  wallet: string,
  solDelta: number,
  timestampSec: number,
  signature: string,
  tokenDecimals = 9
): CanonicalTrade | undefined {
  let side: CanonicalTrade['side'];
  if (transfer.toUserAccount === wallet) side = 'buy';
  else if (transfer.fromUserAccount === wallet) side = 'sell';
  else return undefined;

  const tokenAmount = Math.abs(normalizeAmount(transfer.tokenAmount, tokenDecimals));
  const solAmount = Math.abs(solDelta);

  return {
    timestampSec,
    signature,
    side,
    tokenMint: transfer.mint ?? '',
    tokenAmount,
    solAmount,
    price: tokenAmount > 0 ? solAmount / tokenAmount : 0,
  };
}

export const toStoredBar = (bar: CanonicalBar): StoredBar => ({
  timestamp: bar.timestampSec * 1000,
  open: bar.open,
  high: bar.high,
  low: bar.low,
  close: bar.close,
  volume: bar.volume,
});

export const fromStoredBar = (bar: StoredBar): CanonicalBar => ({
  timestampSec: Math.floor(bar.timestamp / 1000),
  open: bar.open,
  high: bar.high,
  low: bar.low,
  close: bar.close,
  volume: bar.volume,
});

export function tradeToMark(trade: CanonicalTrade, id: number): TradeMark {
  const isBuy = trade.side === 'buy';
  return {
    id,
    time: trade.timestampSec * 1000,
    color: isBuy ? BUY_COLOR : SELL_COLOR,
    text: `${trade.side.toUpperCase()} ${trade.solAmount.toFixed(4)} SOL`,
    label: isBuy ? 'L' : 'S',
  };
}
