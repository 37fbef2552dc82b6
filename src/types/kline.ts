export type CanonicalBar = {
  timestampSec: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

// Persisted shape read by the chart: timestamp in milliseconds
export type StoredBar = {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type TradeSide = 'buy' | 'sell';

export type CanonicalTrade = {
  timestampSec: number;
  signature: string;
  side: TradeSide;
  tokenMint: string;
  tokenAmount: number;
  solAmount: number;
  price: number;          // SOL per token
};

export type TokenTransfer = {
  fromUserAccount?: string;
  toUserAccount?: string;
  mint?: string;
  tokenAmount?: number;
};

export type TransferInput = {
  transfer: TokenTransfer;
  solDelta: number;
  timestampSec: number;
  signature: string;
  tokenDecimals?: number;
};

export type TradeMark = {
  id: number;
  time: number;           // ms
  color: string;
  text: string;
  label: 'L' | 'S';
};

export type SeriesStats =
  | { exists: false; barCount: 0 }
  | { exists: true; barCount: 0; empty: true; fileSize: number }
  | { exists: true; barCount: number; firstTime: number; lastTime: number; fileSize: number };
