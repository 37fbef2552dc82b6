import path from 'path';
import type { ChartInterval } from '../types/price';

const BASE58_ADDRESS = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

export class InvalidAddressError extends Error {
  constructor(readonly address: string) {
    super(`Invalid address: ${address}`);
    this.name = 'InvalidAddressError';
  }
}

export function assertAddress(address: string): string {
  if (!BASE58_ADDRESS.test(address)) throw new InvalidAddressError(address);
  return address;
}

export const klinePath = (dataDir: string, mint: string, interval: ChartInterval = '1m') =>
  path.join(dataDir, 'klines', `${assertAddress(mint)}_${interval}.json`);

export const tradesPath = (dataDir: string, wallet: string) =>
  path.join(dataDir, 'trades', `${assertAddress(wallet)}.json`);
