import type { PriceFailure, PriceResult, PriceSource, PriceSuccess } from '../types/price';

export type SourcedPrice =
  | { source: string; result: PriceSuccess }
  | { source: null; result: PriceFailure; errors: Record<string, string> };

const lookup = (client: PriceSource, address: string, timestamp?: number): Promise<PriceResult> =>
  timestamp === undefined ? client.fetchCurrentPrice(address) : client.fetchPriceAt(address, timestamp);

/**
 * Primary first; the backup is only asked when the primary fails. When both
 * fail the caller gets both messages and is expected to skip the point.
 */
export async function fetchPriceWithFallback(
  primary: PriceSource,
  backup: PriceSource,
  address: string,
  timestamp?: number
): Promise<SourcedPrice> {
  const first = await lookup(primary, address, timestamp);
  if (first.success) return { source: primary.name, result: first };

  const second = await lookup(backup, address, timestamp);
  if (second.success) return { source: backup.name, result: second };

  return {
    source: null,
    result: {
      success: false,
      reason: second.reason,
      error: `${primary.name}: ${first.error}; ${backup.name}: ${second.error}`,
    },
    errors: { [primary.name]: first.error, [backup.name]: second.error },
  };
}
