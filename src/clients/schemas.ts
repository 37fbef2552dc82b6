import { z } from 'zod';
import type { RawOhlcvItem, RawPricePoint } from '../types/price';

// Providers send numbers, occasionally as strings
export const numeric = z
  .union([z.number(), z.string().trim().min(1)])
  .transform(Number)
  .refine(Number.isFinite, 'not a finite number');

export const birdeyePriceEnvelope = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  data: z
    .object({
      value: numeric.nullish(),
      updateUnixTime: numeric.nullish(),
      priceChange24h: numeric.nullish(),
    })
    .nullish(),
});

export const birdeyeItemsEnvelope = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  data: z.object({ items: z.array(z.unknown()).optional() }).nullish(),
});

const historyPoint = z.object({
  unixTime: z.number(),
  value: numeric,
});

const ohlcvItem = z.object({
  o: numeric.default(0),
  h: numeric.default(0),
  l: numeric.default(0),
  c: numeric.default(0),
  v: numeric.default(0),
  unixTime: z.number(),
});

function keepValid<T>(items: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const out: T[] = [];
  for (const item of items) {
    const parsed = schema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

export const parseHistoryItems = (items: unknown[]): RawPricePoint[] => keepValid(items, historyPoint);

export const parseOhlcvItems = (items: unknown[]): RawOhlcvItem[] => keepValid(items, ohlcvItem);
