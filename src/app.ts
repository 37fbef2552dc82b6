import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { z, ZodError } from 'zod';
import { toUnixSeconds } from './lib/time';
import { CHART_INTERVALS, type ClientStatsSnapshot, type PriceSource } from './types/price';
import { toStoredBar, tradeToMark } from './services/canonical';
import { loadSeries, seriesStats } from './services/merger';
import { assertAddress, InvalidAddressError, klinePath, tradesPath } from './services/paths';
import { fetchPriceWithFallback } from './services/priceFeed';
import { loadTrades, recordTrades } from './services/trades';
import type { SyncRequest, SyncSummary } from './services/sync';

export const SERVICE_NAME = 'kline-sync';
export const SERVICE_VERSION = '0.1.0';

export type MonitoredSource = PriceSource & { getStatistics(): ClientStatsSnapshot };

export type SyncDispatch = { queued: true; jobId: string } | { queued: false; summary: SyncSummary };

export interface AppDeps {
  dataDir: string;
  defaultDecimals: number;
  primary: MonitoredSource;
  backup: MonitoredSource;
  dispatchSync: (req: SyncRequest) => Promise<SyncDispatch>;
}

const interval = z.enum(CHART_INTERVALS).default('1m');
const optionalTime = z.coerce.number().nonnegative().optional();

const tokenParams = z.object({ token: z.string() });
const walletParams = z.object({ wallet: z.string() });

const klineQuery = z.object({
  interval,
  limit: z.coerce.number().int().positive().max(10_000).default(1000),
  from: optionalTime,
  to: optionalTime,
});

const syncBody = z.object({
  token: z.string(),
  interval,
  hours: z.coerce.number().positive().max(24 * 365).default(24),
  decimals: z.coerce.number().int().min(0).max(18).optional(),
  source: z.enum(['ohlcv', 'history']).default('ohlcv'),
});

const priceQuery = z.object({ at: optionalTime });

const tradesQuery = z.object({
  token: z.string().optional(),
  limit: z.coerce.number().int().positive().max(10_000).default(100),
});

const transferInput = z.object({
  transfer: z.object({
    fromUserAccount: z.string().optional(),
    toUserAccount: z.string().optional(),
    mint: z.string().optional(),
    tokenAmount: z.number().optional(),
  }),
  solDelta: z.number(),
  timestampSec: z.number().int(),
  signature: z.string().min(1),
  tokenDecimals: z.number().int().min(0).max(18).optional(),
});

const tradesBody = z.object({ transfers: z.array(transferInput) });

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(cors, { origin: true });

  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof ZodError) {
      return reply.status(400).send({ success: false, error: err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') });
    }
    if (err instanceof InvalidAddressError) {
      return reply.status(400).send({ success: false, error: err.message });
    }
    const status = err.statusCode ?? 500;
    if (status >= 500) console.error('request failed', err);
    return reply.status(status).send({ success: false, error: err.message });
  });

  app.get('/api/health', async () => ({ status: 'ok', service: SERVICE_NAME, version: SERVICE_VERSION }));

  app.get('/api/kline/:token', async (request) => {
    const { token } = tokenParams.parse(request.params);
    const q = klineQuery.parse(request.query);
    const bars = await loadSeries(klinePath(deps.dataDir, token, q.interval));

    const from = q.from !== undefined ? toUnixSeconds(q.from) : undefined;
    const to = q.to !== undefined ? toUnixSeconds(q.to) : undefined;
    const inRange = bars.filter(
      (b) => (from === undefined || b.timestampSec >= from) && (to === undefined || b.timestampSec <= to)
    );
    const data = inRange.slice(-q.limit).map(toStoredBar);
    return { success: true, token, interval: q.interval, count: data.length, data };
  });

  app.get('/api/kline/:token/stats', async (request) => {
    const { token } = tokenParams.parse(request.params);
    const q = z.object({ interval }).parse(request.query);
    return { success: true, token, interval: q.interval, ...(await seriesStats(klinePath(deps.dataDir, token, q.interval))) };
  });

  app.post('/api/sync', async (request, reply) => {
    const body = syncBody.parse(request.body ?? {});
    const req: SyncRequest = {
      token: assertAddress(body.token),
      interval: body.interval,
      hours: body.hours,
      decimals: body.decimals ?? deps.defaultDecimals,
      source: body.source,
    };
    const dispatched = await deps.dispatchSync(req);
    if (dispatched.queued) {
      return reply.status(202).send({ success: true, queued: true, jobId: dispatched.jobId });
    }
    return { success: true, queued: false, summary: dispatched.summary };
  });

  app.get('/api/price/:token', async (request) => {
    const { token } = tokenParams.parse(request.params);
    const { at } = priceQuery.parse(request.query);
    const priced = await fetchPriceWithFallback(deps.primary, deps.backup, assertAddress(token), at);
    if (priced.source === null) {
      return { success: false, token, error: priced.result.error, errors: priced.errors };
    }
    const { value, updatedAt, change24h } = priced.result;
    return { success: true, token, source: priced.source, value, updatedAt, change24h };
  });

  app.get('/api/trades/:wallet', async (request) => {
    const { wallet } = walletParams.parse(request.params);
    const q = tradesQuery.parse(request.query);
    const trades = await loadTrades(tradesPath(deps.dataDir, wallet), { token: q.token, limit: q.limit });
    return { success: true, wallet, token: q.token, count: trades.length, data: trades, marks: trades.map(tradeToMark) };
  });

  app.post('/api/trades/:wallet', async (request) => {
    const { wallet } = walletParams.parse(request.params);
    const { transfers } = tradesBody.parse(request.body ?? {});
    const { recorded, trades } = await recordTrades(tradesPath(deps.dataDir, wallet), wallet, transfers);
    return { success: true, wallet, recorded, total: trades.length };
  });

  app.get('/api/stats', async () => ({
    [deps.primary.name]: deps.primary.getStatistics(),
    [deps.backup.name]: deps.backup.getStatistics(),
  }));

  return app;
}
