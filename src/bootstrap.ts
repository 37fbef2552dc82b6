import { WebSocketServer } from 'ws';
import type { Queue, Worker } from 'bullmq';
import type IORedis from 'ioredis';
import type { FastifyInstance } from 'fastify';
import { buildApp, type SyncDispatch } from './app';
import { BirdeyeClient } from './clients/birdeye';
import { SolscanClient } from './clients/solscan';
import { missingCredentials, type AppConfig } from './config';
import { createRedisConnection, createSyncQueue, processSyncJob, scheduleSync, startSyncWorker } from './queues/syncQueue';
import { attachWebSockets, relayFromRedis, SeriesBroadcaster } from './services/ws-broadcaster';
import type { SyncRequest, SyncSummary } from './services/sync';

export interface RunningService {
  app: FastifyInstance;
  wss: WebSocketServer;
  broadcaster: SeriesBroadcaster;
  birdeye: BirdeyeClient;
  solscan: SolscanClient;
  close(): Promise<void>;
}

/**
 * Builds clients, sync dispatch (BullMQ worker or inline), the HTTP app and
 * the `/ws` endpoint, then listens. `close()` tears everything down in order.
 */
export async function startService(config: AppConfig): Promise<RunningService> {
  const missing = missingCredentials(config);
  if (missing.length) {
    console.warn(`Missing API keys: ${missing.join(', ')}. Requests to those sources will be rejected.`);
  }

  const birdeye = new BirdeyeClient(config.birdeyeApiKey, {
    requestsPerMinute: config.birdeyeRequestsPerMinute,
    minIntervalMs: config.birdeyeMinIntervalMs,
    retryLimit: config.httpRetryLimit,
  });
  const solscan = new SolscanClient(config.solscanApiKey, {
    requestsPerMinute: config.solscanRequestsPerMinute,
    retryLimit: config.httpRetryLimit,
  });

  const broadcaster = new SeriesBroadcaster();
  const resources: {
    connection?: IORedis;
    subscriber?: IORedis;
    queue?: Queue<SyncRequest>;
    worker?: Worker<SyncRequest, SyncSummary>;
  } = {};

  let dispatchSync: (req: SyncRequest) => Promise<SyncDispatch>;
  if (config.runWorker) {
    const connection = createRedisConnection(config.redisUrl);
    const queue = createSyncQueue(connection);
    resources.connection = connection;
    resources.queue = queue;
    resources.worker = startSyncWorker(
      connection,
      { bars: birdeye, dataDir: config.dataDir, publisher: connection },
      config.syncConcurrency
    );
    resources.subscriber = connection.duplicate();
    await relayFromRedis(resources.subscriber, broadcaster);
    dispatchSync = async (req) => ({ queued: true, jobId: await scheduleSync(queue, req) });
    console.log('Sync worker started in API process');
  } else {
    const publisher = broadcaster.asPublisher();
    dispatchSync = async (req) => ({
      queued: false,
      summary: await processSyncJob(req, { bars: birdeye, dataDir: config.dataDir, publisher }),
    });
  }

  const app = await buildApp({
    dataDir: config.dataDir,
    defaultDecimals: config.defaultDecimals,
    primary: birdeye,
    backup: solscan,
    dispatchSync,
  });

  const wss = new WebSocketServer({ server: app.server, path: '/ws' });
  attachWebSockets(wss, broadcaster);

  await app.listen({ port: config.port, host: config.host });

  async function close() {
    const steps: Array<[string, () => Promise<unknown>]> = [
      ['websocket', () => new Promise<void>((resolve) => {
        for (const client of wss.clients) client.terminate();
        wss.close(() => resolve());
      })],
      ['http', () => app.close()],
      ['worker', async () => resources.worker?.close()],
      ['queue', async () => resources.queue?.close()],
      ['subscriber', async () => resources.subscriber?.quit()],
      ['redis', async () => resources.connection?.quit()],
    ];
    for (const [name, step] of steps) {
      try {
        await step();
      } catch (e) {
        console.error(`shutdown: ${name} close failed`, e);
      }
    }
  }

  return { app, wss, broadcaster, birdeye, solscan, close };
}
