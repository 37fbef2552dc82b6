import { Queue, Worker, type Job, type JobsOptions } from 'bullmq';
import IORedis from 'ioredis';
import { publishSeriesUpdate, type Publisher } from '../services/publisher';
import { syncToken, type SyncDeps, type SyncRequest, type SyncSummary } from '../services/sync';

export const SYNC_QUEUE = 'syncQueue';

// BullMQ requires these on connections shared with workers
export function createRedisConnection(url: string): IORedis {
  return new IORedis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  });
}

export function createSyncQueue(connection: IORedis): Queue<SyncRequest> {
  return new Queue<SyncRequest>(SYNC_QUEUE, { connection });
}

// One pending job per series keeps a single writer per file
export const syncJobId = (req: Pick<SyncRequest, 'token' | 'interval'>) => `sync-${req.token}-${req.interval}`;

export interface JobSink {
  add(name: string, data: SyncRequest, opts?: JobsOptions): Promise<{ id?: string }>;
}

export async function scheduleSync(queue: JobSink, req: SyncRequest): Promise<string> {
  const jobId = syncJobId(req);
  const job = await queue.add('sync', req, {
    jobId,
    attempts: 5,
    backoff: { type: 'exponential', delay: 1000 },
    removeOnComplete: true,
    removeOnFail: 100,
  });
  return job.id ?? jobId;
}

export interface SyncJobDeps extends SyncDeps {
  publisher?: Publisher;
}

export async function processSyncJob(data: SyncRequest, deps: SyncJobDeps): Promise<SyncSummary> {
  const summary = await syncToken(data, deps);
  if (deps.publisher) await publishSeriesUpdate(deps.publisher, summary);
  return summary;
}

export function startSyncWorker(connection: IORedis, deps: SyncJobDeps, concurrency = 2) {
  const worker = new Worker<SyncRequest, SyncSummary>(
    SYNC_QUEUE,
    async (job: Job<SyncRequest, SyncSummary>) => processSyncJob(job.data, deps),
    { connection, concurrency }
  );

  worker.on('completed', (job) => {
    console.log(`✔ Sync completed: ${job.id}`);
  });

  worker.on('failed', (job, err) => {
    console.error(`❌ Sync failed: ${job?.id}`, err);
  });

  return worker;
}
