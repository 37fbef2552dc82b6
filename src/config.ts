import { z } from 'zod';

const flag = z
  .string()
  .optional()
  .transform((v) => String(v ?? 'true').toLowerCase() !== 'false');

const envSchema = z.object({
  BIRDEYE_API_KEY: z.string().trim().default(''),
  SOLSCAN_API_KEY: z.string().trim().default(''),
  BIRDEYE_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(800),
  BIRDEYE_MIN_INTERVAL_MS: z.coerce.number().nonnegative().default(80),
  SOLSCAN_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(1000),
  HTTP_RETRY_LIMIT: z.coerce.number().int().min(0).max(5).default(1),
  DATA_DIR: z.string().default('./data'),
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  REDIS_URL: z.string().default('redis://127.0.0.1:6379'),
  RUN_WORKER: flag,
  SYNC_CONCURRENCY: z.coerce.number().int().positive().default(2),
  DEFAULT_DECIMALS: z.coerce.number().int().min(0).max(18).default(0),
});

export type AppConfig = {
  birdeyeApiKey: string;
  solscanApiKey: string;
  birdeyeRequestsPerMinute: number;
  birdeyeMinIntervalMs: number;
  solscanRequestsPerMinute: number;
  httpRetryLimit: number;
  dataDir: string;
  host: string;
  port: number;
  redisUrl: string;
  runWorker: boolean;
  syncConcurrency: number;
  defaultDecimals: number;
};

// Empty strings count as unset
function stripEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== '') out[k] = v;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = envSchema.parse(stripEmpty(env));
  return {
    birdeyeApiKey: e.BIRDEYE_API_KEY,
    solscanApiKey: e.SOLSCAN_API_KEY,
    birdeyeRequestsPerMinute: e.BIRDEYE_REQUESTS_PER_MINUTE,
    birdeyeMinIntervalMs: e.BIRDEYE_MIN_INTERVAL_MS,
    solscanRequestsPerMinute: e.SOLSCAN_REQUESTS_PER_MINUTE,
    httpRetryLimit: e.HTTP_RETRY_LIMIT,
    dataDir: e.DATA_DIR,
    host: e.HOST,
    port: e.PORT,
    redisUrl: e.REDIS_URL,
    runWorker: e.RUN_WORKER,
    syncConcurrency: e.SYNC_CONCURRENCY,
    defaultDecimals: e.DEFAULT_DECIMALS,
  };
}

export function missingCredentials(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.birdeyeApiKey) missing.push('BIRDEYE_API_KEY');
  if (!config.solscanApiKey) missing.push('SOLSCAN_API_KEY');
  return missing;
}
