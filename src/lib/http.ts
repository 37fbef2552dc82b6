import got, { type Got } from 'got';

export interface HttpOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  retryLimit?: number;
}

// Status codes are left to the caller (throwHttpErrors: false); only
// connection-level failures are retried here.
export function createHttp({ baseUrl, headers = {}, retryLimit = 1 }: HttpOptions): Got {
  return got.extend({
    prefixUrl: baseUrl,
    headers: { accept: 'application/json', ...headers },
    responseType: 'text',
    throwHttpErrors: false,
    timeout: 15000,
    retry: {
      limit: retryLimit,
      methods: ['GET'],
      statusCodes: [],
      errorCodes: ['ECONNRESET', 'EAI_AGAIN'],
      calculateDelay: ({ attemptCount, computedValue }) => {
        if (computedValue === 0) return 0;
        const base = Math.min(60_000, 200 * 2 ** attemptCount);
        const jitter = Math.floor(Math.random() * 1000);
        return base + jitter;
      }
    }
  });
}
