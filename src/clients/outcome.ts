import type { FailureReason, PriceResult, PriceSuccess } from '../types/price';

export type Failure = { ok: false; reason: FailureReason; error: string };
export type Outcome<T> = { ok: true; value: T } | Failure;

export const fail = (reason: FailureReason, error: string): Failure => ({ ok: false, reason, error });

const BODY_PREVIEW = 200;

export function classifyResponse(statusCode: number, body: string): Outcome<unknown> {
  if (statusCode === 200) {
    try {
      return { ok: true, value: JSON.parse(body) };
    } catch {
      return fail('malformed', 'malformed response');
    }
  }
  if (statusCode === 401 || statusCode === 403) return fail('credential', 'credential rejected');
  if (statusCode === 429) return fail('rate_limited', 'rate limited');
  return fail('http', `HTTP ${statusCode}: ${body.slice(0, BODY_PREVIEW)}`);
}

export function classifyError(err: unknown): Failure {
  if (err instanceof Error) {
    const code = 'code' in err ? err.code : undefined;
    if (err.name === 'TimeoutError' || code === 'ETIMEDOUT') return fail('timeout', 'timeout');
    return fail('transport', `transport error: ${typeof code === 'string' ? code : err.message}`);
  }
  return fail('transport', `transport error: ${String(err)}`);
}

export function toPriceResult(outcome: Outcome<PriceSuccess>): PriceResult {
  if (outcome.ok) return outcome.value;
  return { success: false, reason: outcome.reason, error: outcome.error };
}
