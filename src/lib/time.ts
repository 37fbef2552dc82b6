const MS_THRESHOLD = 10_000_000_000;

/** Accepts seconds or milliseconds, returns whole unix seconds. */
export function toUnixSeconds(ts: number): number {
  const whole = Math.trunc(ts);
  return whole > MS_THRESHOLD ? Math.floor(whole / 1000) : whole;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
