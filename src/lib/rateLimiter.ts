import { sleep as defaultSleep } from './time';

export interface PacerOptions {
  maxPerWindow: number;
  minIntervalMs: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  label?: string;
}

// Per-source request pacing: rolling-window cap plus a minimum gap between
// consecutive requests. Callers are delayed, never rejected.
export class RequestPacer {
  private readonly maxPerWindow: number;
  private readonly minIntervalMs: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly label: string;

  private window: number[] = [];
  private lastRequestAt = Number.NEGATIVE_INFINITY;
  // acquire() calls run one at a time in arrival order
  private tail: Promise<void> = Promise.resolve();

  constructor(opts: PacerOptions) {
    this.maxPerWindow = Math.max(1, Math.floor(opts.maxPerWindow));
    this.minIntervalMs = Math.max(0, opts.minIntervalMs);
    this.windowMs = opts.windowMs ?? 60_000;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? defaultSleep;
    this.label = opts.label ?? 'pacer';
  }

  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.admit());
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /** Request instants still inside the window, oldest first. */
  recent(): readonly number[] {
    return [...this.window];
  }

  private async admit(): Promise<void> {
    this.evict(this.now());

    while (this.window.length >= this.maxPerWindow) {
      const wait = this.windowMs - (this.now() - this.window[0]);
      if (wait > 0) {
        console.warn(`[${this.label}] window cap reached, waiting ${(wait / 1000).toFixed(1)}s`);
        await this.sleep(wait);
      }
      this.evict(this.now());
    }

    const sinceLast = this.now() - this.lastRequestAt;
    if (sinceLast < this.minIntervalMs) {
      await this.sleep(this.minIntervalMs - sinceLast);
    }

    const at = this.now();
    this.window.push(at);
    this.lastRequestAt = at;
  }

  private evict(now: number) {
    this.window = this.window.filter((t) => now - t < this.windowMs);
  }
}
