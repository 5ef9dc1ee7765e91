import { sleep as defaultSleep } from "./concurrency";

export interface RateLimiterOptions {
  minDelayMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Spaces out calls sharing a key (`http:<host>`, `llm:<provider>`) by at
 * least `minDelayMs` between starts. Calls on one key run one after another
 * in submission order; different keys do not wait on each other.
 */
export class RateLimiter {
  private readonly minDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly lastStart = new Map<string, number>();
  private readonly tails = new Map<string, Promise<void>>();

  constructor(options: RateLimiterOptions) {
    this.minDelayMs = Math.max(0, options.minDelayMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async schedule<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release = (): void => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      await this.waitTurn(key);
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  private async waitTurn(key: string): Promise<void> {
    const last = this.lastStart.get(key);
    if (last !== undefined) {
      const waitMs = last + this.minDelayMs - this.now();
      if (waitMs > 0) {
        await this.sleep(waitMs);
      }
    }
    this.lastStart.set(key, this.now());
  }
}

export function hostKey(url: string): string {
  try {
    return `http:${new URL(url).host}`;
  } catch {
    return `http:${url}`;
  }
}
