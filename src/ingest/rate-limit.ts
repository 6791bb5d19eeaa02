export type RateLimitCounter = { windowStart: number; count: number };

/**
 * Keyed storage for per-identity counters. Implementations only need to be
 * consistent within one `admit` call; concurrent callers for the same
 * identity may race, which at worst admits a few extra requests.
 */
export interface RateLimitStore {
  get(identity: string): RateLimitCounter | undefined;
  set(identity: string, counter: RateLimitCounter): void;
}

export class MemoryRateLimitStore implements RateLimitStore {
  private readonly counters = new Map<string, RateLimitCounter>();

  get(identity: string): RateLimitCounter | undefined {
    const counter = this.counters.get(identity);
    return counter ? { ...counter } : undefined;
  }

  set(identity: string, counter: RateLimitCounter): void {
    this.counters.set(identity, { ...counter });
  }

  get size(): number {
    return this.counters.size;
  }
}

export const DEFAULT_RATE_LIMIT = 10;
export const DEFAULT_RATE_WINDOW_MS = 60_000;

export interface FixedWindowLimiterOptions {
  limit?: number;
  windowMs?: number;
  store?: RateLimitStore;
  now?: () => number;
}

/**
 * Fixed-window admission control: at most `limit` admissions per identity
 * per window. A window ends once strictly more than `windowMs` has passed
 * since its first admission.
 */
export class FixedWindowLimiter {
  readonly limit: number;
  readonly windowMs: number;
  private readonly store: RateLimitStore;
  private readonly now: () => number;

  constructor(options: FixedWindowLimiterOptions = {}) {
    this.limit = options.limit ?? DEFAULT_RATE_LIMIT;
    this.windowMs = options.windowMs ?? DEFAULT_RATE_WINDOW_MS;
    this.store = options.store ?? new MemoryRateLimitStore();
    this.now = options.now ?? Date.now;
  }

  admit(identity: string): boolean {
    const now = this.now();
    const counter = this.store.get(identity);

    if (!counter || now - counter.windowStart > this.windowMs) {
      this.store.set(identity, { windowStart: now, count: 1 });
      return true;
    }

    if (counter.count < this.limit) {
      this.store.set(identity, { ...counter, count: counter.count + 1 });
      return true;
    }

    return false;
  }

  peek(identity: string): RateLimitCounter | undefined {
    return this.store.get(identity);
  }
}
