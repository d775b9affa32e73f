export type RateLimitResult = {
  allowed: boolean;
  remaining: number;
  resetAt: Date;
};

export type RateLimiterOptions = {
  /** Max accepted events per key inside the window; 0 disables limiting. */
  maxEvents: number;
  windowMs?: number;
  now?: () => number;
};

const DEFAULT_WINDOW_MS = 60_000;

/**
 * In-process rolling-window limiter. Only accepted events are recorded, so a
 * rejected message does not extend the wait.
 */
export class RateLimiter {
  private readonly maxEvents: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly events = new Map<string, number[]>();
  private lastPruneAt: number;

  constructor(options: RateLimiterOptions) {
    this.maxEvents = options.maxEvents;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.lastPruneAt = this.now();
  }

  get enabled(): boolean {
    return this.maxEvents > 0;
  }

  consume(key: string): RateLimitResult {
    const now = this.now();
    if (!this.enabled) {
      return { allowed: true, remaining: Number.POSITIVE_INFINITY, resetAt: new Date(now) };
    }

    // At most one sweep per window keeps the map bounded by recently active keys.
    if (now - this.lastPruneAt >= this.windowMs) {
      this.prune();
      this.lastPruneAt = now;
    }

    const cutoff = now - this.windowMs;
    const recent = (this.events.get(key) ?? []).filter((ts) => ts > cutoff);

    if (recent.length >= this.maxEvents) {
      this.events.set(key, recent);
      return {
        allowed: false,
        remaining: 0,
        resetAt: new Date(recent[0] + this.windowMs),
      };
    }

    recent.push(now);
    this.events.set(key, recent);
    return {
      allowed: true,
      remaining: Math.max(this.maxEvents - recent.length, 0),
      resetAt: new Date(recent[0] + this.windowMs),
    };
  }

  /** Drops keys with no events inside the window. */
  prune(): void {
    const cutoff = this.now() - this.windowMs;
    for (const [key, stamps] of this.events) {
      if (!stamps.some((ts) => ts > cutoff)) {
        this.events.delete(key);
      }
    }
  }

  get trackedKeys(): number {
    return this.events.size;
  }
}
