export type RateLimitPolicy = {
  now: number;
  windowMs: number;
  limit: number;
};

export type RateLimitDecision = {
  allowed: boolean;
  limit: number;
  remaining: number;
  retryAfterMs: number;
};

/**
 * Counting backend for the limiter. The in-memory store only suits a single
 * instance; a shared store (e.g. a Redis sorted set per key) implements the
 * same contract for multi-instance deployments.
 */
export interface RateLimitStore {
  consume(key: string, policy: RateLimitPolicy): Promise<RateLimitDecision>;
}

const SWEEP_EVERY = 500;

export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly hits = new Map<string, number[]>();
  private calls = 0;

  async consume(key: string, { now, windowMs, limit }: RateLimitPolicy): Promise<RateLimitDecision> {
    this.calls += 1;
    if (this.calls % SWEEP_EVERY === 0) {
      this.sweep(now, windowMs);
    }

    const recent = (this.hits.get(key) ?? []).filter((at) => now - at < windowMs);

    if (recent.length >= limit) {
      this.hits.set(key, recent);
      return {
        allowed: false,
        limit,
        remaining: 0,
        retryAfterMs: Math.max(0, recent[0] + windowMs - now),
      };
    }

    recent.push(now);
    this.hits.set(key, recent);

    return {
      allowed: true,
      limit,
      remaining: limit - recent.length,
      retryAfterMs: 0,
    };
  }

  get size() {
    return this.hits.size;
  }

  sweep(now: number, windowMs: number) {
    for (const [key, timestamps] of this.hits) {
      if (timestamps.every((at) => now - at >= windowMs)) {
        this.hits.delete(key);
      }
    }
  }
}

type RateLimiterOptions = {
  store: RateLimitStore;
  limit: number;
  windowMs: number;
  now?: () => number;
};

export class RateLimiter {
  private readonly store: RateLimitStore;
  private readonly now: () => number;
  readonly limit: number;
  readonly windowMs: number;

  constructor({ store, limit, windowMs, now = Date.now }: RateLimiterOptions) {
    this.store = store;
    this.limit = limit;
    this.windowMs = windowMs;
    this.now = now;
  }

  consume(key: string) {
    return this.store.consume(key, {
      now: this.now(),
      windowMs: this.windowMs,
      limit: this.limit,
    });
  }
}

/**
 * Keys on the hop appended by the nearest trusted proxy. Leading
 * `x-forwarded-for` entries are written by the client and are ignored.
 */
export const resolveClientKey = (headers: Headers, trustedProxyHops = 1) => {
  const hops = (headers.get("x-forwarded-for") ?? "")
    .split(",")
    .map((hop) => hop.trim())
    .filter((hop) => hop.length > 0);

  if (hops.length > 0) {
    return hops[Math.max(0, hops.length - trustedProxyHops)];
  }

  const realIp = headers.get("x-real-ip")?.trim();
  return realIp || "unknown";
};
