import { InMemoryRateLimitStore, RateLimiter, resolveClientKey } from "@/lib/rate-limit";

describe("RateLimiter with the in-memory store", () => {
  it("allows requests up to the limit and rejects the next one", async () => {
    let now = 1_000;
    const limiter = new RateLimiter({
      store: new InMemoryRateLimitStore(),
      limit: 2,
      windowMs: 60_000,
      now: () => now,
    });

    expect(await limiter.consume("10.0.0.1")).toEqual({
      allowed: true,
      limit: 2,
      remaining: 1,
      retryAfterMs: 0,
    });
    now = 11_000;
    expect((await limiter.consume("10.0.0.1")).remaining).toBe(0);

    now = 21_000;
    expect(await limiter.consume("10.0.0.1")).toEqual({
      allowed: false,
      limit: 2,
      remaining: 0,
      retryAfterMs: 40_000,
    });
  });

  it("tracks clients independently", async () => {
    const limiter = new RateLimiter({
      store: new InMemoryRateLimitStore(),
      limit: 1,
      windowMs: 60_000,
      now: () => 5_000,
    });

    expect((await limiter.consume("a")).allowed).toBe(true);
    expect((await limiter.consume("b")).allowed).toBe(true);
    expect((await limiter.consume("a")).allowed).toBe(false);
  });

  it("frees capacity once the window slides past earlier requests", async () => {
    let now = 0;
    const limiter = new RateLimiter({
      store: new InMemoryRateLimitStore(),
      limit: 1,
      windowMs: 1_000,
      now: () => now,
    });

    await limiter.consume("client");
    now = 500;
    expect((await limiter.consume("client")).allowed).toBe(false);
    now = 1_000;
    expect((await limiter.consume("client")).allowed).toBe(true);
  });
});

describe("InMemoryRateLimitStore.sweep", () => {
  it("drops keys whose requests have all expired", async () => {
    const store = new InMemoryRateLimitStore();
    await store.consume("old", { now: 0, windowMs: 1_000, limit: 5 });
    await store.consume("fresh", { now: 900, windowMs: 1_000, limit: 5 });

    store.sweep(1_500, 1_000);

    expect(store.size).toBe(1);
  });
});

describe("resolveClientKey", () => {
  it("uses the hop appended by the trusted proxy", () => {
    const headers = new Headers({
      "x-forwarded-for": "203.0.113.7, 198.51.100.1",
      "x-real-ip": "10.0.0.9",
    });
    expect(resolveClientKey(headers)).toBe("198.51.100.1");
  });

  it("ignores spoofed leading hops", () => {
    const spoofed = new Headers({ "x-forwarded-for": "1.2.3.4, 5.6.7.8, 198.51.100.1" });
    const honest = new Headers({ "x-forwarded-for": "198.51.100.1" });

    expect(resolveClientKey(spoofed)).toBe(resolveClientKey(honest));
  });

  it("walks back one hop per trusted proxy", () => {
    const headers = new Headers({ "x-forwarded-for": "1.2.3.4, 198.51.100.1, 10.0.0.2" });

    expect(resolveClientKey(headers, 2)).toBe("198.51.100.1");
    expect(resolveClientKey(headers, 5)).toBe("1.2.3.4");
  });

  it("falls back to x-real-ip and then unknown", () => {
    expect(resolveClientKey(new Headers({ "x-real-ip": "10.0.0.9" }))).toBe("10.0.0.9");
    expect(resolveClientKey(new Headers())).toBe("unknown");
  });
});
