import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { RateLimiter } from "../../src/utils/rate-limiter.js";

describe("RateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("grants at most N requests per window and queues the rest in order", async () => {
    const limiter = new RateLimiter({ requests: 2, windowMs: 1000 });
    const start = Date.now();
    const granted: Array<{ id: number; at: number }> = [];

    const all = Array.from({ length: 6 }, (_, id) =>
      limiter.acquire().then(() => {
        granted.push({ id, at: Date.now() - start });
      })
    );
    expect(limiter.pending).toBe(4);

    await vi.advanceTimersByTimeAsync(3000);
    await Promise.all(all);

    expect(granted).toEqual([
      { id: 0, at: 0 },
      { id: 1, at: 0 },
      { id: 2, at: 1000 },
      { id: 3, at: 1000 },
      { id: 4, at: 2000 },
      { id: 5, at: 2000 },
    ]);
    expect(limiter.pending).toBe(0);
  });

  it("never exceeds the ceiling in any sliding window", async () => {
    const limiter = new RateLimiter({ requests: 3, windowMs: 500 });
    const start = Date.now();
    const times: number[] = [];

    const all = Array.from({ length: 9 }, () =>
      limiter.acquire().then(() => {
        times.push(Date.now() - start);
      })
    );
    await vi.advanceTimersByTimeAsync(2000);
    await Promise.all(all);

    expect(times).toHaveLength(9);
    for (const t of times) {
      const inWindow = times.filter((u) => u >= t && u < t + 500);
      expect(inWindow.length).toBeLessThanOrEqual(3);
    }
  });

  it("grants immediately once the window has passed", async () => {
    const limiter = new RateLimiter({ requests: 1, windowMs: 100 });
    await limiter.acquire();
    vi.advanceTimersByTime(100);

    let granted = false;
    const next = limiter.acquire().then(() => {
      granted = true;
    });
    await Promise.resolve();
    expect(granted).toBe(true);
    await next;
  });

  it("rejects invalid limits", () => {
    expect(() => new RateLimiter({ requests: 0, windowMs: 1000 })).toThrow(RangeError);
    expect(() => new RateLimiter({ requests: 1, windowMs: 0 })).toThrow(RangeError);
  });
});
