import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MemoryCache, cacheKey } from "./cache";

describe("MemoryCache", () => {
  let cache: MemoryCache<number>;

  beforeEach(() => {
    vi.useFakeTimers();
    cache = new MemoryCache<number>({ ttlMs: 1000, maxSize: 10 });
  });

  afterEach(() => {
    cache.destroy();
    vi.useRealTimers();
  });

  it("should track hits and misses", () => {
    cache.set("a", 1);

    expect(cache.get("a")).toBe(1);
    expect(cache.get("b")).toBeUndefined();
    expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
    expect(cache.getHitRate()).toBe(0.5);
  });

  it("should expire entries after the TTL", () => {
    cache.set("a", 1);
    vi.advanceTimersByTime(1001);

    expect(cache.get("a")).toBeUndefined();
    expect(cache.getStats().size).toBe(0);
  });

  it("should compute only on a miss", () => {
    const compute = vi.fn(() => 42);

    expect(cache.getOrCompute("answer", compute)).toBe(42);
    expect(cache.getOrCompute("answer", compute)).toBe(42);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("should evict the oldest entries past the size limit", () => {
    for (let i = 0; i < 11; i++) {
      cache.set(`key-${i}`, i);
      vi.advanceTimersByTime(1);
    }

    expect(cache.getStats().size).toBe(10);
    expect(cache.get("key-0")).toBeUndefined();
    expect(cache.get("key-10")).toBe(10);
  });

  it("should stop cleaning up and drop entries once destroyed", () => {
    cache.set("a", 1);
    cache.get("a");
    cache.destroy();

    expect(cache.getStats()).toEqual({ hits: 0, misses: 0, size: 0, oldestEntry: null });
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should drop expired entries on the cleanup interval", () => {
    cache.set("a", 1);
    vi.advanceTimersByTime(61 * 1000);

    expect(cache.getStats().size).toBe(0);
  });
});

describe("cacheKey", () => {
  it("should encode parts so separators cannot collide", () => {
    expect(cacheKey("relevance", "rev 1", "a:b", "cultural")).toBe("relevance:rev%201:a%3Ab:cultural");
  });

  it("should stringify numbers and booleans", () => {
    expect(cacheKey("ns", 3, true)).toBe("ns:3:true");
  });
});
