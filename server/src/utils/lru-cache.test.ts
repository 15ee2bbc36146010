import { describe, it, expect } from "vitest";
import { LruCache } from "./lru-cache";

describe("LruCache", () => {
  it("should evict the least recently used entry", () => {
    const cache = new LruCache<string, number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe(1);
    expect(cache.get("c")).toBe(3);
    expect(cache.size).toBe(2);
  });

  it("should replace an existing key without growing", () => {
    const cache = new LruCache<string, number>(2);
    cache.set("a", 1);
    cache.set("a", 2);

    expect(cache.size).toBe(1);
    expect(cache.get("a")).toBe(2);
  });

  it("should forget deleted keys", () => {
    const cache = new LruCache<string, number>(4);
    cache.set("a", 1);

    expect(cache.delete("a")).toBe(true);
    expect(cache.get("a")).toBeUndefined();
  });

  it("should reject a zero capacity", () => {
    expect(() => new LruCache<string, number>(0)).toThrow(RangeError);
  });
});
