import { describe, expect, it } from "vitest";
import { LruCache } from "./lru-cache";

describe("LruCache", () => {
  it("evicts the least recently used entry", () => {
    const cache = new LruCache<string, number>(2);

    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.keys()).toEqual(["a", "c"]);
    expect(cache.get("b")).toBeUndefined();
  });

  it("refreshes an entry that is set again", () => {
    const cache = new LruCache<string, number>(2);

    cache.set("a", 1);
    cache.set("b", 2);
    cache.set("a", 10);
    cache.set("c", 3);

    expect(cache.get("a")).toBe(10);
    expect(cache.has("b")).toBe(false);
    expect(cache.size).toBe(2);
  });

  it("stores nothing at capacity 0", () => {
    const cache = new LruCache<string, number>(0);

    cache.set("a", 1);

    expect(cache.size).toBe(0);
  });

  it("deletes and clears", () => {
    const cache = new LruCache<number, string>(4);

    cache.set(1, "one");
    cache.set(2, "two");

    expect(cache.delete(1)).toBe(true);
    expect(cache.delete(1)).toBe(false);

    cache.clear();

    expect(cache.keys()).toEqual([]);
  });
});
