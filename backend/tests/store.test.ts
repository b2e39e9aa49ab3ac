import { describe, it, expect, vi, afterEach } from "vitest";
import { MemoryKeyValueStore } from "../src/services/cache/store";
import { CacheCounters } from "../src/services/cache/counters";

describe("MemoryKeyValueStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("expires records after their TTL", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
    const store = new MemoryKeyValueStore();

    await store.setWithTtl("k", "v", 2);
    vi.advanceTimersByTime(2000);
    expect(await store.get("k")).toBe("v");
    vi.advanceTimersByTime(1);
    expect(await store.get("k")).toBeNull();
  });

  it("returns bytes and strings for the same record", async () => {
    const store = new MemoryKeyValueStore();
    await store.setWithTtl("bytes", Buffer.from([1, 2, 3]), 60);
    await store.setWithTtl("text", "héllo", 60);

    expect(await store.getBuffer("bytes")).toEqual(Buffer.from([1, 2, 3]));
    expect(await store.getBuffer("text")).toEqual(Buffer.from("héllo", "utf8"));
    expect(await store.get("missing")).toBeNull();
  });

  it("orders sorted-set members by score, then member", async () => {
    const store = new MemoryKeyValueStore();
    await store.zadd("z", 3, "c");
    await store.zadd("z", 1, "b");
    await store.zadd("z", 1, "a");

    expect(await store.zrange("z")).toEqual(["a", "b", "c"]);
    expect(await store.zcard("z")).toBe(3);
    expect(await store.zpopmin("z")).toBe("a");
    expect(await store.zrange("z")).toEqual(["b", "c"]);
  });

  it("removes only members strictly below the bound", async () => {
    const store = new MemoryKeyValueStore();
    await store.zadd("z", 10, "old");
    await store.zadd("z", 20, "edge");
    await store.zadd("z", 30, "new");

    expect(await store.zremBelow("z", 20)).toEqual(["old"]);
    expect(await store.zrange("z")).toEqual(["edge", "new"]);
  });

  it("pops nothing from an empty set", async () => {
    expect(await new MemoryKeyValueStore().zpopmin("none")).toBeNull();
  });

  it("deletes every kind of key under a prefix", async () => {
    const store = new MemoryKeyValueStore();
    await store.setWithTtl("ns:a:1", "x", 60);
    await store.setWithTtl("ns:a:2", "y", 60);
    await store.setWithTtl("ns:b:1", "z", 60);
    await store.zadd("ns:a", 1, "m");

    expect(await store.delByPrefix("ns:a:")).toBe(2);
    expect(await store.get("ns:b:1")).toBe("z");
    expect(await store.zcard("ns:a")).toBe(1);
  });
});

describe("CacheCounters", () => {
  it("creates all fields at zero and keeps existing values on init", async () => {
    const store = new MemoryKeyValueStore();
    const counters = new CacheCounters(store, "stats");

    await counters.init();
    expect(await store.hgetall("stats")).toEqual({
      total_cached: "0",
      total_hits: "0",
      total_misses: "0",
      total_errors: "0"
    });

    await counters.increment("total_hits");
    await counters.increment("total_hits", 2);
    await counters.init();
    expect((await counters.read()).total_hits).toBe(3);
  });

  it("reads zeros after reset", async () => {
    const counters = new CacheCounters(new MemoryKeyValueStore(), "stats");
    await counters.increment("total_misses", 5);
    await counters.reset();

    expect(await counters.read()).toEqual({ total_cached: 0, total_hits: 0, total_misses: 0, total_errors: 0 });
  });

  it("tracks the closed state", async () => {
    const counters = new CacheCounters(new MemoryKeyValueStore(), "stats");
    expect(counters.isClosed).toBe(false);
    counters.close();
    expect(counters.isClosed).toBe(true);
    await counters.init();
    expect(counters.isClosed).toBe(false);
  });
});
