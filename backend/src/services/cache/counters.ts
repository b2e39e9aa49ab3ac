import type { KeyValueStore } from "./store";

export const COUNTER_FIELDS = ["total_cached", "total_hits", "total_misses", "total_errors"] as const;
export type CounterField = (typeof COUNTER_FIELDS)[number];
export type CounterSnapshot = Record<CounterField, number>;

const ZERO: CounterSnapshot = { total_cached: 0, total_hits: 0, total_misses: 0, total_errors: 0 };

/**
 * Cache-instance tallies kept in one hash of the backing store.
 * Increments go through HINCRBY so concurrent requests never lose updates.
 */
export class CacheCounters {
  private closed = false;

  constructor(private store: KeyValueStore, private key: string) { }

  /** Creates missing fields without touching existing values. */
  async init() {
    for (const field of COUNTER_FIELDS) {
      await this.store.hincrby(this.key, field, 0);
    }
    this.closed = false;
  }

  get isClosed() {
    return this.closed;
  }

  async increment(field: CounterField, by = 1) {
    return await this.store.hincrby(this.key, field, by);
  }

  async read(): Promise<CounterSnapshot> {
    const raw = await this.store.hgetall(this.key);
    const snapshot = { ...ZERO };
    for (const field of COUNTER_FIELDS) {
      const n = parseInt(raw[field] ?? "0", 10);
      snapshot[field] = Number.isFinite(n) ? n : 0;
    }
    return snapshot;
  }

  async reset() {
    await this.store.del(this.key);
  }

  close() {
    this.closed = true;
  }
}
