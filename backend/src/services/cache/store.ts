// Key-value store used by the semantic cache.
//
// The cache needs set-with-TTL records, an insertion-ordered sorted set and
// atomic hash counters. Redis provides all of them (see db/redis.ts); the
// in-process store below mirrors the same semantics for single-node setups
// and tests.

export type StoredValue = string | Buffer;

export interface KeyValueStore {
  /** Liveness check. Resolves false instead of throwing when unreachable. */
  ping(): Promise<boolean>;
  setWithTtl(key: string, value: StoredValue, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
  getBuffer(key: string): Promise<Buffer | null>;
  del(...keys: string[]): Promise<number>;
  delByPrefix(prefix: string): Promise<number>;

  zadd(key: string, score: number, member: string): Promise<void>;
  zcard(key: string): Promise<number>;
  /** All members ordered by ascending score, ties by member. */
  zrange(key: string): Promise<string[]>;
  /** Removes and returns the member with the lowest score. */
  zpopmin(key: string): Promise<string | null>;
  /** Removes members whose score is strictly below `maxScore` and returns them. */
  zremBelow(key: string, maxScore: number): Promise<string[]>;

  hincrby(key: string, field: string, by: number): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;

  close(): Promise<void>;
}

type Entry = { value: StoredValue; exp: number };

export class MemoryKeyValueStore implements KeyValueStore {
  private records = new Map<string, Entry>();
  private sortedSets = new Map<string, Map<string, number>>();
  private hashes = new Map<string, Map<string, number>>();

  async ping() {
    return true;
  }

  /** Plain records currently held, expired or not. */
  get recordCount() {
    return this.records.size;
  }

  async setWithTtl(key: string, value: StoredValue, ttlSeconds: number) {
    const stored = Buffer.isBuffer(value) ? Buffer.from(value) : value;
    this.records.set(key, { value: stored, exp: Date.now() + ttlSeconds * 1000 });
  }

  private live(key: string): Entry | undefined {
    const e = this.records.get(key);
    if (!e) return;
    if (Date.now() > e.exp) {
      this.records.delete(key);
      return;
    }
    return e;
  }

  async get(key: string) {
    const e = this.live(key);
    if (!e) return null;
    return Buffer.isBuffer(e.value) ? e.value.toString("utf8") : e.value;
  }

  async getBuffer(key: string) {
    const e = this.live(key);
    if (!e) return null;
    return Buffer.isBuffer(e.value) ? Buffer.from(e.value) : Buffer.from(e.value, "utf8");
  }

  async del(...keys: string[]) {
    let removed = 0;
    for (const key of keys) {
      if (this.records.delete(key)) removed++;
      if (this.sortedSets.delete(key)) removed++;
      if (this.hashes.delete(key)) removed++;
    }
    return removed;
  }

  async delByPrefix(prefix: string) {
    const keys = [...this.records.keys(), ...this.sortedSets.keys(), ...this.hashes.keys()].filter(
      (k) => k.startsWith(prefix)
    );
    return await this.del(...keys);
  }

  async zadd(key: string, score: number, member: string) {
    let set = this.sortedSets.get(key);
    if (!set) {
      set = new Map();
      this.sortedSets.set(key, set);
    }
    set.set(member, score);
  }

  async zcard(key: string) {
    return this.sortedSets.get(key)?.size ?? 0;
  }

  private ordered(key: string): [string, number][] {
    const set = this.sortedSets.get(key);
    if (!set) return [];
    return [...set.entries()].sort((a, b) =>
      a[1] !== b[1] ? a[1] - b[1] : a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0
    );
  }

  async zrange(key: string) {
    return this.ordered(key).map(([member]) => member);
  }

  async zpopmin(key: string) {
    const first = this.ordered(key)[0];
    if (!first) return null;
    this.sortedSets.get(key)?.delete(first[0]);
    return first[0];
  }

  async zremBelow(key: string, maxScore: number) {
    const set = this.sortedSets.get(key);
    if (!set) return [];
    const removed: string[] = [];
    for (const [member, score] of set) {
      if (score < maxScore) {
        set.delete(member);
        removed.push(member);
      }
    }
    return removed;
  }

  async hincrby(key: string, field: string, by: number) {
    let hash = this.hashes.get(key);
    if (!hash) {
      hash = new Map();
      this.hashes.set(key, hash);
    }
    const next = (hash.get(field) ?? 0) + by;
    hash.set(field, next);
    return next;
  }

  async hgetall(key: string) {
    const out: Record<string, string> = {};
    for (const [field, value] of this.hashes.get(key) ?? []) out[field] = String(value);
    return out;
  }

  async close() {
    this.records.clear();
    this.sortedSets.clear();
    this.hashes.clear();
  }
}
