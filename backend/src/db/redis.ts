import { Redis } from "ioredis";
import { REDIS_URL } from "../config/constants";
import type { KeyValueStore, StoredValue } from "../services/cache/store";
import { errorMessage } from "../utils/errors";

/**
 * Redis-backed store for the semantic cache.
 * Commands fail fast (one retry per request) so a dead Redis turns into cache
 * misses quickly instead of stalling queries.
 */
export class RedisKeyValueStore implements KeyValueStore {
  constructor(private client: Redis) { }

  async ping() {
    try {
      return (await this.client.ping()) === "PONG";
    } catch (error) {
      console.error("[redis] Ping failed:", errorMessage(error));
      return false;
    }
  }

  async setWithTtl(key: string, value: StoredValue, ttlSeconds: number) {
    await this.client.set(key, value, "EX", Math.max(1, Math.ceil(ttlSeconds)));
  }

  async get(key: string) {
    return await this.client.get(key);
  }

  async getBuffer(key: string) {
    return await this.client.getBuffer(key);
  }

  async del(...keys: string[]) {
    if (keys.length === 0) return 0;
    return await this.client.del(...keys);
  }

  async delByPrefix(prefix: string) {
    let cursor = "0";
    let removed = 0;
    do {
      const [next, keys] = await this.client.scan(cursor, "MATCH", `${prefix}*`, "COUNT", 500);
      cursor = next;
      if (keys.length > 0) removed += await this.client.del(...keys);
    } while (cursor !== "0");
    return removed;
  }

  async zadd(key: string, score: number, member: string) {
    await this.client.zadd(key, score, member);
  }

  async zcard(key: string) {
    return await this.client.zcard(key);
  }

  async zrange(key: string) {
    return await this.client.zrange(key, 0, -1);
  }

  async zpopmin(key: string) {
    const [member] = await this.client.zpopmin(key);
    return member ?? null;
  }

  async zremBelow(key: string, maxScore: number) {
    const members = await this.client.zrangebyscore(key, "-inf", `(${maxScore}`);
    if (members.length > 0) await this.client.zrem(key, ...members);
    return members;
  }

  async hincrby(key: string, field: string, by: number) {
    return await this.client.hincrby(key, field, by);
  }

  async hgetall(key: string) {
    return await this.client.hgetall(key);
  }

  async close() {
    await this.client.quit();
  }
}

export function createRedisStore(url = REDIS_URL) {
  const client = new Redis(url, {
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => Math.min(times * 200, 2000),
  });
  client.on("error", (err) => {
    console.error("[redis] Connection error:", err.message);
  });
  return new RedisKeyValueStore(client);
}
