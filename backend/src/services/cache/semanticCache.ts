// Semantic response cache keyed by question-embedding similarity.
import { createHash } from "crypto";
import { Mutex } from "async-mutex";
import type { CacheHealth, CacheStats, SearchType, SourceInfo } from "../../../../shared/types";
import { CacheCounters, type CounterSnapshot } from "./counters";
import type { KeyValueStore } from "./store";
import { addEvent, withSpan } from "../../config/otel";
import {
  cacheErrorsCounter,
  cacheEvictionsCounter,
  cacheLookupsCounter,
  cacheSizeGauge
} from "../../config/metrics";
import { SerializationError, errorMessage } from "../../utils/errors";

export interface SemanticCacheOptions {
  ttlSeconds: number;
  similarityThreshold: number;
  maxCacheSize: number;
  namespace?: string;
  counters?: CacheCounters;
}

export interface AnswerPayload {
  answer: string;
  sources: SourceInfo[];
  search_type: SearchType;
  processing_steps: string[];
  timestamp: number;
}

export interface CachedResult extends AnswerPayload {
  cached: true;
  similarity: number;
  original_query: string;
}

const SCAN_BATCH = 100;

export function normalize(s: string) {
  return s.toLowerCase().replace(/\s+/g, " ").trim();
}

/** md5 of the normalized question. Distinct questions may collide; accepted. */
export function queryId(question: string) {
  return createHash("md5").update(normalize(question), "utf8").digest("hex");
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Little-endian float32, 4 bytes per dimension. */
export function serializeEmbedding(embedding: ArrayLike<number>): Buffer {
  const buf = Buffer.alloc(embedding.length * 4);
  for (let i = 0; i < embedding.length; i++) buf.writeFloatLE(embedding[i], i * 4);
  return buf;
}

export function deserializeEmbedding(data: Buffer): number[] {
  if (data.byteLength === 0 || data.byteLength % 4 !== 0) {
    throw new SerializationError(`Invalid embedding payload of ${data.byteLength} bytes`);
  }
  const out = new Array<number>(data.byteLength / 4);
  for (let i = 0; i < out.length; i++) out[i] = data.readFloatLE(i * 4);
  return out;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isSource(v: unknown): v is SourceInfo {
  return (
    isRecord(v) &&
    typeof v.text === "string" &&
    typeof v.score === "number" &&
    typeof v.doc_title === "string"
  );
}

export function parseAnswerPayload(raw: string): AnswerPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SerializationError("Answer payload is not valid JSON", { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new SerializationError("Answer payload is not an object");
  }
  const { answer, sources, search_type, processing_steps, timestamp } = parsed;
  if (
    typeof answer !== "string" ||
    !Array.isArray(sources) ||
    !sources.every(isSource) ||
    (search_type !== "vector" && search_type !== "hybrid") ||
    !Array.isArray(processing_steps) ||
    !processing_steps.every((s: unknown): s is string => typeof s === "string") ||
    typeof timestamp !== "number"
  ) {
    throw new SerializationError("Answer payload has an unexpected shape");
  }
  return { answer, sources, search_type, processing_steps, timestamp };
}

/**
 * Cache of previous answers, matched by cosine similarity of question embeddings.
 *
 * Lookups scan every live entry (bounded by `maxCacheSize`) in insertion order and
 * keep the first entry with the highest similarity. Writes evict the oldest entry
 * once the cache is full (FIFO, not LRU). Public methods never throw: storage
 * failures are logged and reported as misses or `false`. After `close()`, `put`
 * returns `false` and `get` misses without touching the store.
 */
export class SemanticCache {
  readonly ttlSeconds: number;
  readonly similarityThreshold: number;
  readonly maxCacheSize: number;

  private readonly embeddingsKey: string;
  private readonly queriesKey: string;
  private readonly answersKey: string;

  private readonly counters: CacheCounters;
  // put/clear run one at a time so the size check cannot race past maxCacheSize.
  private readonly writeLock = new Mutex();
  private lastCreatedAt = 0;

  constructor(private store: KeyValueStore, options: SemanticCacheOptions) {
    this.ttlSeconds = options.ttlSeconds;
    this.similarityThreshold = options.similarityThreshold;
    this.maxCacheSize = Math.max(1, Math.floor(options.maxCacheSize));

    const ns = options.namespace ?? "semantic_cache";
    this.embeddingsKey = `${ns}:embeddings`;
    this.queriesKey = `${ns}:queries`;
    this.answersKey = `${ns}:answers`;

    this.counters = options.counters ?? new CacheCounters(store, `${ns}:stats`);
  }

  private embeddingKey(id: string) {
    return `${this.embeddingsKey}:${id}`;
  }

  private queryKey(id: string) {
    return `${this.queriesKey}:${id}`;
  }

  private answerKey(id: string) {
    return `${this.answersKey}:${id}`;
  }

  async init(): Promise<boolean> {
    try {
      if (!(await this.store.ping())) {
        console.error("[SemanticCache] ❌ Backing store unreachable; cache runs in degraded mode");
        return false;
      }
      await this.counters.init();
      console.log(
        `[SemanticCache] ✓ Ready (threshold=${this.similarityThreshold}, ttl=${this.ttlSeconds}s, max=${this.maxCacheSize})`
      );
      return true;
    } catch (error) {
      console.error(`[SemanticCache] ❌ Initialization failed: ${errorMessage(error)}`);
      return false;
    }
  }

  // created_at doubles as the sorted-set score, so it must never repeat.
  private nextCreatedAt() {
    const now = Date.now();
    this.lastCreatedAt = now > this.lastCreatedAt ? now : this.lastCreatedAt + 0.001;
    return this.lastCreatedAt;
  }

  // Drops expired ids from the index together with their records.
  private async pruneExpired() {
    const expired = await this.store.zremBelow(this.embeddingsKey, Date.now() - this.ttlSeconds * 1000);
    if (expired.length === 0) return;
    await this.store.del(
      ...expired.flatMap((id) => [this.embeddingKey(id), this.queryKey(id), this.answerKey(id)])
    );
  }

  private async evictOldest() {
    const victim = await this.store.zpopmin(this.embeddingsKey);
    if (!victim) return;
    await this.store.del(this.embeddingKey(victim), this.queryKey(victim), this.answerKey(victim));
    cacheEvictionsCounter.inc();
    addEvent("cache.evict", { id: victim });
  }

  private async countError(operation: string) {
    cacheErrorsCounter.labels(operation).inc();
    try {
      await this.counters.increment("total_errors");
    } catch (error) {
      console.warn(`[SemanticCache] Could not record error counter: ${errorMessage(error)}`);
    }
  }

  private async recordMiss() {
    cacheLookupsCounter.labels("miss").inc();
    await this.counters.increment("total_misses");
  }

  async put(
    question: string,
    embedding: number[],
    answer: string,
    sources: SourceInfo[],
    searchType: SearchType,
    steps: string[]
  ): Promise<boolean> {
    if (this.counters.isClosed) return false;
    const id = queryId(question);
    try {
      if (embedding.length === 0) {
        throw new SerializationError("Refusing to cache an empty embedding");
      }
      return await withSpan(
        "cache.put",
        () =>
          this.writeLock.runExclusive(async () => {
            await this.pruneExpired();
            const size = await this.store.zcard(this.embeddingsKey);
            if (size >= this.maxCacheSize) {
              await this.evictOldest();
            }

            const createdAt = this.nextCreatedAt();
            const payload: AnswerPayload = {
              answer,
              sources,
              search_type: searchType,
              processing_steps: steps,
              timestamp: createdAt
            };

            // Records first, index last: a reader never sees an id without its records.
            await this.store.setWithTtl(this.embeddingKey(id), serializeEmbedding(embedding), this.ttlSeconds);
            await this.store.setWithTtl(this.queryKey(id), question, this.ttlSeconds);
            await this.store.setWithTtl(this.answerKey(id), JSON.stringify(payload), this.ttlSeconds);
            await this.store.zadd(this.embeddingsKey, createdAt, id);
            await this.counters.increment("total_cached");

            cacheSizeGauge.set(await this.store.zcard(this.embeddingsKey));
            return true;
          }),
        { id, dimensions: embedding.length }
      );
    } catch (error) {
      console.error(`[SemanticCache] Failed to cache query "${question.slice(0, 50)}": ${errorMessage(error)}`);
      await this.countError("put");
      return false;
    }
  }

  async get(question: string, embedding: number[]): Promise<CachedResult | null> {
    if (this.counters.isClosed) return null;
    try {
      return await withSpan("cache.get", () => this.lookup(question, embedding), {
        queryLength: question.length
      });
    } catch (error) {
      console.error(`[SemanticCache] Failed to get from cache: ${errorMessage(error)}`);
      await this.countError("get");
      return null;
    }
  }

  private async lookup(question: string, embedding: number[]): Promise<CachedResult | null> {
    await this.pruneExpired();
    const ids = await this.store.zrange(this.embeddingsKey);

    if (ids.length === 0) {
      await this.recordMiss();
      return null;
    }

    const queryVector = Array.from(Float32Array.from(embedding));
    let bestSimilarity = -Infinity;
    let bestId: string | null = null;

    for (let start = 0; start < ids.length; start += SCAN_BATCH) {
      const batch = ids.slice(start, start + SCAN_BATCH);
      const blobs = await Promise.all(batch.map((id) => this.store.getBuffer(this.embeddingKey(id))));

      for (let i = 0; i < batch.length; i++) {
        const bytes = blobs[i];
        // Expired between the prune and the read.
        if (!bytes) continue;

        let candidate: number[];
        try {
          candidate = deserializeEmbedding(bytes);
          if (candidate.length !== queryVector.length) {
            throw new SerializationError(
              `Embedding dimension ${candidate.length} does not match query dimension ${queryVector.length}`
            );
          }
        } catch (error) {
          console.warn(`[SemanticCache] Skipping entry ${batch[i]}: ${errorMessage(error)}`);
          await this.countError("deserialize");
          continue;
        }

        const similarity = cosineSimilarity(queryVector, candidate);
        // Strict: an equal later score never displaces the first maximum.
        if (similarity > bestSimilarity) {
          bestSimilarity = similarity;
          bestId = batch[i];
        }
      }
    }

    if (bestId === null || bestSimilarity < this.similarityThreshold) {
      addEvent("cache.miss", { bestSimilarity: Number.isFinite(bestSimilarity) ? bestSimilarity : 0 });
      await this.recordMiss();
      return null;
    }

    const [rawAnswer, originalQuery] = await Promise.all([
      this.store.get(this.answerKey(bestId)),
      this.store.get(this.queryKey(bestId))
    ]);
    if (rawAnswer === null || originalQuery === null) {
      await this.recordMiss();
      return null;
    }

    let payload: AnswerPayload;
    try {
      payload = parseAnswerPayload(rawAnswer);
    } catch (error) {
      console.warn(`[SemanticCache] Skipping entry ${bestId}: ${errorMessage(error)}`);
      await this.countError("deserialize");
      await this.recordMiss();
      return null;
    }

    console.log(
      `[SemanticCache] Cache HIT (similarity ${bestSimilarity.toFixed(3)}) for "${question.slice(0, 50)}"`
    );
    cacheLookupsCounter.labels("hit").inc();
    await this.counters.increment("total_hits");

    return {
      ...payload,
      cached: true,
      similarity: bestSimilarity,
      original_query: originalQuery
    };
  }

  async clear(): Promise<boolean> {
    try {
      await this.writeLock.runExclusive(async () => {
        await this.store.del(this.embeddingsKey);
        await this.counters.reset();
        await this.store.delByPrefix(`${this.embeddingsKey}:`);
        await this.store.delByPrefix(`${this.queriesKey}:`);
        await this.store.delByPrefix(`${this.answersKey}:`);
      });
      cacheSizeGauge.set(0);
      console.log("[SemanticCache] ✓ Cache cleared");
      return true;
    } catch (error) {
      console.error(`[SemanticCache] Failed to clear cache: ${errorMessage(error)}`);
      return false;
    }
  }

  private buildStats(cacheSize: number, c: CounterSnapshot): CacheStats {
    const totalRequests = c.total_hits + c.total_misses;
    const hitRate = totalRequests > 0 ? (c.total_hits / totalRequests) * 100 : 0;
    return {
      cache_size: cacheSize,
      max_cache_size: this.maxCacheSize,
      total_cached: c.total_cached,
      total_hits: c.total_hits,
      total_misses: c.total_misses,
      total_errors: c.total_errors,
      total_requests: totalRequests,
      hit_rate: Math.round(hitRate * 100) / 100,
      similarity_threshold: this.similarityThreshold,
      ttl_seconds: this.ttlSeconds
    };
  }

  async stats(): Promise<CacheStats> {
    try {
      await this.pruneExpired();
      const [size, counters] = await Promise.all([
        this.store.zcard(this.embeddingsKey),
        this.counters.read()
      ]);
      return this.buildStats(size, counters);
    } catch (error) {
      console.error(`[SemanticCache] Failed to get cache stats: ${errorMessage(error)}`);
      return this.buildStats(0, { total_cached: 0, total_hits: 0, total_misses: 0, total_errors: 0 });
    }
  }

  async health(): Promise<CacheHealth> {
    if (this.counters.isClosed) {
      return { healthy: false, message: "Cache is closed" };
    }
    const ok = await this.store.ping();
    return ok
      ? { healthy: true, message: "Cache store is operational" }
      : { healthy: false, message: "Cache store is unreachable" };
  }

  async close() {
    this.counters.close();
    try {
      await this.store.close();
      console.log("[SemanticCache] ✓ Store connection closed");
    } catch (error) {
      console.error(`[SemanticCache] Error closing store connection: ${errorMessage(error)}`);
    }
  }
}
