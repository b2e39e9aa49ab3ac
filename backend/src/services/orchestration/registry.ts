// Orchestration - default collaborator wiring
import type { ChunkContext } from "../../../../shared/types";
import {
  CACHE_BACKEND,
  CACHE_ENABLED,
  CACHE_MAX_SIZE,
  CACHE_SIMILARITY_THRESHOLD,
  CACHE_TTL_SECONDS,
  VECTOR_BACKEND,
  type CacheBackend,
  type VectorBackend
} from "../../config/constants";
import { chunkContext, countEmbeddedChunks, countRows, vectorSearch, type ChunkContextRow } from "../../db/sql";
import { vectorSearchQdrant } from "../../db/qdrant";
import { createRedisStore } from "../../db/redis";
import { HybridRetriever, type EmbeddingProvider, type GraphStore, type VectorIndex } from "../retrieval";
import { openAIEmbeddings } from "../embeddings";
import { openAIGenerator, type Generator } from "../generation";
import { MemoryKeyValueStore, type KeyValueStore } from "../cache/store";
import { SemanticCache } from "../cache/semanticCache";
import { ExtractionChain, createLlmStage, heuristicStage } from "../extraction/chain";
import { RagPipeline } from "./pipeline";
import { QueryCoordinator } from "./coordinator";
import type { RoutePolicy } from "./classifier";

export interface DatabaseProbe {
  counts(): Promise<{ documents: number; chunks: number }>;
  /** Chunk rows, and how many of them carry an embedding. */
  embeddedChunks(): Promise<{ total: number; embedded: number }>;
}

export interface Services {
  coordinator: QueryCoordinator;
  cache: SemanticCache | null;
  extractor: ExtractionChain;
  database: DatabaseProbe;
}

export const pgVectorIndex: VectorIndex = {
  async query(vector, k) {
    const rows = await vectorSearch(vector, k);
    return rows.map((r) => ({ chunk_id: r.id, text: r.content, score: r.vector_sim }));
  }
};

export const qdrantVectorIndex: VectorIndex = {
  async query(vector, k) {
    const hits = await vectorSearchQdrant(vector, k);
    return hits.map((h) => ({ chunk_id: h.chunk_id, text: h.content, score: h.score }));
  }
};

export function toChunkContext(row: ChunkContextRow): ChunkContext {
  return {
    chunk_id: row.chunk_id,
    document_id: row.document_id,
    position: row.chunk_index,
    current: row.current,
    previous: row.previous,
    next: row.next,
    document_title: row.document_title
  };
}

export const pgGraphStore: GraphStore = {
  async neighbors(chunkId) {
    const row = await chunkContext(chunkId);
    return row ? toChunkContext(row) : null;
  }
};

export const pgDatabaseProbe: DatabaseProbe = {
  async counts() {
    const [documents, chunks] = await Promise.all([countRows("documents"), countRows("chunks")]);
    return { documents, chunks };
  },
  embeddedChunks: countEmbeddedChunks
};

export function vectorIndexFor(backend: VectorBackend): VectorIndex {
  return backend === "qdrant" ? qdrantVectorIndex : pgVectorIndex;
}

export function createKeyValueStore(backend: CacheBackend = CACHE_BACKEND): KeyValueStore {
  return backend === "memory" ? new MemoryKeyValueStore() : createRedisStore();
}

export function createSemanticCache(store: KeyValueStore = createKeyValueStore()) {
  return new SemanticCache(store, {
    ttlSeconds: CACHE_TTL_SECONDS,
    similarityThreshold: CACHE_SIMILARITY_THRESHOLD,
    maxCacheSize: CACHE_MAX_SIZE
  });
}

export interface ServiceOverrides {
  embedder?: EmbeddingProvider;
  index?: VectorIndex;
  graph?: GraphStore;
  generator?: Generator;
  router?: RoutePolicy;
  /** null disables the cache. */
  cache?: SemanticCache | null;
  database?: DatabaseProbe;
}

export function createServices(overrides: ServiceOverrides = {}): Services {
  const generator = overrides.generator ?? openAIGenerator;
  const retriever = new HybridRetriever({
    embedder: overrides.embedder ?? openAIEmbeddings,
    index: overrides.index ?? vectorIndexFor(VECTOR_BACKEND),
    graph: overrides.graph ?? pgGraphStore
  });
  const pipeline = new RagPipeline(retriever, generator, overrides.router);
  const cache =
    overrides.cache !== undefined ? overrides.cache : CACHE_ENABLED ? createSemanticCache() : null;

  return {
    coordinator: new QueryCoordinator({ retriever, pipeline, cache }),
    cache,
    extractor: new ExtractionChain([heuristicStage, createLlmStage(generator)]),
    database: overrides.database ?? pgDatabaseProbe
  };
}
