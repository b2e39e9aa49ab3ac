import { env } from "./env";

export const PROJECT_NAME = "semantic-rag";
export const PORT_BACKEND = env.PORT;

export type VectorBackend = "pgvector" | "qdrant";
export const VECTOR_BACKEND: VectorBackend =
  env.VECTOR_BACKEND === "qdrant" ? "qdrant" : "pgvector";

export const QDRANT_URL = env.QDRANT_URL;
export const QDRANT_API_KEY = env.QDRANT_API_KEY;
export const QDRANT_COLLECTION = env.QDRANT_COLLECTION;

export const EMBEDDING_MODEL = env.EMBEDDING_MODEL;
export const EMBEDDING_DIMENSIONS = env.EMBEDDING_DIMENSIONS;
export const CHAT_MODEL = env.CHAT_MODEL;

export const RAG_TOP_K = env.RAG_TOP_K;

export const MOCK_OPENAI = !!env.MOCK_OPENAI;

// Semantic cache
export type CacheBackend = "redis" | "memory";
export const CACHE_BACKEND: CacheBackend = env.CACHE_BACKEND === "memory" ? "memory" : "redis";
export const REDIS_URL = env.REDIS_URL;
export const CACHE_ENABLED = env.CACHE_ENABLED;
export const CACHE_TTL_SECONDS = env.CACHE_TTL_SECONDS;
export const CACHE_SIMILARITY_THRESHOLD = env.CACHE_SIMILARITY_THRESHOLD;
export const CACHE_MAX_SIZE = env.CACHE_MAX_SIZE;

// Routing
export const ROUTE_LOCALE = env.ROUTE_LOCALE;
export const ROUTE_VECTOR_PHRASES = env.ROUTE_VECTOR_PHRASES.split(",")
  .map((t: string) => t.trim().toLowerCase())
  .filter((t: string) => Boolean(t));
