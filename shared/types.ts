// Shared request/response types and records

export type SearchType = "vector" | "hybrid";

export interface SourceInfo {
  text: string;
  score: number;
  doc_title: string;
}

export interface QueryRequestBody {
  question: string;
  top_k?: number;
}

export interface QueryResponse {
  question: string;
  answer: string;
  sources: SourceInfo[];
  search_type: SearchType;
  processing_steps: string[];
  cached: boolean;
  cache_similarity?: number;
  original_query?: string;
}

export interface BatchQueryRequestBody {
  questions: string[];
  top_k?: number;
}

export interface BatchQueryResponse {
  results: QueryResponse[];
  total: number;
}

// Retrieval

export interface VectorHit {
  chunk_id: string;
  text: string;
  score: number;
}

export interface ChunkResult extends VectorHit {
  enriched_text: string;
  doc_title: string;
}

export interface ChunkContext {
  chunk_id: string;
  document_id: string | null;
  position: number;
  current: string;
  previous: string | null;
  next: string | null;
  document_title: string | null;
}

// Corpus statistics

export interface CorpusStats {
  total_documents: number;
  total_chunks: number;
}

export interface EmbeddingStats {
  total_chunks: number;
  chunks_with_embeddings: number;
  chunks_without_embeddings: number;
  coverage_percentage: number;
}

// Semantic cache

export interface CacheStats {
  cache_size: number;
  max_cache_size: number;
  total_cached: number;
  total_hits: number;
  total_misses: number;
  total_errors: number;
  total_requests: number;
  hit_rate: number;
  similarity_threshold: number;
  ttl_seconds: number;
}

export interface CacheHealth {
  healthy: boolean;
  message: string;
}

// Entity extraction

export interface Entity {
  name: string;
  type: string;
  description?: string;
}

export interface ExtractRequestBody {
  text: string;
}

export interface ExtractResponse {
  stage: string | null;
  entities: Entity[];
}
