// Orchestration - Query Coordinator
import type {
  BatchQueryResponse,
  CacheHealth,
  CacheStats,
  ChunkContext,
  QueryResponse,
  VectorHit
} from "../../../../shared/types";
import type { HybridRetriever } from "../retrieval";
import type { SemanticCache } from "../cache/semanticCache";
import type { RagPipeline } from "./pipeline";
import { RAG_TOP_K } from "../../config/constants";
import { addEvent, withSpan } from "../../config/otel";
import { queryDurationHistogram } from "../../config/metrics";

export const CACHE_HIT_STEP = "Retrieved from cache";

export type CoordinatorRetriever = Pick<HybridRetriever, "embed" | "vectorSearch" | "chunkContext">;

export interface CoordinatorDeps {
  retriever: CoordinatorRetriever;
  pipeline: Pick<RagPipeline, "run">;
  /** null disables caching: every query runs the pipeline. */
  cache: SemanticCache | null;
}

/**
 * Cache-first query handling. The pipeline runs only on a miss, and its result
 * is written back before returning. A failed pipeline run never reaches `put`.
 */
export class QueryCoordinator {
  constructor(private deps: CoordinatorDeps) { }

  get cacheEnabled() {
    return this.deps.cache !== null;
  }

  async query(question: string, topK = RAG_TOP_K): Promise<QueryResponse> {
    const stopTimer = queryDurationHistogram.startTimer();
    const response = await withSpan(
      "coordinator.query",
      () => this.answer(question, topK),
      { topK, questionLength: question.length, cacheEnabled: this.cacheEnabled }
    );
    stopTimer({ cached: String(response.cached) });
    return response;
  }

  private async answer(question: string, topK: number): Promise<QueryResponse> {
    const { retriever, pipeline, cache } = this.deps;
    const embedding = await retriever.embed(question);

    if (cache) {
      const hit = await cache.get(question, embedding);
      if (hit) {
        addEvent("coordinator.cache.hit", { similarity: hit.similarity });
        return {
          question,
          answer: hit.answer,
          sources: hit.sources,
          search_type: hit.search_type,
          processing_steps: [...hit.processing_steps, CACHE_HIT_STEP],
          cached: true,
          cache_similarity: hit.similarity,
          original_query: hit.original_query
        };
      }
    }

    const result = await pipeline.run(question, topK, embedding);
    console.log(`[Coordinator] ${result.search_type} route produced ${result.sources.length} sources`);

    if (cache) {
      const stored = await cache.put(
        question,
        embedding,
        result.answer,
        result.sources,
        result.search_type,
        result.steps
      );
      if (!stored) {
        console.warn("[Coordinator] Cache not updated for this answer");
      }
    }

    return {
      question,
      answer: result.answer,
      sources: result.sources,
      search_type: result.search_type,
      processing_steps: result.steps,
      cached: false
    };
  }

  async queryBatch(questions: string[], topK = RAG_TOP_K): Promise<BatchQueryResponse> {
    const results: QueryResponse[] = [];
    for (const question of questions) {
      results.push(await this.query(question, topK));
    }
    return { results, total: results.length };
  }

  async similarChunks(text: string, k: number): Promise<VectorHit[]> {
    return await this.deps.retriever.vectorSearch(text, k);
  }

  async chunkContext(chunkId: string): Promise<ChunkContext | null> {
    return await this.deps.retriever.chunkContext(chunkId);
  }

  async cacheStats(): Promise<CacheStats | null> {
    return this.deps.cache ? await this.deps.cache.stats() : null;
  }

  async cacheClear(): Promise<boolean> {
    return this.deps.cache ? await this.deps.cache.clear() : false;
  }

  async cacheHealth(): Promise<CacheHealth> {
    if (!this.deps.cache) return { healthy: false, message: "Semantic cache is disabled" };
    return await this.deps.cache.health();
  }
}
