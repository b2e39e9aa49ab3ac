// Retrieval: vector search and neighbour-context enrichment
import type { ChunkContext, ChunkResult, VectorHit } from "../../../shared/types";
import { addEvent, withSpan } from "../config/otel";
import { enrichmentDropsCounter } from "../config/metrics";
import { RagError, RetrievalError, errorMessage } from "../utils/errors";

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

/** k nearest passages by cosine similarity, best first. */
export interface VectorIndex {
  query(vector: number[], k: number): Promise<VectorHit[]>;
}

/** Neighbouring chunks and owning document of one chunk; null when the chunk is unknown. */
export interface GraphStore {
  neighbors(chunkId: string): Promise<ChunkContext | null>;
}

export interface RetrieverDeps {
  embedder: EmbeddingProvider;
  index: VectorIndex;
  graph: GraphStore;
}

export const UNKNOWN_TITLE = "Unknown";

export function enrichText(
  main: string,
  neighbors: { previous?: string | null; next?: string | null }
): string {
  const blocks: string[] = [];
  if (neighbors.previous) blocks.push(`[Previous]: ${neighbors.previous}`);
  blocks.push(`[Main]: ${main}`);
  if (neighbors.next) blocks.push(`[Next]: ${neighbors.next}`);
  return blocks.join("\n\n");
}

export class HybridRetriever {
  constructor(private deps: RetrieverDeps) { }

  async embed(text: string): Promise<number[]> {
    try {
      return await this.deps.embedder.embed(text);
    } catch (error) {
      throw new RetrievalError(`Embedding failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async vectorSearch(question: string, k: number, embedding?: number[]): Promise<VectorHit[]> {
    return await withSpan(
      "retrieval.vector",
      async () => {
        const qEmb = embedding ?? (await this.embed(question));
        let hits: VectorHit[];
        try {
          hits = await this.deps.index.query(qEmb, k);
        } catch (error) {
          if (error instanceof RagError) throw error;
          throw new RetrievalError(`Vector search failed: ${errorMessage(error)}`, { cause: error });
        }
        addEvent("retrieval.vector.completed", { hits: hits.length, topScore: hits[0]?.score ?? null });
        return hits;
      },
      { k, queryLength: question.length, precomputed: embedding !== undefined }
    );
  }

  async hybridSearch(question: string, k: number, embedding?: number[]): Promise<ChunkResult[]> {
    const hits = await this.vectorSearch(question, k, embedding);

    return await withSpan(
      "retrieval.enrich",
      async () => {
        const settled = await Promise.allSettled(hits.map((hit) => this.enrich(hit)));

        const enriched: ChunkResult[] = [];
        settled.forEach((outcome, idx) => {
          if (outcome.status === "fulfilled" && outcome.value) {
            enriched.push(outcome.value);
            return;
          }
          const reason =
            outcome.status === "rejected" ? errorMessage(outcome.reason) : "chunk not found in document store";
          console.warn(`[Retrieval] Dropping hit ${hits[idx].chunk_id}: ${reason}`);
          enrichmentDropsCounter.inc();
        });

        addEvent("retrieval.enrich.completed", { hits: hits.length, enriched: enriched.length });
        return enriched;
      },
      { hits: hits.length }
    );
  }

  private async enrich(hit: VectorHit): Promise<ChunkResult | null> {
    const ctx = await this.deps.graph.neighbors(hit.chunk_id);
    if (!ctx) return null;
    return {
      chunk_id: hit.chunk_id,
      text: hit.text,
      score: hit.score,
      enriched_text: enrichText(hit.text, ctx),
      doc_title: ctx.document_title || UNKNOWN_TITLE
    };
  }

  async chunkContext(chunkId: string): Promise<ChunkContext | null> {
    return await withSpan("retrieval.chunkContext", () => this.deps.graph.neighbors(chunkId), { chunkId });
  }
}
