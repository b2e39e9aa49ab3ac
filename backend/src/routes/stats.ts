// Read-only corpus statistics
import type { FastifyInstance } from "fastify";
import type { CorpusStats, EmbeddingStats } from "../../../shared/types";
import type { Services } from "../services/orchestration/registry";
import { errorMessage } from "../utils/errors";

export function embeddingStats(total: number, embedded: number): EmbeddingStats {
  const coverage = total > 0 ? (embedded / total) * 100 : 0;
  return {
    total_chunks: total,
    chunks_with_embeddings: embedded,
    chunks_without_embeddings: total - embedded,
    coverage_percentage: Math.round(coverage * 100) / 100
  };
}

export async function statsRoutes(app: FastifyInstance, services: Services) {
  const { database } = services;

  app.get("/api/stats", async (_req, reply) => {
    try {
      const { documents, chunks } = await database.counts();
      const stats: CorpusStats = { total_documents: documents, total_chunks: chunks };
      return stats;
    } catch (error) {
      return reply.code(500).send({ detail: `Failed to get statistics: ${errorMessage(error)}` });
    }
  });

  /**
   * How much of the chunk table is searchable by vector.
   * GET /api/stats/embeddings
   */
  app.get("/api/stats/embeddings", async (_req, reply) => {
    try {
      const { total, embedded } = await database.embeddedChunks();
      return embeddingStats(total, embedded);
    } catch (error) {
      return reply.code(500).send({ detail: `Failed to get embeddings stats: ${errorMessage(error)}` });
    }
  });
}
