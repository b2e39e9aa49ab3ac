// Health and metrics routes
import type { FastifyInstance } from "fastify";
import type { CacheHealth } from "../../../shared/types";
import type { Services } from "../services/orchestration/registry";
import { VECTOR_BACKEND } from "../config/constants";
import { getContentType, getMetrics } from "../config/metrics";
import { getQdrantStats } from "../db/qdrant";
import { errorMessage } from "../utils/errors";

type Status = "healthy" | "degraded" | "unhealthy";

interface HealthReport {
  status: Status;
  timestamp: string;
  postgres: { connected: true; documents: number; chunks: number } | { connected: false; error: string };
  cache: CacheHealth & { enabled: boolean };
  qdrant?: { connected: true; status: string; points: number } | { connected: false; error: string };
  warning?: string;
}

export async function healthRoutes(app: FastifyInstance, services: Services) {
  /**
   * Store and database liveness.
   * GET /api/health
   * A failing cache or Qdrant degrades the status; a failing Postgres makes it unhealthy.
   */
  app.get("/api/health", async (_req, reply) => {
    const cache = { enabled: services.coordinator.cacheEnabled, ...(await services.coordinator.cacheHealth()) };
    const health: HealthReport = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      postgres: { connected: false, error: "not checked" },
      cache
    };

    try {
      const counts = await services.database.counts();
      health.postgres = { connected: true, ...counts };
    } catch (error) {
      health.postgres = { connected: false, error: errorMessage(error) };
      health.status = "unhealthy";
    }

    if (cache.enabled && !cache.healthy && health.status === "healthy") {
      health.status = "degraded";
      health.warning = "Semantic cache unavailable - every query runs the full pipeline";
    }

    if (VECTOR_BACKEND === "qdrant") {
      try {
        const stats = await getQdrantStats();
        health.qdrant = { connected: true, status: stats.status, points: stats.points_count };
      } catch (error) {
        health.qdrant = { connected: false, error: errorMessage(error) };
        if (health.status === "healthy") health.status = "degraded";
        health.warning = "Qdrant connection failed";
      }
    }

    return reply.code(health.status === "unhealthy" ? 503 : 200).send(health);
  });

  // Prometheus scrape endpoint
  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", getContentType());
    return await getMetrics();
  });
}
