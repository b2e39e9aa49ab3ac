// Semantic cache admin routes
import type { FastifyInstance } from "fastify";
import type { Services } from "../services/orchestration/registry";

export async function cacheRoutes(app: FastifyInstance, services: Services) {
  const { coordinator } = services;

  app.get("/api/cache/stats", async (_req, reply) => {
    const stats = await coordinator.cacheStats();
    if (!stats) {
      return reply.code(404).send({ detail: "Semantic cache is disabled" });
    }
    return stats;
  });

  app.delete("/api/cache/clear", async (_req, reply) => {
    if (!coordinator.cacheEnabled) {
      return reply.code(404).send({ detail: "Semantic cache is disabled" });
    }
    const cleared = await coordinator.cacheClear();
    if (!cleared) {
      return reply.code(500).send({ detail: "Failed to clear cache" });
    }
    return { status: "success", message: "Cache cleared successfully" };
  });

  /**
   * 200 when the backing store answers a ping, 503 otherwise.
   * GET /api/cache/health
   */
  app.get("/api/cache/health", async (_req, reply) => {
    const health = await coordinator.cacheHealth();
    return reply.code(health.healthy ? 200 : 503).send(health);
  });
}
