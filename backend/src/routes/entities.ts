// Entity extraction route
import type { FastifyInstance } from "fastify";
import type { ExtractRequestBody } from "../../../shared/types";
import type { Services } from "../services/orchestration/registry";

export async function entityRoutes(app: FastifyInstance, services: Services) {
  // POST /api/entities/extract
  app.post<{ Body: Partial<ExtractRequestBody> | undefined }>("/api/entities/extract", async (req, reply) => {
    const text = req.body?.text;
    if (typeof text !== "string" || !text.trim()) {
      return reply.code(400).send({ detail: "text is required" });
    }
    return await services.extractor.extract(text);
  });
}
