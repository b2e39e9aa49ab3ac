// Query routes
import type { FastifyInstance } from "fastify";
import type { BatchQueryRequestBody, QueryRequestBody } from "../../../shared/types";
import type { Services } from "../services/orchestration/registry";
import { RAG_TOP_K } from "../config/constants";
import { addEvent } from "../config/otel";
import { errorMessage } from "../utils/errors";

const MAX_TOP_K = 50;

/** Positive integer up to MAX_TOP_K, otherwise the fallback. */
export function parseTopK(value: unknown, fallback = RAG_TOP_K): number {
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 1) return fallback;
  return Math.min(n, MAX_TOP_K);
}

function readQuestion(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

export async function queryRoutes(app: FastifyInstance, services: Services) {
  const { coordinator } = services;

  /**
   * Answer one question, from the semantic cache when a similar one was answered before.
   * POST /api/query
   */
  app.post<{ Body: Partial<QueryRequestBody> | undefined }>("/api/query", async (req, reply) => {
    const question = readQuestion(req.body?.question);
    if (!question) {
      return reply.code(400).send({ detail: "question is required" });
    }
    addEvent("query.request", { questionLength: question.length });

    try {
      return await coordinator.query(question, parseTopK(req.body?.top_k));
    } catch (error) {
      req.log.error({ err: error }, "query failed");
      return reply.code(500).send({ detail: `Query failed: ${errorMessage(error)}` });
    }
  });

  /**
   * POST /api/query/batch
   * Questions are answered in order; the first failure fails the batch.
   */
  app.post<{ Body: Partial<BatchQueryRequestBody> | undefined }>("/api/query/batch", async (req, reply) => {
    const raw = req.body?.questions;
    const questions = Array.isArray(raw) ? raw.map(readQuestion) : [];
    if (questions.length === 0 || questions.some((q) => q === null)) {
      return reply.code(400).send({ detail: "questions must be a non-empty list of strings" });
    }

    try {
      return await coordinator.queryBatch(
        questions.filter((q): q is string => q !== null),
        parseTopK(req.body?.top_k)
      );
    } catch (error) {
      req.log.error({ err: error }, "batch query failed");
      return reply.code(500).send({ detail: `Batch query failed: ${errorMessage(error)}` });
    }
  });

  // GET /api/query/similar?text=...&k=5
  app.get<{ Querystring: { text?: string; k?: string } }>("/api/query/similar", async (req, reply) => {
    const text = readQuestion(req.query.text);
    if (!text) {
      return reply.code(400).send({ detail: "text is required" });
    }
    try {
      const results = await coordinator.similarChunks(text, parseTopK(req.query.k, 5));
      return { query: text, results };
    } catch (error) {
      req.log.error({ err: error }, "similar search failed");
      return reply.code(500).send({ detail: `Search failed: ${errorMessage(error)}` });
    }
  });

  // GET /api/query/context/:chunkId
  app.get<{ Params: { chunkId: string } }>("/api/query/context/:chunkId", async (req, reply) => {
    try {
      const context = await coordinator.chunkContext(req.params.chunkId);
      if (!context) {
        return reply.code(404).send({ detail: `Chunk ${req.params.chunkId} not found` });
      }
      return context;
    } catch (error) {
      req.log.error({ err: error }, "context lookup failed");
      return reply.code(500).send({ detail: `Context lookup failed: ${errorMessage(error)}` });
    }
  });
}
