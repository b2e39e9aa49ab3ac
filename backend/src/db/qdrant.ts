import { QdrantClient } from "@qdrant/qdrant-js";
import {
  QDRANT_URL,
  QDRANT_API_KEY,
  QDRANT_COLLECTION,
} from "../config/constants";
import { withRetry } from "../utils/retry";
import { withSpan } from "../config/otel";

let client: QdrantClient | null = null;

// Created on first use so that importing this module opens no connection.
export function getQdrantClient() {
  if (!client) {
    client = new QdrantClient({
      url: QDRANT_URL,
      apiKey: QDRANT_API_KEY || undefined,
    });
  }
  return client;
}

export interface QdrantVectorResult {
  chunk_id: string;
  content: string;
  score: number;
}

function payloadString(payload: Record<string, unknown> | null | undefined, key: string): string {
  const value = payload?.[key];
  return typeof value === "string" ? value : "";
}

/**
 * Vector search in Qdrant. The collection is created with cosine distance, so
 * `score` is the cosine similarity and hits arrive in descending score order.
 */
export async function vectorSearchQdrant(
  queryEmbedding: number[],
  k: number
): Promise<QdrantVectorResult[]> {
  return await withSpan(
    "qdrant.search",
    async () => {
      const results = await withRetry(
        () =>
          getQdrantClient().search(QDRANT_COLLECTION, {
            vector: queryEmbedding,
            limit: k,
            with_payload: true,
          }),
        { maxRetries: 2, initialDelayMs: 200, label: "qdrant.search" }
      );

      return results.map((hit) => ({
        chunk_id: payloadString(hit.payload, "chunk_id") || String(hit.id),
        content: payloadString(hit.payload, "content"),
        score: hit.score,
      }));
    },
    { collection: QDRANT_COLLECTION, k }
  );
}

/**
 * Get collection info and stats
 */
export async function getQdrantStats() {
  return await withSpan(
    "qdrant.getStats",
    async () => {
      const info = await getQdrantClient().getCollection(QDRANT_COLLECTION);
      return {
        points_count: info.points_count ?? 0,
        status: info.status,
      };
    },
    { collection: QDRANT_COLLECTION }
  );
}
