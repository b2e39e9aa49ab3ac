import { EMBEDDING_DIMENSIONS } from "../config/constants";
import { query } from "./client";
import { withSpan } from "../config/otel";

export interface VectorRow {
  id: string;
  content: string;
  vector_sim: number;
}

export interface ChunkContextRow {
  chunk_id: string;
  document_id: string | null;
  chunk_index: number;
  current: string;
  previous: string | null;
  next: string | null;
  document_title: string | null;
}

export function buildVectorSearchSQL(k: number) {
  return `
    SELECT c.id, c.content,
           (1 - (c.embedding <=> $1::vector)) AS vector_sim
    FROM chunks c
    WHERE c.embedding IS NOT NULL
    ORDER BY c.embedding <=> $1::vector ASC
    LIMIT ${Math.max(1, Math.floor(k))}
  `;
}

// Neighbours are the chunks at chunk_index - 1 and + 1 of the same document.
export function buildChunkContextSQL() {
  return `
    SELECT c.id AS chunk_id, c.document_id, c.chunk_index,
           c.content AS current,
           prev.content AS previous,
           nxt.content AS next,
           d.title AS document_title
    FROM chunks c
    LEFT JOIN chunks prev
      ON prev.document_id = c.document_id AND prev.chunk_index = c.chunk_index - 1
    LEFT JOIN chunks nxt
      ON nxt.document_id = c.document_id AND nxt.chunk_index = c.chunk_index + 1
    LEFT JOIN documents d ON d.id = c.document_id
    WHERE c.id = $1
    LIMIT 1
  `;
}

export function toVectorLiteral(embedding: number[]) {
  return `[${embedding.join(",")}]`;
}

export async function vectorSearch(qEmbedding: number[], k: number) {
  return await withSpan(
    "db.vectorSearch",
    async () => {
      const { rows } = await query<VectorRow>(buildVectorSearchSQL(k), [toVectorLiteral(qEmbedding)]);
      return rows.map((r) => ({ ...r, vector_sim: Number(r.vector_sim) }));
    },
    { k }
  );
}

export async function chunkContext(chunkId: string): Promise<ChunkContextRow | null> {
  return await withSpan(
    "db.chunkContext",
    async () => {
      const { rows } = await query<ChunkContextRow>(buildChunkContextSQL(), [chunkId]);
      return rows[0] ?? null;
    },
    { chunkId }
  );
}

export async function countRows(table: "chunks" | "documents") {
  const { rows } = await query<{ count: string }>(`SELECT COUNT(*) AS count FROM ${table}`);
  return parseInt(rows[0]?.count ?? "0", 10);
}

export async function countEmbeddedChunks() {
  const { rows } = await query<{ total: string; embedded: string }>(
    "SELECT COUNT(*) AS total, COUNT(embedding) AS embedded FROM chunks"
  );
  return {
    total: parseInt(rows[0]?.total ?? "0", 10),
    embedded: parseInt(rows[0]?.embedded ?? "0", 10)
  };
}

export function ensureEmbeddingDimensions(vec: number[]) {
  if (vec.length !== EMBEDDING_DIMENSIONS) {
    throw new Error(
      `Embedding dimension mismatch: expected ${EMBEDDING_DIMENSIONS}, got ${vec.length}`
    );
  }
}
