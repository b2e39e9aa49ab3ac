import { describe, it, expect, vi } from "vitest";
import { buildChunkContextSQL, buildVectorSearchSQL, toVectorLiteral } from "../src/db/sql";
import { HybridRetriever, enrichText, type GraphStore, type VectorIndex } from "../src/services/retrieval";
import { toChunkContext } from "../src/services/orchestration/registry";
import { RetrievalError } from "../src/utils/errors";
import type { ChunkContext, VectorHit } from "../../shared/types";

describe("retrieval SQL builders", () => {
  it("orders by pgvector cosine distance", () => {
    const sql = buildVectorSearchSQL(5);
    expect(sql).toMatch(/embedding\s*<=>\s*\$1::vector/);
    expect(sql).toMatch(/LIMIT 5/);
  });

  it("clamps k to a positive integer", () => {
    expect(buildVectorSearchSQL(0)).toMatch(/LIMIT 1\b/);
    expect(buildVectorSearchSQL(2.7)).toMatch(/LIMIT 2\b/);
  });

  it("joins neighbours by chunk_index of the same document", () => {
    const sql = buildChunkContextSQL();
    expect(sql).toMatch(/prev\.chunk_index\s*=\s*c\.chunk_index\s*-\s*1/);
    expect(sql).toMatch(/nxt\.chunk_index\s*=\s*c\.chunk_index\s*\+\s*1/);
    expect(sql).toMatch(/LEFT JOIN documents d ON d\.id = c\.document_id/);
  });

  it("formats a pgvector literal", () => {
    expect(toVectorLiteral([0.5, -1, 2])).toBe("[0.5,-1,2]");
  });

  it("maps a context row to a neighbour record", () => {
    expect(
      toChunkContext({
        chunk_id: "c2",
        document_id: "d1",
        chunk_index: 1,
        current: "two",
        previous: "one",
        next: null,
        document_title: "Doc"
      })
    ).toEqual({
      chunk_id: "c2",
      document_id: "d1",
      position: 1,
      current: "two",
      previous: "one",
      next: null,
      document_title: "Doc"
    });
  });
});

describe("enrichText", () => {
  it("wraps the main passage with both neighbours", () => {
    expect(enrichText("main", { previous: "before", next: "after" })).toBe(
      "[Previous]: before\n\n[Main]: main\n\n[Next]: after"
    );
  });

  it("omits the previous block for the first chunk of a document", () => {
    expect(enrichText("first", { previous: null, next: "second" })).toBe("[Main]: first\n\n[Next]: second");
  });
});

// Three chunks of one document, plus an orphan with no document row.
const CHUNKS: Record<string, ChunkContext> = {
  c1: { chunk_id: "c1", document_id: "d1", position: 0, current: "one", previous: null, next: "two", document_title: "Guide" },
  c2: { chunk_id: "c2", document_id: "d1", position: 1, current: "two", previous: "one", next: "three", document_title: "Guide" },
  c3: { chunk_id: "c3", document_id: "d1", position: 2, current: "three", previous: "two", next: null, document_title: "Guide" },
  orphan: { chunk_id: "orphan", document_id: null, position: 0, current: "lost", previous: null, next: null, document_title: null }
};

const graph: GraphStore = {
  async neighbors(chunkId) {
    return CHUNKS[chunkId] ?? null;
  }
};

function indexReturning(hits: VectorHit[]): VectorIndex {
  return { query: vi.fn(async () => hits) };
}

const embedder = { embed: vi.fn(async () => [0.1, 0.2, 0.3]) };

describe("HybridRetriever", () => {
  it("keeps the index order and scores in vector search", async () => {
    const hits = [
      { chunk_id: "c2", text: "two", score: 0.9 },
      { chunk_id: "c1", text: "one", score: 0.9 },
      { chunk_id: "c3", text: "three", score: 0.4 }
    ];
    const retriever = new HybridRetriever({ embedder, index: indexReturning(hits), graph });

    expect(await retriever.vectorSearch("q", 3)).toEqual(hits);
  });

  it("uses a supplied embedding instead of embedding again", async () => {
    const index = indexReturning([]);
    const embed = vi.fn(async () => [1, 1]);
    const retriever = new HybridRetriever({ embedder: { embed }, index, graph });

    await retriever.vectorSearch("q", 2, [0.5, 0.5]);
    expect(embed).not.toHaveBeenCalled();
    expect(index.query).toHaveBeenCalledWith([0.5, 0.5], 2);
  });

  it("enriches hits with neighbours and document titles", async () => {
    const retriever = new HybridRetriever({
      embedder,
      index: indexReturning([
        { chunk_id: "c1", text: "one", score: 0.8 },
        { chunk_id: "c2", text: "two", score: 0.7 }
      ]),
      graph
    });

    const results = await retriever.hybridSearch("q", 2);
    expect(results).toEqual([
      { chunk_id: "c1", text: "one", score: 0.8, enriched_text: "[Main]: one\n\n[Next]: two", doc_title: "Guide" },
      {
        chunk_id: "c2",
        text: "two",
        score: 0.7,
        enriched_text: "[Previous]: one\n\n[Main]: two\n\n[Next]: three",
        doc_title: "Guide"
      }
    ]);
  });

  it("falls back to Unknown for a chunk without a document title", async () => {
    const retriever = new HybridRetriever({
      embedder,
      index: indexReturning([{ chunk_id: "orphan", text: "lost", score: 0.5 }]),
      graph
    });

    const [result] = await retriever.hybridSearch("q", 1);
    expect(result.doc_title).toBe("Unknown");
    expect(result.enriched_text).toBe("[Main]: lost");
  });

  it("drops hits whose enrichment fails and keeps the rest in order", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const flaky: GraphStore = {
      async neighbors(chunkId) {
        if (chunkId === "c2") throw new Error("graph timeout");
        return CHUNKS[chunkId] ?? null;
      }
    };
    const retriever = new HybridRetriever({
      embedder,
      index: indexReturning([
        { chunk_id: "c1", text: "one", score: 0.9 },
        { chunk_id: "c2", text: "two", score: 0.8 },
        { chunk_id: "missing", text: "?", score: 0.7 },
        { chunk_id: "c3", text: "three", score: 0.6 }
      ]),
      graph: flaky
    });

    const results = await retriever.hybridSearch("q", 4);
    expect(results.map((r) => r.chunk_id)).toEqual(["c1", "c3"]);
    expect(warn).toHaveBeenCalledWith("[Retrieval] Dropping hit c2: graph timeout");
    expect(warn).toHaveBeenCalledWith("[Retrieval] Dropping hit missing: chunk not found in document store");
    warn.mockRestore();
  });

  it("wraps embedding and index failures in RetrievalError", async () => {
    const noEmbed = new HybridRetriever({
      embedder: { embed: async () => Promise.reject(new Error("rate limited")) },
      index: indexReturning([]),
      graph
    });
    await expect(noEmbed.vectorSearch("q", 1)).rejects.toThrow(RetrievalError);
    await expect(noEmbed.vectorSearch("q", 1)).rejects.toThrow("Embedding failed: rate limited");

    const noIndex = new HybridRetriever({
      embedder,
      index: { query: async () => Promise.reject(new Error("connection reset")) },
      graph
    });
    await expect(noIndex.hybridSearch("q", 1)).rejects.toThrow("Vector search failed: connection reset");
  });

  it("returns the neighbour record of one chunk", async () => {
    const retriever = new HybridRetriever({ embedder, index: indexReturning([]), graph });
    expect(await retriever.chunkContext("c3")).toEqual(CHUNKS.c3);
    expect(await retriever.chunkContext("nope")).toBeNull();
  });
});
