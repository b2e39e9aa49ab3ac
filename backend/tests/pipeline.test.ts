import { describe, it, expect, vi } from "vitest";
import { RagPipeline, buildPrompt, type Retriever } from "../src/services/orchestration/pipeline";
import type { Generator } from "../src/services/generation";
import { GenerationError, RetrievalError } from "../src/utils/errors";
import type { ChunkResult, VectorHit } from "../../shared/types";

function fakeRetriever(hits: VectorHit[] = [], enriched: ChunkResult[] = []) {
  return {
    vectorSearch: vi.fn<Retriever["vectorSearch"]>(async () => hits),
    hybridSearch: vi.fn<Retriever["hybridSearch"]>(async () => enriched)
  };
}

function fakeGenerator(answer: string | Error) {
  return {
    generate: vi.fn<Generator["generate"]>(async () => {
      if (answer instanceof Error) throw answer;
      return answer;
    })
  };
}

describe("buildPrompt", () => {
  it("numbers context blocks before the question", () => {
    const prompt = buildPrompt("What is ML?", [
      { text: "ML learns from data.", score: 0.9, doc_title: "A" },
      { text: "It is part of AI.", score: 0.8, doc_title: "B" }
    ]);
    expect(prompt).toBe(
      [
        "Answer the question based on the context. Be concise and precise.",
        "",
        "Context:",
        "Source 1:\nML learns from data.\n\nSource 2:\nIt is part of AI.",
        "",
        "Question: What is ML?",
        "",
        "Answer:"
      ].join("\n")
    );
  });

  it("says so when there is no context", () => {
    expect(buildPrompt("q", [])).toContain("Context:\n(no relevant passages found)\n");
  });
});

describe("RagPipeline", () => {
  it("answers definitional questions from vector hits", async () => {
    const retriever = fakeRetriever([{ chunk_id: "c1", text: "ML learns from data.", score: 0.9 }]);
    const generator = fakeGenerator("  Machine learning.  ");
    const pipeline = new RagPipeline(retriever, generator);

    const result = await pipeline.run("What is ML?", 3);

    expect(result).toEqual({
      question: "What is ML?",
      answer: "Machine learning.",
      sources: [{ text: "ML learns from data.", score: 0.9, doc_title: "Unknown" }],
      search_type: "vector",
      steps: ["Route: vector search", "Vector search: 1 results", "Answer generated"]
    });
    expect(retriever.hybridSearch).not.toHaveBeenCalled();
    expect(generator.generate).toHaveBeenCalledWith(
      buildPrompt("What is ML?", [{ text: "ML learns from data.", score: 0.9, doc_title: "Unknown" }])
    );
  });

  it("answers other questions from enriched hybrid context", async () => {
    const retriever = fakeRetriever(
      [],
      [
        {
          chunk_id: "c2",
          text: "Caches store answers.",
          score: 0.7,
          enriched_text: "[Previous]: Intro.\n\n[Main]: Caches store answers.",
          doc_title: "Caching"
        }
      ]
    );
    const pipeline = new RagPipeline(retriever, fakeGenerator("They skip work."));

    const result = await pipeline.run("How does caching help?", 2);

    expect(result.search_type).toBe("hybrid");
    expect(result.sources).toEqual([
      { text: "[Previous]: Intro.\n\n[Main]: Caches store answers.", score: 0.7, doc_title: "Caching" }
    ]);
    expect(result.steps).toEqual(["Route: hybrid search", "Hybrid search: 1 results", "Answer generated"]);
    expect(retriever.vectorSearch).not.toHaveBeenCalled();
  });

  it("passes a precomputed embedding to the retriever", async () => {
    const retriever = fakeRetriever();
    const pipeline = new RagPipeline(retriever, fakeGenerator("ok"));

    await pipeline.run("Define entropy", 4, [0.1, 0.2]);
    expect(retriever.vectorSearch).toHaveBeenCalledWith("Define entropy", 4, [0.1, 0.2]);
  });

  it("uses the injected route policy", async () => {
    const retriever = fakeRetriever();
    const pipeline = new RagPipeline(retriever, fakeGenerator("ok"), { classify: () => "hybrid" });

    const result = await pipeline.run("What is ML?", 1);
    expect(result.search_type).toBe("hybrid");
    expect(result.steps[1]).toBe("Hybrid search: 0 results");
  });

  it("raises GenerationError when the generator fails", async () => {
    const pipeline = new RagPipeline(fakeRetriever(), fakeGenerator(new Error("model overloaded")));

    const run = pipeline.run("What is ML?", 1);
    await expect(run).rejects.toBeInstanceOf(GenerationError);
    await expect(run).rejects.toThrow("Answer generation failed: model overloaded");
  });

  it("raises GenerationError on an empty answer", async () => {
    const pipeline = new RagPipeline(fakeRetriever(), fakeGenerator("   "));
    await expect(pipeline.run("What is ML?", 1)).rejects.toThrow("empty answer");
  });

  it("lets retrieval errors through unchanged", async () => {
    const retriever = fakeRetriever();
    const failure = new RetrievalError("Vector search failed: down");
    retriever.vectorSearch.mockRejectedValueOnce(failure);
    const generator = fakeGenerator("unused");

    await expect(new RagPipeline(retriever, generator).run("What is ML?", 1)).rejects.toBe(failure);
    expect(generator.generate).not.toHaveBeenCalled();
  });
});
