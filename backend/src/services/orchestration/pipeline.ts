// Orchestration - retrieval/generation state machine
import type { SearchType, SourceInfo } from "../../../../shared/types";
import type { HybridRetriever } from "../retrieval";
import { UNKNOWN_TITLE } from "../retrieval";
import type { Generator } from "../generation";
import { defaultRoutePolicy, type RoutePolicy } from "./classifier";
import { addEvent, withSpan } from "../../config/otel";
import { routeDecisionsCounter } from "../../config/metrics";
import { GenerationError, RagError, errorMessage } from "../../utils/errors";

export type PipelineState = "ROUTE" | "VECTOR" | "HYBRID" | "GENERATE" | "DONE";

export type Retriever = Pick<HybridRetriever, "vectorSearch" | "hybridSearch">;

export interface PipelineResult {
  question: string;
  answer: string;
  sources: SourceInfo[];
  search_type: SearchType;
  steps: string[];
}

interface RunState {
  question: string;
  topK: number;
  embedding?: number[];
  searchType: SearchType;
  context: SourceInfo[];
  answer: string;
  steps: string[];
}

type Transition = (s: RunState) => Promise<PipelineState>;

export function buildPrompt(question: string, context: SourceInfo[]): string {
  const contextText =
    context.length > 0
      ? context.map((ctx, idx) => `Source ${idx + 1}:\n${ctx.text}`).join("\n\n")
      : "(no relevant passages found)";

  return [
    "Answer the question based on the context. Be concise and precise.",
    "",
    "Context:",
    contextText,
    "",
    `Question: ${question}`,
    "",
    "Answer:"
  ].join("\n");
}

/**
 * ROUTE → {VECTOR | HYBRID} → GENERATE → DONE.
 * Retrieval and generation errors propagate; nothing here touches the cache.
 */
export class RagPipeline {
  private readonly transitions: Record<Exclude<PipelineState, "DONE">, Transition>;

  constructor(
    private retriever: Retriever,
    private generator: Generator,
    private router: RoutePolicy = defaultRoutePolicy
  ) {
    this.transitions = {
      ROUTE: (s) => this.route(s),
      VECTOR: (s) => this.vector(s),
      HYBRID: (s) => this.hybrid(s),
      GENERATE: (s) => this.generate(s)
    };
  }

  async run(question: string, topK: number, embedding?: number[]): Promise<PipelineResult> {
    return await withSpan(
      "pipeline.run",
      async () => {
        const s: RunState = {
          question,
          topK,
          embedding,
          searchType: "hybrid",
          context: [],
          answer: "",
          steps: []
        };

        let state: PipelineState = "ROUTE";
        while (state !== "DONE") {
          const next: PipelineState = await this.transitions[state](s);
          addEvent("pipeline.transition", { from: state, to: next });
          state = next;
        }

        return {
          question: s.question,
          answer: s.answer,
          sources: s.context,
          search_type: s.searchType,
          steps: s.steps
        };
      },
      { topK, questionLength: question.length }
    );
  }

  private async route(s: RunState): Promise<PipelineState> {
    s.searchType = this.router.classify(s.question);
    routeDecisionsCounter.labels(s.searchType).inc();
    s.steps.push(`Route: ${s.searchType} search`);
    console.log(`[Pipeline] Routed "${s.question.slice(0, 50)}" to ${s.searchType} search`);
    return s.searchType === "vector" ? "VECTOR" : "HYBRID";
  }

  private async vector(s: RunState): Promise<PipelineState> {
    const hits = await this.retriever.vectorSearch(s.question, s.topK, s.embedding);
    s.context.push(...hits.map((h) => ({ text: h.text, score: h.score, doc_title: UNKNOWN_TITLE })));
    s.steps.push(`Vector search: ${hits.length} results`);
    return "GENERATE";
  }

  private async hybrid(s: RunState): Promise<PipelineState> {
    const results = await this.retriever.hybridSearch(s.question, s.topK, s.embedding);
    s.context.push(...results.map((r) => ({ text: r.enriched_text, score: r.score, doc_title: r.doc_title })));
    s.steps.push(`Hybrid search: ${results.length} results`);
    return "GENERATE";
  }

  private async generate(s: RunState): Promise<PipelineState> {
    const prompt = buildPrompt(s.question, s.context);
    let answer: string;
    try {
      answer = await this.generator.generate(prompt);
    } catch (error) {
      if (error instanceof RagError) throw error;
      throw new GenerationError(`Answer generation failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!answer.trim()) {
      throw new GenerationError("Answer generation returned an empty answer");
    }
    s.answer = answer.trim();
    s.steps.push("Answer generated");
    return "DONE";
  }
}
