/* Embedding */
import { EMBEDDING_DIMENSIONS } from "../config/constants";
import { openaiClient } from "../config/openai";
import { ensureEmbeddingDimensions } from "../db/sql";
import { withSpan } from "../config/otel";
import { withRetry } from "../utils/retry";
import type { EmbeddingProvider } from "./retrieval";

export async function embedText(text: string) {
  return await withSpan(
    "embeddings.embedText",
    async () => {
      const [v] = await withRetry(() => openaiClient.embedTexts([text], EMBEDDING_DIMENSIONS), {
        maxRetries: 2,
        initialDelayMs: 250,
        label: "embedding"
      });
      ensureEmbeddingDimensions(v);
      return v;
    },
    { inputLength: text.length }
  );
}

export const openAIEmbeddings: EmbeddingProvider = { embed: embedText };
