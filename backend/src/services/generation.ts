/* Answer generation */
import { openaiClient } from "../config/openai";
import { withSpan } from "../config/otel";
import { withRetry } from "../utils/retry";

export interface Generator {
  generate(prompt: string): Promise<string>;
}

export async function generateText(prompt: string) {
  return await withSpan(
    "generation.generate",
    () =>
      withRetry(
        () =>
          openaiClient.chat([
            { role: "system", content: "You answer questions using only the supplied context." },
            { role: "user", content: prompt }
          ]),
        { maxRetries: 1, initialDelayMs: 500, label: "generation" }
      ),
    { promptLength: prompt.length }
  );
}

export const openAIGenerator: Generator = { generate: generateText };
