import { CHAT_MODEL, EMBEDDING_MODEL, MOCK_OPENAI, PROJECT_NAME } from "./constants";
import { createHash } from "crypto";
import type OpenAI from "openai";

export type Message = { role: "system" | "user" | "assistant"; content: string };

interface OpenAIAdapter {
  embedTexts: (texts: string[], dims: number) => Promise<number[][]>;
  chat: (messages: Message[]) => Promise<string>;
}

// Deterministic pseudo-random number from string
function strSeed(s: string) {
  const h = createHash("sha256").update(s).digest();
  return h.readBigUInt64BE(0) % BigInt(2 ** 32);
}
function seededRand(seed: number) {
  let x = seed >>> 0;
  return () => {
    // Xorshift32
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 0xffffffff;
  };
}

async function mockEmbed(texts: string[], dims: number): Promise<number[][]> {
  return texts.map((t) => {
    const rng = seededRand(Number(strSeed(t)));
    const v = new Array(dims).fill(0).map(() => rng());
    // L2 normalize
    const norm = Math.sqrt(v.reduce((a, b) => a + b * b, 0));
    return v.map((x) => x / (norm || 1));
  });
}

async function mockChat(messages: Message[]): Promise<string> {
  const last = messages[messages.length - 1]?.content || "";
  return `MOCK_RESPONSE: ${last.slice(0, 120)}`;
}

let realOpenAI: OpenAI | null = null;

async function getClient(): Promise<OpenAI> {
  if (!realOpenAI) {
    const { OpenAI } = await import("openai");
    realOpenAI = new OpenAI();
  }
  return realOpenAI;
}

async function realEmbed(texts: string[], dims: number): Promise<number[][]> {
  const client = await getClient();
  const res = await client.embeddings.create({
    input: texts,
    model: EMBEDDING_MODEL,
    dimensions: dims
  });
  return res.data.map((d) => d.embedding);
}

async function realChat(messages: Message[]): Promise<string> {
  const client = await getClient();
  const response = await client.responses.create({
    model: CHAT_MODEL,
    input: messages.map((message) => ({
      role: message.role,
      content: message.content
    })),
    store: false,
    metadata: { app: PROJECT_NAME, purpose: "answer" }
  });

  const outputText = response.output_text?.trim();
  if (outputText) {
    return outputText;
  }

  for (const item of response.output || []) {
    if (item.type === "message") {
      for (const part of item.content) {
        if (part.type === "output_text" && part.text) {
          return part.text.trim();
        }
      }
    }
  }

  return "";
}

export const openaiClient: OpenAIAdapter = {
  embedTexts: (texts, dims) => (MOCK_OPENAI ? mockEmbed(texts, dims) : realEmbed(texts, dims)),
  chat: (messages) => (MOCK_OPENAI ? mockChat(messages) : realChat(messages))
};
