import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/tests/**/*.test.ts"],
    globals: true,
    env: {
      MOCK_OPENAI: "1",
      CACHE_BACKEND: "memory",
      VECTOR_BACKEND: "pgvector",
      EMBEDDING_DIMENSIONS: "1536",
      RAG_TOP_K: "3",
      ROUTE_LOCALE: "en",
      ENABLE_OTEL: "false"
    }
  }
});
