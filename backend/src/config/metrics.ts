import { register, Counter, Gauge, Histogram } from "prom-client";

// General Metrics
export const requestCounter = new Counter({
  name: "rag_requests_total",
  help: "Total RAG query requests",
  labelNames: ["route", "status_code"],
});

export const queryDurationHistogram = new Histogram({
  name: "rag_query_duration_seconds",
  help: "Query latency, split by cache outcome",
  labelNames: ["cached"],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
});

// Semantic Cache Metrics
export const cacheLookupsCounter = new Counter({
  name: "semantic_cache_lookups_total",
  help: "Semantic cache lookups by outcome.",
  labelNames: ["outcome"],
});

export const cacheErrorsCounter = new Counter({
  name: "semantic_cache_errors_total",
  help: "Semantic cache storage and serialization errors.",
  labelNames: ["operation"],
});

export const cacheEvictionsCounter = new Counter({
  name: "semantic_cache_evictions_total",
  help: "Total number of FIFO evictions from the semantic cache.",
});

export const cacheSizeGauge = new Gauge({
  name: "semantic_cache_size",
  help: "Live entries in the semantic cache at the last write.",
});

// Retrieval Metrics
export const routeDecisionsCounter = new Counter({
  name: "rag_route_decisions_total",
  help: "Retrieval routes chosen by the query router.",
  labelNames: ["route"],
});

export const enrichmentDropsCounter = new Counter({
  name: "rag_enrichment_drops_total",
  help: "Hybrid search hits dropped because context enrichment failed.",
});

// Expose metrics endpoint
export async function getMetrics() {
  return await register.metrics();
}

export function getContentType() {
  return register.contentType;
}
