// Observability: tracing
import { context, trace, type Attributes } from "@opentelemetry/api";

import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { Resource } from "@opentelemetry/resources";
import { SemanticResourceAttributes } from "@opentelemetry/semantic-conventions";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { PROJECT_NAME } from "./constants";

/**
 * Bootstraps OpenTelemetry NodeSDK with HTTP/Fastify/PG/ioredis auto-instrumentations.
 * Controlled via env:
 *  - ENABLE_OTEL=true
 *  - OTEL_SERVICE_NAME=semantic-rag-backend
 *  - OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318/v1/traces (default)
 */
const ENABLE_OTEL = process.env.ENABLE_OTEL === "true";
if (ENABLE_OTEL) {
  const serviceName = process.env.OTEL_SERVICE_NAME || `${PROJECT_NAME}-backend`;

  const traceExporter = new OTLPTraceExporter({
    url: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4318/v1/traces",
  });

  const sdk = new NodeSDK({
    resource: new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: serviceName,
    }),
    traceExporter,
    instrumentations: [getNodeAutoInstrumentations()],
  });

  try {
    sdk.start();
    console.log(`[otel] NodeSDK started (${serviceName})`);
  } catch (err) {
    console.error("[otel] NodeSDK start failed", err);
  }

  const shutdown = () => {
    sdk
      .shutdown()
      .then(() => console.log("[otel] NodeSDK shut down"))
      .catch((err: unknown) => console.error("[otel] NodeSDK shutdown error", err));
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

export const tracer = trace.getTracer(PROJECT_NAME);

function toAttributes(attrs?: Record<string, unknown>): Attributes {
  const out: Attributes = {};
  if (!attrs) return out;
  for (const [k, v] of Object.entries(attrs)) {
    if (v === undefined || v === null) continue;
    if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") {
      out[k] = v;
    } else {
      out[k] = JSON.stringify(v);
    }
  }
  return out;
}

export async function withSpan<T>(
  name: string,
  fn: () => Promise<T> | T,
  attrs?: Record<string, unknown>
): Promise<T> {
  return await tracer.startActiveSpan(name, async (span) => {
    span.setAttributes(toAttributes(attrs));
    try {
      const res = await fn();
      return res;
    } catch (e) {
      span.recordException(e instanceof Error ? e : String(e));
      span.setAttribute("error", true);
      throw e;
    } finally {
      span.end();
    }
  });
}

export function addEvent(name: string, attrs?: Record<string, unknown>) {
  const span = trace.getSpan(context.active());
  span?.addEvent(name, toAttributes(attrs));
}
