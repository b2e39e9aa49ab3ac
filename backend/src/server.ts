/* Backend Server Entry Point */
import "./config/otel"; // Bootstrap OpenTelemetry before loading instrumented modules
import Fastify from "fastify";
import cors from "@fastify/cors";
import { v4 as uuidv4 } from "uuid";
import { env } from "./config/env";
import { CACHE_BACKEND, PORT_BACKEND, QDRANT_API_KEY, QDRANT_URL, VECTOR_BACKEND } from "./config/constants";
import { requestCounter } from "./config/metrics";
import { closePool } from "./db/client";
import { createServices, type Services } from "./services/orchestration/registry";
import { queryRoutes } from "./routes/query";
import { cacheRoutes } from "./routes/cache";
import { entityRoutes } from "./routes/entities";
import { healthRoutes } from "./routes/health";
import { statsRoutes } from "./routes/stats";

/**
 * Qdrant Cloud rejects unauthenticated requests; fail at startup instead of
 * on the first query.
 */
function validateQdrantConfig() {
  if (VECTOR_BACKEND !== "qdrant") return;

  const isCloudUrl = QDRANT_URL.includes("cloud.qdrant.io");
  if (isCloudUrl && !QDRANT_API_KEY) {
    throw new Error(
      `Qdrant Cloud URL detected but QDRANT_API_KEY is missing (URL: ${QDRANT_URL}). Set QDRANT_API_KEY in your .env file.`
    );
  }
  console.log(`✓ Qdrant ${isCloudUrl ? "Cloud" : "local/self-hosted"} configuration: ${QDRANT_URL}`);
}

export interface BuildOptions {
  logger?: boolean;
}

export async function build(services: Services = createServices(), opts: BuildOptions = {}) {
  const app = Fastify({ logger: opts.logger ?? true, genReqId: () => uuidv4() });

  if (services.cache) {
    app.log.info(`Semantic cache enabled (${CACHE_BACKEND} store)`);
    await services.cache.init();
  } else {
    app.log.info("Semantic cache disabled");
  }

  await app.register(cors, { origin: env.CORS_ORIGIN, credentials: true });

  app.addHook("onResponse", async (req, reply) => {
    requestCounter.labels(req.routeOptions.url ?? "unmatched", String(reply.statusCode)).inc();
  });

  await healthRoutes(app, services);
  await queryRoutes(app, services);
  await cacheRoutes(app, services);
  await entityRoutes(app, services);
  await statsRoutes(app, services);

  return app;
}

async function start() {
  validateQdrantConfig();
  const services = createServices();
  const app = await build(services);
  await app.listen({ port: PORT_BACKEND, host: "0.0.0.0" });
  app.log.info(`Backend listening on http://localhost:${PORT_BACKEND}`);

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    app.log.info("Shutting down");
    await app.close();
    await services.cache?.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("Shutdown failed", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

// Start server if run directly (not imported)
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
