import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { config } from "./config/index.js";
import { registerClientLifecycle } from "./clients/lifecycle.js";
import { registerHealthRoute } from "./api/routes/health.js";
import { registerInfrastructureHealthRoute } from "./api/routes/infrastructure-health.js";
import { registerApiRoutes, type ApiRoutesDependencies } from "./api/routes/index.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";

export interface BuildAppOptions {
  apiDependencies?: ApiRoutesDependencies;
  registerInfrastructureHealth?: boolean;
  logger?: boolean;
  corsOrigins?: readonly string[];
}

// An empty allow-list disables cross-origin access instead of opening it.
export const corsOptionsFor = (origins: readonly string[]) => ({
  origin: origins.length > 0 ? [...origins] : false,
  methods: ["GET", "POST", "DELETE", "OPTIONS"],
  allowedHeaders: ["Content-Type", "X-Request-Id"],
  exposedHeaders: ["X-Request-Id"]
});

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? config.APP_MODE === "prod" });

  await app.register(cors, corsOptionsFor(options.corsOrigins ?? config.CORS_ORIGINS));

  registerRequestMetricsHooks(app);
  registerClientLifecycle(app);
  await registerHealthRoute(app);
  await registerMetricsRoutes(app);
  if (options.registerInfrastructureHealth ?? true) {
    await registerInfrastructureHealthRoute(app);
  }
  await registerApiRoutes(app, options.apiDependencies);

  return app;
}
