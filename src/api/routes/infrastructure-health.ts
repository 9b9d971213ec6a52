import type { FastifyInstance } from "fastify";
import type { HealthReport } from "../../clients/client-support.js";
import { logWarn, serializeError } from "../../observability/logger.js";

export async function registerInfrastructureHealthRoute(app: FastifyInstance): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const [openaiModule, postgresModule, qdrantModule] = await Promise.all([
        import("../../clients/openai.js"),
        import("../../clients/postgres.js"),
        import("../../clients/qdrant.js")
      ]);

      const [postgres, openai, qdrant] = await Promise.all([
        postgresModule.getPostgresClient(),
        openaiModule.getOpenAIClient(),
        qdrantModule.getQdrantClient()
      ]);

      const [postgresHealth, openaiHealth, qdrantHealth] = await Promise.all([
        postgres.healthCheck(),
        openai.healthCheck(),
        qdrant.healthCheck()
      ]);

      const clients: Record<string, HealthReport & { backend?: string }> = {
        postgres: postgresHealth,
        openai: openaiHealth,
        qdrant: { ...qdrantHealth, backend: qdrant.backend }
      };
      const degraded = Object.values(clients).some((client) => client.status !== "ok");
      if (degraded) {
        reply.code(503);
      }

      return {
        status: degraded ? "degraded" : "ok",
        clients
      };
    } catch (error) {
      logWarn("infra.health.failed", {}, serializeError(error));
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
