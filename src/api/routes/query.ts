import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { toSafeUserErrorMessage } from "../../modules/chat/chat-orchestrator.js";
import type { ClaimsPipeline } from "../../modules/rag/pipeline.js";
import { logError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { resolveRequestId, toValidationError } from "./request-helpers.js";

const queryBodySchema = z.object({
  message: z.string().trim().min(1, "message is required"),
  top_k: z.number().int().positive().optional(),
  history: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string()
      })
    )
    .optional()
    .default([])
});

export interface QueryRoutesDependencies {
  getPipeline?: () => Promise<Pick<ClaimsPipeline, "answerQuery">> | Pick<ClaimsPipeline, "answerQuery">;
}

const defaultGetPipeline = async (): Promise<ClaimsPipeline> => {
  const module = await import("../../modules/rag/default-pipeline.js");
  return module.getDefaultClaimsPipeline();
};

export async function registerQueryRoutes(app: FastifyInstance, dependencies?: QueryRoutesDependencies): Promise<void> {
  const getPipeline = dependencies?.getPipeline ?? defaultGetPipeline;

  app.post("/query", async (request, reply) => {
    const requestId = resolveRequestId(request);
    const parsed = queryBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422).send(toValidationError(parsed.error, "body"));
      return;
    }

    try {
      const pipeline = await getPipeline();
      return await pipeline.answerQuery(parsed.data.message, parsed.data.history, {
        topK: parsed.data.top_k,
        requestId
      });
    } catch (error) {
      recordErrorRate("query_exception");
      logError("query.failed", { requestId }, { error: error instanceof Error ? error.message : String(error) });
      reply.code(503).send({ detail: toSafeUserErrorMessage(error) });
      return;
    }
  });
}
