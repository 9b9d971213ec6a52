import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { ChatOrchestrator, toSafeUserErrorMessage } from "../../modules/chat/chat-orchestrator.js";
import { logInfo } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { resolveRequestId, toValidationError } from "./request-helpers.js";

const chatBodySchema = z.object({
  session_id: z.string().trim().min(1, "session_id is required"),
  message: z.string().trim().min(1, "message is required"),
  top_k: z.number().int().positive().optional(),
  model: z.string().trim().min(1).optional()
});

export interface ChatRoutesDependencies {
  createOrchestrator?: () => Pick<ChatOrchestrator, "runTurn">;
}

export async function registerChatRoutes(app: FastifyInstance, dependencies?: ChatRoutesDependencies): Promise<void> {
  const createOrchestrator = dependencies?.createOrchestrator ?? (() => new ChatOrchestrator());

  app.post("/chat", async (request, reply) => {
    const requestId = resolveRequestId(request);
    const parsed = chatBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422).send(toValidationError(parsed.error, "body"));
      return;
    }

    const orchestrator = createOrchestrator();
    try {
      const result = await orchestrator.runTurn({
        sessionId: parsed.data.session_id,
        message: parsed.data.message,
        topK: parsed.data.top_k,
        model: parsed.data.model,
        requestId
      });
      logInfo("chat.request.complete", { requestId, sessionId: parsed.data.session_id }, {
        quality: result.quality,
        document_count: result.documents.length
      });
      return result;
    } catch (error) {
      reply.code(503).send({ detail: toSafeUserErrorMessage(error) });
      return;
    }
  });
}
