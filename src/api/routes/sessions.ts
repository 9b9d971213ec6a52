import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { getConversationStore, type ConversationStorePort } from "../../modules/chat/conversation-store.js";
import { logInfo } from "../../observability/logger.js";
import { resolveRequestId, toValidationError } from "./request-helpers.js";

const sessionParamsSchema = z.object({
  sessionId: z.string().trim().min(1, "sessionId is required")
});

export interface SessionRoutesDependencies {
  getConversationStore?: () => ConversationStorePort;
}

export async function registerSessionRoutes(
  app: FastifyInstance,
  dependencies?: SessionRoutesDependencies
): Promise<void> {
  const resolveStore = dependencies?.getConversationStore ?? getConversationStore;

  app.get("/sessions/:sessionId/history", async (request, reply) => {
    const parsedParams = sessionParamsSchema.safeParse(request.params);
    if (!parsedParams.success) {
      reply.code(422).send(toValidationError(parsedParams.error, "params"));
      return;
    }

    const messages = resolveStore().getHistory(parsedParams.data.sessionId);
    return {
      session_id: parsedParams.data.sessionId,
      messages
    };
  });

  app.delete("/sessions/:sessionId/history", async (request, reply) => {
    const parsedParams = sessionParamsSchema.safeParse(request.params);
    if (!parsedParams.success) {
      reply.code(422).send(toValidationError(parsedParams.error, "params"));
      return;
    }

    const cleared = resolveStore().clear(parsedParams.data.sessionId);
    logInfo("sessions.history.cleared", {
      requestId: resolveRequestId(request),
      sessionId: parsedParams.data.sessionId
    }, { cleared });
    reply.code(204).send();
  });
}
