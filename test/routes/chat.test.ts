import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { registerChatRoutes } from "../../src/api/routes/chat.js";
import { GenerationError } from "../../src/modules/chat/answer-generator.js";
import type { ChatTurnResult } from "../../src/modules/chat/chat-orchestrator.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";

const turnResult: ChatTurnResult = {
  answer: "Claim CLM0000042 was denied for missing documentation.",
  intent: { category: "SPECIFIC", directLookup: true, claimId: "CLM0000042" },
  actions_taken: ["DIRECT_LOOKUP"],
  quality: "HIGH",
  low_confidence: false,
  effective_query: "Why was CLM0000042 denied?",
  documents: [
    {
      id: "CLM0000042",
      source: "structured",
      score: 1,
      raw_score: 1,
      text: "Claim CLM0000042 denied",
      metadata: { claim_id: "CLM0000042" }
    }
  ]
};

describe("registerChatRoutes", () => {
  it("runs one orchestrator turn per request", async () => {
    const runTurn = vi.fn().mockResolvedValue(turnResult);
    const createOrchestrator = vi.fn(() => ({ runTurn }));
    const app = Fastify();
    await registerChatRoutes(app, { createOrchestrator });

    try {
      const response = await app.inject({
        method: "POST",
        url: "/chat",
        headers: { "x-request-id": "req-chat-1" },
        payload: {
          session_id: " session-9 ",
          message: "Why was CLM0000042 denied?",
          top_k: 3,
          model: "gpt-4o-mini"
        }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual(turnResult);
      expect(createOrchestrator).toHaveBeenCalledTimes(1);
      expect(runTurn).toHaveBeenCalledWith({
        sessionId: "session-9",
        message: "Why was CLM0000042 denied?",
        topK: 3,
        model: "gpt-4o-mini",
        requestId: "req-chat-1"
      });
    } finally {
      await app.close();
    }
  });

  it("returns 422 when session_id is missing", async () => {
    const runTurn = vi.fn();
    const app = Fastify();
    await registerChatRoutes(app, { createOrchestrator: () => ({ runTurn }) });

    try {
      const response = await app.inject({ method: "POST", url: "/chat", payload: { message: "hello" } });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        detail: [{ type: "invalid_type", loc: ["body", "session_id"], msg: "Required" }]
      });
      expect(runTurn).not.toHaveBeenCalled();
      expect(getMetricsSnapshot().error_rates).toEqual({ validation_422: 1 });
    } finally {
      await app.close();
    }
  });

  it("returns 422 for a non-positive top_k", async () => {
    const app = Fastify();
    await registerChatRoutes(app, { createOrchestrator: () => ({ runTurn: vi.fn() }) });

    try {
      const response = await app.inject({
        method: "POST",
        url: "/chat",
        payload: { session_id: "s", message: "hello", top_k: 0 }
      });

      expect(response.statusCode).toBe(422);
      expect(response.json().detail[0].loc).toEqual(["body", "top_k"]);
    } finally {
      await app.close();
    }
  });

  it("hides generation failures behind the infrastructure message", async () => {
    const runTurn = vi.fn().mockRejectedValue(new GenerationError("OpenAI completion failed: 500"));
    const app = Fastify();
    await registerChatRoutes(app, { createOrchestrator: () => ({ runTurn }) });

    try {
      const response = await app.inject({
        method: "POST",
        url: "/chat",
        payload: { session_id: "s", message: "hello" }
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({
        detail: "The claims service is currently unavailable. Please try again later or contact support."
      });
    } finally {
      await app.close();
    }
  });

  it("uses the generic message for unexpected failures", async () => {
    const runTurn = vi.fn().mockRejectedValue(new TypeError("cannot read properties of undefined"));
    const app = Fastify();
    await registerChatRoutes(app, { createOrchestrator: () => ({ runTurn }) });

    try {
      const response = await app.inject({
        method: "POST",
        url: "/chat",
        payload: { session_id: "s", message: "hello" }
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({
        detail: "I could not complete this response right now. Please try again."
      });
    } finally {
      await app.close();
    }
  });
});
