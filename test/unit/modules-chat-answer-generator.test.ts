import { describe, expect, it, vi } from "vitest";
import type { OpenAISingleton } from "../../src/clients/openai.js";
import { GenerationError, createAnswerGenerator } from "../../src/modules/chat/answer-generator.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";

const buildClient = (complete: OpenAISingleton["complete"]): OpenAISingleton => ({
  embed: vi.fn(),
  complete,
  healthCheck: vi.fn()
});

describe("createAnswerGenerator", () => {
  it("returns trimmed content and records latency and usage", async () => {
    const complete = vi.fn<OpenAISingleton["complete"]>(async () => ({
      content: "  Claim CLM0000001 was approved.  ",
      model: "gpt-4o-mini",
      usage: { promptTokens: 120, completionTokens: 12, totalTokens: 132 }
    }));
    const now = vi.fn<() => number>().mockReturnValueOnce(1000).mockReturnValueOnce(1250);
    const generate = createAnswerGenerator({
      getOpenAIClient: async () => buildClient(complete),
      defaultModel: "gpt-4o-mini",
      now
    });

    const answer = await generate({ messages: [{ role: "user", content: "status?" }] });

    expect(answer).toEqual({ content: "Claim CLM0000001 was approved.", model: "gpt-4o-mini", latencyMs: 250 });
    expect(complete).toHaveBeenCalledWith({
      messages: [{ role: "user", content: "status?" }],
      model: "gpt-4o-mini",
      temperature: 0.2,
      maxTokens: 1024
    });
    const snapshot = getMetricsSnapshot();
    expect(snapshot.openai_usage).toEqual({ promptTokens: 120, completionTokens: 12, totalTokens: 132 });
    expect(snapshot.openai_latency).toEqual({ count: 1, avgMs: 250, minMs: 250, maxMs: 250 });
  });

  it("prefers the requested model", async () => {
    const complete = vi.fn<OpenAISingleton["complete"]>(async (request) => ({
      content: "ok",
      model: request.model ?? "default"
    }));
    const generate = createAnswerGenerator({ getOpenAIClient: async () => buildClient(complete), defaultModel: "a" });

    const answer = await generate({ messages: [], model: "b" });

    expect(answer.model).toBe("b");
  });

  it("wraps completion failures", async () => {
    const complete = vi.fn<OpenAISingleton["complete"]>().mockRejectedValue(new Error("429 rate limited"));
    const generate = createAnswerGenerator({ getOpenAIClient: async () => buildClient(complete) });

    const failure = generate({ messages: [] });

    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toThrow("OpenAI completion failed: 429 rate limited");
  });

  it("rejects empty answers", async () => {
    const complete = vi.fn<OpenAISingleton["complete"]>(async () => ({ content: "   ", model: "m" }));
    const generate = createAnswerGenerator({ getOpenAIClient: async () => buildClient(complete) });

    await expect(generate({ messages: [] })).rejects.toThrow("OpenAI completion returned an empty answer.");
  });
});
