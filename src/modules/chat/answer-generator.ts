import { getOpenAIClient, type ChatCompletionResult, type ChatMessage } from "../../clients/openai.js";
import { logDebug, type CorrelationContext } from "../../observability/logger.js";
import { recordOpenAILatency, recordOpenAIUsage } from "../../observability/metrics.js";

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export interface AnswerGeneratorDependencies {
  getOpenAIClient?: typeof getOpenAIClient;
  defaultModel?: string;
  temperature?: number;
  maxTokens?: number;
  now?: () => number;
}

export interface GenerateAnswerInput {
  messages: ChatMessage[];
  model?: string;
  context?: CorrelationContext;
}

export interface GeneratedAnswer {
  content: string;
  model: string;
  latencyMs: number;
}

export type GenerateAnswer = (input: GenerateAnswerInput) => Promise<GeneratedAnswer>;

export const createAnswerGenerator = (dependencies: AnswerGeneratorDependencies = {}): GenerateAnswer => {
  const resolveClient = dependencies.getOpenAIClient ?? getOpenAIClient;
  const now = dependencies.now ?? Date.now;

  return async (input) => {
    const startedAt = now();
    let result: ChatCompletionResult;
    try {
      const client = await resolveClient();
      result = await client.complete({
        messages: input.messages,
        model: input.model ?? dependencies.defaultModel,
        temperature: dependencies.temperature ?? 0.2,
        maxTokens: dependencies.maxTokens ?? 1024
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown completion error";
      throw new GenerationError(`OpenAI completion failed: ${message}`, { cause: error });
    }

    const latencyMs = now() - startedAt;
    recordOpenAILatency(latencyMs);
    if (result.usage) {
      recordOpenAIUsage(result.usage);
    }

    const content = result.content.trim();
    if (!content) {
      throw new GenerationError("OpenAI completion returned an empty answer.");
    }

    logDebug("chat.generation.complete", input.context ?? {}, {
      model: result.model,
      latency_ms: latencyMs,
      prompt_tokens: result.usage?.promptTokens ?? null,
      completion_tokens: result.usage?.completionTokens ?? null
    });

    return { content, model: result.model, latencyMs };
  };
};
