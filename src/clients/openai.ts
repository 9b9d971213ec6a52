import OpenAI from "openai";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { lazyClient, mockClientsEnabled, retryWithBackoff, unhealthy, type HealthReport } from "./client-support.js";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatCompletionResult {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface OpenAISingleton {
  embed: (input: string, model?: string) => Promise<number[]>;
  complete: (request: ChatCompletionRequest) => Promise<ChatCompletionResult>;
  healthCheck: () => Promise<HealthReport>;
}

const REQUEST_TIMEOUT_MS = 7000;
const MOCK_EMBEDDING_DIMENSIONS = 8;

// Same text, same vector: mock mode ranks identical claim texts identically.
export const mockEmbedding = (input: string): number[] => {
  const vector = new Array<number>(MOCK_EMBEDDING_DIMENSIONS).fill(0);
  [...input.toLowerCase()].forEach((char, index) => {
    const slot = index % MOCK_EMBEDDING_DIMENSIONS;
    vector[slot] = (vector[slot] ?? 0) + char.charCodeAt(0) / 1000;
  });
  return vector;
};

const toMessageParam = ({ role, content }: ChatMessage) => {
  switch (role) {
    case "system":
      return { role: "system" as const, content };
    case "assistant":
      return { role: "assistant" as const, content };
    case "user":
      return { role: "user" as const, content };
  }
};

const mockClient: OpenAISingleton = {
  async embed(input) {
    return mockEmbedding(input);
  },
  async complete(request) {
    const question = request.messages.filter((message) => message.role === "user").at(-1)?.content ?? "";
    return {
      content: `Mock answer for: ${question.split("\n")[0] ?? ""}`,
      model: request.model ?? config.OPENAI_MODEL
    };
  },
  async healthCheck() {
    return { status: "ok" };
  }
};

export function createOpenAIClient(client: OpenAI): OpenAISingleton {
  return {
    async embed(input, model = config.OPENAI_EMBEDDING_MODEL) {
      const response = await client.embeddings.create({ model, input });
      const vector = response.data[0]?.embedding ?? [];
      if (vector.length === 0) {
        throw new Error("Embedding response missing vector payload.");
      }
      return vector;
    },
    async complete({ messages, model = config.OPENAI_MODEL, temperature, maxTokens }) {
      const response = await client.chat.completions.create({
        model,
        messages: messages.map(toMessageParam),
        temperature,
        max_tokens: maxTokens
      });
      const usage = response.usage;
      return {
        content: response.choices[0]?.message.content ?? "",
        model: response.model,
        ...(usage
          ? {
              usage: {
                promptTokens: usage.prompt_tokens,
                completionTokens: usage.completion_tokens,
                totalTokens: usage.total_tokens
              }
            }
          : {})
      };
    },
    async healthCheck() {
      try {
        await retryWithBackoff("openai", { attempts: 2, baseDelayMs: 300 }, () =>
          client.models.retrieve(config.OPENAI_MODEL, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) })
        );
        return { status: "ok" };
      } catch (error) {
        return unhealthy(error);
      }
    }
  };
}

const openai = lazyClient("openai", async () => {
  if (mockClientsEnabled()) {
    logInfo("clients.openai.ready", {}, { backend: "mock" });
    return mockClient;
  }
  const client = new OpenAI({ apiKey: config.OPENAI_API_KEY, maxRetries: 2, timeout: REQUEST_TIMEOUT_MS });
  logInfo("clients.openai.ready", {}, { backend: "openai", model: config.OPENAI_MODEL });
  return createOpenAIClient(client);
});

export const getOpenAIClient = (): Promise<OpenAISingleton> => openai.get();
export const shutdownOpenAIClient = (): Promise<void> => openai.shutdown();
export const resetOpenAIClientForTests = (): void => openai.reset();
