import { logError, logInfo, logTrace, serializeError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import type { ClaimsPipeline } from "../rag/pipeline.js";
import type { ActionTag, Candidate, Intent, QualityVerdict, SourceTag } from "../rag/types.js";
import { createAnswerGenerator, type GenerateAnswer } from "./answer-generator.js";
import { getConversationStore, type ConversationStorePort } from "./conversation-store.js";
import { buildPrompt as defaultBuildPrompt } from "./prompt-builder.js";

const SAFE_USER_ERROR = "I could not complete this response right now. Please try again.";
const INFRASTRUCTURE_SAFE_USER_ERROR =
  "The claims service is currently unavailable. Please try again later or contact support.";

const collectErrorText = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error ?? "");
  }

  const parts = [error.name, error.message];
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    parts.push(cause.name, cause.message);
  } else if (cause !== undefined) {
    parts.push(String(cause));
  }
  return parts.filter(Boolean).join(" | ");
};

const isInfrastructureFailure = (error: unknown): boolean =>
  /vectorsearcherror|claimlookuperror|openai|qdrant|postgres|connection error|fetch failed|timeout|econn|embeddings/i.test(
    collectErrorText(error)
  );

export const toSafeUserErrorMessage = (error: unknown): string =>
  isInfrastructureFailure(error) ? INFRASTRUCTURE_SAFE_USER_ERROR : SAFE_USER_ERROR;

export interface ChatTurnInput {
  sessionId: string;
  message: string;
  topK?: number;
  model?: string;
  requestId?: string | null;
}

export interface ChatDocument {
  id: string;
  source: SourceTag;
  score: number;
  raw_score: number;
  text: string;
  metadata: Record<string, unknown>;
}

export interface ChatTurnResult {
  answer: string;
  intent: Intent;
  actions_taken: ActionTag[];
  quality: QualityVerdict;
  low_confidence: boolean;
  effective_query: string;
  documents: ChatDocument[];
}

export interface OrchestratorDependencies {
  pipeline: Pick<ClaimsPipeline, "answerQuery">;
  conversationStore: ConversationStorePort;
  generateAnswer: GenerateAnswer;
  buildPrompt: typeof defaultBuildPrompt;
}

export const toChatDocument = (candidate: Candidate): ChatDocument => ({
  id: candidate.id,
  source: candidate.source,
  score: candidate.compositeScore,
  raw_score: candidate.rawScore,
  text: candidate.text,
  metadata: candidate.metadata
});

export class ChatOrchestrator {
  private readonly dependencies: Partial<OrchestratorDependencies>;

  constructor(dependencies?: Partial<OrchestratorDependencies>) {
    this.dependencies = {
      buildPrompt: defaultBuildPrompt,
      ...dependencies
    };
  }

  private async ensureDependencies(): Promise<OrchestratorDependencies> {
    const pipeline =
      this.dependencies.pipeline ?? (await import("../rag/default-pipeline.js")).getDefaultClaimsPipeline();
    const resolved: OrchestratorDependencies = {
      pipeline,
      conversationStore: this.dependencies.conversationStore ?? getConversationStore(),
      generateAnswer: this.dependencies.generateAnswer ?? createAnswerGenerator(),
      buildPrompt: this.dependencies.buildPrompt ?? defaultBuildPrompt
    };
    Object.assign(this.dependencies, resolved);
    return resolved;
  }

  async runTurn(input: ChatTurnInput): Promise<ChatTurnResult> {
    const dependencies = await this.ensureDependencies();
    const requestId = input.requestId ?? `${Date.now()}-${Math.random().toString(36).slice(2)}`;
    const context = { requestId, sessionId: input.sessionId };
    const startedAt = Date.now();
    const userText = input.message.trim();
    let stage = "chat.load_history";

    try {
      logTrace("chat.orchestrator.stage", context, { stage });
      const history = dependencies.conversationStore.getHistory(input.sessionId);

      stage = "rag.answer_query";
      logTrace("chat.orchestrator.stage", context, { stage, history_count: history.length });
      const pipelineOutput = await dependencies.pipeline.answerQuery(userText, history, {
        topK: input.topK,
        requestId,
        sessionId: input.sessionId
      });
      const { answer_context: answerContext, intent } = pipelineOutput;

      stage = "chat.build_prompt";
      const prompt = dependencies.buildPrompt({
        userText: pipelineOutput.effective_query,
        history,
        intent,
        answerContext
      });
      logTrace("chat.orchestrator.stage", context, { stage, document_count: prompt.documents.length });

      stage = "chat.generate";
      const generated = await dependencies.generateAnswer({
        messages: prompt.messages,
        model: input.model,
        context
      });

      stage = "chat.append_history";
      dependencies.conversationStore.append(
        input.sessionId,
        { role: "user", content: userText },
        { role: "assistant", content: generated.content }
      );

      logInfo("chat.turn.complete", context, {
        category: intent.category,
        quality: answerContext.quality,
        low_confidence: answerContext.lowConfidence,
        actions: pipelineOutput.actions_taken,
        document_count: prompt.documents.length,
        model: generated.model,
        latency_ms: Date.now() - startedAt
      });

      return {
        answer: generated.content,
        intent,
        actions_taken: pipelineOutput.actions_taken,
        quality: answerContext.quality,
        low_confidence: answerContext.lowConfidence,
        effective_query: pipelineOutput.effective_query,
        documents: prompt.documents.map(toChatDocument)
      };
    } catch (error) {
      recordErrorRate("chat_turn_exception");
      logError("chat.turn.failed", context, {
        stage,
        latency_ms: Date.now() - startedAt,
        ...serializeError(error)
      });
      throw error;
    }
  }
}
