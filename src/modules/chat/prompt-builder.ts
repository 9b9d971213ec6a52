import type { ChatMessage } from "../../clients/openai.js";
import { buildContextBlock, buildUserPrompt, CLAIMS_ANALYST_SYSTEM_PROMPT } from "../../prompts/index.js";
import type { Candidate, ConversationTurn, Intent, ResultSet } from "../rag/types.js";

export const MAX_PROMPT_HISTORY_MESSAGES = 6;
export const SPECIFIC_CONTEXT_LIMIT = 15;
export const PRIMARY_CONTEXT_LIMIT = 7;
export const SECONDARY_CONTEXT_LIMIT = 3;

export interface PromptBuildInput {
  userText: string;
  history: readonly ConversationTurn[];
  intent: Intent;
  answerContext: ResultSet;
}

export interface PromptBuildOutput {
  systemPrompt: string;
  messages: ChatMessage[];
  documents: Candidate[];
}

// Candidates arrive ranked, so each source keeps its own ordering.
export const selectContextDocuments = (intent: Intent, answerContext: ResultSet): Candidate[] => {
  const { candidates, sources } = answerContext;
  if (intent.category === "SPECIFIC") {
    return candidates.filter((candidate) => candidate.source === "structured").slice(0, SPECIFIC_CONTEXT_LIMIT);
  }

  const [primary, secondary] = sources;
  const primaryDocuments = candidates
    .filter((candidate) => candidate.source === primary)
    .slice(0, PRIMARY_CONTEXT_LIMIT);
  const secondaryDocuments =
    secondary === undefined
      ? []
      : candidates.filter((candidate) => candidate.source === secondary).slice(0, SECONDARY_CONTEXT_LIMIT);
  return [...primaryDocuments, ...secondaryDocuments];
};

export const buildPrompt = (input: PromptBuildInput): PromptBuildOutput => {
  const documents = selectContextDocuments(input.intent, input.answerContext);
  const history = input.history.slice(-MAX_PROMPT_HISTORY_MESSAGES).map((turn) => ({
    role: turn.role,
    content: turn.content
  }));

  return {
    systemPrompt: CLAIMS_ANALYST_SYSTEM_PROMPT,
    documents,
    messages: [
      { role: "system", content: CLAIMS_ANALYST_SYSTEM_PROMPT },
      ...history,
      {
        role: "user",
        content: buildUserPrompt({
          question: input.userText,
          context: buildContextBlock(documents.map((document) => document.text)),
          lowConfidence: input.answerContext.lowConfidence
        })
      }
    ]
  };
};
