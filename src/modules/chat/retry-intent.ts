import type { ConversationTurn } from "../rag/types.js";

// Whole-message match only: a retry phrase opening a longer question is a new question.
const RETRY_MESSAGE =
  /^(?:(?:please|pls)\s+)?(?:try\s+(?:that\s+|it\s+)?again|retry|search\s+again)(?:[\s,:-]+(?<qualifier>.*?))?[\s.!?]*$/iu;

const QUALIFIER_LEAD = /^(?:but|and|with|only)\b[\s,:-]*/iu;

const MAX_QUALIFIER_WORDS = 4;

export type RetryRequest = { kind: "query" } | { kind: "retry"; qualifier: string | null };

export type TurnQuery =
  | { source: "message"; query: string }
  | { source: "previous_turn"; query: string; previousQuery: string; qualifier: string | null }
  | { source: "unresolved_retry"; query: string };

const collapse = (value: string): string => value.replace(/\s+/g, " ").trim();

export function detectRetryRequest(text: string): RetryRequest {
  const match = RETRY_MESSAGE.exec(collapse(text));
  if (!match) {
    return { kind: "query" };
  }

  const qualifier = collapse(collapse(match.groups?.qualifier ?? "").replace(QUALIFIER_LEAD, ""));
  if (!qualifier) {
    return { kind: "retry", qualifier: null };
  }
  return qualifier.split(" ").length > MAX_QUALIFIER_WORDS ? { kind: "query" } : { kind: "retry", qualifier };
}

const lastAnsweredQuestion = (history: readonly ConversationTurn[]): string | undefined =>
  history
    .filter((turn) => turn.role === "user")
    .map((turn) => collapse(turn.content))
    .reverse()
    .find((content) => content.length > 0 && detectRetryRequest(content).kind === "query");

/** Picks the text retrieval runs on: the message itself, or the last real question when the user asks to retry. */
export function resolveTurnQuery(text: string, history: readonly ConversationTurn[]): TurnQuery {
  const query = collapse(text);
  const request = detectRetryRequest(query);
  if (request.kind === "query") {
    return { source: "message", query };
  }

  const previousQuery = lastAnsweredQuestion(history);
  if (previousQuery === undefined) {
    return { source: "unresolved_retry", query };
  }
  return {
    source: "previous_turn",
    query: request.qualifier ? `${previousQuery} ${request.qualifier}` : previousQuery,
    previousQuery,
    qualifier: request.qualifier
  };
}
