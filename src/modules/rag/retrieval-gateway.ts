import { logWarn, serializeError } from "../../observability/logger.js";
import { matchesFilters } from "./claim-metadata.js";
import type {
  ActionTag,
  Candidate,
  Intent,
  QueryVariant,
  ResultSet,
  RetrievalFilters,
  SearchHit,
  SourceTag,
  VectorSearch
} from "./types.js";

const DEFAULT_SEARCH_TIMEOUT_MS = 5000;

export class RetrievalTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RetrievalTimeoutError";
  }
}

export interface GatewayRequest {
  intent: Intent;
  variants: readonly QueryVariant[];
  sources: readonly SourceTag[];
  requiredSources?: readonly SourceTag[];
  k: number;
  requestId?: string | null;
  sessionId?: string | null;
}

export interface RetrievalGatewayDependencies {
  vectorSearch: VectorSearch;
  timeoutMs?: number;
  logWarn?: typeof logWarn;
}

export const buildRetrievalFilters = (intent: Intent): RetrievalFilters | undefined => {
  const filters: RetrievalFilters = {
    ...(intent.statuses ? { statuses: intent.statuses } : {}),
    ...(intent.temporal && intent.temporal.years.length > 0 ? { years: intent.temporal.years } : {}),
    ...(intent.temporal && intent.temporal.quarters.length > 0 ? { quarters: intent.temporal.quarters } : {}),
    ...(intent.diseases ? { diseases: intent.diseases } : {}),
    ...(intent.procedures ? { procedures: intent.procedures } : {}),
    ...(intent.amount ? { amount: intent.amount } : {})
  };
  return Object.keys(filters).length > 0 ? filters : undefined;
};

export const createEmptyResultSet = (sources: readonly SourceTag[], actions: ActionTag[] = []): ResultSet => ({
  candidates: [],
  quality: "LOW",
  actions,
  sources: [...sources],
  lowConfidence: false
});

const withTimeout = async <T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> => {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new RetrievalTimeoutError(`${label} exceeded ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timeoutHandle);
  }
};

type SearchOutcome = {
  source: SourceTag;
  variant: QueryVariant;
  hits: SearchHit[];
};

const toCandidate = (hit: SearchHit, outcome: SearchOutcome, sourceRank: number): Candidate => ({
  id: hit.id,
  source: outcome.source,
  rawScore: hit.score,
  text: hit.text,
  metadata: hit.metadata,
  weightedScore: hit.score * outcome.variant.weight,
  sourceRank,
  compositeScore: hit.score
});

export const retrieveCandidates = async (
  request: GatewayRequest,
  dependencies: RetrievalGatewayDependencies
): Promise<ResultSet> => {
  const timeoutMs = dependencies.timeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
  const warn = dependencies.logWarn ?? logWarn;
  const hardFilter = request.intent.category === "SPECIFIC";
  const filters = hardFilter ? buildRetrievalFilters(request.intent) : undefined;
  const k = Math.max(1, Math.floor(request.k));

  const calls = request.sources.flatMap((source) =>
    request.variants.map(async (variant): Promise<SearchOutcome> => {
      const sourceFilters = source === "structured" ? filters : undefined;
      const hits = await withTimeout(
        dependencies.vectorSearch.search(source, variant.text, k, sourceFilters),
        timeoutMs,
        `search(${source})`
      );
      return { source, variant, hits };
    })
  );

  const settled = await Promise.allSettled(calls);
  const failures = settled.filter((result): result is PromiseRejectedResult => result.status === "rejected");
  const actions: ActionTag[] = [];
  if (failures.length > 0) {
    const timedOut = failures.some((failure) => failure.reason instanceof RetrievalTimeoutError);
    const action: ActionTag = timedOut ? "RETRIEVAL_TIMEOUT" : "RETRIEVAL_UNAVAILABLE";
    const required = request.requiredSources ?? request.sources;
    const requiredAnswered = settled.some(
      (result) => result.status === "fulfilled" && required.includes(result.value.source)
    );
    warn(
      "rag.gateway.failure",
      { requestId: request.requestId ?? null, sessionId: request.sessionId ?? null },
      {
        action,
        failed_calls: failures.length,
        total_calls: settled.length,
        partial: requiredAnswered,
        ...serializeError(failures[0]?.reason)
      }
    );
    if (!requiredAnswered) {
      return createEmptyResultSet(request.sources, [action]);
    }
    actions.push(action);
  }

  const best = new Map<string, Candidate>();
  for (const result of settled) {
    if (result.status !== "fulfilled") {
      continue;
    }
    const outcome = result.value;
    const sourceRank = request.sources.indexOf(outcome.source);
    for (const hit of outcome.hits) {
      if (filters && outcome.source === "structured" && !matchesFilters(hit.metadata, filters)) {
        continue;
      }
      const key = `${outcome.source}:${hit.id}`;
      const incoming = toCandidate(hit, outcome, sourceRank);
      const existing = best.get(key);
      if (!existing) {
        best.set(key, incoming);
        continue;
      }
      const keep = incoming.rawScore > existing.rawScore ? incoming : existing;
      best.set(key, {
        ...keep,
        weightedScore: Math.max(existing.weightedScore, incoming.weightedScore)
      });
    }
  }

  return {
    candidates: [...best.values()],
    quality: "LOW",
    actions,
    sources: [...request.sources],
    lowConfidence: false
  };
};
