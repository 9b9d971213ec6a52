import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../../config/pipeline.js";
import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import {
  recordCorrectiveActions,
  recordPipelineLatency,
  recordQualityVerdict,
  recordRetrievalLatency
} from "../../observability/metrics.js";
import {
  renderClaimText,
  toClaimMetadata,
  type ClaimRepositoryPort
} from "../claims/claim-repository.js";
import { resolveTurnQuery } from "../chat/retry-intent.js";
import { rankResultSet } from "./candidate-ranker.js";
import { runCorrectiveLoop } from "./corrective-controller.js";
import { extractIntent } from "./intent-extractor.js";
import { constructVariants } from "./query-constructor.js";
import { routeIntent } from "./query-router.js";
import { retrieveCandidates } from "./retrieval-gateway.js";
import type {
  ActionTag,
  AnswerQueryOutput,
  ConversationTurn,
  ResultSet,
  VectorSearch
} from "./types.js";
import type { SynonymTable, Vocabulary } from "./vocabulary.js";

export interface ClaimsPipelineDependencies {
  vectorSearch: VectorSearch;
  claimLookup?: ClaimRepositoryPort;
  vocabulary: Vocabulary;
  synonyms: SynonymTable;
  config?: PipelineConfig;
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  recordPipelineLatency?: typeof recordPipelineLatency;
  recordCorrectiveActions?: typeof recordCorrectiveActions;
  recordQualityVerdict?: typeof recordQualityVerdict;
}

export interface AnswerQueryOptions {
  topK?: number;
  requestId?: string | null;
  sessionId?: string | null;
}

const resolveDependencies = (dependencies: ClaimsPipelineDependencies) => ({
  ...dependencies,
  config: dependencies.config ?? DEFAULT_PIPELINE_CONFIG,
  now: dependencies.now ?? Date.now,
  logInfo: dependencies.logInfo ?? logInfo,
  logWarn: dependencies.logWarn ?? logWarn,
  recordRetrievalLatency: dependencies.recordRetrievalLatency ?? recordRetrievalLatency,
  recordPipelineLatency: dependencies.recordPipelineLatency ?? recordPipelineLatency,
  recordCorrectiveActions: dependencies.recordCorrectiveActions ?? recordCorrectiveActions,
  recordQualityVerdict: dependencies.recordQualityVerdict ?? recordQualityVerdict
});

type ResolvedDependencies = ReturnType<typeof resolveDependencies>;

export class ClaimsPipeline {
  private readonly dependencies: ResolvedDependencies;

  constructor(dependencies: ClaimsPipelineDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async answerQuery(
    text: string,
    history: readonly ConversationTurn[] = [],
    options: AnswerQueryOptions = {}
  ): Promise<AnswerQueryOutput> {
    const deps = this.dependencies;
    const startedAt = deps.now();
    const context = { requestId: options.requestId ?? null, sessionId: options.sessionId ?? null };

    const turn = resolveTurnQuery(text, history);
    const effectiveQuery = turn.query;
    const intent = extractIntent(effectiveQuery, {
      vocabulary: deps.vocabulary,
      synonyms: deps.synonyms,
      config: deps.config,
      now: deps.now
    });
    const plan = routeIntent(intent);

    let resultSet: ResultSet | null = null;
    const initialActions: ActionTag[] = [];
    if (plan.directLookup) {
      resultSet = await this.lookupClaim(plan.directLookup.claimId, context);
      if (!resultSet) {
        initialActions.push("DIRECT_LOOKUP_MISS");
      }
    }

    if (!resultSet) {
      const retrievalStartedAt = deps.now();
      const variants = constructVariants(effectiveQuery, intent, {
        synonyms: deps.synonyms,
        vocabulary: deps.vocabulary,
        config: deps.config
      });
      const topK = Math.min(Math.max(1, options.topK ?? deps.config.topK), deps.config.maxK);
      resultSet = await runCorrectiveLoop(
        {
          intent,
          variants,
          plan,
          requestId: context.requestId,
          sessionId: context.sessionId,
          initialActions
        },
        {
          retrieve: (request) =>
            retrieveCandidates(request, {
              vectorSearch: deps.vectorSearch,
              timeoutMs: deps.config.searchTimeoutMs,
              logWarn: deps.logWarn
            }),
          rank: (set, rankIntent) => rankResultSet(set, rankIntent, { ranking: deps.config.ranking, now: deps.now }),
          config: { ...deps.config, topK },
          now: deps.now,
          startedAt
        }
      );
      deps.recordRetrievalLatency(deps.now() - retrievalStartedAt);
    }

    const latencyMs = deps.now() - startedAt;
    deps.recordPipelineLatency(latencyMs);
    deps.recordCorrectiveActions(resultSet.actions);
    deps.recordQualityVerdict(resultSet.quality);
    deps.logInfo("rag.answer_query.complete", context, {
      category: intent.category,
      direct_lookup: intent.directLookup,
      query_source: turn.source,
      quality: resultSet.quality,
      terminal: resultSet.terminal ?? null,
      actions: resultSet.actions,
      candidate_count: resultSet.candidates.length,
      low_confidence: resultSet.lowConfidence,
      latency_ms: latencyMs
    });

    return {
      answer_context: resultSet,
      intent,
      actions_taken: [...resultSet.actions],
      effective_query: effectiveQuery
    };
  }

  private async lookupClaim(
    claimId: string,
    context: { requestId: string | null; sessionId: string | null }
  ): Promise<ResultSet | null> {
    const { claimLookup } = this.dependencies;
    if (!claimLookup) {
      return null;
    }

    try {
      const record = await claimLookup.fetchById(claimId);
      if (!record) {
        return null;
      }
      return {
        candidates: [
          {
            id: record.claim_id,
            source: "structured",
            rawScore: 1,
            text: renderClaimText(record),
            metadata: toClaimMetadata(record),
            weightedScore: 1,
            sourceRank: 0,
            compositeScore: 1
          }
        ],
        quality: "HIGH",
        actions: ["DIRECT_LOOKUP"],
        sources: ["structured"],
        lowConfidence: false,
        terminal: "ACCEPTED"
      };
    } catch (error) {
      this.dependencies.logWarn("rag.direct_lookup.failed", context, {
        claim_id: claimId,
        ...serializeError(error)
      });
      return null;
    }
  }
}
