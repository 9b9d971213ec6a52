import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig, type QualityThresholds } from "../../config/pipeline.js";
import { logDebug } from "../../observability/logger.js";
import { allSources, requiredSources } from "./query-router.js";
import type { GatewayRequest } from "./retrieval-gateway.js";
import type {
  ActionTag,
  Candidate,
  Intent,
  QualityVerdict,
  QueryVariant,
  ResultSet,
  SourcePlan,
  SourceTag
} from "./types.js";

export type ControllerPhase = "FIRST_PASS" | "FILTERED" | "EXPANDED" | "FILTERED_AFTER_EXPANSION";

export type ControllerStep = "ACCEPT" | "FILTER" | "EXPAND" | "SURFACE";

export const TRANSITIONS: Readonly<Record<ControllerPhase, Readonly<Record<QualityVerdict, ControllerStep>>>> = {
  FIRST_PASS: { HIGH: "ACCEPT", MEDIUM: "FILTER", LOW: "EXPAND" },
  FILTERED: { HIGH: "ACCEPT", MEDIUM: "ACCEPT", LOW: "EXPAND" },
  EXPANDED: { HIGH: "ACCEPT", MEDIUM: "FILTER", LOW: "SURFACE" },
  FILTERED_AFTER_EXPANSION: { HIGH: "ACCEPT", MEDIUM: "ACCEPT", LOW: "SURFACE" }
};

export const nextStep = (phase: ControllerPhase, verdict: QualityVerdict): ControllerStep => TRANSITIONS[phase][verdict];

const MAX_GATEWAY_CALLS = 2;
const MAX_TRANSITIONS = 4;

export const evaluateQuality = (candidates: readonly Candidate[], k: number, thresholds: QualityThresholds): QualityVerdict => {
  const scores = candidates.slice(0, Math.max(1, k)).map((candidate) => candidate.compositeScore);
  const top = scores.length > 0 ? Math.max(...scores) : Number.NEGATIVE_INFINITY;

  if (scores.length === 0 || top < thresholds.lower || scores.length < thresholds.minResultCount) {
    return "LOW";
  }

  const aboveMiddle = scores.filter((score) => score >= thresholds.middle).length;
  if (top > thresholds.upper && aboveMiddle >= thresholds.minHighCount) {
    return "HIGH";
  }

  return "MEDIUM";
};

export interface CorrectiveLoopInput {
  intent: Intent;
  variants: readonly QueryVariant[];
  plan: SourcePlan;
  requestId?: string | null;
  sessionId?: string | null;
  initialActions?: ActionTag[];
}

export interface CorrectiveLoopDependencies {
  retrieve: (request: GatewayRequest) => Promise<ResultSet>;
  rank: (resultSet: ResultSet, intent: Intent) => ResultSet;
  config?: Pick<PipelineConfig, "topK" | "maxK" | "expansionFactor" | "quality" | "latencyBudgetMs">;
  now?: () => number;
  startedAt?: number;
  logDebug?: typeof logDebug;
}

type PassSnapshot = {
  resultSet: ResultSet;
  ranked: Candidate[];
};

const topScore = (candidates: readonly Candidate[]): number => candidates[0]?.compositeScore ?? Number.NEGATIVE_INFINITY;

const pickBestSnapshot = (snapshots: readonly PassSnapshot[]): PassSnapshot | undefined =>
  snapshots.reduce<PassSnapshot | undefined>((best, snapshot) => {
    if (!best) {
      return snapshot;
    }
    const bestTop = topScore(best.ranked);
    const snapshotTop = topScore(snapshot.ranked);
    if (snapshotTop > bestTop || (snapshotTop === bestTop && snapshot.ranked.length > best.ranked.length)) {
      return snapshot;
    }
    return best;
  }, undefined);

export const runCorrectiveLoop = async (
  input: CorrectiveLoopInput,
  dependencies: CorrectiveLoopDependencies
): Promise<ResultSet> => {
  const config = dependencies.config ?? DEFAULT_PIPELINE_CONFIG;
  const now = dependencies.now ?? Date.now;
  const debug = dependencies.logDebug ?? logDebug;
  const startedAt = dependencies.startedAt ?? now();
  const context = { requestId: input.requestId ?? null, sessionId: input.sessionId ?? null };
  const actions: ActionTag[] = [...(input.initialActions ?? [])];
  const snapshots: PassSnapshot[] = [];
  let gatewayCalls = 0;
  let k = config.topK;

  const runPass = async (sources: SourceTag[]): Promise<ResultSet> => {
    gatewayCalls += 1;
    const retrieved = await dependencies.retrieve({
      intent: input.intent,
      variants: input.variants,
      sources,
      requiredSources: requiredSources(input.plan),
      k,
      requestId: input.requestId,
      sessionId: input.sessionId
    });
    actions.push(...retrieved.actions);
    const ranked = dependencies.rank(retrieved, input.intent);
    snapshots.push({ resultSet: ranked, ranked: [...ranked.candidates] });
    return ranked;
  };

  const finish = (resultSet: ResultSet, lowConfidence: boolean): ResultSet => {
    resultSet.actions = actions;
    resultSet.lowConfidence = lowConfidence;
    resultSet.terminal = lowConfidence ? "ACCEPTED_WITH_LOW_CONFIDENCE" : "ACCEPTED";
    return resultSet;
  };

  const surface = (): ResultSet => {
    actions.push("VERIFY_AND_SURFACE");
    const best = pickBestSnapshot(snapshots);
    if (!best) {
      return finish({ candidates: [], quality: "LOW", actions, sources: [], lowConfidence: true }, true);
    }
    best.resultSet.candidates = best.ranked;
    best.resultSet.quality = "LOW";
    return finish(best.resultSet, true);
  };

  const firstPassStartedAt = now();
  let current = await runPass(requiredSources(input.plan));
  const firstPassMs = now() - firstPassStartedAt;
  let phase: ControllerPhase = "FIRST_PASS";

  for (let transition = 0; transition < MAX_TRANSITIONS; transition += 1) {
    const verdict = evaluateQuality(current.candidates, k, config.quality);
    current.quality = verdict;
    const step = nextStep(phase, verdict);
    debug("rag.corrective.transition", context, {
      phase,
      verdict,
      step,
      k,
      candidate_count: current.candidates.length
    });

    if (step === "ACCEPT") {
      if (phase === "FIRST_PASS") {
        actions.push("NONE");
      }
      return finish(current, false);
    }

    if (step === "FILTER") {
      actions.push("FILTER_LOW_SCORES");
      current.candidates = current.candidates.filter((candidate) => candidate.compositeScore >= config.quality.middle);
      phase = phase === "FIRST_PASS" ? "FILTERED" : "FILTERED_AFTER_EXPANSION";
      continue;
    }

    if (step === "EXPAND" && gatewayCalls < MAX_GATEWAY_CALLS) {
      const elapsedMs = now() - startedAt;
      if (elapsedMs + firstPassMs > config.latencyBudgetMs) {
        actions.push("RETRY_SKIPPED_BUDGET");
        return surface();
      }
      actions.push("EXPAND_SEARCH");
      k = Math.min(Math.ceil(k * config.expansionFactor), config.maxK);
      current = await runPass(allSources(input.plan));
      phase = "EXPANDED";
      continue;
    }

    return surface();
  }

  return surface();
};
