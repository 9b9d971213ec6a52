import { DEFAULT_PIPELINE_CONFIG, type RankingWeights } from "../../config/pipeline.js";
import {
  matchesVocabularyKey,
  readClaimAmount,
  readClaimDate,
  readDisease,
  readProcedure,
  readQuarter,
  readStatus,
  readYear,
  satisfiesAmount
} from "./claim-metadata.js";
import type { Candidate, Intent, ResultSet } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CandidateRankerOptions {
  ranking?: RankingWeights;
  now?: () => number;
}

const metadataBonus = (candidate: Candidate, intent: Intent, weights: RankingWeights): number => {
  const metadata = candidate.metadata;
  let bonus = 0;

  const status = readStatus(metadata);
  if (intent.statuses && status !== undefined && intent.statuses.some((value) => value.toLowerCase() === status)) {
    bonus += weights.status;
  }
  if (intent.diseases && matchesVocabularyKey(readDisease(metadata), intent.diseases)) {
    bonus += weights.disease;
  }
  if (intent.procedures && matchesVocabularyKey(readProcedure(metadata), intent.procedures)) {
    bonus += weights.procedure;
  }

  const year = readYear(metadata);
  if (intent.temporal && year !== undefined && intent.temporal.years.includes(year)) {
    bonus += weights.year;
  }
  const quarter = readQuarter(metadata);
  if (intent.temporal && quarter !== undefined && intent.temporal.quarters.includes(quarter)) {
    bonus += weights.quarter;
  }

  const amount = readClaimAmount(metadata);
  if (intent.amount && amount !== undefined && satisfiesAmount(amount, intent.amount)) {
    bonus += weights.amount;
  }

  return bonus;
};

const recencyBonus = (candidate: Candidate, intent: Intent, weights: RankingWeights, nowMs: number): number => {
  const targetYears = intent.temporal?.years ?? [];
  if (targetYears.length > 0) {
    const year = readYear(candidate.metadata);
    if (year === undefined) {
      return 0;
    }
    const distance = Math.min(...targetYears.map((target) => Math.abs(year - target)));
    return weights.recency / (1 + distance);
  }

  const date = readClaimDate(candidate.metadata);
  if (!date) {
    return 0;
  }
  const ageDays = Math.max(0, (nowMs - date.getTime()) / DAY_MS);
  return weights.recency * Math.max(0, 1 - ageDays / weights.recencyHorizonDays);
};

const sourcePriorityBonus = (candidate: Candidate, sourceCount: number, weights: RankingWeights): number => {
  if (sourceCount <= 1) {
    return 0;
  }
  const rank = Math.min(Math.max(candidate.sourceRank, 0), sourceCount - 1);
  return (weights.sourcePriority * (sourceCount - 1 - rank)) / (sourceCount - 1);
};

export const computeCompositeScore = (
  candidate: Candidate,
  intent: Intent,
  context: { weights: RankingWeights; sourceCount: number; nowMs: number }
): number => {
  const base = candidate.weightedScore;
  if (candidate.rawScore < context.weights.similarityFloor) {
    return base;
  }
  return (
    base +
    metadataBonus(candidate, intent, context.weights) +
    recencyBonus(candidate, intent, context.weights, context.nowMs) +
    sourcePriorityBonus(candidate, context.sourceCount, context.weights)
  );
};

const dateValue = (candidate: Candidate): number => readClaimDate(candidate.metadata)?.getTime() ?? Number.NEGATIVE_INFINITY;

export const compareCandidates = (left: Candidate, right: Candidate): number => {
  if (right.compositeScore !== left.compositeScore) {
    return right.compositeScore - left.compositeScore;
  }
  const leftDate = dateValue(left);
  const rightDate = dateValue(right);
  if (leftDate !== rightDate) {
    return rightDate > leftDate ? 1 : -1;
  }
  if (left.id !== right.id) {
    return left.id < right.id ? -1 : 1;
  }
  if (left.source !== right.source) {
    return left.source < right.source ? -1 : 1;
  }
  return 0;
};

export const rankResultSet = (resultSet: ResultSet, intent: Intent, options: CandidateRankerOptions = {}): ResultSet => {
  const weights = options.ranking ?? DEFAULT_PIPELINE_CONFIG.ranking;
  const nowMs = (options.now ?? Date.now)();
  const sourceCount = resultSet.sources.length;

  for (const candidate of resultSet.candidates) {
    candidate.compositeScore = computeCompositeScore(candidate, intent, { weights, sourceCount, nowMs });
  }
  resultSet.candidates.sort(compareCandidates);
  return resultSet;
};
