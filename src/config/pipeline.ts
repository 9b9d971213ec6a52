import { z } from "zod";
import { ConfigurationError, formatIssues } from "./env.js";

const probabilitySchema = z.coerce.number().min(0).max(1);
const bonusSchema = z.coerce.number().min(0).max(1);

export const pipelineEnvSchema = z
  .object({
    RAG_TOP_K: z.coerce.number().int().positive().default(10),
    RAG_MAX_K: z.coerce.number().int().positive().default(50),
    RAG_EXPANSION_FACTOR: z.coerce.number().min(1).default(2),
    RAG_MAX_VARIANTS: z.coerce.number().int().min(1).max(10).default(5),
    RAG_VARIANT_DECAY: probabilitySchema.default(0.8),
    RAG_CLAIM_ID_PREFIX: z.string().min(1).default("CLM"),
    RAG_CLAIM_ID_DIGITS: z.coerce.number().int().positive().default(7),
    RAG_MIN_YEAR: z.coerce.number().int().min(1900).default(2000),
    RAG_MAX_YEAR: z.coerce.number().int().min(1900).optional(),
    RAG_QUALITY_UPPER: probabilitySchema.default(0.6),
    RAG_QUALITY_MIDDLE: probabilitySchema.default(0.45),
    RAG_QUALITY_LOWER: probabilitySchema.default(0.35),
    RAG_MIN_HIGH_COUNT: z.coerce.number().int().min(1).default(3),
    RAG_MIN_RESULT_COUNT: z.coerce.number().int().min(1).default(2),
    RAG_SIMILARITY_FLOOR: probabilitySchema.default(0.2),
    RAG_BONUS_STATUS: bonusSchema.default(0.15),
    RAG_BONUS_DISEASE: bonusSchema.default(0.15),
    RAG_BONUS_PROCEDURE: bonusSchema.default(0.1),
    RAG_BONUS_YEAR: bonusSchema.default(0.1),
    RAG_BONUS_QUARTER: bonusSchema.default(0.05),
    RAG_BONUS_AMOUNT: bonusSchema.default(0.05),
    RAG_BONUS_RECENCY: bonusSchema.default(0.05),
    RAG_RECENCY_HORIZON_DAYS: z.coerce.number().int().positive().default(730),
    RAG_BONUS_SOURCE_PRIORITY: bonusSchema.default(0.05),
    RAG_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    RAG_LATENCY_BUDGET_MS: z.coerce.number().int().positive().default(8000)
  })
  .superRefine((value, ctx) => {
    if (!(value.RAG_QUALITY_LOWER <= value.RAG_QUALITY_MIDDLE && value.RAG_QUALITY_MIDDLE <= value.RAG_QUALITY_UPPER)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RAG_QUALITY_MIDDLE"],
        message: "quality thresholds must satisfy LOWER <= MIDDLE <= UPPER"
      });
    }
    if (value.RAG_MAX_K < value.RAG_TOP_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RAG_MAX_K"],
        message: "RAG_MAX_K must be greater than or equal to RAG_TOP_K"
      });
    }
    if (value.RAG_MAX_YEAR !== undefined && value.RAG_MAX_YEAR < value.RAG_MIN_YEAR) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RAG_MAX_YEAR"],
        message: "RAG_MAX_YEAR must be greater than or equal to RAG_MIN_YEAR"
      });
    }
  });

export interface QualityThresholds {
  upper: number;
  middle: number;
  lower: number;
  minHighCount: number;
  minResultCount: number;
}

export interface RankingWeights {
  similarityFloor: number;
  status: number;
  disease: number;
  procedure: number;
  year: number;
  quarter: number;
  amount: number;
  recency: number;
  recencyHorizonDays: number;
  sourcePriority: number;
}

export interface PipelineConfig {
  topK: number;
  maxK: number;
  expansionFactor: number;
  maxVariants: number;
  variantDecay: number;
  claimIdPrefix: string;
  claimIdDigits: number;
  minYear: number;
  maxYear?: number;
  quality: QualityThresholds;
  ranking: RankingWeights;
  searchTimeoutMs: number;
  latencyBudgetMs: number;
}

export function parsePipelineConfig(rawEnv: Record<string, string | undefined>): PipelineConfig {
  const parsed = pipelineEnvSchema.safeParse(rawEnv);

  if (!parsed.success) {
    throw new ConfigurationError("pipeline", formatIssues(parsed.error.issues, "pipeline"));
  }

  const value = parsed.data;
  return {
    topK: value.RAG_TOP_K,
    maxK: value.RAG_MAX_K,
    expansionFactor: value.RAG_EXPANSION_FACTOR,
    maxVariants: value.RAG_MAX_VARIANTS,
    variantDecay: value.RAG_VARIANT_DECAY,
    claimIdPrefix: value.RAG_CLAIM_ID_PREFIX,
    claimIdDigits: value.RAG_CLAIM_ID_DIGITS,
    minYear: value.RAG_MIN_YEAR,
    maxYear: value.RAG_MAX_YEAR,
    quality: {
      upper: value.RAG_QUALITY_UPPER,
      middle: value.RAG_QUALITY_MIDDLE,
      lower: value.RAG_QUALITY_LOWER,
      minHighCount: value.RAG_MIN_HIGH_COUNT,
      minResultCount: value.RAG_MIN_RESULT_COUNT
    },
    ranking: {
      similarityFloor: value.RAG_SIMILARITY_FLOOR,
      status: value.RAG_BONUS_STATUS,
      disease: value.RAG_BONUS_DISEASE,
      procedure: value.RAG_BONUS_PROCEDURE,
      year: value.RAG_BONUS_YEAR,
      quarter: value.RAG_BONUS_QUARTER,
      amount: value.RAG_BONUS_AMOUNT,
      recency: value.RAG_BONUS_RECENCY,
      recencyHorizonDays: value.RAG_RECENCY_HORIZON_DAYS,
      sourcePriority: value.RAG_BONUS_SOURCE_PRIORITY
    },
    searchTimeoutMs: value.RAG_SEARCH_TIMEOUT_MS,
    latencyBudgetMs: value.RAG_LATENCY_BUDGET_MS
  };
}

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze(parsePipelineConfig({}));
