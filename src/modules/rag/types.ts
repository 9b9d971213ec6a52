export type QueryCategory = "SPECIFIC" | "STATISTICAL" | "POLICY" | "GENERAL";

export type ClaimStatus = "Approved" | "Denied" | "Pending" | "Partially Approved";

export type Quarter = "Q1" | "Q2" | "Q3" | "Q4";

export type AmountComparator = "gt" | "gte" | "lt" | "lte";

export type TemporalRange = {
  years: number[];
  quarters: Quarter[];
};

export type AmountThreshold = {
  comparator: AmountComparator;
  value: number;
};

export type Intent = {
  readonly category: QueryCategory;
  readonly directLookup: boolean;
  readonly claimId?: string;
  readonly temporal?: Readonly<TemporalRange>;
  readonly statuses?: readonly ClaimStatus[];
  readonly diseases?: readonly string[];
  readonly procedures?: readonly string[];
  readonly amount?: Readonly<AmountThreshold>;
  readonly denialReasonHint?: string;
};

export type SourceTag = "structured" | "document";

export type PlanStep = {
  source: SourceTag;
  required: boolean;
};

export type SourcePlan = {
  steps: PlanStep[];
  directLookup?: { claimId: string };
};

export type VariantProvenance = "original" | "synonym-expanded" | "filter-narrowed";

export type QueryVariant = {
  text: string;
  provenance: VariantProvenance;
  weight: number;
};

export type RetrievalFilters = {
  statuses?: readonly ClaimStatus[];
  years?: readonly number[];
  quarters?: readonly Quarter[];
  diseases?: readonly string[];
  procedures?: readonly string[];
  amount?: Readonly<AmountThreshold>;
};

export type SearchHit = {
  id: string;
  score: number;
  text: string;
  metadata: Record<string, unknown>;
};

export interface VectorSearch {
  search(source: SourceTag, queryText: string, k: number, filters?: RetrievalFilters): Promise<SearchHit[]>;
}

export type Candidate = {
  id: string;
  source: SourceTag;
  readonly rawScore: number;
  text: string;
  metadata: Record<string, unknown>;
  weightedScore: number;
  sourceRank: number;
  compositeScore: number;
};

export type QualityVerdict = "HIGH" | "MEDIUM" | "LOW";

export type ActionTag =
  | "NONE"
  | "FILTER_LOW_SCORES"
  | "EXPAND_SEARCH"
  | "VERIFY_AND_SURFACE"
  | "RETRY_SKIPPED_BUDGET"
  | "RETRIEVAL_UNAVAILABLE"
  | "RETRIEVAL_TIMEOUT"
  | "DIRECT_LOOKUP"
  | "DIRECT_LOOKUP_MISS";

export type TerminalState = "ACCEPTED" | "ACCEPTED_WITH_LOW_CONFIDENCE";

export type ResultSet = {
  candidates: Candidate[];
  quality: QualityVerdict;
  actions: ActionTag[];
  sources: SourceTag[];
  lowConfidence: boolean;
  terminal?: TerminalState;
};

export type ConversationTurn = {
  role: "user" | "assistant";
  content: string;
};

export type AnswerQueryOutput = {
  answer_context: ResultSet;
  intent: Intent;
  actions_taken: ActionTag[];
  effective_query: string;
};
