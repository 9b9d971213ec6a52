import { getOpenAIClient } from "../../clients/openai.js";
import { getQdrantClient } from "../../clients/qdrant.js";
import type { ScoredPoint, VectorCondition, VectorFilter } from "../../clients/vector-store.js";
import { logDebug } from "../../observability/logger.js";
import type { AmountThreshold, RetrievalFilters, SearchHit, SourceTag, VectorSearch } from "./types.js";

export interface VectorSearchDependencies {
  getOpenAIClient?: typeof getOpenAIClient;
  getQdrantClient?: typeof getQdrantClient;
  collections: Record<SourceTag, string>;
  embeddingModel?: string;
  logDebug?: typeof logDebug;
}

export class VectorSearchError extends Error {
  readonly source: SourceTag;

  constructor(source: SourceTag, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VectorSearchError";
    this.source = source;
  }
}

const TEXT_KEYS = ["text", "content", "chunk", "page_content"];
const ID_KEYS = ["claim_id", "chunk_id", "doc_id", "id"];

const pickFirstString = (source: Record<string, unknown>, keys: readonly string[]): string | undefined => {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
};

const orMissing = (key: string, condition: VectorCondition): VectorCondition => ({
  should: [condition, { is_empty: { key } }]
});

const toRange = (amount: AmountThreshold): { gt?: number; gte?: number; lt?: number; lte?: number } => {
  switch (amount.comparator) {
    case "gt":
      return { gt: amount.value };
    case "gte":
      return { gte: amount.value };
    case "lt":
      return { lt: amount.value };
    case "lte":
      return { lte: amount.value };
  }
};

// Diseases and procedures match by substring and are re-checked after retrieval instead.
export const buildVectorFilter = (filters: RetrievalFilters | undefined): VectorFilter | undefined => {
  if (!filters) {
    return undefined;
  }

  const must: VectorCondition[] = [];
  if (filters.statuses && filters.statuses.length > 0) {
    must.push(orMissing("claim_status", { key: "claim_status", match: { any: [...filters.statuses] } }));
  }
  if (filters.years && filters.years.length > 0) {
    must.push(orMissing("year", { key: "year", match: { any: [...filters.years] } }));
  }
  if (filters.quarters && filters.quarters.length > 0) {
    must.push(orMissing("quarter", { key: "quarter", match: { any: [...filters.quarters] } }));
  }
  if (filters.amount) {
    must.push(orMissing("claim_amount", { key: "claim_amount", range: toRange(filters.amount) }));
  }

  return must.length > 0 ? { must } : undefined;
};

export const toSearchHit = (point: ScoredPoint): SearchHit | null => {
  const payload = point.payload ?? {};
  const text = pickFirstString(payload, TEXT_KEYS);
  if (!text) {
    return null;
  }

  const id = pickFirstString(payload, ID_KEYS) ?? String(point.id);
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!TEXT_KEYS.includes(key)) {
      metadata[key] = value;
    }
  }

  return {
    id,
    score: Number.isFinite(point.score) ? point.score : 0,
    text,
    metadata
  };
};

export const createVectorSearch = (dependencies: VectorSearchDependencies): VectorSearch => {
  const resolveOpenAI = dependencies.getOpenAIClient ?? getOpenAIClient;
  const resolveQdrant = dependencies.getQdrantClient ?? getQdrantClient;
  const debug = dependencies.logDebug ?? logDebug;

  return {
    async search(source, queryText, k, filters) {
      const collection = dependencies.collections[source];
      let points: ScoredPoint[];
      try {
        const openai = await resolveOpenAI();
        const vector = await openai.embed(queryText, dependencies.embeddingModel);
        const { client } = await resolveQdrant();
        points = await client.search(collection, {
          vector,
          limit: Math.max(1, k),
          with_payload: true,
          filter: buildVectorFilter(filters)
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : "unknown vector search error";
        throw new VectorSearchError(source, `Vector search failed on ${collection}: ${message}`, { cause: error });
      }

      const hits = points.map(toSearchHit).filter((hit): hit is SearchHit => hit !== null);
      debug("rag.vector_search.complete", {}, {
        source,
        collection,
        k,
        raw_point_count: points.length,
        hit_count: hits.length
      });
      return hits;
    }
  };
};
