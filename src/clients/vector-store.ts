export type VectorCondition =
  | { key: string; match: { value: string | number } }
  | { key: string; match: { any: string[] | number[] } }
  | { key: string; range: { gt?: number; gte?: number; lt?: number; lte?: number } }
  | { is_empty: { key: string } }
  | { should: VectorCondition[] };

export type VectorFilter = {
  must: VectorCondition[];
};

export interface VectorSearchRequest {
  vector: number[];
  limit: number;
  with_payload: boolean;
  filter?: VectorFilter;
}

export interface ScoredPoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

// Subset of the Qdrant REST client used by retrieval; the local file store implements the same surface.
export interface VectorStoreClient {
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
  search(collection: string, request: VectorSearchRequest): Promise<ScoredPoint[]>;
}
