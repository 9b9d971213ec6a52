import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { coerceNumber } from "../modules/rag/claim-metadata.js";
import type { ScoredPoint, VectorCondition, VectorFilter, VectorSearchRequest, VectorStoreClient } from "./vector-store.js";

type StoredPoint = {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
};

type StoreShape = {
  collections: Record<string, StoredPoint[]>;
};

export const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";

export function resolveStorePath(configured: string | undefined, cwd: string = process.cwd()): string {
  const relative = configured && configured.trim().length > 0 ? configured.trim() : DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative) ? relative : path.resolve(cwd, relative);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const left = a[i] ?? 0;
    const right = b[i] ?? 0;
    dot += left * right;
    normA += left * left;
    normB += right * right;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

const isEmptyValue = (value: unknown): boolean =>
  value === undefined || value === null || (Array.isArray(value) && value.length === 0);

const matchesCondition = (payload: Record<string, unknown>, condition: VectorCondition): boolean => {
  if ("should" in condition) {
    return condition.should.some((nested) => matchesCondition(payload, nested));
  }

  if ("is_empty" in condition) {
    return isEmptyValue(payload[condition.is_empty.key]);
  }

  const value = payload[condition.key];

  if ("range" in condition) {
    const numeric = coerceNumber(value);
    if (numeric === undefined) {
      return false;
    }
    const { gt, gte, lt, lte } = condition.range;
    return (
      (gt === undefined || numeric > gt) &&
      (gte === undefined || numeric >= gte) &&
      (lt === undefined || numeric < lt) &&
      (lte === undefined || numeric <= lte)
    );
  }

  if ("any" in condition.match) {
    const accepted: ReadonlyArray<string | number> = condition.match.any;
    return (typeof value === "string" || typeof value === "number") && accepted.includes(value);
  }

  return value === condition.match.value;
};

export function matchesFilter(payload: Record<string, unknown>, filter?: VectorFilter): boolean {
  return (filter?.must ?? []).every((condition) => matchesCondition(payload, condition));
}

const storeSchema = z.object({
  collections: z
    .record(
      z.array(
        z.object({
          id: z.string(),
          vector: z.array(z.number()),
          payload: z.record(z.unknown())
        })
      )
    )
    .default({})
});

async function readStore(filePath: string): Promise<StoreShape> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { collections: {} };
    }
    throw error;
  }

  const parsed = storeSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid local vector store file ${filePath}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return parsed.data;
}

export function createLocalVectorStoreClient(filePath: string = resolveStorePath(undefined)): VectorStoreClient {
  return {
    async getCollections() {
      const store = await readStore(filePath);
      return {
        collections: Object.keys(store.collections).map((name) => ({ name }))
      };
    },

    async search(collection: string, request: VectorSearchRequest): Promise<ScoredPoint[]> {
      const store = await readStore(filePath);
      const points = store.collections[collection] ?? [];
      return points
        .filter((point) => matchesFilter(point.payload, request.filter))
        .map((point) => ({
          id: point.id,
          score: cosineSimilarity(point.vector, request.vector),
          payload: request.with_payload ? point.payload : null
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, Math.max(1, request.limit));
    }
  };
}
