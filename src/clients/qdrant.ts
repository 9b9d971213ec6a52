import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { lazyClient, mockClientsEnabled, retryWithBackoff, unhealthy, type HealthReport } from "./client-support.js";
import { createLocalVectorStoreClient, resolveStorePath } from "./local-vector-store.js";
import type { VectorStoreClient } from "./vector-store.js";

export type VectorBackend = "qdrant" | "local-file" | "mock";

export interface QdrantSingleton {
  client: VectorStoreClient;
  backend: VectorBackend;
  healthCheck: () => Promise<HealthReport>;
}

const claimCollections = (): string[] => [config.QDRANT_CLAIMS_COLLECTION, config.QDRANT_POLICY_COLLECTION];

export async function checkClaimCollections(
  client: VectorStoreClient,
  required: readonly string[] = claimCollections()
): Promise<HealthReport> {
  try {
    const { collections } = await client.getCollections();
    const present = new Set(collections.map(({ name }) => name));
    const missing = required.filter((name) => !present.has(name));
    return missing.length === 0 ? { status: "ok" } : { status: "error", details: `missing collections: ${missing.join(", ")}` };
  } catch (error) {
    return unhealthy(error);
  }
}

const singletonFor = (backend: VectorBackend, client: VectorStoreClient): QdrantSingleton => {
  logInfo("clients.qdrant.ready", {}, { backend, collections: claimCollections() });
  return { client, backend, healthCheck: () => checkClaimCollections(client) };
};

async function connect(): Promise<QdrantSingleton> {
  if (mockClientsEnabled()) {
    return singletonFor("mock", {
      async getCollections() {
        return { collections: claimCollections().map((name) => ({ name })) };
      },
      async search() {
        return [];
      }
    });
  }

  if (!config.QDRANT_URL) {
    return singletonFor("local-file", createLocalVectorStoreClient(resolveStorePath(config.LOCAL_VECTOR_STORE_FILE)));
  }

  const client: VectorStoreClient = new QdrantClient({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeout: 5000
  });
  await retryWithBackoff("qdrant", { attempts: 3, baseDelayMs: 250 }, () => client.getCollections());
  return singletonFor("qdrant", client);
}

const qdrant = lazyClient("qdrant", connect);

export const getQdrantClient = (): Promise<QdrantSingleton> => qdrant.get();
export const shutdownQdrantClient = (): Promise<void> => qdrant.shutdown();
export const resetQdrantClientForTests = (): void => qdrant.reset();
