import pg from "pg";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { lazyClient, mockClientsEnabled, retryWithBackoff, unhealthy, type HealthReport } from "./client-support.js";

export interface QueryablePool {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export interface PostgresSingleton {
  pool: QueryablePool;
  claimsTable: string;
  healthCheck: () => Promise<HealthReport>;
}

export interface ClaimsPoolSettings {
  connectionString: string;
  maxConnections: number;
  claimsTable: string;
  lookupTimeoutMs: number;
}

export const claimsPoolSettings = (): ClaimsPoolSettings => ({
  connectionString: config.POSTGRES_URL,
  maxConnections: config.POSTGRES_POOL_MAX,
  claimsTable: config.CLAIMS_TABLE,
  lookupTimeoutMs: config.CLAIM_LOOKUP_TIMEOUT_MS
});

// A reachable server without the claims table is unhealthy.
export const claimsReadinessQuery = (claimsTable: string): string => `SELECT 1 FROM ${claimsTable} LIMIT 1`;

export const createPoolOptions = (settings: ClaimsPoolSettings): pg.PoolConfig => ({
  connectionString: settings.connectionString,
  max: settings.maxConnections,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: settings.lookupTimeoutMs,
  statement_timeout: settings.lookupTimeoutMs,
  application_name: "claims-rag-service"
});

const mockPool: QueryablePool = {
  async query() {
    return { rows: [] };
  },
  async end() {
    return;
  }
};

async function connect(settings: ClaimsPoolSettings): Promise<PostgresSingleton> {
  if (mockClientsEnabled()) {
    logInfo("clients.postgres.ready", {}, { backend: "mock", claims_table: settings.claimsTable });
    return {
      pool: mockPool,
      claimsTable: settings.claimsTable,
      async healthCheck() {
        return { status: "ok" };
      }
    };
  }

  const pool: QueryablePool = new pg.Pool(createPoolOptions(settings));
  const readinessQuery = claimsReadinessQuery(settings.claimsTable);
  await retryWithBackoff("postgres", { attempts: 3, baseDelayMs: 250 }, () => pool.query(readinessQuery));
  logInfo("clients.postgres.ready", {}, { backend: "postgres", claims_table: settings.claimsTable });

  return {
    pool,
    claimsTable: settings.claimsTable,
    async healthCheck() {
      try {
        await pool.query(readinessQuery);
        return { status: "ok" };
      } catch (error) {
        return unhealthy(error);
      }
    }
  };
}

const postgres = lazyClient("postgres", () => connect(claimsPoolSettings()), (client) => client.pool.end());

export const getPostgresClient = (): Promise<PostgresSingleton> => postgres.get();
export const shutdownPostgresClient = (): Promise<void> => postgres.shutdown();
export const resetPostgresClientForTests = (): void => postgres.reset();
