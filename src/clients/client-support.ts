import { logInfo, logWarn, serializeError } from "../observability/logger.js";

export type HealthStatus = "ok" | "error";

export interface HealthReport {
  status: HealthStatus;
  details?: string;
}

export interface HealthCheckedClient {
  healthCheck(): Promise<HealthReport>;
}

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export const mockClientsEnabled = (): boolean => process.env.MOCK_INFRA_CLIENTS === "1";

export const unhealthy = (error: unknown): HealthReport => ({
  status: "error",
  details: error instanceof Error ? error.message : "unknown error"
});

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

// Linear backoff: attempt n waits n * baseDelayMs before the next try.
export async function retryWithBackoff<T>(
  client: string,
  policy: RetryPolicy,
  operation: () => Promise<T>
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= policy.attempts) {
        throw error;
      }
      logWarn("clients.retry", {}, { client, attempt, ...serializeError(error) });
      await sleep(policy.baseDelayMs * attempt);
    }
  }
}

export interface LazyClient<T> {
  get(): Promise<T>;
  shutdown(): Promise<void>;
  reset(): void;
}

export function lazyClient<T>(
  client: string,
  initialize: () => Promise<T>,
  dispose?: (value: T) => Promise<void>
): LazyClient<T> {
  let pending: Promise<T> | null = null;
  let ready: { value: T } | null = null;

  return {
    async get() {
      if (ready) {
        return ready.value;
      }
      pending ??= initialize();
      try {
        const value = await pending;
        ready = { value };
        return value;
      } catch (error) {
        pending = null;
        throw error;
      }
    },
    async shutdown() {
      const current = ready;
      ready = null;
      pending = null;
      if (!current) {
        return;
      }
      await dispose?.(current.value);
      logInfo("clients.shutdown.complete", {}, { client });
    },
    reset() {
      ready = null;
      pending = null;
    }
  };
}
