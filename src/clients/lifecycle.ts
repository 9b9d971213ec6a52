import type { FastifyInstance } from "fastify";
import { config } from "../config/index.js";
import { logError, logInfo, logWarn, serializeError } from "../observability/logger.js";
import type { HealthCheckedClient } from "./client-support.js";

export type ManagedClientName = "postgres" | "openai" | "qdrant";

export interface ManagedClient {
  name: ManagedClientName;
  connect(): Promise<HealthCheckedClient>;
  shutdown(): Promise<void>;
}

export interface SignalBinding {
  on(signal: NodeJS.Signals, handler: () => void): void;
  exit(code: number): void;
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClients?: () => Promise<ManagedClient[]>;
  signals?: SignalBinding | false;
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

let signalsBound = false;

const processSignals: SignalBinding = {
  on: (signal, handler) => {
    process.once(signal, handler);
  },
  exit: (code) => process.exit(code)
};

async function loadManagedClients(): Promise<ManagedClient[]> {
  const [postgres, openai, qdrant] = await Promise.all([
    import("./postgres.js"),
    import("./openai.js"),
    import("./qdrant.js")
  ]);
  return [
    { name: "postgres", connect: postgres.getPostgresClient, shutdown: postgres.shutdownPostgresClient },
    { name: "openai", connect: openai.getOpenAIClient, shutdown: openai.shutdownOpenAIClient },
    { name: "qdrant", connect: qdrant.getQdrantClient, shutdown: qdrant.shutdownQdrantClient }
  ];
}

async function shutdownClients(trigger: string, loadClients: () => Promise<ManagedClient[]>): Promise<void> {
  const clients = await loadClients();
  logInfo("clients.shutdown.start", {}, { trigger });
  const outcomes = await Promise.allSettled([...clients].reverse().map((client) => client.shutdown()));
  const failed = outcomes.filter((outcome) => outcome.status === "rejected").length;
  if (failed > 0) {
    logWarn("clients.shutdown.partial_failure", {}, { trigger, failed });
  }
}

export function registerClientLifecycle(app: FastifyInstance, options: ClientLifecycleOptions = {}): void {
  if (!(options.enableBootstrap ?? config.ENABLE_INFRA_BOOTSTRAP)) {
    logInfo("clients.bootstrap.disabled", {}, { hint: "set ENABLE_INFRA_BOOTSTRAP=true to connect on startup" });
    return;
  }
  const loadClients = options.loadClients ?? loadManagedClients;

  app.addHook("onReady", async () => {
    const clients = await loadClients();
    const reports = await Promise.all(
      clients.map(async (client) => [client.name, await (await client.connect()).healthCheck()] as const)
    );
    const statuses = Object.fromEntries(reports.map(([name, report]) => [name, report.status]));
    const degraded = reports.filter(([, report]) => report.status !== "ok");
    if (degraded.length > 0) {
      logWarn("clients.bootstrap.degraded", {}, {
        ...statuses,
        details: Object.fromEntries(degraded.map(([name, report]) => [name, report.details ?? null]))
      });
      return;
    }
    logInfo("clients.bootstrap.complete", {}, statuses);
  });

  app.addHook("onClose", async () => {
    await shutdownClients("onClose", loadClients);
  });

  const signals = options.signals ?? processSignals;
  if (signals === false || signalsBound) {
    return;
  }
  signalsBound = true;
  for (const signal of SHUTDOWN_SIGNALS) {
    signals.on(signal, () => {
      logInfo("clients.signal.received", {}, { signal });
      shutdownClients(signal, loadClients).then(
        () => signals.exit(0),
        (error: unknown) => {
          logError("clients.signal.shutdown_failed", {}, { signal, ...serializeError(error) });
          signals.exit(1);
        }
      );
    });
  }
}

export function resetClientLifecycleStateForTests(): void {
  signalsBound = false;
}
