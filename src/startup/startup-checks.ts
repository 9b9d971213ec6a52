import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";

export class StartupCheckError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StartupCheckError";
  }
}

export async function runStartupChecks(enabled: boolean = config.RUN_STARTUP_CHECKS): Promise<void> {
  if (!enabled) {
    return;
  }

  const { getPipelineResources } = await import("../modules/rag/default-pipeline.js");
  const { vocabulary, synonyms } = getPipelineResources();

  const { getQdrantClient } = await import("../clients/qdrant.js");
  const qdrant = await getQdrantClient();
  const health = await qdrant.healthCheck();
  if (health.status !== "ok") {
    throw new StartupCheckError(`Vector store is not ready: ${health.details ?? "unknown reason"}`);
  }

  logInfo("startup.checks.complete", {}, {
    vector_backend: qdrant.backend,
    disease_count: vocabulary.diseases.length,
    procedure_count: vocabulary.procedures.length,
    synonym_count: synonyms.length
  });
}
