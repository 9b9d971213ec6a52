import type { FastifyInstance } from "fastify";
import { fileURLToPath } from "node:url";
import { config } from "./config/index.js";
import { buildApp } from "./app.js";
import { logError, logInfo, serializeError } from "./observability/logger.js";
import { runStartupChecks } from "./startup/startup-checks.js";

export async function bootstrap(port: number = config.PORT): Promise<FastifyInstance> {
  await runStartupChecks();

  const app = await buildApp();
  const address = await app.listen({ host: "0.0.0.0", port });
  logInfo("server.listening", {}, { address, mode: config.APP_MODE });
  return app;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    logError("server.startup_failed", {}, serializeError(error));
    process.exitCode = 1;
  });
}
