import { applyModeEnvFile, parseEnv, type Env } from "./env.js";
import { parsePipelineConfig, type PipelineConfig } from "./pipeline.js";

export type { Env } from "./env.js";
export { ConfigurationError, envSchema, parseEnv } from "./env.js";
export type { PipelineConfig } from "./pipeline.js";

export interface ServiceConfiguration {
  service: Readonly<Env>;
  pipeline: Readonly<PipelineConfig>;
}

export function loadConfiguration(rawEnv: NodeJS.ProcessEnv): ServiceConfiguration {
  return {
    service: Object.freeze(parseEnv(rawEnv)),
    pipeline: Object.freeze(parsePipelineConfig(rawEnv))
  };
}

applyModeEnvFile();

const loaded = loadConfiguration(process.env);

export type Config = Readonly<Env>;
export const config: Config = loaded.service;
export const pipelineConfig: Readonly<PipelineConfig> = loaded.pipeline;
