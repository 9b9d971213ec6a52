import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const ENV_FILE_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*?)\s*$/;
const QUOTED_VALUE = /^(["'])(.*)\1$/;
const SQL_TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export class ConfigurationError extends Error {
  constructor(
    readonly scope: "environment" | "pipeline",
    readonly issues: string[]
  ) {
    super(`Invalid ${scope} configuration:\n${issues.join("\n")}`);
    this.name = "ConfigurationError";
  }
}

export const formatIssues = (issues: readonly z.ZodIssue[], fallbackPath: string): string[] =>
  issues.map((issue) => `- ${issue.path.join(".") || fallbackPath}: ${issue.message}`);

export const parseEnvFileLine = (line: string): [string, string] | null => {
  if (/^\s*(?:#|$)/.test(line)) {
    return null;
  }
  const match = ENV_FILE_LINE.exec(line);
  const key = match?.[1];
  if (!match || !key) {
    return null;
  }
  const rawValue = match[2] ?? "";
  const quoted = QUOTED_VALUE.exec(rawValue);
  return [key, quoted ? (quoted[2] ?? "") : rawValue];
};

export interface EnvFileSource {
  exists(filePath: string): boolean;
  read(filePath: string): string;
}

const diskSource: EnvFileSource = {
  exists: (filePath) => fs.existsSync(filePath),
  read: (filePath) => fs.readFileSync(filePath, "utf8")
};

// Values already present in the process environment always win over the file.
export function applyModeEnvFile(
  processEnv: NodeJS.ProcessEnv = process.env,
  options: { cwd?: string; source?: EnvFileSource } = {}
): string | null {
  const cwd = options.cwd ?? process.cwd();
  const source = options.source ?? diskSource;
  const requestedMode = processEnv.APP_MODE?.trim().toLowerCase();
  const modes = requestedMode === "local" || requestedMode === "prod" ? [requestedMode] : ["local", "prod"];

  const filePath = modes.map((mode) => path.join(cwd, `.env.${mode}`)).find((candidate) => source.exists(candidate));
  if (!filePath) {
    return null;
  }

  const entries = source
    .read(filePath)
    .split(/\r?\n/)
    .map(parseEnvFileLine)
    .filter((entry): entry is [string, string] => entry !== null);
  for (const [key, value] of entries) {
    if (processEnv[key] === undefined) {
      processEnv[key] = value;
    }
  }
  return filePath;
}

const flag = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === "boolean" ? value : ["1", "true", "yes", "on"].includes(value.trim().toLowerCase())
  );

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const originList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0)
  );

export const envSchema = z
  .object({
    APP_MODE: z.enum(["prod", "local"]).default("prod"),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z
      .string()
      .optional()
      .transform((value) => value?.trim().toLowerCase())
      .pipe(z.enum(["trace", "debug", "info", "warn", "error"]).default("info")),
    CORS_ORIGINS: originList,
    ENABLE_INFRA_BOOTSTRAP: flag.default(false),
    RUN_STARTUP_CHECKS: flag.default(false),
    OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
    OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    POSTGRES_URL: z.string().min(1, "POSTGRES_URL is required"),
    POSTGRES_POOL_MAX: z.coerce.number().int().positive().default(10),
    CLAIMS_TABLE: z.string().regex(SQL_TABLE_NAME, "CLAIMS_TABLE must be a plain or schema-qualified table name").default("claims"),
    CLAIM_LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
    QDRANT_URL: optionalText,
    QDRANT_API_KEY: optionalText,
    QDRANT_CLAIMS_COLLECTION: z.string().min(1).default("claims"),
    QDRANT_POLICY_COLLECTION: z.string().min(1).default("policy_documents"),
    LOCAL_VECTOR_STORE_FILE: optionalText
  })
  .superRefine((value, ctx) => {
    if (value.APP_MODE === "prod" && !value.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required in prod mode"
      });
    }
    if (value.QDRANT_CLAIMS_COLLECTION === value.QDRANT_POLICY_COLLECTION) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_POLICY_COLLECTION"],
        message: "claims and policy documents need separate collections"
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);
  if (!parsed.success) {
    throw new ConfigurationError("environment", formatIssues(parsed.error.issues, "env"));
  }
  return parsed.data;
}
