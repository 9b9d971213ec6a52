import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ClaimStatus } from "./types.js";

export const CLAIM_STATUSES = ["Approved", "Denied", "Pending", "Partially Approved"] as const satisfies readonly ClaimStatus[];

export const DEFAULT_VOCABULARY_FILE = "data/vocabulary.json";
export const DEFAULT_SYNONYMS_FILE = "data/denial-synonyms.json";

export class VocabularyLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VocabularyLoadError";
  }
}

const phraseSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.toLowerCase());

const vocabularyEntrySchema = z
  .object({
    key: phraseSchema,
    label: z.string().trim().min(1),
    aliases: z.array(phraseSchema).min(1)
  })
  .superRefine((entry, ctx) => {
    if (!entry.label.toLowerCase().includes(entry.key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["key"],
        message: `key "${entry.key}" must be a substring of label "${entry.label}"`
      });
    }
  });

const vocabularySchema = z.object({
  statuses: z.array(z.enum(CLAIM_STATUSES)).min(1),
  diseases: z.array(vocabularyEntrySchema),
  procedures: z.array(vocabularyEntrySchema),
  categoryPhrases: z.object({
    policy: z.array(phraseSchema),
    aggregate: z.array(phraseSchema),
    lookup: z.array(phraseSchema)
  })
});

const synonymTableSchema = z.array(
  z.object({
    phrase: phraseSchema,
    canonical: z.array(z.string().trim().min(1)).min(1)
  })
);

export type VocabularyEntry = {
  readonly key: string;
  readonly label: string;
  readonly aliases: readonly string[];
};

export type Vocabulary = {
  readonly statuses: readonly ClaimStatus[];
  readonly diseases: readonly VocabularyEntry[];
  readonly procedures: readonly VocabularyEntry[];
  readonly categoryPhrases: {
    readonly policy: readonly string[];
    readonly aggregate: readonly string[];
    readonly lookup: readonly string[];
  };
};

export type SynonymEntry = {
  readonly phrase: string;
  readonly canonical: readonly string[];
};

export type SynonymTable = readonly SynonymEntry[];

const freezeEntry = (entry: VocabularyEntry): VocabularyEntry =>
  Object.freeze({ ...entry, aliases: Object.freeze([...entry.aliases]) });

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `- ${issue.path.join(".") || "root"}: ${issue.message}`).join("\n");

export const parseVocabulary = (raw: unknown): Vocabulary => {
  const parsed = vocabularySchema.safeParse(raw);
  if (!parsed.success) {
    throw new VocabularyLoadError(`Invalid vocabulary:\n${formatIssues(parsed.error)}`);
  }

  const value = parsed.data;
  return Object.freeze({
    statuses: Object.freeze([...value.statuses]),
    diseases: Object.freeze(value.diseases.map(freezeEntry)),
    procedures: Object.freeze(value.procedures.map(freezeEntry)),
    categoryPhrases: Object.freeze({
      policy: Object.freeze([...value.categoryPhrases.policy]),
      aggregate: Object.freeze([...value.categoryPhrases.aggregate]),
      lookup: Object.freeze([...value.categoryPhrases.lookup])
    })
  });
};

export const parseSynonymTable = (raw: unknown): SynonymTable => {
  const parsed = synonymTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new VocabularyLoadError(`Invalid synonym table:\n${formatIssues(parsed.error)}`);
  }

  return Object.freeze(
    parsed.data.map((entry) => Object.freeze({ phrase: entry.phrase, canonical: Object.freeze([...entry.canonical]) }))
  );
};

export interface LoadDataFileOptions {
  filePath?: string;
  cwd?: string;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

const readJsonFile = (defaultFile: string, options: LoadDataFileOptions): unknown => {
  const relative = options.filePath ?? defaultFile;
  const resolvedPath = path.isAbsolute(relative) ? relative : path.resolve(options.cwd ?? process.cwd(), relative);
  const readFileSync = options.readFileSync ?? ((filePath: string, encoding: "utf8") => fs.readFileSync(filePath, encoding));

  let content: string;
  try {
    content = readFileSync(resolvedPath, "utf8");
  } catch (error) {
    throw new VocabularyLoadError(`Unable to read ${resolvedPath}`, { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new VocabularyLoadError(`Malformed JSON in ${resolvedPath}`, { cause: error });
  }
};

export const loadVocabulary = (options: LoadDataFileOptions = {}): Vocabulary =>
  parseVocabulary(readJsonFile(DEFAULT_VOCABULARY_FILE, options));

export const loadSynonymTable = (options: LoadDataFileOptions = {}): SynonymTable =>
  parseSynonymTable(readJsonFile(DEFAULT_SYNONYMS_FILE, options));
