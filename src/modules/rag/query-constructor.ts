import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../../config/pipeline.js";
import { containsPhrase, normalizeForComparison, normalizeWhitespace, replacePhrase } from "./text-matching.js";
import type { Intent, QueryVariant } from "./types.js";
import type { SynonymTable, Vocabulary, VocabularyEntry } from "./vocabulary.js";

export interface QueryConstructorOptions {
  synonyms: SynonymTable;
  vocabulary?: Vocabulary;
  config?: Pick<PipelineConfig, "maxVariants" | "variantDecay">;
}

const labelFor = (key: string, entries: readonly VocabularyEntry[] | undefined): string =>
  entries?.find((entry) => entry.key === key)?.label ?? key;

const collectFilterTerms = (intent: Intent, vocabulary: Vocabulary | undefined): string[] => [
  ...(intent.diseases ?? []).map((key) => labelFor(key, vocabulary?.diseases)),
  ...(intent.procedures ?? []).map((key) => labelFor(key, vocabulary?.procedures)),
  ...(intent.statuses ?? []),
  ...(intent.temporal?.quarters ?? []),
  ...(intent.temporal?.years ?? []).map(String)
];

const buildFilterNarrowedText = (text: string, intent: Intent, vocabulary: Vocabulary | undefined): string | null => {
  const missing = collectFilterTerms(intent, vocabulary).filter((term) => !containsPhrase(text, term));
  if (missing.length === 0) {
    return null;
  }
  return normalizeWhitespace(`${text} ${missing.join(" ")}`);
};

export const constructVariants = (text: string, intent: Intent, options: QueryConstructorOptions): QueryVariant[] => {
  const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
  const decay = config.variantDecay;
  const original = normalizeWhitespace(text);
  const variants: QueryVariant[] = [{ text: original, provenance: "original", weight: 1 }];

  const narrowed = buildFilterNarrowedText(original, intent, options.vocabulary);
  if (narrowed) {
    variants.push({ text: narrowed, provenance: "filter-narrowed", weight: decay });
  }

  let expansionIndex = 0;
  for (const entry of options.synonyms) {
    if (!containsPhrase(original, entry.phrase)) {
      continue;
    }
    for (const canonical of entry.canonical) {
      expansionIndex += 1;
      variants.push({
        text: normalizeWhitespace(replacePhrase(original, entry.phrase, canonical)),
        provenance: "synonym-expanded",
        weight: decay ** expansionIndex
      });
    }
  }

  const seen = new Set<string>();
  return variants
    .map((variant, index) => ({ variant, index }))
    .sort((left, right) => right.variant.weight - left.variant.weight || left.index - right.index)
    .map(({ variant }) => variant)
    .filter((variant) => {
      const key = normalizeForComparison(variant.text);
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    })
    .slice(0, Math.max(1, config.maxVariants));
};
