import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../../config/pipeline.js";
import { buildPhrasePattern, containsAnyPhrase, containsPhrase } from "./text-matching.js";
import type {
  AmountComparator,
  AmountThreshold,
  ClaimStatus,
  Intent,
  QueryCategory,
  Quarter,
  TemporalRange
} from "./types.js";
import type { SynonymTable, Vocabulary, VocabularyEntry } from "./vocabulary.js";

export interface IntentExtractorOptions {
  vocabulary: Vocabulary;
  synonyms: SynonymTable;
  config?: Pick<PipelineConfig, "claimIdPrefix" | "claimIdDigits" | "minYear" | "maxYear">;
  now?: () => number;
}

export type ExtractionSignals = {
  claimId?: string;
  malformedClaimId: boolean;
  policyPhrase: boolean;
  aggregatePhrase: boolean;
  lookupPhrase: boolean;
  hasFilterValues: boolean;
};

export type CategoryRule = {
  label: QueryCategory;
  directLookup: boolean;
  matches: (signals: ExtractionSignals) => boolean;
};

export const CATEGORY_RULES: readonly CategoryRule[] = Object.freeze([
  { label: "SPECIFIC", directLookup: true, matches: (signals) => signals.claimId !== undefined },
  { label: "SPECIFIC", directLookup: false, matches: (signals) => signals.malformedClaimId },
  { label: "POLICY", directLookup: false, matches: (signals) => signals.policyPhrase },
  { label: "STATISTICAL", directLookup: false, matches: (signals) => signals.aggregatePhrase },
  {
    label: "SPECIFIC",
    directLookup: false,
    matches: (signals) => signals.hasFilterValues || signals.lookupPhrase
  }
]);

export const classifySignals = (signals: ExtractionSignals): { category: QueryCategory; directLookup: boolean } => {
  const rule = CATEGORY_RULES.find((candidate) => candidate.matches(signals));
  if (!rule) {
    return { category: "GENERAL", directLookup: false };
  }
  return { category: rule.label, directLookup: rule.directLookup };
};

const QUARTERS: readonly Quarter[] = ["Q1", "Q2", "Q3", "Q4"];

const ORDINAL_QUARTERS: Record<string, Quarter> = {
  first: "Q1",
  "1st": "Q1",
  second: "Q2",
  "2nd": "Q2",
  third: "Q3",
  "3rd": "Q3",
  fourth: "Q4",
  "4th": "Q4"
};

const AMOUNT_COMPARATORS: Record<string, AmountComparator> = {
  "more than": "gt",
  "greater than": "gt",
  exceeding: "gt",
  over: "gt",
  above: "gt",
  "at least": "gte",
  "less than": "lt",
  under: "lt",
  below: "lt",
  "at most": "lte",
  "up to": "lte"
};

const AMOUNT_PATTERN =
  /(?<![a-z])(more than|greater than|exceeding|over|above|at least|less than|under|below|at most|up to)\s+\$?\s*(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?\s*(k)?(?![a-z0-9])/i;

const sortedUnique = <T extends string | number>(values: Iterable<T>): T[] =>
  [...new Set(values)].sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));

const toQuarter = (index: number): Quarter => QUARTERS[Math.min(3, Math.max(0, index))] ?? "Q1";

const extractClaimIdentifiers = (
  text: string,
  prefix: string,
  digits: number
): { claimId?: string; malformed: boolean; remainder: string } => {
  const pattern = new RegExp(`${prefix.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}(\\d+)(?!\\d)`, "gi");
  let claimId: string | undefined;
  let malformed = false;

  for (const match of text.matchAll(pattern)) {
    const digitRun = match[1] ?? "";
    if (digitRun.length === digits && claimId === undefined) {
      claimId = `${prefix.toUpperCase()}${digitRun}`;
    } else if (digitRun.length !== digits) {
      malformed = true;
    }
  }

  return {
    claimId,
    malformed: claimId === undefined && malformed,
    remainder: text.replace(pattern, " ")
  };
};

const extractAmount = (text: string): { amount?: AmountThreshold; remainder: string } => {
  const match = AMOUNT_PATTERN.exec(text);
  if (!match) {
    return { remainder: text };
  }

  const comparator = AMOUNT_COMPARATORS[(match[1] ?? "").toLowerCase().replace(/\s+/g, " ")];
  const whole = Number.parseInt((match[2] ?? "").replace(/,/g, ""), 10);
  const fraction = match[3] ? Number.parseFloat(`0.${match[3]}`) : 0;
  if (!comparator || !Number.isFinite(whole)) {
    return { remainder: text };
  }

  const multiplier = match[4] ? 1000 : 1;
  return {
    amount: { comparator, value: (whole + fraction) * multiplier },
    remainder: `${text.slice(0, match.index)} ${text.slice(match.index + match[0].length)}`
  };
};

const extractTemporal = (
  text: string,
  validYears: { min: number; max: number },
  nowDate: Date
): TemporalRange | undefined => {
  const years: number[] = [];
  const quarters: Quarter[] = [];
  const currentYear = nowDate.getUTCFullYear();
  const currentQuarterIndex = Math.floor(nowDate.getUTCMonth() / 3);

  for (const match of text.matchAll(/(?<!\d)(\d{4})(?!\d)/g)) {
    const year = Number.parseInt(match[1] ?? "", 10);
    if (year >= validYears.min && year <= validYears.max) {
      years.push(year);
    }
  }

  for (const match of text.matchAll(/(?<![a-z0-9])q([1-4])(?![a-z0-9])/gi)) {
    quarters.push(toQuarter(Number.parseInt(match[1] ?? "1", 10) - 1));
  }

  for (const match of text.matchAll(/(?<![a-z])quarter\s+([1-4])(?!\d)/gi)) {
    quarters.push(toQuarter(Number.parseInt(match[1] ?? "1", 10) - 1));
  }

  for (const match of text.matchAll(/(?<![a-z0-9])(first|second|third|fourth|1st|2nd|3rd|4th)\s+quarter/gi)) {
    const quarter = ORDINAL_QUARTERS[(match[1] ?? "").toLowerCase()];
    if (quarter) {
      quarters.push(quarter);
    }
  }

  for (const match of text.matchAll(/(?<![a-z])(last|previous|this|current)\s+quarter(?![a-z])/gi)) {
    const relative = (match[1] ?? "").toLowerCase();
    if (relative === "last" || relative === "previous") {
      const index = currentQuarterIndex === 0 ? 3 : currentQuarterIndex - 1;
      quarters.push(toQuarter(index));
      years.push(currentQuarterIndex === 0 ? currentYear - 1 : currentYear);
    } else {
      quarters.push(toQuarter(currentQuarterIndex));
      years.push(currentYear);
    }
  }

  for (const match of text.matchAll(/(?<![a-z])(last|previous|this|current)\s+year(?![a-z])/gi)) {
    const relative = (match[1] ?? "").toLowerCase();
    years.push(relative === "last" || relative === "previous" ? currentYear - 1 : currentYear);
  }

  if (years.length === 0 && quarters.length === 0) {
    return undefined;
  }

  return Object.freeze({
    years: sortedUnique(years),
    quarters: sortedUnique(quarters)
  });
};

const extractStatuses = (text: string, statuses: readonly ClaimStatus[]): ClaimStatus[] | undefined => {
  let remaining = text;
  const found = new Set<ClaimStatus>();

  const longestFirst = [...statuses].sort((left, right) => right.length - left.length);
  for (const status of longestFirst) {
    const pattern = new RegExp(buildPhrasePattern(status).source, "gi");
    if (pattern.test(remaining)) {
      found.add(status);
      remaining = remaining.replace(pattern, " ");
    }
  }

  if (found.size === 0 || found.size === statuses.length) {
    return undefined;
  }

  return statuses.filter((status) => found.has(status));
};

const extractVocabularyKeys = (text: string, entries: readonly VocabularyEntry[]): string[] | undefined => {
  const keys = entries
    .filter((entry) => entry.aliases.some((alias) => containsPhrase(text, alias)))
    .map((entry) => entry.key);
  const unique = [...new Set(keys)];
  return unique.length > 0 ? unique : undefined;
};

const freezeList = <T>(values: T[] | undefined): readonly T[] | undefined =>
  values ? Object.freeze([...values]) : undefined;

export const extractIntent = (text: string, options: IntentExtractorOptions): Intent => {
  const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
  const nowDate = new Date((options.now ?? Date.now)());
  const normalizedText = text.replace(/\s+/g, " ").trim();

  const identifiers = extractClaimIdentifiers(normalizedText, config.claimIdPrefix, config.claimIdDigits);
  const amountResult = extractAmount(identifiers.remainder);
  const temporal = extractTemporal(
    amountResult.remainder,
    {
      min: config.minYear,
      max: config.maxYear ?? nowDate.getUTCFullYear() + 1
    },
    nowDate
  );
  const statuses = extractStatuses(amountResult.remainder, options.vocabulary.statuses);
  const diseases = extractVocabularyKeys(normalizedText, options.vocabulary.diseases);
  const procedures = extractVocabularyKeys(normalizedText, options.vocabulary.procedures);
  const denialReasonHint = options.synonyms.find((entry) => containsPhrase(normalizedText, entry.phrase))?.phrase;

  const { category, directLookup } = classifySignals({
    claimId: identifiers.claimId,
    malformedClaimId: identifiers.malformed,
    policyPhrase: containsAnyPhrase(normalizedText, options.vocabulary.categoryPhrases.policy),
    aggregatePhrase: containsAnyPhrase(normalizedText, options.vocabulary.categoryPhrases.aggregate),
    lookupPhrase: containsAnyPhrase(normalizedText, options.vocabulary.categoryPhrases.lookup),
    hasFilterValues: Boolean(
      temporal || statuses || diseases || procedures || amountResult.amount || denialReasonHint
    )
  });

  const intent: Intent = {
    category,
    directLookup,
    ...(directLookup && identifiers.claimId ? { claimId: identifiers.claimId } : {}),
    ...(temporal ? { temporal } : {}),
    ...(statuses ? { statuses: freezeList(statuses) } : {}),
    ...(diseases ? { diseases: freezeList(diseases) } : {}),
    ...(procedures ? { procedures: freezeList(procedures) } : {}),
    ...(amountResult.amount ? { amount: Object.freeze(amountResult.amount) } : {}),
    ...(denialReasonHint ? { denialReasonHint } : {})
  };

  return Object.freeze(intent);
};
