import { normalizeForComparison } from "./text-matching.js";
import type { AmountThreshold, Quarter, RetrievalFilters } from "./types.js";

type Metadata = Record<string, unknown>;

const readString = (metadata: Metadata, keys: readonly string[]): string | undefined => {
  for (const key of keys) {
    const value = metadata[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
};

export const coerceNumber = (value: unknown): number | undefined => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    return undefined;
  }
  const parsed = Number(value.replace(/[$,]/g, ""));
  return Number.isFinite(parsed) ? parsed : undefined;
};

const readNumber = (metadata: Metadata, keys: readonly string[]): number | undefined => {
  for (const key of keys) {
    const value = coerceNumber(metadata[key]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
};

export const readClaimDate = (metadata: Metadata): Date | undefined => {
  const raw = readString(metadata, ["claim_date", "service_date"]);
  if (!raw) {
    return undefined;
  }
  const parsed = new Date(raw);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

export const readStatus = (metadata: Metadata): string | undefined =>
  readString(metadata, ["claim_status", "status"])?.toLowerCase();

export const readYear = (metadata: Metadata): number | undefined =>
  readNumber(metadata, ["year"]) ?? readClaimDate(metadata)?.getUTCFullYear();

export const readQuarter = (metadata: Metadata): Quarter | undefined => {
  const raw = readString(metadata, ["quarter"])?.toUpperCase();
  if (raw === "Q1" || raw === "Q2" || raw === "Q3" || raw === "Q4") {
    return raw;
  }
  const date = readClaimDate(metadata);
  if (!date) {
    return undefined;
  }
  const index = Math.floor(date.getUTCMonth() / 3);
  return index === 0 ? "Q1" : index === 1 ? "Q2" : index === 2 ? "Q3" : "Q4";
};

export const readDisease = (metadata: Metadata): string | undefined => {
  const raw = readString(metadata, ["disease", "diagnosis"]);
  return raw ? normalizeForComparison(raw) : undefined;
};

export const readProcedure = (metadata: Metadata): string | undefined => {
  const raw = readString(metadata, ["procedure"]);
  return raw ? normalizeForComparison(raw) : undefined;
};

export const readClaimAmount = (metadata: Metadata): number | undefined =>
  readNumber(metadata, ["claim_amount", "amount"]);

export const satisfiesAmount = (amount: number, threshold: AmountThreshold): boolean => {
  switch (threshold.comparator) {
    case "gt":
      return amount > threshold.value;
    case "gte":
      return amount >= threshold.value;
    case "lt":
      return amount < threshold.value;
    case "lte":
      return amount <= threshold.value;
  }
};

export const matchesVocabularyKey = (value: string | undefined, keys: readonly string[]): boolean =>
  value !== undefined && keys.some((key) => value.includes(normalizeForComparison(key)));

// A candidate that lacks the filtered field is kept.
export const matchesFilters = (metadata: Metadata, filters: RetrievalFilters): boolean => {
  const status = readStatus(metadata);
  if (filters.statuses && status !== undefined) {
    if (!filters.statuses.some((candidate) => candidate.toLowerCase() === status)) {
      return false;
    }
  }

  const year = readYear(metadata);
  if (filters.years && filters.years.length > 0 && year !== undefined && !filters.years.includes(year)) {
    return false;
  }

  const quarter = readQuarter(metadata);
  if (filters.quarters && filters.quarters.length > 0 && quarter !== undefined && !filters.quarters.includes(quarter)) {
    return false;
  }

  const disease = readDisease(metadata);
  if (filters.diseases && disease !== undefined && !matchesVocabularyKey(disease, filters.diseases)) {
    return false;
  }

  const procedure = readProcedure(metadata);
  if (filters.procedures && procedure !== undefined && !matchesVocabularyKey(procedure, filters.procedures)) {
    return false;
  }

  const amount = readClaimAmount(metadata);
  if (filters.amount && amount !== undefined && !satisfiesAmount(amount, filters.amount)) {
    return false;
  }

  return true;
};
