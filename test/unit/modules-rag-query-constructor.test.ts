import { describe, expect, it } from "vitest";
import { constructVariants } from "../../src/modules/rag/query-constructor.js";
import { normalizeForComparison } from "../../src/modules/rag/text-matching.js";
import type { Intent } from "../../src/modules/rag/types.js";
import { loadSynonymTable, loadVocabulary } from "../../src/modules/rag/vocabulary.js";

const vocabulary = loadVocabulary();
const synonyms = loadSynonymTable();
const generalIntent: Intent = { category: "GENERAL", directLookup: false };

describe("constructVariants", () => {
  it("expands denial reasons into canonical phrasings weighted below the original", () => {
    const intent: Intent = {
      category: "SPECIFIC",
      directLookup: false,
      statuses: ["Denied"],
      denialReasonHint: "missing documentation"
    };

    const variants = constructVariants("claims denied due to missing documentation", intent, { synonyms, vocabulary });

    expect(variants.map((variant) => variant.text)).toEqual([
      "claims denied due to missing documentation",
      "claims denied due to Missing information",
      "claims denied due to Documentation insufficient",
      "claims denied due to Incomplete documentation"
    ]);
    expect(variants.map((variant) => variant.provenance)).toEqual([
      "original",
      "synonym-expanded",
      "synonym-expanded",
      "synonym-expanded"
    ]);
    expect(variants[0]?.weight).toBe(1);
    expect(variants[1]?.weight).toBeCloseTo(0.8);
    expect(variants[2]?.weight).toBeCloseTo(0.64);
    expect(variants[3]?.weight).toBeCloseTo(0.512);
  });

  it("drops variants that normalize to an existing one", () => {
    const variants = constructVariants("claims not medically necessary", generalIntent, { synonyms });

    expect(variants).toHaveLength(2);
    expect(variants[0]).toEqual({ text: "claims not medically necessary", provenance: "original", weight: 1 });
    expect(variants[1]?.text).toBe("claims Medical necessity not established");
    expect(variants[1]?.weight).toBeCloseTo(0.64);
  });

  it("bounds the output and keeps the original first", () => {
    const variants = constructVariants("missing documentation missing information not covered", generalIntent, {
      synonyms
    });

    expect(variants).toHaveLength(5);
    expect(variants[0]?.provenance).toBe("original");
    expect(variants.every((variant) => variant.weight <= 1)).toBe(true);
    const normalized = variants.map((variant) => normalizeForComparison(variant.text));
    expect(new Set(normalized).size).toBe(normalized.length);
  });

  it("honours a configured variant limit", () => {
    const variants = constructVariants("missing documentation", generalIntent, {
      synonyms,
      config: { maxVariants: 2, variantDecay: 0.5 }
    });

    expect(variants).toEqual([
      { text: "missing documentation", provenance: "original", weight: 1 },
      { text: "Missing information", provenance: "synonym-expanded", weight: 0.5 }
    ]);
  });

  it("appends filter labels missing from the text", () => {
    const intent: Intent = {
      category: "SPECIFIC",
      directLookup: false,
      statuses: ["Denied"],
      diseases: ["diabetes"],
      temporal: { years: [2024], quarters: [] }
    };

    expect(constructVariants("denied claims in  2024", intent, { synonyms: [], vocabulary })).toEqual([
      { text: "denied claims in 2024", provenance: "original", weight: 1 },
      { text: "denied claims in 2024 Diabetes Type 2", provenance: "filter-narrowed", weight: 0.8 }
    ]);
  });

  it("uses vocabulary keys when no labels are available", () => {
    const intent: Intent = { category: "SPECIFIC", directLookup: false, diseases: ["asthma"] };

    expect(constructVariants("claims", intent, { synonyms: [] })[1]?.text).toBe("claims asthma");
  });
});
