import { describe, expect, it } from "vitest";
import { allSources, requiredSources, routeIntent } from "../../src/modules/rag/query-router.js";
import type { Intent, QueryCategory } from "../../src/modules/rag/types.js";

const CATEGORIES: QueryCategory[] = ["SPECIFIC", "STATISTICAL", "POLICY", "GENERAL"];

describe("routeIntent", () => {
  it("never consults the structured index for policy questions", () => {
    const plan = routeIntent({ category: "POLICY", directLookup: false, statuses: ["Denied"] });

    expect(plan).toEqual({ steps: [{ source: "document", required: true }] });
    expect(allSources(plan)).not.toContain("structured");
  });

  it("adds a direct lookup for identified claims", () => {
    expect(routeIntent({ category: "SPECIFIC", directLookup: true, claimId: "CLM0000042" })).toEqual({
      steps: [{ source: "structured", required: true }],
      directLookup: { claimId: "CLM0000042" }
    });
  });

  it("keeps specific queries without an identifier on the structured index", () => {
    expect(routeIntent({ category: "SPECIFIC", directLookup: false })).toEqual({
      steps: [{ source: "structured", required: true }]
    });
  });

  it("consults documents as an optional fallback for statistical and general queries", () => {
    for (const category of ["STATISTICAL", "GENERAL"] as const) {
      const plan = routeIntent({ category, directLookup: false });

      expect(requiredSources(plan)).toEqual(["structured"]);
      expect(allSources(plan)).toEqual(["structured", "document"]);
    }
  });

  it("returns a fresh plan for every call", () => {
    for (const category of CATEGORIES) {
      const intent: Intent = { category, directLookup: false };
      const first = routeIntent(intent);
      const [firstStep] = first.steps;
      if (firstStep) {
        firstStep.required = false;
      }

      expect(routeIntent(intent).steps[0]?.required).toBe(true);
    }
  });
});
