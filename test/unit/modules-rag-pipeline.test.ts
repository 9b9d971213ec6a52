import { describe, expect, it, vi } from "vitest";
import { claimRowSchema, type ClaimRepositoryPort } from "../../src/modules/claims/claim-repository.js";
import { ClaimsPipeline } from "../../src/modules/rag/pipeline.js";
import type { SearchHit, VectorSearch } from "../../src/modules/rag/types.js";
import { loadSynonymTable, loadVocabulary } from "../../src/modules/rag/vocabulary.js";

const NOW = Date.UTC(2026, 9, 18);
const vocabulary = loadVocabulary();
const synonyms = loadSynonymTable();

const claimHit = (id: string, score: number): SearchHit => ({
  id,
  score,
  text: `Claim ID: ${id}`,
  metadata: { claim_id: id, claim_status: "Denied", disease: "Diabetes Type 2", year: 2024 }
});

const buildPipeline = (overrides: { search?: VectorSearch["search"]; claimLookup?: ClaimRepositoryPort } = {}) => {
  const search = vi.fn<VectorSearch["search"]>(overrides.search ?? (async () => []));
  const recordQualityVerdict = vi.fn();
  const recordCorrectiveActions = vi.fn();
  const logWarn = vi.fn();
  const pipeline = new ClaimsPipeline({
    vectorSearch: { search },
    claimLookup: overrides.claimLookup,
    vocabulary,
    synonyms,
    now: () => NOW,
    logInfo: vi.fn(),
    logWarn,
    recordQualityVerdict,
    recordCorrectiveActions,
    recordPipelineLatency: vi.fn(),
    recordRetrievalLatency: vi.fn()
  });
  return { pipeline, search, recordQualityVerdict, recordCorrectiveActions, logWarn };
};

describe("ClaimsPipeline.answerQuery", () => {
  it("answers identified claims by direct lookup without semantic search", async () => {
    const fetchById = vi.fn<ClaimRepositoryPort["fetchById"]>(async (claimId) =>
      claimRowSchema.parse({ claim_id: claimId, claim_status: "Denied", disease: "Asthma" })
    );
    const { pipeline, search, recordQualityVerdict } = buildPipeline({ claimLookup: { fetchById } });

    const output = await pipeline.answerQuery("Find CLM0000042");

    expect(fetchById).toHaveBeenCalledWith("CLM0000042");
    expect(search).not.toHaveBeenCalled();
    expect(output.intent).toEqual({ category: "SPECIFIC", directLookup: true, claimId: "CLM0000042" });
    expect(output.actions_taken).toEqual(["DIRECT_LOOKUP"]);
    expect(output.answer_context.quality).toBe("HIGH");
    expect(output.answer_context.terminal).toBe("ACCEPTED");
    expect(output.answer_context.candidates).toEqual([
      {
        id: "CLM0000042",
        source: "structured",
        rawScore: 1,
        text: "Claim ID: CLM0000042\nDisease/Condition: Asthma\nClaim Status: Denied",
        metadata: { document_type: "claim", claim_id: "CLM0000042", disease: "Asthma", claim_status: "Denied" },
        weightedScore: 1,
        sourceRank: 0,
        compositeScore: 1
      }
    ]);
    expect(recordQualityVerdict).toHaveBeenCalledWith("HIGH");
  });

  it("falls through to semantic search when the claim is unknown", async () => {
    const { pipeline, search, recordCorrectiveActions } = buildPipeline({
      claimLookup: { fetchById: async () => null }
    });

    const output = await pipeline.answerQuery("Find CLM0000042");

    expect(search).toHaveBeenCalledTimes(2);
    expect(output.actions_taken).toEqual(["DIRECT_LOOKUP_MISS", "EXPAND_SEARCH", "VERIFY_AND_SURFACE"]);
    expect(output.answer_context.lowConfidence).toBe(true);
    expect(recordCorrectiveActions).toHaveBeenCalledWith(["DIRECT_LOOKUP_MISS", "EXPAND_SEARCH", "VERIFY_AND_SURFACE"]);
  });

  it("logs lookup failures and keeps answering", async () => {
    const { pipeline, logWarn } = buildPipeline({
      claimLookup: {
        fetchById: async () => {
          throw new Error("postgres unavailable");
        }
      }
    });

    const output = await pipeline.answerQuery("Find CLM0000042", [], { requestId: "req-7" });

    expect(output.actions_taken[0]).toBe("DIRECT_LOOKUP_MISS");
    expect(logWarn).toHaveBeenCalledWith(
      "rag.direct_lookup.failed",
      { requestId: "req-7", sessionId: null },
      expect.objectContaining({ claim_id: "CLM0000042" })
    );
  });

  it("searches the structured index with hard filters for specific queries", async () => {
    const { pipeline, search } = buildPipeline({
      search: async () => [claimHit("CLM0000001", 0.7), claimHit("CLM0000002", 0.65), claimHit("CLM0000003", 0.6)]
    });

    const output = await pipeline.answerQuery("Show denied claims for diabetes in 2024");

    expect(search).toHaveBeenCalledTimes(2);
    expect(search).toHaveBeenCalledWith("structured", "Show denied claims for diabetes in 2024", 10, {
      statuses: ["Denied"],
      years: [2024],
      diseases: ["diabetes"]
    });
    expect(search).toHaveBeenCalledWith(
      "structured",
      "Show denied claims for diabetes in 2024 Diabetes Type 2",
      10,
      expect.anything()
    );
    expect(output.answer_context.quality).toBe("HIGH");
    expect(output.actions_taken).toEqual(["NONE"]);
    expect(output.answer_context.candidates.map((candidate) => candidate.id)).toEqual([
      "CLM0000001",
      "CLM0000002",
      "CLM0000003"
    ]);
    expect(output.answer_context.candidates[0]?.compositeScore).toBeCloseTo(1.15);
  });

  it("routes policy questions to the document index without filters", async () => {
    const { pipeline, search } = buildPipeline();

    const output = await pipeline.answerQuery("What are pre-authorization requirements?");

    expect(output.intent.category).toBe("POLICY");
    const sources = new Set(search.mock.calls.map(([source]) => source));
    expect([...sources]).toEqual(["document"]);
    expect(search.mock.calls.every((call) => call[3] === undefined)).toBe(true);
  });

  it("resolves retry requests against the previous user message", async () => {
    const { pipeline } = buildPipeline();

    const output = await pipeline.answerQuery("try again, 2023", [
      { role: "user", content: "Show denied claims for diabetes" },
      { role: "assistant", content: "No matching claims found." }
    ]);

    expect(output.effective_query).toBe("Show denied claims for diabetes 2023");
    expect(output.intent.temporal).toEqual({ years: [2023], quarters: [] });
  });

  it("keeps full questions that open with again as they are", async () => {
    const { pipeline } = buildPipeline();

    const output = await pipeline.answerQuery("Again, what are pre-authorization requirements?", [
      { role: "user", content: "Find CLM0000042" }
    ]);

    expect(output.effective_query).toBe("Again, what are pre-authorization requirements?");
    expect(output.intent).toMatchObject({ category: "POLICY", directLookup: false });
  });

  it("clamps the requested top k to the configured maximum", async () => {
    const { pipeline, search } = buildPipeline();

    await pipeline.answerQuery("hello there", [], { topK: 500 });

    expect(search.mock.calls[0]?.[2]).toBe(50);
  });
});
