import { describe, expect, it, vi } from "vitest";
import { DEFAULT_PIPELINE_CONFIG } from "../../src/config/pipeline.js";
import {
  TRANSITIONS,
  evaluateQuality,
  nextStep,
  runCorrectiveLoop,
  type ControllerPhase,
  type CorrectiveLoopInput
} from "../../src/modules/rag/corrective-controller.js";
import type { GatewayRequest } from "../../src/modules/rag/retrieval-gateway.js";
import type { ActionTag, Candidate, ResultSet } from "../../src/modules/rag/types.js";

const candidate = (id: string, score: number): Candidate => ({
  id,
  source: "structured",
  rawScore: score,
  text: id,
  metadata: {},
  weightedScore: score,
  sourceRank: 0,
  compositeScore: score
});

const resultSetOf = (scores: number[], actions: ActionTag[] = []): ResultSet => ({
  candidates: scores.map((score, index) => candidate(`c${index}`, score)),
  quality: "LOW",
  actions,
  sources: ["structured"],
  lowConfidence: false
});

const loopInput: CorrectiveLoopInput = {
  intent: { category: "GENERAL", directLookup: false },
  variants: [{ text: "claims", provenance: "original", weight: 1 }],
  plan: {
    steps: [
      { source: "structured", required: true },
      { source: "document", required: false }
    ]
  }
};

const identityRank = (resultSet: ResultSet): ResultSet => resultSet;

describe("evaluateQuality", () => {
  const thresholds = DEFAULT_PIPELINE_CONFIG.quality;

  it("grades result sets against the configured thresholds", () => {
    expect(evaluateQuality(resultSetOf([0.9, 0.8, 0.7]).candidates, 10, thresholds)).toBe("HIGH");
    expect(evaluateQuality(resultSetOf([0.7, 0.5, 0.3]).candidates, 10, thresholds)).toBe("MEDIUM");
    expect(evaluateQuality(resultSetOf([0.3, 0.25]).candidates, 10, thresholds)).toBe("LOW");
    expect(evaluateQuality(resultSetOf([0.9]).candidates, 10, thresholds)).toBe("LOW");
    expect(evaluateQuality([], 10, thresholds)).toBe("LOW");
  });

  it("only considers the top k candidates", () => {
    expect(evaluateQuality(resultSetOf([0.9, 0.8, 0.7]).candidates, 2, thresholds)).toBe("MEDIUM");
  });
});

describe("nextStep", () => {
  it("never expands after an expansion", () => {
    expect(nextStep("EXPANDED", "LOW")).toBe("SURFACE");
    expect(nextStep("FILTERED_AFTER_EXPANSION", "LOW")).toBe("SURFACE");
    expect(Object.values(TRANSITIONS.EXPANDED)).not.toContain("EXPAND");
  });

  it("accepts high results from every phase", () => {
    const phases: ControllerPhase[] = ["FIRST_PASS", "FILTERED", "EXPANDED", "FILTERED_AFTER_EXPANSION"];
    for (const phase of phases) {
      expect(nextStep(phase, "HIGH")).toBe("ACCEPT");
    }
  });
});

describe("runCorrectiveLoop", () => {
  it("accepts a high quality first pass without changes", async () => {
    const firstPass = resultSetOf([0.9, 0.8, 0.7]);
    const originalCandidates = [...firstPass.candidates];
    const retrieve = vi.fn<(request: GatewayRequest) => Promise<ResultSet>>().mockResolvedValue(firstPass);

    const result = await runCorrectiveLoop(loopInput, { retrieve, rank: identityRank, logDebug: vi.fn() });

    expect(result).toBe(firstPass);
    expect(result.candidates).toEqual(originalCandidates);
    expect(result.quality).toBe("HIGH");
    expect(result.actions).toEqual(["NONE"]);
    expect(result.terminal).toBe("ACCEPTED");
    expect(result.lowConfidence).toBe(false);
    expect(retrieve).toHaveBeenCalledTimes(1);
  });

  it("expands once and surfaces low results with low confidence", async () => {
    const retrieve = vi
      .fn<(request: GatewayRequest) => Promise<ResultSet>>()
      .mockResolvedValueOnce(resultSetOf([0.3, 0.25]))
      .mockResolvedValueOnce(resultSetOf([0.33, 0.2]));

    const result = await runCorrectiveLoop(loopInput, { retrieve, rank: identityRank, logDebug: vi.fn() });

    expect(retrieve).toHaveBeenCalledTimes(2);
    expect(retrieve.mock.calls[0]?.[0]).toMatchObject({ sources: ["structured"], k: 10 });
    expect(retrieve.mock.calls[1]?.[0]).toMatchObject({ sources: ["structured", "document"], k: 20 });
    expect(result.actions).toEqual(["EXPAND_SEARCH", "VERIFY_AND_SURFACE"]);
    expect(result.quality).toBe("LOW");
    expect(result.lowConfidence).toBe(true);
    expect(result.terminal).toBe("ACCEPTED_WITH_LOW_CONFIDENCE");
    expect(result.candidates.map((entry) => entry.compositeScore)).toEqual([0.33, 0.2]);
  });

  it("surfaces the better first pass when the expansion is worse", async () => {
    const retrieve = vi
      .fn<(request: GatewayRequest) => Promise<ResultSet>>()
      .mockResolvedValueOnce(resultSetOf([0.3, 0.25]))
      .mockResolvedValueOnce(resultSetOf([]));

    const result = await runCorrectiveLoop(loopInput, { retrieve, rank: identityRank, logDebug: vi.fn() });

    expect(result.candidates.map((entry) => entry.compositeScore)).toEqual([0.3, 0.25]);
  });

  it("never calls the gateway more than twice", async () => {
    const retrieve = vi.fn<(request: GatewayRequest) => Promise<ResultSet>>(async () => resultSetOf([0.1]));

    await runCorrectiveLoop(loopInput, { retrieve, rank: identityRank, logDebug: vi.fn() });

    expect(retrieve).toHaveBeenCalledTimes(2);
  });

  it("caps the expanded k at the configured maximum", async () => {
    const retrieve = vi.fn<(request: GatewayRequest) => Promise<ResultSet>>(async () => resultSetOf([]));

    await runCorrectiveLoop(loopInput, {
      retrieve,
      rank: identityRank,
      config: { ...DEFAULT_PIPELINE_CONFIG, topK: 30 },
      logDebug: vi.fn()
    });

    expect(retrieve.mock.calls[1]?.[0].k).toBe(50);
  });

  it("filters medium results and accepts them", async () => {
    const retrieve = vi.fn<(request: GatewayRequest) => Promise<ResultSet>>().mockResolvedValue(resultSetOf([0.7, 0.5, 0.3]));

    const result = await runCorrectiveLoop(loopInput, { retrieve, rank: identityRank, logDebug: vi.fn() });

    expect(result.actions).toEqual(["FILTER_LOW_SCORES"]);
    expect(result.candidates.map((entry) => entry.compositeScore)).toEqual([0.7, 0.5]);
    expect(result.quality).toBe("MEDIUM");
    expect(result.terminal).toBe("ACCEPTED");
    expect(retrieve).toHaveBeenCalledTimes(1);
  });

  it("expands when filtering leaves too few results", async () => {
    const retrieve = vi
      .fn<(request: GatewayRequest) => Promise<ResultSet>>()
      .mockResolvedValueOnce(resultSetOf([0.5, 0.4, 0.38]))
      .mockResolvedValueOnce(resultSetOf([0.9, 0.8, 0.7]));

    const result = await runCorrectiveLoop(loopInput, { retrieve, rank: identityRank, logDebug: vi.fn() });

    expect(result.actions).toEqual(["FILTER_LOW_SCORES", "EXPAND_SEARCH"]);
    expect(result.quality).toBe("HIGH");
    expect(result.lowConfidence).toBe(false);
  });

  it("skips the retry when the latency budget is spent", async () => {
    const retrieve = vi.fn<(request: GatewayRequest) => Promise<ResultSet>>().mockResolvedValue(resultSetOf([0.2, 0.1]));
    const now = vi.fn<() => number>().mockReturnValueOnce(0).mockReturnValueOnce(80).mockReturnValueOnce(90);

    const result = await runCorrectiveLoop(loopInput, {
      retrieve,
      rank: identityRank,
      config: { ...DEFAULT_PIPELINE_CONFIG, latencyBudgetMs: 100 },
      now,
      startedAt: 0,
      logDebug: vi.fn()
    });

    expect(retrieve).toHaveBeenCalledTimes(1);
    expect(result.actions).toEqual(["RETRY_SKIPPED_BUDGET", "VERIFY_AND_SURFACE"]);
    expect(result.terminal).toBe("ACCEPTED_WITH_LOW_CONFIDENCE");
  });

  it("keeps initial and gateway actions in order", async () => {
    const retrieve = vi
      .fn<(request: GatewayRequest) => Promise<ResultSet>>()
      .mockImplementation(async () => resultSetOf([], ["RETRIEVAL_UNAVAILABLE"]));

    const result = await runCorrectiveLoop(
      { ...loopInput, initialActions: ["DIRECT_LOOKUP_MISS"] },
      { retrieve, rank: identityRank, logDebug: vi.fn() }
    );

    expect(result.actions).toEqual([
      "DIRECT_LOOKUP_MISS",
      "RETRIEVAL_UNAVAILABLE",
      "EXPAND_SEARCH",
      "RETRIEVAL_UNAVAILABLE",
      "VERIFY_AND_SURFACE"
    ]);
    expect(result.candidates).toEqual([]);
    expect(result.lowConfidence).toBe(true);
  });
});
