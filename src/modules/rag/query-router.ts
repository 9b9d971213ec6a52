import type { Intent, PlanStep, QueryCategory, SourcePlan } from "./types.js";

const PLAN_STEPS: Record<QueryCategory, readonly PlanStep[]> = {
  POLICY: [{ source: "document", required: true }],
  SPECIFIC: [{ source: "structured", required: true }],
  STATISTICAL: [
    { source: "structured", required: true },
    { source: "document", required: false }
  ],
  GENERAL: [
    { source: "structured", required: true },
    { source: "document", required: false }
  ]
};

export const routeIntent = (intent: Intent): SourcePlan => {
  const steps = PLAN_STEPS[intent.category].map((step) => ({ ...step }));

  if (intent.category === "SPECIFIC" && intent.directLookup && intent.claimId) {
    return {
      steps,
      directLookup: { claimId: intent.claimId }
    };
  }

  return { steps };
};

export const requiredSources = (plan: SourcePlan): PlanStep["source"][] =>
  plan.steps.filter((step) => step.required).map((step) => step.source);

export const allSources = (plan: SourcePlan): PlanStep["source"][] => plan.steps.map((step) => step.source);
