export const CLAIMS_ANALYST_SYSTEM_PROMPT = [
  "You are a claims analyst assistant helping insurance payer staff query claim records and policy documents.",
  "Answer only from the supplied context documents and say clearly when they do not contain the answer.",
  "When listing claims include the claim ID, patient, condition, claim amount, status and the denial reason when denied.",
  "Format monetary values with a currency symbol, for example $12,345.67.",
  "Quote denial reasons and policy requirements as they appear in the documents.",
  "Never invent claim IDs, amounts, dates or policy terms."
].join(" ");

export const LOW_CONFIDENCE_NOTICE =
  "Retrieval confidence is low: the documents below may be only loosely related. Say so in the answer.";

export const NO_CONTEXT_DOCUMENTS = "No relevant documents found.";

export const buildContextBlock = (documents: readonly string[]): string => {
  if (documents.length === 0) {
    return NO_CONTEXT_DOCUMENTS;
  }
  return documents.map((text, index) => `Document ${index + 1}:\n${text}`).join("\n\n");
};

export const buildUserPrompt = (input: { question: string; context: string; lowConfidence: boolean }): string =>
  [
    "Based on the following context documents, answer the user's question.",
    ...(input.lowConfidence ? [LOW_CONFIDENCE_NOTICE] : []),
    "",
    "Context Documents:",
    input.context,
    "",
    `User Question: ${input.question}`
  ].join("\n");
