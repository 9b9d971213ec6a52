import { config, pipelineConfig } from "../../config/index.js";
import { ClaimRepository } from "../claims/claim-repository.js";
import { ClaimsPipeline } from "./pipeline.js";
import { createVectorSearch } from "./vector-search.js";
import { loadSynonymTable, loadVocabulary, type SynonymTable, type Vocabulary } from "./vocabulary.js";

let resources: { vocabulary: Vocabulary; synonyms: SynonymTable } | null = null;
let pipeline: ClaimsPipeline | null = null;

export const getPipelineResources = (): { vocabulary: Vocabulary; synonyms: SynonymTable } => {
  if (!resources) {
    resources = {
      vocabulary: loadVocabulary(),
      synonyms: loadSynonymTable()
    };
  }
  return resources;
};

export const getDefaultClaimsPipeline = (): ClaimsPipeline => {
  if (!pipeline) {
    const { vocabulary, synonyms } = getPipelineResources();
    pipeline = new ClaimsPipeline({
      vocabulary,
      synonyms,
      config: pipelineConfig,
      claimLookup: new ClaimRepository(),
      vectorSearch: createVectorSearch({
        collections: {
          structured: config.QDRANT_CLAIMS_COLLECTION,
          document: config.QDRANT_POLICY_COLLECTION
        },
        embeddingModel: config.OPENAI_EMBEDDING_MODEL
      })
    });
  }
  return pipeline;
};

export const resetDefaultClaimsPipelineForTests = (): void => {
  resources = null;
  pipeline = null;
};
