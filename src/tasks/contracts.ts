import type { TaskContract } from "./types.js";

/** Task types used by the analysis templates. */
export const TaskTypes = {
  variantFilter: "variant_filter",
  sequenceContext: "sequence_context",
  sequenceEmbedding: "sequence_embedding",
  variantScoring: "variant_scoring",
  evidenceLookup: "evidence_lookup",
  reportGeneration: "report_generation",
} as const;

export type PipelineTaskType = (typeof TaskTypes)[keyof typeof TaskTypes];

export const PIPELINE_CONTRACTS: Readonly<Record<PipelineTaskType, TaskContract>> = {
  variant_filter: {
    outputs: ["filteredVcf", "filterStats", "variantIds"],
    entityKey: "variantIds",
    filters: true,
  },
  sequence_context: {
    outputs: ["contextsFile", "variantIds", "windowSize"],
    ranges: { windowSize: [1, 100_000] },
    entityKey: "variantIds",
  },
  sequence_embedding: {
    outputs: ["embeddingsFile", "variantIds", "dimension"],
    ranges: { dimension: [1, 65_536] },
    entityKey: "variantIds",
  },
  variant_scoring: {
    outputs: ["scoresFile", "variantIds", "scores"],
    ranges: { scores: [0, 1] },
    entityKey: "variantIds",
  },
  evidence_lookup: {
    outputs: ["evidenceFile", "variantIds", "groundedFraction"],
    ranges: { groundedFraction: [0, 1] },
    entityKey: "variantIds",
  },
  report_generation: {
    outputs: ["reportFile", "variantIds"],
    entityKey: "variantIds",
    // reports keep only the top-ranked variants
    filters: true,
  },
};
