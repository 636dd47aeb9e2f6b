import { join } from "node:path";
import type { OrchestratorConfig } from "../config.js";
import type { PlanParameters, TaskRecord } from "../schemas.js";
import { TaskTypes } from "../tasks/contracts.js";
import type { AnalysisType, JsonValue } from "./types.js";

type TemplateBuilder = (params: PlanParameters, config: Readonly<OrchestratorConfig>) => TaskRecord[];

function screening(p: PlanParameters, config: Readonly<OrchestratorConfig>): TaskRecord[] {
  const embedding: Record<string, JsonValue> = {
    contextsFile: "${output.context.contextsFile}",
    variantIds: "${output.context.variantIds}",
    model: config.embedding.model,
    pooling: config.embedding.pooling,
    batchSize: config.embedding.batchSize,
    timeoutMs: config.embedding.timeoutMs,
    outputPath: join(p.outputDir, "embeddings.parquet"),
  };
  if (config.embedding.serverUrl) embedding.serverUrl = config.embedding.serverUrl;

  return [
    {
      id: "filter",
      type: TaskTypes.variantFilter,
      description: "Candidate variant filtering (quality, population frequency, consequence)",
      dependsOn: [],
      config: {
        vcfFile: p.inputVcf,
        minQuality: p.minQuality,
        maxPopulationFreq: p.maxPopulationFreq,
        consequenceTypes: p.consequenceTypes,
        outputPath: join(p.outputDir, "variants.filtered.vcf"),
        statsPath: join(p.outputDir, "filter_stats.json"),
      },
    },
    {
      id: "context",
      type: TaskTypes.sequenceContext,
      description: "Reference/alternate sequence windows around each variant",
      dependsOn: ["filter"],
      config: {
        variantsFile: "${output.filter.filteredVcf}",
        variantIds: "${output.filter.variantIds}",
        windowSize: p.windowSize,
        outputPath: join(p.outputDir, "contexts.jsonl"),
      },
    },
    {
      id: "embedding",
      type: TaskTypes.sequenceEmbedding,
      description: "Sequence embeddings for each context window",
      dependsOn: ["context"],
      config: embedding,
    },
    {
      id: "scoring",
      type: TaskTypes.variantScoring,
      description: "Variant effect scoring",
      // contexts are read directly, so context is declared alongside embedding
      dependsOn: ["embedding", "context"],
      config: {
        embeddingsFile: "${output.embedding.embeddingsFile}",
        contextsFile: "${output.context.contextsFile}",
        variantIds: "${output.embedding.variantIds}",
        outputPath: join(p.outputDir, "scores.tsv"),
      },
    },
  ];
}

function full(p: PlanParameters, config: Readonly<OrchestratorConfig>): TaskRecord[] {
  const report: Record<string, JsonValue> = {
    scoresFile: "${output.scoring.scoresFile}",
    evidenceFile: "${output.evidence.evidenceFile}",
    variantIds: "${output.evidence.variantIds}",
    sampleName: p.sampleName,
    title: `Variant analysis report: ${p.sampleName}`,
    format: config.report.format,
    maxVariants: config.report.maxVariants,
    outputPath: join(p.outputDir, config.report.format === "html" ? "report.html" : "report.md"),
  };
  if (p.phenotype) report.phenotype = p.phenotype;

  return [
    ...screening(p, config),
    {
      id: "evidence",
      type: TaskTypes.evidenceLookup,
      description: "Evidence retrieval and attribution",
      dependsOn: ["scoring"],
      config: {
        scoresFile: "${output.scoring.scoresFile}",
        variantIds: "${output.scoring.variantIds}",
        topK: config.evidence.topK,
        minSimilarity: config.evidence.minSimilarity,
        outputPath: join(p.outputDir, "evidence.json"),
      },
    },
    {
      id: "report",
      type: TaskTypes.reportGeneration,
      description: "Report generation",
      dependsOn: ["scoring", "evidence"],
      config: report,
    },
  ];
}

export const TEMPLATES: Readonly<Record<AnalysisType, TemplateBuilder>> = {
  full,
  screening,
};
