import { createHash } from "node:crypto";
import { getConfig } from "../config.js";
import { TaskError } from "../errors.js";
import type { TaskOutputs } from "../planner/types.js";
import type { ResolvedConfig } from "../references/resolver.js";
import { PIPELINE_CONTRACTS, TaskTypes, type PipelineTaskType } from "./contracts.js";
import { FunctionTask, type TaskFunction } from "./function-task.js";
import { readLocator, readNumber, readString, readStringArray } from "./inputs.js";
import { artifact, type TaskBody, type TaskContext } from "./types.js";

export type SimulatedTaskOptions = {
  /** Variants the simulated filter lets through (default: config simulation.variantCount). */
  variantCount?: number;
  /** Task types that fail with a TaskError of kind "simulated-failure". */
  failTypes?: Iterable<string>;
  timeout?: number;
};

const SIMULATED_EMBEDDING_DIMENSION = 1024;

/** Stable pseudo-score in [0, 1) derived from the variant id. */
export function simulatedScore(variantId: string): number {
  const digest = createHash("sha256").update(variantId).digest();
  return Math.round((digest.readUInt32BE(0) / 0x1_0000_0000) * 10_000) / 10_000;
}

const bodies: Record<PipelineTaskType, (opts: { variantCount: number }) => TaskFunction> = {
  variant_filter: ({ variantCount }) => async (config, ctx) => {
    const vcfFile = readString(config, "vcfFile");
    const minQuality = readNumber(config, "minQuality");
    const maxPopulationFreq = readNumber(config, "maxPopulationFreq");
    const variantIds = Array.from({ length: variantCount }, (_, i) => `var-${i + 1}`);
    ctx.log.info(`Simulated filter of ${vcfFile}: ${variantCount} variants kept`);
    return {
      filteredVcf: artifact(readString(config, "outputPath"), "text/x-vcf"),
      filterStats: { total: variantCount * 2, passed: variantCount, minQuality, maxPopulationFreq },
      variantIds,
    };
  },

  sequence_context: () => async (config) => {
    readLocator(config, "variantsFile");
    return {
      contextsFile: artifact(readString(config, "outputPath"), "application/x-ndjson"),
      variantIds: readStringArray(config, "variantIds"),
      windowSize: readNumber(config, "windowSize"),
    };
  },

  sequence_embedding: () => async (config, ctx) => {
    readLocator(config, "contextsFile");
    const variantIds = readStringArray(config, "variantIds");
    ctx.log.info(`Simulated ${readString(config, "model")} embeddings for ${variantIds.length} variants`);
    return {
      embeddingsFile: artifact(readString(config, "outputPath"), "application/vnd.apache.parquet"),
      variantIds,
      dimension: SIMULATED_EMBEDDING_DIMENSION,
    };
  },

  variant_scoring: () => async (config) => {
    readLocator(config, "embeddingsFile");
    readLocator(config, "contextsFile");
    const variantIds = readStringArray(config, "variantIds");
    return {
      scoresFile: artifact(readString(config, "outputPath"), "text/tab-separated-values"),
      variantIds,
      scores: variantIds.map(simulatedScore),
    };
  },

  evidence_lookup: () => async (config) => {
    readLocator(config, "scoresFile");
    const variantIds = readStringArray(config, "variantIds");
    const minSimilarity = readNumber(config, "minSimilarity");
    const grounded = variantIds.filter((id) => simulatedScore(id) >= minSimilarity).length;
    return {
      evidenceFile: artifact(readString(config, "outputPath"), "application/json"),
      variantIds,
      groundedFraction: variantIds.length === 0 ? 0 : grounded / variantIds.length,
    };
  },

  report_generation: () => async (config) => {
    readLocator(config, "scoresFile");
    readLocator(config, "evidenceFile");
    const maxVariants = readNumber(config, "maxVariants");
    const ranked = [...readStringArray(config, "variantIds")].sort(
      (a, b) => simulatedScore(b) - simulatedScore(a),
    );
    return {
      reportFile: artifact(readString(config, "outputPath"), "text/markdown"),
      variantIds: ranked.slice(0, maxVariants),
    };
  },
};

/**
 * Deterministic stand-ins for every pipeline task type. They produce artifact
 * locators without writing anything, so whole plans can run offline.
 */
export function createSimulatedTasks(opts?: SimulatedTaskOptions): TaskBody[] {
  const variantCount = opts?.variantCount ?? getConfig().simulation.variantCount;
  const failing = new Set(opts?.failTypes ?? []);

  return Object.values(TaskTypes).map((type) => {
    const run = bodies[type]({ variantCount });
    const fn: TaskFunction = failing.has(type)
      ? async (_config: ResolvedConfig, ctx: TaskContext): Promise<TaskOutputs> => {
          throw new TaskError("simulated-failure", `Simulated failure in task "${ctx.taskId}"`);
        }
      : run;
    return new FunctionTask({
      type,
      fn,
      contract: PIPELINE_CONTRACTS[type],
      description: `Simulated ${type.replace(/_/g, " ")}`,
      timeout: opts?.timeout,
    });
  });
}
