import { createHash } from "node:crypto";
import { resolve } from "node:path";
import { getConfig, type OrchestratorConfig } from "../config.js";
import { PlanError } from "../errors.js";
import { formatConfig, parseConfig } from "../references/reference.js";
import { RunParametersSchema, type PlanParameters, type RunParameters } from "../schemas.js";
import { log } from "../utils/logger.js";
import { validatePlan } from "./task-graph.js";
import { TEMPLATES } from "./templates.js";
import { PLAN_FORMAT_VERSION, type JsonValue, type Plan, type TaskSpec } from "./types.js";

const plannerLog = log.scope("planner");

/** A task as authored: config references still in `${output.task.key}` form. */
export type TaskDraft = {
  id: string;
  type: string;
  description?: string;
  dependsOn?: readonly string[];
  config?: Record<string, JsonValue>;
};

export type CreatePlanOptions = {
  tasks: readonly TaskDraft[];
  parameters: PlanParameters;
  configSnapshot?: Readonly<OrchestratorConfig>;
  createdAt?: Date;
};

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

/** Recursively freeze a value in place. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Content hash identifying a plan, independent of when it was compiled. */
export function planId(parameters: PlanParameters, tasks: readonly TaskSpec[]): string {
  const body = canonicalJson({
    version: PLAN_FORMAT_VERSION,
    parameters,
    tasks: tasks.map((t) => ({ ...t, config: formatConfig(t.config) })),
  });
  return `plan-${createHash("sha256").update(body).digest("hex").slice(0, 16)}`;
}

/**
 * Parse references, validate the graph and return a frozen Plan.
 * Throws PlanError; no plan is produced on failure.
 */
export function createPlan(opts: CreatePlanOptions): Plan {
  const tasks: TaskSpec[] = opts.tasks.map((draft) => {
    const spec: TaskSpec = {
      id: draft.id,
      type: draft.type,
      dependsOn: [...(draft.dependsOn ?? [])],
      config: parseConfig(draft.config ?? {}, draft.id),
      ...(draft.description === undefined ? {} : { description: draft.description }),
    };
    return spec;
  });

  if (tasks.length === 0) {
    throw new PlanError("INVALID_CONFIGURATION", "A plan needs at least one task");
  }
  validatePlan(tasks);

  const plan: Plan = {
    id: planId(opts.parameters, tasks),
    version: PLAN_FORMAT_VERSION,
    createdAt: (opts.createdAt ?? new Date()).toISOString(),
    parameters: structuredClone(opts.parameters),
    configSnapshot: structuredClone(opts.configSnapshot ?? getConfig()),
    tasks,
  };
  return deepFreeze(plan);
}

export type PlannerOptions = {
  /** Task types available at execution time. */
  registry: { has(type: string): boolean };
  /** Config used for defaults and recorded in the plan (default: current config). */
  config?: () => Readonly<OrchestratorConfig>;
  now?: () => Date;
};

export class Planner {
  private registry: PlannerOptions["registry"];
  private config: () => Readonly<OrchestratorConfig>;
  private now: () => Date;

  constructor(opts: PlannerOptions) {
    this.registry = opts.registry;
    this.config = opts.config ?? getConfig;
    this.now = opts.now ?? (() => new Date());
  }

  compile(input: RunParameters): Plan {
    const parameters = this.resolveParameters(input);
    const config = this.config();
    const tasks = TEMPLATES[parameters.analysis](parameters, config);

    const missing = [...new Set(tasks.map((t) => t.type).filter((type) => !this.registry.has(type)))];
    if (missing.length > 0) {
      throw new PlanError(
        "INVALID_CONFIGURATION",
        `Analysis "${parameters.analysis}" needs unregistered task types: ${missing.join(", ")}`,
      );
    }

    const plan = createPlan({ tasks, parameters, configSnapshot: config, createdAt: this.now() });
    plannerLog.info(`Compiled ${parameters.analysis} plan ${plan.id}`, {
      sample: parameters.sampleName,
      tasks: plan.tasks.map((t) => t.id),
    });
    return plan;
  }

  private resolveParameters(input: RunParameters): PlanParameters {
    const parsed = RunParametersSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new PlanError("INVALID_CONFIGURATION", `Invalid run parameters:\n  ${issues.join("\n  ")}`);
    }
    const p = parsed.data;

    if (p.phenotype !== undefined && p.analysis === "screening") {
      throw new PlanError(
        "INVALID_CONFIGURATION",
        'A phenotype only applies to the "full" analysis, which renders a report',
      );
    }
    if (resolve(p.outputDir) === resolve(p.inputVcf)) {
      throw new PlanError("INVALID_CONFIGURATION", "outputDir must not be the input VCF path");
    }

    const defaults = this.config();
    const parameters: PlanParameters = {
      analysis: p.analysis,
      inputVcf: p.inputVcf,
      outputDir: p.outputDir,
      sampleName: p.sampleName,
      minQuality: p.minQuality ?? defaults.variantFilter.minQuality,
      maxPopulationFreq: p.maxPopulationFreq ?? defaults.variantFilter.maxPopulationFreq,
      consequenceTypes: p.consequenceTypes ?? [...defaults.variantFilter.consequenceTypes],
      windowSize: p.windowSize ?? defaults.sequenceContext.windowSize,
    };
    if (p.phenotype !== undefined) parameters.phenotype = p.phenotype;
    return parameters;
  }
}
