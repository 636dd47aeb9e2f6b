import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { JSON_SCHEMA, load } from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./utils/logger.js";

export type OrchestratorConfig = {
  timeouts: {
    /** Default per-task timeout applied by FunctionTask, in ms. */
    task: number;
    /** Run-level timeout in ms. 0 disables it. */
    run: number;
  };
  limits: {
    /** 1 runs tasks strictly sequentially. */
    maxConcurrency: number;
  };
  execution: {
    haltOnFailure: boolean;
  };
  persistence: {
    dbPath: string;
    planFileName: string;
    findingsFileName: string;
  };
  variantFilter: {
    minQuality: number;
    maxPopulationFreq: number;
    consequenceTypes: string[];
  };
  sequenceContext: {
    windowSize: number;
  };
  embedding: {
    model: string;
    pooling: "mean" | "max" | "cls";
    batchSize: number;
    timeoutMs: number;
    serverUrl?: string;
  };
  evidence: {
    topK: number;
    minSimilarity: number;
  };
  report: {
    format: "markdown" | "html";
    maxVariants: number;
  };
  simulation: {
    variantCount: number;
  };
  critic: {
    checks: {
      referentialCompleteness: boolean;
      coverage: boolean;
      valueRange: boolean;
      skippedImpact: boolean;
      outputContract: boolean;
    };
  };
  logLevel: LogLevel;
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends unknown[] ? T[P] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: OrchestratorConfig = {
  timeouts: {
    task: 10 * 60 * 1000,
    run: 0,
  },
  limits: {
    maxConcurrency: 1,
  },
  execution: {
    haltOnFailure: false,
  },
  persistence: {
    dbPath: join(homedir(), ".variant-orchestrator", "runs.db"),
    planFileName: "plan.yaml",
    findingsFileName: "critic_report.json",
  },
  variantFilter: {
    minQuality: 30,
    maxPopulationFreq: 0.01,
    consequenceTypes: [
      "missense_variant",
      "stop_gained",
      "frameshift_variant",
      "splice_acceptor_variant",
      "splice_donor_variant",
    ],
  },
  sequenceContext: {
    windowSize: 2000,
  },
  embedding: {
    model: "1.2B",
    pooling: "mean",
    batchSize: 10,
    timeoutMs: 60_000,
  },
  evidence: {
    topK: 5,
    minSimilarity: 0.3,
  },
  report: {
    format: "markdown",
    maxVariants: 10,
  },
  simulation: {
    variantCount: 5,
  },
  critic: {
    checks: {
      referentialCompleteness: true,
      coverage: true,
      valueRange: true,
      skippedImpact: true,
      outputContract: true,
    },
  },
  logLevel: "info",
};

export const OrchestratorConfigSchema = z.object({
  timeouts: z.object({
    task: z.number().int().positive(),
    run: z.number().int().nonnegative(),
  }),
  limits: z.object({
    maxConcurrency: z.number().int().positive(),
  }),
  execution: z.object({
    haltOnFailure: z.boolean(),
  }),
  persistence: z.object({
    dbPath: z.string().min(1),
    planFileName: z.string().min(1),
    findingsFileName: z.string().min(1),
  }),
  variantFilter: z.object({
    minQuality: z.number().nonnegative(),
    maxPopulationFreq: z.number().min(0).max(1),
    consequenceTypes: z.array(z.string().min(1)),
  }),
  sequenceContext: z.object({
    windowSize: z.number().int().positive(),
  }),
  embedding: z.object({
    model: z.string().min(1),
    pooling: z.enum(["mean", "max", "cls"]),
    batchSize: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    serverUrl: z.string().url().optional(),
  }),
  evidence: z.object({
    topK: z.number().int().positive(),
    minSimilarity: z.number().min(0).max(1),
  }),
  report: z.object({
    format: z.enum(["markdown", "html"]),
    maxVariants: z.number().int().positive(),
  }),
  simulation: z.object({
    variantCount: z.number().int().nonnegative(),
  }),
  critic: z.object({
    checks: z.object({
      referentialCompleteness: z.boolean(),
      coverage: z.boolean(),
      valueRange: z.boolean(),
      skippedImpact: z.boolean(),
      outputContract: z.boolean(),
    }),
  }),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
});

const ConfigOverridesSchema = OrchestratorConfigSchema.deepPartial().strict();

let current: OrchestratorConfig = structuredClone(DEFAULTS);

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: DeepPartial<T>): T {
  const result = structuredClone(base);
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined && typeof val === "object" && !Array.isArray(val) && val !== null) {
      (result as Record<string, unknown>)[key as string] = deepMerge(
        result[key] as Record<string, unknown>,
        val as DeepPartial<Record<string, unknown>>,
      );
    } else if (val !== undefined) {
      (result as Record<string, unknown>)[key as string] = val;
    }
  }
  return result;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<OrchestratorConfig>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<OrchestratorConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<OrchestratorConfig> = Object.freeze(structuredClone(DEFAULTS));

/** Parse and validate config overrides from YAML text. */
export function parseConfigOverrides(text: string, source = "<inline>"): DeepPartial<OrchestratorConfig> {
  let raw: unknown;
  try {
    raw = load(text, { schema: JSON_SCHEMA }) ?? {};
  } catch (err) {
    throw new ConfigError(`Config ${source} is not valid YAML`, { cause: err });
  }
  const parsed = ConfigOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid config ${source}:\n  ${issues.join("\n  ")}`);
  }
  return parsed.data;
}

/** Read a YAML config file and apply it on top of the defaults. */
export function loadConfigFile(path: string): Readonly<OrchestratorConfig> {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}`, { cause: err });
  }
  configure(parseConfigOverrides(text, path));
  return current;
}
