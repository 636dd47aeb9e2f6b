import { ResolutionError } from "../errors.js";
import type { TaskStatus } from "../executor/types.js";
import type { ConfigValue, OutputRef, OutputValue, TaskConfig, TaskOutputs } from "../planner/types.js";
import { isArtifactRef } from "../tasks/types.js";
import { isOutputRef, isRefTemplate } from "./reference.js";

export type ResolvedValue = OutputValue | ResolvedValue[] | { [key: string]: ResolvedValue };
export type ResolvedConfig = Record<string, ResolvedValue>;

/** Read side of a run's results, as seen by the resolver. */
export interface OutputLookup {
  statusOf(taskId: string): TaskStatus | undefined;
  outputsOf(taskId: string): Readonly<TaskOutputs> | undefined;
}

function lookup(ref: OutputRef, source: OutputLookup, owner: string): OutputValue {
  const { task, key } = ref.$output;
  const status = source.statusOf(task);
  if (status !== "succeeded") {
    throw new ResolutionError(
      "UNRESOLVED_REFERENCE",
      task,
      key,
      `Task "${owner}" references output "${key}" of task "${task}", which is ${status ?? "unknown"} (expected succeeded)`,
    );
  }
  const outputs = source.outputsOf(task);
  if (!outputs || !Object.hasOwn(outputs, key)) {
    throw new ResolutionError(
      "MISSING_OUTPUT_KEY",
      task,
      key,
      `Task "${owner}" references output "${key}" of task "${task}", which did not produce it`,
    );
  }
  return outputs[key];
}

function stringify(value: OutputValue): string {
  if (typeof value === "string") return value;
  if (isArtifactRef(value)) return value.$artifact;
  if (value === null || typeof value !== "object") return String(value);
  return JSON.stringify(value);
}

function resolveValue(value: ConfigValue, source: OutputLookup, owner: string): ResolvedValue {
  if (isOutputRef(value)) return lookup(value, source, owner);
  if (isRefTemplate(value)) {
    return value.$template
      .map((part) => (typeof part === "string" ? part : stringify(lookup(part, source, owner))))
      .join("");
  }
  if (value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((item) => resolveValue(item, source, owner));
  const out: { [key: string]: ResolvedValue } = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = resolveValue(item, source, owner);
  }
  return out;
}

/**
 * Resolve every reference in `config` against the run's results. Called once
 * per task, immediately before it is invoked. Throws ResolutionError.
 */
export function resolveConfig(config: TaskConfig, source: OutputLookup, owner: string): ResolvedConfig {
  const resolved: ResolvedConfig = {};
  for (const [key, value] of Object.entries(config)) {
    resolved[key] = resolveValue(value, source, owner);
  }
  return resolved;
}
