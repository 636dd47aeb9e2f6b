import type { OrchestratorConfig } from "../config.js";
import type { PlanParameters } from "../schemas.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Typed form of `${output.<task>.<key>}`, parsed once when a plan is compiled or loaded. */
export type OutputRef = {
  readonly $output: { readonly task: string; readonly key: string };
};

/** A string with one or more references embedded in literal text. */
export type RefTemplate = {
  readonly $template: ReadonlyArray<string | OutputRef>;
};

export type ConfigValue =
  | JsonPrimitive
  | OutputRef
  | RefTemplate
  | ConfigValue[]
  | { [key: string]: ConfigValue };

export type TaskConfig = Record<string, ConfigValue>;

/** Pointer to an output held outside the run (file, object store). Opaque to the executor. */
export type ArtifactRef = {
  $artifact: string;
  mediaType?: string;
};

export type OutputValue = JsonValue | ArtifactRef;

export type TaskOutputs = Record<string, OutputValue>;

export type TaskSpec = {
  readonly id: string;
  readonly type: string;
  readonly description?: string;
  readonly dependsOn: readonly string[];
  readonly config: TaskConfig;
};

export const PLAN_FORMAT_VERSION = 1 as const;

export type Plan = {
  /** Content hash of version, parameters and tasks. */
  readonly id: string;
  readonly version: typeof PLAN_FORMAT_VERSION;
  readonly createdAt: string;
  readonly parameters: PlanParameters;
  readonly configSnapshot: OrchestratorConfig;
  readonly tasks: readonly TaskSpec[];
};

export type AnalysisType = PlanParameters["analysis"];
