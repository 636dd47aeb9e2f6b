import type { Plan, ArtifactRef, TaskOutputs } from "../planner/types.js";
import type { ResolvedConfig } from "../references/resolver.js";
import type { Logger } from "../utils/logger.js";

export type ValueRange = readonly [min: number, max: number];

/**
 * What a task type promises on success. Read by the consistency checker.
 */
export type TaskContract = {
  /** Output keys guaranteed on success. */
  outputs: readonly string[];
  /** Inclusive numeric bounds for outputs (scalars or arrays of numbers). */
  ranges?: Readonly<Record<string, ValueRange>>;
  /** Output key listing the primary entities (variant ids) the task covers. */
  entityKey?: string;
  /** True when dropping entities is the task's purpose. */
  filters?: boolean;
};

/** Per-run handles (API clients, caches) passed to task bodies instead of globals. */
export type RunServices = Readonly<Record<string, unknown>>;

export type TaskContext = {
  runId: string;
  taskId: string;
  plan: Plan;
  services: RunServices;
  log: Logger;
  /** Outputs of a task that already succeeded in this run. */
  outputsOf(taskId: string): Readonly<TaskOutputs> | undefined;
};

export interface TaskBody {
  readonly type: string;
  readonly description?: string;
  readonly contract: TaskContract;

  /**
   * Run the task. Resolve with the outputs, or reject (preferably with a
   * TaskError) to fail the task.
   */
  invoke(config: ResolvedConfig, context: TaskContext): Promise<TaskOutputs>;
}

export function artifact(locator: string, mediaType?: string): ArtifactRef {
  return mediaType === undefined ? { $artifact: locator } : { $artifact: locator, mediaType };
}

export function isArtifactRef(value: unknown): value is ArtifactRef {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "$artifact" in value &&
    typeof value.$artifact === "string"
  );
}
