import type { OrchestratorError } from "../errors.js";
import type { TaskOutputs } from "../planner/types.js";
import type { RunServices } from "../tasks/types.js";

export type TaskStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type TaskFailure = {
  code: string;
  /** TaskError kind, when the body signalled one. */
  kind?: string;
  /** Kept verbatim from the error the body raised. */
  message: string;
};

export type TaskResult = {
  taskId: string;
  status: TaskStatus;
  outputs: TaskOutputs;
  error?: TaskFailure;
  /** Why a task was skipped. */
  reason?: string;
  startedAt?: number;
  finishedAt?: number;
};

export type RunStatus = "all-succeeded" | "partially-failed" | "halted-on-error";

export type RunOutcome = {
  runId: string;
  planId: string;
  status: RunStatus;
  /** Final results keyed by task id, in plan order. */
  results: Record<string, TaskResult>;
  /** Set when the run halted (timeout, ordering violation, haltOnFailure). */
  error?: OrchestratorError;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
};

export type ExecutionOptions = {
  /** Reuse an id, e.g. when resuming. Defaults to a fresh UUID. */
  runId?: string;
  /** 1 (default) runs eligible tasks one at a time in topological order. */
  maxConcurrency?: number;
  /** Run-level timeout in ms. 0 disables it. */
  timeoutMs?: number;
  /** Stop scheduling after the first failure. */
  haltOnFailure?: boolean;
  /** Results from an earlier attempt. Succeeded tasks are not invoked again. */
  priorResults?: Record<string, TaskResult>;
  /** Handles passed to every task body through its context. */
  services?: RunServices;
  onTaskStart?: (taskId: string) => void;
  onTaskEnd?: (taskId: string, result: TaskResult) => void;
};
