import { ValidationError } from "../errors.js";
import type { Plan, TaskOutputs, TaskSpec } from "../planner/types.js";
import type { OutputLookup } from "../references/resolver.js";
import type { RunServices, TaskContext } from "../tasks/types.js";
import { log, type Logger } from "../utils/logger.js";
import { OutputStore } from "./output-store.js";
import type { TaskFailure, TaskResult, TaskStatus } from "./types.js";

const ALLOWED: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["running", "failed", "skipped"],
  running: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
  skipped: [],
};

export type RunContextOptions = {
  runId: string;
  plan: Plan;
  services?: RunServices;
  priorResults?: Record<string, TaskResult>;
  /** Called with a copy of the result after every status change. */
  onTransition?: (result: TaskResult) => void;
};

/**
 * State of one executor invocation. Only the executor mutates it, one task
 * record at a time; transitions are synchronous, so no body ever observes a
 * half-applied change.
 */
export class RunContext implements OutputLookup {
  readonly runId: string;
  readonly plan: Plan;
  readonly services: RunServices;
  readonly outputs = new OutputStore();

  private results = new Map<string, TaskResult>();
  private onTransition?: (result: TaskResult) => void;

  constructor(opts: RunContextOptions) {
    this.runId = opts.runId;
    this.plan = opts.plan;
    this.services = opts.services ?? {};
    this.onTransition = opts.onTransition;

    const known = new Set(opts.plan.tasks.map((t) => t.id));
    for (const id of Object.keys(opts.priorResults ?? {})) {
      if (!known.has(id)) log.warn(`Ignoring stored result for "${id}": not part of plan ${opts.plan.id}`);
    }

    for (const task of opts.plan.tasks) {
      const prior = opts.priorResults?.[task.id];
      if (prior?.status === "succeeded") {
        this.results.set(task.id, { ...prior, taskId: task.id, outputs: this.outputs.write(task.id, prior.outputs) });
      } else {
        this.results.set(task.id, { taskId: task.id, status: "pending", outputs: {} });
      }
    }
  }

  statusOf(taskId: string): TaskStatus | undefined {
    return this.results.get(taskId)?.status;
  }

  outputsOf(taskId: string): Readonly<TaskOutputs> | undefined {
    return this.outputs.read(taskId);
  }

  result(taskId: string): TaskResult | undefined {
    const result = this.results.get(taskId);
    return result ? { ...result } : undefined;
  }

  /** Pending, with every declared dependency succeeded. */
  isEligible(task: TaskSpec): boolean {
    return this.statusOf(task.id) === "pending" && task.dependsOn.every((dep) => this.statusOf(dep) === "succeeded");
  }

  idsWithStatus(status: TaskStatus): string[] {
    return this.plan.tasks.filter((t) => this.statusOf(t.id) === status).map((t) => t.id);
  }

  markRunning(taskId: string): void {
    this.transition(taskId, "running", { startedAt: Date.now() });
  }

  markSucceeded(taskId: string, outputs: TaskOutputs): void {
    this.assertCanMove(taskId, "succeeded");
    const stored = this.outputs.write(taskId, outputs);
    this.transition(taskId, "succeeded", { outputs: stored, finishedAt: Date.now() });
  }

  markFailed(taskId: string, error: TaskFailure): void {
    this.transition(taskId, "failed", { error, finishedAt: Date.now() });
  }

  markSkipped(taskId: string, reason: string): void {
    this.transition(taskId, "skipped", { reason, finishedAt: Date.now() });
  }

  /** Per-invocation view handed to a task body. */
  taskContext(taskId: string, taskLog: Logger): TaskContext {
    return {
      runId: this.runId,
      taskId,
      plan: this.plan,
      services: this.services,
      log: taskLog,
      outputsOf: (id) => this.outputs.read(id),
    };
  }

  /** Copies of all results, keyed by task id in plan order. */
  snapshot(): Record<string, TaskResult> {
    const out: Record<string, TaskResult> = {};
    for (const task of this.plan.tasks) {
      const result = this.results.get(task.id);
      if (result) out[task.id] = { ...result };
    }
    return out;
  }

  private assertCanMove(taskId: string, next: TaskStatus): TaskResult {
    const current = this.results.get(taskId);
    if (!current) {
      throw new ValidationError("ILLEGAL_TRANSITION", `Task "${taskId}" is not part of plan ${this.plan.id}`);
    }
    if (!ALLOWED[current.status].includes(next)) {
      throw new ValidationError(
        "ILLEGAL_TRANSITION",
        `Task "${taskId}" cannot move from ${current.status} to ${next}`,
      );
    }
    return current;
  }

  private transition(taskId: string, next: TaskStatus, patch: Partial<TaskResult>): void {
    const current = this.assertCanMove(taskId, next);
    const updated: TaskResult = { ...current, ...patch, taskId, status: next };
    this.results.set(taskId, updated);
    this.onTransition?.({ ...updated });
  }
}
