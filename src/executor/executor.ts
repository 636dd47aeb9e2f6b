import { randomUUID } from "node:crypto";
import {
  ConfigError,
  OrchestratorError,
  ResolutionError,
  RunTimeoutError,
  TaskError,
  errorMessage,
} from "../errors.js";
import type { RunStore } from "../persistence/store.js";
import { downstreamOf, topologicalSort } from "../planner/task-graph.js";
import type { Plan, TaskSpec } from "../planner/types.js";
import { resolveConfig, type ResolvedConfig } from "../references/resolver.js";
import type { TaskRegistry } from "../tasks/registry.js";
import { log, type Logger } from "../utils/logger.js";
import { RunContext } from "./run-context.js";
import type { ExecutionOptions, RunOutcome, RunStatus, TaskFailure } from "./types.js";

export type ExecutorOptions = {
  /** Persist every transition so that a run can be inspected or resumed later. */
  store?: RunStore;
};

/** What a finished task asks of the scheduling loop. */
type TaskSignal = { halt?: OrchestratorError };

function toFailure(err: unknown): TaskFailure {
  if (err instanceof TaskError) return { code: err.code, kind: err.kind, message: err.message };
  if (err instanceof OrchestratorError) return { code: err.code, message: err.message };
  return { code: "TASK_ERROR", message: errorMessage(err) };
}

/** Listener errors are logged; they never change a task's status. */
function notify(taskLog: Logger, event: string, call: () => void): void {
  try {
    call();
  } catch (err) {
    taskLog.warn(`${event} listener threw: ${errorMessage(err)}`);
  }
}

function toOrchestratorError(err: unknown): OrchestratorError {
  if (err instanceof OrchestratorError) return err;
  return new TaskError("task-error", errorMessage(err), { cause: err });
}

export class Executor {
  private registry: TaskRegistry;
  private store?: RunStore;

  constructor(registry: TaskRegistry, opts?: ExecutorOptions) {
    this.registry = registry;
    this.store = opts?.store;
  }

  /**
   * Execute `plan`. Concurrency, run timeout and haltOnFailure default to the
   * configuration captured in the plan when it was compiled; `opts` overrides them.
   */
  async run(plan: Plan, opts?: ExecutionOptions): Promise<RunOutcome> {
    const config = plan.configSnapshot;
    const runId = opts?.runId ?? randomUUID();
    const maxConcurrency = Math.max(1, Math.floor(opts?.maxConcurrency ?? config.limits.maxConcurrency));
    const timeoutMs = opts?.timeoutMs ?? config.timeouts.run;
    const haltOnFailure = opts?.haltOnFailure ?? config.execution.haltOnFailure;
    const startedAt = Date.now();
    const deadline = timeoutMs > 0 ? startedAt + timeoutMs : Number.POSITIVE_INFINITY;
    const runLog = log.scope("executor");

    this.store?.startRun(runId, plan, startedAt);
    const ctx = new RunContext({
      runId,
      plan,
      services: opts?.services,
      priorResults: opts?.priorResults,
      onTransition: (result) => this.store?.saveResult(runId, result),
    });
    if (this.store) {
      for (const result of Object.values(ctx.snapshot())) this.store.saveResult(runId, result);
    }

    const reused = ctx.idsWithStatus("succeeded");
    runLog.info(`Run ${runId} started for plan ${plan.id}`, {
      tasks: plan.tasks.length,
      maxConcurrency,
      ...(reused.length > 0 ? { reused } : {}),
    });

    const order = topologicalSort(plan.tasks);
    const state: { halt?: OrchestratorError } = {};
    const inFlight = new Map<string, Promise<void>>();

    const settle = (signal: TaskSignal): void => {
      if (signal.halt && !state.halt) state.halt = signal.halt;
    };

    while (true) {
      if (!state.halt && Date.now() >= deadline) {
        state.halt = new RunTimeoutError(timeoutMs);
        runLog.warn(state.halt.message, { inFlight: [...inFlight.keys()] });
      }
      if (state.halt) this.skipPending(ctx, `${state.halt.code}: ${state.halt.message}`);

      if (!state.halt) {
        for (const task of order) {
          if (inFlight.size >= maxConcurrency) break;
          if (inFlight.has(task.id) || !ctx.isEligible(task)) continue;
          const running = this.executeTask(task, ctx, haltOnFailure, opts)
            .then(settle)
            .catch((err: unknown) => {
              runLog.error(`Scheduling "${task.id}" failed`, { error: errorMessage(err) });
              settle({ halt: toOrchestratorError(err) });
            })
            .finally(() => inFlight.delete(task.id));
          inFlight.set(task.id, running);
        }
      }

      if (inFlight.size === 0) break;

      if (Number.isFinite(deadline) && !state.halt) {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const expiry = new Promise<void>((resolve) => {
          timer = setTimeout(resolve, Math.max(0, deadline - Date.now()));
        });
        try {
          await Promise.race([...inFlight.values(), expiry]);
        } finally {
          clearTimeout(timer);
        }
      } else {
        await Promise.race(inFlight.values());
      }
    }

    const stranded = ctx.idsWithStatus("pending");
    if (stranded.length > 0) {
      runLog.error("Tasks left pending with no runnable dependencies", { stranded });
      this.skipPending(ctx, "Dependencies never succeeded");
    }

    const results = ctx.snapshot();
    const finishedAt = Date.now();
    const status: RunStatus = state.halt
      ? "halted-on-error"
      : Object.values(results).every((r) => r.status === "succeeded")
        ? "all-succeeded"
        : "partially-failed";

    const outcome: RunOutcome = {
      runId,
      planId: plan.id,
      status,
      results,
      ...(state.halt ? { error: state.halt } : {}),
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
    };
    this.store?.finishRun(runId, outcome);

    const counts = { succeeded: 0, failed: 0, skipped: 0 };
    for (const r of Object.values(results)) {
      if (r.status === "succeeded" || r.status === "failed" || r.status === "skipped") counts[r.status]++;
    }
    runLog.info(`Run ${runId} finished: ${status}`, { ...counts, durationMs: outcome.durationMs });
    return outcome;
  }

  /**
   * Run a stored plan again under the same run id. Succeeded tasks keep their
   * outputs; everything else starts over.
   */
  async resume(runId: string, opts?: Omit<ExecutionOptions, "runId" | "priorResults">): Promise<RunOutcome> {
    if (!this.store) {
      throw new ConfigError("Resuming a run needs an executor created with a run store");
    }
    const stored = this.store.loadRun(runId);
    if (!stored) {
      throw new OrchestratorError("RUN_NOT_FOUND", `No stored run with id "${runId}"`);
    }
    log.info(`Resuming run ${runId} of plan ${stored.plan.id}`);
    return this.run(stored.plan, { ...opts, runId, priorResults: stored.results });
  }

  private async executeTask(
    task: TaskSpec,
    ctx: RunContext,
    haltOnFailure: boolean,
    opts?: ExecutionOptions,
  ): Promise<TaskSignal> {
    const taskLog = log.scope(task.id);

    let config: ResolvedConfig;
    try {
      config = resolveConfig(task.config, ctx, task.id);
    } catch (err) {
      if (!(err instanceof ResolutionError)) throw err;
      taskLog.error(err.message, { code: err.code });
      this.fail(task, ctx, toFailure(err), taskLog, opts);
      // A consumer started before its producer succeeded means the schedule itself is broken.
      if (err.code === "UNRESOLVED_REFERENCE" || haltOnFailure) return { halt: err };
      return {};
    }

    ctx.markRunning(task.id);
    notify(taskLog, "onTaskStart", () => opts?.onTaskStart?.(task.id));
    taskLog.info(`Dispatching "${task.id}" (${task.type})`);

    try {
      const outputs = await this.registry.invoke(task.type, config, ctx.taskContext(task.id, taskLog));
      ctx.markSucceeded(task.id, outputs);
      taskLog.info(`Task "${task.id}" succeeded`, { keys: Object.keys(outputs) });
    } catch (err) {
      const failure = toFailure(err);
      taskLog.error(`Task "${task.id}" failed: ${failure.message}`, { code: failure.code, kind: failure.kind });
      this.fail(task, ctx, failure, taskLog, opts);
      return haltOnFailure ? { halt: toOrchestratorError(err) } : {};
    }
    const result = ctx.result(task.id);
    if (result) notify(taskLog, "onTaskEnd", () => opts?.onTaskEnd?.(task.id, result));
    return {};
  }

  private fail(task: TaskSpec, ctx: RunContext, failure: TaskFailure, taskLog: Logger, opts?: ExecutionOptions): void {
    ctx.markFailed(task.id, failure);
    const result = ctx.result(task.id);
    if (result) notify(taskLog, "onTaskEnd", () => opts?.onTaskEnd?.(task.id, result));

    for (const id of downstreamOf(ctx.plan.tasks, task.id)) {
      if (ctx.statusOf(id) !== "pending") continue;
      ctx.markSkipped(id, `Dependency "${task.id}" failed`);
      const skipped = ctx.result(id);
      if (skipped) notify(taskLog, "onTaskEnd", () => opts?.onTaskEnd?.(id, skipped));
    }
  }

  private skipPending(ctx: RunContext, reason: string): void {
    for (const id of ctx.idsWithStatus("pending")) ctx.markSkipped(id, reason);
  }
}
