import { createPlan, type TaskDraft } from "../src/planner/planner.js";
import type { JsonValue, Plan, TaskOutputs } from "../src/planner/types.js";
import type { ResolvedConfig } from "../src/references/resolver.js";
import type { PlanParameters } from "../src/schemas.js";
import { FunctionTask } from "../src/tasks/function-task.js";
import type { TaskContext, TaskContract } from "../src/tasks/types.js";
import { log, setLogLevel } from "../src/utils/logger.js";

setLogLevel("error");

export const PARAMS: PlanParameters = {
  analysis: "full",
  inputVcf: "/data/sample.vcf",
  outputDir: "/tmp/variant-out",
  sampleName: "sample",
  minQuality: 30,
  maxPopulationFreq: 0.01,
  consequenceTypes: ["missense_variant"],
  windowSize: 2000,
};

export const FIXED_DATE = new Date("2026-01-01T00:00:00.000Z");

export function draft(
  id: string,
  dependsOn: string[] = [],
  config: Record<string, JsonValue> = {},
  type = "echo",
): TaskDraft {
  return { id, type, dependsOn, config };
}

export function planOf(tasks: TaskDraft[]): Plan {
  return createPlan({ tasks, parameters: PARAMS, createdAt: FIXED_DATE });
}

export function fnTask(
  type: string,
  fn: (config: ResolvedConfig, ctx: TaskContext) => Promise<TaskOutputs>,
  contract: TaskContract = { outputs: [] },
): FunctionTask {
  return new FunctionTask({ type, fn, contract, retryDelayMs: 1 });
}

/** `value` is "<taskId>:<config.in>", so a chain of echoes shows which outputs reached each task. */
export function echoTask(invoked: string[] = []): FunctionTask {
  return fnTask("echo", async (config, ctx) => {
    invoked.push(ctx.taskId);
    const input = config.in;
    return { value: `${ctx.taskId}:${typeof input === "string" ? input : ""}` };
  });
}

export function contextFor(plan: Plan, taskId = "t"): TaskContext {
  return { runId: "run-test", taskId, plan, services: {}, log, outputsOf: () => undefined };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** The value thrown by `fn`. Fails the test when nothing is thrown. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}
