import { afterEach, describe, expect, it } from "vitest";
import { configure, getConfig, resetConfig } from "../src/config.js";
import { RunTimeoutError, ValidationError } from "../src/errors.js";
import { Executor } from "../src/executor/executor.js";
import { OutputStore } from "../src/executor/output-store.js";
import { RunContext } from "../src/executor/run-context.js";
import type { Plan } from "../src/planner/types.js";
import { parseConfig } from "../src/references/reference.js";
import { TaskRegistry } from "../src/tasks/registry.js";
import { PARAMS, draft, echoTask, fnTask, planOf, sleep, thrown } from "./helpers.js";

/** Echo bodies that throw for the task ids in `failing`. */
function failingRegistry(failing: Set<string>, invoked: string[] = []): TaskRegistry {
  const registry = new TaskRegistry();
  registry.add(
    fnTask("echo", async (config, ctx) => {
      invoked.push(ctx.taskId);
      if (failing.has(ctx.taskId)) throw new Error(`boom in ${ctx.taskId}`);
      const input = config.in;
      return { value: `${ctx.taskId}:${typeof input === "string" ? input : ""}` };
    }),
  );
  return registry;
}

describe("Executor", () => {
  afterEach(() => resetConfig());

  it("runs a linear graph and passes outputs downstream", async () => {
    const registry = new TaskRegistry();
    registry.add(echoTask());
    const plan = planOf([draft("a"), draft("b", ["a"], { in: "${output.a.value}" })]);

    const outcome = await new Executor(registry).run(plan, { runId: "run-1" });

    expect(outcome.status).toBe("all-succeeded");
    expect(outcome.runId).toBe("run-1");
    expect(outcome.planId).toBe(plan.id);
    expect(outcome.error).toBeUndefined();
    expect(outcome.results.a.outputs).toEqual({ value: "a:" });
    expect(outcome.results.b.outputs).toEqual({ value: "b:a:" });
    expect(Object.keys(outcome.results)).toEqual(["a", "b"]);
  });

  it("contains a failure to its dependents: A->B->D fails at B, A->C still runs", async () => {
    const invoked: string[] = [];
    const plan = planOf([
      draft("A"),
      draft("B", ["A"], { in: "${output.A.value}" }),
      draft("C", ["A"], { in: "${output.A.value}" }),
      draft("D", ["B"], { in: "${output.B.value}" }),
    ]);

    const outcome = await new Executor(failingRegistry(new Set(["B"]), invoked)).run(plan);

    expect(outcome.status).toBe("partially-failed");
    expect(outcome.results.A.status).toBe("succeeded");
    expect(outcome.results.B.status).toBe("failed");
    expect(outcome.results.B.error).toEqual({ code: "TASK_ERROR", kind: "task-error", message: "boom in B" });
    expect(outcome.results.C.status).toBe("succeeded");
    expect(outcome.results.C.outputs).toEqual({ value: "C:A:" });
    expect(outcome.results.D.status).toBe("skipped");
    expect(outcome.results.D.reason).toBe('Dependency "B" failed');
    expect(invoked).toEqual(["A", "B", "C"]);
  });

  it("skips the whole transitive closure of a failed task", async () => {
    const plan = planOf([draft("a"), draft("b", ["a"]), draft("c", ["b"]), draft("d", ["c"]), draft("e")]);
    const outcome = await new Executor(failingRegistry(new Set(["b"]))).run(plan);

    expect(outcome.results.c).toMatchObject({ status: "skipped", reason: 'Dependency "b" failed' });
    expect(outcome.results.d).toMatchObject({ status: "skipped", reason: 'Dependency "b" failed' });
    expect(outcome.results.e.status).toBe("succeeded");
  });

  it("stops scheduling after the first failure with haltOnFailure", async () => {
    const invoked: string[] = [];
    const plan = planOf([draft("a"), draft("b"), draft("c", ["a"])]);

    const outcome = await new Executor(failingRegistry(new Set(["a"]), invoked)).run(plan, { haltOnFailure: true });

    expect(outcome.status).toBe("halted-on-error");
    expect(outcome.error?.message).toBe("boom in a");
    expect(outcome.results.c).toMatchObject({ status: "skipped", reason: 'Dependency "a" failed' });
    expect(outcome.results.b).toMatchObject({ status: "skipped", reason: "TASK_ERROR: boom in a" });
    expect(invoked).toEqual(["a"]);
  });

  it("fails a task whose reference names a missing output key and skips its dependents", async () => {
    const plan = planOf([
      draft("a"),
      draft("b", ["a"], { in: "${output.a.missing}" }),
      draft("c", ["b"]),
      draft("d"),
    ]);
    const outcome = await new Executor(failingRegistry(new Set())).run(plan);

    expect(outcome.status).toBe("partially-failed");
    expect(outcome.results.b.status).toBe("failed");
    expect(outcome.results.b.error).toEqual({
      code: "MISSING_OUTPUT_KEY",
      message: 'Task "b" references output "missing" of task "a", which did not produce it',
    });
    expect(outcome.results.b.startedAt).toBeUndefined();
    expect(outcome.results.c.status).toBe("skipped");
    expect(outcome.results.d.status).toBe("succeeded");
  });

  it("halts the run when a task reads from a producer that has not succeeded", async () => {
    // Hand-built plan that skips validation: "b" reads "a" without depending on it.
    const plan: Plan = {
      id: "plan-unvalidated",
      version: 1,
      createdAt: "2026-01-01T00:00:00.000Z",
      parameters: PARAMS,
      configSnapshot: getConfig(),
      tasks: [
        { id: "b", type: "echo", dependsOn: [], config: parseConfig({ in: "${output.a.value}" }) },
        { id: "a", type: "echo", dependsOn: [], config: {} },
      ],
    };
    const outcome = await new Executor(failingRegistry(new Set())).run(plan);

    expect(outcome.status).toBe("halted-on-error");
    expect(outcome.error?.code).toBe("UNRESOLVED_REFERENCE");
    expect(outcome.results.b.status).toBe("failed");
    expect(outcome.results.a.status).toBe("skipped");
    expect(outcome.results.a.reason?.startsWith("UNRESOLVED_REFERENCE: ")).toBe(true);
  });

  it("fails tasks whose body returns invalid outputs or whose type is unknown", async () => {
    const registry = new TaskRegistry();
    registry.add(fnTask("nan", async () => ({ score: Number.NaN })));
    const plan = planOf([draft("x", [], {}, "nan"), draft("y", [], {}, "unregistered")]);

    const outcome = await new Executor(registry).run(plan);

    expect(outcome.results.x.error?.kind).toBe("invalid-output");
    expect(outcome.results.y.error?.kind).toBe("unknown-task-type");
    expect(outcome.status).toBe("partially-failed");
  });

  it("dispatches sequentially in topological order by default and reports transitions", async () => {
    const events: string[] = [];
    const invoked: string[] = [];
    const registry = new TaskRegistry();
    registry.add(echoTask(invoked));
    const plan = planOf([draft("c", ["a", "b"]), draft("b", ["a"]), draft("a")]);

    await new Executor(registry).run(plan, {
      onTaskStart: (id) => events.push(`start:${id}`),
      onTaskEnd: (id, result) => events.push(`end:${id}:${result.status}`),
    });

    expect(invoked).toEqual(["a", "b", "c"]);
    expect(events).toEqual([
      "start:a",
      "end:a:succeeded",
      "start:b",
      "end:b:succeeded",
      "start:c",
      "end:c:succeeded",
    ]);
  });

  it("stores frozen copies of outputs and hands bodies the run's services", async () => {
    const returned = { tags: ["x"] };
    const registry = new TaskRegistry();
    registry.add(fnTask("emit", async () => returned));
    registry.add(
      fnTask("read", async (_config, ctx) => {
        const upstream = ctx.outputsOf("emit");
        return { frozen: Object.isFrozen(upstream), service: String(ctx.services.label) };
      }),
    );
    const plan = planOf([draft("emit", [], {}, "emit"), draft("read", ["emit"], {}, "read")]);

    const outcome = await new Executor(registry).run(plan, { services: { label: "shared-client" } });

    returned.tags.push("mutated");
    expect(outcome.results.emit.outputs).toEqual({ tags: ["x"] });
    expect(Object.isFrozen(outcome.results.emit.outputs)).toBe(true);
    expect(outcome.results.read.outputs).toEqual({ frozen: true, service: "shared-client" });
  });

  it("takes run defaults from the configuration captured in the plan", async () => {
    configure({ execution: { haltOnFailure: true } });
    const plan = planOf([draft("a"), draft("b")]);
    resetConfig();

    const outcome = await new Executor(failingRegistry(new Set(["a"]))).run(plan);
    expect(outcome.status).toBe("halted-on-error");
    expect(outcome.results.b).toMatchObject({ status: "skipped", reason: "TASK_ERROR: boom in a" });

    const overridden = await new Executor(failingRegistry(new Set(["a"]))).run(plan, { haltOnFailure: false });
    expect(overridden.status).toBe("partially-failed");
    expect(overridden.results.b.status).toBe("succeeded");
  });

  it("ignores the current configuration when replaying a plan", async () => {
    const plan = planOf([draft("a"), draft("b")]);
    configure({ execution: { haltOnFailure: true } });

    const outcome = await new Executor(failingRegistry(new Set(["a"]))).run(plan);
    expect(outcome.status).toBe("partially-failed");
    expect(outcome.results.b.status).toBe("succeeded");
  });

  it("keeps task outcomes when a listener throws", async () => {
    const ended: string[] = [];
    const plan = planOf([draft("a"), draft("b"), draft("c", ["a"])]);

    const outcome = await new Executor(failingRegistry(new Set(["a"]))).run(plan, {
      onTaskStart: () => {
        throw new Error("start listener broke");
      },
      onTaskEnd: (id) => {
        ended.push(id);
        throw new Error("end listener broke");
      },
    });

    expect(outcome.status).toBe("partially-failed");
    expect(outcome.error).toBeUndefined();
    expect(outcome.results.a.error?.message).toBe("boom in a");
    expect(outcome.results.b.status).toBe("succeeded");
    expect(outcome.results.c.status).toBe("skipped");
    expect(ended).toEqual(["a", "c", "b"]);
  });

  it("times out the run: pending tasks are skipped, running ones finish", async () => {
    const registry = new TaskRegistry();
    registry.add(
      fnTask("slow", async () => {
        await sleep(150);
        return { done: true };
      }),
    );
    registry.add(echoTask());
    const plan = planOf([draft("slow", [], {}, "slow"), draft("after", ["slow"])]);

    const outcome = await new Executor(registry).run(plan, { timeoutMs: 30 });

    expect(outcome.status).toBe("halted-on-error");
    expect(outcome.error).toBeInstanceOf(RunTimeoutError);
    expect(outcome.error?.code).toBe("RUN_TIMEOUT");
    expect(outcome.results.slow.status).toBe("succeeded");
    expect(outcome.results.after).toMatchObject({
      status: "skipped",
      reason: "RUN_TIMEOUT: Run exceeded its 30ms timeout",
    });
  });
});

describe("Executor concurrency", () => {
  it("keeps outputs of independent tasks distinct under randomized delays", async () => {
    for (let round = 0; round < 20; round++) {
      const registry = new TaskRegistry();
      registry.add(
        fnTask("jitter", async (_config, ctx) => {
          const payload = [ctx.taskId, round];
          await sleep(Math.floor(Math.random() * 8));
          return { owner: ctx.taskId, payload };
        }),
      );
      const plan = planOf([draft("left", [], {}, "jitter"), draft("right", [], {}, "jitter")]);

      const outcome = await new Executor(registry).run(plan, { maxConcurrency: 2 });

      expect(outcome.status).toBe("all-succeeded");
      expect(outcome.results.left.outputs).toEqual({ owner: "left", payload: ["left", round] });
      expect(outcome.results.right.outputs).toEqual({ owner: "right", payload: ["right", round] });
    }
  });

  it("bounds parallelism and still respects dependencies", async () => {
    let active = 0;
    let peak = 0;
    const finished = new Set<string>();
    const violations: string[] = [];
    const registry = new TaskRegistry();
    registry.add(
      fnTask("work", async (_config, ctx) => {
        for (const dep of ctx.plan.tasks.find((t) => t.id === ctx.taskId)?.dependsOn ?? []) {
          if (!finished.has(dep)) violations.push(`${ctx.taskId} before ${dep}`);
        }
        active++;
        peak = Math.max(peak, active);
        await sleep(5 + Math.floor(Math.random() * 10));
        active--;
        finished.add(ctx.taskId);
        return {};
      }),
    );
    const plan = planOf([
      draft("a", [], {}, "work"),
      draft("b", [], {}, "work"),
      draft("c", [], {}, "work"),
      draft("d", [], {}, "work"),
      draft("e", ["a", "b"], {}, "work"),
    ]);

    const outcome = await new Executor(registry).run(plan, { maxConcurrency: 2 });

    expect(outcome.status).toBe("all-succeeded");
    expect(peak).toBe(2);
    expect(violations).toEqual([]);
  });
});

describe("RunContext", () => {
  const plan = planOf([draft("a"), draft("b", ["a"])]);

  it("allows only legal transitions", () => {
    const ctx = new RunContext({ runId: "r", plan });
    expect(thrown(() => ctx.markSucceeded("a", {}))).toMatchObject({
      code: "ILLEGAL_TRANSITION",
      message: 'Task "a" cannot move from pending to succeeded',
    });
    ctx.markRunning("a");
    ctx.markSucceeded("a", { value: 1 });
    const err = thrown(() => ctx.markRunning("a"));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: 'Task "a" cannot move from succeeded to running' });
    ctx.markSkipped("b", "not needed");
    expect(() => ctx.markFailed("b", { code: "TASK_ERROR", message: "late" })).toThrow(ValidationError);
  });

  it("reuses only succeeded prior results", () => {
    const ctx = new RunContext({
      runId: "r",
      plan,
      priorResults: {
        a: { taskId: "a", status: "succeeded", outputs: { value: "kept" } },
        b: { taskId: "b", status: "failed", outputs: {}, error: { code: "TASK_ERROR", message: "x" } },
      },
    });
    expect(ctx.statusOf("a")).toBe("succeeded");
    expect(ctx.outputsOf("a")).toEqual({ value: "kept" });
    expect(ctx.result("b")).toEqual({ taskId: "b", status: "pending", outputs: {} });
    expect(ctx.isEligible(plan.tasks[1])).toBe(true);
  });
});

describe("OutputStore", () => {
  it("allows one write per task", () => {
    const store = new OutputStore();
    store.write("a", { n: 1 });
    expect(thrown(() => store.write("a", { n: 2 }))).toMatchObject({
      code: "OUTPUT_CONFLICT",
      message: 'Outputs for task "a" were already written',
    });
    expect(store.read("a")).toEqual({ n: 1 });
    expect(store.taskIds()).toEqual(["a"]);
  });
});
