import { describe, expect, it } from "vitest";
import { TaskError, ValidationError } from "../src/errors.js";
import { FunctionTask } from "../src/tasks/function-task.js";
import { TaskRegistry } from "../src/tasks/registry.js";
import type { TaskBody } from "../src/tasks/types.js";
import { contextFor, draft, fnTask, planOf, sleep, thrown } from "./helpers.js";

const plan = planOf([draft("t")]);

describe("TaskRegistry", () => {
  it("registers, lists and removes bodies", () => {
    const registry = new TaskRegistry();
    registry.addAll([fnTask("one", async () => ({})), fnTask("two", async () => ({}), { outputs: ["x"] })]);
    expect(registry.types()).toEqual(["one", "two"]);
    expect(registry.has("two")).toBe(true);
    expect(registry.contract("two")).toEqual({ outputs: ["x"] });
    expect(registry.list().map((b) => b.type)).toEqual(["one", "two"]);
    expect(registry.remove("one")).toBe(true);
    expect(registry.get("one")).toBeUndefined();
  });

  it("rejects a second body for the same type", () => {
    const registry = new TaskRegistry();
    registry.add(fnTask("echo", async () => ({})));
    const err = thrown(() => registry.add(fnTask("echo", async () => ({}))));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: "DUPLICATE_REGISTRATION", message: 'Task type "echo" already registered' });
  });

  it("fails unknown types with kind unknown-task-type", async () => {
    await expect(new TaskRegistry().invoke("nope", {}, contextFor(plan))).rejects.toMatchObject({
      kind: "unknown-task-type",
      message: 'No task body registered for type "nope"',
    });
  });

  it("wraps plain errors as task-error and keeps the message verbatim", async () => {
    const registry = new TaskRegistry();
    registry.add(
      fnTask("disk", async () => {
        throw new Error("disk full: /scratch");
      }),
    );
    const err: unknown = await registry.invoke("disk", {}, contextFor(plan)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TaskError);
    expect(err).toMatchObject({ code: "TASK_ERROR", kind: "task-error", message: "disk full: /scratch" });
  });

  it("passes TaskErrors through unchanged", async () => {
    const registry = new TaskRegistry();
    registry.add(
      fnTask("upstream", async () => {
        throw new TaskError("upstream-unavailable", "model server returned 503");
      }),
    );
    await expect(registry.invoke("upstream", {}, contextFor(plan))).rejects.toMatchObject({
      kind: "upstream-unavailable",
      message: "model server returned 503",
    });
  });

  it("rejects outputs that are not JSON values", async () => {
    const body: TaskBody = {
      type: "nan",
      contract: { outputs: ["score"] },
      invoke: async () => ({ score: Number.NaN }),
    };
    const registry = new TaskRegistry();
    registry.add(body);
    await expect(registry.invoke("nan", {}, contextFor(plan))).rejects.toMatchObject({ kind: "invalid-output" });
  });

  it("rejects infinite numbers, including nested ones", async () => {
    const registry = new TaskRegistry();
    registry.addAll([
      fnTask("inf", async () => ({ score: Number.POSITIVE_INFINITY })),
      fnTask("nested", async () => ({ scores: [0.5, Number.NEGATIVE_INFINITY] })),
      fnTask("finite", async () => ({ score: 1e300 })),
    ]);
    await expect(registry.invoke("inf", {}, contextFor(plan))).rejects.toMatchObject({ kind: "invalid-output" });
    await expect(registry.invoke("nested", {}, contextFor(plan))).rejects.toMatchObject({ kind: "invalid-output" });
    expect(await registry.invoke("finite", {}, contextFor(plan))).toEqual({ score: 1e300 });
  });
});

describe("FunctionTask", () => {
  it("times out a slow attempt", async () => {
    const task = new FunctionTask({
      type: "slow",
      contract: { outputs: [] },
      timeout: 20,
      fn: async () => {
        await sleep(200);
        return {};
      },
    });
    await expect(task.invoke({}, contextFor(plan))).rejects.toMatchObject({
      kind: "timeout",
      message: 'Task type "slow" timed out after 20ms',
    });
  });

  it("retries failed attempts up to the configured count", async () => {
    let calls = 0;
    const task = new FunctionTask({
      type: "flaky",
      contract: { outputs: ["ok"] },
      retries: 2,
      retryDelayMs: 1,
      fn: async () => {
        calls++;
        if (calls < 3) throw new Error(`attempt ${calls} failed`);
        return { ok: true };
      },
    });
    expect(await task.invoke({}, contextFor(plan))).toEqual({ ok: true });
    expect(calls).toBe(3);
  });

  it("does not retry invalid input", async () => {
    let calls = 0;
    const task = new FunctionTask({
      type: "strict",
      contract: { outputs: [] },
      retries: 3,
      retryDelayMs: 1,
      fn: async () => {
        calls++;
        throw new TaskError("invalid-input", 'Config "vcfFile" must be a string');
      },
    });
    await expect(task.invoke({}, contextFor(plan))).rejects.toMatchObject({ kind: "invalid-input" });
    expect(calls).toBe(1);
  });
});
