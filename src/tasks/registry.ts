import { z } from "zod";
import { TaskError, ValidationError, errorMessage } from "../errors.js";
import type { TaskOutputs } from "../planner/types.js";
import type { ResolvedConfig } from "../references/resolver.js";
import { JsonValueSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { TaskBody, TaskContext, TaskContract } from "./types.js";

const OutputsSchema = z.record(JsonValueSchema);

/** Read-only view of declared contracts, consumed by the consistency checker. */
export interface ContractSource {
  contract(type: string): TaskContract | undefined;
}

export class TaskRegistry implements ContractSource {
  private bodies = new Map<string, TaskBody>();

  add(body: TaskBody): void {
    if (this.bodies.has(body.type)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Task type "${body.type}" already registered`);
    }
    this.bodies.set(body.type, body);
  }

  /** Register several bodies at once. */
  addAll(bodies: Iterable<TaskBody>): this {
    for (const body of bodies) this.add(body);
    return this;
  }

  remove(type: string): boolean {
    return this.bodies.delete(type);
  }

  get(type: string): TaskBody | undefined {
    return this.bodies.get(type);
  }

  has(type: string): boolean {
    return this.bodies.has(type);
  }

  list(): TaskBody[] {
    return [...this.bodies.values()];
  }

  types(): string[] {
    return [...this.bodies.keys()];
  }

  contract(type: string): TaskContract | undefined {
    return this.bodies.get(type)?.contract;
  }

  /**
   * Invoke the body registered for `type`. Every failure surfaces as a
   * TaskError; messages thrown by the body are kept verbatim.
   */
  async invoke(type: string, config: ResolvedConfig, context: TaskContext): Promise<TaskOutputs> {
    const body = this.bodies.get(type);
    if (!body) {
      throw new TaskError("unknown-task-type", `No task body registered for type "${type}"`);
    }

    let outputs: unknown;
    try {
      outputs = await body.invoke(config, context);
    } catch (err) {
      if (err instanceof TaskError) throw err;
      log.debug(`Task body "${type}" threw a non-TaskError`, { taskId: context.taskId, error: errorMessage(err) });
      throw new TaskError("task-error", errorMessage(err), { cause: err });
    }

    const parsed = OutputsSchema.safeParse(outputs);
    if (!parsed.success) {
      throw new TaskError(
        "invalid-output",
        `Task body "${type}" returned invalid outputs: ${parsed.error.issues[0]?.message ?? "not an object"}`,
      );
    }
    return parsed.data;
  }
}
