import { ValidationError } from "../errors.js";
import { deepFreeze } from "../planner/planner.js";
import type { TaskOutputs } from "../planner/types.js";

/**
 * Outputs of the tasks of one run. Each task writes exactly once; reads are
 * free. Stored values are cloned and frozen, so a body cannot change them
 * after it returns.
 */
export class OutputStore {
  private entries = new Map<string, Readonly<TaskOutputs>>();

  write(taskId: string, outputs: TaskOutputs): Readonly<TaskOutputs> {
    if (this.entries.has(taskId)) {
      throw new ValidationError("OUTPUT_CONFLICT", `Outputs for task "${taskId}" were already written`);
    }
    const stored = deepFreeze(structuredClone(outputs));
    this.entries.set(taskId, stored);
    return stored;
  }

  read(taskId: string): Readonly<TaskOutputs> | undefined {
    return this.entries.get(taskId);
  }

  has(taskId: string): boolean {
    return this.entries.has(taskId);
  }

  taskIds(): string[] {
    return [...this.entries.keys()];
  }
}
