import { PlanError } from "../errors.js";
import { collectReferences, formatRef } from "../references/reference.js";
import type { TaskSpec } from "./types.js";

type Tasks = readonly TaskSpec[];

/** Map each task id to the ids of tasks that directly depend on it, in declaration order. */
export function dependentsOf(tasks: Tasks): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const task of tasks) dependents.set(task.id, []);
  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      dependents.get(dep)?.push(task.id);
    }
  }
  return dependents;
}

/** Every task whose dependency closure contains `taskId`, in breadth-first order. */
export function downstreamOf(tasks: Tasks, taskId: string): string[] {
  const dependents = dependentsOf(tasks);
  const queue = [...(dependents.get(taskId) ?? [])];
  const visited = new Set<string>();
  const order: string[] = [];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    order.push(id);
    queue.push(...(dependents.get(id) ?? []));
  }
  return order;
}

/** Detect a cycle with DFS coloring. Returns the cycle as a path of ids, or undefined. */
export function findCycle(tasks: Tasks): string[] | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  for (const task of tasks) color.set(task.id, WHITE);

  const dependents = dependentsOf(tasks);
  const stack: string[] = [];

  function dfs(id: string): string[] | undefined {
    color.set(id, GRAY);
    stack.push(id);
    for (const next of dependents.get(id) ?? []) {
      const c = color.get(next);
      if (c === GRAY) return [...stack.slice(stack.indexOf(next)), next]; // back edge
      if (c === WHITE) {
        const cycle = dfs(next);
        if (cycle) return cycle;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return undefined;
  }

  for (const task of tasks) {
    if (color.get(task.id) === WHITE) {
      const cycle = dfs(task.id);
      if (cycle) return cycle;
    }
  }
  return undefined;
}

/**
 * Order tasks so every task follows its dependencies (Kahn's algorithm).
 * Among tasks ready at the same time, declaration order wins.
 * Throws CYCLIC_DEPENDENCY when no such order exists.
 */
export function topologicalSort<T extends TaskSpec>(tasks: readonly T[]): T[] {
  const remaining = new Map<string, number>();
  for (const task of tasks) remaining.set(task.id, new Set(task.dependsOn).size);
  const dependents = dependentsOf(tasks);

  const sorted: T[] = [];
  const placed = new Set<string>();
  while (sorted.length < tasks.length) {
    const next = tasks.find((t) => !placed.has(t.id) && remaining.get(t.id) === 0);
    if (!next) {
      const cycle = findCycle(tasks) ?? tasks.filter((t) => !placed.has(t.id)).map((t) => t.id);
      throw new PlanError("CYCLIC_DEPENDENCY", `Task graph contains a cycle: ${cycle.join(" -> ")}`);
    }
    sorted.push(next);
    placed.add(next.id);
    for (const dependent of new Set(dependents.get(next.id))) {
      remaining.set(dependent, (remaining.get(dependent) ?? 0) - 1);
    }
  }
  return sorted;
}

/**
 * Validate a plan's tasks. Throws the first violation found:
 * duplicate ids, unknown or self dependencies, cycles, then references to
 * tasks missing from the referencing task's `dependsOn`.
 */
export function validatePlan(tasks: Tasks): void {
  const ids = new Set<string>();
  for (const task of tasks) {
    if (ids.has(task.id)) {
      throw new PlanError("INVALID_CONFIGURATION", `Duplicate task id "${task.id}"`);
    }
    ids.add(task.id);
  }

  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      if (dep === task.id) {
        throw new PlanError("UNKNOWN_DEPENDENCY", `Task "${task.id}" depends on itself`);
      }
      if (!ids.has(dep)) {
        throw new PlanError("UNKNOWN_DEPENDENCY", `Task "${task.id}" depends on unknown task "${dep}"`);
      }
    }
  }

  topologicalSort(tasks);

  for (const task of tasks) {
    const declared = new Set(task.dependsOn);
    for (const ref of collectReferences(task.config)) {
      if (!declared.has(ref.$output.task)) {
        throw new PlanError(
          "UNDECLARED_DEPENDENCY",
          `Task "${task.id}" references ${formatRef(ref)} but does not declare "${ref.$output.task}" in dependsOn`,
        );
      }
    }
  }
}
