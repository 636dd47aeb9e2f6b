import type { TaskResult } from "../executor/types.js";
import type { JsonValue, OutputValue, TaskSpec } from "../planner/types.js";
import { collectReferences } from "../references/reference.js";
import { isArtifactRef } from "../tasks/types.js";
import type { CheckInput, ConsistencyRule, Finding } from "./types.js";

const PREVIEW = 5;

function succeeded(input: CheckInput): Array<{ task: TaskSpec; result: TaskResult }> {
  return input.plan.tasks.flatMap((task) => {
    const result = input.results[task.id];
    return result?.status === "succeeded" ? [{ task, result }] : [];
  });
}

function preview(ids: string[]): string {
  const head = ids.slice(0, PREVIEW).join(", ");
  return ids.length > PREVIEW ? `${head}, ... (${ids.length} total)` : head;
}

function stringArray(value: OutputValue | undefined): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const ids: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") return undefined;
    ids.push(item);
  }
  return ids;
}

/**
 * Every reference whose producer succeeded must find a present, non-null value.
 * References to keys the producer's contract does not declare are flagged even
 * when the value happens to be there.
 */
export const referentialCompleteness: ConsistencyRule = {
  name: "referential-completeness",
  toggle: "referentialCompleteness",
  check({ plan, results, contracts }) {
    const findings: Finding[] = [];
    const seen = new Set<string>();
    const typeOf = new Map(plan.tasks.map((t) => [t.id, t.type]));
    for (const consumer of plan.tasks) {
      for (const ref of collectReferences(consumer.config)) {
        const { task: producer, key } = ref.$output;
        const id = JSON.stringify([consumer.id, producer, key]);
        if (seen.has(id)) continue;
        seen.add(id);

        const result = results[producer];
        if (result?.status === "succeeded") {
          const present = Object.hasOwn(result.outputs, key);
          if (!present || result.outputs[key] === null) {
            findings.push({
              check: this.name,
              severity: "error",
              tasks: [producer, consumer.id],
              keys: [key],
              message: `Task "${consumer.id}" needs output "${key}" of task "${producer}", which is ${present ? "null" : "missing"}`,
            });
            continue;
          }
        }

        const type = typeOf.get(producer);
        const declared = type === undefined ? undefined : contracts.contract(type)?.outputs;
        if (type === undefined || declared === undefined || declared.includes(key)) continue;
        findings.push({
          check: this.name,
          severity: "warning",
          tasks: [producer, consumer.id],
          keys: [key],
          message: `Task "${consumer.id}" reads output "${key}" of task "${producer}", which type "${type}" does not declare`,
        });
      }
    }
    return findings;
  },
};

/** Entity sets may only narrow across a dependency edge when the consumer is a filter. */
export const coverage: ConsistencyRule = {
  name: "coverage",
  toggle: "coverage",
  check(input) {
    const findings: Finding[] = [];
    for (const { task, result } of succeeded(input)) {
      const contract = input.contracts.contract(task.type);
      if (!contract?.entityKey) continue;
      const key = contract.entityKey;
      const value = result.outputs[key];
      if (isArtifactRef(value)) {
        findings.push({
          check: this.name,
          severity: "info",
          tasks: [task.id],
          keys: [key],
          message: `Entities of task "${task.id}" are held in artifact ${value.$artifact} and were not inspected`,
        });
        continue;
      }
      const own = stringArray(value);
      if (!own) continue;
      const ownSet = new Set(own);

      for (const depId of task.dependsOn) {
        const dep = input.results[depId];
        const depSpec = input.plan.tasks.find((t) => t.id === depId);
        if (dep?.status !== "succeeded" || !depSpec) continue;
        const depKey = input.contracts.contract(depSpec.type)?.entityKey;
        if (!depKey) continue;
        const upstream = stringArray(dep.outputs[depKey]);
        if (!upstream) continue;
        const upstreamSet = new Set(upstream);

        const absent = own.filter((id) => !upstreamSet.has(id));
        if (absent.length > 0) {
          findings.push({
            check: this.name,
            severity: "warning",
            tasks: [depId, task.id],
            keys: [depKey, key],
            message: `Task "${task.id}" reports ${absent.length} entities absent from "${depId}": ${preview(absent)}`,
          });
        }

        const dropped = upstream.filter((id) => !ownSet.has(id));
        if (dropped.length > 0 && !contract.filters) {
          findings.push({
            check: this.name,
            severity: "warning",
            tasks: [depId, task.id],
            keys: [depKey, key],
            message: `Task "${task.id}" dropped ${dropped.length} entities received from "${depId}": ${preview(dropped)}`,
          });
        }
      }
    }
    return findings;
  },
};

export const valueRange: ConsistencyRule = {
  name: "value-range",
  toggle: "valueRange",
  check(input) {
    const findings: Finding[] = [];
    for (const { task, result } of succeeded(input)) {
      const ranges = input.contracts.contract(task.type)?.ranges ?? {};
      for (const [key, [min, max]] of Object.entries(ranges)) {
        const value = result.outputs[key];
        const numbers: JsonValue[] = typeof value === "number" ? [value] : Array.isArray(value) ? value : [];
        const outside = numbers.filter((n): n is number => typeof n === "number" && (n < min || n > max));
        if (outside.length === 0) continue;
        findings.push({
          check: this.name,
          severity: "warning",
          tasks: [task.id],
          keys: [key],
          message: `Output "${key}" of task "${task.id}" has ${outside.length} value(s) outside [${min}, ${max}]: ${preview(outside.map(String))}`,
        });
      }
    }
    return findings;
  },
};

/** A succeeded task never consumes a skipped or failed one. Firing means the executor misbehaved. */
export const skippedImpact: ConsistencyRule = {
  name: "skipped-impact",
  toggle: "skippedImpact",
  check(input) {
    const findings: Finding[] = [];
    for (const { task } of succeeded(input)) {
      const upstream = new Set([...task.dependsOn, ...collectReferences(task.config).map((r) => r.$output.task)]);
      for (const id of upstream) {
        const status = input.results[id]?.status;
        if (status !== "skipped" && status !== "failed") continue;
        findings.push({
          check: this.name,
          severity: "error",
          tasks: [id, task.id],
          keys: [],
          message: `Task "${task.id}" succeeded although its upstream task "${id}" is ${status}`,
        });
      }
    }
    return findings;
  },
};

export const outputContract: ConsistencyRule = {
  name: "output-contract",
  toggle: "outputContract",
  check(input) {
    const findings: Finding[] = [];
    for (const { task, result } of succeeded(input)) {
      const promised = input.contracts.contract(task.type)?.outputs ?? [];
      const missing = promised.filter((key) => !Object.hasOwn(result.outputs, key));
      if (missing.length === 0) continue;
      findings.push({
        check: this.name,
        severity: "warning",
        tasks: [task.id],
        keys: missing,
        message: `Task "${task.id}" (${task.type}) did not produce ${missing.map((k) => `"${k}"`).join(", ")}`,
      });
    }
    return findings;
  },
};

export const DEFAULT_RULES: readonly ConsistencyRule[] = [
  referentialCompleteness,
  coverage,
  valueRange,
  skippedImpact,
  outputContract,
];
