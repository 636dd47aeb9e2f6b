import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, extname } from "node:path";
import { dump, JSON_SCHEMA, load } from "js-yaml";
import { ParseError } from "../errors.js";
import { deepFreeze, planId } from "../planner/planner.js";
import { validatePlan } from "../planner/task-graph.js";
import { PLAN_FORMAT_VERSION, type Plan, type TaskSpec } from "../planner/types.js";
import { formatConfig, parseConfig } from "../references/reference.js";
import { PlanFileSchema, parseOrThrow, type PlanFile } from "../schemas.js";
import { log } from "../utils/logger.js";

export type PlanFormat = "yaml" | "json";

export function formatForPath(path: string): PlanFormat {
  return extname(path).toLowerCase() === ".json" ? "json" : "yaml";
}

function toDocument(plan: Plan): PlanFile {
  return {
    id: plan.id,
    version: plan.version,
    createdAt: plan.createdAt,
    parameters: structuredClone(plan.parameters),
    configSnapshot: structuredClone(plan.configSnapshot),
    tasks: plan.tasks.map((task) => ({
      id: task.id,
      type: task.type,
      ...(task.description === undefined ? {} : { description: task.description }),
      dependsOn: [...task.dependsOn],
      config: formatConfig(task.config),
    })),
  };
}

/** Write a plan as YAML or JSON. References are stored in `${output.task.key}` form. */
export function serializePlan(plan: Plan, format: PlanFormat = "yaml"): string {
  const doc = toDocument(plan);
  if (format === "json") return `${JSON.stringify(doc, null, 2)}\n`;
  return dump(doc, { noRefs: true, lineWidth: -1 });
}

/**
 * Read a plan document back. The plan id is kept as stored so that results
 * persisted against it still match. Throws ParseError or PlanError.
 */
export function parsePlan(text: string, format: PlanFormat = "yaml"): Plan {
  let raw: unknown;
  try {
    raw = format === "json" ? JSON.parse(text) : load(text, { schema: JSON_SCHEMA });
  } catch (err) {
    throw new ParseError(`Plan document is not valid ${format.toUpperCase()}`, { cause: err });
  }

  const doc = parseOrThrow(PlanFileSchema, raw, "plan document");
  const tasks: TaskSpec[] = doc.tasks.map((record) => ({
    id: record.id,
    type: record.type,
    ...(record.description === undefined ? {} : { description: record.description }),
    dependsOn: record.dependsOn,
    config: parseConfig(record.config, record.id),
  }));
  validatePlan(tasks);

  const expected = planId(doc.parameters, tasks);
  if (expected !== doc.id) {
    log.warn(`Plan ${doc.id} does not match its content hash (${expected}); it was edited after compilation`);
  }

  const plan: Plan = {
    id: doc.id,
    version: PLAN_FORMAT_VERSION,
    createdAt: doc.createdAt,
    parameters: doc.parameters,
    configSnapshot: doc.configSnapshot,
    tasks,
  };
  return deepFreeze(plan);
}

export async function savePlan(plan: Plan, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializePlan(plan, formatForPath(path)), "utf8");
  log.info(`Plan ${plan.id} saved to ${path}`);
}

export async function loadPlan(path: string): Promise<Plan> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ParseError(`Cannot read plan file ${path}`, { cause: err });
  }
  return parsePlan(text, formatForPath(path));
}
