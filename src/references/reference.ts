import { PlanError } from "../errors.js";
import type { ConfigValue, JsonValue, OutputRef, RefTemplate, TaskConfig } from "../planner/types.js";

const REF_MARKER = "${output.";
const REF_PATTERN = /\$\{output\.([A-Za-z0-9_-]+)\.([A-Za-z0-9_-]+)\}/g;

export function outputRef(task: string, key: string): OutputRef {
  return { $output: { task, key } };
}

/** Textual form of a reference, as written in templates and plan files. */
export function formatRef(ref: OutputRef): string {
  return `\${output.${ref.$output.task}.${ref.$output.key}}`;
}

export function isOutputRef(value: unknown): value is OutputRef {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  if (!("$output" in value)) return false;
  const target = value.$output;
  return (
    typeof target === "object" &&
    target !== null &&
    "task" in target &&
    "key" in target &&
    typeof target.task === "string" &&
    typeof target.key === "string"
  );
}

export function isRefTemplate(value: unknown): value is RefTemplate {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "$template" in value &&
    Array.isArray(value.$template)
  );
}

function parseString(text: string, where: string): string | OutputRef | RefTemplate {
  if (!text.includes(REF_MARKER)) return text;

  const parts: Array<string | OutputRef> = [];
  let cursor = 0;
  for (const match of text.matchAll(REF_PATTERN)) {
    const start = match.index ?? 0;
    if (start > cursor) parts.push(text.slice(cursor, start));
    parts.push(outputRef(match[1], match[2]));
    cursor = start + match[0].length;
  }
  if (cursor < text.length) parts.push(text.slice(cursor));

  for (const part of parts) {
    if (typeof part === "string" && part.includes(REF_MARKER)) {
      throw new PlanError(
        "INVALID_CONFIGURATION",
        `Malformed output reference at ${where}: "${text}" (expected \${output.<task>.<key>})`,
      );
    }
  }

  if (parts.length === 1 && typeof parts[0] !== "string") return parts[0];
  return { $template: parts };
}

function parseValue(value: JsonValue, where: string): ConfigValue {
  if (typeof value === "string") return parseString(value, where);
  if (value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((item, i) => parseValue(item, `${where}[${i}]`));

  if ("$output" in value || "$template" in value) {
    throw new PlanError("INVALID_CONFIGURATION", `Config key at ${where} uses a reserved name ($output/$template)`);
  }
  const out: { [key: string]: ConfigValue } = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = parseValue(item, `${where}.${key}`);
  }
  return out;
}

/**
 * Turn a raw config (references in `${output.task.key}` form) into a typed
 * TaskConfig. Throws PlanError INVALID_CONFIGURATION on malformed references.
 */
export function parseConfig(raw: Record<string, JsonValue>, owner = "config"): TaskConfig {
  const config: TaskConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    config[key] = parseValue(value, `${owner}.${key}`);
  }
  return config;
}

function formatValue(value: ConfigValue): JsonValue {
  if (isOutputRef(value)) return formatRef(value);
  if (isRefTemplate(value)) {
    return value.$template.map((part) => (typeof part === "string" ? part : formatRef(part))).join("");
  }
  if (value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(formatValue);
  const out: { [key: string]: JsonValue } = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = formatValue(item);
  }
  return out;
}

/** Inverse of parseConfig: references are written back in textual form. */
export function formatConfig(config: TaskConfig): Record<string, JsonValue> {
  const raw: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(config)) {
    raw[key] = formatValue(value);
  }
  return raw;
}

function collect(value: ConfigValue, into: OutputRef[]): void {
  if (isOutputRef(value)) {
    into.push(value);
    return;
  }
  if (isRefTemplate(value)) {
    for (const part of value.$template) {
      if (typeof part !== "string") into.push(part);
    }
    return;
  }
  if (value === null || typeof value !== "object") return;
  const children = Array.isArray(value) ? value : Object.values(value);
  for (const child of children) collect(child, into);
}

/** Every reference in a config, in traversal order. Duplicates are kept. */
export function collectReferences(config: TaskConfig): OutputRef[] {
  const refs: OutputRef[] = [];
  for (const value of Object.values(config)) collect(value, refs);
  return refs;
}
