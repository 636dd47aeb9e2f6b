import { TaskError } from "../errors.js";
import type { ResolvedConfig } from "../references/resolver.js";
import { isArtifactRef } from "./types.js";

// Narrowing helpers for task bodies. Each throws TaskError("invalid-input").

function invalid(key: string, expected: string): TaskError {
  return new TaskError("invalid-input", `Config "${key}" must be ${expected}`);
}

export function readString(config: ResolvedConfig, key: string): string {
  const value = config[key];
  if (typeof value !== "string") throw invalid(key, "a string");
  return value;
}

export function readOptionalString(config: ResolvedConfig, key: string): string | undefined {
  return config[key] === undefined || config[key] === null ? undefined : readString(config, key);
}

export function readNumber(config: ResolvedConfig, key: string): number {
  const value = config[key];
  if (typeof value !== "number" || Number.isNaN(value)) throw invalid(key, "a number");
  return value;
}

export function readStringArray(config: ResolvedConfig, key: string): string[] {
  const value = config[key];
  if (!Array.isArray(value)) throw invalid(key, "an array of strings");
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") throw invalid(key, "an array of strings");
    out.push(item);
  }
  return out;
}

/** Accepts a plain path or an artifact reference and returns its locator. */
export function readLocator(config: ResolvedConfig, key: string): string {
  const value = config[key];
  if (typeof value === "string") return value;
  if (isArtifactRef(value)) return value.$artifact;
  throw invalid(key, "a path or artifact reference");
}
