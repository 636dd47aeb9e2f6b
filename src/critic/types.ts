import type { OrchestratorConfig } from "../config.js";
import type { TaskResult } from "../executor/types.js";
import type { Plan } from "../planner/types.js";
import type { ContractSource } from "../tasks/registry.js";

export type Severity = "info" | "warning" | "error";

export type Finding = {
  /** Name of the check that produced it, or "internal" when a check crashed. */
  check: string;
  severity: Severity;
  tasks: string[];
  keys: string[];
  message: string;
};

export type ReportStatus = "pass" | "warning" | "error";

export type FindingsReport = {
  planId: string;
  runId?: string;
  generatedAt: string;
  status: ReportStatus;
  counts: Record<Severity, number>;
  findings: Finding[];
};

export type CheckName = keyof OrchestratorConfig["critic"]["checks"];

export type CheckInput = {
  plan: Plan;
  results: Readonly<Record<string, TaskResult>>;
  contracts: ContractSource;
};

/** One cross-task invariant. Rules are pure; they only read the plan and results. */
export interface ConsistencyRule {
  readonly name: string;
  /** Switch under `critic.checks` that turns the rule off. Rules without one always run. */
  readonly toggle?: CheckName;
  check(input: CheckInput): Finding[];
}
