import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { RunStatus, TaskResult } from "../executor/types.js";
import type { Plan } from "../planner/types.js";
import type { ContractSource } from "../tasks/registry.js";
import { log } from "../utils/logger.js";
import { DEFAULT_RULES } from "./rules.js";
import type { CheckName, ConsistencyRule, Finding, FindingsReport, ReportStatus, Severity } from "./types.js";

export type CheckerOptions = {
  contracts: ContractSource;
  /** Appended to the built-in rules. */
  rules?: ConsistencyRule[];
  /** Overrides `critic.checks` from the configuration. */
  checks?: Partial<Record<CheckName, boolean>>;
};

/** The checker only reads runs that finished scheduling every task. */
export function isCheckable(status: RunStatus | "running"): boolean {
  return status === "all-succeeded" || status === "partially-failed";
}

function statusOf(counts: Record<Severity, number>): ReportStatus {
  if (counts.error > 0) return "error";
  if (counts.warning > 0) return "warning";
  return "pass";
}

/**
 * Re-reads a finished run and reports cross-task inconsistencies. Every rule
 * runs even when earlier ones report; `check` itself never throws.
 */
export class ConsistencyChecker {
  private contracts: ContractSource;
  private rules: ConsistencyRule[];
  private checks?: Partial<Record<CheckName, boolean>>;

  constructor(opts: CheckerOptions) {
    this.contracts = opts.contracts;
    this.rules = [...DEFAULT_RULES, ...(opts.rules ?? [])];
    this.checks = opts.checks;
  }

  check(plan: Plan, results: Readonly<Record<string, TaskResult>>, runId?: string): FindingsReport {
    const findings: Finding[] = [];
    const anySucceeded = plan.tasks.some((t) => results[t.id]?.status === "succeeded");

    if (!anySucceeded) {
      findings.push({
        check: "completion",
        severity: "info",
        tasks: [],
        keys: [],
        message: "No task succeeded; there is nothing to check",
      });
    } else {
      const enabled = { ...getConfig().critic.checks, ...this.checks };
      for (const rule of this.rules) {
        if (rule.toggle && enabled[rule.toggle] === false) continue;
        try {
          findings.push(...rule.check({ plan, results, contracts: this.contracts }));
        } catch (err) {
          findings.push({
            check: "internal",
            severity: "error",
            tasks: [],
            keys: [],
            message: `Check "${rule.name}" crashed: ${errorMessage(err)}`,
          });
        }
      }
    }

    const counts: Record<Severity, number> = { info: 0, warning: 0, error: 0 };
    for (const f of findings) counts[f.severity]++;
    const report: FindingsReport = {
      planId: plan.id,
      ...(runId === undefined ? {} : { runId }),
      generatedAt: new Date().toISOString(),
      status: statusOf(counts),
      counts,
      findings,
    };

    log.scope("critic").info(`Plan ${plan.id}: ${report.status}`, { ...counts, ...(runId ? { runId } : {}) });
    return report;
  }
}
