#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { getConfig, loadConfigFile, type OrchestratorConfig } from "./config.js";
import { ConsistencyChecker, isCheckable } from "./critic/checker.js";
import type { FindingsReport } from "./critic/types.js";
import { OrchestratorError, errorMessage } from "./errors.js";
import { Executor } from "./executor/executor.js";
import type { ExecutionOptions, RunOutcome } from "./executor/types.js";
import { loadPlan, savePlan } from "./persistence/plan-file.js";
import { RunStore } from "./persistence/store.js";
import { Planner } from "./planner/planner.js";
import type { Plan } from "./planner/types.js";
import { AnalysisTypeSchema, type RunParameters } from "./schemas.js";
import { TaskRegistry } from "./tasks/registry.js";
import { createSimulatedTasks } from "./tasks/simulated.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

type CompileFlags = {
  input: string;
  outputDir: string;
  analysis: string;
  sample?: string;
  phenotype?: string;
  minQuality?: number;
  maxPopulationFreq?: number;
  windowSize?: number;
  planFile?: string;
};

type ExecuteFlags = {
  concurrency?: number;
  timeout?: number;
  haltOnFailure?: boolean;
  fail?: string[];
  variants?: number;
  db?: string;
  check: boolean;
};

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError("Expected a number.");
  return n;
}

const program = new Command();

program
  .name("variant-orchestrator")
  .description("Compile, run, resume and check variant analysis task graphs")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--config <file>", "YAML file with configuration overrides");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<{ debug?: boolean; config?: string }>();
  if (opts.config) loadConfigFile(opts.config);
  setLogLevel(opts.debug ? "debug" : getConfig().logLevel);
});

function withCompileOptions(cmd: Command): Command {
  return cmd
    .requiredOption("-i, --input <vcf>", "Input VCF (.vcf or .vcf.gz)")
    .requiredOption("-o, --output-dir <dir>", "Directory for task outputs, the plan and the report")
    .option("-a, --analysis <type>", "Analysis type (full | screening)", "full")
    .option("-s, --sample <name>", "Sample name used in file names and the report")
    .option("--phenotype <text>", "Phenotype context for the report (full analysis only)")
    .option("--min-quality <n>", "Minimum variant quality", parseNumber)
    .option("--max-population-freq <f>", "Maximum population allele frequency", parseNumber)
    .option("--window-size <n>", "Sequence context window size", parseInteger)
    .option("--plan-file <path>", "Where to save the plan (default: <output-dir>/plan.yaml)");
}

function withExecuteOptions(cmd: Command): Command {
  return cmd
    .option("-c, --concurrency <n>", "Max tasks running at once", parseInteger)
    .option("-t, --timeout <ms>", "Run timeout in ms (0 disables)", parseInteger)
    .option("--halt-on-failure", "Stop scheduling after the first failure")
    .option("--fail <type...>", "Make these simulated task types fail")
    .option("--variants <n>", "Variants produced by the simulated filter", parseInteger)
    .option("--db <path>", "Run store database (default: persistence.dbPath)")
    .option("--no-check", "Skip the consistency check after the run");
}

/** Simulated bodies, configured from `config` (a plan's snapshot when replaying one). */
function buildRegistry(
  flags: Pick<ExecuteFlags, "fail" | "variants">,
  config: Readonly<OrchestratorConfig> = getConfig(),
): TaskRegistry {
  return new TaskRegistry().addAll(
    createSimulatedTasks({
      failTypes: flags.fail,
      variantCount: flags.variants ?? config.simulation.variantCount,
      timeout: config.timeouts.task,
    }),
  );
}

function checkerFor(plan: Plan, registry: TaskRegistry): ConsistencyChecker {
  return new ConsistencyChecker({ contracts: registry, checks: plan.configSnapshot.critic.checks });
}

function compile(flags: CompileFlags, registry: TaskRegistry): Plan {
  const analysis = AnalysisTypeSchema.safeParse(flags.analysis);
  if (!analysis.success) throw new InvalidArgumentError(`Unknown analysis "${flags.analysis}".`);
  const params: RunParameters = {
    analysis: analysis.data,
    inputVcf: flags.input,
    outputDir: flags.outputDir,
    ...(flags.sample === undefined ? {} : { sampleName: flags.sample }),
    ...(flags.phenotype === undefined ? {} : { phenotype: flags.phenotype }),
    ...(flags.minQuality === undefined ? {} : { minQuality: flags.minQuality }),
    ...(flags.maxPopulationFreq === undefined ? {} : { maxPopulationFreq: flags.maxPopulationFreq }),
    ...(flags.windowSize === undefined ? {} : { windowSize: flags.windowSize }),
  };
  return new Planner({ registry }).compile(params);
}

function executionOptions(flags: ExecuteFlags): ExecutionOptions {
  return {
    ...(flags.concurrency === undefined ? {} : { maxConcurrency: flags.concurrency }),
    ...(flags.timeout === undefined ? {} : { timeoutMs: flags.timeout }),
    ...(flags.haltOnFailure ? { haltOnFailure: true } : {}),
  };
}

function printOutcome(outcome: RunOutcome): void {
  const ids = Object.keys(outcome.results);
  const width = Math.max(4, ...ids.map((id) => id.length));
  console.log(`\nRun ${outcome.runId} (plan ${outcome.planId})`);
  console.log(`  ${"TASK".padEnd(width)}  ${"STATUS".padEnd(9)}  DETAIL`);
  for (const result of Object.values(outcome.results)) {
    const detail = result.error?.message ?? result.reason ?? Object.keys(result.outputs).join(", ");
    console.log(`  ${result.taskId.padEnd(width)}  ${result.status.padEnd(9)}  ${detail}`);
  }
  console.log(`\n${outcome.status} in ${outcome.durationMs}ms`);
  if (outcome.error) console.error(`Halted: ${outcome.error.message}`);
}

async function writeReport(report: FindingsReport, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, "utf8");
  console.log(`Consistency check: ${report.status} (${report.counts.error} errors, ${report.counts.warning} warnings) -> ${path}`);
  for (const f of report.findings) {
    if (f.severity !== "info") console.log(`  [${f.severity}] ${f.check}: ${f.message}`);
  }
}

function reportPath(plan: Plan): string {
  return join(plan.parameters.outputDir, getConfig().persistence.findingsFileName);
}

/** Execute, print, check. Sets a failing exit code unless everything succeeded and the check passed. */
async function executeAndCheck(
  plan: Plan,
  store: RunStore,
  flags: ExecuteFlags,
  start: (executor: Executor) => Promise<RunOutcome>,
): Promise<void> {
  const registry = buildRegistry(flags, plan.configSnapshot);
  const outcome = await start(new Executor(registry, { store }));
  printOutcome(outcome);
  if (outcome.status !== "all-succeeded") process.exitCode = 1;

  if (!flags.check) return;
  if (!isCheckable(outcome.status)) {
    console.log(`Consistency check skipped: run ${outcome.runId} is ${outcome.status}`);
    return;
  }
  const report = checkerFor(plan, registry).check(plan, outcome.results, outcome.runId);
  await writeReport(report, reportPath(plan));
  if (report.status === "error") process.exitCode = 1;
}

async function guarded(label: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(`${label}:`, errorMessage(err));
    process.exitCode = 1;
  }
}

// --- plan ---
withCompileOptions(program.command("plan"))
  .description("Compile a plan and save it without running it")
  .action(async (flags: CompileFlags) => {
    await guarded("Plan failed", async () => {
      const plan = compile(flags, buildRegistry({}));
      const path = flags.planFile ?? join(flags.outputDir, getConfig().persistence.planFileName);
      await savePlan(plan, path);
      console.log(`Plan ${plan.id} -> ${path}`);
      for (const task of plan.tasks) {
        const deps = task.dependsOn.length > 0 ? ` <- ${task.dependsOn.join(", ")}` : "";
        console.log(`  ${task.id} (${task.type})${deps}`);
      }
    });
  });

// --- run ---
withExecuteOptions(withCompileOptions(program.command("run")))
  .description("Compile a plan, save it and run it with the simulated task bodies")
  .action(async (flags: CompileFlags & ExecuteFlags) => {
    await guarded("Run failed", async () => {
      const registry = buildRegistry(flags);
      const plan = compile(flags, registry);
      await savePlan(plan, flags.planFile ?? join(flags.outputDir, getConfig().persistence.planFileName));
      const store = new RunStore(flags.db);
      try {
        await executeAndCheck(plan, store, flags, (executor) => executor.run(plan, executionOptions(flags)));
      } finally {
        store.close();
      }
    });
  });

// --- execute-plan ---
withExecuteOptions(program.command("execute-plan"))
  .description("Run a previously saved plan file")
  .argument("<file>", "Plan file (.yaml or .json)")
  .action(async (file: string, flags: ExecuteFlags) => {
    await guarded("Run failed", async () => {
      const plan = await loadPlan(file);
      const store = new RunStore(flags.db);
      try {
        await executeAndCheck(plan, store, flags, (executor) => executor.run(plan, executionOptions(flags)));
      } finally {
        store.close();
      }
    });
  });

// --- resume ---
withExecuteOptions(program.command("resume"))
  .description("Continue a stored run; succeeded tasks are not run again")
  .argument("<runId>", "Run id printed by run or execute-plan")
  .action(async (runId: string, flags: ExecuteFlags) => {
    await guarded("Resume failed", async () => {
      const store = new RunStore(flags.db);
      try {
        const stored = store.loadRun(runId);
        if (!stored) throw new OrchestratorError("RUN_NOT_FOUND", `No stored run with id "${runId}"`);
        await executeAndCheck(stored.plan, store, flags, (executor) =>
          executor.resume(runId, executionOptions(flags)),
        );
      } finally {
        store.close();
      }
    });
  });

// --- check ---
program
  .command("check")
  .description("Run the consistency check over a stored run")
  .argument("<runId>", "Run id")
  .option("--db <path>", "Run store database (default: persistence.dbPath)")
  .option("--out <path>", "Report path (default: <output-dir>/critic_report.json)")
  .action(async (runId: string, flags: { db?: string; out?: string }) => {
    await guarded("Check failed", async () => {
      const store = new RunStore(flags.db);
      try {
        const stored = store.loadRun(runId);
        if (!stored) {
          console.error(`No stored run with id "${runId}"`);
          process.exitCode = 1;
          return;
        }
        if (!isCheckable(stored.record.status)) {
          console.error(`Run ${runId} is ${stored.record.status}; only finished runs that were not halted can be checked`);
          process.exitCode = 1;
          return;
        }
        const report = checkerFor(stored.plan, buildRegistry({}, stored.plan.configSnapshot)).check(
          stored.plan,
          stored.results,
          runId,
        );
        await writeReport(report, flags.out ?? reportPath(stored.plan));
        if (report.status === "error") process.exitCode = 1;
      } finally {
        store.close();
      }
    });
  });

// --- runs ---
program
  .command("runs")
  .description("List stored runs, newest first")
  .option("--db <path>", "Run store database (default: persistence.dbPath)")
  .option("-n, --limit <n>", "How many runs to show", parseInteger, 20)
  .action(async (flags: { db?: string; limit: number }) => {
    await guarded("Listing runs failed", async () => {
      const store = new RunStore(flags.db);
      try {
        const runs = store.listRuns(flags.limit);
        if (runs.length === 0) {
          console.log("No runs stored.");
          return;
        }
        for (const run of runs) {
          const when = new Date(run.startedAt).toISOString();
          const took = run.finishedAt === undefined ? "" : ` ${run.finishedAt - run.startedAt}ms`;
          console.log(`${run.runId}  ${when}  ${run.status.padEnd(16)} plan ${run.planId}${took}`);
        }
      } finally {
        store.close();
      }
    });
  });

// --- tasks ---
program
  .command("tasks")
  .description("List registered task types and their output contracts")
  .action(() => {
    for (const body of buildRegistry({}).list()) {
      console.log(`${body.type}${body.description ? ` - ${body.description}` : ""}`);
      console.log(`    outputs: ${body.contract.outputs.join(", ")}`);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
