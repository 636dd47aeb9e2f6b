// Config
export {
  getConfig,
  configure,
  resetConfig,
  defaults,
  loadConfigFile,
  parseConfigOverrides,
  OrchestratorConfigSchema,
} from "./config.js";
export type { OrchestratorConfig, DeepPartial } from "./config.js";

// Errors
export {
  OrchestratorError,
  PlanError,
  ResolutionError,
  TaskError,
  RunTimeoutError,
  ValidationError,
  ParseError,
  ConfigError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, PlanErrorCode, ResolutionErrorCode, ValidationErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  RunParametersSchema,
  PlanParametersSchema,
  PlanFileSchema,
  TaskResultSchema,
} from "./schemas.js";
export type { RunParameters, PlanParameters, PlanFile } from "./schemas.js";

// Planner
export { Planner, createPlan, planId } from "./planner/planner.js";
export type { PlannerOptions, CreatePlanOptions, TaskDraft } from "./planner/planner.js";
export { validatePlan, topologicalSort, dependentsOf, downstreamOf, findCycle } from "./planner/task-graph.js";
export { TEMPLATES } from "./planner/templates.js";
export { PLAN_FORMAT_VERSION } from "./planner/types.js";
export type {
  Plan,
  TaskSpec,
  TaskConfig,
  ConfigValue,
  OutputRef,
  RefTemplate,
  ArtifactRef,
  OutputValue,
  TaskOutputs,
  JsonValue,
  AnalysisType,
} from "./planner/types.js";

// References
export { outputRef, formatRef, parseConfig, formatConfig, collectReferences } from "./references/reference.js";
export { resolveConfig } from "./references/resolver.js";
export type { ResolvedConfig, ResolvedValue, OutputLookup } from "./references/resolver.js";

// Tasks
export { TaskRegistry } from "./tasks/registry.js";
export type { ContractSource } from "./tasks/registry.js";
export { FunctionTask } from "./tasks/function-task.js";
export type { FunctionTaskOptions, TaskFunction } from "./tasks/function-task.js";
export { TaskTypes, PIPELINE_CONTRACTS } from "./tasks/contracts.js";
export { createSimulatedTasks, simulatedScore } from "./tasks/simulated.js";
export { artifact, isArtifactRef } from "./tasks/types.js";
export type { TaskBody, TaskContext, TaskContract, RunServices, ValueRange } from "./tasks/types.js";

// Executor
export { Executor } from "./executor/executor.js";
export type { ExecutorOptions } from "./executor/executor.js";
export { RunContext } from "./executor/run-context.js";
export { OutputStore } from "./executor/output-store.js";
export type {
  TaskStatus,
  TaskResult,
  TaskFailure,
  RunStatus,
  RunOutcome,
  ExecutionOptions,
} from "./executor/types.js";

// Critic
export { ConsistencyChecker } from "./critic/checker.js";
export type { CheckerOptions } from "./critic/checker.js";
export { DEFAULT_RULES } from "./critic/rules.js";
export type { ConsistencyRule, Finding, FindingsReport, Severity, ReportStatus } from "./critic/types.js";

// Persistence
export { serializePlan, parsePlan, savePlan, loadPlan, formatForPath } from "./persistence/plan-file.js";
export type { PlanFormat } from "./persistence/plan-file.js";
export { RunStore } from "./persistence/store.js";
export type { RunRecord, StoredRun } from "./persistence/store.js";

// Utils
export { log, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
