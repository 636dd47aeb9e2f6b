export type PlanErrorCode =
  | "INVALID_CONFIGURATION"
  | "UNKNOWN_DEPENDENCY"
  | "CYCLIC_DEPENDENCY"
  | "UNDECLARED_DEPENDENCY";

export type ResolutionErrorCode = "UNRESOLVED_REFERENCE" | "MISSING_OUTPUT_KEY";

export type ValidationErrorCode = "DUPLICATE_REGISTRATION" | "ILLEGAL_TRANSITION" | "OUTPUT_CONFLICT";

export type ErrorCode =
  | PlanErrorCode
  | ResolutionErrorCode
  | ValidationErrorCode
  | "TASK_ERROR"
  | "RUN_TIMEOUT"
  | "PARSE_ERROR"
  | "CONFIG_ERROR"
  | "RUN_NOT_FOUND";

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

/** Raised while compiling or validating a plan. No plan is produced. */
export class PlanError extends OrchestratorError {
  declare readonly code: PlanErrorCode;

  constructor(code: PlanErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "PlanError";
  }
}

/** Raised when a task's config cannot be resolved against the run's outputs. */
export class ResolutionError extends OrchestratorError {
  declare readonly code: ResolutionErrorCode;
  readonly task: string;
  readonly key: string;

  constructor(code: ResolutionErrorCode, task: string, key: string, message: string) {
    super(code, message);
    this.name = "ResolutionError";
    this.task = task;
    this.key = key;
  }
}

/**
 * Failure signalled by a task body. `kind` is free-form and owned by the body
 * ("timeout", "invalid-input", "upstream-unavailable", ...).
 */
export class TaskError extends OrchestratorError {
  readonly kind: string;

  constructor(kind: string, message: string, options?: { cause?: unknown }) {
    super("TASK_ERROR", message, options);
    this.name = "TaskError";
    this.kind = kind;
  }
}

export class RunTimeoutError extends OrchestratorError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("RUN_TIMEOUT", `Run exceeded its ${timeoutMs}ms timeout`);
    this.name = "RunTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ValidationError extends OrchestratorError {
  declare readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class ParseError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_ERROR", message, options);
    this.name = "ParseError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
