import { getConfig } from "../config.js";
import { TaskError, errorMessage } from "../errors.js";
import type { TaskOutputs } from "../planner/types.js";
import type { ResolvedConfig } from "../references/resolver.js";
import { withRetry } from "../utils/retry.js";
import type { TaskBody, TaskContext, TaskContract } from "./types.js";

export type TaskFunction = (config: ResolvedConfig, context: TaskContext) => Promise<TaskOutputs>;

export type FunctionTaskOptions = {
  type: string;
  fn: TaskFunction;
  contract: TaskContract;
  description?: string;
  /** Timeout per attempt in ms (default: config timeouts.task). */
  timeout?: number;
  /** Extra attempts after the first failure. Timeouts and TaskErrors of kind "invalid-input" are not retried. */
  retries?: number;
  retryDelayMs?: number;
};

const NO_RETRY_KINDS = new Set(["timeout", "invalid-input"]);

/** Adapts a plain async function into a registered task body. */
export class FunctionTask implements TaskBody {
  readonly type: string;
  readonly description?: string;
  readonly contract: TaskContract;

  private fn: TaskFunction;
  private timeout: number;
  private retries: number;
  private retryDelayMs: number;

  constructor(opts: FunctionTaskOptions) {
    this.type = opts.type;
    this.fn = opts.fn;
    this.contract = opts.contract;
    this.description = opts.description;
    this.timeout = opts.timeout ?? getConfig().timeouts.task;
    this.retries = opts.retries ?? 0;
    this.retryDelayMs = opts.retryDelayMs ?? 500;
  }

  async invoke(config: ResolvedConfig, context: TaskContext): Promise<TaskOutputs> {
    const start = Date.now();
    const outputs = await withRetry((attempt) => this.attempt(config, context, attempt), {
      maxAttempts: this.retries + 1,
      baseDelayMs: this.retryDelayMs,
      shouldRetry: (err) => !(err instanceof TaskError && NO_RETRY_KINDS.has(err.kind)),
      onRetry: (err, attempt, delayMs) =>
        context.log.warn(`Attempt ${attempt} failed, retrying in ${delayMs}ms`, { error: errorMessage(err) }),
    });
    context.log.debug(`Completed in ${Date.now() - start}ms`);
    return outputs;
  }

  private async attempt(config: ResolvedConfig, context: TaskContext, attempt: number): Promise<TaskOutputs> {
    if (attempt > 1) context.log.info(`Attempt ${attempt}`);
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        this.fn(config, context),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new TaskError("timeout", `Task type "${this.type}" timed out after ${this.timeout}ms`)),
            this.timeout,
          );
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
