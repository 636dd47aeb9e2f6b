import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { getConfig } from "../config.js";
import type { RunOutcome, RunStatus, TaskResult } from "../executor/types.js";
import type { Plan } from "../planner/types.js";
import { TaskResultSchema, parseOrThrow } from "../schemas.js";
import { log } from "../utils/logger.js";
import { parsePlan, serializePlan } from "./plan-file.js";

const RunStateSchema = z.enum(["running", "all-succeeded", "partially-failed", "halted-on-error"]);

export type RunRecord = {
  runId: string;
  planId: string;
  /** "running" until the executor finishes, or forever if the process died mid-run. */
  status: RunStatus | "running";
  error?: string;
  startedAt: number;
  finishedAt?: number;
};

export type StoredRun = {
  record: RunRecord;
  plan: Plan;
  results: Record<string, TaskResult>;
};

/**
 * SQLite-backed history of runs: the plan each one executed and the latest
 * result of every task. Pass ":memory:" for a throwaway store.
 */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().persistence.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        plan_id     TEXT NOT NULL,
        plan        TEXT NOT NULL,
        status      TEXT NOT NULL DEFAULT 'running',
        error       TEXT,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
      CREATE TABLE IF NOT EXISTS task_results (
        run_id      TEXT NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
        task_id     TEXT NOT NULL,
        status      TEXT NOT NULL,
        outputs     TEXT NOT NULL DEFAULT '{}',
        error       TEXT,
        reason      TEXT,
        started_at  INTEGER,
        finished_at INTEGER,
        PRIMARY KEY (run_id, task_id)
      );
    `);
  }

  /** Record a run as started. Resuming an existing run only resets its status. */
  startRun(runId: string, plan: Plan, startedAt = Date.now()): void {
    this.db
      .prepare(`
        INSERT INTO runs (run_id, plan_id, plan, status, started_at)
        VALUES (?, ?, ?, 'running', ?)
        ON CONFLICT(run_id) DO UPDATE SET status = 'running', error = NULL, finished_at = NULL
      `)
      .run(runId, plan.id, serializePlan(plan, "json"), startedAt);
  }

  saveResult(runId: string, result: TaskResult): void {
    this.db
      .prepare(`
        INSERT INTO task_results
          (run_id, task_id, status, outputs, error, reason, started_at, finished_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(run_id, task_id) DO UPDATE SET
          status = excluded.status, outputs = excluded.outputs, error = excluded.error,
          reason = excluded.reason, started_at = excluded.started_at, finished_at = excluded.finished_at
      `)
      .run(
        runId,
        result.taskId,
        result.status,
        JSON.stringify(result.outputs),
        result.error ? JSON.stringify(result.error) : null,
        result.reason ?? null,
        result.startedAt ?? null,
        result.finishedAt ?? null,
      );
  }

  finishRun(runId: string, outcome: RunOutcome): void {
    this.db
      .prepare("UPDATE runs SET status = ?, error = ?, finished_at = ? WHERE run_id = ?")
      .run(outcome.status, outcome.error?.message ?? null, outcome.finishedAt, runId);
  }

  getRun(runId: string): RunRecord | undefined {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE run_id = ?").get(runId);
    return row ? rowToRecord(row) : undefined;
  }

  /** Plan, record and results of a run, or undefined if it was never stored. */
  loadRun(runId: string): StoredRun | undefined {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE run_id = ?").get(runId);
    if (!row) return undefined;
    return { record: rowToRecord(row), plan: parsePlan(row.plan, "json"), results: this.loadResults(runId) };
  }

  loadResults(runId: string): Record<string, TaskResult> {
    const rows = this.db
      .prepare<[string], ResultRow>("SELECT * FROM task_results WHERE run_id = ? ORDER BY rowid")
      .all(runId);
    const results: Record<string, TaskResult> = {};
    for (const row of rows) results[row.task_id] = rowToResult(row);
    return results;
  }

  listRuns(limit = 50): RunRecord[] {
    return this.db
      .prepare<[number], RunRow>("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?")
      .all(limit)
      .map(rowToRecord);
  }

  /** Delete a run and its task results. Returns true if it existed. */
  deleteRun(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    if (result.changes > 0) log.debug(`Deleted run ${runId}`);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}

type RunRow = {
  run_id: string;
  plan_id: string;
  plan: string;
  status: string;
  error: string | null;
  started_at: number;
  finished_at: number | null;
};

type ResultRow = {
  run_id: string;
  task_id: string;
  status: string;
  outputs: string;
  error: string | null;
  reason: string | null;
  started_at: number | null;
  finished_at: number | null;
};

function rowToRecord(row: RunRow): RunRecord {
  return {
    runId: row.run_id,
    planId: row.plan_id,
    status: parseOrThrow(RunStateSchema, row.status, `status of run ${row.run_id}`),
    ...(row.error === null ? {} : { error: row.error }),
    startedAt: row.started_at,
    ...(row.finished_at === null ? {} : { finishedAt: row.finished_at }),
  };
}

function rowToResult(row: ResultRow): TaskResult {
  const raw: unknown = {
    taskId: row.task_id,
    status: row.status,
    outputs: JSON.parse(row.outputs),
    ...(row.error === null ? {} : { error: JSON.parse(row.error) }),
    ...(row.reason === null ? {} : { reason: row.reason }),
    ...(row.started_at === null ? {} : { startedAt: row.started_at }),
    ...(row.finished_at === null ? {} : { finishedAt: row.finished_at }),
  };
  return parseOrThrow(TaskResultSchema, raw, `stored result of task ${row.task_id}`);
}
