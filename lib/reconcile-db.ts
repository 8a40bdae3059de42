/**
 * Run Journal
 *
 * SQLite journal of reconciliation runs and their per-unit outcomes, so a
 * later run can show what failed last time. Remote worklog contents are
 * never stored.
 *
 * Supports:
 * - Local SQLite file (data/reconcile.db)
 * - In-memory SQLite (testing)
 */

import { createClient, type Client, type Row } from "@libsql/client";
import * as path from "path";
import * as fs from "fs";
import type { UnitOutcome } from "./errors.js";
import { formatDateKey } from "./time-format.js";

// Database location
const DATA_DIR = path.join(process.cwd(), "data");
const DEFAULT_DB_PATH = path.join(DATA_DIR, "reconcile.db");

let client: Client | null = null;
let currentDbPath = "";

export type RunKind = "drafts" | "submit" | "plan" | "apply" | "compare" | "delete";

export interface RunRecord {
  kind: RunKind;
  from: Date;
  to: Date;
  startedAt: Date;
  finishedAt: Date;
  outcomes: readonly UnitOutcome[];
}

export interface StoredRun {
  id: number;
  kind: string;
  range_from: string; // YYYY-MM-DD
  range_to: string; // YYYY-MM-DD
  started_at: string; // ISO timestamp
  finished_at: string; // ISO timestamp
  ok_count: number;
  failed_count: number;
}

export interface StoredOutcome {
  run_id: number;
  unit: string;
  status: UnitOutcome["status"];
  message: string;
}

/**
 * Open the journal, creating tables if they don't exist.
 * @param dbPath ":memory:" for tests; defaults to data/reconcile.db
 */
export async function initDatabase(dbPath: string = DEFAULT_DB_PATH): Promise<Client> {
  if (client && currentDbPath !== dbPath) {
    client.close();
    client = null;
  }
  if (client) return client;

  currentDbPath = dbPath;

  if (dbPath === ":memory:") {
    client = createClient({ url: ":memory:" });
  } else {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    client = createClient({ url: `file:${dbPath}` });
  }

  await client.executeMultiple(`
    CREATE TABLE IF NOT EXISTS runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      kind TEXT NOT NULL,
      range_from TEXT NOT NULL,
      range_to TEXT NOT NULL,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL,
      ok_count INTEGER NOT NULL DEFAULT 0,
      failed_count INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

    CREATE TABLE IF NOT EXISTS run_outcomes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL REFERENCES runs(id),
      unit TEXT NOT NULL,
      status TEXT NOT NULL CHECK(status IN ('ok', 'failed')),
      message TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_outcomes_run ON run_outcomes(run_id);
  `);

  return client;
}

export async function getDatabase(): Promise<Client> {
  if (!client) {
    return initDatabase();
  }
  return client;
}

export function closeDatabase(): void {
  if (client) {
    client.close();
    client = null;
    currentDbPath = "";
  }
}

function rowToRun(row: Row): StoredRun {
  return {
    id: Number(row.id),
    kind: String(row.kind),
    range_from: String(row.range_from),
    range_to: String(row.range_to),
    started_at: String(row.started_at),
    finished_at: String(row.finished_at),
    ok_count: Number(row.ok_count),
    failed_count: Number(row.failed_count),
  };
}

/**
 * Store a finished run with its outcomes. Returns the run id.
 */
export async function recordRun(run: RunRecord): Promise<number> {
  const database = await getDatabase();
  const failed = run.outcomes.filter(o => o.status === "failed").length;

  const inserted = await database.execute({
    sql: `
      INSERT INTO runs (kind, range_from, range_to, started_at, finished_at, ok_count, failed_count)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `,
    args: [
      run.kind,
      formatDateKey(run.from),
      formatDateKey(run.to),
      run.startedAt.toISOString(),
      run.finishedAt.toISOString(),
      run.outcomes.length - failed,
      failed,
    ],
  });
  const runId = Number(inserted.lastInsertRowid ?? 0);

  for (const o of run.outcomes) {
    await database.execute({
      sql: "INSERT INTO run_outcomes (run_id, unit, status, message) VALUES (?, ?, ?, ?)",
      args: [runId, o.unit, o.status, o.message],
    });
  }

  return runId;
}

/**
 * Most recent runs first.
 */
export async function getRecentRuns(limit: number = 20, kind?: RunKind): Promise<StoredRun[]> {
  const database = await getDatabase();
  const result = kind
    ? await database.execute({
        sql: "SELECT * FROM runs WHERE kind = ? ORDER BY started_at DESC, id DESC LIMIT ?",
        args: [kind, limit],
      })
    : await database.execute({
        sql: "SELECT * FROM runs ORDER BY started_at DESC, id DESC LIMIT ?",
        args: [limit],
      });
  return result.rows.map(rowToRun);
}

export async function getRunOutcomes(runId: number, onlyFailed: boolean = false): Promise<StoredOutcome[]> {
  const database = await getDatabase();
  const result = await database.execute({
    sql: `SELECT * FROM run_outcomes WHERE run_id = ?${onlyFailed ? " AND status = 'failed'" : ""} ORDER BY id`,
    args: [runId],
  });
  return result.rows.map(row => ({
    run_id: Number(row.run_id),
    unit: String(row.unit),
    status: row.status === "failed" ? "failed" : "ok",
    message: String(row.message),
  }));
}
