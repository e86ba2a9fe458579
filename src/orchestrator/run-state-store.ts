/**
 * Run State Store (InMemory + SQLite)
 *
 * One RunState per environment; saving replaces the previous run.
 */

import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type BetterSqlite3 from "better-sqlite3";
import { z } from "zod";
import type { RunState } from "../types.js";

export interface RunStateStore {
  load(environment: string): Promise<RunState | null>;
  save(state: RunState): Promise<void>;
  clear(environment: string): Promise<boolean>;
  close(): Promise<void>;
}

const phaseRecordSchema = z.object({
  phase: z.enum(["credentials_resolved", "provisioned", "ready", "configured", "verified"]),
  outcome: z.enum(["success", "failure", "skipped"]),
  startedAt: z.string(),
  completedAt: z.string(),
  detail: z.string().optional(),
  error: z.string().optional(),
});

const runStateSchema = z.object({
  runId: z.string(),
  environment: z.string(),
  startedAt: z.string(),
  updatedAt: z.string(),
  phases: z.array(phaseRecordSchema),
  targets: z.array(
    z.object({
      id: z.string(),
      role: z.string(),
      name: z.string(),
      group: z.string(),
      address: z.string(),
      privateAddress: z.string().optional(),
      status: z.enum(["unknown", "unreachable", "ready", "failed"]),
    }),
  ),
});

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryRunStateStore implements RunStateStore {
  private states = new Map<string, RunState>();

  async load(environment: string): Promise<RunState | null> {
    const state = this.states.get(environment);
    return state ? structuredClone(state) : null;
  }

  async save(state: RunState): Promise<void> {
    this.states.set(state.environment, structuredClone(state));
  }

  async clear(environment: string): Promise<boolean> {
    return this.states.delete(environment);
  }

  async close(): Promise<void> {
    this.states.clear();
  }
}

// ── SQLite ──────────────────────────────────────────────────────

type RunRow = { state_json: string };

export class SQLiteRunStateStore implements RunStateStore {
  private db: BetterSqlite3.Database | null = null;

  constructor(private readonly dbPath: string) {}

  async initialize(): Promise<void> {
    if (this.dbPath !== ":memory:") await mkdir(dirname(this.dbPath), { recursive: true });
    const Database = (await import("better-sqlite3")).default;
    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(`
      CREATE TABLE IF NOT EXISTS run_states (
        environment TEXT PRIMARY KEY,
        run_id TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        state_json TEXT NOT NULL
      );
    `);
    this.db = db;
  }

  async load(environment: string): Promise<RunState | null> {
    const row = this.database()
      .prepare<[string], RunRow>("SELECT state_json FROM run_states WHERE environment = ?")
      .get(environment);
    return row ? runStateSchema.parse(JSON.parse(row.state_json)) : null;
  }

  async save(state: RunState): Promise<void> {
    this.database()
      .prepare<[string, string, string, string]>(
        "INSERT OR REPLACE INTO run_states (environment, run_id, updated_at, state_json) VALUES (?, ?, ?, ?)",
      )
      .run(state.environment, state.runId, state.updatedAt, JSON.stringify(state));
  }

  async clear(environment: string): Promise<boolean> {
    return (
      this.database().prepare<[string]>("DELETE FROM run_states WHERE environment = ?").run(environment).changes > 0
    );
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private database(): BetterSqlite3.Database {
    if (!this.db) throw new Error("Run state store is not initialized");
    return this.db;
  }
}

/** Open the store named by the configuration. */
export async function openRunStateStore(file: string): Promise<RunStateStore> {
  const store = new SQLiteRunStateStore(file);
  await store.initialize();
  return store;
}
