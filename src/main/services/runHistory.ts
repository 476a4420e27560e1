/**
 * Run History (SQLite)
 *
 * Keeps a short summary of past runs in a better-sqlite3 database so the
 * `history` command can list them. Only the latest 100 runs are kept.
 *
 * Default location: %APPDATA%/master-dispatch/history.db (~/.config elsewhere)
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Database from 'better-sqlite3';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for RunHistory */
export interface RunHistoryOptions {
  /** Path to the SQLite database file. Defaults to getDefaultHistoryPath() */
  dbPath?: string;
  /** Whether to use an in-memory database (for testing) */
  inMemory?: boolean;
  /** Number of runs kept. Defaults to 100 */
  maxRuns?: number;
  /** Custom clock (for testing) */
  getCurrentDate?: () => Date;
}

/** What gets stored for one run */
export interface RunSummary {
  input: string;
  /** Plan strategy, or "failed" when the run ended before dispatch */
  strategy: string;
  successCount: number;
  failureCount: number;
  /** Album cohesion, when the run was an album */
  cohesion: number | null;
}

export interface RunRecord extends RunSummary {
  id: number;
  /** ISO 8601 timestamp */
  createdAt: string;
}

interface RunRow {
  id: number;
  input: string;
  strategy: string;
  success_count: number;
  failure_count: number;
  cohesion: number | null;
  created_at: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_MAX_RUNS = 100;

const SCHEMA_VERSION = 1;

// ─── Database Default Path ───────────────────────────────────────────────────

export function getDefaultHistoryDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, 'master-dispatch');
}

export function getDefaultHistoryPath(): string {
  return path.join(getDefaultHistoryDir(), 'history.db');
}

// ─── Run History ─────────────────────────────────────────────────────────────

/**
 * SQLite table of past runs, newest first.
 */
export class RunHistory {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly inMemory: boolean;
  private readonly maxRuns: number;
  private readonly getCurrentDate: () => Date;

  constructor(options: RunHistoryOptions = {}) {
    this.inMemory = options.inMemory ?? false;
    this.dbPath = this.inMemory ? ':memory:' : (options.dbPath ?? getDefaultHistoryPath());
    this.maxRuns = options.maxRuns ?? DEFAULT_MAX_RUNS;
    this.getCurrentDate = options.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Opens the database and creates the table if it doesn't exist.
   * Must be called before any other operation.
   */
  initialize(): void {
    if (!this.inMemory) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);
    if (!this.inMemory) {
      db.pragma('journal_mode = WAL');
    }

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        input TEXT NOT NULL,
        strategy TEXT NOT NULL,
        success_count INTEGER NOT NULL,
        failure_count INTEGER NOT NULL,
        cohesion REAL,
        created_at TEXT NOT NULL
      );
    `);

    const versionRow = db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get();
    if (!versionRow) {
      db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
    }

    this.db = db;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.dbPath;
  }

  /**
   * Stores a run and drops everything beyond the newest `maxRuns`.
   */
  record(summary: RunSummary): RunRecord {
    const db = this.requireDb();
    const createdAt = this.getCurrentDate().toISOString();

    const insert = db.transaction((): number => {
      const info = db
        .prepare(
          `INSERT INTO runs (input, strategy, success_count, failure_count, cohesion, created_at)
             VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(summary.input, summary.strategy, summary.successCount, summary.failureCount, summary.cohesion, createdAt);
      db.prepare('DELETE FROM runs WHERE id NOT IN (SELECT id FROM runs ORDER BY id DESC LIMIT ?)').run(this.maxRuns);
      return Number(info.lastInsertRowid);
    });

    return { id: insert(), createdAt, ...summary };
  }

  /**
   * Newest runs first.
   */
  list(limit: number = this.maxRuns): RunRecord[] {
    const rows = this.requireDb()
      .prepare<[number], RunRow>(
        `SELECT id, input, strategy, success_count, failure_count, cohesion, created_at
           FROM runs ORDER BY id DESC LIMIT ?`,
      )
      .all(limit);

    return rows.map((row) => ({
      id: row.id,
      input: row.input,
      strategy: row.strategy,
      successCount: row.success_count,
      failureCount: row.failure_count,
      cohesion: row.cohesion,
      createdAt: row.created_at,
    }));
  }

  count(): number {
    const row = this.requireDb().prepare<[], { count: number }>('SELECT COUNT(*) as count FROM runs').get();
    return row?.count ?? 0;
  }

  clear(): void {
    this.requireDb().exec('DELETE FROM runs');
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new Error('RunHistory is not initialized. Call initialize() first.');
    }
    return this.db;
  }
}
