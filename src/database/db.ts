/**
 * Match-report ledger
 * SQLite history of match runs and the mismatches each one found.
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config.js';
import { registerCleanup } from '../utils/resilience.js';
import type { MatchRun } from '../matching/driver.js';
import type { MatchKind } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

let db: Database.Database | null = null;
let dbPath = config.database.path;

/**
 * Initialize database connection and schema.
 * `path` overrides the configured location (tests pass `:memory:`).
 */
export function initDatabase(path: string = config.database.path): Database.Database {
  if (db) return db;

  try {
    db = new Database(path);
    dbPath = path;
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');

    db.exec(readFileSync(join(__dirname, 'schema.sql'), 'utf-8'));

    registerCleanup(() => closeDatabase());

    console.log(`[Ledger] Database initialized at ${path}`);
    return db;
  } catch (error) {
    console.error(`[Ledger] FATAL: Failed to initialize database at ${path}:`, error);
    throw error;
  }
}

export function getDb(): Database.Database {
  if (!db) {
    return initDatabase();
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Check database health: returns { ok, details } for the health endpoint.
 */
export function checkDatabaseHealth(): { ok: boolean; details: Record<string, unknown> } {
  try {
    const instance = getDb();
    const result = instance.prepare('SELECT COUNT(*) as count FROM match_runs').get() as { count: number };
    const journalMode = (instance.pragma('journal_mode') as Array<{ journal_mode: string }>)[0]?.journal_mode;
    return {
      ok: true,
      details: {
        runCount: result.count,
        journalMode,
        path: dbPath,
      },
    };
  } catch (error) {
    return {
      ok: false,
      details: {
        error: error instanceof Error ? error.message : String(error),
        path: dbPath,
      },
    };
  }
}

// =============================================================================
// Runs
// =============================================================================

export interface MatchRunRecord {
  id: number;
  started_at: string;
  finished_at: string;
  fix: boolean;
  kinds: MatchKind[];
  ok: boolean;
  checked: number;
  error_count: number;
  mismatch_count: number;
  created_at: string;
}

export interface MismatchRecord {
  id: number;
  run_id: number;
  kind: MatchKind;
  entity_id: number | null;
  entity_name: string;
  field: string;
  codex_value: string;
  guide_value: string;
  fixed: boolean;
}

interface MatchRunRow extends Omit<MatchRunRecord, 'fix' | 'ok' | 'kinds'> {
  fix: number;
  ok: number;
  kinds: string;
}

interface MismatchRow extends Omit<MismatchRecord, 'fixed'> {
  fixed: number;
}

/**
 * Store a run and every mismatch it found. Returns the run id.
 */
export function recordMatchRun(run: MatchRun): number {
  const db = getDb();

  const insertRun = db.prepare(`
    INSERT INTO match_runs (started_at, finished_at, fix, kinds, ok, checked, error_count)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  const insertMismatch = db.prepare(`
    INSERT INTO mismatches (run_id, kind, entity_id, entity_name, field, codex_value, guide_value, fixed)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const record = db.transaction((): number => {
    const { lastInsertRowid } = insertRun.run(
      run.startedAt,
      run.finishedAt,
      run.fix ? 1 : 0,
      run.kinds.join(','),
      run.ok ? 1 : 0,
      run.results.reduce((sum, r) => sum + r.checked, 0),
      run.results.reduce((sum, r) => sum + r.errors.length, 0),
    );
    const runId = Number(lastInsertRowid);
    for (const result of run.results) {
      for (const m of result.mismatches) {
        insertMismatch.run(runId, result.kind, m.id, m.entity, m.field, m.codex, m.guide, m.fixed ? 1 : 0);
      }
    }
    return runId;
  });

  const runId = record();
  console.log(`[Ledger] Recorded run #${runId}`);
  return runId;
}

function toRunRecord(row: MatchRunRow): MatchRunRecord {
  return {
    ...row,
    fix: row.fix === 1,
    ok: row.ok === 1,
    kinds: row.kinds ? row.kinds.split(',').filter(isMatchKind) : [],
  };
}

function isMatchKind(value: string): value is MatchKind {
  return ['items', 'monsters', 'skills', 'pets', 'statusEffects'].includes(value);
}

/**
 * Most recent runs first
 */
export function getRecentRuns(limit = 20): MatchRunRecord[] {
  const db = getDb();
  const rows = db.prepare(`
    SELECT r.*, (SELECT COUNT(*) FROM mismatches m WHERE m.run_id = r.id) as mismatch_count
    FROM match_runs r
    ORDER BY r.started_at DESC, r.id DESC
    LIMIT ?
  `).all(limit) as MatchRunRow[];
  return rows.map(toRunRecord);
}

export function getRun(runId: number): MatchRunRecord | null {
  const db = getDb();
  const row = db.prepare(`
    SELECT r.*, (SELECT COUNT(*) FROM mismatches m WHERE m.run_id = r.id) as mismatch_count
    FROM match_runs r WHERE r.id = ?
  `).get(runId) as MatchRunRow | undefined;
  return row ? toRunRecord(row) : null;
}

export function getRunMismatches(runId: number): MismatchRecord[] {
  const db = getDb();
  const rows = db.prepare(`
    SELECT * FROM mismatches WHERE run_id = ? ORDER BY id
  `).all(runId) as MismatchRow[];
  return rows.map(row => ({ ...row, fixed: row.fixed === 1 }));
}

// =============================================================================
// Stats
// =============================================================================

export interface LedgerStats {
  totalRuns: number;
  okRuns: number;
  totalMismatches: number;
  fixedMismatches: number;
  mismatchesByField: Record<string, number>;
  lastRunAt: string | null;
}

export function getLedgerStats(): LedgerStats {
  const db = getDb();

  const totalRuns = (db.prepare('SELECT COUNT(*) as count FROM match_runs').get() as { count: number }).count;
  const okRuns = (db.prepare('SELECT COUNT(*) as count FROM match_runs WHERE ok = 1').get() as { count: number }).count;
  const totalMismatches = (db.prepare('SELECT COUNT(*) as count FROM mismatches').get() as { count: number }).count;
  const fixedMismatches = (db.prepare('SELECT COUNT(*) as count FROM mismatches WHERE fixed = 1').get() as { count: number }).count;
  const lastRunAt = (db.prepare('SELECT MAX(started_at) as last FROM match_runs').get() as { last: string | null }).last;

  const fieldCounts = db.prepare(`
    SELECT kind || '.' || field as field, COUNT(*) as count FROM mismatches
    GROUP BY kind, field
  `).all() as Array<{ field: string; count: number }>;

  const mismatchesByField: Record<string, number> = {};
  for (const row of fieldCounts) {
    mismatchesByField[row.field] = row.count;
  }

  return {
    totalRuns,
    okRuns,
    totalMismatches,
    fixedMismatches,
    mismatchesByField,
    lastRunAt,
  };
}
