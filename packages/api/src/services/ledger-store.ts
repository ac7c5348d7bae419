// CONTRACT: synchronous stores (better-sqlite3 blocks by design), so two
// record() calls for the same run can never interleave.

import Database from 'better-sqlite3';
import { LedgerEntry, LedgerFilter } from '../models/LedgerEntry.js';
import { RunOutcome } from '../models/Run.js';
import { Stage, StageAttempt } from '../models/Stage.js';
import { deepFreeze } from '../utils/freeze.js';

export interface LedgerStore {
  get(runId: string): LedgerEntry | undefined;
  insert(entry: LedgerEntry): void;
  /** Matching entries ordered by completion time, ties broken by run id. */
  query(filter: LedgerFilter): LedgerEntry[];
  close(): void;
}

export function compareEntries(a: LedgerEntry, b: LedgerEntry): number {
  const byTime = a.completedAt.getTime() - b.completedAt.getTime();
  if (byTime !== 0) return byTime;
  return a.runId < b.runId ? -1 : a.runId > b.runId ? 1 : 0;
}

export function matchesFilter(entry: LedgerEntry, filter: LedgerFilter): boolean {
  if (filter.runId && entry.runId !== filter.runId) return false;
  if (filter.pipeline && entry.pipeline !== filter.pipeline) return false;
  if (filter.outcome && entry.outcome !== filter.outcome) return false;
  if (filter.from && entry.completedAt < filter.from) return false;
  if (filter.to && entry.completedAt > filter.to) return false;
  return true;
}

export class MemoryLedgerStore implements LedgerStore {
  private entries = new Map<string, LedgerEntry>();

  get(runId: string): LedgerEntry | undefined {
    return this.entries.get(runId);
  }

  insert(entry: LedgerEntry): void {
    this.entries.set(entry.runId, entry);
  }

  query(filter: LedgerFilter): LedgerEntry[] {
    const matching = [...this.entries.values()].filter(entry => matchesFilter(entry, filter)).sort(compareEntries);
    return filter.limit !== undefined ? matching.slice(0, filter.limit) : matching;
  }

  close(): void {
    this.entries.clear();
  }
}

interface LedgerRow {
  run_id: string;
  pipeline: string;
  pipeline_version: string;
  kind: string;
  outcome: string;
  started_at: number;
  completed_at: number;
  payload: string;
}

const optionalDate = (value: unknown): Date | undefined =>
  typeof value === 'string' ? new Date(value) : undefined;

function reviveAttempt(attempt: StageAttempt): StageAttempt {
  return {
    ...attempt,
    startedAt: new Date(attempt.startedAt),
    completedAt: new Date(attempt.completedAt)
  };
}

function reviveStage(stage: Stage): Stage {
  return {
    ...stage,
    startedAt: optionalDate(stage.startedAt),
    completedAt: optionalDate(stage.completedAt),
    history: stage.history.map(reviveAttempt)
  };
}

/**
 * Durable ledger on SQLite. Entries are written once; the snapshot lives in a
 * JSON payload column, the filterable fields in their own columns.
 */
export class SqliteLedgerStore implements LedgerStore {
  private db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_entries (
        run_id TEXT PRIMARY KEY,
        pipeline TEXT NOT NULL,
        pipeline_version TEXT NOT NULL,
        kind TEXT NOT NULL,
        outcome TEXT NOT NULL,
        started_at INTEGER NOT NULL,
        completed_at INTEGER NOT NULL,
        payload TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_ledger_pipeline_completed ON ledger_entries (pipeline, completed_at);
      CREATE INDEX IF NOT EXISTS idx_ledger_completed ON ledger_entries (completed_at, run_id);
    `);
  }

  get(runId: string): LedgerEntry | undefined {
    const row = this.db
      .prepare<[string], LedgerRow>('SELECT * FROM ledger_entries WHERE run_id = ?')
      .get(runId);
    return row ? this.toEntry(row) : undefined;
  }

  insert(entry: LedgerEntry): void {
    this.db.prepare(`
      INSERT INTO ledger_entries (run_id, pipeline, pipeline_version, kind, outcome, started_at, completed_at, payload)
      VALUES (@runId, @pipeline, @pipelineVersion, @kind, @outcome, @startedAt, @completedAt, @payload)
    `).run({
      runId: entry.runId,
      pipeline: entry.pipeline,
      pipelineVersion: entry.pipelineVersion,
      kind: entry.kind,
      outcome: entry.outcome,
      startedAt: entry.startedAt.getTime(),
      completedAt: entry.completedAt.getTime(),
      payload: JSON.stringify({ context: entry.context, stages: entry.stages, error: entry.error })
    });
  }

  query(filter: LedgerFilter): LedgerEntry[] {
    const clauses: string[] = [];
    const params: Record<string, string | number> = {};
    if (filter.runId) {
      clauses.push('run_id = @runId');
      params.runId = filter.runId;
    }
    if (filter.pipeline) {
      clauses.push('pipeline = @pipeline');
      params.pipeline = filter.pipeline;
    }
    if (filter.outcome) {
      clauses.push('outcome = @outcome');
      params.outcome = filter.outcome;
    }
    if (filter.from) {
      clauses.push('completed_at >= @from');
      params.from = filter.from.getTime();
    }
    if (filter.to) {
      clauses.push('completed_at <= @to');
      params.to = filter.to.getTime();
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = filter.limit !== undefined ? `LIMIT ${Math.max(0, Math.floor(filter.limit))}` : '';
    const bindings = clauses.length > 0 ? [params] : [];
    const rows = this.db
      .prepare<unknown[], LedgerRow>(`SELECT * FROM ledger_entries ${where} ORDER BY completed_at ASC, run_id ASC ${limit}`)
      .all(...bindings);
    return rows.map(row => this.toEntry(row));
  }

  close(): void {
    this.db.close();
  }

  private toEntry(row: LedgerRow): LedgerEntry {
    const payload: Pick<LedgerEntry, 'context' | 'stages' | 'error'> = JSON.parse(row.payload);
    const outcome: RunOutcome = row.outcome === 'succeeded' || row.outcome === 'cancelled' ? row.outcome : 'failed';
    const kind = row.kind === 'cd' ? 'cd' : 'ci';
    return deepFreeze({
      runId: row.run_id,
      pipeline: row.pipeline,
      pipelineVersion: row.pipeline_version,
      kind,
      outcome,
      context: payload.context,
      stages: payload.stages.map(reviveStage),
      startedAt: new Date(row.started_at),
      completedAt: new Date(row.completed_at),
      error: payload.error
    });
  }
}
