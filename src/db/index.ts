import Database, { Database as DatabaseType } from 'better-sqlite3';
import path from 'path';
import fs from 'fs-extra';
import { BatchResult, Stage, StageFailure, Transaction } from '../types';

export function initDB(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    fs.ensureDirSync(path.dirname(dbPath));
  }
  const db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      started_at TEXT NOT NULL,
      finished_at TEXT,
      status TEXT CHECK(status IN ('completed', 'aborted')) NOT NULL,
      found INTEGER DEFAULT 0,
      claimed INTEGER DEFAULT 0,
      validated INTEGER DEFAULT 0,
      failed INTEGER DEFAULT 0,
      interrupted INTEGER DEFAULT 0,
      error TEXT
    );

    CREATE TABLE IF NOT EXISTS stage_failures (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL REFERENCES runs(id),
      candidate_id TEXT NOT NULL,
      stage TEXT NOT NULL,
      reason TEXT NOT NULL,
      recorded_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE INDEX IF NOT EXISTS idx_stage_failures_candidate ON stage_failures(candidate_id);

    -- Rows a failed upload left behind, re-sent by the next run with a sink
    CREATE TABLE IF NOT EXISTS pending_transactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL REFERENCES runs(id),
      amount TEXT NOT NULL,
      currency TEXT NOT NULL,
      merchant TEXT NOT NULL,
      category TEXT NOT NULL,
      date TEXT NOT NULL,
      time TEXT NOT NULL,
      account TEXT NOT NULL
    );
  `);

  return db;
}

export interface RunRow {
  id: number;
  started_at: string;
  finished_at: string | null;
  status: 'completed' | 'aborted';
  found: number;
  claimed: number;
  validated: number;
  failed: number;
  interrupted: number;
  error: string | null;
}

export interface FailureRow extends StageFailure {
  runId: number;
  recordedAt: string;
  // Claim failures leave the message unlabelled, so the next run picks it up again
  retryable: boolean;
}

export interface PendingTransaction {
  id: number;
  runId: number;
  transaction: Transaction;
}

interface PendingRecord extends Transaction {
  id: number;
  run_id: number;
}

interface FailureRecord {
  run_id: number;
  candidate_id: string;
  stage: Stage;
  reason: string;
  recorded_at: string;
}

/**
 * History of pipeline runs and the candidates they skipped.
 */
export class RunLedger {
  constructor(private db: DatabaseType) {}

  recordRun(result: BatchResult): number {
    const insertRun = this.db.prepare(`
      INSERT INTO runs (started_at, finished_at, status, found, claimed, validated, failed, interrupted)
      VALUES (@startedAt, @finishedAt, 'completed', @found, @claimed, @validated, @failed, @interrupted)
    `);
    const insertFailure = this.db.prepare(`
      INSERT INTO stage_failures (run_id, candidate_id, stage, reason)
      VALUES (@runId, @candidateId, @stage, @reason)
    `);

    const record = this.db.transaction((batch: BatchResult): number => {
      const info = insertRun.run({
        startedAt: batch.startedAt.toISOString(),
        finishedAt: batch.finishedAt.toISOString(),
        found: batch.counts.found,
        claimed: batch.counts.claimed,
        validated: batch.counts.validated,
        failed: batch.failures.length,
        interrupted: batch.interrupted ? 1 : 0,
      });
      const runId = Number(info.lastInsertRowid);
      for (const failure of batch.failures) {
        insertFailure.run({ runId, ...failure });
      }
      return runId;
    });

    return record(result);
  }

  recordAbort(startedAt: Date, error: string): number {
    const info = this.db.prepare(`
      INSERT INTO runs (started_at, finished_at, status, error)
      VALUES (?, ?, 'aborted', ?)
    `).run(startedAt.toISOString(), new Date().toISOString(), error);
    return Number(info.lastInsertRowid);
  }

  lastRun(): RunRow | undefined {
    return this.db.prepare<[], RunRow>('SELECT * FROM runs ORDER BY id DESC LIMIT 1').get();
  }

  listFailures(limit = 50): FailureRow[] {
    const rows = this.db.prepare<[number], FailureRecord>(`
      SELECT run_id, candidate_id, stage, reason, recorded_at
      FROM stage_failures
      ORDER BY id DESC
      LIMIT ?
    `).all(limit);

    return rows.map(r => ({
      runId: r.run_id,
      candidateId: r.candidate_id,
      stage: r.stage,
      reason: r.reason,
      recordedAt: r.recorded_at,
      retryable: r.stage === 'claim',
    }));
  }

  savePending(runId: number, transactions: Transaction[]) {
    const insert = this.db.prepare(`
      INSERT INTO pending_transactions (run_id, amount, currency, merchant, category, date, time, account)
      VALUES (@runId, @amount, @currency, @merchant, @category, @date, @time, @account)
    `);
    const saveAll = this.db.transaction((rows: Transaction[]) => {
      for (const t of rows) {
        insert.run({ runId, ...t });
      }
    });
    saveAll(transactions);
  }

  listPending(): PendingTransaction[] {
    const rows = this.db.prepare<[], PendingRecord>(`
      SELECT id, run_id, amount, currency, merchant, category, date, time, account
      FROM pending_transactions
      ORDER BY id
    `).all();

    return rows.map(({ id, run_id, ...transaction }) => ({ id, runId: run_id, transaction }));
  }

  clearPending(ids: number[]) {
    const remove = this.db.prepare('DELETE FROM pending_transactions WHERE id = ?');
    const removeAll = this.db.transaction((list: number[]) => {
      for (const id of list) remove.run(id);
    });
    removeAll(ids);
  }
}
