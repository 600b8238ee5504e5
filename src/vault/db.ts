import Database from "better-sqlite3";
import { join } from "node:path";

// Amounts are bigint base units and are stored as decimal TEXT; SQLite
// integers stop at 2^63 and REAL loses precision well before that.
const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS deposits (
  account         TEXT NOT NULL,
  idx             INTEGER NOT NULL,
  amount          TEXT NOT NULL,
  original_amount TEXT NOT NULL,
  created_at      INTEGER NOT NULL,
  lock_until      INTEGER NOT NULL,
  state           TEXT NOT NULL CHECK(state IN ('LOCKED','UNLOCKED')),
  withdrawn       INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (account, idx)
);

CREATE TABLE IF NOT EXISTS ledger_totals (
  id           INTEGER PRIMARY KEY CHECK(id = 1),
  total_locked TEXT NOT NULL
);
INSERT OR IGNORE INTO ledger_totals (id, total_locked) VALUES (1, '0');

CREATE TABLE IF NOT EXISTS custody (
  id      INTEGER PRIMARY KEY CHECK(id = 1),
  balance TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS account_roles (
  account    TEXT NOT NULL,
  role       TEXT NOT NULL CHECK(role IN ('LongTermCommitter','FrequentDepositor','BigDepositor')),
  granted_at INTEGER NOT NULL,
  PRIMARY KEY (account, role)
);

CREATE TABLE IF NOT EXISTS timed_roles (
  account     TEXT PRIMARY KEY,
  active      INTEGER NOT NULL,
  last_active INTEGER NOT NULL,
  expiry      INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS temp_role_registry (
  position INTEGER PRIMARY KEY AUTOINCREMENT,
  account  TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS sweep_runs (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  source       TEXT NOT NULL,
  candidates   INTEGER NOT NULL,
  swept        INTEGER NOT NULL,
  success      INTEGER NOT NULL,
  error        TEXT,
  started_at   INTEGER NOT NULL,
  completed_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_sweep_runs_started ON sweep_runs(started_at);
`;

export class TenureDB {
  private db: Database.Database;

  constructor(stateDir: string) {
    this.db = new Database(join(stateDir, "tenure.db"));
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  /**
   * Runs `fn` as one atomic unit. A throw anywhere inside rolls back every
   * write made through this connection, including nested calls.
   */
  atomically<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
