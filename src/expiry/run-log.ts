import type { TenureDB } from "../vault/db.js";
import type { Logger } from "../logging/logger.js";

export type SweepSource = "schedule" | "manual" | "external";

export interface SweepRunEntry {
  readonly source: SweepSource;
  readonly candidates: number;
  readonly swept: number;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly success: boolean;
  readonly error?: string;
}

export interface StoredSweepRun extends SweepRunEntry {
  readonly id: number;
}

interface SweepRunRow {
  id: number;
  source: SweepSource;
  candidates: number;
  swept: number;
  success: number;
  error: string | null;
  started_at: number;
  completed_at: number;
}

export class SweepRunLog {
  private readonly db;
  private readonly logger: Logger;

  constructor(tenureDb: TenureDB, logger: Logger) {
    this.db = tenureDb.raw();
    this.logger = logger.child({ component: "sweep-run" });
  }

  record(entry: SweepRunEntry): void {
    this.db
      .prepare(
        `INSERT INTO sweep_runs (source, candidates, swept, success, error, started_at, completed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.source,
        entry.candidates,
        entry.swept,
        entry.success ? 1 : 0,
        entry.error ?? null,
        entry.startedAt,
        entry.completedAt,
      );

    const durationMs = entry.completedAt - entry.startedAt;
    if (entry.success) {
      this.logger.info(
        { source: entry.source, candidates: entry.candidates, swept: entry.swept, durationMs },
        "Expiry sweep completed",
      );
    } else {
      this.logger.error(
        { source: entry.source, durationMs, error: entry.error },
        "Expiry sweep failed",
      );
    }
  }

  recent(limit: number): StoredSweepRun[] {
    const rows = this.db
      .prepare("SELECT * FROM sweep_runs ORDER BY started_at DESC, id DESC LIMIT ?")
      .all(limit) as SweepRunRow[];
    return rows.map((r) => ({
      id: r.id,
      source: r.source,
      candidates: r.candidates,
      swept: r.swept,
      startedAt: r.started_at,
      completedAt: r.completed_at,
      success: r.success === 1,
      ...(r.error !== null ? { error: r.error } : {}),
    }));
  }
}
