import type { TenureDB } from "../vault/db.js";
import type { RoleEngine } from "../roles/engine.js";
import { ACTIVITY_WINDOW_MS } from "../roles/rules.js";
import { systemClock, type AccountId, type Clock } from "../utils/types.js";

export const SWEEP_BATCH_CAP = 100;

export interface ProbeResult {
  readonly workNeeded: boolean;
  readonly candidates: AccountId[];
}

export interface ExpirySchedulerDeps {
  db: TenureDB;
  roles: RoleEngine;
  clock?: Clock;
  batchCap?: number;
}

/**
 * Probe-then-act protocol for lapsed temporary roles. Nothing here schedules
 * itself: an outside caller probes, and sweeps when the probe reports work.
 * A registry larger than the cap needs several probe/sweep rounds.
 */
export class ExpiryScheduler {
  private readonly db: TenureDB;
  private readonly roles: RoleEngine;
  private readonly clock: Clock;
  private readonly batchCap: number;

  constructor(deps: ExpirySchedulerDeps) {
    this.db = deps.db;
    this.roles = deps.roles;
    this.clock = deps.clock ?? systemClock;
    this.batchCap = deps.batchCap ?? SWEEP_BATCH_CAP;
  }

  /** Read-only. Safe to call speculatively and discard. */
  probe(): ProbeResult {
    const now = this.clock();
    const candidates: AccountId[] = [];
    for (const entry of this.roles.listRegistry()) {
      if (candidates.length >= this.batchCap) break;
      if (entry.active && now > entry.lastActive + ACTIVITY_WINDOW_MS) {
        candidates.push(entry.account);
      }
    }
    return { workNeeded: candidates.length > 0, candidates };
  }

  /**
   * Deactivates the first `count` candidates in one transaction and returns
   * how many changed. Entries that are inactive, unknown, or were refreshed
   * after the probe are skipped.
   */
  sweep(candidates: readonly AccountId[], count: number = candidates.length): number {
    const batch = candidates.slice(0, Math.max(0, count));
    return this.db.atomically(() => {
      const now = this.clock();
      let swept = 0;
      for (const account of batch) {
        const role = this.roles.getTimedRole(account);
        if (!role?.active || now <= role.lastActive + ACTIVITY_WINDOW_MS) continue;
        if (this.roles.revokeTemporary(account)) swept++;
      }
      return swept;
    });
  }
}
