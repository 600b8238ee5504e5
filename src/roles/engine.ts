import type { TenureDB } from "../vault/db.js";
import type { EventBuffer } from "../utils/typed-emitter.js";
import type { VaultEvents } from "../vault/events.js";
import { AccountId, systemClock, type Clock } from "../utils/types.js";
import { ACTIVITY_WINDOW_MS, classifyDeposit } from "./rules.js";
import type { PermanentRole, Role, RoleOutcome, TimedRole } from "./types.js";

export interface RoleEngineDeps {
  db: TenureDB;
  events: EventBuffer<VaultEvents>;
  clock?: Clock;
}

interface TimedRoleRow {
  account: string;
  active: number;
  last_active: number;
  expiry: number;
}

/**
 * Issues roles from deposit activity.
 *
 * Permanent roles are monotonic. The temporary role lives in `timed_roles`
 * and is only ever toggled inactive, by the expiry sweep. Every account that
 * has held it appears once in the registry, in first-grant order.
 */
export class RoleEngine {
  private readonly db;
  private readonly events: EventBuffer<VaultEvents>;
  private readonly clock: Clock;

  constructor(deps: RoleEngineDeps) {
    this.db = deps.db.raw();
    this.events = deps.events;
    this.clock = deps.clock ?? systemClock;
  }

  evaluate(
    account: AccountId,
    amount: bigint,
    lockPeriod: number,
    depositCount: number,
  ): RoleOutcome {
    const outcome = classifyDeposit({ amount, lockPeriod, depositCount });
    switch (outcome.kind) {
      case "permanent":
        this.grantPermanent(account, outcome.role);
        break;
      case "temporary":
        this.grantTemporary(account);
        break;
      case "none":
        break;
    }
    return outcome;
  }

  /** Keeps an active temporary role alive. No-op when the role is absent or already swept. */
  refreshActivity(account: AccountId): boolean {
    const now = this.clock();
    const expiry = now + ACTIVITY_WINDOW_MS;
    const result = this.db
      .prepare(
        `UPDATE timed_roles SET last_active = ?, expiry = ?
         WHERE account = ? AND active = 1`,
      )
      .run(now, expiry, account);
    if (result.changes === 0) return false;
    this.events.push("roleRefreshed", { account, expiry });
    return true;
  }

  /** Clears the active flag. Returns false when there was nothing to clear. */
  revokeTemporary(account: AccountId): boolean {
    const result = this.db
      .prepare("UPDATE timed_roles SET active = 0 WHERE account = ? AND active = 1")
      .run(account);
    if (result.changes === 0) return false;
    this.events.push("roleRevoked", { account, role: "ActiveParticipant" });
    return true;
  }

  // ── Queries ──

  getRoles(account: AccountId): Role[] {
    const rows = this.db
      .prepare("SELECT role FROM account_roles WHERE account = ? ORDER BY granted_at, role")
      .all(account) as Array<{ role: PermanentRole }>;
    const roles: Role[] = rows.map((r) => r.role);
    if (this.getTimedRole(account)?.active) roles.push("ActiveParticipant");
    return roles;
  }

  hasRole(account: AccountId, role: Role): boolean {
    return this.getRoles(account).includes(role);
  }

  getTimedRole(account: AccountId): TimedRole | null {
    const row = this.db
      .prepare("SELECT * FROM timed_roles WHERE account = ?")
      .get(account) as TimedRoleRow | undefined;
    return row ? this.toTimedRole(row) : null;
  }

  /** Registry entries joined with their timed role, in insertion order. */
  listRegistry(): TimedRole[] {
    const rows = this.db
      .prepare(
        `SELECT t.* FROM temp_role_registry r
         JOIN timed_roles t ON t.account = r.account
         ORDER BY r.position`,
      )
      .all() as TimedRoleRow[];
    return rows.map((r) => this.toTimedRole(r));
  }

  registrySize(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS n FROM temp_role_registry").get() as {
      n: number;
    };
    return row.n;
  }

  // ── Grants ──

  private grantPermanent(account: AccountId, role: PermanentRole): void {
    const result = this.db
      .prepare("INSERT OR IGNORE INTO account_roles (account, role, granted_at) VALUES (?, ?, ?)")
      .run(account, role, this.clock());
    if (result.changes > 0) {
      this.events.push("roleGranted", { account, role });
    }
  }

  private grantTemporary(account: AccountId): void {
    const now = this.clock();
    const expiry = now + ACTIVITY_WINDOW_MS;
    this.db
      .prepare(
        `INSERT INTO timed_roles (account, active, last_active, expiry) VALUES (?, 1, ?, ?)
         ON CONFLICT(account) DO UPDATE SET
           active = 1, last_active = excluded.last_active, expiry = excluded.expiry`,
      )
      .run(account, now, expiry);
    // UNIQUE(account) keeps re-qualifying accounts from appearing twice.
    this.db.prepare("INSERT OR IGNORE INTO temp_role_registry (account) VALUES (?)").run(account);
    this.events.push("roleGranted", { account, role: "ActiveParticipant", expiry });
  }

  private toTimedRole(row: TimedRoleRow): TimedRole {
    return {
      account: AccountId.make(row.account),
      active: row.active === 1,
      lastActive: row.last_active,
      expiry: row.expiry,
    };
  }
}
