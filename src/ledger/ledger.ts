import type { TenureDB } from "../vault/db.js";
import type { CurrencyRail } from "../currency/custody.js";
import type { EventBuffer } from "../utils/typed-emitter.js";
import type { VaultEvents } from "../vault/events.js";
import { AccountId, systemClock, type Clock } from "../utils/types.js";
import { TenureError } from "../errors.js";
import { lockPeriodName } from "./periods.js";
import type { ConservationReport, DepositRecord, LockState } from "./types.js";

export interface LedgerDeps {
  db: TenureDB;
  rail: CurrencyRail;
  events: EventBuffer<VaultEvents>;
  clock?: Clock;
}

interface DepositRow {
  account: string;
  idx: number;
  amount: string;
  original_amount: string;
  created_at: number;
  lock_until: number;
  state: LockState;
  withdrawn: number;
}

/**
 * Per-account deposit records and the global locked total.
 *
 * Records are append-only and addressed by index. A withdrawal zeroes the slot
 * and marks it terminal instead of removing it, so an index a caller holds
 * stays valid forever.
 */
export class Ledger {
  private readonly db: TenureDB;
  private readonly rail: CurrencyRail;
  private readonly events: EventBuffer<VaultEvents>;
  private readonly clock: Clock;

  constructor(deps: LedgerDeps) {
    this.db = deps.db;
    this.rail = deps.rail;
    this.events = deps.events;
    this.clock = deps.clock ?? systemClock;
  }

  /** Appends a LOCKED record and takes custody of `amount`. */
  record(account: AccountId, amount: bigint, lockPeriod: number): DepositRecord {
    if (amount <= 0n) {
      throw new TenureError("ZeroAmount", "Deposit amount must be greater than zero");
    }
    if (lockPeriodName(lockPeriod) === null) {
      throw new TenureError("InvalidLockPeriod", `Unsupported lock period: ${lockPeriod}ms`);
    }

    return this.db.atomically(() => {
      const now = this.clock();
      const record: DepositRecord = {
        account,
        index: this.getDepositCount(account),
        amount,
        originalAmount: amount,
        createdAt: now,
        lockUntil: now + lockPeriod,
        state: "LOCKED",
        withdrawn: false,
      };

      this.db
        .raw()
        .prepare(
          `INSERT INTO deposits (account, idx, amount, original_amount, created_at, lock_until, state, withdrawn)
           VALUES (?, ?, ?, ?, ?, ?, 'LOCKED', 0)`,
        )
        .run(
          account,
          record.index,
          amount.toString(),
          amount.toString(),
          record.createdAt,
          record.lockUntil,
        );
      this.writeTotalLocked(this.getTotalLocked() + amount);
      this.rail.receive(account, amount);

      this.events.push("deposited", {
        account,
        index: record.index,
        amount,
        lockUntil: record.lockUntil,
      });
      return record;
    });
  }

  /**
   * Releases an unlocked record to its owner. The ledger is written before the
   * transfer; a refused transfer throws `TransferFailed` and the surrounding
   * transaction restores the record and the total.
   */
  withdraw(account: AccountId, index: number): bigint {
    return this.db.atomically(() => {
      const row = this.getRow(account, index);
      const now = this.clock();

      let state = row.state;
      if (state === "LOCKED" && now >= row.lock_until) {
        state = "UNLOCKED";
        this.db
          .raw()
          .prepare("UPDATE deposits SET state = 'UNLOCKED' WHERE account = ? AND idx = ?")
          .run(account, index);
      }
      if (state === "LOCKED") {
        throw new TenureError(
          "LockNotExpired",
          `Deposit ${index} is locked until ${new Date(row.lock_until).toISOString()}`,
        );
      }
      if (row.withdrawn === 1) {
        throw new TenureError("AlreadyWithdrawn", `Deposit ${index} was already withdrawn`);
      }

      const amount = BigInt(row.amount);
      this.db
        .raw()
        .prepare(
          `UPDATE deposits
           SET amount = '0', created_at = 0, lock_until = 0, state = 'UNLOCKED', withdrawn = 1
           WHERE account = ? AND idx = ?`,
        )
        .run(account, index);
      this.writeTotalLocked(this.getTotalLocked() - amount);

      let sent: boolean;
      try {
        sent = this.rail.transfer(account, amount);
      } catch (err) {
        throw new TenureError("TransferFailed", `Transfer of deposit ${index} failed`, { cause: err });
      }
      if (!sent) {
        throw new TenureError("TransferFailed", `Transfer of deposit ${index} was refused`);
      }

      this.events.push("withdrawn", { account, index, amount, timestamp: now });
      return amount;
    });
  }

  // ── Queries ──

  getTotalLocked(): bigint {
    const row = this.db
      .raw()
      .prepare("SELECT total_locked FROM ledger_totals WHERE id = 1")
      .get() as { total_locked: string } | undefined;
    return BigInt(row?.total_locked ?? "0");
  }

  getUserDeposits(account: AccountId): DepositRecord[] {
    const rows = this.db
      .raw()
      .prepare("SELECT * FROM deposits WHERE account = ? ORDER BY idx")
      .all(account) as DepositRow[];
    return rows.map((r) => this.toRecord(r));
  }

  getDepositByIndex(account: AccountId, index: number): DepositRecord {
    return this.toRecord(this.getRow(account, index));
  }

  getDepositCount(account: AccountId): number {
    const row = this.db
      .raw()
      .prepare("SELECT COUNT(*) AS n FROM deposits WHERE account = ?")
      .get(account) as { n: number };
    return row.n;
  }

  /** Sum of original amounts, withdrawn records included. */
  getLifetimeDeposited(account: AccountId): bigint {
    return this.getUserDeposits(account).reduce((sum, r) => sum + r.originalAmount, 0n);
  }

  /** Sum of records whose cached state is LOCKED and that are not withdrawn. */
  getActiveDeposited(account: AccountId): bigint {
    return this.getUserDeposits(account)
      .filter((r) => r.state === "LOCKED" && !r.withdrawn)
      .reduce((sum, r) => sum + r.amount, 0n);
  }

  verifyConservation(): ConservationReport {
    const rows = this.db
      .raw()
      .prepare("SELECT amount FROM deposits WHERE withdrawn = 0")
      .all() as Array<{ amount: string }>;
    const recordSum = rows.reduce((sum, r) => sum + BigInt(r.amount), 0n);
    const totalLocked = this.getTotalLocked();
    const custodyBalance = this.rail.balance();
    return {
      totalLocked,
      recordSum,
      custodyBalance,
      holds: totalLocked === recordSum && totalLocked === custodyBalance,
    };
  }

  // ── Internals ──

  private getRow(account: AccountId, index: number): DepositRow {
    const row = Number.isSafeInteger(index) && index >= 0
      ? (this.db
          .raw()
          .prepare("SELECT * FROM deposits WHERE account = ? AND idx = ?")
          .get(account, index) as DepositRow | undefined)
      : undefined;
    if (!row) {
      throw new TenureError("InvalidIndex", `No deposit ${index} for ${account}`);
    }
    return row;
  }

  private writeTotalLocked(total: bigint): void {
    this.db
      .raw()
      .prepare("UPDATE ledger_totals SET total_locked = ? WHERE id = 1")
      .run(total.toString());
  }

  private toRecord(row: DepositRow): DepositRecord {
    return {
      account: AccountId.make(row.account),
      index: row.idx,
      amount: BigInt(row.amount),
      originalAmount: BigInt(row.original_amount),
      createdAt: row.created_at,
      lockUntil: row.lock_until,
      state: row.state,
      withdrawn: row.withdrawn === 1,
    };
  }
}
