import type { TenureDB } from "./db.js";
import type { VaultEvents } from "./events.js";
import { Ledger } from "../ledger/ledger.js";
import type { ConservationReport, DepositRecord } from "../ledger/types.js";
import { RoleEngine } from "../roles/engine.js";
import type { Role, RoleOutcome, TimedRole } from "../roles/types.js";
import { ExpiryScheduler, type ProbeResult } from "../expiry/scheduler.js";
import { Custody, type CurrencyRail } from "../currency/custody.js";
import { EventBuffer, TypedEventEmitter } from "../utils/typed-emitter.js";
import { AccountId, systemClock, type Clock } from "../utils/types.js";
import type { Logger } from "../logging/logger.js";

export interface TenureVaultDeps {
  db: TenureDB;
  logger: Logger;
  /** Defaults to a `Custody` kept in the same database. */
  rail?: CurrencyRail;
  clock?: Clock;
  batchCap?: number;
}

export interface DepositResult {
  readonly record: DepositRecord;
  readonly outcome: RoleOutcome;
}

export interface AccountSummary {
  readonly account: AccountId;
  readonly depositCount: number;
  readonly lifetimeDeposited: bigint;
  readonly activeDeposited: bigint;
  readonly roles: Role[];
  readonly timedRole: TimedRole | null;
}

/**
 * Public face of the system. Each mutating call runs as a single transaction
 * over the ledger, the role engine and custody; events raised inside are
 * delivered only after the transaction commits.
 */
export class TenureVault {
  readonly events = new TypedEventEmitter<VaultEvents>();

  private readonly db: TenureDB;
  private readonly logger: Logger;
  private readonly buffer = new EventBuffer<VaultEvents>();
  private readonly ledger: Ledger;
  private readonly roles: RoleEngine;
  private readonly scheduler: ExpiryScheduler;

  constructor(deps: TenureVaultDeps) {
    this.db = deps.db;
    this.logger = deps.logger.child({ component: "vault" });
    const clock = deps.clock ?? systemClock;
    const rail = deps.rail ?? new Custody(deps.db);

    this.ledger = new Ledger({ db: deps.db, rail, events: this.buffer, clock });
    this.roles = new RoleEngine({ db: deps.db, events: this.buffer, clock });
    this.scheduler = new ExpiryScheduler({
      db: deps.db,
      roles: this.roles,
      clock,
      batchCap: deps.batchCap,
    });
  }

  deposit(account: string, amount: bigint, lockPeriod: number): DepositResult {
    const id = AccountId.parse(account);
    const result = this.commit(() => {
      const record = this.ledger.record(id, amount, lockPeriod);
      const outcome = this.roles.evaluate(
        id,
        amount,
        lockPeriod,
        this.ledger.getDepositCount(id),
      );
      this.roles.refreshActivity(id);
      return { record, outcome };
    });
    this.logger.info(
      {
        account: id,
        index: result.record.index,
        amount: amount.toString(),
        lockUntil: result.record.lockUntil,
        role: result.outcome.kind === "none" ? null : result.outcome.role,
      },
      "Deposit recorded",
    );
    return result;
  }

  withdraw(account: string, index: number): bigint {
    const id = AccountId.parse(account);
    const amount = this.commit(() => {
      const released = this.ledger.withdraw(id, index);
      this.roles.refreshActivity(id);
      return released;
    });
    this.logger.info({ account: id, index, amount: amount.toString() }, "Deposit withdrawn");
    return amount;
  }

  probe(): ProbeResult {
    const result = this.scheduler.probe();
    this.logger.debug({ candidates: result.candidates.length }, "Expiry probe");
    return result;
  }

  sweep(candidates: readonly string[], count?: number): number {
    const ids = candidates.map((c) => AccountId.parse(c));
    const swept = this.commit(() => this.scheduler.sweep(ids, count));
    this.logger.info({ requested: ids.length, swept }, "Expiry sweep applied");
    return swept;
  }

  // ── Queries ──

  getTotalLocked(): bigint {
    return this.ledger.getTotalLocked();
  }

  getUserDeposits(account: string): DepositRecord[] {
    return this.ledger.getUserDeposits(AccountId.parse(account));
  }

  getDepositByIndex(account: string, index: number): DepositRecord {
    return this.ledger.getDepositByIndex(AccountId.parse(account), index);
  }

  getLifetimeDeposited(account: string): bigint {
    return this.ledger.getLifetimeDeposited(AccountId.parse(account));
  }

  getActiveDeposited(account: string): bigint {
    return this.ledger.getActiveDeposited(AccountId.parse(account));
  }

  getRoles(account: string): Role[] {
    return this.roles.getRoles(AccountId.parse(account));
  }

  getTimedRole(account: string): TimedRole | null {
    return this.roles.getTimedRole(AccountId.parse(account));
  }

  getRegistry(): TimedRole[] {
    return this.roles.listRegistry();
  }

  getSummary(account: string): AccountSummary {
    const id = AccountId.parse(account);
    return {
      account: id,
      depositCount: this.ledger.getDepositCount(id),
      lifetimeDeposited: this.ledger.getLifetimeDeposited(id),
      activeDeposited: this.ledger.getActiveDeposited(id),
      roles: this.roles.getRoles(id),
      timedRole: this.roles.getTimedRole(id),
    };
  }

  verifyConservation(): ConservationReport {
    return this.ledger.verifyConservation();
  }

  private commit<T>(fn: () => T): T {
    let result: T;
    try {
      result = this.db.atomically(fn);
    } catch (err) {
      this.buffer.discard();
      throw err;
    }
    // Committed: a failing listener must not turn the call into an error.
    this.buffer.flush(this.events, (err, event) => {
      this.logger.error({ err, event }, "Event listener failed");
    });
    return result;
  }
}
