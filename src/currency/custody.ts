import type { TenureDB } from "../vault/db.js";
import type { AccountId } from "../utils/types.js";

/**
 * The currency primitive the ledger settles against. Both calls are
 * synchronous: a transfer has either fully happened when it returns true or
 * not happened at all when it returns false.
 */
export interface CurrencyRail {
  /** Takes custody of value attached to a deposit call. */
  receive(from: AccountId, amount: bigint): void;
  transfer(to: AccountId, amount: bigint): boolean;
  balance(): bigint;
}

/**
 * Held balance kept in the same database as the ledger, so a rolled back
 * withdrawal also rolls back the debit.
 */
export class Custody implements CurrencyRail {
  private readonly db;

  constructor(tenureDb: TenureDB) {
    this.db = tenureDb.raw();
    this.db.prepare("INSERT OR IGNORE INTO custody (id, balance) VALUES (1, '0')").run();
  }

  receive(_from: AccountId, amount: bigint): void {
    this.write(this.balance() + amount);
  }

  transfer(_to: AccountId, amount: bigint): boolean {
    const held = this.balance();
    if (amount > held) return false;
    this.write(held - amount);
    return true;
  }

  balance(): bigint {
    const row = this.db.prepare("SELECT balance FROM custody WHERE id = 1").get() as
      | { balance: string }
      | undefined;
    return BigInt(row?.balance ?? "0");
  }

  private write(balance: bigint): void {
    this.db.prepare("UPDATE custody SET balance = ? WHERE id = 1").run(balance.toString());
  }
}
